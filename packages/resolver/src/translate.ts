/**
 * Feature selection and translation into provisioning directives.
 *
 * Problems never abort a translation: each is reported on the log and only
 * the smallest affected unit (a feature or one content entry) is skipped.
 */

import { join } from "node:path";

import type {
  BundleContent,
  ConfigContent,
  ConfigFileContent,
  DependencyContent,
  Feature,
  FeatureContent,
  FileDeployer,
  ProvisioningDirective,
} from "@provisioner/core";
import {
  FileDeployError,
  getErrorMessage,
  toError,
  UnsupportedFeatureResolverError,
} from "@provisioner/errors";
import { toLocationUrl } from "@provisioner/repository";

import type { ResolutionLog } from "./log.js";
import { parseProperties } from "./properties.js";

export interface TranslateOptions {
  /** Names of the features to provision. Read, never modified. */
  readonly requested: ReadonlySet<string>;
  readonly defaultStartLevel: number;
  readonly workingDirectory?: string | undefined;
  readonly deployer: FileDeployer;
  readonly log: ResolutionLog;
}

export async function translateFeatures(
  features: readonly Feature[],
  options: TranslateOptions,
): Promise<ProvisioningDirective[]> {
  const directives: ProvisioningDirective[] = [];
  for (const feature of features) {
    if (!options.requested.has(feature.name)) continue;
    directives.push(...(await translateFeature(feature, options)));
  }
  return directives;
}

export async function translateFeature(
  feature: Feature,
  options: TranslateOptions,
): Promise<ProvisioningDirective[]> {
  options.log.info(`Provision feature ${feature.name} with version ${feature.version}`);

  if (feature.resolver !== undefined && feature.resolver.length > 0) {
    const error = new UnsupportedFeatureResolverError(feature.name, feature.resolver);
    options.log.report(
      "unsupported-resolver",
      "error",
      error.message,
      { feature: feature.name, resolver: feature.resolver },
      error,
    );
    return [];
  }

  const directives: ProvisioningDirective[] = [];
  for (const content of feature.content) {
    const directive = await translateContent(content, feature, options);
    if (directive !== undefined) {
      directives.push(directive);
    }
  }
  return directives;
}

async function translateContent(
  content: FeatureContent,
  feature: Feature,
  options: TranslateOptions,
): Promise<ProvisioningDirective | undefined> {
  switch (content.kind) {
    case "dependency":
      checkDependency(content, feature, options);
      return undefined;
    case "bundle":
      return bundleDirective(content, feature, options);
    case "config":
      return configurationDirective(content, feature, options);
    case "configfile":
      return deployConfigFile(content, feature, options);
    case "details":
      return undefined;
    default: {
      const unreachable: never = content;
      return unreachable;
    }
  }
}

function checkDependency(content: DependencyContent, feature: Feature, options: TranslateOptions): void {
  if (options.requested.has(content.name)) return;
  options.log.report(
    "unmet-dependency",
    "info",
    `Feature ${feature.name} depends on feature ${content.name}, which is not requested and must be supplied by some other means`,
    { feature: feature.name, dependency: content.name },
  );
}

function bundleDirective(
  content: BundleContent,
  feature: Feature,
  options: TranslateOptions,
): ProvisioningDirective {
  const directive: ProvisioningDirective = {
    type: "install-bundle",
    uri: content.location,
    startLevel: content.startLevel ?? options.defaultStartLevel,
    start: content.start ?? true,
  };
  if (content.dependency === true) {
    options.log.report(
      "unsupported-dependency-bundle",
      "warn",
      `The dependency flag of bundle ${content.location} in feature ${feature.name} is not supported, the bundle is installed as a regular one`,
      { feature: feature.name, bundle: content.location },
    );
  }
  return directive;
}

function configurationDirective(
  content: ConfigContent,
  feature: Feature,
  options: TranslateOptions,
): ProvisioningDirective | undefined {
  let properties: Record<string, string>;
  try {
    properties = parseProperties(content.propertiesText);
  } catch (error: unknown) {
    options.log.report(
      "properties-parse-failed",
      "error",
      `Can't read the properties of configuration ${content.pid} in feature ${feature.name}: ${getErrorMessage(error)}`,
      { feature: feature.name, pid: content.pid },
      toError(error),
    );
    return undefined;
  }

  const dash = content.pid.indexOf("-");
  const isFactory = dash > -1;
  const pid = isFactory ? content.pid.slice(0, dash) : content.pid;

  options.log.info(
    `Provision ${isFactory ? "factory configuration" : "configuration"} for PID ${pid} with values ${JSON.stringify(properties)}`,
  );
  return { type: "apply-configuration", pid, isFactory, properties };
}

async function deployConfigFile(
  content: ConfigFileContent,
  feature: Feature,
  options: TranslateOptions,
): Promise<ProvisioningDirective | undefined> {
  const context = { feature: feature.name, source: content.source, finalName: content.finalName };

  if (options.workingDirectory === undefined) {
    options.log.report(
      "missing-working-directory",
      "warn",
      `No working directory set, config file ${content.source} is not deployed (final name = ${content.finalName})`,
      context,
    );
    return undefined;
  }

  try {
    const source = toLocationUrl(content.source.trim());
    await options.deployer.deploy(source, join(options.workingDirectory, content.finalName));
  } catch (error: unknown) {
    const failure = new FileDeployError(content.source, content.finalName, toError(error));
    options.log.report("file-deploy-failed", "error", failure.message, context, failure);
    return undefined;
  }

  return { type: "deploy-file", sourceUri: content.source, destinationFileName: content.finalName };
}
