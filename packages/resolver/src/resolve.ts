/**
 * Resolution entry point: repository graph in, directives and warnings out.
 */

import type { ResolutionResult } from "@provisioner/core";
import { NodeResourceFetcher, RepositoryLoader } from "@provisioner/repository";
import { withSpan } from "@provisioner/telemetry";

import { collectFeatures } from "./collect.js";
import { NodeFileDeployer } from "./deployer.js";
import { ResolutionLog } from "./log.js";
import { parseResolverSettings, type ResolveOptions } from "./options.js";
import { translateFeatures } from "./translate.js";

/**
 * Resolves the features named in `requestedNames` from the repository at
 * `rootLocation` and everything it references.
 *
 * @throws ResolverOptionsError when the options are invalid
 * @throws FetchOrParseError when the root repository cannot be loaded
 */
export async function resolveFeatures(
  rootLocation: string,
  requestedNames: ReadonlySet<string> | readonly string[],
  options?: ResolveOptions,
): Promise<ResolutionResult> {
  const settings = parseResolverSettings(options);
  const requested: ReadonlySet<string> = new Set(requestedNames);
  const log = new ResolutionLog(options?.logger);

  const fetcher = options?.fetcher ?? new NodeResourceFetcher();
  const loader = options?.loader ?? new RepositoryLoader({ fetcher });
  const deployer = options?.deployer ?? new NodeFileDeployer(fetcher);

  return withSpan(
    "provisioner.resolve",
    { "provisioner.repository": rootLocation, "provisioner.requested": requested.size },
    async (span) => {
      const features = await collectFeatures(rootLocation, { loader, log });
      const directives = await translateFeatures(features, {
        requested,
        defaultStartLevel: settings.defaultStartLevel,
        workingDirectory: settings.workingDirectory,
        deployer,
        log,
      });

      const warnings = log.warnings;
      span.setAttribute("provisioner.features", features.length);
      span.setAttribute("provisioner.directives", directives.length);
      span.setAttribute("provisioner.warnings", warnings.length);
      return { directives, warnings };
    },
  );
}
