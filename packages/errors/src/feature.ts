/**
 * Feature errors: translating a selected feature into directives.
 *
 * None of these abort a resolution. The translator catches them and
 * turns them into warnings that skip the affected unit.
 */

import { ProvisionerError } from "./base.js";

export class UnsupportedFeatureResolverError extends ProvisionerError<"FEATURE_RESOLVER_UNSUPPORTED"> {
  readonly _tag = "FeatureError" as const;

  constructor(
    readonly featureName: string,
    readonly resolver: string,
  ) {
    super({
      code: "FEATURE_RESOLVER_UNSUPPORTED",
      message: `Using resolvers (specified in feature ${featureName}) is not supported (resolver specified: ${resolver}), the feature will be ignored`,
      metadata: { feature: featureName, resolver },
    });
  }
}

export class PropertiesParseError extends ProvisionerError<"FEATURE_PROPERTIES_INVALID"> {
  readonly _tag = "FeatureError" as const;

  constructor(
    reason: string,
    readonly line: number,
  ) {
    super({
      code: "FEATURE_PROPERTIES_INVALID",
      message: `Invalid properties at line ${line}: ${reason}`,
    });
  }
}

export class FileDeployError extends ProvisionerError<"FEATURE_FILE_DEPLOY_FAILED"> {
  readonly _tag = "FeatureError" as const;

  constructor(
    readonly source: string,
    readonly finalName: string,
    cause?: Error,
  ) {
    super({
      code: "FEATURE_FILE_DEPLOY_FAILED",
      message: `The deployment of config file ${source} failed (final name = ${finalName})${
        cause !== undefined ? `: ${cause.message}` : ""
      }`,
      metadata: { source, finalName },
      cause,
    });
  }
}

export class ResolverOptionsError extends ProvisionerError<"RESOLVER_OPTIONS_INVALID"> {
  readonly _tag = "ResolverError" as const;

  constructor(
    readonly optionIssues: readonly string[],
    cause?: Error,
  ) {
    super({
      code: "RESOLVER_OPTIONS_INVALID",
      message: `Resolver options invalid:\n${optionIssues.map((i) => `  - ${i}`).join("\n")}`,
      cause,
    });
  }
}
