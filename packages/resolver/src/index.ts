/**
 * @provisioner/resolver
 *
 * Walks a feature repository graph, selects the requested features and
 * translates them into provisioning directives plus non-fatal warnings.
 */

// ============================================================================
// PRIMARY API
// ============================================================================

export { resolveFeatures } from "./resolve.js";
export { FeatureProvision, featureProvision } from "./builder.js";
export { applyDirectives } from "./apply.js";

// ============================================================================
// BUILDING BLOCKS
// ============================================================================

export { type CollectOptions, collectFeatures } from "./collect.js";
export { type TranslateOptions, translateFeature, translateFeatures } from "./translate.js";
export { parseProperties } from "./properties.js";
export { consoleLogger, ResolutionLog } from "./log.js";
export { NodeFileDeployer } from "./deployer.js";
export {
  parseResolverSettings,
  type RepositorySource,
  type ResolveCollaborators,
  type ResolveOptions,
  type ResolverSettings,
  ResolverSettingsSchema,
} from "./options.js";

// ============================================================================
// REPORTERS
// ============================================================================

export { JsonReporter } from "./reporters/json-reporter.js";
export { describeDirective, TerminalReporter } from "./reporters/terminal-reporter.js";
export type { ResolutionReporter } from "./reporters/types.js";
export { type CliArgs, parseArgs } from "./cli-args.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@provisioner/resolver";
export const PACKAGE_VERSION = "0.1.0";
