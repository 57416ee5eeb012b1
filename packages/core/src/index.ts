export const PACKAGE_NAME = "@provisioner/core" as const;

/** Start level given to bundles that do not declare one */
export const DEFAULT_START_LEVEL = 60;

export { isFeatureEntry } from "./type-guards.js";

export type {
  DescriptorParser,
  FileDeployer,
  ProvisioningSink,
  ResolutionLogger,
  ResourceFetcher,
} from "./collaborator-types.js";
export type {
  ApplyConfigurationDirective,
  DeployFileDirective,
  InstallBundleDirective,
  ProvisioningDirective,
  ProvisioningDirectiveType,
} from "./directive-types.js";
export type {
  BundleContent,
  ConfigContent,
  ConfigFileContent,
  DependencyContent,
  DetailsContent,
  Feature,
  FeatureContent,
  FeatureContentKind,
  FeatureEntry,
  RepositoryEntry,
  RepositoryRecord,
  RepositoryReference,
} from "./repository-types.js";
export type {
  ResolutionResult,
  ResolutionWarning,
  ResolutionWarningKind,
  WarningSeverity,
} from "./warning-types.js";
