/**
 * @provisioner/errors
 *
 * Shared error taxonomy for the feature provisioner.
 *
 * Every error carries a `.code` from the catalog that discriminates the
 * specific condition, and a `_tag` naming its domain family. Use
 * `error.code === "XXX"` for fine-grained matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isProvisionerError, ProvisionerError } from "./base.js";

export {
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getErrorMessage,
  isValidErrorCode,
  toError,
  validateCatalog,
} from "./utils.js";

export type { ProvisionerErrorOptions, ValidationIssue } from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export { isFetchOrParseError } from "./guards.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export {
  FetchOrParseError,
  RepositoryFetchError,
  RepositoryLocationError,
  RepositoryParseError,
  RepositoryRootError,
  RepositorySchemaError,
} from "./repository.js";

export {
  FileDeployError,
  PropertiesParseError,
  ResolverOptionsError,
  UnsupportedFeatureResolverError,
} from "./feature.js";
