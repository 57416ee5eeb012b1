/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the provisioner packages. Each code maps to
 * a domain, an HTTP status and a gRPC canonical code.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: REPOSITORY, FEATURE, RESOLVER
 */

export const ERROR_CATALOG = {
  // ============================================================================
  // REPOSITORY ERRORS - Feature repository fetch and parse
  // ============================================================================
  REPOSITORY_LOCATION_INVALID: {
    domain: "repository",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    isExpected: true,
    title: "Invalid repository location",
    description: "The repository location is neither a URL nor a file path",
  },
  REPOSITORY_FETCH_FAILED: {
    domain: "repository",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE" as const,
    isExpected: false,
    title: "Repository fetch failed",
    description: "The repository could not be retrieved from its location",
  },
  REPOSITORY_PARSE_FAILED: {
    domain: "repository",
    httpStatus: 422,
    grpcCode: "INVALID_ARGUMENT" as const,
    isExpected: true,
    title: "Repository parse failed",
    description: "The repository descriptor is not well-formed",
  },
  REPOSITORY_ROOT_INVALID: {
    domain: "repository",
    httpStatus: 422,
    grpcCode: "INVALID_ARGUMENT" as const,
    isExpected: true,
    title: "Not a feature repository",
    description: "The parsed descriptor root is not a feature repository",
  },
  REPOSITORY_SCHEMA_INVALID: {
    domain: "repository",
    httpStatus: 422,
    grpcCode: "INVALID_ARGUMENT" as const,
    isExpected: true,
    title: "Repository schema validation failed",
    description: "The repository descriptor does not conform to the feature schema",
  },

  // ============================================================================
  // FEATURE ERRORS - Per-feature translation
  // ============================================================================
  FEATURE_RESOLVER_UNSUPPORTED: {
    domain: "feature",
    httpStatus: 501,
    grpcCode: "UNIMPLEMENTED" as const,
    isExpected: true,
    title: "Feature resolver unsupported",
    description: "Features that name a resolver cannot be provisioned",
  },
  FEATURE_PROPERTIES_INVALID: {
    domain: "feature",
    httpStatus: 422,
    grpcCode: "INVALID_ARGUMENT" as const,
    isExpected: true,
    title: "Configuration properties invalid",
    description: "A configuration block is not valid properties syntax",
  },
  FEATURE_FILE_DEPLOY_FAILED: {
    domain: "feature",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE" as const,
    isExpected: false,
    title: "Config file deployment failed",
    description: "A config file could not be copied into the working directory",
  },

  // ============================================================================
  // RESOLVER ERRORS - Resolution options
  // ============================================================================
  RESOLVER_OPTIONS_INVALID: {
    domain: "resolver",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    isExpected: true,
    title: "Resolver options invalid",
    description: "The resolution options failed validation",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];
