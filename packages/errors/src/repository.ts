/**
 * Repository errors: loading a feature repository descriptor.
 *
 * Abstract base: FetchOrParseError
 * Concrete:
 *   - RepositoryLocationError (REPOSITORY_LOCATION_INVALID)
 *   - RepositoryFetchError    (REPOSITORY_FETCH_FAILED)
 *   - RepositoryParseError    (REPOSITORY_PARSE_FAILED)
 *   - RepositoryRootError     (REPOSITORY_ROOT_INVALID)
 *   - RepositorySchemaError   (REPOSITORY_SCHEMA_INVALID)
 */

import { ProvisionerError } from "./base.js";
import type { ValidationIssue } from "./types.js";

type RepositoryCode =
  | "REPOSITORY_LOCATION_INVALID"
  | "REPOSITORY_FETCH_FAILED"
  | "REPOSITORY_PARSE_FAILED"
  | "REPOSITORY_ROOT_INVALID"
  | "REPOSITORY_SCHEMA_INVALID";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

/**
 * A repository location could not be retrieved or did not hold a valid
 * feature repository. Fatal for the root location, a warning for nested ones.
 */
export abstract class FetchOrParseError<
  C extends RepositoryCode = RepositoryCode,
> extends ProvisionerError<C> {
  constructor(
    readonly location: string,
    code: C,
    message: string,
    cause?: Error,
  ) {
    super({ code, message, metadata: { location }, cause });
  }
}

// ---------------------------------------------------------------------------
// Concrete Errors
// ---------------------------------------------------------------------------

export class RepositoryLocationError extends FetchOrParseError<"REPOSITORY_LOCATION_INVALID"> {
  readonly _tag = "RepositoryError" as const;

  constructor(location: string, cause?: Error) {
    super(
      location,
      "REPOSITORY_LOCATION_INVALID",
      `Invalid repository location '${location}'`,
      cause,
    );
  }
}

export class RepositoryFetchError extends FetchOrParseError<"REPOSITORY_FETCH_FAILED"> {
  readonly _tag = "RepositoryError" as const;

  constructor(location: string, reason: string, cause?: Error) {
    super(
      location,
      "REPOSITORY_FETCH_FAILED",
      `Fetching the feature repository from ${location} failed: ${reason}`,
      cause,
    );
  }
}

export class RepositoryParseError extends FetchOrParseError<"REPOSITORY_PARSE_FAILED"> {
  readonly _tag = "RepositoryError" as const;

  constructor(
    location: string,
    reason: string,
    readonly line?: number | undefined,
    readonly column?: number | undefined,
    cause?: Error,
  ) {
    const position =
      line !== undefined ? ` at line ${line}${column !== undefined ? `:${column}` : ""}` : "";
    super(
      location,
      "REPOSITORY_PARSE_FAILED",
      `Parsing the feature repository from ${location} failed${position}: ${reason}`,
      cause,
    );
  }
}

export class RepositoryRootError extends FetchOrParseError<"REPOSITORY_ROOT_INVALID"> {
  readonly _tag = "RepositoryError" as const;

  constructor(
    location: string,
    readonly rootElement: string | undefined,
  ) {
    super(
      location,
      "REPOSITORY_ROOT_INVALID",
      `The descriptor at ${location} is not a feature repository (root element: ${rootElement ?? "none"})`,
    );
  }
}

export class RepositorySchemaError extends FetchOrParseError<"REPOSITORY_SCHEMA_INVALID"> {
  readonly _tag = "RepositoryError" as const;
  readonly issues: readonly ValidationIssue[];

  constructor(location: string, schemaIssues: readonly string[], cause?: Error) {
    super(
      location,
      "REPOSITORY_SCHEMA_INVALID",
      `Feature repository at ${location} failed validation:\n${schemaIssues.map((i) => `  - ${i}`).join("\n")}`,
      cause,
    );
    this.issues = schemaIssues.map((i) => ({
      field: "repository",
      message: i,
      code: "SCHEMA_ISSUE",
    }));
  }
}
