import {
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";
import type { ProvisionerErrorOptions } from "./types.js";

/**
 * Plain-object form of a ProvisionerError, safe to log or send over the wire.
 */
export interface ErrorJSON {
  _tag: string;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  httpStatus: HttpStatusCode;
  grpcCode: GrpcStatusCode;
  isExpected: boolean;
  timestamp: string;
  metadata?: Record<string, string> | undefined;
  stack?: string | undefined;
  cause?: string | undefined;
}

/**
 * Root of the error hierarchy.
 *
 * The `code` selects a catalog entry, which fixes httpStatus, grpcCode,
 * domain and isExpected. Subclasses only declare their domain `_tag`.
 */
export abstract class ProvisionerError<C extends ErrorCode = ErrorCode> extends Error {
  abstract readonly _tag: string;
  readonly code: C;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly timestamp: Date;

  constructor(options: ProvisionerErrorOptions<C>) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    const entry: ErrorCatalogEntry = ERROR_CATALOG[options.code];
    this.name = new.target.name;
    this.code = options.code;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.metadata = options.metadata;
    this.timestamp = new Date();
    Error.captureStackTrace(this, new.target);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      metadata: this.metadata,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.metadata !== undefined && Object.keys(this.metadata).length > 0) {
      str += ` ${JSON.stringify(this.metadata)}`;
    }
    return str;
  }
}

/**
 * Check if a value is a ProvisionerError
 */
export function isProvisionerError(error: unknown): error is ProvisionerError {
  return error instanceof ProvisionerError;
}
