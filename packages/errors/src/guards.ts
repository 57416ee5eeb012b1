/**
 * Type guards for domain error families.
 */

import { FetchOrParseError } from "./repository.js";

/** Check if an error came from loading a repository descriptor */
export function isFetchOrParseError(error: unknown): error is FetchOrParseError {
  return error instanceof FetchOrParseError;
}
