/**
 * Repository locations are URLs (`file:`, `http:`, `https:`, ...) or plain
 * filesystem paths, which are turned into `file:` URLs.
 */

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { RepositoryLocationError, toError } from "@provisioner/errors";

/** A scheme of two or more characters; one letter is a Windows drive. */
const URL_SCHEME_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]+:/;

export function toLocationUrl(location: string): URL {
  const trimmed = location.trim();
  if (trimmed.length === 0 || trimmed.includes("\0")) {
    throw new RepositoryLocationError(location);
  }

  if (URL_SCHEME_PATTERN.test(trimmed)) {
    try {
      return new URL(trimmed);
    } catch (error: unknown) {
      throw new RepositoryLocationError(location, toError(error));
    }
  }

  return pathToFileURL(resolve(trimmed));
}
