/**
 * Repository Loader: location -> fetched bytes -> parsed, frozen record.
 *
 * The fetcher and parser are explicit handles. A loader owns no mutable
 * state, so one instance may serve concurrent resolutions.
 */

import type { DescriptorParser, RepositoryRecord, ResourceFetcher } from "@provisioner/core";
import { isFetchOrParseError, RepositoryFetchError, toError } from "@provisioner/errors";

import { NodeResourceFetcher } from "./fetcher.js";
import { toLocationUrl } from "./location.js";
import { createXmlDescriptorParser } from "./xml-parser.js";

export interface RepositoryLoaderOptions {
  readonly fetcher?: ResourceFetcher;
  readonly parser?: DescriptorParser;
  /** Text encoding of descriptors (default: utf-8) */
  readonly encoding?: string;
}

export class RepositoryLoader {
  private readonly fetcher: ResourceFetcher;
  private readonly parser: DescriptorParser;
  private readonly encoding: string;

  constructor(options?: RepositoryLoaderOptions) {
    this.fetcher = options?.fetcher ?? new NodeResourceFetcher();
    this.parser = options?.parser ?? createXmlDescriptorParser();
    this.encoding = options?.encoding ?? "utf-8";
  }

  /**
   * Fetches and parses the repository at `location`.
   *
   * @throws FetchOrParseError for a malformed location, failed fetch, malformed
   *   descriptor, a root that is not a feature repository, or schema violations
   */
  async load(location: string): Promise<RepositoryRecord> {
    const url = toLocationUrl(location);

    let bytes: Uint8Array;
    try {
      bytes = await this.fetcher.fetch(url);
    } catch (error: unknown) {
      if (isFetchOrParseError(error)) {
        throw error;
      }
      throw new RepositoryFetchError(location, describeFetchFailure(error), toError(error));
    }

    const content = new TextDecoder(this.encoding).decode(bytes);
    return this.parser.parse(content, location);
  }
}

/**
 * Loads a single repository with a fresh loader.
 */
export async function loadRepository(
  location: string,
  options?: RepositoryLoaderOptions,
): Promise<RepositoryRecord> {
  return new RepositoryLoader(options).load(location);
}

function describeFetchFailure(error: unknown): string {
  if (isNodeError(error) && error.code === "ENOENT") {
    return "file not found";
  }
  return error instanceof Error ? error.message : String(error);
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
