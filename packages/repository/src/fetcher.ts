/**
 * Default ResourceFetcher for Node: `file:` URLs from disk, `http:` and
 * `https:` through the global fetch. Other schemes are rejected.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { ResourceFetcher } from "@provisioner/core";

/** Default HTTP timeout: 30 seconds */
const DEFAULT_TIMEOUT_MS = 30_000;

export interface NodeResourceFetcherOptions {
  readonly timeoutMs?: number;
}

export class NodeResourceFetcher implements ResourceFetcher {
  private readonly timeoutMs: number;

  constructor(options?: NodeResourceFetcherOptions) {
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetch(location: URL): Promise<Uint8Array> {
    switch (location.protocol) {
      case "file:":
        return readFile(fileURLToPath(location));
      case "http:":
      case "https:":
        return this.fetchHttp(location);
      default:
        throw new Error(`Unsupported location scheme '${location.protocol}'`);
    }
  }

  private async fetchHttp(location: URL): Promise<Uint8Array> {
    const response = await fetch(location, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`.trimEnd());
    }
    return new Uint8Array(await response.arrayBuffer());
  }
}
