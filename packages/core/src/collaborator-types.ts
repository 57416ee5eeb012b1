/**
 * Boundaries between the resolver and the outside world.
 *
 * Each collaborator is passed in explicitly; nothing here is a process-wide
 * singleton.
 */

import type { RepositoryRecord } from "./repository-types.js";

/** Retrieves the raw bytes at a location. Timeouts are the fetcher's own concern. */
export interface ResourceFetcher {
  fetch(location: URL): Promise<Uint8Array>;
}

/**
 * Turns descriptor text into a repository record.
 * Throws a FetchOrParseError subclass when the text is not a valid repository.
 */
export interface DescriptorParser {
  parse(content: string, location: string): RepositoryRecord;
}

/** Copies a deployment artifact to a destination path, truncating it. */
export interface FileDeployer {
  deploy(source: URL, destination: string): Promise<void>;
}

/** The host that applies directives. Failures are its own concern; nothing is retried. */
export interface ProvisioningSink {
  installBundle(uri: string, startLevel: number, start: boolean): Promise<void> | void;
  applyConfiguration(
    pid: string,
    isFactory: boolean,
    properties: Readonly<Record<string, string>>,
  ): Promise<void> | void;
  deployFile(sourceUri: string, destinationFileName: string): Promise<void> | void;
}

/** Receives human-readable progress and problem lines. */
export interface ResolutionLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
