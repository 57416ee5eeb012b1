/**
 * Record builders and an in-memory RepositorySource for resolver tests.
 */

import type { Feature, FeatureContent, RepositoryEntry, RepositoryRecord } from "@provisioner/core";
import type { RepositorySource } from "../../options.js";

export function feature(
  name: string,
  content: readonly FeatureContent[] = [],
  extra: { readonly version?: string; readonly resolver?: string } = {},
): Feature {
  return { name, version: extra.version ?? "1.0.0", resolver: extra.resolver, content };
}

export function featureEntry(name: string, content: readonly FeatureContent[] = []): RepositoryEntry {
  return { kind: "feature", feature: feature(name, content) };
}

export function reference(location: string): RepositoryEntry {
  return { kind: "repository", location };
}

export function record(name: string, ...entries: RepositoryEntry[]): RepositoryRecord {
  return { name, entries };
}

/** Serves prebuilt records by literal location; unknown locations reject. */
export class RecordSource implements RepositorySource {
  readonly loads: string[] = [];

  constructor(private readonly records: Readonly<Record<string, RepositoryRecord>>) {}

  async load(location: string): Promise<RepositoryRecord> {
    this.loads.push(location);
    const found = this.records[location];
    if (found === undefined) {
      throw new Error(`No repository at ${location}`);
    }
    return found;
  }
}
