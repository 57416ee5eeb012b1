/**
 * Depth-first walk over a repository and the repositories it references.
 *
 * Only the root load can fail the walk. A reference seen before (a cycle
 * or a plain duplicate) and a reference that cannot be loaded are both
 * reported and skipped.
 */

import { type Feature, isFeatureEntry, type RepositoryRecord } from "@provisioner/core";
import { getErrorMessage, toError } from "@provisioner/errors";

import type { ResolutionLog } from "./log.js";
import type { RepositorySource } from "./options.js";

export interface CollectOptions {
  readonly loader: RepositorySource;
  readonly log: ResolutionLog;
}

interface WalkContext extends CollectOptions {
  readonly visited: Set<string>;
  readonly features: Feature[];
}

export async function collectFeatures(rootLocation: string, options: CollectOptions): Promise<Feature[]> {
  const root = await options.loader.load(rootLocation);

  const context: WalkContext = {
    ...options,
    // Seeded with the root so a cycle back to it is reported, not loaded again.
    visited: new Set([rootLocation]),
    features: [],
  };
  await walk(root, rootLocation, context);
  return context.features;
}

async function walk(record: RepositoryRecord, location: string, context: WalkContext): Promise<void> {
  context.log.info(`Provision feature repository with name ${record.name ?? "(unnamed)"} from ${location}`);

  for (const entry of record.entries) {
    if (isFeatureEntry(entry)) {
      context.features.push(entry.feature);
      continue;
    }

    const reference = entry.location;
    if (context.visited.has(reference)) {
      context.log.report(
        "duplicate-repository",
        "warn",
        `Skipping repository ${reference} referenced from ${location}: cyclic or duplicate repository reference, the scanned features might not be complete`,
        { repository: reference, referencedFrom: location },
      );
      continue;
    }
    context.visited.add(reference);

    let nested: RepositoryRecord;
    try {
      nested = await context.loader.load(reference);
    } catch (error: unknown) {
      context.log.report(
        "nested-repository-failed",
        "warn",
        `Can't load repository ${reference} referenced from ${location}, the scanned features might not be complete: ${getErrorMessage(error)}`,
        { repository: reference, referencedFrom: location },
        toError(error),
      );
      continue;
    }
    await walk(nested, reference, context);
  }
}
