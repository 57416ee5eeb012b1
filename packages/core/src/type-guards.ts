import type { FeatureEntry, RepositoryEntry } from "./repository-types.js";

export function isFeatureEntry(entry: RepositoryEntry): entry is FeatureEntry {
  return entry.kind === "feature";
}
