/**
 * Feature repository data model.
 *
 * A repository descriptor lists features and references to further
 * repositories, in an order that fixes the order of the resolved output.
 * Records are produced by the repository loader and never mutated.
 */

/** A dependency on another feature by name. Advisory only. */
export interface DependencyContent {
  readonly kind: "dependency";
  readonly name: string;
  readonly version?: string | undefined;
}

/** A bundle to install. */
export interface BundleContent {
  readonly kind: "bundle";
  readonly location: string;
  readonly startLevel?: number | undefined;
  /** Defaults to true when absent */
  readonly start?: boolean | undefined;
  /** Dependency bundles are not supported; the bundle is still installed */
  readonly dependency?: boolean | undefined;
}

/** A configuration block: a PID and properties text. */
export interface ConfigContent {
  readonly kind: "config";
  readonly pid: string;
  readonly propertiesText: string;
}

/** A file copied into the working directory. */
export interface ConfigFileContent {
  readonly kind: "configfile";
  readonly source: string;
  readonly finalName: string;
}

/** Long descriptive text shown by feature info tooling. Never translated. */
export interface DetailsContent {
  readonly kind: "details";
  readonly text: string;
}

export type FeatureContent =
  | DependencyContent
  | BundleContent
  | ConfigContent
  | ConfigFileContent
  | DetailsContent;

export type FeatureContentKind = FeatureContent["kind"];

export interface Feature {
  /** Selection and dependency key */
  readonly name: string;
  /** Informational only, never compared */
  readonly version: string;
  /** A named resolution strategy; any non-empty value makes the feature unsupported */
  readonly resolver?: string | undefined;
  readonly description?: string | undefined;
  readonly content: readonly FeatureContent[];
}

export interface FeatureEntry {
  readonly kind: "feature";
  readonly feature: Feature;
}

/** Reference to another repository, identified only by its location string. */
export interface RepositoryReference {
  readonly kind: "repository";
  readonly location: string;
}

export type RepositoryEntry = FeatureEntry | RepositoryReference;

export interface RepositoryRecord {
  readonly name?: string | undefined;
  readonly entries: readonly RepositoryEntry[];
}
