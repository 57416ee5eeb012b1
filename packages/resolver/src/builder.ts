import { DEFAULT_START_LEVEL, type ResolutionResult } from "@provisioner/core";
import { ResolverOptionsError } from "@provisioner/errors";

import type { ResolveCollaborators } from "./options.js";
import { resolveFeatures } from "./resolve.js";

/**
 * Fluent form of {@link resolveFeatures}.
 *
 * @example
 * ```typescript
 * const result = await featureProvision("https://repo.example/features.xml")
 *   .add("core", "web")
 *   .defaultStartLevel(70)
 *   .workingDir("/tmp/runtime")
 *   .resolve();
 * ```
 */
export class FeatureProvision {
  private readonly features = new Set<string>();
  private startLevel: number = DEFAULT_START_LEVEL;
  private workingDirectory: string | undefined;

  constructor(
    private readonly repositoryUrl: string,
    private readonly collaborators: ResolveCollaborators = {},
  ) {
    if (typeof repositoryUrl !== "string" || repositoryUrl.trim().length === 0) {
      throw new ResolverOptionsError(["repositoryUrl: a feature repository location is required"]);
    }
  }

  add(...featureNames: string[]): this {
    for (const name of featureNames) {
      this.features.add(name);
    }
    return this;
  }

  defaultStartLevel(level: number): this {
    this.startLevel = level;
    return this;
  }

  workingDir(path: string): this {
    this.workingDirectory = path;
    return this;
  }

  /** Each call resolves against a snapshot of the features added so far. */
  resolve(): Promise<ResolutionResult> {
    return resolveFeatures(this.repositoryUrl, [...this.features], {
      ...this.collaborators,
      defaultStartLevel: this.startLevel,
      ...(this.workingDirectory !== undefined ? { workingDirectory: this.workingDirectory } : {}),
    });
  }
}

export function featureProvision(repositoryUrl: string, collaborators?: ResolveCollaborators): FeatureProvision {
  return new FeatureProvision(repositoryUrl, collaborators);
}
