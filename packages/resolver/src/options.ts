import type { FileDeployer, RepositoryRecord, ResolutionLogger, ResourceFetcher } from "@provisioner/core";
import { DEFAULT_START_LEVEL } from "@provisioner/core";
import { ResolverOptionsError } from "@provisioner/errors";
import { z } from "zod";

/** Anything that can turn a location into a repository record. */
export interface RepositorySource {
  load(location: string): Promise<RepositoryRecord>;
}

/** Collaborators a resolution may be given instead of the Node defaults. */
export interface ResolveCollaborators {
  readonly loader?: RepositorySource;
  readonly fetcher?: ResourceFetcher;
  readonly deployer?: FileDeployer;
  readonly logger?: ResolutionLogger;
}

export interface ResolveOptions extends ResolveCollaborators {
  /** Start level for bundles that declare none (default: 60) */
  readonly defaultStartLevel?: number;
  /** Directory config files are deployed into; without it they are skipped */
  readonly workingDirectory?: string;
}

export const ResolverSettingsSchema = z.object({
  defaultStartLevel: z.number().int().positive().default(DEFAULT_START_LEVEL),
  workingDirectory: z.string().trim().min(1, "must not be empty").optional(),
});

export type ResolverSettings = z.infer<typeof ResolverSettingsSchema>;

/**
 * Validates the plain settings of a resolution.
 *
 * @throws ResolverOptionsError listing every invalid setting
 */
export function parseResolverSettings(options?: ResolveOptions): ResolverSettings {
  const result = ResolverSettingsSchema.safeParse({
    defaultStartLevel: options?.defaultStartLevel,
    workingDirectory: options?.workingDirectory,
  });
  if (!result.success) {
    throw new ResolverOptionsError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      result.error,
    );
  }
  return result.data;
}
