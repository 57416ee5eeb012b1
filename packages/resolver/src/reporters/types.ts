import type { ResolutionResult } from "@provisioner/core";

/**
 * Formats a resolution result for output.
 */
export interface ResolutionReporter {
  readonly name: string;
  report(result: ResolutionResult): string;
}
