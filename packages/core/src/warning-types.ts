import type { ProvisioningDirective } from "./directive-types.js";

export type WarningSeverity = "info" | "warn" | "error";

export type ResolutionWarningKind =
  | "duplicate-repository"
  | "nested-repository-failed"
  | "unsupported-resolver"
  | "unmet-dependency"
  | "unsupported-dependency-bundle"
  | "properties-parse-failed"
  | "missing-working-directory"
  | "file-deploy-failed";

/**
 * A non-fatal problem met during resolution. `context` names whatever is
 * needed to find the culprit: repository, feature, pid, or file.
 */
export interface ResolutionWarning {
  readonly kind: ResolutionWarningKind;
  readonly severity: WarningSeverity;
  readonly message: string;
  readonly context: Readonly<Record<string, string>>;
  /** The error behind the warning, when there is one. */
  readonly cause?: Error | undefined;
}

export interface ResolutionResult {
  readonly directives: readonly ProvisioningDirective[];
  readonly warnings: readonly ResolutionWarning[];
}
