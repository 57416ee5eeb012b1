import type { ResolutionResult, ResolutionWarning } from "@provisioner/core";
import { isProvisionerError } from "@provisioner/errors";
import type { ResolutionReporter } from "./types.js";

/**
 * Renders the result as formatted JSON. A warning's cause is reduced to its
 * code and message.
 */
export class JsonReporter implements ResolutionReporter {
  readonly name = "json";

  report(result: ResolutionResult): string {
    return JSON.stringify(
      { directives: result.directives, warnings: result.warnings.map(toWarningJSON) },
      null,
      2,
    );
  }
}

function toWarningJSON({ cause, ...warning }: ResolutionWarning) {
  if (cause === undefined) {
    return warning;
  }
  return {
    ...warning,
    cause: isProvisionerError(cause) ? { code: cause.code, message: cause.message } : { message: cause.message },
  };
}
