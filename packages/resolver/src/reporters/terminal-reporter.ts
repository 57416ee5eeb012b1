import type { ProvisioningDirective, ResolutionResult, WarningSeverity } from "@provisioner/core";
import type { ResolutionReporter } from "./types.js";

// ---------------------------------------------------------------------------
// ANSI helpers (no chalk dependency)
// ---------------------------------------------------------------------------

const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";

const SEVERITY_COLORS: Record<WarningSeverity, string> = {
  error: RED,
  warn: YELLOW,
  info: CYAN,
};

/**
 * One line per directive, in order. Exported for reuse by callers that
 * print directives as they are applied.
 */
export function describeDirective(directive: ProvisioningDirective): string {
  switch (directive.type) {
    case "install-bundle":
      return `install-bundle ${directive.uri} (start level ${directive.startLevel}, ${
        directive.start ? "started" : "not started"
      })`;
    case "apply-configuration":
      return `apply-configuration ${directive.pid}${directive.isFactory ? " (factory)" : ""} ${JSON.stringify(
        directive.properties,
      )}`;
    case "deploy-file":
      return `deploy-file ${directive.sourceUri} -> ${directive.destinationFileName}`;
    default: {
      const unreachable: never = directive;
      return JSON.stringify(unreachable);
    }
  }
}

/**
 * Renders a human-readable terminal report.
 */
export class TerminalReporter implements ResolutionReporter {
  readonly name = "terminal";

  report(result: ResolutionResult): string {
    const lines: string[] = [];

    lines.push(`${BOLD}Provisioning directives (${result.directives.length})${RESET}`);
    for (const directive of result.directives) {
      lines.push(`  ${describeDirective(directive)}`);
    }

    if (result.warnings.length > 0) {
      lines.push("");
      lines.push(`${BOLD}Warnings (${result.warnings.length})${RESET}`);
      for (const warning of result.warnings) {
        const color = SEVERITY_COLORS[warning.severity];
        lines.push(`  ${color}[${warning.severity}]${RESET} ${warning.kind}: ${warning.message}`);
      }
    }

    return lines.join("\n");
  }
}
