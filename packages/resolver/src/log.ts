/**
 * ResolutionLog: ordered warnings for one resolution, mirrored to a logger.
 */

import type {
  ResolutionLogger,
  ResolutionWarning,
  ResolutionWarningKind,
  WarningSeverity,
} from "@provisioner/core";

const LOG_TAG = "[feature-resolver]";

/** Default logger: console, one tagged line per message. */
export const consoleLogger: ResolutionLogger = {
  info: (message) => console.info(`${LOG_TAG} ${message}`),
  warn: (message) => console.warn(`${LOG_TAG} ${message}`),
  error: (message) => console.error(`${LOG_TAG} ${message}`),
};

export class ResolutionLog {
  private readonly collected: ResolutionWarning[] = [];

  constructor(private readonly logger: ResolutionLogger = consoleLogger) {}

  /** Progress line. Goes to the logger only. */
  info(message: string): void {
    this.logger.info(message);
  }

  /** Records a warning and forwards its message at the matching level. */
  report(
    kind: ResolutionWarningKind,
    severity: WarningSeverity,
    message: string,
    context: Readonly<Record<string, string>> = {},
    cause?: Error,
  ): void {
    this.collected.push({
      kind,
      severity,
      message,
      context: { ...context },
      ...(cause !== undefined ? { cause } : {}),
    });
    this.logger[severity](message);
  }

  get warnings(): readonly ResolutionWarning[] {
    return [...this.collected];
  }
}
