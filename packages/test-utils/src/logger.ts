import type { ResolutionLogger } from "@provisioner/core";

export interface LogLine {
  readonly level: "info" | "warn" | "error";
  readonly message: string;
}

/** ResolutionLogger that keeps every line instead of printing it. */
export class RecordingLogger implements ResolutionLogger {
  readonly lines: LogLine[] = [];

  info(message: string): void {
    this.lines.push({ level: "info", message });
  }

  warn(message: string): void {
    this.lines.push({ level: "warn", message });
  }

  error(message: string): void {
    this.lines.push({ level: "error", message });
  }

  messages(level: LogLine["level"]): string[] {
    return this.lines.filter((line) => line.level === level).map((line) => line.message);
  }
}
