#!/usr/bin/env node

import type { ResolutionLogger } from "@provisioner/core";
import { isProvisionerError } from "@provisioner/errors";

import { HELP_TEXT, parseArgs } from "./cli-args.js";
import { JsonReporter } from "./reporters/json-reporter.js";
import { TerminalReporter } from "./reporters/terminal-reporter.js";
import { resolveFeatures } from "./resolve.js";

// Progress goes to stderr so stdout carries only the report.
const stderrLogger: ResolutionLogger = {
  info: (message) => console.error(`[feature-resolver] ${message}`),
  warn: (message) => console.error(`[feature-resolver] WARN ${message}`),
  error: (message) => console.error(`[feature-resolver] ERROR ${message}`),
};

async function main(): Promise<void> {
  const args = parseArgs(process.argv);

  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }
  if (args.repository === undefined) {
    console.error(HELP_TEXT);
    process.exit(2);
  }

  const result = await resolveFeatures(args.repository, args.features, {
    logger: stderrLogger,
    ...(args.startLevel !== undefined ? { defaultStartLevel: args.startLevel } : {}),
    ...(args.workingDirectory !== undefined ? { workingDirectory: args.workingDirectory } : {}),
  });

  const reporter = args.format === "json" ? new JsonReporter() : new TerminalReporter();
  console.log(reporter.report(result));
}

main().catch((err: unknown) => {
  console.error("Fatal:", isProvisionerError(err) ? err.toString() : err instanceof Error ? err.message : String(err));
  process.exit(1);
});
