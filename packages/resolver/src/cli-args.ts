// ---------------------------------------------------------------------------
// Argument parsing (minimal, no external CLI lib)
// ---------------------------------------------------------------------------

export interface CliArgs {
  readonly repository: string | undefined;
  readonly features: readonly string[];
  readonly format: "terminal" | "json";
  readonly startLevel?: number;
  readonly workingDirectory?: string;
  readonly help: boolean;
}

/** Parses `process.argv`; the first two entries (node and script) are skipped. */
export function parseArgs(argv: readonly string[]): CliArgs {
  let repository: string | undefined;
  const features: string[] = [];
  let format: "terminal" | "json" = "terminal";
  let startLevel: number | undefined;
  let workingDirectory: string | undefined;
  let help = false;

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case "--feature":
        if (next) {
          features.push(
            ...next
              .split(",")
              .map((name) => name.trim())
              .filter((name) => name.length > 0),
          );
          i++;
        }
        break;
      case "--format":
        if (next === "json" || next === "terminal") {
          format = next;
          i++;
        }
        break;
      case "--start-level":
        if (next) {
          startLevel = Number(next);
          i++;
        }
        break;
      case "--working-dir":
        if (next) {
          workingDirectory = next;
          i++;
        }
        break;
      case "--help":
        help = true;
        break;
      default:
        if (arg !== undefined && !arg.startsWith("--") && repository === undefined) {
          repository = arg;
        }
    }
  }

  return {
    repository,
    features,
    format,
    help,
    ...(startLevel !== undefined ? { startLevel } : {}),
    ...(workingDirectory !== undefined ? { workingDirectory } : {}),
  };
}

export const HELP_TEXT = `
provision-features: resolve features from a feature repository into provisioning directives

Usage: provision-features <repository> --feature <name1,name2> [options]

Options:
  --feature <names>        Comma-separated feature names (repeatable)
  --start-level <n>        Start level for bundles that declare none (default: 60)
  --working-dir <path>     Directory config files are deployed into
  --format terminal|json   Output format (default: terminal)
  --help                   Show this help message
`;
