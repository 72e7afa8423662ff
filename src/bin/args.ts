/**
 * Command-line flag parsing for cranscope
 */

export interface CliArgs {
  help: boolean;
  version: boolean;
  configPath?: string;
  unknown?: string;
}

/** Parse command-line flags; the first unrecognized argument is reported back */
export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = { help: false, version: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "-h" || arg === "--help") {
      parsed.help = true;
    } else if (arg === "-v" || arg === "--version") {
      parsed.version = true;
    } else if (arg.startsWith("--config=")) {
      parsed.configPath = arg.slice("--config=".length);
    } else if ((arg === "-c" || arg === "--config") && i + 1 < args.length) {
      parsed.configPath = args[++i];
    } else {
      parsed.unknown = arg;
      break;
    }
  }

  return parsed;
}
