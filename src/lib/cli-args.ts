/**
 * Command-line argument parsing for scripts/truthscan.ts.
 *
 * @module cli-args
 */

import { DEFAULT_CLAIM, DEFAULT_DAYS } from "./config-schemas";

export interface CliOptions {
  claim: string;
  days: number;
  synthetic: boolean;
  outputDir?: string;
  catalogPath?: string;
  seed?: number;
}

export type CliCommand = { kind: "help" } | { kind: "run"; options: CliOptions };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = `Usage: truthscan [options]

Compiles open-source intelligence references for a claim into a report.

Options:
  --claim <text>        Claim to research (default: "${DEFAULT_CLAIM}")
  --days <n>            Days to look back (default: ${DEFAULT_DAYS})
  --no-synthetic        Do not generate synthetic sample data
  --output-dir <dir>    Root directory for reports and images (default: .)
  --catalog <file>      Alternative reference catalog JSON
  --seed <n>            Seed for reproducible synthetic data
  -h, --help            Show this help`;

const VALUE_FLAGS = new Set(["--claim", "--days", "--output-dir", "--catalog", "--seed"]);

function parseInteger(flag: string, raw: string): number {
  if (!/^-?\d+$/.test(raw)) {
    throw new CliUsageError(`${flag} expects an integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const options: CliOptions = { claim: DEFAULT_CLAIM, days: DEFAULT_DAYS, synthetic: true };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    }
    if (arg === "--no-synthetic") {
      options.synthetic = false;
      continue;
    }

    // --flag=value or --flag value
    const eq = arg.indexOf("=");
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    if (!VALUE_FLAGS.has(flag)) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    let value: string;
    if (eq > 0) {
      value = arg.slice(eq + 1);
    } else {
      if (i + 1 >= argv.length) {
        throw new CliUsageError(`${flag} requires a value`);
      }
      value = argv[++i];
    }

    switch (flag) {
      case "--claim":
        options.claim = value;
        break;
      case "--days": {
        const days = parseInteger(flag, value);
        if (days < 1) throw new CliUsageError("--days must be at least 1");
        options.days = days;
        break;
      }
      case "--output-dir":
        options.outputDir = value;
        break;
      case "--catalog":
        options.catalogPath = value;
        break;
      case "--seed":
        options.seed = parseInteger(flag, value);
        break;
    }
  }

  return { kind: "run", options };
}
