/**
 * Delete highlight clips older than a number of days.
 *
 * Usage:
 *   tsx tools/cleanup-clips.ts [--days <n>] [--clipsDir <path>]
 */

import dotenv from "dotenv";
dotenv.config();

import { cleanupOldClips } from "../src/clips/clipExtractor.js";
import { cfg } from "../src/config/env.js";
import { errorMessage, log } from "../src/utils/logger.js";

const cliLog = log.withScope("cli");

interface CliArgs {
  days: number;
  clipsDir: string;
  help: boolean;
}

function printHelp(): void {
  console.log(`
Delete old highlight clips

Usage:
  tsx tools/cleanup-clips.ts [--days <n>] [--clipsDir <path>]

Options:
  --days <n>         Age in days after which clips are removed (default: ${cfg.data.clipMaxAgeDays})
  --clipsDir <path>  Clip directory (default: ${cfg.data.clipsDir})
  --help             Show this help
`);
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { days: cfg.data.clipMaxAgeDays, clipsDir: cfg.data.clipsDir, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help") {
      args.help = true;
      continue;
    }

    const value = argv[i + 1];
    if (!value || value.startsWith("--")) {
      throw new Error(`Missing value for flag: ${arg}`);
    }
    i++;

    switch (arg) {
      case "--days":
        args.days = Number(value);
        if (!Number.isFinite(args.days) || args.days < 0) {
          throw new Error(`Invalid days: ${value}`);
        }
        break;
      case "--clipsDir":
        args.clipsDir = value;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return args;
}

function main(): void {
  try {
    const args = parseArgs(process.argv.slice(2));
    if (args.help) {
      printHelp();
      return;
    }
    const removed = cleanupOldClips(args.days, { clipsDir: args.clipsDir });
    cliLog.info(`Done: ${removed} clip(s) removed from ${args.clipsDir}`);
  } catch (err) {
    cliLog.error(`Clip cleanup failed: ${errorMessage(err)}`);
    process.exit(1);
  }
}

main();
