/**
 * Run a recording folder (or a stored session) through the pipeline.
 *
 * Usage:
 *   tsx tools/process-session.ts --folder <path> [--mic 1=Alice --mic 2=Bob]
 *   tsx tools/process-session.ts --sessionId <id> [--recoverFailed] [--redownload] [--rerunAnalysis]
 *   tsx tools/process-session.ts --pending
 *
 * Example:
 *   tsx tools/process-session.ts --folder "D:\Recordings\2024-March-Inception" --mic 1=Jon --mic 2=Katie
 */

import dotenv from "dotenv";
dotenv.config();

import { FfmpegConverter } from "../src/audio/ffmpeg.js";
import { cfg, printConfigSnapshot } from "../src/config/env.js";
import {
  createSessionFromFolder,
  processPendingSessions,
  processSession,
  recoverFailedFiles,
  redownloadTranscriptions,
  rerunAnalysis,
  resetStuckSessions,
  type PipelineDeps,
} from "../src/pipeline/sessionPipeline.js";
import { SqliteSessionStore } from "../src/sessions/sessionStore.js";
import type { MicAssignments, Session } from "../src/sessions/types.js";
import { GladiaClient } from "../src/transcription/gladiaClient.js";
import { errorMessage, log } from "../src/utils/logger.js";

const cliLog = log.withScope("cli");

// ============================================================================
// CLI Argument Parsing
// ============================================================================

interface CliArgs {
  folder?: string;
  sessionId?: string;
  mics: MicAssignments;
  pending: boolean;
  rerunAnalysis: boolean;
  recoverFailed: boolean;
  redownload: boolean;
  resetStuckMinutes?: number;
  printConfig: boolean;
  help: boolean;
}

function printHelp(): void {
  console.log(`
Process a movie discussion recording

Usage:
  tsx tools/process-session.ts --folder <path> [--mic N=Name ...]
  tsx tools/process-session.ts --sessionId <id> [maintenance flags]
  tsx tools/process-session.ts --pending

Options:
  --folder <path>          Session folder; creates the session or resumes the stored one
  --sessionId <id>         Resume a stored session
  --mic <N=Name>           Microphone assignment, repeatable (MIC1 is 1)
  --pending                Process every Pending or Failed session
  --recoverFailed          Reset retryable failed files before processing
  --redownload             Fetch finished transcripts again
  --rerunAnalysis          Analyze again from stored transcripts (skips processing)
  --resetStuck <minutes>   Put sessions stuck mid-run for longer than this back to Pending
  --printConfig            Print the config (secrets redacted)
  --help                   Show this help
`);
}

function parseMic(value: string, mics: MicAssignments): void {
  const eq = value.indexOf("=");
  const mic = Number(value.slice(0, eq));
  const name = value.slice(eq + 1).trim();
  if (eq <= 0 || !Number.isInteger(mic) || mic < 1 || !name) {
    throw new Error(`Invalid --mic value (expected N=Name): ${value}`);
  }
  mics[mic] = name;
}

function assignFlag(args: CliArgs, flag: string, value: string): void {
  switch (flag) {
    case "folder":
      args.folder = value;
      break;
    case "sessionId":
      args.sessionId = value;
      break;
    case "mic":
      parseMic(value, args.mics);
      break;
    case "resetStuck": {
      const minutes = Number(value);
      if (!Number.isFinite(minutes) || minutes <= 0) {
        throw new Error(`Invalid resetStuck: ${value}`);
      }
      args.resetStuckMinutes = minutes;
      break;
    }
    default:
      throw new Error(`Unknown flag: --${flag}`);
  }
}

const SWITCHES = ["help", "pending", "rerunAnalysis", "recoverFailed", "redownload", "printConfig"] as const;
type Switch = (typeof SWITCHES)[number];

function isSwitch(flag: string): flag is Switch {
  return SWITCHES.some((s) => s === flag);
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    mics: {},
    pending: false,
    rerunAnalysis: false,
    recoverFailed: false,
    redownload: false,
    printConfig: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    const flag = arg.replace(/^--/, "");
    if (isSwitch(flag)) {
      args[flag] = true;
      continue;
    }

    // Handle --flag=value
    const eq = flag.indexOf("=");
    if (eq > 0) {
      assignFlag(args, flag.slice(0, eq), flag.slice(eq + 1));
      continue;
    }

    // Handle --flag value
    const value = argv[i + 1];
    if (!value || value.startsWith("--")) {
      throw new Error(`Missing value for flag: ${arg}`);
    }
    assignFlag(args, flag, value);
    i++;
  }

  return args;
}

// ============================================================================
// Main
// ============================================================================

function summarize(session: Session): void {
  const transcribed = session.audioFiles.filter((f) => f.processingStatus === "TranscriptionComplete").length;
  cliLog.info(`${session.title} (${session.sessionDate}): ${session.status}`, {
    sessionId: session.id,
    transcribed: `${transcribed}/${session.audioFiles.length}`,
    source: session.categoryResults?.source ?? null,
    error: session.errorMessage ?? null,
  });
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(errorMessage(err));
    printHelp();
    process.exit(1);
  }

  if (args.help) {
    printHelp();
    return;
  }
  if (args.printConfig) {
    printConfigSnapshot(cfg);
  }

  const store = new SqliteSessionStore();
  const deps: PipelineDeps = {
    store,
    api: new GladiaClient(),
    converter: new FfmpegConverter(),
  };

  try {
    if (args.resetStuckMinutes !== undefined) {
      const reset = resetStuckSessions(args.resetStuckMinutes * 60_000, deps);
      cliLog.info(`Reset ${reset} stuck session(s)`);
    }

    if (args.pending) {
      const sessions = await processPendingSessions(deps);
      sessions.forEach(summarize);
      return;
    }

    let session: Session | null = null;
    if (args.folder) {
      session = createSessionFromFolder(args.folder, args.mics, deps);
    } else if (args.sessionId) {
      session = store.getById(args.sessionId);
      if (!session) throw new Error(`Session ${args.sessionId} not found`);
    }

    if (!session) {
      if (args.resetStuckMinutes === undefined && !args.printConfig) printHelp();
      return;
    }

    if (args.recoverFailed) {
      recoverFailedFiles(session.id, deps);
    }
    if (args.redownload) {
      await redownloadTranscriptions(session.id, deps);
    }

    const latest = store.getById(session.id) ?? session;
    const result = args.rerunAnalysis ? await rerunAnalysis(latest.id, deps) : await processSession(latest, deps);
    summarize(result);
    if (result.status === "Failed") process.exitCode = 1;
  } catch (err) {
    cliLog.error(`Processing failed: ${errorMessage(err)}`);
    if (err instanceof Error && err.stack) {
      console.error(err.stack);
    }
    process.exitCode = 1;
  } finally {
    store.close();
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
