import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { resolveDbPath } from "../dataPaths.js";
import type { CategoryResults, SessionStats } from "../analysis/types.js";
import { errorMessage, log } from "../utils/logger.js";
import {
  AUDIO_PROCESSING_STATUSES,
  isSessionStatus,
  type AudioFile,
  type AudioProcessingStatus,
  type MicAssignments,
  type Session,
  type SessionStatus,
} from "./types.js";

const storeLog = log.withScope("store");

export interface SessionStore {
  upsert(session: Session): void;
  getById(id: string): Session | null;
  findBy(predicate: (session: Session) => boolean): Session[];
  findByStatus(status: SessionStatus): Session[];
  list(): Session[];
}

type SessionRow = {
  id: string;
  doc: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isProcessingStatus(value: unknown): value is AudioProcessingStatus {
  return AUDIO_PROCESSING_STATUSES.some((s) => s === value);
}

function isAudioFile(value: unknown): value is AudioFile {
  return (
    isRecord(value) &&
    typeof value.fileName === "string" &&
    typeof value.filePath === "string" &&
    typeof value.fileSize === "number" &&
    typeof value.isMasterRecording === "boolean" &&
    typeof value.canRetry === "boolean" &&
    typeof value.lastUpdated === "string" &&
    isProcessingStatus(value.processingStatus)
  );
}

function toMicAssignments(value: unknown): MicAssignments | null {
  if (!isRecord(value)) return null;
  const out: MicAssignments = {};
  for (const [mic, name] of Object.entries(value)) {
    const n = Number(mic);
    if (!Number.isInteger(n) || typeof name !== "string") return null;
    out[n] = name;
  }
  return out;
}

function isCategoryResults(value: unknown): value is CategoryResults {
  return (
    isRecord(value) &&
    isRecord(value.winners) &&
    isRecord(value.topFives) &&
    Array.isArray(value.openingQuestions) &&
    typeof value.source === "string" &&
    isStringArray(value.notes)
  );
}

function isSessionStats(value: unknown): value is SessionStats {
  return (
    isRecord(value) &&
    typeof value.totalDuration === "string" &&
    typeof value.energyLevel === "string" &&
    isRecord(value.wordCounts) &&
    typeof value.totalWords === "number"
  );
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/** Rebuild a session from its stored JSON document. Null when the shape does not hold. */
export function decodeSession(raw: unknown): Session | null {
  if (!isRecord(raw)) return null;
  const { id, title, sessionDate, folderPath, status, audioFiles, createdAt, updatedAt } = raw;
  if (
    typeof id !== "string" ||
    typeof title !== "string" ||
    typeof sessionDate !== "string" ||
    typeof folderPath !== "string" ||
    typeof createdAt !== "string" ||
    typeof updatedAt !== "string" ||
    !isSessionStatus(status) ||
    !Array.isArray(audioFiles) ||
    !audioFiles.every(isAudioFile)
  ) {
    return null;
  }

  const micAssignments = toMicAssignments(raw.micAssignments);
  if (!micAssignments) return null;

  const session: Session = {
    id,
    title,
    sessionDate,
    folderPath,
    status,
    audioFiles,
    micAssignments,
    participantsPresent: isStringArray(raw.participantsPresent) ? raw.participantsPresent : [],
    participantsAbsent: isStringArray(raw.participantsAbsent) ? raw.participantsAbsent : [],
    discussionQuestions: isStringArray(raw.discussionQuestions) ? raw.discussionQuestions : [],
    categoryResults: isCategoryResults(raw.categoryResults) ? raw.categoryResults : null,
    stats: isSessionStats(raw.stats) ? raw.stats : null,
    createdAt,
    updatedAt,
  };
  const failure = optionalString(raw.errorMessage);
  if (failure !== undefined) session.errorMessage = failure;
  const processedAt = optionalString(raw.processedAt);
  if (processedAt !== undefined) session.processedAt = processedAt;
  return session;
}

export type SqliteSessionStoreOptions = {
  dbPath?: string;
  schemaPath?: string;
};

export class SqliteSessionStore implements SessionStore {
  private readonly db: Database.Database;

  constructor(opts: SqliteSessionStoreOptions = {}) {
    const dbPath = path.resolve(opts.dbPath ?? resolveDbPath());
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });

    const schemaPath = opts.schemaPath ?? path.join(process.cwd(), "src", "sessions", "schema.sql");
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(fs.readFileSync(schemaPath, "utf8"));
    storeLog.debug(`Opened session store at ${dbPath}`);
  }

  upsert(session: Session): void {
    this.db
      .prepare(
        `INSERT INTO sessions (id, status, folder_path, session_date, created_at, updated_at, doc)
         VALUES (@id, @status, @folderPath, @sessionDate, @createdAt, @updatedAt, @doc)
         ON CONFLICT(id) DO UPDATE SET
           status = excluded.status,
           folder_path = excluded.folder_path,
           session_date = excluded.session_date,
           updated_at = excluded.updated_at,
           doc = excluded.doc`,
      )
      .run({
        id: session.id,
        status: session.status,
        folderPath: session.folderPath,
        sessionDate: session.sessionDate,
        createdAt: session.createdAt,
        updatedAt: session.updatedAt,
        doc: JSON.stringify(session),
      });
  }

  getById(id: string): Session | null {
    const row = this.db.prepare<[string], SessionRow>("SELECT id, doc FROM sessions WHERE id = ?").get(id);
    return row ? this.decodeRow(row) : null;
  }

  findBy(predicate: (session: Session) => boolean): Session[] {
    return this.list().filter(predicate);
  }

  findByStatus(status: SessionStatus): Session[] {
    return this.db
      .prepare<[string], SessionRow>("SELECT id, doc FROM sessions WHERE status = ? ORDER BY session_date, created_at")
      .all(status)
      .map((row) => this.decodeRow(row))
      .filter((s): s is Session => s !== null);
  }

  /** Newest session date first. */
  list(): Session[] {
    return this.db
      .prepare<[], SessionRow>("SELECT id, doc FROM sessions ORDER BY session_date DESC, created_at DESC")
      .all()
      .map((row) => this.decodeRow(row))
      .filter((s): s is Session => s !== null);
  }

  close(): void {
    this.db.close();
  }

  private decodeRow(row: SessionRow): Session | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(row.doc);
    } catch (err) {
      storeLog.error(`Stored session ${row.id} is not valid JSON`, { error: errorMessage(err) });
      return null;
    }
    const session = decodeSession(parsed);
    if (!session) storeLog.error(`Stored session ${row.id} has an unexpected shape`);
    return session;
  }
}

/** Map-backed store; documents are copied in and out so callers never share references. */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, string>();

  upsert(session: Session): void {
    this.sessions.set(session.id, JSON.stringify(session));
  }

  getById(id: string): Session | null {
    const doc = this.sessions.get(id);
    return doc === undefined ? null : decodeSession(JSON.parse(doc));
  }

  findBy(predicate: (session: Session) => boolean): Session[] {
    return this.list().filter(predicate);
  }

  findByStatus(status: SessionStatus): Session[] {
    return this.findBy((s) => s.status === status);
  }

  list(): Session[] {
    return [...this.sessions.values()]
      .map((doc) => decodeSession(JSON.parse(doc)))
      .filter((s): s is Session => s !== null);
  }
}
