import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import pino, { type Logger } from "pino";

import {
  Provenance,
  ResearchResult,
  SessionError,
  SessionProgress,
  SessionStatus,
  type ResearchSession,
} from "../contracts/research";
import {
  applyPatch,
  INTERRUPTED_ERROR,
  newSession,
  type SessionPatch,
  type SessionStore,
  type SessionSummary,
} from "./session_store";

type StoreLogger = Pick<Logger, "info" | "warn" | "error">;

type SessionRow = {
  id: string;
  query: string;
  status: string;
  stage: string;
  deadline: string | null;
  progress_json: string;
  provenance: string | null;
  result_json: string | null;
  error_json: string | null;
  created_at: string;
  updated_at: string;
};

type SummaryRow = Pick<SessionRow, "id" | "query" | "status" | "created_at" | "updated_at">;

const createDefaultLogger = (): StoreLogger =>
  pino({
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  });

export class SqliteSessionStore implements SessionStore {
  private db: Database.Database;
  private log: StoreLogger;

  constructor(
    dbPath: string = "./data/research_sessions.db",
    log: StoreLogger = createDefaultLogger()
  ) {
    this.log = log;
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.initSchema();
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS research_sessions (
        id TEXT PRIMARY KEY,
        query TEXT NOT NULL,
        status TEXT NOT NULL,
        stage TEXT NOT NULL,
        deadline TEXT,
        progress_json TEXT NOT NULL,
        provenance TEXT,
        result_json TEXT,
        error_json TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_research_sessions_created_at ON research_sessions(created_at);
      CREATE INDEX IF NOT EXISTS idx_research_sessions_status ON research_sessions(status);
    `);
  }

  close(): void {
    this.db.close();
  }

  async createSession(args: { query: string }): Promise<ResearchSession> {
    const session = newSession(args.query, new Date().toISOString());
    this.db
      .prepare(
        `INSERT INTO research_sessions
          (id, query, status, stage, deadline, progress_json, provenance, result_json, error_json, created_at, updated_at)
         VALUES (@id, @query, @status, @stage, @deadline, @progress_json, @provenance, @result_json, @error_json, @created_at, @updated_at)`
      )
      .run(this.toRow(session));
    return session;
  }

  async getSession(id: string): Promise<ResearchSession | null> {
    const row = this.db
      .prepare<[string], SessionRow>("SELECT * FROM research_sessions WHERE id = ?")
      .get(id);
    return row ? this.rowToSession(row) : null;
  }

  async listSessions(args: { limit?: number } = {}): Promise<SessionSummary[]> {
    const rows = this.db
      .prepare<[number], SummaryRow>(
        `SELECT id, query, status, created_at, updated_at FROM research_sessions
         ORDER BY created_at DESC, rowid DESC LIMIT ?`
      )
      .all(args.limit ?? 50);
    return rows.map((row) => ({
      id: row.id,
      query: row.query,
      status: SessionStatus.parse(row.status),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    }));
  }

  async updateSession(id: string, patch: SessionPatch): Promise<ResearchSession | null> {
    const update = this.db.transaction((): ResearchSession | null => {
      const row = this.db
        .prepare<[string], SessionRow>("SELECT * FROM research_sessions WHERE id = ?")
        .get(id);
      if (!row) return null;
      const next = applyPatch(this.rowToSession(row), patch, new Date().toISOString());
      this.db
        .prepare(
          `UPDATE research_sessions SET
             status = @status, stage = @stage, deadline = @deadline, progress_json = @progress_json,
             provenance = @provenance, result_json = @result_json, error_json = @error_json,
             updated_at = @updated_at
           WHERE id = @id`
        )
        .run(this.toRow(next));
      return next;
    });
    return update();
  }

  async deleteSession(id: string): Promise<boolean> {
    const info = this.db.prepare("DELETE FROM research_sessions WHERE id = ?").run(id);
    return info.changes > 0;
  }

  async failInterruptedSessions(): Promise<number> {
    const info = this.db
      .prepare(
        `UPDATE research_sessions
           SET status = 'failed', stage = 'failed', error_json = ?, updated_at = ?
         WHERE status NOT IN ('completed', 'failed')`
      )
      .run(JSON.stringify(INTERRUPTED_ERROR), new Date().toISOString());
    if (info.changes > 0) {
      this.log.warn({ count: info.changes }, "session_store.interrupted_sessions_failed");
    }
    return info.changes;
  }

  private toRow(session: ResearchSession): SessionRow {
    return {
      id: session.id,
      query: session.query,
      status: session.status,
      stage: session.stage,
      deadline: session.deadline,
      progress_json: JSON.stringify(session.progress),
      provenance: session.provenance,
      result_json: session.result ? JSON.stringify(session.result) : null,
      error_json: session.error ? JSON.stringify(session.error) : null,
      created_at: session.createdAt,
      updated_at: session.updatedAt,
    };
  }

  private rowToSession(row: SessionRow): ResearchSession {
    return {
      id: row.id,
      query: row.query,
      status: SessionStatus.parse(row.status),
      stage: row.stage,
      deadline: row.deadline,
      progress: SessionProgress.parse(JSON.parse(row.progress_json)),
      provenance: row.provenance ? Provenance.parse(row.provenance) : null,
      result: row.result_json ? ResearchResult.parse(JSON.parse(row.result_json)) : null,
      error: row.error_json ? SessionError.parse(JSON.parse(row.error_json)) : null,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
