import { randomUUID } from "node:crypto";

import {
  EMPTY_PROGRESS,
  isTerminalStatus,
  type Provenance,
  type ResearchResult,
  type ResearchSession,
  type SessionError,
  type SessionProgress,
  type SessionStatus,
} from "../contracts/research";

export type SessionSummary = Pick<ResearchSession, "id" | "query" | "status" | "createdAt" | "updatedAt">;

export type SessionPatch = {
  status?: SessionStatus;
  stage?: string;
  deadline?: string | null;
  progress?: Partial<SessionProgress>;
  provenance?: Provenance | null;
  result?: ResearchResult | null;
  error?: SessionError | null;
};

export const INTERRUPTED_ERROR: SessionError = {
  code: "interrupted",
  message: "Session was still running when the service stopped",
};

/**
 * Sessions are written by exactly one pipeline and read by any number of
 * pollers. Implementations return copies so readers never observe a session
 * mid-update.
 */
export interface SessionStore {
  createSession(args: { query: string }): Promise<ResearchSession>;
  getSession(id: string): Promise<ResearchSession | null>;
  listSessions(args?: { limit?: number }): Promise<SessionSummary[]>;
  updateSession(id: string, patch: SessionPatch): Promise<ResearchSession | null>;
  deleteSession(id: string): Promise<boolean>;
  failInterruptedSessions(): Promise<number>;
}

export function applyPatch(session: ResearchSession, patch: SessionPatch, now: string): ResearchSession {
  return {
    ...session,
    ...(patch.status !== undefined ? { status: patch.status } : {}),
    ...(patch.stage !== undefined ? { stage: patch.stage } : {}),
    ...(patch.deadline !== undefined ? { deadline: patch.deadline } : {}),
    ...(patch.provenance !== undefined ? { provenance: patch.provenance } : {}),
    ...(patch.result !== undefined ? { result: patch.result } : {}),
    ...(patch.error !== undefined ? { error: patch.error } : {}),
    progress: { ...session.progress, ...patch.progress },
    updatedAt: now,
  };
}

export function newSession(query: string, now: string): ResearchSession {
  return {
    id: randomUUID(),
    query,
    status: "queued",
    stage: "queued",
    deadline: null,
    progress: { ...EMPTY_PROGRESS },
    provenance: null,
    result: null,
    error: null,
    createdAt: now,
    updatedAt: now,
  };
}

export class MemorySessionStore implements SessionStore {
  private sessions = new Map<string, ResearchSession>();

  async createSession(args: { query: string }): Promise<ResearchSession> {
    const session = newSession(args.query, new Date().toISOString());
    this.sessions.set(session.id, session);
    return structuredClone(session);
  }

  async getSession(id: string): Promise<ResearchSession | null> {
    const session = this.sessions.get(id);
    return session ? structuredClone(session) : null;
  }

  async listSessions(args: { limit?: number } = {}): Promise<SessionSummary[]> {
    return [...this.sessions.values()]
      .reverse()
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(0, args.limit ?? 50)
      .map(({ id, query, status, createdAt, updatedAt }) => ({ id, query, status, createdAt, updatedAt }));
  }

  async updateSession(id: string, patch: SessionPatch): Promise<ResearchSession | null> {
    const session = this.sessions.get(id);
    if (!session) return null;
    const next = applyPatch(session, patch, new Date().toISOString());
    this.sessions.set(id, next);
    return structuredClone(next);
  }

  async deleteSession(id: string): Promise<boolean> {
    return this.sessions.delete(id);
  }

  async failInterruptedSessions(): Promise<number> {
    let count = 0;
    const now = new Date().toISOString();
    for (const [id, session] of this.sessions) {
      if (isTerminalStatus(session.status)) continue;
      this.sessions.set(id, applyPatch(session, { status: "failed", stage: "failed", error: INTERRUPTED_ERROR }, now));
      count += 1;
    }
    return count;
  }
}
