import { DataProcessor } from './dataProcessor';
import { NotFoundError } from './errors';
import type { AnalysisResult, Dataset, Session } from './types';

export interface SessionStoreOptions {
  ttlMs: number;
  now?: () => number;
}

/**
 * In-memory sessions, one per loaded table. Idle sessions are dropped once
 * their TTL passes; nothing survives a restart.
 */
export class SessionStore {
  private sessions = new Map<string, Session>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Stores `dataset` in the given session. A new session is created when no
   * id is passed or the id is unknown or expired.
   */
  saveDataset(dataset: Dataset, sessionId?: string): Session {
    this.sweep();
    const timestamp = new Date(this.now());

    const existing = sessionId ? this.sessions.get(sessionId) : undefined;
    if (existing) {
      existing.dataset = dataset;
      existing.lastAccessedAt = timestamp;
      return existing;
    }

    const session: Session = {
      id: DataProcessor.generateId(),
      dataset,
      results: [],
      createdAt: timestamp,
      lastAccessedAt: timestamp,
    };
    this.sessions.set(session.id, session);
    return session;
  }

  get(sessionId: string): Session {
    this.sweep();
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new NotFoundError('Data not found');
    }
    session.lastAccessedAt = new Date(this.now());
    return session;
  }

  addResult(sessionId: string, result: AnalysisResult): void {
    this.get(sessionId).results.push(result);
  }

  get size(): number {
    return this.sessions.size;
  }

  sweep(): number {
    const cutoff = this.now() - this.ttlMs;
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (session.lastAccessedAt.getTime() <= cutoff) {
        this.sessions.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      console.log(`🧹 Expired ${removed} idle session(s)`);
    }
    return removed;
  }
}
