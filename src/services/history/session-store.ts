// Session Store
// Process-lifetime registry of sessions, each guarded by its own lock

import crypto from 'crypto';
import { Mutex } from '../../utils/concurrency.js';
import { createLogger } from '../../utils/logger.js';
import { textContent } from '../../providers/types.js';
import type { Session } from './types.js';

const log = createLogger('sessions');

export const DEFAULT_SYSTEM_PROMPT = [
  'You are a product marketing assistant that can call tools.',
  'On the first message of a conversation, ask one clarifying question and wait for the answer before using any tool.',
  'Once you have the context you need, use the available tools and explain their results plainly.',
].join(' ');

type LockedRun<T> = { stale: true } | { stale: false; value: T };

interface SessionEntry {
  session: Session;
  lock: Mutex;
}

export class SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly systemPrompt: string;

  constructor(systemPrompt: string = DEFAULT_SYSTEM_PROMPT) {
    this.systemPrompt = systemPrompt;
  }

  getOrCreate(sessionId: string = crypto.randomUUID()): Session {
    return this.entry(sessionId).session;
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId)?.session;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Removes the session once any in-flight turn on it has finished.
   * `onDeleted` runs while the lock is still held.
   */
  async delete(sessionId: string, onDeleted?: (session: Session) => void): Promise<boolean> {
    const entry = this.sessions.get(sessionId);
    if (!entry) return false;

    return entry.lock.runExclusive(async () => {
      if (this.sessions.get(sessionId) !== entry) return false;
      this.sessions.delete(sessionId);
      onDeleted?.(entry.session);
      log.info({ sessionId }, 'Session deleted');
      return true;
    });
  }

  list(): Session[] {
    return Array.from(this.sessions.values(), entry => entry.session);
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Runs `task` with exclusive access to the session, creating it on first
   * use. Turns on the same session queue up behind each other; turns on
   * different sessions run concurrently.
   */
  async withSessionLock<T>(sessionId: string, task: (session: Session) => Promise<T>): Promise<T> {
    for (;;) {
      const entry = this.entry(sessionId);
      if (entry.lock.isLocked) {
        log.debug({ sessionId, queued: entry.lock.pending + 1 }, 'Waiting for in-flight turn');
      }
      const outcome = await entry.lock.runExclusive(async (): Promise<LockedRun<T>> => {
        // Deleted while queued: start over on a fresh session
        if (this.sessions.get(sessionId) !== entry) return { stale: true };
        return { stale: false, value: await task(entry.session) };
      });
      if (!outcome.stale) return outcome.value;
    }
  }

  private entry(sessionId: string): SessionEntry {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return existing;
    }

    const now = new Date();
    const created: SessionEntry = {
      session: {
        id: sessionId,
        messages: this.systemPrompt
          ? [{ role: 'system', content: textContent(this.systemPrompt) }]
          : [],
        createdAt: now,
        lastActiveAt: now,
        turnCount: 0,
      },
      lock: new Mutex(),
    };

    this.sessions.set(sessionId, created);
    log.info({ sessionId }, 'Session created');
    return created;
  }
}
