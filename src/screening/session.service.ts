import { randomUUID } from "node:crypto";
import { TurnResult } from "../shared/types/screening.types";
import { ConversationManager } from "./conversation.manager";

const DEFAULT_IDLE_TTL_MS = 30 * 60_000;

interface SessionEntry {
  manager: ConversationManager;
  queue: Promise<unknown>;
  createdAt: string;
  lastActiveAt: number;
  pendingTasks: number;
}

export type ConversationManagerFactory = (sessionId: string) => ConversationManager;

export interface SessionServiceOptions {
  createId?: () => string;
  idleTtlMs?: number;
  now?: () => number;
}

export class SessionService {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly createId: () => string;
  private readonly idleTtlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly createManager: ConversationManagerFactory,
    options: SessionServiceOptions = {},
  ) {
    this.createId = options.createId ?? randomUUID;
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_IDLE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  async create(): Promise<{ sessionId: string; result: TurnResult }> {
    this.evictIdle();
    const sessionId = this.createId();
    const manager = this.createManager(sessionId);
    const entry: SessionEntry = {
      manager,
      queue: Promise.resolve(),
      createdAt: new Date(this.now()).toISOString(),
      lastActiveAt: this.now(),
      pendingTasks: 0,
    };
    this.sessions.set(sessionId, entry);

    try {
      const result = await this.enqueue(entry, () => manager.start());
      return { sessionId, result };
    } catch (error) {
      this.sessions.delete(sessionId);
      throw error;
    }
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  getCreatedAt(sessionId: string): string | null {
    return this.sessions.get(sessionId)?.createdAt ?? null;
  }

  /**
   * Queues the task behind any turn already running for the session.
   * Resolves to null when the session does not exist or has expired.
   */
  async runExclusive<T>(sessionId: string, task: (manager: ConversationManager) => Promise<T> | T): Promise<T | null> {
    this.evictIdle();
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      return null;
    }
    return this.enqueue(entry, task);
  }

  /** Drops sessions with no queued work whose last activity is older than the idle TTL. */
  evictIdle(): number {
    const cutoff = this.now() - this.idleTtlMs;
    let evicted = 0;
    for (const [sessionId, entry] of this.sessions) {
      if (entry.pendingTasks === 0 && entry.lastActiveAt <= cutoff) {
        this.sessions.delete(sessionId);
        evicted += 1;
      }
    }
    return evicted;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }

  private enqueue<T>(entry: SessionEntry, task: (manager: ConversationManager) => Promise<T> | T): Promise<T> {
    entry.pendingTasks += 1;
    entry.lastActiveAt = this.now();
    const run = entry.queue.then(() => task(entry.manager));
    const settle = (): void => {
      entry.pendingTasks -= 1;
      entry.lastActiveAt = this.now();
    };
    // The caller receives the rejection through `run`; the queue only needs to settle.
    entry.queue = run.then(settle, settle);
    return run;
  }
}
