// packages/server/src/registry.ts

import {
  createSession,
  makeSnapshot,
  type SessionSnapshot,
  type SessionState,
} from "ttt-rules";
import { SessionQueue, sessionKey } from "./sessionQueue";

export interface SessionRecord {
  id: string;
  state: SessionState;
  revision: number;
  createdAt: number;
  lastActivity: number;
}

export interface SessionSummary {
  id: string;
  createdAt: number;
  lastActivity: number;
  status: SessionState["status"];
  scores: SessionSnapshot["scores"];
  roles: SessionSnapshot["roles"];
}

export interface SessionRegistryOptions {
  now?: () => number;
}

/**
 * Access to one session. The handle keeps pointing at its record even after
 * the registry drops it; `isRegistered` tells the two cases apart.
 */
export class SessionHandle {
  constructor(
    readonly record: SessionRecord,
    private readonly registry: SessionRegistry
  ) {}

  get id(): string {
    return this.record.id;
  }

  withExclusive<T>(task: (record: SessionRecord) => Promise<T> | T): Promise<T> {
    return this.registry.runExclusive(this.record.id, () => task(this.record));
  }

  isRegistered(): boolean {
    return this.registry.isCurrent(this.record);
  }
}

export class SessionRegistry {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly queue = new SessionQueue();
  readonly now: () => number;

  constructor(options: SessionRegistryOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  get(id: string): SessionHandle | undefined {
    const record = this.sessions.get(id);
    return record ? new SessionHandle(record, this) : undefined;
  }

  getOrCreate(id: string): SessionHandle {
    let record = this.sessions.get(id);
    if (!record) {
      const at = this.now();
      record = {
        id,
        state: createSession(id),
        revision: 0,
        createdAt: at,
        lastActivity: at,
      };
      this.sessions.set(id, record);
    }
    return new SessionHandle(record, this);
  }

  remove(id: string): boolean {
    return this.sessions.delete(id);
  }

  isCurrent(record: SessionRecord): boolean {
    return this.sessions.get(record.id) === record;
  }

  snapshotIds(): string[] {
    return Array.from(this.sessions.keys());
  }

  size(): number {
    return this.sessions.size;
  }

  summaries(): SessionSummary[] {
    return Array.from(this.sessions.values()).map((record) => {
      const snapshot = makeSnapshot(record.state, { revision: record.revision });
      return {
        id: record.id,
        createdAt: record.createdAt,
        lastActivity: record.lastActivity,
        status: snapshot.status,
        scores: snapshot.scores,
        roles: snapshot.roles,
      };
    });
  }

  runExclusive<T>(id: string, task: () => Promise<T> | T): Promise<T> {
    return this.queue.enqueue(sessionKey(id), task);
  }
}
