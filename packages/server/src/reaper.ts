// packages/server/src/reaper.ts

import type { FastifyBaseLogger } from "fastify";
import { hasLiveConnection } from "ttt-rules";
import type { BroadcastHub } from "./hub";
import type { SessionRegistry } from "./registry";
import { logSession } from "./sessionLogger";

export interface SessionReaperOptions {
  registry: SessionRegistry;
  hub: BroadcastHub;
  logger: FastifyBaseLogger;
  intervalMs: number;
  staleAfterMs: number;
}

/**
 * Evicts sessions nobody is connected to once they have been quiet for
 * longer than `staleAfterMs`. A session with a live connection stays,
 * however old it is.
 */
export class SessionReaper {
  private timer: NodeJS.Timeout | null = null;
  private sweeping = false;

  constructor(private readonly options: SessionReaperOptions) {}

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.sweeping) return;
      this.sweeping = true;
      void this.sweep()
        .catch((err) => {
          logSession(this.options.logger, {
            tag: "ttt:error",
            code: "sweep_failed",
            message: String(err),
          });
        })
        .finally(() => {
          this.sweeping = false;
        });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** Returns the ids removed in this pass. */
  async sweep(now = this.options.registry.now()): Promise<string[]> {
    const { registry, hub, logger, staleAfterMs } = this.options;
    const removed: string[] = [];

    for (const id of registry.snapshotIds()) {
      const handle = registry.get(id);
      if (!handle) continue;

      await handle.withExclusive((record) => {
        if (!handle.isRegistered()) return;
        if (hasLiveConnection(record.state)) return;
        const idleMs = now - record.lastActivity;
        if (idleMs <= staleAfterMs) return;

        registry.remove(id);
        hub.drop(id);
        removed.push(id);
        logSession(logger, {
          tag: "ttt:session:reaped",
          sessionId: id,
          idleMs,
          scores: record.state.scores,
        });
      });
    }

    return removed;
  }
}
