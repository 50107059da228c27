// packages/server/src/tests/helpers.ts

import Fastify from "fastify";
import type { SessionSnapshot } from "ttt-rules";
import { BroadcastHub } from "../hub";
import type { Connection, ServerMessage } from "../protocol";
import { SessionReaper } from "../reaper";
import { SessionRegistry } from "../registry";
import { ConnectionSupervisor } from "../supervisor";

export const silentLogger = Fastify({ logger: false }).log;

export class FakeConnection implements Connection {
  readonly sent: ServerMessage[] = [];
  bufferedAmount = 0;
  failSends = false;
  closedWith: { code: number; reason: string } | null = null;
  private open = true;

  constructor(readonly id: string) {}

  isOpen(): boolean {
    return this.open;
  }

  send(message: ServerMessage) {
    if (this.failSends) throw new Error("broken pipe");
    this.sent.push(message);
  }

  close(code: number, reason: string) {
    if (!this.open) return;
    this.open = false;
    this.closedWith = { code, reason };
  }

  ofType<T extends ServerMessage["type"]>(type: T): Extract<ServerMessage, { type: T }>[] {
    return this.sent.filter(
      (message): message is Extract<ServerMessage, { type: T }> => message.type === type
    );
  }

  snapshots(): SessionSnapshot[] {
    return this.ofType("snapshot").map((message) => message.snapshot);
  }

  lastSnapshot(): SessionSnapshot {
    const all = this.snapshots();
    const last = all[all.length - 1];
    if (!last) throw new Error(`${this.id} has not received a snapshot`);
    return last;
  }
}

export interface HarnessOptions {
  idleTimeoutMs?: number;
  reconnectGraceMs?: number;
  maxBufferedBytes?: number;
  staleAfterMs?: number;
}

export function makeHarness(options: HarnessOptions = {}) {
  let clock = 1_000;
  const registry = new SessionRegistry({ now: () => clock });
  const hub = new BroadcastHub({
    logger: silentLogger,
    maxBufferedBytes: options.maxBufferedBytes ?? 1024,
  });
  const supervisor = new ConnectionSupervisor({
    registry,
    hub,
    logger: silentLogger,
    idleTimeoutMs: options.idleTimeoutMs ?? 60_000,
    reconnectGraceMs: options.reconnectGraceMs ?? 45_000,
  });
  const reaper = new SessionReaper({
    registry,
    hub,
    logger: silentLogger,
    intervalMs: 60_000,
    staleAfterMs: options.staleAfterMs ?? 20 * 60_000,
  });

  return {
    registry,
    hub,
    supervisor,
    reaper,
    now: () => clock,
    advance(ms: number) {
      clock += ms;
    },
    connect(id: string) {
      const connection = new FakeConnection(id);
      supervisor.attach(connection);
      return connection;
    },
    /** Resolves once every task already queued for the session has run. */
    flush(sessionId: string) {
      return registry.runExclusive(sessionId, () => undefined);
    },
  };
}

export function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}
