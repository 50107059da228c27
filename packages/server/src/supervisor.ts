// packages/server/src/supervisor.ts

import type { FastifyBaseLogger } from "fastify";
import {
  InvariantViolationError,
  applyMove,
  assertSessionInvariants,
  join,
  leave,
  makeSnapshot,
  release,
  reset,
  type Role,
  type SessionState,
} from "ttt-rules";
import { accepted, rejected, type CommandResult } from "./commandResult";
import type { BroadcastHub, DeliveryFailure } from "./hub";
import type { Connection, ServerMessage } from "./protocol";
import type { SessionRecord, SessionRegistry } from "./registry";
import type { ClientMessage } from "./schemas";
import { logSession } from "./sessionLogger";
import { SessionQueue } from "./sessionQueue";

export type DetachReason =
  | "close"
  | "error"
  | "idle_timeout"
  | "send_failed"
  | "rejoin";

export interface Binding {
  sessionId: string;
  role: Role;
  name: string;
}

interface ConnectionMeta {
  connection: Connection;
  binding: Binding | null;
  idleTimer: NodeJS.Timeout | null;
}

export interface ConnectionSupervisorOptions {
  registry: SessionRegistry;
  hub: BroadcastHub;
  logger: FastifyBaseLogger;
  idleTimeoutMs: number;
  reconnectGraceMs: number;
}

export const IDLE_CLOSE_CODE = 4000;
export const INTERNAL_CLOSE_CODE = 1011;

export class ConnectionSupervisor {
  private readonly connections = new Map<string, ConnectionMeta>();
  // one connection's messages are handled strictly in arrival order
  private readonly inbound = new SessionQueue();

  constructor(private readonly options: ConnectionSupervisorOptions) {
    options.hub.setDeliveryFailureHandler((failure) =>
      this.handleDeliveryFailure(failure)
    );
  }

  attach(connection: Connection) {
    if (this.connections.has(connection.id)) return;
    const meta: ConnectionMeta = { connection, binding: null, idleTimer: null };
    this.connections.set(connection.id, meta);
    this.armIdleTimer(meta);
  }

  /** Any sign of life from the client (a message or a pong frame). */
  touch(connection: Connection) {
    const meta = this.connections.get(connection.id);
    if (meta) this.armIdleTimer(meta);
  }

  isAttached(connection: Connection): boolean {
    return this.connections.has(connection.id);
  }

  bindingOf(connection: Connection): Binding | null {
    return this.connections.get(connection.id)?.binding ?? null;
  }

  handleMessage(connection: Connection, msg: ClientMessage): Promise<CommandResult> {
    this.touch(connection);
    logSession(this.options.logger, {
      tag: "ttt:incoming",
      connId: connection.id,
      type: msg.type,
    });
    return this.inbound.enqueue(`conn:${connection.id}`, () =>
      this.dispatch(connection, msg)
    );
  }

  private async dispatch(
    connection: Connection,
    msg: ClientMessage
  ): Promise<CommandResult> {
    try {
      switch (msg.type) {
        case "join":
          return await this.bind(connection, msg.sessionId, msg.name);
        case "move":
          return await this.move(connection, msg.cellIndex);
        case "reset":
          return await this.reset(connection);
        case "leave":
          return await this.leave(connection);
        default: {
          const unknown: never = msg;
          this.sendError(connection, "BAD_REQUEST", "Unknown message type");
          return rejected("BAD_REQUEST", `Unknown message ${String(unknown)}`);
        }
      }
    } catch (err) {
      if (err instanceof InvariantViolationError) {
        // fatal to this connection only; the session keeps its last good state
        logSession(this.options.logger, {
          tag: "ttt:invariant",
          sessionId: err.sessionId,
          connId: connection.id,
          message: err.message,
        });
        connection.close(INTERNAL_CLOSE_CODE, "internal error");
        this.detachInBackground(connection, "error");
        return rejected("INTERNAL", err.message);
      }
      logSession(this.options.logger, {
        tag: "ttt:error",
        connId: connection.id,
        code: "handler_failed",
        message: String(err),
      });
      this.sendError(connection, "INTERNAL", "Failed to process message");
      return rejected("INTERNAL", "Failed to process message");
    }
  }

  /**
   * Bind a connection to a player slot. A name matching a disconnected slot
   * reclaims that role; everything else goes through the engine's join.
   */
  async bind(
    connection: Connection,
    sessionId: string,
    name: string
  ): Promise<CommandResult> {
    const meta = this.connections.get(connection.id);
    if (!meta) return rejected("NOT_JOINED", "Connection is not attached");

    await this.unbind(connection, "rejoin");

    for (let attempt = 0; attempt < 2; attempt += 1) {
      const result = await this.tryBind(meta, sessionId, name);
      if (result) return result;
      // reaped between lookup and exclusive access; start over with a fresh record
    }
    this.sendError(connection, "INTERNAL", "Session is unavailable");
    return rejected("INTERNAL", "Session is unavailable");
  }

  private tryBind(
    meta: ConnectionMeta,
    sessionId: string,
    name: string
  ): Promise<CommandResult | null> {
    const { registry, hub, logger } = this.options;
    const connection = meta.connection;
    const created = !registry.has(sessionId);
    const handle = registry.getOrCreate(sessionId);
    if (created) {
      logSession(logger, { tag: "ttt:session:create", sessionId });
    }

    return handle.withExclusive((record) => {
      if (!handle.isRegistered()) return null;
      if (this.connections.get(connection.id) !== meta || !connection.isOpen()) {
        return rejected("NOT_JOINED", "Connection closed before joining");
      }

      const now = registry.now();
      const result = join(record.state, name, connection.id, {
        now,
        reserveMs: this.options.reconnectGraceMs,
      });
      if (!result.ok) {
        this.sendTo(connection, {
          type: "rejected",
          code: result.code,
          message: result.message,
        });
        logSession(logger, {
          tag: "ttt:rejected",
          sessionId,
          connId: connection.id,
          code: result.code,
        });
        return rejected(result.code, result.message);
      }

      this.commit(record, result.state, now);
      meta.binding = { sessionId, role: result.role, name };
      hub.subscribe(sessionId, result.role, connection);
      this.sendTo(connection, {
        type: "joined",
        sessionId,
        role: result.role,
        name,
        reconnected: result.reconnected,
      });
      this.publish(record);
      logSession(logger, {
        tag: result.reconnected ? "ttt:reconnect" : "ttt:join",
        sessionId,
        role: result.role,
        name,
        connId: connection.id,
      });
      return accepted({ sessionId, role: result.role, revision: record.revision });
    });
  }

  move(connection: Connection, cellIndex: number): Promise<CommandResult> {
    return this.runBound(connection, (record, binding) => {
      const result = applyMove(record.state, binding.role, cellIndex);
      if (!result.ok) {
        this.sendTo(connection, {
          type: "rejected",
          code: result.code,
          message: result.message,
        });
        logSession(this.options.logger, {
          tag: "ttt:rejected",
          sessionId: record.id,
          role: binding.role,
          code: result.code,
        });
        return rejected(result.code, result.message);
      }

      this.commit(record, result.state, this.options.registry.now());
      this.publish(record);
      if (record.state.status === "finished") {
        logSession(this.options.logger, {
          tag: "ttt:gameOver",
          sessionId: record.id,
          winner: record.state.winner,
          scores: record.state.scores,
        });
      }
      return accepted({ sessionId: record.id, role: binding.role, revision: record.revision });
    });
  }

  reset(connection: Connection): Promise<CommandResult> {
    return this.runBound(connection, (record, binding) => {
      this.commit(record, reset(record.state), this.options.registry.now());
      this.publish(record);
      logSession(this.options.logger, {
        tag: "ttt:reset",
        sessionId: record.id,
        by: binding.role,
        status: record.state.status,
      });
      return accepted({ sessionId: record.id, role: binding.role, revision: record.revision });
    });
  }

  /** Give up the slot for good; the name can no longer reclaim it. */
  leave(connection: Connection): Promise<CommandResult> {
    return this.runBound(connection, (record, binding) => {
      const meta = this.connections.get(connection.id);
      if (meta) meta.binding = null;
      this.options.hub.unsubscribe(record.id, connection);

      this.commit(record, leave(record.state, binding.role), this.options.registry.now());
      this.sendTo(connection, { type: "left", sessionId: record.id });
      this.publish(record);
      logSession(this.options.logger, {
        tag: "ttt:leave",
        sessionId: record.id,
        role: binding.role,
        name: binding.name,
      });
      return accepted({ sessionId: record.id, role: binding.role, revision: record.revision });
    });
  }

  /** Drop the binding but keep the slot's name so a later bind can reclaim it. */
  async unbind(connection: Connection, reason: DetachReason): Promise<void> {
    const meta = this.connections.get(connection.id);
    if (!meta?.binding) return;
    const binding = meta.binding;
    meta.binding = null;
    await this.releaseBinding(connection, binding, reason);
  }

  /** Cleanup for every exit path of a connection. Safe to call twice. */
  async detach(connection: Connection, reason: DetachReason): Promise<void> {
    const meta = this.connections.get(connection.id);
    if (!meta) return;
    if (meta.idleTimer) clearTimeout(meta.idleTimer);
    this.connections.delete(connection.id);
    if (meta.binding) {
      const binding = meta.binding;
      meta.binding = null;
      await this.releaseBinding(connection, binding, reason);
    }
  }

  dispose() {
    for (const meta of this.connections.values()) {
      if (meta.idleTimer) clearTimeout(meta.idleTimer);
    }
    this.connections.clear();
  }

  private async releaseBinding(
    connection: Connection,
    binding: Binding,
    reason: DetachReason
  ): Promise<void> {
    const { registry, hub, logger } = this.options;
    hub.unsubscribe(binding.sessionId, connection);
    const handle = registry.get(binding.sessionId);
    if (!handle) return;

    await handle.withExclusive((record) => {
      const now = registry.now();
      const next = release(record.state, binding.role, connection.id, now);
      // a newer connection already reclaimed the slot
      if (next === record.state) return;
      this.commit(record, next, now);
      this.publish(record);
      logSession(logger, {
        tag: "ttt:unbind",
        sessionId: record.id,
        role: binding.role,
        connId: connection.id,
        reason,
      });
    });
  }

  private async runBound(
    connection: Connection,
    task: (record: SessionRecord, binding: Binding) => CommandResult
  ): Promise<CommandResult> {
    const binding = this.bindingOf(connection);
    const handle = binding ? this.options.registry.get(binding.sessionId) : undefined;
    if (!binding || !handle) {
      this.sendError(connection, "NOT_JOINED", "Must join a session first");
      return rejected("NOT_JOINED", "Must join a session first");
    }

    return handle.withExclusive((record) => {
      const current = this.bindingOf(connection);
      const slot = current ? record.state.players[current.role] : null;
      if (!current || current.sessionId !== record.id || slot?.connId !== connection.id) {
        this.sendError(connection, "NOT_JOINED", "Must join a session first");
        return rejected("NOT_JOINED", "Must join a session first");
      }
      return task(record, current);
    });
  }

  private commit(record: SessionRecord, next: SessionState, now: number) {
    assertSessionInvariants(next);
    record.state = next;
    record.revision += 1;
    record.lastActivity = now;
  }

  private publish(record: SessionRecord) {
    this.options.hub.publish(makeSnapshot(record.state, { revision: record.revision }));
  }

  private sendTo(connection: Connection, message: ServerMessage) {
    if (!connection.isOpen()) return;
    try {
      connection.send(message);
    } catch (err) {
      logSession(this.options.logger, {
        tag: "ttt:delivery_failed",
        connId: connection.id,
        reason: "send_failed",
        err: String(err),
      });
      connection.close(INTERNAL_CLOSE_CODE, "send failed");
      this.detachInBackground(connection, "send_failed");
    }
  }

  private sendError(
    connection: Connection,
    code: "BAD_REQUEST" | "NOT_JOINED" | "INTERNAL",
    message: string
  ) {
    this.sendTo(connection, { type: "error", code, message });
  }

  private handleDeliveryFailure(failure: DeliveryFailure) {
    failure.connection.close(INTERNAL_CLOSE_CODE, failure.reason);
    this.detachInBackground(failure.connection, "send_failed");
  }

  // Runs after the current exclusive section; awaiting here could deadlock.
  private detachInBackground(connection: Connection, reason: DetachReason) {
    this.detach(connection, reason).catch((err) => {
      logSession(this.options.logger, {
        tag: "ttt:error",
        connId: connection.id,
        code: "detach_failed",
        message: String(err),
      });
    });
  }

  private armIdleTimer(meta: ConnectionMeta) {
    if (meta.idleTimer) clearTimeout(meta.idleTimer);
    const timer = setTimeout(() => {
      logSession(this.options.logger, {
        tag: "ttt:idle_timeout",
        connId: meta.connection.id,
        sessionId: meta.binding?.sessionId ?? null,
        idleMs: this.options.idleTimeoutMs,
      });
      meta.connection.close(IDLE_CLOSE_CODE, "idle timeout");
      this.detachInBackground(meta.connection, "idle_timeout");
    }, this.options.idleTimeoutMs);
    timer.unref();
    meta.idleTimer = timer;
  }
}
