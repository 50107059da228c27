// packages/server/src/hub.ts

import type { FastifyBaseLogger } from "fastify";
import type { Role, SessionSnapshot } from "ttt-rules";
import type { Connection, ServerMessage } from "./protocol";
import { logSession } from "./sessionLogger";

export interface Subscriber {
  role: Role;
  connection: Connection;
}

export type DeliveryFailureReason = "closed" | "slow_consumer" | "send_failed";

export interface DeliveryFailure {
  sessionId: string;
  role: Role;
  connection: Connection;
  reason: DeliveryFailureReason;
  error?: string;
}

export interface BroadcastHubOptions {
  logger: FastifyBaseLogger;
  // a subscriber with more than this queued is disconnected, never skipped
  maxBufferedBytes: number;
}

/**
 * Per-session fan-out. `publish` is called from inside the session's
 * exclusive section, so every recipient sees one session's snapshots in
 * the order they were produced.
 */
export class BroadcastHub {
  private readonly channels = new Map<string, Map<string, Subscriber>>();
  private onDeliveryFailure: ((failure: DeliveryFailure) => void) | null = null;

  constructor(private readonly options: BroadcastHubOptions) {}

  setDeliveryFailureHandler(handler: (failure: DeliveryFailure) => void) {
    this.onDeliveryFailure = handler;
  }

  subscribe(sessionId: string, role: Role, connection: Connection) {
    let channel = this.channels.get(sessionId);
    if (!channel) {
      channel = new Map<string, Subscriber>();
      this.channels.set(sessionId, channel);
    }
    channel.set(connection.id, { role, connection });
  }

  unsubscribe(sessionId: string, connection: Connection) {
    const channel = this.channels.get(sessionId);
    if (!channel) return;
    channel.delete(connection.id);
    if (channel.size === 0) {
      this.channels.delete(sessionId);
    }
  }

  subscribers(sessionId: string): Subscriber[] {
    return Array.from(this.channels.get(sessionId)?.values() ?? []);
  }

  drop(sessionId: string) {
    this.channels.delete(sessionId);
  }

  /** Returns how many subscribers accepted the snapshot. */
  publish(snapshot: SessionSnapshot): number {
    const message: ServerMessage = { type: "snapshot", snapshot };
    const failures: DeliveryFailure[] = [];
    let delivered = 0;

    for (const { role, connection } of this.subscribers(snapshot.sessionId)) {
      const outcome = this.deliver(connection, message);
      if (outcome) {
        failures.push({ sessionId: snapshot.sessionId, role, connection, ...outcome });
      } else {
        delivered += 1;
      }
    }

    logSession(this.options.logger, {
      tag: "ttt:publish",
      sessionId: snapshot.sessionId,
      revision: snapshot.revision,
      delivered,
      failed: failures.length,
    });

    for (const failure of failures) {
      this.unsubscribe(failure.sessionId, failure.connection);
      logSession(this.options.logger, {
        tag: "ttt:delivery_failed",
        sessionId: failure.sessionId,
        role: failure.role,
        connId: failure.connection.id,
        reason: failure.reason,
        err: failure.error,
      });
      this.onDeliveryFailure?.(failure);
    }

    return delivered;
  }

  private deliver(
    connection: Connection,
    message: ServerMessage
  ): { reason: DeliveryFailureReason; error?: string } | null {
    if (!connection.isOpen()) return { reason: "closed" };
    if (connection.bufferedAmount > this.options.maxBufferedBytes) {
      return { reason: "slow_consumer" };
    }
    try {
      connection.send(message);
      return null;
    } catch (err) {
      return { reason: "send_failed", error: String(err) };
    }
  }
}
