// packages/server/src/ws.ts

import type { FastifyInstance } from "fastify";
import { randomUUID } from "node:crypto";
import WebSocket, { type RawData } from "ws";
import type { ServerConfig } from "./config";
import type { CommandRejectedCode } from "./commandResult";
import type { Connection, ServerMessage } from "./protocol";
import { RateBudget } from "./rateLimit";
import { ClientMessageSchema } from "./schemas";
import { logSession } from "./sessionLogger";
import type { ConnectionSupervisor } from "./supervisor";

export class WsConnection implements Connection {
  readonly id = randomUUID();

  constructor(
    private readonly socket: WebSocket,
    private readonly onSendError: (err: Error) => void
  ) {}

  get bufferedAmount(): number {
    return this.socket.bufferedAmount;
  }

  isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(message: ServerMessage) {
    if (!this.isOpen()) {
      throw new Error(`socket ${this.id} is not open`);
    }
    this.socket.send(JSON.stringify(message), (err) => {
      if (err) this.onSendError(err);
    });
  }

  close(code: number, reason: string) {
    if (
      this.socket.readyState === WebSocket.OPEN ||
      this.socket.readyState === WebSocket.CONNECTING
    ) {
      this.socket.close(code, reason);
    }
  }
}

export function rawDataToString(data: RawData): string {
  if (typeof data === "string") return data;
  if (Buffer.isBuffer(data)) return data.toString();
  if (Array.isArray(data)) return Buffer.concat(data).toString();
  return Buffer.from(data).toString();
}

export function computePayloadBytes(data: RawData): number {
  if (typeof data === "string") return Buffer.byteLength(data);
  if (Buffer.isBuffer(data)) return data.byteLength;
  if (Array.isArray(data)) {
    return data.reduce((acc, chunk) => acc + chunk.byteLength, 0);
  }
  return data.byteLength;
}

export interface SessionGatewayDeps {
  supervisor: ConnectionSupervisor;
  config: Pick<
    ServerConfig,
    "maxPayloadBytes" | "rateLimitWindowMs" | "rateLimitMaxMessages" | "idleTimeoutMs"
  >;
}

export function registerSessionWebSocket(
  server: FastifyInstance,
  { supervisor, config }: SessionGatewayDeps
) {
  const pingEveryMs = Math.max(1000, Math.floor(config.idleTimeoutMs / 3));

  server.get("/ws", { websocket: true }, (socket) => {
    const connection = new WsConnection(socket, (err) => {
      logSession(server.log, {
        tag: "ttt:delivery_failed",
        connId: connection.id,
        reason: "send_failed",
        err: String(err),
      });
      socket.terminate();
    });
    const budget = new RateBudget({
      windowMs: config.rateLimitWindowMs,
      maxMessages: config.rateLimitMaxMessages,
    });

    supervisor.attach(connection);

    // keeps quiet-but-alive clients from hitting the idle timeout
    const heartbeat = setInterval(() => {
      if (socket.readyState === WebSocket.OPEN) socket.ping();
    }, pingEveryMs);
    heartbeat.unref();

    function sendStructuredError(code: CommandRejectedCode, message: string) {
      if (!connection.isOpen()) return;
      connection.send({ type: "error", code, message });
    }

    async function handleIncomingMessage(data: RawData) {
      supervisor.touch(connection);
      if (computePayloadBytes(data) > config.maxPayloadBytes) {
        sendStructuredError("PAYLOAD_TOO_LARGE", "Payload too large");
        return;
      }
      if (!budget.consume()) {
        sendStructuredError("RATE_LIMITED", "Too many messages");
        return;
      }

      let parsedJson: unknown;
      try {
        parsedJson = JSON.parse(rawDataToString(data));
      } catch {
        sendStructuredError("BAD_REQUEST", "Invalid JSON");
        return;
      }

      const parsed = ClientMessageSchema.safeParse(parsedJson);
      if (!parsed.success) {
        sendStructuredError("INVALID_PAYLOAD", "Invalid message payload");
        return;
      }

      await supervisor.handleMessage(connection, parsed.data);
    }

    socket.on("message", (data) => {
      handleIncomingMessage(data).catch((error) => {
        server.log.error({ tag: "ttt:ws_unhandled_error", connId: connection.id, err: error });
        sendStructuredError("INTERNAL", "Failed to process message");
      });
    });

    socket.on("pong", () => {
      supervisor.touch(connection);
    });

    async function handleSocketTermination(kind: "close" | "error") {
      clearInterval(heartbeat);
      try {
        await supervisor.detach(connection, kind);
      } catch (error) {
        server.log.error({
          tag: "ttt:disconnect_error",
          connId: connection.id,
          err: error,
          kind,
        });
      }
    }

    socket.on("close", () => {
      void handleSocketTermination("close");
    });

    socket.on("error", () => {
      void handleSocketTermination("error");
    });
  });
}
