// packages/server/src/index.ts

import Fastify from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import { loadConfig, type ServerConfig } from "./config";
import { BroadcastHub } from "./hub";
import { SessionReaper } from "./reaper";
import { SessionRegistry } from "./registry";
import { registerRoutes } from "./routes";
import { ConnectionSupervisor } from "./supervisor";
import { registerSessionWebSocket } from "./ws";

function isLocalDevOrigin(origin: string): boolean {
  return /^http:\/\/(localhost|127\.0\.0\.1|0\.0\.0\.0|\[::1\])(:\d+)?$/.test(
    origin
  );
}

export async function buildServer(config: ServerConfig = loadConfig()) {
  const server = Fastify({ logger: { level: config.logLevel } });

  const allow = new Set(
    ["http://localhost:5173", "http://127.0.0.1:5173", config.webOrigin].filter(
      (origin): origin is string => Boolean(origin)
    )
  );

  await server.register(cors, {
    origin: (origin, cb) => {
      if (!origin) return cb(null, true);
      if (allow.has(origin)) return cb(null, true);
      if (isLocalDevOrigin(origin)) return cb(null, true);
      cb(new Error("Not allowed by CORS"), false);
    },
    credentials: true,
  });

  await server.register(websocket);

  const registry = new SessionRegistry();
  const hub = new BroadcastHub({
    logger: server.log,
    maxBufferedBytes: config.maxBufferedBytes,
  });
  const supervisor = new ConnectionSupervisor({
    registry,
    hub,
    logger: server.log,
    idleTimeoutMs: config.idleTimeoutMs,
    reconnectGraceMs: config.reconnectGraceMs,
  });
  const reaper = new SessionReaper({
    registry,
    hub,
    logger: server.log,
    intervalMs: config.reaperIntervalMs,
    staleAfterMs: config.staleSessionMs,
  });

  await registerRoutes(server, { registry });
  registerSessionWebSocket(server, { supervisor, config });

  server.addHook("onReady", async () => {
    reaper.start();
  });
  server.addHook("onClose", async () => {
    reaper.stop();
    supervisor.dispose();
  });

  return server;
}

async function start() {
  const config = loadConfig();
  const server = await buildServer(config);

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      server.log.info({ signal }, "shutting down");
      server.close().then(
        () => process.exit(0),
        (err) => {
          server.log.error(err);
          process.exit(1);
        }
      );
    });
  }

  try {
    const address = await server.listen({ port: config.port, host: config.host });
    server.log.info(`server listening on ${address}`);
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

if (require.main === module) {
  start().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
