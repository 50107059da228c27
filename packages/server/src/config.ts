// packages/server/src/config.ts

import { z } from "zod";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  WEB_ORIGIN: z.string().url().optional(),
  WS_MAX_PAYLOAD_BYTES: positiveInt(16 * 1024),
  WS_RATE_LIMIT_WINDOW_MS: positiveInt(1000),
  WS_RATE_LIMIT_MAX_MESSAGES: positiveInt(30),
  IDLE_TIMEOUT_MS: positiveInt(30_000),
  RECONNECT_GRACE_MS: positiveInt(45_000),
  MAX_BUFFERED_BYTES: positiveInt(1024 * 1024),
  REAPER_INTERVAL_MS: positiveInt(10 * 60_000),
  STALE_SESSION_MS: positiveInt(20 * 60_000),
});

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  webOrigin?: string;
  maxPayloadBytes: number;
  rateLimitWindowMs: number;
  rateLimitMaxMessages: number;
  idleTimeoutMs: number;
  reconnectGraceMs: number;
  maxBufferedBytes: number;
  reaperIntervalMs: number;
  staleSessionMs: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map((issue) => `${issue.path.join(".")} ${issue.message}`)
        .join("; ")}`
    );
    this.name = "ConfigError";
  }
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ServerConfig {
  // empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    webOrigin: e.WEB_ORIGIN,
    maxPayloadBytes: e.WS_MAX_PAYLOAD_BYTES,
    rateLimitWindowMs: e.WS_RATE_LIMIT_WINDOW_MS,
    rateLimitMaxMessages: e.WS_RATE_LIMIT_MAX_MESSAGES,
    idleTimeoutMs: e.IDLE_TIMEOUT_MS,
    reconnectGraceMs: e.RECONNECT_GRACE_MS,
    maxBufferedBytes: e.MAX_BUFFERED_BYTES,
    reaperIntervalMs: e.REAPER_INTERVAL_MS,
    staleSessionMs: e.STALE_SESSION_MS,
  };
}
