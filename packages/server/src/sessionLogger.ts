import type { FastifyBaseLogger } from "fastify";

const TTT_DEBUG = process.env.TTT_DEBUG === "1" || process.env.TTT_DEBUG === "true";

function ts() {
  return new Date().toISOString();
}

const INFO_TAGS = new Set([
  "ttt:join",
  "ttt:reconnect",
  "ttt:leave",
  "ttt:unbind",
  "ttt:session:create",
  "ttt:session:reaped",
  "ttt:gameOver",
  "ttt:reset",
  "ttt:idle_timeout",
]);

const ERROR_TAGS = new Set([
  "ttt:error",
  "ttt:invariant",
  "ttt:delivery_failed",
]);

export type SessionLogEntry = { tag: string } & Record<string, unknown>;

export function logSession(logger: FastifyBaseLogger, obj: SessionLogEntry) {
  const payload = { ts: ts(), ...obj };
  try {
    if (INFO_TAGS.has(obj.tag)) {
      logger.info(payload);
      return;
    }

    if (ERROR_TAGS.has(obj.tag)) {
      logger.error(payload);
      return;
    }

    if (obj.tag === "ttt:incoming" || obj.tag === "ttt:publish") {
      if (TTT_DEBUG) logger.debug(payload);
      return;
    }

    // default: debug when TTT_DEBUG enabled, otherwise info
    if (TTT_DEBUG) {
      logger.debug(payload);
    } else {
      logger.info(payload);
    }
  } catch (e) {
    try {
      logger.error({ tag: "ttt:log_error", ts: ts(), message: "session logging failed", err: String(e) });
    } catch {
      // nowhere left to report
    }
  }
}
