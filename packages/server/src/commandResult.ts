// packages/server/src/commandResult.ts

import type { RejectionCode, Role } from "ttt-rules";

export type CommandRejectedCode =
  | "BAD_REQUEST"
  | "INVALID_PAYLOAD"
  | "PAYLOAD_TOO_LARGE"
  | "RATE_LIMITED"
  | "NOT_JOINED"
  | "INTERNAL";

export interface CommandAccepted {
  ok: true;
  sessionId: string;
  role: Role;
  revision: number;
}

export interface CommandRejected {
  ok: false;
  code: CommandRejectedCode | RejectionCode;
  message: string;
}

export type CommandResult = CommandAccepted | CommandRejected;

export function accepted(params: {
  sessionId: string;
  role: Role;
  revision: number;
}): CommandAccepted {
  return {
    ok: true,
    sessionId: params.sessionId,
    role: params.role,
    revision: params.revision,
  };
}

export function rejected(
  code: CommandRejectedCode | RejectionCode,
  message: string
): CommandRejected {
  return {
    ok: false,
    code,
    message,
  };
}
