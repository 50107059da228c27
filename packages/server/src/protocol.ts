// packages/server/src/protocol.ts

import type { RejectionCode, Role, SessionSnapshot } from "ttt-rules";
import type { CommandRejectedCode } from "./commandResult";

export type SnapshotMessage = {
  type: "snapshot";
  snapshot: SessionSnapshot;
};

export type JoinedMessage = {
  type: "joined";
  sessionId: string;
  role: Role;
  name: string;
  reconnected: boolean;
};

// caller-correctable; only the originating connection sees it
export type RejectedMessage = {
  type: "rejected";
  code: RejectionCode;
  message: string;
};

export type LeftMessage = {
  type: "left";
  sessionId: string;
};

export type ErrorMessage = {
  type: "error";
  code: CommandRejectedCode;
  message: string;
};

export type ServerMessage =
  | SnapshotMessage
  | JoinedMessage
  | RejectedMessage
  | LeftMessage
  | ErrorMessage;

/**
 * Transport-side view of one client connection. The gateway adapts a
 * `ws` socket to this; tests use in-process fakes.
 */
export interface Connection {
  readonly id: string;
  /** Bytes queued but not yet flushed to the network. */
  readonly bufferedAmount: number;
  isOpen(): boolean;
  /** Throws when the frame cannot be handed to the transport. */
  send(message: ServerMessage): void;
  close(code: number, reason: string): void;
}
