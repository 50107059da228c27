// packages/rules/src/model.ts

export type Role = "X" | "O";

/** `null` is an empty cell. */
export type Mark = Role | null;

export type Board = readonly Mark[];

export const ROLES: readonly Role[] = ["X", "O"];

export const BOARD_SIZE = 9;

export type SessionStatus = "waiting" | "inProgress" | "finished";

export type Outcome = Role | "draw";

export interface PlayerSlot {
  name: string;
  role: Role;
  // handle of the live transport connection; null while disconnected
  connId: string | null;
  disconnectedAt: number | null;
}

export interface SessionState {
  id: string;
  board: Board;
  turn: Role;
  players: { X: PlayerSlot | null; O: PlayerSlot | null };
  scores: { X: number; O: number };
  status: SessionStatus;
  winner: Outcome | null;
}

export interface RoleView {
  name: string;
  connected: boolean;
}

export interface SessionSnapshot {
  sessionId: string;
  board: Mark[];
  turn: Role;
  status: SessionStatus;
  winner: Outcome | null;
  scores: { X: number; O: number };
  roles: { X: RoleView | null; O: RoleView | null };
  revision: number;
}

export function makeEmptyBoard(): Mark[] {
  return Array<Mark>(BOARD_SIZE).fill(null);
}

export function createSession(id: string): SessionState {
  return {
    id,
    board: makeEmptyBoard(),
    turn: "X",
    players: { X: null, O: null },
    scores: { X: 0, O: 0 },
    status: "waiting",
    winner: null,
  };
}

export function otherRole(role: Role): Role {
  return role === "X" ? "O" : "X";
}
