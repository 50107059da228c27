// packages/rules/src/engine.ts

import {
  BOARD_SIZE,
  ROLES,
  makeEmptyBoard,
  otherRole,
  type Board,
  type Mark,
  type PlayerSlot,
  type Role,
  type SessionState,
} from "./model";

export type RejectionCode =
  | "SESSION_FULL"
  | "GAME_FINISHED"
  | "WAITING_FOR_PLAYERS"
  | "NOT_YOUR_TURN"
  | "INVALID_CELL"
  | "CELL_OCCUPIED";

export interface Rejection {
  ok: false;
  code: RejectionCode;
  message: string;
}

export interface Applied {
  ok: true;
  state: SessionState;
}

export interface Joined extends Applied {
  role: Role;
  reconnected: boolean;
}

export type MoveResult = Applied | Rejection;
export type JoinResult = Joined | Rejection;

export interface JoinOptions {
  now: number;
  // how long a disconnected slot stays reserved for its owner
  reserveMs: number;
}

export const WIN_LINES: readonly (readonly [number, number, number])[] = [
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  [0, 4, 8],
  [2, 4, 6],
];

export class InvariantViolationError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string, message: string) {
    super(`session ${sessionId}: ${message}`);
    this.name = "InvariantViolationError";
    this.sessionId = sessionId;
  }
}

function reject(code: RejectionCode, message: string): Rejection {
  return { ok: false, code, message };
}

function withSlot(
  state: SessionState,
  role: Role,
  slot: PlayerSlot | null
): SessionState {
  return { ...state, players: { ...state.players, [role]: slot } };
}

export function detectWinner(board: Board): Role | null {
  for (const [a, b, c] of WIN_LINES) {
    const mark = board[a];
    if (mark !== null && mark === board[b] && mark === board[c]) {
      return mark;
    }
  }
  return null;
}

export function isBoardFull(board: Board): boolean {
  return board.every((cell) => cell !== null);
}

export function hasLiveConnection(state: SessionState): boolean {
  return ROLES.some((role) => state.players[role]?.connId != null);
}

function seat(
  state: SessionState,
  role: Role,
  name: string,
  connId: string
): Joined {
  const next = withSlot(state, role, {
    name,
    role,
    connId,
    disconnectedAt: null,
  });
  const bothSeated = next.players.X !== null && next.players.O !== null;
  return {
    ok: true,
    role,
    reconnected: false,
    state:
      bothSeated && next.status === "waiting"
        ? { ...next, status: "inProgress" }
        : next,
  };
}

/**
 * Seat a player. A name that matches a disconnected slot reclaims it;
 * otherwise the first empty role is taken (X before O). A slot disconnected
 * for at least `reserveMs` may be taken over by a different name.
 */
export function join(
  state: SessionState,
  name: string,
  connId: string,
  options: JoinOptions
): JoinResult {
  for (const role of ROLES) {
    const slot = state.players[role];
    if (slot && slot.name === name && slot.connId === null) {
      return {
        ok: true,
        role,
        reconnected: true,
        state: withSlot(state, role, { ...slot, connId, disconnectedAt: null }),
      };
    }
  }

  const open = ROLES.find((role) => state.players[role] === null);
  if (open) {
    return seat(state, open, name, connId);
  }

  const abandoned = ROLES.find((role) => {
    const slot = state.players[role];
    return (
      slot !== null &&
      slot.connId === null &&
      slot.disconnectedAt !== null &&
      options.now - slot.disconnectedAt >= options.reserveMs
    );
  });
  if (abandoned) {
    return seat(state, abandoned, name, connId);
  }

  return reject("SESSION_FULL", "Both roles are taken");
}

// Validation order is fixed: status, turn, bounds, occupancy.
export function applyMove(
  state: SessionState,
  role: Role,
  cellIndex: number
): MoveResult {
  if (state.status === "finished") {
    return reject("GAME_FINISHED", "Game is over");
  }
  if (state.status === "waiting") {
    return reject("WAITING_FOR_PLAYERS", "Waiting for an opponent");
  }
  if (state.turn !== role) {
    return reject("NOT_YOUR_TURN", `It is ${state.turn}'s turn`);
  }
  if (!Number.isInteger(cellIndex) || cellIndex < 0 || cellIndex >= BOARD_SIZE) {
    return reject("INVALID_CELL", `Cell ${cellIndex} is out of bounds`);
  }
  if (state.board[cellIndex] !== null) {
    return reject("CELL_OCCUPIED", "Cell already taken");
  }

  const board: Mark[] = state.board.slice();
  board[cellIndex] = role;

  const winner = detectWinner(board);
  if (winner) {
    return {
      ok: true,
      state: {
        ...state,
        board,
        status: "finished",
        winner,
        scores: { ...state.scores, [winner]: state.scores[winner] + 1 },
      },
    };
  }

  if (isBoardFull(board)) {
    return {
      ok: true,
      state: { ...state, board, status: "finished", winner: "draw" },
    };
  }

  return { ok: true, state: { ...state, board, turn: otherRole(role) } };
}

export function reset(state: SessionState): SessionState {
  const bothSeated = state.players.X !== null && state.players.O !== null;
  return {
    ...state,
    board: makeEmptyBoard(),
    turn: "X",
    status: bothSeated ? "inProgress" : "waiting",
    winner: null,
  };
}

/**
 * Mark a slot as disconnected. Only the connection currently holding the slot
 * may release it, so a late close from a replaced socket is a no-op.
 */
export function release(
  state: SessionState,
  role: Role,
  connId: string,
  now: number
): SessionState {
  const slot = state.players[role];
  if (!slot || slot.connId !== connId) return state;
  return withSlot(state, role, { ...slot, connId: null, disconnectedAt: now });
}

export function leave(state: SessionState, role: Role): SessionState {
  if (!state.players[role]) return state;
  return withSlot(state, role, null);
}

export function assertSessionInvariants(state: SessionState): void {
  const fail = (message: string): never => {
    throw new InvariantViolationError(state.id, message);
  };

  if (state.board.length !== BOARD_SIZE) {
    fail(`board has ${state.board.length} cells`);
  }
  for (const cell of state.board) {
    if (cell !== null && cell !== "X" && cell !== "O") {
      fail(`board holds an unknown mark ${String(cell)}`);
    }
  }
  if (state.turn !== "X" && state.turn !== "O") {
    fail(`turn is ${String(state.turn)}`);
  }
  for (const role of ROLES) {
    const slot = state.players[role];
    if (slot && slot.role !== role) {
      fail(`slot ${role} is held by role ${slot.role}`);
    }
    const score = state.scores[role];
    if (!Number.isInteger(score) || score < 0) {
      fail(`score for ${role} is ${score}`);
    }
  }
  if ((state.status === "finished") !== (state.winner !== null)) {
    fail(`status ${state.status} with winner ${String(state.winner)}`);
  }
}
