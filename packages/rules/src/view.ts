// packages/rules/src/view.ts

import type {
  PlayerSlot,
  RoleView,
  SessionSnapshot,
  SessionState,
} from "./model";

function viewSlot(slot: PlayerSlot | null): RoleView | null {
  if (!slot) return null;
  return { name: slot.name, connected: slot.connId !== null };
}

/**
 * Build the externally visible state of a session.
 * Connection handles never leave the server; clients only see a
 * `connected` flag per role.
 */
export function makeSnapshot(
  state: SessionState,
  options: { revision: number }
): SessionSnapshot {
  return {
    sessionId: state.id,
    board: [...state.board],
    turn: state.turn,
    status: state.status,
    winner: state.winner,
    scores: { ...state.scores },
    roles: { X: viewSlot(state.players.X), O: viewSlot(state.players.O) },
    revision: options.revision,
  };
}
