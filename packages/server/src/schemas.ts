// packages/server/src/schemas.ts

import { z } from "zod";

// compared byte for byte; surrounding whitespace is part of the value
export const SessionIdSchema = z.string().min(1).max(128);
export const PlayerNameSchema = z.string().min(1).max(64);

export const JoinMessageSchema = z.object({
  type: z.literal("join"),
  sessionId: SessionIdSchema,
  name: PlayerNameSchema,
});

// bounds are the engine's call so out-of-range cells surface as INVALID_CELL
export const MoveMessageSchema = z.object({
  type: z.literal("move"),
  cellIndex: z.number().int(),
});

export const ResetMessageSchema = z.object({ type: z.literal("reset") });

export const LeaveMessageSchema = z.object({ type: z.literal("leave") });

export const ClientMessageSchema = z.discriminatedUnion("type", [
  JoinMessageSchema,
  MoveMessageSchema,
  ResetMessageSchema,
  LeaveMessageSchema,
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export const SessionParamsSchema = z.object({ id: SessionIdSchema });
