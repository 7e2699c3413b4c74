import { z } from "zod";

/** Wire-level contracts for the solver service. */
export const MAX_SIDE = 512;

export const CellMsg = z.object({
  row: z.number().int().nonnegative(),
  col: z.number().int().nonnegative()
});
export type CellMsg = z.infer<typeof CellMsg>;

export const DirectionSymbol = z.enum(["N", "E", "S", "W"]);
export type DirectionSymbol = z.infer<typeof DirectionSymbol>;

export const PassageMsg = CellMsg.extend({ dir: DirectionSymbol });
export type PassageMsg = z.infer<typeof PassageMsg>;

export const MazeSpec = z.object({
  rows: z.number().int().positive().max(MAX_SIDE),
  cols: z.number().int().positive().max(MAX_SIDE),
  entry: CellMsg.optional(), // defaults to the top-left cell
  exit: CellMsg.optional(), // defaults to the bottom-right cell
  passages: z.array(PassageMsg).default([])
});
export type MazeSpec = z.infer<typeof MazeSpec>;

export const PassageUpdate = z.object({
  open: z.array(PassageMsg).default([]),
  close: z.array(PassageMsg).default([])
});
export type PassageUpdate = z.infer<typeof PassageUpdate>;

export const SolutionMsg = z.object({
  mazeId: z.string().optional(),
  path: z.string().regex(/^[NESW]*$/),
  length: z.number().int().nonnegative(),
  reachable: z.boolean(),
  cached: z.boolean()
});
export type SolutionMsg = z.infer<typeof SolutionMsg>;

export const RegisteredMsg = z.object({ mazeId: z.string() });
export type RegisteredMsg = z.infer<typeof RegisteredMsg>;
