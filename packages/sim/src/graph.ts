import type { Cell, Direction } from "@shared/core";

export type Neighbor = { readonly cell: Cell; readonly dir: Direction };

/**
 * What a solver needs from a maze. `getOpenNeighbors` must be a pure query
 * with a stable order: ties between equally short paths go to whichever
 * neighbor is listed first.
 */
export interface MazeGraph {
  readonly entry: Cell;
  readonly exit: Cell;
  getOpenNeighbors(cell: Cell): readonly Neighbor[];
}
