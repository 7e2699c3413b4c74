import {
  cellKey, directionFromSymbol, directionSymbol, sameCell, stepCell,
  type Cell, type Direction
} from "@shared/core";
import type { MazeGraph } from "./graph";

export function formatPath(path: readonly Direction[]): string {
  return path.map(directionSymbol).join("");
}

export function parsePath(text: string): Direction[] {
  return Array.from(text, (ch) => {
    const dir = directionFromSymbol(ch);
    if (!dir) throw new RangeError(`unknown direction symbol "${ch}"`);
    return dir;
  });
}

/**
 * Walks `path` from the entry. Returns where it lands, or null at the first
 * move that is not an open passage.
 */
export function followPath(maze: MazeGraph, path: readonly Direction[]): Cell | null {
  let at = maze.entry;
  for (const dir of path) {
    const target = stepCell(at, dir);
    const open = maze.getOpenNeighbors(at).some((n) => n.dir === dir && sameCell(n.cell, target));
    if (!open) return null;
    at = target;
  }
  return at;
}

/** Number of moves on a shortest entry→exit route; Infinity if unreachable. */
export function shortestPathLength(maze: MazeGraph): number {
  // layer-by-layer BFS without parent tracking
  let frontier: Cell[] = [maze.entry];
  const seen = new Set<string>([cellKey(maze.entry)]);
  let d = 0;

  while (frontier.length) {
    const next: Cell[] = [];
    for (const c of frontier) {
      if (sameCell(c, maze.exit)) return d;
      for (const n of maze.getOpenNeighbors(c)) {
        const k = cellKey(n.cell);
        if (!seen.has(k)) { seen.add(k); next.push(n.cell); }
      }
    }
    frontier = next;
    d++;
  }
  return Infinity;
}
