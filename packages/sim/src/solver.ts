import { cellKey, sameCell, type Cell, type Direction } from "@shared/core";
import type { MazeGraph } from "./graph";
import { formatPath } from "./path";

/** Moves from entry to exit. Empty when there is none, or none is needed. */
export type Path = readonly Direction[];

/** How a cell was first reached during the search. */
type Visit =
  | { kind: "entry" }
  | { kind: "step"; parent: Cell; dir: Direction };

/**
 * Breadth-first search from `maze.entry` to `maze.exit`. First visit wins,
 * so among equally short routes the maze's neighbor order decides.
 */
export function findShortestPath(maze: MazeGraph): Direction[] {
  const { entry, exit } = maze;
  const visits = new Map<string, Visit>([[cellKey(entry), { kind: "entry" }]]);
  const queue: Cell[] = [entry];

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) break;
    if (sameCell(current, exit)) return reconstruct(visits, exit);
    for (const { cell, dir } of maze.getOpenNeighbors(current)) {
      const key = cellKey(cell);
      if (visits.has(key)) continue;
      visits.set(key, { kind: "step", parent: current, dir });
      queue.push(cell);
    }
  }
  return [];
}

function reconstruct(visits: ReadonlyMap<string, Visit>, exit: Cell): Direction[] {
  const dirs: Direction[] = [];
  let visit = visits.get(cellKey(exit));
  while (visit && visit.kind === "step") {
    dirs.push(visit.dir);
    visit = visits.get(cellKey(visit.parent));
  }
  return dirs.reverse();
}

/**
 * Shortest entry→exit route for one maze, computed once and kept until
 * `invalidate()`. The cache does not watch the maze: callers that change
 * passages must invalidate.
 */
export class Solver {
  private cached: Path | null = null;

  constructor(private readonly maze: MazeGraph) {}

  get isCached(): boolean {
    return this.cached !== null;
  }

  solve(): Path {
    if (this.cached) return this.cached;
    const path: Path = Object.freeze(findShortestPath(this.maze));
    this.cached = path;
    return path;
  }

  pathAsString(): string {
    return formatPath(this.solve());
  }

  invalidate(): void {
    this.cached = null;
  }
}
