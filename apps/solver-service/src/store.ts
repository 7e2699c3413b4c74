import { v4 as uuidv4 } from "uuid";
import type { PassageUpdate } from "@shared/core";
import { Solver, applyPassages, asGraph, type Maze } from "@sim/core";

export type StoredMaze = { id: string; maze: Maze; solver: Solver };

/** In-memory mazes, each with a solver bound to it. Oldest goes first when full. */
export class MazeStore {
  private readonly mazes = new Map<string, StoredMaze>();

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) throw new RangeError(`invalid store capacity ${capacity}`);
  }

  get size(): number {
    return this.mazes.size;
  }

  add(maze: Maze): StoredMaze {
    while (this.mazes.size >= this.capacity) {
      const oldest = this.mazes.keys().next();
      if (oldest.done) break;
      this.mazes.delete(oldest.value);
    }
    const entry: StoredMaze = { id: uuidv4(), maze, solver: new Solver(asGraph(maze)) };
    this.mazes.set(entry.id, entry);
    return entry;
  }

  get(id: string): StoredMaze | undefined {
    return this.mazes.get(id);
  }

  delete(id: string): boolean {
    return this.mazes.delete(id);
  }

  /**
   * Opens then closes the listed passages. The cached path is dropped first,
   * so a bad passage halfway through cannot leave a stale solution behind.
   * Returns the number of walls that changed, or null for an unknown id.
   */
  update(id: string, update: PassageUpdate): number | null {
    const entry = this.mazes.get(id);
    if (!entry) return null;
    entry.solver.invalidate();
    return applyPassages(entry.maze, update.open, update.close);
  }
}
