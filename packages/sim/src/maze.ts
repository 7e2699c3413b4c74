import {
  DIRECTIONS, cell, directionFromSymbol, directionSymbol, flipDirection, stepCell,
  type Cell, type Direction, type DirectionSymbol, type MazeSpec, type PassageMsg
} from "@shared/core";
import type { MazeGraph, Neighbor } from "./graph";

/** Grid maze with walls; every wall starts closed. */
export type MazeCell = { row: number; col: number; walls: Record<DirectionSymbol, boolean> };
export type Maze = {
  rows: number; cols: number; cells: MazeCell[];
  entry: Cell; exit: Cell;
};

const idx = (maze: Maze, c: Cell) => c.row * maze.cols + c.col;

export function inBounds(maze: Maze, c: Cell): boolean {
  return Number.isInteger(c.row) && Number.isInteger(c.col)
    && c.row >= 0 && c.col >= 0 && c.row < maze.rows && c.col < maze.cols;
}

function cellAt(maze: Maze, c: Cell): MazeCell | undefined {
  return inBounds(maze, c) ? maze.cells[idx(maze, c)] : undefined;
}

export function createMaze(rows: number, cols: number, entry: Cell = cell(0, 0), exit: Cell = cell(rows - 1, cols - 1)): Maze {
  if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
    throw new RangeError(`invalid maze size ${rows}x${cols}`);
  }
  const cells: MazeCell[] = Array.from({ length: rows * cols }, (_, i) => ({
    row: Math.floor(i / cols), col: i % cols,
    walls: { N: true, E: true, S: true, W: true }
  }));
  const maze: Maze = { rows, cols, cells, entry: cell(entry.row, entry.col), exit: cell(exit.row, exit.col) };
  if (!inBounds(maze, maze.entry)) throw new RangeError(`entry (${entry.row},${entry.col}) outside ${rows}x${cols} grid`);
  if (!inBounds(maze, maze.exit)) throw new RangeError(`exit (${exit.row},${exit.col}) outside ${rows}x${cols} grid`);
  return maze;
}

function setWall(maze: Maze, from: Cell, dir: Direction, closed: boolean): boolean {
  const a = cellAt(maze, from);
  const b = cellAt(maze, stepCell(from, dir));
  if (!a || !b) return false;
  const side = directionSymbol(dir);
  if (a.walls[side] === closed) return false;
  a.walls[side] = closed;
  b.walls[directionSymbol(flipDirection(dir))] = closed;
  return true;
}

/** Knocks down the wall on both sides. Returns whether anything changed. */
export function openPassage(maze: Maze, from: Cell, dir: Direction): boolean {
  return setWall(maze, from, dir, false);
}

export function closePassage(maze: Maze, from: Cell, dir: Direction): boolean {
  return setWall(maze, from, dir, true);
}

export function isOpen(maze: Maze, from: Cell, dir: Direction): boolean {
  const c = cellAt(maze, from);
  return c !== undefined && !c.walls[directionSymbol(dir)] && inBounds(maze, stepCell(from, dir));
}

/** Opens passages along `moves` (e.g. "EESW") and returns where it ends. */
export function carve(maze: Maze, from: Cell, moves: string): Cell {
  let at = cell(from.row, from.col);
  for (const ch of moves) {
    const dir = directionFromSymbol(ch);
    if (!dir) throw new RangeError(`unknown direction symbol "${ch}"`);
    const next = stepCell(at, dir);
    if (!inBounds(maze, at) || !inBounds(maze, next)) {
      throw new RangeError(`move ${ch} from (${at.row},${at.col}) leaves the grid`);
    }
    openPassage(maze, at, dir);
    at = next;
  }
  return at;
}

/** Neighbors through open walls, always in North, East, South, West order. */
export function getOpenNeighbors(maze: Maze, from: Cell): Neighbor[] {
  const c = cellAt(maze, from);
  if (!c) return [];
  const out: Neighbor[] = [];
  for (const dir of DIRECTIONS) {
    if (c.walls[directionSymbol(dir)]) continue;
    const to = stepCell(from, dir);
    if (inBounds(maze, to)) out.push({ cell: to, dir });
  }
  return out;
}

export function asGraph(maze: Maze): MazeGraph {
  return {
    get entry() { return maze.entry; },
    get exit() { return maze.exit; },
    getOpenNeighbors: (c) => getOpenNeighbors(maze, c)
  };
}

type PassageEdit = { from: Cell; dir: Direction; open: boolean };

function checkPassage(maze: Maze, p: PassageMsg, open: boolean): PassageEdit {
  const dir = directionFromSymbol(p.dir);
  if (!dir) throw new RangeError(`unknown direction symbol "${p.dir}"`);
  const from = cell(p.row, p.col);
  if (!inBounds(maze, from) || !inBounds(maze, stepCell(from, dir))) {
    throw new RangeError(`passage ${p.dir} from (${p.row},${p.col}) leaves the grid`);
  }
  return { from, dir, open };
}

/**
 * Applies passage edits, opens first. Every edit is checked before any wall
 * moves, so a rejected batch leaves the maze untouched.
 * Returns how many walls actually changed.
 */
export function applyPassages(maze: Maze, open: readonly PassageMsg[], close: readonly PassageMsg[] = []): number {
  const edits = [
    ...open.map((p) => checkPassage(maze, p, true)),
    ...close.map((p) => checkPassage(maze, p, false))
  ];
  let changed = 0;
  for (const e of edits) {
    if (e.open ? openPassage(maze, e.from, e.dir) : closePassage(maze, e.from, e.dir)) changed++;
  }
  return changed;
}

export function mazeFromSpec(spec: MazeSpec): Maze {
  const maze = createMaze(spec.rows, spec.cols, spec.entry, spec.exit);
  applyPassages(maze, spec.passages);
  return maze;
}

/** Each open passage listed once, from the cell west or north of it. */
export function mazeToSpec(maze: Maze): MazeSpec {
  const passages: PassageMsg[] = [];
  for (const c of maze.cells) {
    if (!c.walls.E && c.col + 1 < maze.cols) passages.push({ row: c.row, col: c.col, dir: "E" });
    if (!c.walls.S && c.row + 1 < maze.rows) passages.push({ row: c.row, col: c.col, dir: "S" });
  }
  return {
    rows: maze.rows, cols: maze.cols,
    entry: { row: maze.entry.row, col: maze.entry.col },
    exit: { row: maze.exit.row, col: maze.exit.col },
    passages
  };
}
