import { directionDelta, type Direction } from "./direction";

/** Grid position; frozen so it can be shared freely. */
export type Cell = Readonly<{ row: number; col: number }>;

export function cell(row: number, col: number): Cell {
  return Object.freeze({ row, col });
}

/** Key for Sets and Maps, which compare objects by reference. */
export function cellKey(c: Cell): string {
  return `${c.row},${c.col}`;
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.row === b.row && a.col === b.col;
}

/** The adjacent cell one move away; bounds are the caller's concern. */
export function stepCell(c: Cell, dir: Direction): Cell {
  const [dr, dc] = directionDelta(dir);
  return cell(c.row + dr, c.col + dc);
}
