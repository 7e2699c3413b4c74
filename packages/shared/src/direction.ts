import { DirectionSymbol } from "./messages";

/**
 * Cardinal directions for grid traversal.
 * Rows grow southwards, columns grow eastwards.
 */
export type Direction = "North" | "East" | "South" | "West";

/** Enumeration order used everywhere a maze lists its neighbors. */
export const DIRECTIONS: readonly Direction[] = Object.freeze(["North", "East", "South", "West"] as const);

const SYMBOLS: Readonly<Record<Direction, DirectionSymbol>> = Object.freeze({
  North: "N",
  East: "E",
  South: "S",
  West: "W",
});

const FROM_SYMBOL: Readonly<Record<DirectionSymbol, Direction>> = Object.freeze({
  N: "North",
  E: "East",
  S: "South",
  W: "West",
});

const DELTAS: Readonly<Record<Direction, readonly [number, number]>> = Object.freeze({
  North: [-1, 0],
  East: [0, 1],
  South: [1, 0],
  West: [0, -1],
} as const);

export function directionSymbol(dir: Direction): DirectionSymbol {
  return SYMBOLS[dir];
}

export function isDirectionSymbol(s: string): s is DirectionSymbol {
  return DirectionSymbol.safeParse(s).success;
}

/** Returns null for anything but a single N/E/S/W letter. */
export function directionFromSymbol(s: string): Direction | null {
  return isDirectionSymbol(s) ? FROM_SYMBOL[s] : null;
}

/** [dRow, dCol] */
export function directionDelta(dir: Direction): readonly [number, number] {
  return DELTAS[dir];
}

export function flipDirection(dir: Direction): Direction {
  switch (dir) {
    case "North":
      return "South";
    case "South":
      return "North";
    case "East":
      return "West";
    case "West":
      return "East";
  }
}
