import { describe, it, expect } from "vitest";
import { cell } from "@shared/core";
import {
  applyPassages, asGraph, carve, closePassage, createMaze, getOpenNeighbors,
  isOpen, mazeFromSpec, mazeToSpec, openPassage
} from "./maze";

describe("createMaze", () => {
  it("starts with every wall closed", () => {
    const m = createMaze(2, 3);
    expect(m.cells).toHaveLength(6);
    expect(m.cells.every((c) => c.walls.N && c.walls.E && c.walls.S && c.walls.W)).toBe(true);
    expect(m.entry).toEqual({ row: 0, col: 0 });
    expect(m.exit).toEqual({ row: 1, col: 2 });
    expect(getOpenNeighbors(m, cell(0, 0))).toEqual([]);
  });

  it("lays cells out row by row", () => {
    const m = createMaze(2, 3);
    expect(m.cells[4]).toMatchObject({ row: 1, col: 1 });
  });

  it("rejects bad sizes and endpoints", () => {
    expect(() => createMaze(0, 3)).toThrow(RangeError);
    expect(() => createMaze(1.5, 2)).toThrow(RangeError);
    expect(() => createMaze(2, 2, cell(2, 0))).toThrow("entry (2,0) outside 2x2 grid");
    expect(() => createMaze(2, 2, cell(0, 0), cell(0, -1))).toThrow("exit (0,-1) outside 2x2 grid");
  });
});

describe("passages", () => {
  it("opens both sides of a wall", () => {
    const m = createMaze(1, 2);
    expect(openPassage(m, cell(0, 0), "East")).toBe(true);
    expect(m.cells[0]?.walls.E).toBe(false);
    expect(m.cells[1]?.walls.W).toBe(false);
    expect(isOpen(m, cell(0, 1), "West")).toBe(true);
    expect(openPassage(m, cell(0, 0), "East")).toBe(false);
  });

  it("never opens the outer boundary", () => {
    const m = createMaze(1, 2);
    expect(openPassage(m, cell(0, 0), "North")).toBe(false);
    expect(m.cells[0]?.walls.N).toBe(true);
    expect(isOpen(m, cell(0, 0), "North")).toBe(false);
  });

  it("closes what was opened", () => {
    const m = createMaze(2, 1);
    openPassage(m, cell(0, 0), "South");
    expect(closePassage(m, cell(1, 0), "North")).toBe(true);
    expect(isOpen(m, cell(0, 0), "South")).toBe(false);
    expect(closePassage(m, cell(1, 0), "North")).toBe(false);
  });
});

describe("getOpenNeighbors", () => {
  it("lists neighbors north, east, south, west", () => {
    const m = createMaze(3, 3);
    const center = cell(1, 1);
    for (const dir of ["West", "South", "East", "North"] as const) openPassage(m, center, dir);
    expect(getOpenNeighbors(m, center)).toEqual([
      { cell: { row: 0, col: 1 }, dir: "North" },
      { cell: { row: 1, col: 2 }, dir: "East" },
      { cell: { row: 2, col: 1 }, dir: "South" },
      { cell: { row: 1, col: 0 }, dir: "West" },
    ]);
  });

  it("is empty outside the grid", () => {
    expect(getOpenNeighbors(createMaze(2, 2), cell(5, 5))).toEqual([]);
  });

  it("is read live through asGraph", () => {
    const m = createMaze(1, 2);
    const graph = asGraph(m);
    expect(graph.getOpenNeighbors(cell(0, 0))).toEqual([]);
    openPassage(m, cell(0, 0), "East");
    expect(graph.getOpenNeighbors(cell(0, 0))).toEqual([{ cell: { row: 0, col: 1 }, dir: "East" }]);
  });
});

describe("carve", () => {
  it("opens a route and returns its end", () => {
    const m = createMaze(2, 2);
    expect(carve(m, cell(0, 0), "ES")).toEqual({ row: 1, col: 1 });
    expect(isOpen(m, cell(0, 0), "East")).toBe(true);
    expect(isOpen(m, cell(0, 1), "South")).toBe(true);
    expect(isOpen(m, cell(0, 0), "South")).toBe(false);
  });

  it("rejects unknown letters and moves off the grid", () => {
    const m = createMaze(2, 2);
    expect(() => carve(m, cell(0, 0), "EX")).toThrow('unknown direction symbol "X"');
    expect(() => carve(m, cell(0, 0), "EE")).toThrow("move E from (0,1) leaves the grid");
  });
});

describe("wire specs", () => {
  it("lists each open passage once", () => {
    const m = createMaze(2, 2);
    carve(m, cell(0, 0), "ES");
    expect(mazeToSpec(m)).toEqual({
      rows: 2,
      cols: 2,
      entry: { row: 0, col: 0 },
      exit: { row: 1, col: 1 },
      passages: [
        { row: 0, col: 0, dir: "E" },
        { row: 0, col: 1, dir: "S" },
      ],
    });
  });

  it("rebuilds the same walls from a spec", () => {
    const m = createMaze(3, 3);
    carve(m, cell(0, 0), "SSEENW");
    const copy = mazeFromSpec(mazeToSpec(m));
    expect(copy.cells).toEqual(m.cells);
  });

  it("counts only walls that changed", () => {
    const m = createMaze(2, 2);
    expect(applyPassages(m, [{ row: 0, col: 0, dir: "E" }, { row: 0, col: 1, dir: "W" }])).toBe(1);
    expect(applyPassages(m, [], [{ row: 0, col: 0, dir: "E" }])).toBe(1);
    expect(() => applyPassages(m, [{ row: 1, col: 1, dir: "S" }])).toThrow(RangeError);
  });

  it("checks the whole batch before touching any wall", () => {
    const m = createMaze(2, 2);
    carve(m, cell(0, 0), "E");
    expect(() =>
      applyPassages(m, [{ row: 0, col: 0, dir: "S" }], [{ row: 0, col: 0, dir: "E" }, { row: 1, col: 1, dir: "E" }])
    ).toThrow("passage E from (1,1) leaves the grid");
    expect(isOpen(m, cell(0, 0), "South")).toBe(false);
    expect(isOpen(m, cell(0, 0), "East")).toBe(true);
  });
});
