import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";

import { MazeSpec, PassageUpdate, sameCell, type SolutionMsg } from "@shared/core";
import { Solver, asGraph, mazeFromSpec, mazeToSpec, type Maze } from "@sim/core";
import type { Metrics } from "./metrics";
import type { MazeStore } from "./store";

export type AppDeps = {
  store: MazeStore;
  metrics: Metrics;
  corsOrigin?: string;
};

function statusOf(err: unknown): number {
  // maze construction rejects coordinates and moves outside the grid
  if (err instanceof RangeError) return 400;
  // body-parser tags its errors (malformed JSON, oversized body)
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") return err.status;
  return 500;
}

export function createApp({ store, metrics, corsOrigin = "*" }: AppDeps) {
  const app = express();
  app.use(cors({ origin: corsOrigin }));
  // a fully open MAX_SIDE x MAX_SIDE maze lists about 523k passages, ~17 MB of JSON
  app.use(express.json({ limit: "24mb" }));

  function solution(maze: Maze, solver: Solver, mazeId?: string): SolutionMsg {
    const cached = solver.isCached;
    const endTimer = cached ? null : metrics.solveDuration.startTimer();
    const path = solver.pathAsString();
    endTimer?.();
    metrics.solves.inc({ cached: String(cached) });
    return {
      ...(mazeId === undefined ? {} : { mazeId }),
      path,
      length: path.length,
      reachable: path.length > 0 || sameCell(maze.entry, maze.exit),
      cached
    };
  }

  app.get("/healthz", (_req: Request, res: Response) => res.json({ ok: true }));

  app.get("/metrics", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.set("Content-Type", metrics.registry.contentType);
      res.end(await metrics.registry.metrics());
    } catch (err) {
      next(err);
    }
  });

  // one-shot solve, nothing stored
  app.post("/solve", (req: Request, res: Response) => {
    const parsed = MazeSpec.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "bad request", issues: parsed.error.issues });
    const maze = mazeFromSpec(parsed.data);
    res.json(solution(maze, new Solver(asGraph(maze))));
  });

  app.post("/mazes", (req: Request, res: Response) => {
    const parsed = MazeSpec.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "bad request", issues: parsed.error.issues });
    const entry = store.add(mazeFromSpec(parsed.data));
    metrics.mazesStored.set(store.size);
    res.status(201).json({ mazeId: entry.id });
  });

  app.get("/mazes/:id", (req: Request, res: Response) => {
    const entry = store.get(req.params.id ?? "");
    if (!entry) return res.status(404).json({ error: "maze not found" });
    res.json(mazeToSpec(entry.maze));
  });

  app.get("/mazes/:id/solution", (req: Request, res: Response) => {
    const entry = store.get(req.params.id ?? "");
    if (!entry) return res.status(404).json({ error: "maze not found" });
    res.json(solution(entry.maze, entry.solver, entry.id));
  });

  app.patch("/mazes/:id/passages", (req: Request, res: Response) => {
    const parsed = PassageUpdate.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "bad request", issues: parsed.error.issues });
    const changed = store.update(req.params.id ?? "", parsed.data);
    if (changed === null) return res.status(404).json({ error: "maze not found" });
    res.json({ changed });
  });

  app.delete("/mazes/:id", (req: Request, res: Response) => {
    if (!store.delete(req.params.id ?? "")) return res.status(404).json({ error: "maze not found" });
    metrics.mazesStored.set(store.size);
    res.status(204).end();
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    if (status >= 500) {
      console.error(`${req.method} ${req.path} failed:`, err);
      return res.status(status).json({ error: "internal error" });
    }
    res.status(status).json({ error: err instanceof Error ? err.message : String(err) });
  });

  return app;
}
