import { Registry, collectDefaultMetrics, Counter, Histogram, Gauge } from "prom-client";

export type Metrics = {
  registry: Registry;
  solves: Counter<"cached">;
  solveDuration: Histogram;
  mazesStored: Gauge;
};

export function createMetrics(opts: { defaults?: boolean } = {}): Metrics {
  const registry = new Registry();
  if (opts.defaults ?? true) collectDefaultMetrics({ register: registry });
  return {
    registry,
    solves: new Counter({ name: "solves_total", help: "Solutions served", labelNames: ["cached"], registers: [registry] }),
    solveDuration: new Histogram({
      name: "solve_duration_seconds", help: "Time spent searching when no cached path exists",
      buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1], registers: [registry]
    }),
    mazesStored: new Gauge({ name: "mazes_stored", help: "Mazes held by the service", registers: [registry] })
  };
}
