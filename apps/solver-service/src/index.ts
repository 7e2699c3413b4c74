import "dotenv/config";
import http from "node:http";

import { createApp } from "./app";
import { loadConfig } from "./config";
import { createMetrics } from "./metrics";
import { MazeStore } from "./store";

// --- ENV -------------------------------------------------------
const config = loadConfig();

// --- INFRA -----------------------------------------------------
const metrics = createMetrics();
const store = new MazeStore(config.maxMazes);
const app = createApp({ store, metrics, corsOrigin: config.corsOrigin });
const server = http.createServer(app);

// --- BOOT ------------------------------------------------------
server.listen(config.port, () => {
  console.log(`Maze solver http on :${config.port} (max ${config.maxMazes} mazes)`);
});
