#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { DEFAULT_START } from "./constants.js";
import { DEFAULT_DATA_DIR, loadCampusData } from "./data/loader.js";
import { closeDb, worldSnapshots } from "./db.js";
import { createCampusServer } from "./server.js";
import { MemorySnapshotStore, MongoSnapshotStore, type SnapshotStore } from "./snapshots.js";
import { CampusWorldState } from "./world/state.js";

const dataDir = process.env.CAMPUS_DATA_DIR || DEFAULT_DATA_DIR;
const runId = process.env.CAMPUS_RUN_ID || "default";
const seed = process.env.CAMPUS_SEED || runId;
const start = process.env.CAMPUS_START || DEFAULT_START;
const controllerTools = (process.env.CAMPUS_CONTROLLER_TOOLS || "true").toLowerCase() !== "false";

const data = await loadCampusData(dataDir).catch((err: unknown) => {
  console.error(`[campus] cannot load campus data from ${dataDir}:`, err);
  process.exit(1);
});

const world = new CampusWorldState({
  map: data.map, courses: data.courses, information: data.information, seed, start,
});

// Checkpoints go to MongoDB only when it is configured
const store: SnapshotStore = process.env.MONGO_URI
  ? new MongoSnapshotStore(worldSnapshots)
  : new MemorySnapshotStore();

const server = createCampusServer(world, { store, runId, controllerTools });
console.error(
  `[campus] run=${runId} seed=${seed} start="${world.now().data?.now ?? start}" controller=${controllerTools} ` +
  `locations=${data.map.locations.length} sections=${data.courses.length}`,
);

process.on("SIGINT", () => {
  void closeDb().finally(() => process.exit(0));
});

const transport = new StdioServerTransport();
await server.connect(transport);
