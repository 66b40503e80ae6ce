export * from "./types.js";
export * from "./result.js";
export { CampusWorldState } from "./world/state.js";
export type { WorldOptions, WorldSnapshot, DayStart, TaskPrepared } from "./world/state.js";
export type { WorldChange, TaskSetup } from "./world/changes.js";
export { worldChangeSchema, taskSetupSchema, reservationPuzzleSchema } from "./world/changes.js";
export { InformationDesk } from "./world/information.js";
export type { AdvisorMatch, EntityType } from "./world/information.js";
export { loadCampusData, DEFAULT_DATA_DIR } from "./data/loader.js";
export type { CampusData } from "./data/loader.js";
export { MemorySnapshotStore, MongoSnapshotStore, parseSnapshot } from "./snapshots.js";
export type { SnapshotStore, CheckpointInfo } from "./snapshots.js";
export { createCampusServer } from "./server.js";
export type { CampusServerOptions } from "./server.js";
