import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { SnapshotStore } from "../../snapshots.js";
import type { CampusWorldState } from "../../world/state.js";
import { registerGetWorldTime } from "./getWorldTime.js";
import { registerAdvanceTime } from "./advanceTime.js";
import { registerBeginDay } from "./beginDay.js";
import { registerSetLocation } from "./setLocation.js";
import { registerSetTask } from "./setTask.js";
import { registerPrepareTask } from "./prepareTask.js";
import { registerApplyWorldChange } from "./applyWorldChange.js";
import { registerSetReservationPuzzle } from "./setReservationPuzzle.js";
import { registerListReservations } from "./listReservations.js";
import { registerListSentEmails } from "./listSentEmails.js";
import { registerDrainScheduleChanges } from "./drainScheduleChanges.js";
import { registerSaveCheckpoint } from "./saveCheckpoint.js";
import { registerLoadCheckpoint } from "./loadCheckpoint.js";
import { registerListCheckpoints } from "./listCheckpoints.js";

export function registerControllerTools(
  server: McpServer,
  world: CampusWorldState,
  store: SnapshotStore,
  runId: string,
): void {
  registerGetWorldTime(server, world);
  registerAdvanceTime(server, world);
  registerBeginDay(server, world);
  registerSetLocation(server, world);
  registerSetTask(server, world);
  registerPrepareTask(server, world);
  registerApplyWorldChange(server, world);
  registerSetReservationPuzzle(server, world);
  registerListReservations(server, world);
  registerListSentEmails(server, world);
  registerDrainScheduleChanges(server, world);
  registerSaveCheckpoint(server, world, store, runId);
  registerLoadCheckpoint(server, world, store, runId);
  registerListCheckpoints(server, store, runId);
}
