import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ok } from "../../result.js";
import type { SnapshotStore } from "../../snapshots.js";
import type { CampusWorldState } from "../../world/state.js";
import { respond, respondToFault } from "../respond.js";

export function registerSaveCheckpoint(
  server: McpServer,
  world: CampusWorldState,
  store: SnapshotStore,
  runId: string,
): void {
  server.registerTool(
    "save_checkpoint",
    {
      title: "Save Checkpoint",
      description: "Persist the whole world state under a label for this run.",
      inputSchema: {
        label: z.string().default("latest"),
      },
    },
    async ({ label }) => {
      try {
        const info = await store.save(runId, label, world.snapshot());
        console.error(`[campus] checkpoint '${label}' saved for run ${runId} at ${info.world_time}`);
        return respond(ok(`Checkpoint '${label}' saved at ${info.world_time}.`, info));
      } catch (err) {
        return respondToFault("save checkpoint", err);
      }
    },
  );
}
