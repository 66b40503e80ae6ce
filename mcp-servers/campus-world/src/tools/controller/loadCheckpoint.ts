import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { fail } from "../../result.js";
import type { SnapshotStore } from "../../snapshots.js";
import type { CampusWorldState } from "../../world/state.js";
import { respond, respondToFault } from "../respond.js";

export function registerLoadCheckpoint(
  server: McpServer,
  world: CampusWorldState,
  store: SnapshotStore,
  runId: string,
): void {
  server.registerTool(
    "load_checkpoint",
    {
      title: "Load Checkpoint",
      description: "Replace the world state with a saved checkpoint of this run.",
      inputSchema: {
        label: z.string().default("latest"),
      },
    },
    async ({ label }) => {
      try {
        const snapshot = await store.load(runId, label);
        if (!snapshot) return respond(fail("NOT_FOUND", `No checkpoint '${label}' for run ${runId}.`));
        return respond(world.restore(snapshot));
      } catch (err) {
        return respondToFault("load checkpoint", err);
      }
    },
  );
}
