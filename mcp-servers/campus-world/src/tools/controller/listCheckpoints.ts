import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ok } from "../../result.js";
import type { SnapshotStore } from "../../snapshots.js";
import { respond, respondToFault } from "../respond.js";

export function registerListCheckpoints(server: McpServer, store: SnapshotStore, runId: string): void {
  server.registerTool(
    "list_checkpoints",
    {
      title: "List Checkpoints",
      description: "Saved checkpoints of this run, oldest first.",
      inputSchema: {},
    },
    async () => {
      try {
        const checkpoints = await store.list(runId);
        return respond(ok(`${checkpoints.length} checkpoint(s) for run ${runId}.`, { checkpoints }));
      } catch (err) {
        return respondToFault("list checkpoints", err);
      }
    },
  );
}
