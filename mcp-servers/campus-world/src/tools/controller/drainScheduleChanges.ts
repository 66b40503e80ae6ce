import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ok } from "../../result.js";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerDrainScheduleChanges(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "drain_schedule_changes",
    {
      title: "Drain Schedule Changes",
      description: "Changes made to the agent's own calendar since the last drain, with the world time of each.",
      inputSchema: {},
    },
    async () => {
      const changes = world.drainScheduleChanges();
      return respond(ok(`${changes.length} schedule change(s).`, { changes }));
    },
  );
}
