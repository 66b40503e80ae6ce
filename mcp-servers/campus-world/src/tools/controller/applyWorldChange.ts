import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { worldChangeSchema } from "../../world/changes.js";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerApplyWorldChange(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "apply_world_change",
    {
      title: "Apply World Change",
      description: "Apply one world-state change: popularity, seats, advisor availability or commitments, pinned room availability, or a new registration round.",
      inputSchema: {
        change: worldChangeSchema,
      },
    },
    async ({ change }) => respond(world.applyChange(change)),
  );
}
