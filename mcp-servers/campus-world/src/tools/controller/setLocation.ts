import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerSetLocation(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "set_location",
    {
      title: "Set Agent Location",
      description: "Place the agent in a building directly, for tasks that start away from the dormitory.",
      inputSchema: {
        building_id: z.string(),
      },
    },
    async ({ building_id }) => respond(world.setLocation(building_id)),
  );
}
