import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerFindBuildingId(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "find_building_id",
    {
      title: "Find Building ID",
      description: "Look up a building's ID by its name or one of its aliases (case-insensitive).",
      inputSchema: {
        building_name: z.string().describe("Building name or alias, e.g. 'Main Library'"),
      },
    },
    async ({ building_name }) => respond(world.findBuildingId(building_name)),
  );
}
