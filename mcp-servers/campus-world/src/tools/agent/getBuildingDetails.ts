import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerGetBuildingDetails(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "get_building_details",
    {
      title: "Get Building Details",
      description: "Full record of a building: type, zone, aliases, amenities and rooms by floor.",
      inputSchema: {
        building_id: z.string().describe("Building ID, e.g. 'B001'"),
      },
    },
    async ({ building_id }) => respond(world.getBuildingDetails(building_id)),
  );
}
