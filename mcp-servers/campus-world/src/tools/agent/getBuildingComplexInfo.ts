import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerGetBuildingComplexInfo(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "get_building_complex_info",
    {
      title: "Get Building Complex Info",
      description: "Whether a building belongs to a complex of connected buildings, and which.",
      inputSchema: {
        building_id: z.string(),
      },
    },
    async ({ building_id }) => respond(world.getBuildingComplexInfo(building_id)),
  );
}
