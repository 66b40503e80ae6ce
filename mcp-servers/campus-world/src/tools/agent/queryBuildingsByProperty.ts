import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerQueryBuildingsByProperty(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "query_buildings_by_property",
    {
      title: "Query Buildings by Property",
      description: "List buildings matching a zone, a building type and/or an amenity. Use list_valid_query_properties for valid values.",
      inputSchema: {
        zone: z.string().optional(),
        building_type: z.string().optional(),
        amenity: z.string().optional(),
      },
    },
    async ({ zone, building_type, amenity }) =>
      respond(world.queryBuildingsByProperty({ zone, building_type, amenity })),
  );
}
