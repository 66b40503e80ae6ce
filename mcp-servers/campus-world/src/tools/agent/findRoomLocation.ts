import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerFindRoomLocation(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "find_room_location",
    {
      title: "Find Room Location",
      description: "Search rooms by name across campus, optionally within one building or zone.",
      inputSchema: {
        room_query: z.string().describe("Part of the room name to search for"),
        building_id: z.string().optional().describe("Restrict the search to this building"),
        zone: z.string().optional().describe("Restrict the search to this zone"),
      },
    },
    async ({ room_query, building_id, zone }) => respond(world.findRoomLocation(room_query, building_id, zone)),
  );
}
