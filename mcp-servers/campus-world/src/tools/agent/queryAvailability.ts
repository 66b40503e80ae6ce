import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerQueryAvailability(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "query_availability",
    {
      title: "Query Availability",
      description: "Bookable rooms and seats in a building on a given day, by time slot, with their properties.",
      inputSchema: {
        location_id: z.string().describe("Building ID"),
        date: z.string().describe("e.g. 'Week 1, Saturday'"),
      },
    },
    async ({ location_id, date }) => respond(world.queryAvailability(location_id, date)),
  );
}
