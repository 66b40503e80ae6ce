import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerQueryAdvisorAvailability(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "query_advisor_availability",
    {
      title: "Query Advisor Availability",
      description: "An advisor's free hourly slots on a day (09:00-17:00, lunch excluded).",
      inputSchema: {
        advisor_id: z.string(),
        date: z.string().describe("e.g. 'Week 2, Tuesday'"),
      },
    },
    async ({ advisor_id, date }) => respond(world.queryAdvisorAvailability(advisor_id, date)),
  );
}
