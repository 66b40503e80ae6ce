import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { calendarId } from "./calendarId.js";
import { respond } from "../respond.js";

export function registerViewSchedule(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "view_schedule",
    {
      title: "View Schedule",
      description: "Events on a calendar for one day, in start-time order.",
      inputSchema: {
        calendar_id: calendarId,
        date: z.string().describe("e.g. 'Week 1, Monday'"),
      },
    },
    async ({ calendar_id, date }) => respond(world.viewSchedule(calendar_id, date)),
  );
}
