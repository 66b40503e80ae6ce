import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { calendarId } from "./calendarId.js";
import { respond } from "../respond.js";

export function registerAddEvent(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "add_event",
    {
      title: "Add Calendar Event",
      description: "Add an event to a calendar. Events on one calendar may not overlap.",
      inputSchema: {
        calendar_id: calendarId,
        event_title: z.string(),
        location: z.string(),
        time: z.string().describe("e.g. 'Week 1, Monday, 14:00-16:00'"),
        description: z.string().optional(),
      },
    },
    async ({ calendar_id, event_title, location, time, description }) =>
      respond(world.addEvent(calendar_id, event_title, location, time, description)),
  );
}
