import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { calendarId } from "./calendarId.js";
import { respond } from "../respond.js";

export function registerUpdateEvent(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "update_event",
    {
      title: "Update Calendar Event",
      description: "Change the title, location, time or description of an event. Omitted fields keep their value.",
      inputSchema: {
        calendar_id: calendarId,
        event_id: z.string(),
        new_details: z.object({
          event_title: z.string().optional(),
          location: z.string().optional(),
          time: z.string().optional().describe("e.g. 'Week 1, Monday, 15:00-16:00'"),
          description: z.string().optional(),
        }),
      },
    },
    async ({ calendar_id, event_id, new_details }) => respond(world.updateEvent(calendar_id, event_id, new_details)),
  );
}
