import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { calendarId } from "./calendarId.js";
import { respond } from "../respond.js";

export function registerRemoveEvent(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "remove_event",
    {
      title: "Remove Calendar Event",
      description: "Remove an event by its ID.",
      inputSchema: {
        calendar_id: calendarId,
        event_id: z.string(),
      },
    },
    async ({ calendar_id, event_id }) => respond(world.removeEvent(calendar_id, event_id)),
  );
}
