import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerListReservations(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "list_reservations",
    {
      title: "List Reservations",
      description: "Confirmed bookings, optionally only those made during one task.",
      inputSchema: {
        task_id: z.string().optional(),
      },
    },
    async ({ task_id }) => respond(world.listReservations(task_id)),
  );
}
