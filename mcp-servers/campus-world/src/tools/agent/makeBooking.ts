import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerMakeBooking(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "make_booking",
    {
      title: "Make Booking",
      description: "Reserve a room (or a seat in it) for one of the offered time slots. Bookings are permanent.",
      inputSchema: {
        location_id: z.string(),
        item_name: z.string().describe("e.g. 'Study Room 201'"),
        date: z.string().describe("e.g. 'Week 1, Saturday'"),
        time_slot: z.string().describe("e.g. '14:00-15:30'"),
        seat_id: z.string().optional().describe("Required when the room is booked by seat"),
      },
    },
    async ({ location_id, item_name, date, time_slot, seat_id }) =>
      respond(world.makeBooking(location_id, item_name, date, time_slot, seat_id)),
  );
}
