import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { reservationPuzzleSchema } from "../../world/changes.js";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerSetReservationPuzzle(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "set_reservation_puzzle",
    {
      title: "Set Reservation Puzzle",
      description: "Fix the offers of one time slot at a building on a date: the solution items carry every required property, distractors miss at least one.",
      inputSchema: reservationPuzzleSchema.shape,
    },
    async (puzzle) => respond(world.designatePuzzle(puzzle)),
  );
}
