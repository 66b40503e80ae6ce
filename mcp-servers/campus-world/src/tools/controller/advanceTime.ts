import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerAdvanceTime(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "advance_time",
    {
      title: "Advance Time",
      description: "Move the world clock forward. Moving onto a later date also sends the agent back to the dormitory.",
      inputSchema: {
        time: z.string().describe("e.g. 'Week 1, Monday, 14:00'"),
      },
    },
    async ({ time }) => respond(world.advanceTime(time)),
  );
}
