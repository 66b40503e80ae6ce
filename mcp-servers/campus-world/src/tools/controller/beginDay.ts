import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerBeginDay(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "begin_day",
    {
      title: "Begin Day",
      description: "Start a simulated day at 08:00: resets the agent's location and walk history and returns the daily announcement.",
      inputSchema: {
        date: z.string().describe("e.g. 'Week 1, Tuesday'"),
      },
    },
    async ({ date }) => respond(world.beginDay(date)),
  );
}
