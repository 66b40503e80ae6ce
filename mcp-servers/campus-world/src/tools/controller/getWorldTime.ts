import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerGetWorldTime(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "get_world_time",
    {
      title: "Get World Time",
      description: "Current simulated time, with the 12-hour prompt shown to agents.",
      inputSchema: {},
    },
    async () => respond(world.now()),
  );
}
