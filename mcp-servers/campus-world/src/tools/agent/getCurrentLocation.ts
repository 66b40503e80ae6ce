import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerGetCurrentLocation(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "get_current_location",
    {
      title: "Get Current Location",
      description: "Where the agent is right now.",
      inputSchema: {},
    },
    async () => respond(world.getCurrentLocation()),
  );
}
