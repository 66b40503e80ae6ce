import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerWalkTo(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "walk_to",
    {
      title: "Walk To",
      description: "Walk a route previously returned by find_optimal_path. The route must start at the current location.",
      inputSchema: {
        path: z.array(z.string()).describe("Building IDs in order, exactly as returned by find_optimal_path"),
      },
    },
    async ({ path }) => respond(world.walkTo(path)),
  );
}
