import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerListValidQueryProperties(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "list_valid_query_properties",
    {
      title: "List Valid Query Properties",
      description: "All zones, building types and amenity tags known on the campus map.",
      inputSchema: {},
    },
    async () => respond(world.listValidQueryProperties()),
  );
}
