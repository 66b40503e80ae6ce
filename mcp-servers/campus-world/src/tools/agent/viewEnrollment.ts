import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerViewEnrollment(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "view_enrollment",
    {
      title: "View Enrollment",
      description: "Sections you are registered in.",
      inputSchema: {},
    },
    async () => respond(world.viewEnrollment()),
  );
}
