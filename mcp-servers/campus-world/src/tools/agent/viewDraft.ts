import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerViewDraft(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "view_draft",
    {
      title: "View Draft",
      description: "The current draft schedule and its passes.",
      inputSchema: {},
    },
    async () => respond(world.viewDraft()),
  );
}
