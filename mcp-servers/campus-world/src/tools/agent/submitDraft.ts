import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerSubmitDraft(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "submit_draft",
    {
      title: "Submit Draft",
      description: "Submit the draft for registration. Outcomes use popularity at the moment of submission; a round can be submitted once.",
      inputSchema: {},
    },
    async () => respond(world.submitDraft()),
  );
}
