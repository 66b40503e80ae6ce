import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerViewArticle(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "view_article",
    {
      title: "View Article",
      description: "Read the full text of an article, looked up by title or by article id.",
      inputSchema: {
        identifier: z.string().describe("Article title or article id"),
        by: z.string().describe("'title' or 'id'"),
      },
    },
    async ({ identifier, by }) => respond(world.viewArticle(identifier, by)),
  );
}
