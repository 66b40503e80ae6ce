import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerSearchBooks(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "search_books",
    {
      title: "Search Books",
      description: "Search the library catalog by part of a title or an author's name.",
      inputSchema: {
        query: z.string(),
        search_type: z.string().optional().describe("'title' (default) or 'author'"),
      },
    },
    async ({ query, search_type }) => respond(world.searchBooks(query, search_type)),
  );
}
