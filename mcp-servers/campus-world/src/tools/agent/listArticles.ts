import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerListArticles(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "list_articles",
    {
      title: "List Articles",
      description: "List the article titles in one section of a book.",
      inputSchema: {
        book_title: z.string(),
        chapter_title: z.string(),
        section_title: z.string().describe("Full section title as listed by list_sections"),
      },
    },
    async ({ book_title, chapter_title, section_title }) =>
      respond(world.listArticles(book_title, chapter_title, section_title)),
  );
}
