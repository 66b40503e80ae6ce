import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerListSections(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "list_sections",
    {
      title: "List Sections",
      description: "List the sections of one chapter of a book.",
      inputSchema: {
        book_title: z.string(),
        chapter_title: z.string().describe("Full chapter title as listed by list_chapters"),
      },
    },
    async ({ book_title, chapter_title }) => respond(world.listSections(book_title, chapter_title)),
  );
}
