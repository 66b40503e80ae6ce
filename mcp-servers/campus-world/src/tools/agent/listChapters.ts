import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerListChapters(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "list_chapters",
    {
      title: "List Chapters",
      description: "List the chapters of a campus handbook or textbook.",
      inputSchema: {
        book_title: z.string().describe("Full title of the book, e.g. 'Student Handbook'"),
      },
    },
    async ({ book_title }) => respond(world.listChapters(book_title)),
  );
}
