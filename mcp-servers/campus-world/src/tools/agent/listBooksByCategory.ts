import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerListBooksByCategory(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "list_books_by_category",
    {
      title: "List Books By Category",
      description: "List library books of one subject category with their call numbers and status.",
      inputSchema: {
        category: z.string().describe("e.g. 'Computer Science'"),
      },
    },
    async ({ category }) => respond(world.listBooksByCategory(category)),
  );
}
