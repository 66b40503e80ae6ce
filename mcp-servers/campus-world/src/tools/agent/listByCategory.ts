import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerListByCategory(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "list_by_category",
    {
      title: "List By Category",
      description: "List clubs of a category, or advisors whose research matches a field or tag.",
      inputSchema: {
        category: z.string().describe("Club category, or a research field or tag for advisors"),
        entity_type: z.string().describe("'club' or 'advisor'"),
        level: z.string().optional().describe("Advisors only: 'level_1' or 'level_2' for an exact field match"),
      },
    },
    async ({ category, entity_type, level }) => respond(world.listByCategory(category, entity_type, level)),
  );
}
