import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerBrowseCourses(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "browse_courses",
    {
      title: "Browse Courses",
      description: "List course sections with their current popularity. All filters are optional.",
      inputSchema: {
        filters: z.object({
          credits: z.union([z.string(), z.number()]).optional().describe("A number, or a comparison such as '<=3'"),
          course_code: z.string().optional(),
          course_name: z.string().optional(),
          type: z.string().optional(),
          max_popularity: z.number().int().optional(),
        }).optional(),
      },
    },
    async ({ filters }) => respond(world.browseCourses(filters)),
  );
}
