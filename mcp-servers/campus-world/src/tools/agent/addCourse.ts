import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerAddCourse(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "add_course",
    {
      title: "Add Course to Draft",
      description: "Add a course section to the draft schedule.",
      inputSchema: { section_id: z.string() },
    },
    async ({ section_id }) => respond(world.addCourse(section_id)),
  );
}
