import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerRemoveCourse(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "remove_course",
    {
      title: "Remove Course from Draft",
      description: "Remove a course section from the draft schedule.",
      inputSchema: { section_id: z.string() },
    },
    async ({ section_id }) => respond(world.removeCourse(section_id)),
  );
}
