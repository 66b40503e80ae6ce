import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerAssignPass(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "assign_pass",
    {
      title: "Assign Pass",
      description: "Attach a registration pass to a drafted section. S-Pass always succeeds, A-Pass needs popularity below 95, B-Pass below 85.",
      inputSchema: {
        section_id: z.string(),
        pass_type: z.string().describe("'S-Pass', 'A-Pass' or 'B-Pass'"),
      },
    },
    async ({ section_id, pass_type }) => respond(world.assignPass(section_id, pass_type)),
  );
}
