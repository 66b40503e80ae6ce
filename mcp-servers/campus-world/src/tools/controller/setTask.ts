import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerSetTask(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "set_task",
    {
      title: "Set Current Task",
      description: "Record the task id that new bookings and emails are attributed to.",
      inputSchema: {
        task_id: z.string(),
      },
    },
    async ({ task_id }) => respond(world.setTaskId(task_id)),
  );
}
