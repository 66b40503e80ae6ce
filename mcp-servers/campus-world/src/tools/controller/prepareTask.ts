import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { taskSetupSchema } from "../../world/changes.js";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerPrepareTask(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "prepare_task",
    {
      title: "Prepare Task",
      description: "Set the world up for the next task: day boundary if the date moves, world-state changes, start location, task id and reservation puzzle. Applied all or nothing.",
      inputSchema: taskSetupSchema.shape,
    },
    async (setup) => respond(world.prepareTask(setup)),
  );
}
