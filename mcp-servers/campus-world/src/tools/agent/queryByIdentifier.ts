import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerQueryByIdentifier(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "query_by_identifier",
    {
      title: "Query By Identifier",
      description: "Show the details of one club or advisor, looked up by name or id.",
      inputSchema: {
        identifier: z.string().describe("Name or id, e.g. 'Robotics Club' or 'T001'"),
        by: z.string().describe("'name' or 'id'"),
        entity_type: z.string().describe("'club' or 'advisor'"),
      },
    },
    async ({ identifier, by, entity_type }) => respond(world.queryByIdentifier(identifier, by, entity_type)),
  );
}
