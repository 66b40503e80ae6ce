import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerFindOptimalPath(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "find_optimal_path",
    {
      title: "Find Optimal Path",
      description: "Lowest-cost walking route between two buildings. Constraints are hard: every path segment must satisfy them (e.g. {\"rain_exposure\": \"Covered\"}). Only routes returned here can be walked.",
      inputSchema: {
        source_building_id: z.string(),
        target_building_id: z.string(),
        constraints: z.record(z.union([z.string(), z.boolean()])).optional()
          .describe("Edge property requirements, e.g. {\"accessibility\": \"wheelchair\"}"),
      },
    },
    async ({ source_building_id, target_building_id, constraints }) =>
      respond(world.findOptimalPath(source_building_id, target_building_id, constraints ?? {})),
  );
}
