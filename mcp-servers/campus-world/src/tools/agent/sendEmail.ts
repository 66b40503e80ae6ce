import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerSendEmail(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "send_email",
    {
      title: "Send Email",
      description: "Send an email from your campus account.",
      inputSchema: {
        recipient: z.string().describe("Recipient email address"),
        subject: z.string(),
        body: z.string(),
      },
    },
    async ({ recipient, subject, body }) => respond(world.sendEmail(recipient, subject, body)),
  );
}
