import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ok } from "../../result.js";
import type { CampusWorldState } from "../../world/state.js";
import { respond } from "../respond.js";

export function registerListSentEmails(server: McpServer, world: CampusWorldState): void {
  server.registerTool(
    "list_sent_emails",
    {
      title: "List Sent Emails",
      description: "Emails the agent has sent, optionally only those sent during one task.",
      inputSchema: {
        task_id: z.string().optional(),
      },
    },
    async ({ task_id }) => {
      const emails = world.sentEmails(task_id);
      return respond(ok(`${emails.length} email(s) sent.`, { emails }));
    },
  );
}
