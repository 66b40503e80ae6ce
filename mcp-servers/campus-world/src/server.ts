import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { SnapshotStore } from "./snapshots.js";
import { registerAgentTools } from "./tools/agent/index.js";
import { registerControllerTools } from "./tools/controller/index.js";
import type { CampusWorldState } from "./world/state.js";

const CAMPUS_INSTRUCTIONS = `CAMPUS WORLD MCP — SESSION PROTOCOL

You are a student living on a simulated university campus. The world is
persistent: bookings, calendar events and course registrations made in one
task are still there in the next.

MOVING AROUND:
- get_current_location — you wake up at Lakeside Dormitory every day
- find_optimal_path — plan a route; constraints are hard requirements
- walk_to — walk a route exactly as find_optimal_path returned it

LOOKUPS:
- find_building_id, get_building_details, find_room_location,
  query_buildings_by_property, get_building_complex_info,
  list_valid_query_properties

CALENDAR:
- add_event, remove_event, update_event, view_schedule on 'self' or 'club_<id>'
- query_advisor_availability for 'advisor_<id>'
- Times look like 'Week 1, Monday, 14:00-16:00'

RESERVATIONS:
- query_availability, then make_booking. Bookings are permanent.

COURSES:
- browse_courses, add_course, assign_pass, view_draft, submit_draft,
  view_enrollment. A round can be submitted once.

EMAIL:
- send_email

INFORMATION:
- list_chapters, list_sections, list_articles, view_article (handbooks)
- list_by_category, query_by_identifier (clubs and advisors)
- list_books_by_category, search_books (library catalog)

Every tool answers with a message and a JSON envelope
{ status, error_code?, data? }. A failure never changes the world.`;

export interface CampusServerOptions {
  store: SnapshotStore;
  runId: string;
  /** Also expose clock, world-change and checkpoint tools. */
  controllerTools: boolean;
}

export function createCampusServer(world: CampusWorldState, options: CampusServerOptions): McpServer {
  const server = new McpServer(
    { name: "campus-world", version: "1.0.0" },
    {
      capabilities: { logging: {} },
      instructions: CAMPUS_INSTRUCTIONS,
    },
  );

  registerAgentTools(server, world);
  if (options.controllerTools) {
    registerControllerTools(server, world, options.store, options.runId);
  }
  return server;
}
