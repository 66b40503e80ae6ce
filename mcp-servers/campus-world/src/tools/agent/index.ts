import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CampusWorldState } from "../../world/state.js";
import { registerFindBuildingId } from "./findBuildingId.js";
import { registerGetBuildingDetails } from "./getBuildingDetails.js";
import { registerFindRoomLocation } from "./findRoomLocation.js";
import { registerQueryBuildingsByProperty } from "./queryBuildingsByProperty.js";
import { registerGetBuildingComplexInfo } from "./getBuildingComplexInfo.js";
import { registerListValidQueryProperties } from "./listValidQueryProperties.js";
import { registerFindOptimalPath } from "./findOptimalPath.js";
import { registerGetCurrentLocation } from "./getCurrentLocation.js";
import { registerWalkTo } from "./walkTo.js";
import { registerAddEvent } from "./addEvent.js";
import { registerRemoveEvent } from "./removeEvent.js";
import { registerUpdateEvent } from "./updateEvent.js";
import { registerViewSchedule } from "./viewSchedule.js";
import { registerQueryAdvisorAvailability } from "./queryAdvisorAvailability.js";
import { registerQueryAvailability } from "./queryAvailability.js";
import { registerMakeBooking } from "./makeBooking.js";
import { registerBrowseCourses } from "./browseCourses.js";
import { registerAddCourse } from "./addCourse.js";
import { registerRemoveCourse } from "./removeCourse.js";
import { registerAssignPass } from "./assignPass.js";
import { registerViewDraft } from "./viewDraft.js";
import { registerSubmitDraft } from "./submitDraft.js";
import { registerViewEnrollment } from "./viewEnrollment.js";
import { registerSendEmail } from "./sendEmail.js";
import { registerListChapters } from "./listChapters.js";
import { registerListSections } from "./listSections.js";
import { registerListArticles } from "./listArticles.js";
import { registerViewArticle } from "./viewArticle.js";
import { registerListByCategory } from "./listByCategory.js";
import { registerQueryByIdentifier } from "./queryByIdentifier.js";
import { registerListBooksByCategory } from "./listBooksByCategory.js";
import { registerSearchBooks } from "./searchBooks.js";

export function registerAgentTools(server: McpServer, world: CampusWorldState): void {
  registerFindBuildingId(server, world);
  registerGetBuildingDetails(server, world);
  registerFindRoomLocation(server, world);
  registerQueryBuildingsByProperty(server, world);
  registerGetBuildingComplexInfo(server, world);
  registerListValidQueryProperties(server, world);
  registerFindOptimalPath(server, world);
  registerGetCurrentLocation(server, world);
  registerWalkTo(server, world);
  registerAddEvent(server, world);
  registerRemoveEvent(server, world);
  registerUpdateEvent(server, world);
  registerViewSchedule(server, world);
  registerQueryAdvisorAvailability(server, world);
  registerQueryAvailability(server, world);
  registerMakeBooking(server, world);
  registerBrowseCourses(server, world);
  registerAddCourse(server, world);
  registerRemoveCourse(server, world);
  registerAssignPass(server, world);
  registerViewDraft(server, world);
  registerSubmitDraft(server, world);
  registerViewEnrollment(server, world);
  registerSendEmail(server, world);
  registerListChapters(server, world);
  registerListSections(server, world);
  registerListArticles(server, world);
  registerViewArticle(server, world);
  registerListByCategory(server, world);
  registerQueryByIdentifier(server, world);
  registerListBooksByCategory(server, world);
  registerSearchBooks(server, world);
}
