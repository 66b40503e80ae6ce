import { CALENDAR_PERMISSIONS } from "../constants.js";
import type { CalendarAction, CalendarIdentity } from "../types.js";

export function identityOf(calendarId: string): CalendarIdentity {
  if (calendarId === "self") return { kind: "self" };
  if (calendarId.startsWith("club_")) return { kind: "club", club_id: calendarId.slice("club_".length) };
  if (calendarId.startsWith("advisor_")) return { kind: "advisor", advisor_id: calendarId.slice("advisor_".length) };
  return { kind: "other", calendar_id: calendarId };
}

export function canPerform(identity: CalendarIdentity, action: CalendarAction): boolean {
  return CALENDAR_PERMISSIONS[identity.kind].includes(action);
}
