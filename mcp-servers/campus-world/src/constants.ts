import type { CalendarAction, DayOfWeek, PassType } from "./types.js";

export const DAYS_OF_WEEK: DayOfWeek[] = [
  "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday",
];

// Where the agent wakes up every simulated day
export const DEFAULT_LOCATION_ID = "B083";
export const DEFAULT_LOCATION_NAME = "Lakeside Dormitory";

export const DEFAULT_START = "Week 1, Monday, 08:00";
export const DAY_START_TIME = "08:00";

// Permission table for calendar identity kinds.
// Advisor calendars are read only through query_advisor_availability.
export const CALENDAR_PERMISSIONS: Record<"self" | "club" | "advisor" | "other", CalendarAction[]> = {
  self: ["add", "remove", "update", "view"],
  club: ["add", "view"],
  advisor: [],
  other: ["view"],
};

// Advisor working window, one-hour slots, lunch excluded
export const ADVISOR_WORKING_SLOTS = [
  "09:00-10:00", "10:00-11:00", "11:00-12:00",
  "13:00-14:00", "14:00-15:00", "15:00-16:00", "16:00-17:00",
];

// Slots every generated reservation grid offers
export const RESERVATION_TIME_SLOTS = [
  "09:00-10:30", "10:30-12:00", "14:00-15:30", "15:30-17:00", "16:30-18:00",
];

export const ITEM_PROPERTIES = ["good_wifi", "projector", "whiteboard", "quiet"];

// Fallback item names when a location declares no bookable items
export const ITEM_TEMPLATES = ["Study Room", "Meeting Room", "Conference Room", "Seminar Room"];

export const MIN_ITEMS_PER_SLOT = 1;
export const MAX_ITEMS_PER_SLOT = 3;
export const DEFAULT_DISTRACTOR_COUNT = 2;
export const MAX_DISTRACTORS = 12;

// Pass type -> popularity must be strictly below this to enroll (null: always)
export const PASS_THRESHOLDS: Record<PassType, number | null> = {
  "S-Pass": null,
  "A-Pass": 95,
  "B-Pass": 85,
};

export const PASS_TYPES: PassType[] = ["S-Pass", "A-Pass", "B-Pass"];

export const SNAPSHOT_VERSION = 1;
