// --- Time ---

export type DayOfWeek =
  | "Monday" | "Tuesday" | "Wednesday" | "Thursday" | "Friday" | "Saturday" | "Sunday";

/** A simulated calendar day, e.g. "Week 1, Saturday". */
export interface SimDate {
  week: number;
  day: DayOfWeek;
}

export interface WorldTime extends SimDate {
  /** "HH:MM", 24-hour. */
  time: string;
}

/** Half-open interval in minutes since midnight. */
export interface TimeRange {
  start: number;
  end: number;
}

// --- Map ---

export interface SubRoom {
  floor: string;
  name: string;
}

export interface BookableItem {
  item_name: string;
  seats?: string[];
  properties?: string[];
}

export interface Location {
  id: string;
  name: string;
  aliases: string[];
  zone: string;
  type: string;
  amenities: string[];
  sub_rooms: SubRoom[];
  bookable_items: BookableItem[];
}

export type EdgePropertyValue = string | boolean | string[];
export type EdgeProperties = Record<string, EdgePropertyValue>;
export type PathConstraints = Record<string, string | boolean>;

export interface Edge {
  source: string;
  target: string;
  time_cost: number;
  properties: EdgeProperties;
  one_way: boolean;
}

export interface BuildingComplex {
  name: string;
  member_ids: string[];
}

export interface CampusMap {
  locations: Location[];
  edges: Edge[];
  complexes: BuildingComplex[];
}

export interface PlannedPath {
  path: string[];
  path_names: string[];
  total_cost: number;
}

// --- Agent position ---

export interface AgentPosition {
  location_id: string;
  location_name: string;
  walk_history: string[][];
}

// --- Calendar ---

export type CalendarIdentity =
  | { kind: "self" }
  | { kind: "club"; club_id: string }
  | { kind: "advisor"; advisor_id: string }
  | { kind: "other"; calendar_id: string };

export type CalendarAction = "add" | "remove" | "update" | "view";

export interface CalendarEvent {
  event_id: string;
  calendar_id: string;
  event_title: string;
  location: string;
  date: SimDate;
  range: TimeRange;
  description?: string;
}

export interface CalendarEventDetails {
  event_title?: string;
  location?: string;
  time?: string;
  description?: string;
}

export interface ScheduleChange {
  action: "add" | "remove" | "update";
  at: string;
  event: CalendarEventView;
  original_event?: CalendarEventView;
}

/** Rendered form of an event, as returned to callers. */
export interface CalendarEventView {
  event_id: string;
  event_title: string;
  location: string;
  time: string;
  description?: string;
}

// --- Reservations ---

export interface SlotItem {
  item_name: string;
  seat_id?: string;
  properties: string[];
}

/** time_slot -> items offered in that slot, in generation order. */
export type SlotGrid = Record<string, SlotItem[]>;

export interface AvailabilitySlot extends SlotItem {
  time_slot: string;
  is_booked: boolean;
}

export interface ReservationPuzzle {
  location_id: string;
  date: string;
  time_slot: string;
  required_properties: string[];
  solution: { item_name: string; seat_id?: string }[];
  distractor_count?: number;
}

export interface PinnedAvailability {
  location_id: string;
  item_name: string;
  /** "Week N, Day, HH:MM-HH:MM" entries. */
  available_times: string[];
}

export interface Booking {
  reservation_id: number;
  location_id: string;
  item_name: string;
  seat_id: string | null;
  date: string;
  time_slot: string;
  task_id: string;
  booked_at: string;
}

// --- Courses ---

export type PassType = "S-Pass" | "A-Pass" | "B-Pass";

export interface CourseSection {
  section_id: string;
  course_code: string;
  course_name: string;
  credits: number;
  type: string;
  instructor: { id: string; name: string };
  schedule: {
    weeks: { start: number; end: number };
    days: DayOfWeek[];
    time: string;
    location: { building_id: string; building_name: string; room: string };
  };
  description: string;
  prerequisites: string[];
  popularity_index: number;
  seats_left: number;
}

export interface DraftEntry {
  section_id: string;
  assigned_pass: PassType | null;
}

export interface Enrollment {
  section_id: string;
  pass: PassType;
  round: number;
  resolved_at: string;
}

export interface SectionOutcome {
  section_id: string;
  status: "Success" | "Failed";
  reason: string;
}

export interface CourseFilters {
  credits?: string | number;
  course_code?: string;
  course_name?: string;
  type?: string;
  max_popularity?: number;
}

// --- Email ---

export interface SentEmail {
  recipient: string;
  subject: string;
  body: string;
  sent_at: string;
  task_id: string;
}

// --- Information ---

export interface Article {
  article_id: string;
  title: string;
  body: string;
}

export interface BookSection {
  section_title: string;
  articles: Article[];
}

export interface BookChapter {
  chapter_title: string;
  sections: BookSection[];
}

/** A handbook or textbook readable chapter by chapter. */
export interface Book {
  book_title: string;
  chapters: BookChapter[];
}

export interface Club {
  club_id: string;
  club_name: string;
  category: string;
  description: string;
  recruitment_info: string;
}

export interface ResearchArea {
  level_1: string;
  level_2: string;
  tags: string[];
}

export interface AdvisorProfile {
  advisor_id: string;
  name: string;
  email: string;
  research_area: ResearchArea;
  representative_work: string[];
}

export type BookStatus = "Available" | "Checked Out";

export interface LibraryBook {
  title: string;
  author: string;
  call_number: string;
  category: string;
  status: BookStatus;
  location: string;
}

export interface InformationData {
  books: Book[];
  clubs: Club[];
  advisors: AdvisorProfile[];
  library_books: LibraryBook[];
}
