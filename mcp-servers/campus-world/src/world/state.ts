import { DEFAULT_START, SNAPSHOT_VERSION } from "../constants.js";
import { fail, internalError, isSuccess, ok, WorldStateError, type OpResult } from "../result.js";
import type {
  AgentPosition, Booking, CalendarEventDetails, CampusMap, CourseFilters, CourseSection, InformationData,
  PathConstraints, ReservationPuzzle, ScheduleChange, SentEmail, WorldTime,
} from "../types.js";
import { formatSimDate, formatWorldTime, parseSimDate, parseWorldTime, sameDate } from "../validation.js";
import { AvailabilityEngine, type AvailabilitySnapshot } from "./availability.js";
import { BookingLedger } from "./bookings.js";
import { CalendarStore, type CalendarSnapshot } from "./calendar.js";
import {
  applyWorldChange, taskSetupSchema, worldChangeSchema, type ParsedTaskSetup, type TaskSetup,
} from "./changes.js";
import { dailyAnnouncement, timePrompt, WorldClock } from "./clock.js";
import { CourseCatalog, DraftRegistrar, type RegistrationSnapshot } from "./courses.js";
import { EmailOutbox } from "./email.js";
import { InformationDesk } from "./information.js";
import { LocationTracker } from "./location.js";
import { MapGraph } from "./map.js";

export interface WorldOptions {
  map: CampusMap;
  courses: CourseSection[];
  information: InformationData;
  seed: string;
  /** "Week N, Day, HH:MM"; defaults to the first Monday morning. */
  start?: string;
}

export interface WorldSnapshot {
  version: number;
  seed: string;
  clock: WorldTime;
  task_id: string;
  position: AgentPosition;
  issued_paths: string[][];
  calendar: CalendarSnapshot;
  availability: AvailabilitySnapshot;
  bookings: Booking[];
  registration: RegistrationSnapshot;
  emails: SentEmail[];
}

export interface DayStart {
  date: string;
  now: string;
  announcement: string;
  day_changed: boolean;
}

export interface TaskPrepared {
  task_id: string;
  now: string;
  day_changed: boolean;
  announcement: string | null;
  applied_changes: number;
}

/**
 * The whole persistent world of one evaluation run. Every operation reads
 * substate, validates, mutates only when valid, and answers with an OpResult.
 */
export class CampusWorldState {
  readonly seed: string;
  readonly map: MapGraph;
  private readonly clock: WorldClock;
  private readonly location: LocationTracker;
  private readonly calendar: CalendarStore;
  private readonly ledger = new BookingLedger();
  private readonly availability: AvailabilityEngine;
  private readonly catalog: CourseCatalog;
  private readonly registrar: DraftRegistrar;
  private readonly outbox: EmailOutbox;
  private readonly information: InformationDesk;
  private taskId = "";

  constructor(options: WorldOptions) {
    const start = parseWorldTime(options.start ?? DEFAULT_START);
    if (!start) throw new WorldStateError(`Invalid start time '${options.start}'.`);

    this.seed = options.seed;
    this.map = new MapGraph(options.map);
    this.clock = new WorldClock(start);
    this.location = new LocationTracker(this.map);

    const now = () => this.clock.toString();
    const taskId = () => this.taskId;
    this.calendar = new CalendarStore(now);
    this.availability = new AvailabilityEngine(this.map, this.ledger, this.seed, { taskId, now });
    this.catalog = new CourseCatalog(options.courses);
    this.registrar = new DraftRegistrar(this.catalog, now);
    this.outbox = new EmailOutbox({ taskId, now });
    this.information = new InformationDesk(options.information);
  }

  private guard<T>(operation: string, fn: () => OpResult<T>): OpResult<T> {
    try {
      return fn();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[campus] ${operation} failed:`, err);
      return internalError(`Failed to ${operation}: ${reason}`);
    }
  }

  currentTaskId(): string {
    return this.taskId;
  }

  // -------------------------------------------------------------------------
  // Map and movement
  // -------------------------------------------------------------------------

  findBuildingId(name: string) {
    return this.guard("find building id", () => this.map.findBuildingId(name));
  }

  getBuildingDetails(buildingId: string) {
    return this.guard("get building details", () => this.map.getBuildingDetails(buildingId));
  }

  findRoomLocation(roomQuery: string, buildingId?: string, zone?: string) {
    return this.guard("find room location", () => this.map.findRoomLocation(roomQuery, buildingId, zone));
  }

  queryBuildingsByProperty(filters: { zone?: string; building_type?: string; amenity?: string }) {
    return this.guard("query buildings", () => this.map.queryBuildingsByProperty(filters));
  }

  getBuildingComplexInfo(buildingId: string) {
    return this.guard("get building complex info", () => this.map.getBuildingComplexInfo(buildingId));
  }

  listValidQueryProperties() {
    return this.guard("list query properties", () => this.map.listValidQueryProperties());
  }

  findOptimalPath(source: string, target: string, constraints: PathConstraints = {}) {
    return this.guard("find optimal path", () => {
      const result = this.map.planPath(source, target, constraints);
      if (result.data) this.location.recordIssuedPath(result.data.path);
      return result;
    });
  }

  walkTo(path: string[]) {
    return this.guard("walk", () => this.location.walkTo(path));
  }

  getCurrentLocation() {
    return this.guard("get current location", () => this.location.getCurrentLocation());
  }

  position(): AgentPosition {
    return this.location.current();
  }

  // -------------------------------------------------------------------------
  // Calendar
  // -------------------------------------------------------------------------

  addEvent(calendarId: string, eventTitle: string, location: string, time: string, description?: string) {
    return this.guard("add event", () => this.calendar.addEvent(calendarId, eventTitle, location, time, description));
  }

  removeEvent(calendarId: string, eventId: string) {
    return this.guard("remove event", () => this.calendar.removeEvent(calendarId, eventId));
  }

  updateEvent(calendarId: string, eventId: string, details: CalendarEventDetails) {
    return this.guard("update event", () => this.calendar.updateEvent(calendarId, eventId, details));
  }

  viewSchedule(calendarId: string, date: string) {
    return this.guard("view schedule", () => this.calendar.viewSchedule(calendarId, date));
  }

  queryAdvisorAvailability(advisorId: string, date: string) {
    return this.guard("query advisor availability", () => this.calendar.queryAdvisorAvailability(advisorId, date));
  }

  drainScheduleChanges(): ScheduleChange[] {
    return this.calendar.drainSelfChanges();
  }

  // -------------------------------------------------------------------------
  // Reservations
  // -------------------------------------------------------------------------

  queryAvailability(locationId: string, date: string) {
    return this.guard("query availability", () => this.availability.queryAvailability(locationId, date));
  }

  makeBooking(locationId: string, itemName: string, date: string, timeSlot: string, seatId?: string) {
    return this.guard("make booking", () =>
      this.availability.makeBooking(locationId, itemName, date, timeSlot, seatId));
  }

  designatePuzzle(puzzle: ReservationPuzzle) {
    return this.guard("set reservation puzzle", () => this.availability.designatePuzzle(puzzle));
  }

  listReservations(taskId?: string): OpResult<{ reservations: Booking[] }> {
    const reservations = this.ledger.list(taskId);
    const scope = taskId === undefined ? "" : ` for task '${taskId}'`;
    return ok(`${reservations.length} reservation(s)${scope}.`, { reservations });
  }

  // -------------------------------------------------------------------------
  // Courses
  // -------------------------------------------------------------------------

  browseCourses(filters?: CourseFilters) {
    return this.guard("browse courses", () => this.catalog.browse(filters));
  }

  addCourse(sectionId: string) {
    return this.guard("add course", () => this.registrar.addCourse(sectionId));
  }

  removeCourse(sectionId: string) {
    return this.guard("remove course", () => this.registrar.removeCourse(sectionId));
  }

  assignPass(sectionId: string, passType: string) {
    return this.guard("assign pass", () => this.registrar.assignPass(sectionId, passType));
  }

  viewDraft() {
    return this.guard("view draft", () => this.registrar.viewDraft());
  }

  submitDraft() {
    return this.guard("submit draft", () => this.registrar.submitDraft());
  }

  viewEnrollment() {
    return this.guard("view enrollment", () => this.registrar.viewEnrollment());
  }

  // -------------------------------------------------------------------------
  // Email
  // -------------------------------------------------------------------------

  sendEmail(recipient: string, subject: string, body: string) {
    return this.guard("send email", () => this.outbox.sendEmail(recipient, subject, body));
  }

  sentEmails(taskId?: string): SentEmail[] {
    return this.outbox.list(taskId);
  }

  // -------------------------------------------------------------------------
  // Information
  // -------------------------------------------------------------------------

  listChapters(bookTitle: string) {
    return this.guard("list chapters", () => this.information.listChapters(bookTitle));
  }

  listSections(bookTitle: string, chapterTitle: string) {
    return this.guard("list sections", () => this.information.listSections(bookTitle, chapterTitle));
  }

  listArticles(bookTitle: string, chapterTitle: string, sectionTitle: string) {
    return this.guard("list articles", () => this.information.listArticles(bookTitle, chapterTitle, sectionTitle));
  }

  viewArticle(identifier: string, by: string) {
    return this.guard("view article", () => this.information.viewArticle(identifier, by));
  }

  listByCategory(category: string, entityType: string, level?: string) {
    return this.guard("list by category", () => this.information.listByCategory(category, entityType, level));
  }

  queryByIdentifier(identifier: string, by: string, entityType: string) {
    return this.guard("query by identifier", () => this.information.queryByIdentifier(identifier, by, entityType));
  }

  listBooksByCategory(category: string) {
    return this.guard("list books by category", () => this.information.listBooksByCategory(category));
  }

  searchBooks(query: string, searchType?: string) {
    return this.guard("search books", () => this.information.searchBooks(query, searchType));
  }

  // -------------------------------------------------------------------------
  // Time and controller operations
  // -------------------------------------------------------------------------

  now(): OpResult<{ now: string; prompt: string }> {
    const now = this.clock.now();
    return ok(`Current world time: ${formatWorldTime(now)}.`, { now: formatWorldTime(now), prompt: timePrompt(now.time) });
  }

  /** Moves the clock forward. Landing on a later date is a day boundary. */
  advanceTime(time: string): OpResult<{ now: string; day_changed: boolean }> {
    return this.guard("advance time", () => {
      const target = parseWorldTime(time);
      if (!target) return fail("VALIDATION", `Invalid time '${time}'. Expected a format like 'Week 1, Monday, 14:00'.`);
      const dayChanged = !sameDate(target, this.clock.today());
      const moved = this.clock.advanceTo(target);
      if (!isSuccess(moved)) return fail("VALIDATION", moved.message);
      if (dayChanged) this.location.dailyReset();
      return ok(moved.message, { now: this.clock.toString(), day_changed: dayChanged });
    });
  }

  /** Starts `date` at 08:00 and sends the agent home. Same date: no-op. */
  beginDay(date: string): OpResult<DayStart> {
    return this.guard("begin day", () => {
      const day = parseSimDate(date);
      if (!day) return fail("VALIDATION", `Invalid date '${date}'. Expected a format like 'Week 1, Monday'.`);
      const announcement = dailyAnnouncement(day);
      if (sameDate(day, this.clock.today())) {
        return ok(announcement, { date: formatSimDate(day), now: this.clock.toString(), announcement, day_changed: false });
      }
      const started = this.clock.startDay(day);
      if (!isSuccess(started)) return fail("VALIDATION", started.message);
      this.location.dailyReset();
      return ok(announcement, { date: formatSimDate(day), now: this.clock.toString(), announcement, day_changed: true });
    });
  }

  setLocation(buildingId: string) {
    return this.guard("set location", () => this.location.setLocation(buildingId));
  }

  setTaskId(taskId: string): OpResult<{ task_id: string }> {
    if (!taskId) return fail("VALIDATION", "task_id is required.");
    this.taskId = taskId;
    return ok(`Current task is '${taskId}'.`, { task_id: taskId });
  }

  applyChange(change: unknown): OpResult<unknown> {
    return this.guard("apply world change", () => {
      const parsed = worldChangeSchema.safeParse(change);
      if (!parsed.success) return fail("VALIDATION", `Invalid world change: ${parsed.error.issues[0]?.message ?? "unknown shape"}.`);
      return applyWorldChange(this.changeTargets(), parsed.data);
    });
  }

  private changeTargets() {
    return {
      catalog: this.catalog,
      registrar: this.registrar,
      calendar: this.calendar,
      availability: this.availability,
    };
  }

  /**
   * Everything that happens between two tasks: the day boundary when the
   * date moves, world changes, start location, task id and reservation
   * puzzle. All or nothing.
   */
  prepareTask(setup: TaskSetup): OpResult<TaskPrepared> {
    return this.guard<TaskPrepared>("prepare task", () => {
      const parsed = taskSetupSchema.safeParse(setup);
      if (!parsed.success) {
        return fail("VALIDATION", `Invalid task setup: ${parsed.error.issues[0]?.message ?? "unknown shape"}.`);
      }
      const before = this.snapshot();
      try {
        const prepared = this.runTask(parsed.data);
        if (!isSuccess(prepared)) this.restore(before);
        return prepared;
      } catch (err) {
        this.restore(before);
        throw err;
      }
    });
  }

  private runTask(task: ParsedTaskSetup): OpResult<TaskPrepared> {
    const failed = (result: OpResult<unknown>): OpResult<TaskPrepared> =>
      result.error_code && result.error_code !== "INTERNAL"
        ? fail(result.error_code, result.message)
        : internalError(result.message);

    let announcement: string | null = null;
    let dayChanged = false;
    if (task.date !== undefined) {
      const started = this.beginDay(task.date);
      if (!isSuccess(started) || !started.data) return failed(started);
      dayChanged = started.data.day_changed;
      if (dayChanged) announcement = started.data.announcement;
    }

    for (const change of task.world_state_changes) {
      const applied = applyWorldChange(this.changeTargets(), change);
      if (!isSuccess(applied)) return failed(applied);
    }

    if (task.source_location !== undefined) {
      const placed = this.location.setLocation(task.source_location);
      if (!isSuccess(placed)) return failed(placed);
    }

    this.taskId = task.task_id;

    if (task.reservation_puzzle) {
      const designated = this.availability.designatePuzzle(task.reservation_puzzle);
      if (!isSuccess(designated)) return failed(designated);
    }

    return ok(`Task '${task.task_id}' is ready at ${this.clock.toString()}.`, {
      task_id: task.task_id,
      now: this.clock.toString(),
      day_changed: dayChanged,
      announcement,
      applied_changes: task.world_state_changes.length,
    });
  }

  // -------------------------------------------------------------------------
  // Checkpoints
  // -------------------------------------------------------------------------

  snapshot(): WorldSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      seed: this.seed,
      clock: this.clock.now(),
      task_id: this.taskId,
      position: this.location.current(),
      issued_paths: this.location.issued(),
      calendar: this.calendar.snapshot(),
      availability: this.availability.snapshot(),
      bookings: this.ledger.list(),
      registration: { live: this.catalog.liveState(), ...this.registrar.snapshot() },
      emails: this.outbox.list(),
    };
  }

  restore(snapshot: WorldSnapshot): OpResult<{ now: string }> {
    if (snapshot.version !== SNAPSHOT_VERSION) {
      return fail("VALIDATION", `Unsupported snapshot version ${snapshot.version}; expected ${SNAPSHOT_VERSION}.`);
    }
    if (snapshot.seed !== this.seed) {
      return fail("VALIDATION", `Snapshot was taken with seed '${snapshot.seed}', this world uses '${this.seed}'.`);
    }
    if (!this.map.has(snapshot.position.location_id)) {
      return fail("VALIDATION", `Snapshot places the agent at unknown location '${snapshot.position.location_id}'.`);
    }

    this.clock.restore(snapshot.clock);
    this.taskId = snapshot.task_id;
    this.location.restore(snapshot.position, snapshot.issued_paths);
    this.calendar.restore(snapshot.calendar);
    this.availability.restore(snapshot.availability);
    this.ledger.restore(snapshot.bookings);
    this.catalog.restoreLive(snapshot.registration.live);
    this.registrar.restore(snapshot.registration);
    this.outbox.restore(snapshot.emails);
    return ok(`World restored to ${this.clock.toString()}.`, { now: this.clock.toString() });
  }
}
