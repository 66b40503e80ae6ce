import { PASS_THRESHOLDS, PASS_TYPES } from "../constants.js";
import { fail, ok, type OpResult } from "../result.js";
import type {
  CourseFilters, CourseSection, DraftEntry, Enrollment, PassType, SectionOutcome,
} from "../types.js";
import { isPassType, matchesCreditFilter, parseCreditFilter, validatePopularity } from "../validation.js";

export interface CourseLiveState {
  popularity_index: number;
  seats_left: number;
}

export interface RegistrationSnapshot {
  live: Record<string, CourseLiveState>;
  draft: DraftEntry[];
  enrollment: Enrollment[];
  round: number;
  finalized: boolean;
}

export interface DraftView {
  round: number;
  finalized: boolean;
  courses: { section_id: string; course_name: string; assigned_pass: PassType | null }[];
}

export interface SubmitOutcome {
  round: number;
  total_courses: number;
  successful: number;
  results: SectionOutcome[];
}

/** True when a section at `popularity` admits a student holding `pass`. */
export function passSucceeds(pass: PassType, popularity: number): boolean {
  const threshold = PASS_THRESHOLDS[pass];
  return threshold === null || popularity < threshold;
}

function formatSection(s: CourseSection): string {
  const { weeks, days, time, location } = s.schedule;
  return [
    `- ${s.section_id} ${s.course_code}: ${s.course_name} (Credits: ${s.credits}, Popularity: ${s.popularity_index}, Seats left: ${s.seats_left})`,
    `  Instructor: ${s.instructor.name}`,
    `  Schedule: Weeks ${weeks.start}-${weeks.end}, ${days.join(", ")}, ${time}`,
    `  Location: ${location.building_name}, ${location.room}`,
  ].join("\n");
}

/**
 * Static section data plus the two values the controller may move between
 * tasks: popularity and seats left.
 */
export class CourseCatalog {
  private readonly sections = new Map<string, CourseSection>();
  private readonly live = new Map<string, CourseLiveState>();

  constructor(sections: CourseSection[]) {
    for (const s of sections) {
      this.sections.set(s.section_id, s);
      this.live.set(s.section_id, { popularity_index: s.popularity_index, seats_left: s.seats_left });
    }
  }

  has(sectionId: string): boolean {
    return this.sections.has(sectionId);
  }

  /** Section record with its current live values. */
  get(sectionId: string): CourseSection | undefined {
    const section = this.sections.get(sectionId);
    if (!section) return undefined;
    const live = this.live.get(sectionId);
    return live ? { ...section, ...live } : { ...section };
  }

  popularityOf(sectionId: string): number | undefined {
    return this.live.get(sectionId)?.popularity_index;
  }

  browse(filters: CourseFilters = {}): OpResult<{ courses: CourseSection[] }> {
    const credit = filters.credits !== undefined ? parseCreditFilter(filters.credits) : null;
    if (filters.credits !== undefined && !credit) {
      return fail("VALIDATION", `Invalid credits filter '${filters.credits}'. Use a number or a form like '<=3'.`);
    }
    if (filters.max_popularity !== undefined && !validatePopularity(filters.max_popularity)) {
      return fail("VALIDATION", "max_popularity must be an integer between 0 and 100.");
    }

    const courses: CourseSection[] = [];
    for (const id of this.sections.keys()) {
      const s = this.get(id);
      if (!s) continue;
      if (credit && !matchesCreditFilter(s.credits, credit)) continue;
      if (filters.course_code !== undefined && !s.course_code.includes(filters.course_code)) continue;
      if (filters.course_name !== undefined &&
        !s.course_name.toLowerCase().includes(filters.course_name.toLowerCase())) continue;
      if (filters.type !== undefined && s.type.toLowerCase() !== filters.type.toLowerCase()) continue;
      if (filters.max_popularity !== undefined && s.popularity_index > filters.max_popularity) continue;
      courses.push(s);
    }

    if (courses.length === 0) return fail("NOT_FOUND", "No courses found matching the specified criteria.");
    const message = [`Found ${courses.length} course(s):`, ...courses.map(formatSection)].join("\n");
    return ok(message, { courses });
  }

  updatePopularity(sectionId: string, value: number): OpResult<CourseLiveState & { section_id: string }> {
    const live = this.live.get(sectionId);
    if (!live) return fail("NOT_FOUND", `Course section '${sectionId}' does not exist.`);
    if (!validatePopularity(value)) return fail("VALIDATION", "Popularity must be an integer between 0 and 100.");
    live.popularity_index = value;
    return ok(`Popularity of ${sectionId} is now ${value}.`, { section_id: sectionId, ...live });
  }

  updateSeats(sectionId: string, value: number): OpResult<CourseLiveState & { section_id: string }> {
    const live = this.live.get(sectionId);
    if (!live) return fail("NOT_FOUND", `Course section '${sectionId}' does not exist.`);
    if (!Number.isInteger(value) || value < 0) return fail("VALIDATION", "seats_left must be a non-negative integer.");
    live.seats_left = value;
    return ok(`Seats left in ${sectionId}: ${value}.`, { section_id: sectionId, ...live });
  }

  liveState(): Record<string, CourseLiveState> {
    return Object.fromEntries([...this.live].map(([k, v]) => [k, { ...v }]));
  }

  restoreLive(live: Record<string, CourseLiveState>): void {
    for (const [id, state] of Object.entries(live)) {
      if (this.sections.has(id)) this.live.set(id, { ...state });
    }
  }
}

/**
 * Draft-and-commit registration. A successful submit finalizes the current
 * round; only the controller opens the next one.
 */
export class DraftRegistrar {
  private draft: DraftEntry[] = [];
  private enrollment: Enrollment[] = [];
  private round = 1;
  private finalized = false;

  constructor(
    private readonly catalog: CourseCatalog,
    private readonly now: () => string,
  ) {}

  private finalizedFailure<T>(): OpResult<T> {
    return fail(
      "ALREADY_FINALIZED",
      `Registration round ${this.round} has already been submitted. Wait for the next registration round.`,
    );
  }

  addCourse(sectionId: string): OpResult<{ section_id: string; draft_count: number }> {
    if (!sectionId) return fail("VALIDATION", "Section ID is required.");
    if (this.finalized) return this.finalizedFailure();
    if (!this.catalog.has(sectionId)) return fail("NOT_FOUND", `Course section '${sectionId}' does not exist.`);
    if (this.draft.some(e => e.section_id === sectionId)) {
      return fail("CONFLICT", `Course section '${sectionId}' is already in your draft schedule.`);
    }
    if (this.enrollment.some(e => e.section_id === sectionId)) {
      return fail("CONFLICT", `You are already enrolled in '${sectionId}'.`);
    }
    this.draft.push({ section_id: sectionId, assigned_pass: null });
    return ok(`Course section '${sectionId}' has been successfully added to your draft schedule.`, {
      section_id: sectionId,
      draft_count: this.draft.length,
    });
  }

  removeCourse(sectionId: string): OpResult<{ section_id: string; draft_count: number }> {
    if (!sectionId) return fail("VALIDATION", "Section ID is required.");
    if (this.finalized) return this.finalizedFailure();
    if (!this.draft.some(e => e.section_id === sectionId)) {
      return fail("NOT_FOUND", `Course section '${sectionId}' is not in your draft schedule.`);
    }
    this.draft = this.draft.filter(e => e.section_id !== sectionId);
    return ok(`Course section '${sectionId}' has been successfully removed from your draft schedule.`, {
      section_id: sectionId,
      draft_count: this.draft.length,
    });
  }

  assignPass(sectionId: string, passType: string): OpResult<{ section_id: string; pass_type: PassType }> {
    if (!sectionId || !passType) return fail("VALIDATION", "Both section ID and pass type are required.");
    if (!isPassType(passType)) {
      return fail("VALIDATION", `Pass type must be one of ${PASS_TYPES.map(p => `'${p}'`).join(", ")}.`);
    }
    if (this.finalized) return this.finalizedFailure();
    const entry = this.draft.find(e => e.section_id === sectionId);
    if (!entry) return fail("NOT_FOUND", `Course section '${sectionId}' is not in your draft schedule.`);
    entry.assigned_pass = passType;
    return ok(`Pass type '${passType}' has been successfully assigned to '${sectionId}'.`, {
      section_id: sectionId,
      pass_type: passType,
    });
  }

  viewDraft(): OpResult<DraftView> {
    const courses = this.draft.map(e => ({
      section_id: e.section_id,
      course_name: this.catalog.get(e.section_id)?.course_name ?? "Unknown Course",
      assigned_pass: e.assigned_pass,
    }));
    const view: DraftView = { round: this.round, finalized: this.finalized, courses };
    if (courses.length === 0) return ok("Your draft schedule is empty.", view);
    const lines = ["Your current draft schedule:"];
    for (const c of courses) {
      lines.push(`- ${c.section_id}: ${c.course_name} (${c.assigned_pass ? `Pass: ${c.assigned_pass}` : "No pass assigned"})`);
    }
    return ok(lines.join("\n"), view);
  }

  submitDraft(): OpResult<SubmitOutcome> {
    if (this.finalized) return this.finalizedFailure();
    if (this.draft.length === 0) return fail("VALIDATION", "Cannot submit an empty draft schedule.");

    const resolvedAt = this.now();
    const results: SectionOutcome[] = [];
    const admitted: Enrollment[] = [];
    for (const entry of this.draft) {
      const popularity = this.catalog.popularityOf(entry.section_id);
      if (!entry.assigned_pass) {
        results.push({ section_id: entry.section_id, status: "Failed", reason: "No pass assigned" });
      } else if (popularity === undefined) {
        results.push({ section_id: entry.section_id, status: "Failed", reason: "Course not found" });
      } else if (passSucceeds(entry.assigned_pass, popularity)) {
        results.push({ section_id: entry.section_id, status: "Success", reason: `Registered with ${entry.assigned_pass}` });
        admitted.push({ section_id: entry.section_id, pass: entry.assigned_pass, round: this.round, resolved_at: resolvedAt });
      } else {
        results.push({
          section_id: entry.section_id,
          status: "Failed",
          reason: `Course too popular for ${entry.assigned_pass} (popularity: ${popularity})`,
        });
      }
    }

    this.enrollment.push(...admitted);
    this.draft = [];
    this.finalized = true;

    const lines = [`Registration completed! ${admitted.length}/${results.length} courses successfully registered:`];
    for (const r of results) {
      lines.push(`${r.status === "Success" ? "[SUCCESS]" : "[FAILED]"} ${r.section_id}: ${r.status} - ${r.reason}`);
    }
    return ok(lines.join("\n"), {
      round: this.round,
      total_courses: results.length,
      successful: admitted.length,
      results,
    });
  }

  viewEnrollment(): OpResult<{ enrollment: Enrollment[] }> {
    const enrollment = this.enrollment.map(e => ({ ...e }));
    if (enrollment.length === 0) return ok("You are not enrolled in any course yet.", { enrollment });
    const lines = [`You are enrolled in ${enrollment.length} course section(s):`];
    for (const e of enrollment) {
      const name = this.catalog.get(e.section_id)?.course_name ?? "Unknown Course";
      lines.push(`- ${e.section_id}: ${name} (${e.pass}, round ${e.round})`);
    }
    return ok(lines.join("\n"), { enrollment });
  }

  /** Starts a new registration round with an empty draft. */
  openRound(): OpResult<{ round: number }> {
    this.round += 1;
    this.finalized = false;
    this.draft = [];
    return ok(`Registration round ${this.round} is open.`, { round: this.round });
  }

  snapshot(): Omit<RegistrationSnapshot, "live"> {
    return {
      draft: this.draft.map(e => ({ ...e })),
      enrollment: this.enrollment.map(e => ({ ...e })),
      round: this.round,
      finalized: this.finalized,
    };
  }

  restore(snapshot: Omit<RegistrationSnapshot, "live">): void {
    this.draft = snapshot.draft.map(e => ({ ...e }));
    this.enrollment = snapshot.enrollment.map(e => ({ ...e }));
    this.round = snapshot.round;
    this.finalized = snapshot.finalized;
  }
}
