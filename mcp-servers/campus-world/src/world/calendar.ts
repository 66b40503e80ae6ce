import { ADVISOR_WORKING_SLOTS } from "../constants.js";
import { fail, ok, type OpResult } from "../result.js";
import type {
  CalendarEvent, CalendarEventDetails, CalendarEventView, ScheduleChange, SimDate, TimeRange,
} from "../types.js";
import {
  compareSimDate, formatEventTime, formatSimDate, formatTimeRange, parseEventTime, parseSimDate, parseTimeRange,
  rangesOverlap, sameDate,
} from "../validation.js";
import { canPerform, identityOf } from "./permissions.js";

export interface CalendarSnapshot {
  calendars: Record<string, CalendarEvent[]>;
  counters: Record<string, number>;
  pending_changes: ScheduleChange[];
  advisor_overrides: Record<string, string[]>;
}

export function toView(event: CalendarEvent): CalendarEventView {
  const view: CalendarEventView = {
    event_id: event.event_id,
    event_title: event.event_title,
    location: event.location,
    time: formatEventTime(event.date, event.range),
  };
  if (event.description !== undefined) view.description = event.description;
  return view;
}

function byStart(a: CalendarEvent, b: CalendarEvent): number {
  return a.range.start - b.range.start || a.range.end - b.range.end || a.event_id.localeCompare(b.event_id);
}

function advisorKey(advisorId: string, date: SimDate): string {
  return `${advisorId}|${formatSimDate(date)}`;
}

function stripAdvisorPrefix(id: string): string {
  return id.startsWith("advisor_") ? id.slice("advisor_".length) : id;
}

/** Collapses adjacent "HH:MM-HH:MM" slots into maximal free intervals. */
export function mergeSlots(slots: string[]): string[] {
  const ranges = slots
    .map(s => parseTimeRange(s))
    .filter((r): r is TimeRange => r !== null)
    .sort((a, b) => a.start - b.start);
  const merged: TimeRange[] = [];
  for (const r of ranges) {
    const last = merged[merged.length - 1];
    if (last && r.start <= last.end) {
      last.end = Math.max(last.end, r.end);
    } else {
      merged.push({ ...r });
    }
  }
  return merged.map(formatTimeRange);
}

/**
 * Calendars keyed by identity string. Permissions come from the identity
 * kind; no two events on one calendar may overlap.
 */
export class CalendarStore {
  private readonly calendars = new Map<string, CalendarEvent[]>();
  private readonly counters = new Map<string, number>();
  private changes: ScheduleChange[] = [];
  private readonly advisorOverrides = new Map<string, string[]>();

  /** `now` renders the current world time for the change log. */
  constructor(private readonly now: () => string) {}

  private eventsOf(calendarId: string): CalendarEvent[] {
    return this.calendars.get(calendarId) ?? [];
  }

  private findConflict(calendarId: string, date: SimDate, range: TimeRange, ignoreId?: string): CalendarEvent | undefined {
    return this.eventsOf(calendarId).find(e =>
      e.event_id !== ignoreId && sameDate(e.date, date) && rangesOverlap(e.range, range));
  }

  private nextId(calendarId: string): string {
    const n = (this.counters.get(calendarId) ?? 0) + 1;
    this.counters.set(calendarId, n);
    return `evt_${n}`;
  }

  private insert(event: CalendarEvent): void {
    this.calendars.set(event.calendar_id, [...this.eventsOf(event.calendar_id), event]);
  }

  private logChange(calendarId: string, change: Omit<ScheduleChange, "at">): void {
    if (calendarId !== "self") return;
    this.changes.push({ ...change, at: this.now() });
  }

  addEvent(
    calendarId: string,
    eventTitle: string,
    location: string,
    time: string,
    description?: string,
  ): OpResult<{ event_id: string; calendar_id: string }> {
    if (!calendarId || !eventTitle || !location || !time) {
      return fail("VALIDATION", "All parameters (calendar_id, event_title, location, time) are required.");
    }
    const parsed = parseEventTime(time);
    if (!parsed) {
      return fail("VALIDATION", `Invalid time '${time}'. Expected a format like 'Week 1, Monday, 14:00-16:00'.`);
    }
    if (!canPerform(identityOf(calendarId), "add")) {
      return fail("PERMISSION_DENIED", `You do not have permission to add events to calendar '${calendarId}'.`);
    }
    const clash = this.findConflict(calendarId, parsed.date, parsed.range);
    if (clash) {
      return fail(
        "CONFLICT",
        `'${eventTitle}' overlaps '${clash.event_title}' (${formatEventTime(clash.date, clash.range)}) on calendar '${calendarId}'.`,
      );
    }

    const event: CalendarEvent = {
      event_id: this.nextId(calendarId),
      calendar_id: calendarId,
      event_title: eventTitle,
      location,
      date: parsed.date,
      range: parsed.range,
    };
    if (description !== undefined) event.description = description;
    this.insert(event);
    this.logChange(calendarId, { action: "add", event: toView(event) });

    return ok(`Event '${eventTitle}' has been successfully added to the calendar.`, {
      event_id: event.event_id,
      calendar_id: calendarId,
    });
  }

  removeEvent(calendarId: string, eventId: string): OpResult<{ event_id: string }> {
    if (!calendarId || !eventId) return fail("VALIDATION", "Both calendar_id and event_id are required.");
    if (!canPerform(identityOf(calendarId), "remove")) {
      return fail("PERMISSION_DENIED", `You do not have permission to remove events from calendar '${calendarId}'.`);
    }
    const events = this.eventsOf(calendarId);
    const removed = events.find(e => e.event_id === eventId);
    if (!removed) {
      return fail("NOT_FOUND", `Event with ID '${eventId}' not found in calendar '${calendarId}'.`);
    }

    this.calendars.set(calendarId, events.filter(e => e.event_id !== eventId));
    this.logChange(calendarId, { action: "remove", event: toView(removed) });
    return ok(`Event '${removed.event_title}' has been successfully removed from the calendar.`, { event_id: eventId });
  }

  updateEvent(calendarId: string, eventId: string, details: CalendarEventDetails): OpResult<CalendarEventView> {
    if (!calendarId || !eventId) return fail("VALIDATION", "Both calendar_id and event_id are required.");
    const keys = Object.entries(details).filter(([, v]) => v !== undefined).map(([k]) => k);
    if (keys.length === 0) {
      return fail("VALIDATION", "new_details must include event_title, location, time or description.");
    }
    if (details.event_title === "" || details.location === "") {
      return fail("VALIDATION", "event_title and location cannot be empty.");
    }
    let parsed: { date: SimDate; range: TimeRange } | null = null;
    if (details.time !== undefined) {
      parsed = parseEventTime(details.time);
      if (!parsed) {
        return fail("VALIDATION", `Invalid time '${details.time}'. Expected a format like 'Week 1, Monday, 14:00-16:00'.`);
      }
    }
    if (!canPerform(identityOf(calendarId), "update")) {
      return fail("PERMISSION_DENIED", `You do not have permission to update events in calendar '${calendarId}'.`);
    }
    const events = this.eventsOf(calendarId);
    const original = events.find(e => e.event_id === eventId);
    if (!original) {
      return fail("NOT_FOUND", `Event with ID '${eventId}' not found in calendar '${calendarId}'.`);
    }
    if (parsed) {
      const clash = this.findConflict(calendarId, parsed.date, parsed.range, eventId);
      if (clash) {
        return fail(
          "CONFLICT",
          `The new time overlaps '${clash.event_title}' (${formatEventTime(clash.date, clash.range)}).`,
        );
      }
    }

    const updated: CalendarEvent = {
      ...original,
      event_title: details.event_title ?? original.event_title,
      location: details.location ?? original.location,
      date: parsed?.date ?? original.date,
      range: parsed?.range ?? original.range,
    };
    if (details.description !== undefined) updated.description = details.description;
    this.calendars.set(calendarId, events.map(e => (e.event_id === eventId ? updated : e)));
    this.logChange(calendarId, { action: "update", event: toView(updated), original_event: toView(original) });

    return ok(`Event '${updated.event_title}' has been successfully updated.`, toView(updated));
  }

  viewSchedule(calendarId: string, date: string): OpResult<{ events: CalendarEventView[] }> {
    if (!calendarId || !date) return fail("VALIDATION", "Both calendar_id and date are required.");
    const day = parseSimDate(date);
    if (!day) return fail("VALIDATION", `Invalid date '${date}'. Expected a format like 'Week 1, Monday'.`);
    if (!canPerform(identityOf(calendarId), "view")) {
      return fail("PERMISSION_DENIED", `You do not have permission to view calendar '${calendarId}'.`);
    }

    const events = this.eventsOf(calendarId).filter(e => sameDate(e.date, day)).sort(byStart);
    const label = formatSimDate(day);
    if (events.length === 0) {
      return ok(`No events found for ${label} in calendar '${calendarId}'.`, { events: [] });
    }
    const views = events.map(toView);
    const lines = [`Found ${views.length} event(s) for ${label}:`];
    for (const v of views) {
      lines.push(`- ${v.event_title} at ${v.location} (${v.time})`);
      if (v.description) lines.push(`  Description: ${v.description}`);
    }
    return ok(lines.join("\n"), { events: views });
  }

  queryAdvisorAvailability(
    advisorId: string,
    date: string,
  ): OpResult<{ advisor_id: string; date: string; available_slots: string[]; free_intervals: string[] }> {
    if (!advisorId || !date) return fail("VALIDATION", "Both advisor_id and date are required.");
    const day = parseSimDate(date);
    if (!day) return fail("VALIDATION", `Invalid date '${date}'. Expected a format like 'Week 1, Monday'.`);
    const id = stripAdvisorPrefix(advisorId);

    const override = this.advisorOverrides.get(advisorKey(id, day));
    const busy = this.eventsOf(`advisor_${id}`).filter(e => sameDate(e.date, day)).map(e => e.range);
    const available = override
      ? [...override]
      : ADVISOR_WORKING_SLOTS.filter(slot => {
        const range = parseTimeRange(slot);
        return range !== null && !busy.some(b => rangesOverlap(b, range));
      });

    const label = formatSimDate(day);
    const message = available.length > 0
      ? `Advisor ${id} is available on ${label} during the following time slots: ${available.join(", ")}.`
      : `Advisor ${id} has no available time slots on ${label}.`;
    return ok(message, {
      advisor_id: id,
      date: label,
      available_slots: available,
      free_intervals: mergeSlots(available),
    });
  }

  // -------------------------------------------------------------------------
  // Controller surface
  // -------------------------------------------------------------------------

  /** Stores a private commitment on an advisor's calendar. */
  addAdvisorCommitment(advisorId: string, title: string, time: string): OpResult<{ event_id: string }> {
    const id = stripAdvisorPrefix(advisorId);
    if (!id || !title) return fail("VALIDATION", "advisor_id and title are required.");
    const parsed = parseEventTime(time);
    if (!parsed) return fail("VALIDATION", `Invalid time '${time}'.`);
    const calendarId = `advisor_${id}`;
    const clash = this.findConflict(calendarId, parsed.date, parsed.range);
    if (clash) return fail("CONFLICT", `Advisor ${id} already has a commitment at ${time}.`);

    const event: CalendarEvent = {
      event_id: this.nextId(calendarId),
      calendar_id: calendarId,
      event_title: title,
      location: "",
      date: parsed.date,
      range: parsed.range,
    };
    this.insert(event);
    return ok(`Commitment recorded for advisor ${id}.`, { event_id: event.event_id });
  }

  setAdvisorAvailability(advisorId: string, date: string, slots: string[]): OpResult<{ advisor_id: string }> {
    const id = stripAdvisorPrefix(advisorId);
    const day = parseSimDate(date);
    if (!id || !day) return fail("VALIDATION", "A valid advisor_id and date are required.");
    const bad = slots.find(s => parseTimeRange(s) === null);
    if (bad !== undefined) return fail("VALIDATION", `Invalid time slot '${bad}'.`);
    this.advisorOverrides.set(advisorKey(id, day), [...slots]);
    return ok(`Availability for advisor ${id} on ${formatSimDate(day)} set.`, { advisor_id: id });
  }

  drainSelfChanges(): ScheduleChange[] {
    const drained = this.changes;
    this.changes = [];
    return drained;
  }

  eventsFor(calendarId: string): CalendarEventView[] {
    return [...this.eventsOf(calendarId)]
      .sort((a, b) => compareSimDate(a.date, b.date) || byStart(a, b))
      .map(toView);
  }

  snapshot(): CalendarSnapshot {
    return {
      calendars: Object.fromEntries([...this.calendars].map(([k, v]) => [k, v.map(e => ({ ...e }))])),
      counters: Object.fromEntries(this.counters),
      pending_changes: [...this.changes],
      advisor_overrides: Object.fromEntries(this.advisorOverrides),
    };
  }

  restore(snapshot: CalendarSnapshot): void {
    this.calendars.clear();
    this.counters.clear();
    this.advisorOverrides.clear();
    for (const [k, v] of Object.entries(snapshot.calendars)) this.calendars.set(k, v.map(e => ({ ...e })));
    for (const [k, v] of Object.entries(snapshot.counters)) this.counters.set(k, v);
    for (const [k, v] of Object.entries(snapshot.advisor_overrides)) this.advisorOverrides.set(k, [...v]);
    this.changes = [...snapshot.pending_changes];
  }
}
