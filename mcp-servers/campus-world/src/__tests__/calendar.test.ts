import { describe, it, expect, beforeEach } from "vitest";
import { CalendarStore, mergeSlots } from "../world/calendar.js";
import { identityOf, canPerform } from "../world/permissions.js";

let calendar: CalendarStore;

beforeEach(() => {
  calendar = new CalendarStore(() => "Week 1, Monday, 08:00");
});

describe("calendar identities", () => {
  it("derives the identity kind from the id", () => {
    expect(identityOf("self")).toEqual({ kind: "self" });
    expect(identityOf("club_chess")).toEqual({ kind: "club", club_id: "chess" });
    expect(identityOf("advisor_lee")).toEqual({ kind: "advisor", advisor_id: "lee" });
    expect(identityOf("registrar")).toEqual({ kind: "other", calendar_id: "registrar" });
  });

  it("applies the permission table", () => {
    expect(canPerform({ kind: "club", club_id: "x" }, "add")).toBe(true);
    expect(canPerform({ kind: "club", club_id: "x" }, "remove")).toBe(false);
    expect(canPerform({ kind: "advisor", advisor_id: "x" }, "view")).toBe(false);
    expect(canPerform({ kind: "other", calendar_id: "x" }, "view")).toBe(true);
  });
});

describe("add_event", () => {
  it("rejects an overlapping event on self but allows it on a club calendar", () => {
    const first = calendar.addEvent("self", "Study Group", "Main Library", "Week 1, Monday, 14:00-16:00");
    expect(first.status).toBe("success");
    expect(first.data).toEqual({ event_id: "evt_1", calendar_id: "self" });

    const clash = calendar.addEvent("self", "Club Meeting", "Student Center", "Week 1, Monday, 15:00-16:00");
    expect(clash.status).toBe("failure");
    expect(clash.error_code).toBe("CONFLICT");

    const club = calendar.addEvent("club_chess", "Club Meeting", "Student Center", "Week 1, Monday, 15:00-16:00");
    expect(club.status).toBe("success");
    expect(club.data?.event_id).toBe("evt_1");
  });

  it("allows back-to-back events", () => {
    calendar.addEvent("self", "Study Group", "Main Library", "Week 1, Monday, 14:00-16:00");
    const next = calendar.addEvent("self", "Dinner", "Campus Cafe", "Week 1, Monday, 16:00-17:00");
    expect(next.data?.event_id).toBe("evt_2");
  });

  it("validates arguments before permissions", () => {
    expect(calendar.addEvent("advisor_lee", "Chat", "Admin", "Monday afternoon").error_code).toBe("VALIDATION");
    expect(calendar.addEvent("advisor_lee", "Chat", "Admin", "Week 1, Monday, 10:00-11:00").error_code)
      .toBe("PERMISSION_DENIED");
    expect(calendar.addEvent("self", "", "Admin", "Week 1, Monday, 10:00-11:00").error_code).toBe("VALIDATION");
  });
});

describe("remove_event and update_event", () => {
  it("never reuses event ids", () => {
    calendar.addEvent("self", "A", "Main Library", "Week 1, Monday, 09:00-10:00");
    expect(calendar.removeEvent("self", "evt_1").status).toBe("success");
    expect(calendar.removeEvent("self", "evt_1").error_code).toBe("NOT_FOUND");
    expect(calendar.addEvent("self", "B", "Main Library", "Week 1, Monday, 09:00-10:00").data?.event_id)
      .toBe("evt_2");
  });

  it("only lets self remove or update", () => {
    calendar.addEvent("club_chess", "Meetup", "Student Center", "Week 1, Monday, 18:00-19:00");
    expect(calendar.removeEvent("club_chess", "evt_1").error_code).toBe("PERMISSION_DENIED");
    expect(calendar.updateEvent("club_chess", "evt_1", { event_title: "X" }).error_code).toBe("PERMISSION_DENIED");
  });

  it("re-checks overlap excluding the event itself", () => {
    calendar.addEvent("self", "Study Group", "Main Library", "Week 1, Monday, 14:00-16:00");
    calendar.addEvent("self", "Dinner", "Campus Cafe", "Week 1, Monday, 17:00-18:00");

    const shifted = calendar.updateEvent("self", "evt_1", { time: "Week 1, Monday, 14:30-16:30" });
    expect(shifted.data).toEqual({
      event_id: "evt_1",
      event_title: "Study Group",
      location: "Main Library",
      time: "Week 1, Monday, 14:30-16:30",
    });

    const clash = calendar.updateEvent("self", "evt_1", { time: "Week 1, Monday, 16:30-17:30" });
    expect(clash.error_code).toBe("CONFLICT");
  });

  it("requires at least one detail", () => {
    calendar.addEvent("self", "A", "Main Library", "Week 1, Monday, 09:00-10:00");
    expect(calendar.updateEvent("self", "evt_1", {}).error_code).toBe("VALIDATION");
  });
});

describe("view_schedule", () => {
  it("lists the day's events in start order", () => {
    calendar.addEvent("self", "Dinner", "Campus Cafe", "Week 1, Monday, 17:00-18:00");
    calendar.addEvent("self", "Lecture", "Engineering Building", "Week 1, Monday, 09:00-10:30");
    calendar.addEvent("self", "Gym", "Gymnasium", "Week 1, Tuesday, 07:00-08:00");

    const result = calendar.viewSchedule("self", "Week 1, Monday");
    expect(result.data?.events.map(e => e.event_title)).toEqual(["Lecture", "Dinner"]);
    expect(result.message).toBe([
      "Found 2 event(s) for Week 1, Monday:",
      "- Lecture at Engineering Building (Week 1, Monday, 09:00-10:30)",
      "- Dinner at Campus Cafe (Week 1, Monday, 17:00-18:00)",
    ].join("\n"));
  });

  it("lets other calendars be viewed but not advisors", () => {
    expect(calendar.viewSchedule("registrar", "Week 1, Monday").message)
      .toBe("No events found for Week 1, Monday in calendar 'registrar'.");
    expect(calendar.viewSchedule("advisor_lee", "Week 1, Monday").error_code).toBe("PERMISSION_DENIED");
  });
});

describe("query_advisor_availability", () => {
  it("subtracts stored commitments from the working slots", () => {
    calendar.addAdvisorCommitment("advisor_lee", "Faculty meeting", "Week 2, Tuesday, 10:00-11:30");
    const result = calendar.queryAdvisorAvailability("lee", "Week 2, Tuesday");
    expect(result.data).toEqual({
      advisor_id: "lee",
      date: "Week 2, Tuesday",
      available_slots: ["09:00-10:00", "13:00-14:00", "14:00-15:00", "15:00-16:00", "16:00-17:00"],
      free_intervals: ["09:00-10:00", "13:00-17:00"],
    });
    expect(result.message).not.toContain("Faculty meeting");
  });

  it("returns the full working day when nothing is booked", () => {
    const result = calendar.queryAdvisorAvailability("advisor_lee", "Week 2, Monday");
    expect(result.data?.available_slots).toHaveLength(7);
    expect(result.data?.free_intervals).toEqual(["09:00-12:00", "13:00-17:00"]);
  });

  it("lets controller overrides win", () => {
    calendar.setAdvisorAvailability("lee", "Week 2, Wednesday", ["10:00-11:00"]);
    expect(calendar.queryAdvisorAvailability("lee", "Week 2, Wednesday").data?.available_slots)
      .toEqual(["10:00-11:00"]);
  });
});

describe("schedule change log", () => {
  it("records changes to self only, with the world time", () => {
    calendar.addEvent("self", "Study Group", "Main Library", "Week 1, Monday, 14:00-16:00");
    calendar.addEvent("club_chess", "Meetup", "Student Center", "Week 1, Monday, 18:00-19:00");

    const changes = calendar.drainSelfChanges();
    expect(changes).toHaveLength(1);
    expect(changes[0]).toMatchObject({ action: "add", at: "Week 1, Monday, 08:00" });
    expect(changes[0]?.event.event_title).toBe("Study Group");
    expect(calendar.drainSelfChanges()).toEqual([]);
  });
});

describe("mergeSlots", () => {
  it("merges adjacent slots", () => {
    expect(mergeSlots(["13:00-14:00", "09:00-10:00", "10:00-11:00"])).toEqual(["09:00-11:00", "13:00-14:00"]);
  });
});
