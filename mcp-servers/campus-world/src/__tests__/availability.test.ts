import { describe, it, expect, beforeEach } from "vitest";
import { RESERVATION_TIME_SLOTS } from "../constants.js";
import { loadCampusData } from "../data/loader.js";
import type { CampusWorldState } from "../world/state.js";
import { makeWorld } from "./helpers.js";

let world: CampusWorldState;

const studyRoomPuzzle = {
  location_id: "B001",
  date: "Week 1, Saturday",
  time_slot: "14:00-16:00",
  required_properties: ["quiet", "good_wifi"],
  solution: [{ item_name: "Study Room 201" }],
};

beforeEach(async () => {
  world = await makeWorld();
  world.setTaskId("task-1");
});

describe("query_availability", () => {
  it("is deterministic for a seed", async () => {
    const other = await makeWorld();
    const a = world.queryAvailability("B001", "Week 1, Wednesday");
    const b = other.queryAvailability("B001", "Week 1, Wednesday");
    expect(a.status).toBe("success");
    expect(a.data).toEqual(b.data);
    expect(world.queryAvailability("B001", "week 1 wednesday").data).toEqual(a.data);
  });

  it("offers every standard slot from the building's item pool", () => {
    const slots = world.queryAvailability("B001", "Week 1, Wednesday").data?.slots ?? [];
    expect(new Set(slots.map(s => s.time_slot))).toEqual(new Set(RESERVATION_TIME_SLOTS));
    const names = ["Study Room 201", "Study Room 202", "Study Room 203", "Reading Hall"];
    for (const s of slots) {
      expect(names).toContain(s.item_name);
      expect(s.is_booked).toBe(false);
    }
  });

  it("validates input", () => {
    expect(world.queryAvailability("B001", "Saturday").error_code).toBe("VALIDATION");
    expect(world.queryAvailability("B999", "Week 1, Saturday").error_code).toBe("NOT_FOUND");
  });
});

describe("reservation puzzles", () => {
  it("places the solution and distractors that each miss a required property", () => {
    world.designatePuzzle(studyRoomPuzzle);
    const slots = world.queryAvailability("B001", "Week 1, Saturday").data?.slots ?? [];
    const target = slots.filter(s => s.time_slot === "14:00-16:00");

    expect(target).toHaveLength(3);
    const satisfying = target.filter(s => s.properties.includes("quiet") && s.properties.includes("good_wifi"));
    expect(satisfying.map(s => s.item_name)).toEqual(["Study Room 201"]);
    expect(satisfying[0]?.properties).toEqual(["good_wifi", "quiet"]);
  });

  it("shows every room with its declared properties in every slot of the puzzle day", async () => {
    const { map } = await loadCampusData();
    const library = map.locations.find(l => l.id === "B001");
    const declared = new Map((library?.bookable_items ?? []).map(b => [b.item_name, [...(b.properties ?? [])].sort()]));

    world.designatePuzzle(studyRoomPuzzle);
    const slots = world.queryAvailability("B001", "Week 1, Saturday").data?.slots ?? [];
    expect(slots.length).toBeGreaterThan(3);
    for (const s of slots) {
      expect(s.properties).toEqual(declared.get(s.item_name));
    }

    const distractors = slots.filter(s => s.time_slot === "14:00-16:00" && s.item_name !== "Study Room 201");
    expect(distractors).toHaveLength(2);
    for (const d of distractors) {
      expect(d.properties.includes("quiet") && d.properties.includes("good_wifi")).toBe(false);
    }
  });

  it("keeps generated properties stable across the day in buildings without declared rooms", () => {
    world.designatePuzzle({
      location_id: "B040",
      date: "Week 1, Thursday",
      time_slot: "14:00-16:00",
      required_properties: ["projector"],
      solution: [{ item_name: "Conference Room 900" }],
      distractor_count: 3,
    });
    const slots = world.queryAvailability("B040", "Week 1, Thursday").data?.slots ?? [];
    const seen = new Map<string, string[]>();
    for (const s of slots) {
      const first = seen.get(s.item_name);
      if (first) expect(s.properties).toEqual(first);
      else seen.set(s.item_name, s.properties);
    }

    const target = slots.filter(s => s.time_slot === "14:00-16:00");
    expect(target).toHaveLength(4);
    const withProjector = target.filter(s => s.properties.includes("projector")).map(s => s.item_name);
    expect(withProjector).toEqual(["Conference Room 900"]);
  });

  it("only accepts solutions that are declared rooms carrying the requirements", () => {
    expect(world.designatePuzzle({ ...studyRoomPuzzle, solution: [{ item_name: "Study Room 202" }] }).error_code)
      .toBe("VALIDATION");
    expect(world.designatePuzzle({ ...studyRoomPuzzle, solution: [{ item_name: "Rooftop" }] }).error_code)
      .toBe("NOT_FOUND");
    expect(world.designatePuzzle({
      ...studyRoomPuzzle,
      required_properties: [],
      solution: [{ item_name: "Reading Hall" }],
    }).error_code).toBe("VALIDATION");
  });

  it("caps the number of distractors", () => {
    const result = world.designatePuzzle({ ...studyRoomPuzzle, distractor_count: 1_000_000 });
    expect(result.error_code).toBe("VALIDATION");
    expect(world.designatePuzzle({ ...studyRoomPuzzle, distractor_count: 12 }).status).toBe("success");
  });

  it("evicts only the designated location and date", () => {
    const friday = world.queryAvailability("B001", "Week 1, Friday").data;
    world.designatePuzzle(studyRoomPuzzle);
    expect(world.queryAvailability("B001", "Week 1, Friday").data).toEqual(friday);
  });

  it("gives no distractors when nothing is required", () => {
    world.designatePuzzle({
      location_id: "B001",
      date: "Week 1, Sunday",
      time_slot: "09:00-10:30",
      required_properties: [],
      solution: [{ item_name: "Reading Hall", seat_id: "A2" }],
    });
    const slots = world.queryAvailability("B001", "Week 1, Sunday").data?.slots ?? [];
    expect(slots.filter(s => s.time_slot === "09:00-10:30")).toEqual([
      { time_slot: "09:00-10:30", item_name: "Reading Hall", seat_id: "A2", properties: ["quiet"], is_booked: false },
    ]);
  });
});

describe("make_booking", () => {
  it("books once, shows the booking and rejects a repeat", () => {
    world.designatePuzzle(studyRoomPuzzle);

    const booked = world.makeBooking("B001", "Study Room 201", "Week 1, Saturday", "14:00-16:00");
    expect(booked.status).toBe("success");
    expect(booked.data).toEqual({
      reservation_id: 1,
      location_id: "B001",
      item_name: "Study Room 201",
      seat_id: null,
      date: "Week 1, Saturday",
      time_slot: "14:00-16:00",
      task_id: "task-1",
      booked_at: "Week 1, Monday, 08:00",
    });

    const slots = world.queryAvailability("B001", "Week 1, Saturday").data?.slots ?? [];
    const entry = slots.find(s => s.time_slot === "14:00-16:00" && s.item_name === "Study Room 201");
    expect(entry?.is_booked).toBe(true);

    const again = world.makeBooking("B001", "Study Room 201", "Week 1, Saturday", "14:00-16:00");
    expect(again.status).toBe("failure");
    expect(again.error_code).toBe("CONFLICT");
    expect(world.makeBooking("B001", "study room 201", "week 1 saturday", "14:00-16:00").error_code)
      .toBe("CONFLICT");
    expect(world.listReservations().data?.reservations).toHaveLength(1);
  });

  it("requires the item to be offered in that slot", () => {
    world.designatePuzzle(studyRoomPuzzle);
    expect(world.makeBooking("B001", "Study Room 201", "Week 1, Saturday", "08:00-09:00").error_code)
      .toBe("NOT_FOUND");
    expect(world.makeBooking("B001", "Rooftop", "Week 1, Saturday", "14:00-16:00").error_code)
      .toBe("NOT_FOUND");
    expect(world.makeBooking("B001", "Study Room 201", "Week 1, Saturday", "4pm").error_code)
      .toBe("VALIDATION");
  });

  it("requires the right seat for seat-booked rooms", () => {
    world.designatePuzzle({
      location_id: "B001",
      date: "Week 1, Sunday",
      time_slot: "09:00-10:30",
      required_properties: [],
      solution: [{ item_name: "Reading Hall", seat_id: "A2" }],
    });
    expect(world.makeBooking("B001", "Reading Hall", "Week 1, Sunday", "09:00-10:30").error_code)
      .toBe("VALIDATION");
    expect(world.makeBooking("B001", "Reading Hall", "Week 1, Sunday", "09:00-10:30", "B1").error_code)
      .toBe("NOT_FOUND");
    const ok = world.makeBooking("B001", "Reading Hall", "Week 1, Sunday", "09:00-10:30", "A2");
    expect(ok.data?.seat_id).toBe("A2");
  });

  it("filters the ledger by task", () => {
    world.designatePuzzle(studyRoomPuzzle);
    world.makeBooking("B001", "Study Room 201", "Week 1, Saturday", "14:00-16:00");
    expect(world.listReservations("task-1").data?.reservations).toHaveLength(1);
    expect(world.listReservations("task-2").data?.reservations).toEqual([]);
  });
});

describe("pinned availability", () => {
  it("replaces generation on the dates it covers", () => {
    const applied = world.applyChange({
      type: "set_availability",
      location_id: "B010",
      item_name: "Meeting Room 220",
      available_times: ["Week 2, Monday, 10:00-12:00", "Week 2, Tuesday, 13:00-14:00"],
    });
    expect(applied.status).toBe("success");

    expect(world.queryAvailability("B010", "Week 2, Monday").data?.slots).toEqual([
      { time_slot: "10:00-12:00", item_name: "Meeting Room 220", properties: ["good_wifi", "projector"], is_booked: false },
    ]);
    const wednesday = world.queryAvailability("B010", "Week 2, Wednesday").data?.slots ?? [];
    expect(new Set(wednesday.map(s => s.time_slot))).toEqual(new Set(RESERVATION_TIME_SLOTS));

    expect(world.makeBooking("B010", "Meeting Room 220", "Week 2, Tuesday", "13:00-14:00").status)
      .toBe("success");
  });

  it("rejects malformed entries", () => {
    const applied = world.applyChange({
      type: "set_availability",
      location_id: "B010",
      item_name: "Meeting Room 220",
      available_times: ["Monday morning"],
    });
    expect(applied.error_code).toBe("VALIDATION");
  });
});
