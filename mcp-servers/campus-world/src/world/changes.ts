import { z } from "zod";
import { MAX_DISTRACTORS } from "../constants.js";
import { WorldStateError, type OpResult } from "../result.js";
import type { AvailabilityEngine } from "./availability.js";
import type { CalendarStore } from "./calendar.js";
import type { CourseCatalog, DraftRegistrar } from "./courses.js";

export const reservationPuzzleSchema = z.object({
  location_id: z.string().min(1),
  date: z.string().min(1).describe("e.g. 'Week 1, Saturday'"),
  time_slot: z.string().min(1).describe("e.g. '14:00-16:00'"),
  required_properties: z.array(z.string()).default([]),
  solution: z.array(z.object({
    item_name: z.string().min(1),
    seat_id: z.string().optional(),
  })).min(1),
  distractor_count: z.number().int().min(0).max(MAX_DISTRACTORS).optional(),
});

export const worldChangeSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("popularity_update"),
    section_id: z.string().min(1),
    new_value: z.number().int(),
  }),
  z.object({
    type: z.literal("seats_left_update"),
    section_id: z.string().min(1),
    new_value: z.number().int(),
  }),
  z.object({
    type: z.literal("advisor_availability_set"),
    advisor_id: z.string().min(1),
    date: z.string().min(1),
    slots: z.array(z.string()),
  }),
  z.object({
    type: z.literal("advisor_commitment_add"),
    advisor_id: z.string().min(1),
    title: z.string().min(1),
    time: z.string().min(1).describe("e.g. 'Week 2, Tuesday, 10:00-11:00'"),
  }),
  z.object({
    type: z.literal("set_availability"),
    location_id: z.string().min(1),
    item_name: z.string().min(1),
    available_times: z.array(z.string()).min(1),
  }),
  z.object({
    type: z.literal("registration_round_open"),
  }),
]);

export const taskSetupSchema = z.object({
  task_id: z.string().min(1),
  date: z.string().optional().describe("Task date, e.g. 'Week 1, Monday'"),
  source_location: z.string().optional(),
  world_state_changes: z.array(worldChangeSchema).default([]),
  reservation_puzzle: reservationPuzzleSchema.optional(),
});

export type WorldChange = z.infer<typeof worldChangeSchema>;
export type TaskSetup = z.input<typeof taskSetupSchema>;
export type ParsedTaskSetup = z.output<typeof taskSetupSchema>;

export interface ChangeTargets {
  catalog: CourseCatalog;
  registrar: DraftRegistrar;
  calendar: CalendarStore;
  availability: AvailabilityEngine;
}

export function applyWorldChange(targets: ChangeTargets, change: WorldChange): OpResult<unknown> {
  switch (change.type) {
    case "popularity_update":
      return targets.catalog.updatePopularity(change.section_id, change.new_value);
    case "seats_left_update":
      return targets.catalog.updateSeats(change.section_id, change.new_value);
    case "advisor_availability_set":
      return targets.calendar.setAdvisorAvailability(change.advisor_id, change.date, change.slots);
    case "advisor_commitment_add":
      return targets.calendar.addAdvisorCommitment(change.advisor_id, change.title, change.time);
    case "set_availability":
      return targets.availability.pinAvailability({
        location_id: change.location_id,
        item_name: change.item_name,
        available_times: change.available_times,
      });
    case "registration_round_open":
      return targets.registrar.openRound();
    default: {
      const unhandled: never = change;
      throw new WorldStateError(`Unknown world change ${JSON.stringify(unhandled)}.`);
    }
  }
}
