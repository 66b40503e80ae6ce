import type { Collection } from "mongodb";
import { z } from "zod";
import { dayOfWeekSchema } from "./data/schemas.js";
import { WorldStateError } from "./result.js";
import { reservationPuzzleSchema } from "./world/changes.js";
import type { WorldSnapshot } from "./world/state.js";

const simDateSchema = z.object({ week: z.number().int(), day: dayOfWeekSchema });

const eventViewSchema = z.object({
  event_id: z.string(),
  event_title: z.string(),
  location: z.string(),
  time: z.string(),
  description: z.string().optional(),
});

const passSchema = z.enum(["S-Pass", "A-Pass", "B-Pass"]);

export const worldSnapshotSchema = z.object({
  version: z.number().int(),
  seed: z.string(),
  clock: simDateSchema.extend({ time: z.string() }),
  task_id: z.string(),
  position: z.object({
    location_id: z.string(),
    location_name: z.string(),
    walk_history: z.array(z.array(z.string())),
  }),
  issued_paths: z.array(z.array(z.string())),
  calendar: z.object({
    calendars: z.record(z.array(z.object({
      event_id: z.string(),
      calendar_id: z.string(),
      event_title: z.string(),
      location: z.string(),
      date: simDateSchema,
      range: z.object({ start: z.number(), end: z.number() }),
      description: z.string().optional(),
    }))),
    counters: z.record(z.number().int()),
    pending_changes: z.array(z.object({
      action: z.enum(["add", "remove", "update"]),
      at: z.string(),
      event: eventViewSchema,
      original_event: eventViewSchema.optional(),
    })),
    advisor_overrides: z.record(z.array(z.string())),
  }),
  availability: z.object({
    puzzles: z.array(reservationPuzzleSchema),
    pinned: z.array(z.object({
      location_id: z.string(),
      item_name: z.string(),
      available_times: z.array(z.string()),
    })),
  }),
  bookings: z.array(z.object({
    reservation_id: z.number().int(),
    location_id: z.string(),
    item_name: z.string(),
    seat_id: z.string().nullable(),
    date: z.string(),
    time_slot: z.string(),
    task_id: z.string(),
    booked_at: z.string(),
  })),
  registration: z.object({
    live: z.record(z.object({ popularity_index: z.number().int(), seats_left: z.number().int() })),
    draft: z.array(z.object({ section_id: z.string(), assigned_pass: passSchema.nullable() })),
    enrollment: z.array(z.object({
      section_id: z.string(),
      pass: passSchema,
      round: z.number().int(),
      resolved_at: z.string(),
    })),
    round: z.number().int().positive(),
    finalized: z.boolean(),
  }),
  emails: z.array(z.object({
    recipient: z.string(),
    subject: z.string(),
    body: z.string(),
    sent_at: z.string(),
    task_id: z.string(),
  })),
});

export function parseSnapshot(raw: unknown): WorldSnapshot {
  const parsed = worldSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new WorldStateError(`Corrupted world snapshot at ${issue?.path.join(".") ?? "(root)"}: ${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}

export interface SnapshotDocument {
  run_id: string;
  label: string;
  world_time: string;
  saved_at: Date;
  snapshot: WorldSnapshot;
}

export interface CheckpointInfo {
  run_id: string;
  label: string;
  world_time: string;
  saved_at: Date;
}

/** Named world checkpoints, grouped by evaluation run. */
export interface SnapshotStore {
  save(runId: string, label: string, snapshot: WorldSnapshot): Promise<CheckpointInfo>;
  load(runId: string, label: string): Promise<WorldSnapshot | null>;
  list(runId: string): Promise<CheckpointInfo[]>;
}

function worldTimeOf(snapshot: WorldSnapshot): string {
  const { week, day, time } = snapshot.clock;
  return `Week ${week}, ${day}, ${time}`;
}

export class MongoSnapshotStore implements SnapshotStore {
  constructor(private readonly collection: () => Promise<Collection<SnapshotDocument>>) {}

  async save(runId: string, label: string, snapshot: WorldSnapshot): Promise<CheckpointInfo> {
    const info: CheckpointInfo = { run_id: runId, label, world_time: worldTimeOf(snapshot), saved_at: new Date() };
    const col = await this.collection();
    await col.updateOne(
      { run_id: runId, label },
      { $set: { ...info, snapshot } },
      { upsert: true },
    );
    return info;
  }

  async load(runId: string, label: string): Promise<WorldSnapshot | null> {
    const col = await this.collection();
    const doc = await col.findOne({ run_id: runId, label });
    return doc ? parseSnapshot(doc.snapshot) : null;
  }

  async list(runId: string): Promise<CheckpointInfo[]> {
    const col = await this.collection();
    const docs = await col.find({ run_id: runId }, { projection: { snapshot: 0 } })
      .sort({ saved_at: 1 }).toArray();
    return docs.map(d => ({ run_id: d.run_id, label: d.label, world_time: d.world_time, saved_at: d.saved_at }));
  }
}

/** Process-local store, for runs without MongoDB and for tests. */
export class MemorySnapshotStore implements SnapshotStore {
  private readonly docs = new Map<string, SnapshotDocument>();

  async save(runId: string, label: string, snapshot: WorldSnapshot): Promise<CheckpointInfo> {
    const info: CheckpointInfo = { run_id: runId, label, world_time: worldTimeOf(snapshot), saved_at: new Date() };
    this.docs.set(`${runId}|${label}`, { ...info, snapshot: structuredClone(snapshot) });
    return info;
  }

  async load(runId: string, label: string): Promise<WorldSnapshot | null> {
    const doc = this.docs.get(`${runId}|${label}`);
    return doc ? parseSnapshot(structuredClone(doc.snapshot)) : null;
  }

  async list(runId: string): Promise<CheckpointInfo[]> {
    return [...this.docs.values()]
      .filter(d => d.run_id === runId)
      .map(d => ({ run_id: d.run_id, label: d.label, world_time: d.world_time, saved_at: d.saved_at }));
  }
}
