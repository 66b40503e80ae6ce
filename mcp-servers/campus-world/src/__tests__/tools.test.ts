import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { createCampusServer } from "../server.js";
import { MemorySnapshotStore, parseSnapshot, type CheckpointInfo, type SnapshotStore } from "../snapshots.js";
import type { CampusWorldState, WorldSnapshot } from "../world/state.js";
import { makeWorld } from "./helpers.js";

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
  isError: z.boolean().optional(),
});

const envelopeSchema = z.object({
  status: z.enum(["success", "failure", "error"]),
  error_code: z.string().optional(),
  data: z.unknown(),
});

let world: CampusWorldState;
let server: McpServer;
let client: Client;

async function connect(controllerTools: boolean, store: SnapshotStore = new MemorySnapshotStore()): Promise<void> {
  world = await makeWorld();
  server = createCampusServer(world, { store, runId: "run-test", controllerTools });
  client = new Client({ name: "campus-test", version: "1.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
}

async function call(name: string, args: Record<string, unknown> = {}) {
  const raw = await client.callTool({ name, arguments: args });
  const result = toolResultSchema.parse(raw);
  const message = result.content[0]?.text ?? "";
  const envelope = envelopeSchema.parse(JSON.parse(result.content[1]?.text ?? "{}"));
  return { message, isError: result.isError ?? false, ...envelope };
}

afterEach(async () => {
  vi.restoreAllMocks();
  await client.close();
  await server.close();
});

describe("agent-only server", () => {
  beforeEach(async () => {
    await connect(false);
  });

  it("exposes only agent tools", async () => {
    const { tools } = await client.listTools();
    const names = tools.map(t => t.name);
    expect(names).toContain("walk_to");
    expect(names).toContain("submit_draft");
    expect(names).not.toContain("prepare_task");
    expect(names).not.toContain("save_checkpoint");
  });

  it("plans and walks a route", async () => {
    const planned = await call("find_optimal_path", { source_building_id: "B083", target_building_id: "B001" });
    expect(planned.status).toBe("success");
    expect(planned.data).toMatchObject({ path: ["B083", "B090", "B001"] });

    const walked = await call("walk_to", { path: ["B083", "B090", "B001"] });
    expect(walked.message).toBe("Successfully walked to Main Library. You are now at Main Library.");
    expect(world.position().location_id).toBe("B001");
  });

  it("reports failures as tool errors without changing the world", async () => {
    const walked = await call("walk_to", { path: ["B083", "B010"] });
    expect(walked.isError).toBe(true);
    expect(walked.status).toBe("failure");
    expect(walked.error_code).toBe("INVALID_PATH");
    expect(world.position().location_id).toBe("B083");
  });

  it("rejects an overlapping event on the agent's calendar", async () => {
    const first = await call("add_event", {
      calendar_id: "self",
      event_title: "Study Group",
      location: "Main Library",
      time: "Week 1, Monday, 14:00-16:00",
    });
    expect(first.data).toEqual({ event_id: "evt_1", calendar_id: "self" });

    const clash = await call("add_event", {
      calendar_id: "self",
      event_title: "Club Meeting",
      location: "Student Center",
      time: "Week 1, Monday, 15:00-16:00",
    });
    expect(clash.error_code).toBe("CONFLICT");
  });

  it("reads a handbook article", async () => {
    const article = await call("view_article", { identifier: "Registration Passes", by: "title" });
    expect(article.status).toBe("success");
    expect(article.data).toMatchObject({ article_id: "hb_reg_001" });

    const missing = await call("list_sections", { book_title: "Student Handbook", chapter_title: "Appendix" });
    expect(missing.isError).toBe(true);
    expect(missing.error_code).toBe("NOT_FOUND");
  });
});

describe("server with controller tools", () => {
  beforeEach(async () => {
    await connect(true);
  });

  it("lists the controller tools", async () => {
    const { tools } = await client.listTools();
    const names = tools.map(t => t.name);
    for (const name of ["prepare_task", "advance_time", "begin_day", "save_checkpoint", "load_checkpoint"]) {
      expect(names).toContain(name);
    }
  });

  it("prepares a reservation task and books it once", async () => {
    const prepared = await call("prepare_task", {
      task_id: "task-7",
      date: "Week 1, Monday",
      reservation_puzzle: {
        location_id: "B001",
        date: "Week 1, Saturday",
        time_slot: "14:00-16:00",
        required_properties: ["good_wifi"],
        solution: [{ item_name: "Study Room 202" }],
      },
    });
    expect(prepared.status).toBe("success");

    const args = { location_id: "B001", item_name: "Study Room 202", date: "Week 1, Saturday", time_slot: "14:00-16:00" };
    const booked = await call("make_booking", args);
    expect(booked.message).toBe(
      "Booking successful! You have successfully reserved Study Room 202 for Week 1, Saturday from 14:00-16:00.",
    );
    expect((await call("make_booking", args)).error_code).toBe("CONFLICT");

    const listed = await call("list_reservations", { task_id: "task-7" });
    expect(listed.data).toMatchObject({ reservations: [{ reservation_id: 1, item_name: "Study Room 202" }] });
  });

  it("saves and reloads checkpoints", async () => {
    const saved = await call("save_checkpoint", { label: "monday" });
    expect(saved.status).toBe("success");

    await call("advance_time", { time: "Week 1, Monday, 15:00" });
    expect(world.now().data?.now).toBe("Week 1, Monday, 15:00");

    const loaded = await call("load_checkpoint", { label: "monday" });
    expect(loaded.data).toEqual({ now: "Week 1, Monday, 08:00" });
    expect(world.now().data?.now).toBe("Week 1, Monday, 08:00");

    expect((await call("load_checkpoint", { label: "friday" })).error_code).toBe("NOT_FOUND");
  });
});

// Store whose backend is down, and whose only saved document is damaged
class BrokenStore implements SnapshotStore {
  constructor(private readonly damaged: Record<string, unknown>) {}

  async save(): Promise<CheckpointInfo> {
    throw new Error("connection refused");
  }

  async load(): Promise<WorldSnapshot | null> {
    return parseSnapshot(this.damaged);
  }

  async list(): Promise<CheckpointInfo[]> {
    throw new Error("connection refused");
  }
}

describe("checkpoint faults", () => {
  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const healthy = (await makeWorld()).snapshot();
    await connect(true, new BrokenStore({ ...healthy, bookings: "none" }));
  });

  it("answers a corrupted checkpoint with a VALIDATION envelope and leaves the world alone", async () => {
    await call("advance_time", { time: "Week 1, Monday, 10:00" });
    const loaded = await call("load_checkpoint", { label: "latest" });
    expect(loaded.isError).toBe(true);
    expect(loaded.status).toBe("failure");
    expect(loaded.error_code).toBe("VALIDATION");
    expect(loaded.message).toBe("Corrupted world snapshot at bookings: Expected array, received string");
    expect(world.now().data?.now).toBe("Week 1, Monday, 10:00");
  });

  it("answers store failures with an INTERNAL envelope and logs them", async () => {
    const saved = await call("save_checkpoint", { label: "latest" });
    expect(saved).toMatchObject({
      isError: true,
      status: "error",
      error_code: "INTERNAL",
      message: "Failed to save checkpoint: connection refused",
    });

    const listed = await call("list_checkpoints");
    expect(listed.error_code).toBe("INTERNAL");
    expect(listed.message).toBe("Failed to list checkpoints: connection refused");
    expect(console.error).toHaveBeenCalledWith("[campus] save checkpoint failed:", expect.any(Error));
  });
});
