import {
  DEFAULT_DISTRACTOR_COUNT, ITEM_PROPERTIES, ITEM_TEMPLATES, MAX_DISTRACTORS, MAX_ITEMS_PER_SLOT, MIN_ITEMS_PER_SLOT,
  RESERVATION_TIME_SLOTS,
} from "../constants.js";
import { fail, ok, type OpResult } from "../result.js";
import { hashString32, SeededRng } from "../rng.js";
import type {
  AvailabilitySlot, BookableItem, Booking, Location, PinnedAvailability, ReservationPuzzle, SimDate,
  SlotGrid, SlotItem,
} from "../types.js";
import {
  formatSimDate, formatTimeRange, parseEventTime, parseSimDate, parseTimeRange, sameDate,
} from "../validation.js";
import type { BookingLedger } from "./bookings.js";
import type { MapGraph } from "./map.js";

export interface AvailabilitySnapshot {
  puzzles: ReservationPuzzle[];
  pinned: PinnedAvailability[];
}

export interface AvailabilityView {
  location_id: string;
  building_name: string;
  date: string;
  slots: AvailabilitySlot[];
}

function gridKey(locationId: string, date: string): string {
  return `${locationId}|${date}`;
}

function byStart(a: string, b: string): number {
  return (parseTimeRange(a)?.start ?? 0) - (parseTimeRange(b)?.start ?? 0) || a.localeCompare(b);
}

function sameName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function puzzleFingerprint(p: ReservationPuzzle): string {
  const required = [...p.required_properties].sort().join(",");
  const solution = p.solution.map(s => `${s.item_name}#${s.seat_id ?? ""}`).join(",");
  return `${p.time_slot};${required};${solution};${p.distractor_count ?? DEFAULT_DISTRACTOR_COUNT}`;
}

// ---------------------------------------------------------------------------
// Grid derivation. Pure in (world seed, location, date, puzzle).
// ---------------------------------------------------------------------------

function generatedName(rng: SeededRng): string {
  return `${rng.pick(ITEM_TEMPLATES)} ${rng.int(101, 299)}`;
}

function itemPool(location: Location, rng: SeededRng): BookableItem[] {
  if (location.bookable_items.length > 0) return location.bookable_items;
  const names = new Set<string>();
  while (names.size < 6) names.add(generatedName(rng));
  return [...names].map(item_name => ({ item_name }));
}

function lacksSome(properties: readonly string[], required: readonly string[]): boolean {
  return required.some(p => !properties.includes(p));
}

/**
 * Who plays which part in a puzzle slot. Declared rooms only become
 * distractors when their declared properties already miss a requirement.
 */
function castPuzzle(
  puzzle: ReservationPuzzle,
  location: Location,
  pool: BookableItem[],
  rng: SeededRng,
): { pool: BookableItem[]; distractors: BookableItem[] } {
  const required = [...new Set(puzzle.required_properties)];
  const generated = location.bookable_items.length === 0;
  const solutionNames = new Set(puzzle.solution.map(s => s.item_name.toLowerCase()));

  const full = [...pool];
  for (const s of puzzle.solution) {
    if (!full.some(p => sameName(p.item_name, s.item_name))) full.push({ item_name: s.item_name });
  }
  if (required.length === 0) return { pool: full, distractors: [] };

  const wanted = puzzle.distractor_count ?? DEFAULT_DISTRACTOR_COUNT;
  const candidates = full.filter(p =>
    !solutionNames.has(p.item_name.toLowerCase()) &&
    (p.properties === undefined || lacksSome(p.properties, required)));
  const distractors = rng.sample(candidates, wanted);
  // Only a building with no declared rooms gets invented ones
  while (generated && distractors.length < wanted) {
    const item_name = generatedName(rng);
    if (full.some(p => sameName(p.item_name, item_name))) continue;
    const entry = { item_name };
    full.push(entry);
    distractors.push(entry);
  }
  return { pool: full, distractors };
}

/**
 * Properties of every item for one grid. Declared properties are used as is;
 * undeclared items get one generated set that holds in every slot of the day.
 */
function profileItems(
  pool: BookableItem[],
  puzzle: ReservationPuzzle | undefined,
  distractors: BookableItem[],
  rng: SeededRng,
): Map<string, string[]> {
  const required = [...new Set(puzzle?.required_properties ?? [])];
  const profiles = new Map<string, string[]>();
  for (const entry of pool) {
    const key = entry.item_name.toLowerCase();
    if (entry.properties !== undefined) {
      profiles.set(key, [...entry.properties].sort());
      continue;
    }
    let properties = rng.sample(ITEM_PROPERTIES, 2);
    if (puzzle?.solution.some(s => sameName(s.item_name, entry.item_name))) {
      properties = [...new Set([...properties, ...required])];
    } else if (distractors.includes(entry) && !lacksSome(properties, required)) {
      const missing = rng.pick(required);
      properties = properties.filter(p => p !== missing);
    }
    profiles.set(key, properties.sort());
  }
  return profiles;
}

function toSlotItem(entry: BookableItem, profiles: Map<string, string[]>, rng: SeededRng, seatId?: string): SlotItem {
  const properties = [...(profiles.get(entry.item_name.toLowerCase()) ?? [])];
  const seats = entry.seats ?? [];
  const seat = seatId ?? (seats.length > 0 ? rng.pick(seats) : undefined);
  return seat ? { item_name: entry.item_name, seat_id: seat, properties } : { item_name: entry.item_name, properties };
}

function randomItems(pool: BookableItem[], profiles: Map<string, string[]>, rng: SeededRng): SlotItem[] {
  const count = rng.int(MIN_ITEMS_PER_SLOT, Math.min(MAX_ITEMS_PER_SLOT, pool.length));
  return rng.sample(pool, count).map(entry => toSlotItem(entry, profiles, rng));
}

function puzzleItems(
  puzzle: ReservationPuzzle,
  pool: BookableItem[],
  distractors: BookableItem[],
  profiles: Map<string, string[]>,
  rng: SeededRng,
): SlotItem[] {
  const items: SlotItem[] = [];
  for (const s of puzzle.solution) {
    const entry = pool.find(p => sameName(p.item_name, s.item_name)) ?? { item_name: s.item_name };
    items.push(toSlotItem(entry, profiles, rng, s.seat_id));
  }
  for (const entry of distractors) items.push(toSlotItem(entry, profiles, rng));
  return rng.sample(items, items.length);
}

/**
 * Derives and caches per-(location, date) slot grids, and takes bookings
 * against them. The grid seed is FNV-1a of
 * `worldSeed|locationId|Week N, Day|puzzleFingerprint`, fed to xorshift32.
 */
export class AvailabilityEngine {
  private readonly cache = new Map<string, SlotGrid>();
  private readonly puzzles = new Map<string, ReservationPuzzle>();
  private pinned: PinnedAvailability[] = [];

  constructor(
    private readonly map: MapGraph,
    private readonly ledger: BookingLedger,
    private readonly worldSeed: string,
    private readonly context: { taskId: () => string; now: () => string },
  ) {}

  private pinnedGrid(location: Location, date: SimDate): SlotGrid | null {
    const grid: SlotGrid = {};
    let any = false;
    for (const pin of this.pinned) {
      if (pin.location_id !== location.id) continue;
      const declared = location.bookable_items.find(b => sameName(b.item_name, pin.item_name))?.properties ?? [];
      for (const entry of pin.available_times) {
        const parsed = parseEventTime(entry);
        if (!parsed || !sameDate(parsed.date, date)) continue;
        const slot = formatTimeRange(parsed.range);
        (grid[slot] ??= []).push({ item_name: pin.item_name, properties: [...declared].sort() });
        any = true;
      }
    }
    return any ? grid : null;
  }

  derive(location: Location, date: SimDate): SlotGrid {
    const pinned = this.pinnedGrid(location, date);
    if (pinned) return pinned;

    const label = formatSimDate(date);
    const puzzle = this.puzzles.get(gridKey(location.id, label));
    const seed = hashString32([this.worldSeed, location.id, label, puzzle ? puzzleFingerprint(puzzle) : ""].join("|"));
    const rng = new SeededRng(seed);
    const base = itemPool(location, rng);
    const { pool, distractors } = puzzle ? castPuzzle(puzzle, location, base, rng) : { pool: base, distractors: [] };
    const profiles = profileItems(pool, puzzle, distractors, rng);

    const slots = [...RESERVATION_TIME_SLOTS];
    if (puzzle && !slots.includes(puzzle.time_slot)) slots.push(puzzle.time_slot);
    slots.sort(byStart);

    const grid: SlotGrid = {};
    for (const slot of slots) {
      grid[slot] = puzzle && slot === puzzle.time_slot
        ? puzzleItems(puzzle, pool, distractors, profiles, rng)
        : randomItems(base, profiles, rng);
    }
    return grid;
  }

  private gridFor(location: Location, date: SimDate): SlotGrid {
    const key = gridKey(location.id, formatSimDate(date));
    const cached = this.cache.get(key);
    if (cached) return cached;
    const grid = this.derive(location, date);
    this.cache.set(key, grid);
    return grid;
  }

  queryAvailability(locationId: string, date: string): OpResult<AvailabilityView> {
    if (!locationId || !date) return fail("VALIDATION", "Both location_id and date are required.");
    const day = parseSimDate(date);
    if (!day) return fail("VALIDATION", `Invalid date '${date}'. Expected a format like 'Week 1, Saturday'.`);
    const location = this.map.get(locationId);
    if (!location) return fail("NOT_FOUND", `Building '${locationId}' not found.`);

    const label = formatSimDate(day);
    const grid = this.gridFor(location, day);
    const slots: AvailabilitySlot[] = [];
    for (const [timeSlot, items] of Object.entries(grid)) {
      const range = parseTimeRange(timeSlot);
      for (const item of items) {
        const booked = range !== null &&
          this.ledger.conflicting(location.id, label, item.item_name, item.seat_id ?? null, range) !== undefined;
        slots.push({ time_slot: timeSlot, ...item, is_booked: booked });
      }
    }

    const lines = [`Availability query successful! ${location.name} on ${label}:`];
    for (const timeSlot of Object.keys(grid)) {
      const open = slots.filter(s => s.time_slot === timeSlot && !s.is_booked);
      if (open.length === 0) continue;
      lines.push(`- Time slot ${timeSlot}:`);
      for (const s of open) {
        const what = s.seat_id ? `seat ${s.seat_id} in ${s.item_name}` : s.item_name;
        const props = s.properties.length > 0 ? ` [${s.properties.join(", ")}]` : "";
        lines.push(`  - Available: ${what}${props}`);
      }
    }
    const bookedCount = slots.filter(s => s.is_booked).length;
    if (bookedCount > 0) lines.push(`(${bookedCount} offer(s) already booked.)`);

    return ok(lines.join("\n"), {
      location_id: location.id,
      building_name: location.name,
      date: label,
      slots,
    });
  }

  makeBooking(
    locationId: string,
    itemName: string,
    date: string,
    timeSlot: string,
    seatId?: string,
  ): OpResult<Booking> {
    if (!locationId || !itemName || !date || !timeSlot) {
      return fail("VALIDATION", "Location ID, item name, date, and time slot are all required.");
    }
    const day = parseSimDate(date);
    if (!day) return fail("VALIDATION", `Invalid date '${date}'. Expected a format like 'Week 1, Saturday'.`);
    const range = parseTimeRange(timeSlot);
    if (!range) return fail("VALIDATION", `Invalid time slot '${timeSlot}'. Expected a format like '14:00-16:00'.`);
    const location = this.map.get(locationId);
    if (!location) return fail("NOT_FOUND", `Building '${locationId}' not found.`);

    const label = formatSimDate(day);
    const slot = formatTimeRange(range);
    const offers = this.gridFor(location, day)[slot];
    if (!offers) return fail("NOT_FOUND", `${location.name} offers no ${slot} slot on ${label}.`);
    const sameItem = offers.filter(o => sameName(o.item_name, itemName));
    if (sameItem.length === 0) {
      return fail("NOT_FOUND", `${itemName} is not offered at ${location.name} on ${label}, ${slot}.`);
    }
    const offer = sameItem.find(o => (o.seat_id ?? null) === (seatId ?? null));
    if (!offer) {
      if (!seatId) return fail("VALIDATION", `${itemName} is booked by seat; a seat_id is required.`);
      return fail("NOT_FOUND", `Seat ${seatId} in ${itemName} is not offered on ${label}, ${slot}.`);
    }

    const seat = offer.seat_id ?? null;
    if (this.ledger.conflicting(location.id, label, offer.item_name, seat, range)) {
      return fail("CONFLICT", `The requested ${offer.item_name} is already booked for the specified time slot.`);
    }

    const booking = this.ledger.record({
      location_id: location.id,
      item_name: offer.item_name,
      seat_id: seat,
      date: label,
      time_slot: slot,
      task_id: this.context.taskId(),
      booked_at: this.context.now(),
    });
    const what = seat ? `seat ${seat} in ${offer.item_name}` : offer.item_name;
    return ok(`Booking successful! You have successfully reserved ${what} for ${label} from ${slot}.`, booking);
  }

  // -------------------------------------------------------------------------
  // Controller surface
  // -------------------------------------------------------------------------

  /** Solution items must be real rooms of the building that already carry every requirement. */
  private checkSolution(location: Location, puzzle: ReservationPuzzle): OpResult<never> | null {
    if (location.bookable_items.length === 0) return null;
    for (const s of puzzle.solution) {
      const entry = location.bookable_items.find(b => sameName(b.item_name, s.item_name));
      if (!entry) return fail("NOT_FOUND", `${s.item_name} is not a bookable item of ${location.name}.`);
      const declared = entry.properties;
      const missing = declared ? puzzle.required_properties.filter(p => !declared.includes(p)) : [];
      if (missing.length > 0) {
        return fail("VALIDATION", `${entry.item_name} does not offer ${missing.join(", ")}.`);
      }
      const seats = entry.seats ?? [];
      if (seats.length > 0 && (s.seat_id === undefined || !seats.includes(s.seat_id))) {
        return fail("VALIDATION", `${entry.item_name} is booked by seat; give one of ${seats.join(", ")}.`);
      }
      if (seats.length === 0 && s.seat_id !== undefined) {
        return fail("VALIDATION", `${entry.item_name} has no seats.`);
      }
    }
    return null;
  }

  designatePuzzle(puzzle: ReservationPuzzle): OpResult<{ location_id: string; date: string; time_slot: string }> {
    const location = this.map.get(puzzle.location_id);
    if (!location) return fail("NOT_FOUND", `Building '${puzzle.location_id}' not found.`);
    const day = parseSimDate(puzzle.date);
    if (!day) return fail("VALIDATION", `Invalid date '${puzzle.date}'.`);
    const range = parseTimeRange(puzzle.time_slot);
    if (!range) return fail("VALIDATION", `Invalid time slot '${puzzle.time_slot}'.`);
    if (puzzle.solution.length === 0) return fail("VALIDATION", "A reservation puzzle needs at least one solution item.");
    const distractors = puzzle.distractor_count ?? DEFAULT_DISTRACTOR_COUNT;
    if (!Number.isInteger(distractors) || distractors < 0 || distractors > MAX_DISTRACTORS) {
      return fail("VALIDATION", `distractor_count must be an integer between 0 and ${MAX_DISTRACTORS}.`);
    }
    const mismatch = this.checkSolution(location, puzzle);
    if (mismatch) return mismatch;

    const label = formatSimDate(day);
    const normalized: ReservationPuzzle = { ...puzzle, date: label, time_slot: formatTimeRange(range) };
    const key = gridKey(puzzle.location_id, label);
    this.puzzles.set(key, normalized);
    this.cache.delete(key);
    return ok(`Reservation puzzle set for ${puzzle.location_id} on ${label}.`, {
      location_id: puzzle.location_id,
      date: label,
      time_slot: normalized.time_slot,
    });
  }

  pinAvailability(pin: PinnedAvailability): OpResult<{ location_id: string; item_name: string }> {
    if (!this.map.has(pin.location_id)) return fail("NOT_FOUND", `Building '${pin.location_id}' not found.`);
    if (!pin.item_name) return fail("VALIDATION", "item_name is required.");
    const bad = pin.available_times.find(t => parseEventTime(t) === null);
    if (bad !== undefined) return fail("VALIDATION", `Invalid availability entry '${bad}'.`);

    this.pinned.push({ ...pin, available_times: [...pin.available_times] });
    for (const key of [...this.cache.keys()]) {
      if (key.startsWith(`${pin.location_id}|`)) this.cache.delete(key);
    }
    return ok(`Pinned availability for ${pin.item_name} in ${pin.location_id}.`, {
      location_id: pin.location_id,
      item_name: pin.item_name,
    });
  }

  snapshot(): AvailabilitySnapshot {
    return {
      puzzles: [...this.puzzles.values()].map(p => ({ ...p })),
      pinned: this.pinned.map(p => ({ ...p, available_times: [...p.available_times] })),
    };
  }

  restore(snapshot: AvailabilitySnapshot): void {
    this.cache.clear();
    this.puzzles.clear();
    for (const p of snapshot.puzzles) this.puzzles.set(gridKey(p.location_id, p.date), { ...p });
    this.pinned = snapshot.pinned.map(p => ({ ...p, available_times: [...p.available_times] }));
  }
}
