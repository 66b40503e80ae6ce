import type { Booking, TimeRange } from "../types.js";
import { parseTimeRange, rangesOverlap } from "../validation.js";

export type NewBooking = Omit<Booking, "reservation_id">;

/**
 * Append-only record of confirmed reservations. Entries are never removed,
 * so a booking stays visible to every later query in the run.
 */
export class BookingLedger {
  private entries: Booking[] = [];

  /** An existing booking of the same item (and seat) whose time overlaps `range`. */
  conflicting(
    locationId: string,
    date: string,
    itemName: string,
    seatId: string | null,
    range: TimeRange,
  ): Booking | undefined {
    return this.entries.find(b => {
      if (b.location_id !== locationId || b.date !== date) return false;
      if (b.item_name !== itemName || b.seat_id !== seatId) return false;
      const booked = parseTimeRange(b.time_slot);
      return booked !== null && rangesOverlap(booked, range);
    });
  }

  record(booking: NewBooking): Booking {
    const entry: Booking = { reservation_id: this.entries.length + 1, ...booking };
    this.entries.push(entry);
    return entry;
  }

  list(taskId?: string): Booking[] {
    const all = taskId === undefined ? this.entries : this.entries.filter(b => b.task_id === taskId);
    return all.map(b => ({ ...b }));
  }

  restore(entries: Booking[]): void {
    this.entries = entries.map(b => ({ ...b }));
  }
}
