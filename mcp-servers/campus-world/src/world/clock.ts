import { DAY_START_TIME } from "../constants.js";
import { fail, ok, type OpResult } from "../result.js";
import { compareWorldTime, formatSimDate, formatWorldTime, parseClock } from "../validation.js";
import type { SimDate, WorldTime } from "../types.js";

/**
 * Authoritative simulated time. Only the controller moves it, and only forward.
 */
export class WorldClock {
  private current: WorldTime;

  constructor(start: WorldTime) {
    this.current = { ...start };
  }

  now(): WorldTime {
    return { ...this.current };
  }

  today(): SimDate {
    return { week: this.current.week, day: this.current.day };
  }

  toString(): string {
    return formatWorldTime(this.current);
  }

  advanceTo(target: WorldTime): OpResult<{ now: string }> {
    if (compareWorldTime(target, this.current) < 0) {
      return fail("VALIDATION", `Cannot move the clock back from ${this.toString()} to ${formatWorldTime(target)}.`);
    }
    this.current = { ...target };
    return ok(`World time is now ${this.toString()}.`, { now: this.toString() });
  }

  /** Moves to the start of `date`; a date already reached leaves the clock where it is. */
  startDay(date: SimDate): OpResult<{ now: string }> {
    const dayStart: WorldTime = { ...date, time: DAY_START_TIME };
    if (compareWorldTime(dayStart, this.current) <= 0) {
      if (date.week === this.current.week && date.day === this.current.day) {
        return ok(`World time is now ${this.toString()}.`, { now: this.toString() });
      }
      return fail("VALIDATION", `Cannot start ${formatSimDate(date)}: the clock is already at ${this.toString()}.`);
    }
    return this.advanceTo(dayStart);
  }

  restore(time: WorldTime): void {
    this.current = { ...time };
  }
}

export function dailyAnnouncement(date: SimDate): string {
  return `System Announcement: Today is ${formatSimDate(date)}.`;
}

/** "14:05" -> "System Prompt: It is now 2:05 PM." */
export function timePrompt(time: string): string {
  const minutes = parseClock(time);
  if (minutes === null) return `System Prompt: It is now ${time}.`;
  const hour = Math.floor(minutes / 60) % 24;
  const minute = String(minutes % 60).padStart(2, "0");
  const suffix = hour < 12 ? "AM" : "PM";
  const hour12 = hour % 12 === 0 ? 12 : hour % 12;
  return `System Prompt: It is now ${hour12}:${minute} ${suffix}.`;
}
