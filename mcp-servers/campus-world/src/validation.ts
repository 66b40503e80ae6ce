import { DAYS_OF_WEEK, PASS_TYPES } from "./constants.js";
import type { DayOfWeek, PassType, SimDate, TimeRange, WorldTime } from "./types.js";

const CLOCK_RE = /^(\d{1,2}):(\d{2})$/;
const SIM_DATE_RE = /^\s*week\s+(\d+)\s*,?\s*([a-z]+)\s*$/i;
const EVENT_TIME_RE = /^\s*week\s+(\d+)\s*,?\s*([a-z]+)\s*,?\s*(\d{1,2}:\d{2})\s*-\s*(\d{1,2}:\d{2})\s*$/i;
const WORLD_TIME_RE = /^\s*week\s+(\d+)\s*,?\s*([a-z]+)\s*,?\s*(\d{1,2}:\d{2})\s*$/i;
const CREDIT_FILTER_RE = /^\s*(<=|>=|<|>|=)?\s*(\d+(?:\.\d+)?)\s*$/;

/** "HH:MM" -> minutes since midnight. "24:00" is accepted as an end of day. */
export function parseClock(value: string): number | null {
  const match = CLOCK_RE.exec(value.trim());
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (minutes > 59) return null;
  if (hours > 24 || (hours === 24 && minutes > 0)) return null;
  return hours * 60 + minutes;
}

export function formatClock(minutes: number): string {
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}`;
}

export function parseTimeRange(value: string): TimeRange | null {
  const parts = value.split("-");
  if (parts.length !== 2) return null;
  const start = parseClock(parts[0] ?? "");
  const end = parseClock(parts[1] ?? "");
  if (start === null || end === null || start >= end) return null;
  return { start, end };
}

export function formatTimeRange(range: TimeRange): string {
  return `${formatClock(range.start)}-${formatClock(range.end)}`;
}

export function rangesOverlap(a: TimeRange, b: TimeRange): boolean {
  return a.start < b.end && b.start < a.end;
}

export function parseDay(value: string): DayOfWeek | null {
  const lower = value.trim().toLowerCase();
  return DAYS_OF_WEEK.find(d => d.toLowerCase() === lower) ?? null;
}

export function parseSimDate(value: string): SimDate | null {
  const match = SIM_DATE_RE.exec(value);
  if (!match) return null;
  const day = parseDay(match[2] ?? "");
  if (!day) return null;
  return { week: Number(match[1]), day };
}

export function formatSimDate(date: SimDate): string {
  return `Week ${date.week}, ${date.day}`;
}

export function sameDate(a: SimDate, b: SimDate): boolean {
  return a.week === b.week && a.day === b.day;
}

export function compareSimDate(a: SimDate, b: SimDate): number {
  if (a.week !== b.week) return a.week - b.week;
  return DAYS_OF_WEEK.indexOf(a.day) - DAYS_OF_WEEK.indexOf(b.day);
}

/** "Week 1, Monday, 14:00-16:00" -> date + range. */
export function parseEventTime(value: string): { date: SimDate; range: TimeRange } | null {
  const match = EVENT_TIME_RE.exec(value);
  if (!match) return null;
  const day = parseDay(match[2] ?? "");
  const range = parseTimeRange(`${match[3]}-${match[4]}`);
  if (!day || !range) return null;
  return { date: { week: Number(match[1]), day }, range };
}

export function formatEventTime(date: SimDate, range: TimeRange): string {
  return `${formatSimDate(date)}, ${formatTimeRange(range)}`;
}

export function parseWorldTime(value: string): WorldTime | null {
  const match = WORLD_TIME_RE.exec(value);
  if (!match) return null;
  const day = parseDay(match[2] ?? "");
  const minutes = parseClock(match[3] ?? "");
  if (!day || minutes === null || minutes >= 24 * 60) return null;
  return { week: Number(match[1]), day, time: formatClock(minutes) };
}

export function formatWorldTime(time: WorldTime): string {
  return `${formatSimDate(time)}, ${time.time}`;
}

export function compareWorldTime(a: WorldTime, b: WorldTime): number {
  const byDate = compareSimDate(a, b);
  if (byDate !== 0) return byDate;
  return (parseClock(a.time) ?? 0) - (parseClock(b.time) ?? 0);
}

export function isPassType(value: string): value is PassType {
  return PASS_TYPES.some(p => p === value);
}

export function validatePopularity(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 100;
}

export function validateEmailAddress(address: string): boolean {
  const trimmed = address.trim();
  return trimmed.includes("@") && trimmed.includes(".");
}

export interface CreditFilter {
  op: "<=" | ">=" | "<" | ">" | "=";
  value: number;
}

export function parseCreditFilter(filter: string | number): CreditFilter | null {
  if (typeof filter === "number") return { op: "=", value: filter };
  const match = CREDIT_FILTER_RE.exec(filter);
  if (!match) return null;
  const op = match[1];
  const value = Number(match[2]);
  switch (op) {
    case "<=": case ">=": case "<": case ">": case "=":
      return { op, value };
    default:
      return { op: "=", value };
  }
}

export function matchesCreditFilter(credits: number, filter: CreditFilter): boolean {
  switch (filter.op) {
    case "<=": return credits <= filter.value;
    case ">=": return credits >= filter.value;
    case "<": return credits < filter.value;
    case ">": return credits > filter.value;
    case "=": return credits === filter.value;
  }
}
