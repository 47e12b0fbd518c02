import type { DateRange, DateRangeRequest } from "../types.js";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  // Date.UTC rolls 2026-02-30 over into March
  return toIsoDate(date) === value ? date : null;
}

export function isValidIsoDate(value: string): boolean {
  return parseIsoDate(value) !== null;
}

export function addDays(isoDate: string, days: number): string {
  const date = parseIsoDate(isoDate);
  if (!date) throw new RangeError(`Not a YYYY-MM-DD date: ${isoDate}`);
  return toIsoDate(new Date(date.getTime() + days * DAY_MS));
}

/** Every date in `[start, endExclusive)`. */
export function datesBetween(start: string, endExclusive: string): string[] {
  const dates: string[] = [];
  for (let d = start; d < endExclusive; d = addDays(d, 1)) {
    dates.push(d);
  }
  return dates;
}

export function monthBounds(today: Date): DateRange {
  const year = today.getUTCFullYear();
  const month = today.getUTCMonth();
  return {
    startDate: toIsoDate(new Date(Date.UTC(year, month, 1))),
    endDate: toIsoDate(new Date(Date.UTC(year, month + 1, 1))),
  };
}

/** Turns the request shorthand into concrete bounds, once, at creation. */
export function resolveDateRange(request: DateRangeRequest, today: Date): DateRange {
  if (request.kind === "month") return monthBounds(today);
  return { startDate: request.start, endDate: addDays(request.start, request.days) };
}

export function isRangeExhausted(range: DateRange, today: string): boolean {
  return range.endDate <= today;
}
