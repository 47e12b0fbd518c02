import type { DateRange } from "../types.js";
import { datesBetween } from "./date-range.js";

export interface SampleOptions {
  /** Max dates to query this cycle. */
  budget: number;
  /** Completed polls so far; rotates the pick inside each bucket. */
  cycle: number;
  /** Today as `YYYY-MM-DD`. Earlier dates are never sampled. */
  today: string;
}

/**
 * Picks up to `budget` dates from the part of the range that is still ahead.
 *
 * The remaining dates are cut into `budget` contiguous buckets and each bucket
 * contributes one date, offset by `cycle` so that successive polls walk through
 * the whole bucket. After ceil(remaining / budget) cycles every date has been
 * queried at least once. Returns [] when nothing remains.
 */
export function sampleDates(range: DateRange, { budget, cycle, today }: SampleOptions): string[] {
  const from = range.startDate > today ? range.startDate : today;
  const remaining = datesBetween(from, range.endDate);
  const k = Math.max(1, Math.floor(budget));

  if (remaining.length <= k) return remaining;

  const n = remaining.length;
  const picks: string[] = [];
  for (let i = 0; i < k; i++) {
    const lo = Math.floor((i * n) / k);
    const hi = Math.floor(((i + 1) * n) / k);
    const width = hi - lo;
    picks.push(remaining[lo + (Math.max(0, cycle) % width)]);
  }
  return picks;
}
