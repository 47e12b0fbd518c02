import { withinStopLimit, type PriceAlert, type QuoteSample, type Tracker, type TrackerPatch } from "../types.js";

export interface EvaluateOptions {
  now: Date;
  cooldownMinutes: number;
}

export interface Evaluation {
  /** Cheapest qualifying sample of this cycle, if any. */
  best: QuoteSample | null;
  /** Always persisted, whether or not an alert goes out. */
  patch: TrackerPatch;
  alert: PriceAlert | null;
  /** Persisted only once the alert has been delivered. */
  notifiedPatch: TrackerPatch | null;
}

export function evaluateTracker(
  tracker: Tracker,
  samples: QuoteSample[],
  { now, cooldownMinutes }: EvaluateOptions,
): Evaluation {
  let best: QuoteSample | null = null;
  for (const sample of samples) {
    if (!withinStopLimit(sample, tracker.maxStops)) continue;
    if (best === null || sample.price < best.price) best = sample;
  }

  const patch: TrackerPatch = { lastCheckedAt: now.toISOString() };
  if (best === null) {
    return { best, patch, alert: null, notifiedPatch: null };
  }

  patch.lastPrice = best.price;
  patch.lastPriceDate = best.date;
  if (tracker.bestPrice == null || best.price < tracker.bestPrice) {
    patch.bestPrice = best.price;
    patch.bestPriceDate = best.date;
  }

  // Only a fresh quote for the alerted date can show that fare went away.
  // Dates this cycle did not sample say nothing about it.
  let notified: NotificationState = tracker;
  const requoted = samples.find(
    (sample) => sample.date === tracker.lastNotifiedDate && withinStopLimit(sample, tracker.maxStops),
  );
  if (requoted && requoted.price > tracker.maxPrice) {
    patch.lastNotifiedPrice = null;
    patch.lastNotifiedDate = null;
    patch.lastNotifiedAt = null;
    notified = { lastNotifiedPrice: null, lastNotifiedAt: null };
  }

  if (best.price > tracker.maxPrice || !shouldNotify(notified, best.price, now, cooldownMinutes)) {
    return { best, patch, alert: null, notifiedPatch: null };
  }

  return {
    best,
    patch,
    alert: {
      tracker,
      price: best.price,
      date: best.date,
      stops: best.stops,
      priceLevel: best.priceLevel,
      carrier: best.carrier,
      duration: best.duration,
    },
    notifiedPatch: {
      lastNotifiedPrice: best.price,
      lastNotifiedDate: best.date,
      lastNotifiedAt: now.toISOString(),
    },
  };
}

type NotificationState = Pick<Tracker, "lastNotifiedPrice" | "lastNotifiedAt">;

function shouldNotify(tracker: NotificationState, price: number, now: Date, cooldownMinutes: number): boolean {
  if (tracker.lastNotifiedPrice == null) return true;
  if (price < tracker.lastNotifiedPrice) return true;
  return !isInCooldown(tracker.lastNotifiedAt, cooldownMinutes, now);
}

function isInCooldown(notifiedAt: string | null, cooldownMinutes: number, now: Date): boolean {
  if (!notifiedAt) return false;
  const elapsed = now.getTime() - new Date(notifiedAt).getTime();
  return elapsed < cooldownMinutes * 60 * 1000;
}
