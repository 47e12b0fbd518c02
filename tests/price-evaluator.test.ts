import { describe, it, expect } from "vitest";
import { evaluateTracker } from "../src/services/price-evaluator.js";
import type { QuoteSample } from "../src/types.js";
import { makeTracker } from "./helpers.js";

const now = new Date("2026-10-19T12:00:00.000Z");
const options = { now, cooldownMinutes: 24 * 60 };

function sample(date: string, price: number, stops: number | null = 0): QuoteSample {
  return { date, price, stops, priceLevel: null, carrier: "Delta", duration: null };
}

describe("evaluateTracker", () => {
  it("only records the check when there are no samples", () => {
    const result = evaluateTracker(makeTracker(), [], options);
    expect(result.best).toBeNull();
    expect(result.alert).toBeNull();
    expect(result.patch).toEqual({ lastCheckedAt: "2026-10-19T12:00:00.000Z" });
  });

  it("alerts on the first fare at or under the threshold", () => {
    const result = evaluateTracker(
      makeTracker(),
      [sample("2026-11-10", 500), sample("2026-11-11", 350), sample("2026-11-12", 450)],
      options,
    );
    expect(result.best?.date).toBe("2026-11-11");
    expect(result.alert?.price).toBe(350);
    expect(result.alert?.date).toBe("2026-11-11");
    expect(result.patch).toEqual({
      lastCheckedAt: "2026-10-19T12:00:00.000Z",
      lastPrice: 350,
      lastPriceDate: "2026-11-11",
      bestPrice: 350,
      bestPriceDate: "2026-11-11",
    });
    expect(result.notifiedPatch).toEqual({
      lastNotifiedPrice: 350,
      lastNotifiedDate: "2026-11-11",
      lastNotifiedAt: "2026-10-19T12:00:00.000Z",
    });
  });

  it("alerts when the fare equals the threshold", () => {
    const result = evaluateTracker(makeTracker(), [sample("2026-11-10", 400)], options);
    expect(result.alert?.price).toBe(400);
  });

  it("keeps the earliest date on a price tie", () => {
    const result = evaluateTracker(makeTracker(), [sample("2026-11-11", 350), sample("2026-11-12", 350)], options);
    expect(result.best?.date).toBe("2026-11-11");
  });

  it("stays quiet for the same fare inside the cooldown", () => {
    const tracker = makeTracker({ lastNotifiedPrice: 350, lastNotifiedAt: "2026-10-19T06:00:00.000Z" });
    const result = evaluateTracker(tracker, [sample("2026-11-11", 350)], options);
    expect(result.alert).toBeNull();
    expect(result.notifiedPatch).toBeNull();
  });

  it("alerts on a lower fare even inside the cooldown", () => {
    const tracker = makeTracker({ lastNotifiedPrice: 350, lastNotifiedAt: "2026-10-19T06:00:00.000Z" });
    const result = evaluateTracker(tracker, [sample("2026-11-11", 340)], options);
    expect(result.alert?.price).toBe(340);
  });

  it("alerts on the same fare again once the cooldown has passed", () => {
    const tracker = makeTracker({ lastNotifiedPrice: 350, lastNotifiedAt: "2026-10-18T11:00:00.000Z" });
    const result = evaluateTracker(tracker, [sample("2026-11-11", 350)], options);
    expect(result.alert?.price).toBe(350);
  });

  it("re-arms when the alerted date is quoted back over the threshold", () => {
    const tracker = makeTracker({
      bestPrice: 350,
      bestPriceDate: "2026-11-11",
      lastNotifiedPrice: 350,
      lastNotifiedDate: "2026-11-11",
      lastNotifiedAt: "2026-10-19T06:00:00.000Z",
    });
    const result = evaluateTracker(tracker, [sample("2026-11-11", 420)], options);
    expect(result.alert).toBeNull();
    expect(result.patch).toEqual({
      lastCheckedAt: "2026-10-19T12:00:00.000Z",
      lastPrice: 420,
      lastPriceDate: "2026-11-11",
      lastNotifiedPrice: null,
      lastNotifiedDate: null,
      lastNotifiedAt: null,
    });
  });

  it("keeps the notification state when the alerted date was not quoted", () => {
    const tracker = makeTracker({
      lastNotifiedPrice: 350,
      lastNotifiedDate: "2026-11-11",
      lastNotifiedAt: "2026-10-19T06:00:00.000Z",
    });
    const result = evaluateTracker(tracker, [sample("2026-11-10", 450), sample("2026-11-12", 450)], options);
    expect(result.alert).toBeNull();
    expect(result.patch).toEqual({
      lastCheckedAt: "2026-10-19T12:00:00.000Z",
      lastPrice: 450,
      lastPriceDate: "2026-11-10",
      bestPrice: 450,
      bestPriceDate: "2026-11-10",
    });
  });

  it("alerts on another date once the alerted fare is gone", () => {
    const tracker = makeTracker({
      lastNotifiedPrice: 350,
      lastNotifiedDate: "2026-11-11",
      lastNotifiedAt: "2026-10-19T06:00:00.000Z",
    });
    const result = evaluateTracker(tracker, [sample("2026-11-10", 380), sample("2026-11-11", 420)], options);
    expect(result.patch).toMatchObject({ lastNotifiedPrice: null, lastNotifiedDate: null, lastNotifiedAt: null });
    expect(result.alert).toMatchObject({ price: 380, date: "2026-11-10" });
    expect(result.notifiedPatch).toEqual({
      lastNotifiedPrice: 380,
      lastNotifiedDate: "2026-11-10",
      lastNotifiedAt: "2026-10-19T12:00:00.000Z",
    });
  });

  it("leaves the notification fields alone above the threshold when nothing was sent", () => {
    const result = evaluateTracker(makeTracker(), [sample("2026-11-11", 420)], options);
    expect("lastNotifiedPrice" in result.patch).toBe(false);
    expect("lastNotifiedAt" in result.patch).toBe(false);
  });

  it("never raises the best price seen", () => {
    const tracker = makeTracker({ bestPrice: 300, bestPriceDate: "2026-11-10" });
    const result = evaluateTracker(tracker, [sample("2026-11-11", 350)], options);
    expect(result.patch.lastPrice).toBe(350);
    expect(result.patch.bestPrice).toBeUndefined();
  });

  it("ignores samples over the stop limit", () => {
    const tracker = makeTracker({ maxStops: 0 });
    const result = evaluateTracker(tracker, [sample("2026-11-10", 100, 1), sample("2026-11-11", 390, 0)], options);
    expect(result.best?.price).toBe(390);
  });

  it("counts unknown stops only when the tracker has no stop limit", () => {
    const samples = [sample("2026-11-10", 300, null), sample("2026-11-11", 390, 0)];
    expect(evaluateTracker(makeTracker(), samples, options).best?.price).toBe(300);
    expect(evaluateTracker(makeTracker({ maxStops: 1 }), samples, options).best?.price).toBe(390);
  });
});
