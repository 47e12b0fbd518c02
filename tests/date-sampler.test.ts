import { describe, it, expect } from "vitest";
import { sampleDates } from "../src/services/date-sampler.js";

const range = { startDate: "2026-11-01", endDate: "2026-11-11" };
const today = "2026-10-19";

describe("sampleDates", () => {
  it("takes one date per bucket, starting at each bucket's first date", () => {
    expect(sampleDates(range, { budget: 3, cycle: 0, today })).toEqual([
      "2026-11-01",
      "2026-11-04",
      "2026-11-07",
    ]);
  });

  it("shifts the pick inside each bucket on the next cycle", () => {
    expect(sampleDates(range, { budget: 3, cycle: 1, today })).toEqual([
      "2026-11-02",
      "2026-11-05",
      "2026-11-08",
    ]);
  });

  it("wraps short buckets while longer ones keep walking", () => {
    expect(sampleDates(range, { budget: 3, cycle: 3, today })).toEqual([
      "2026-11-01",
      "2026-11-04",
      "2026-11-10",
    ]);
  });

  it("covers every date after enough cycles", () => {
    const seen = new Set<string>();
    for (let cycle = 0; cycle < 4; cycle++) {
      for (const date of sampleDates(range, { budget: 3, cycle, today })) seen.add(date);
    }
    expect(seen.size).toBe(10);
  });

  it("returns every remaining date when they fit in the budget", () => {
    expect(sampleDates({ startDate: "2026-11-10", endDate: "2026-11-13" }, { budget: 5, cycle: 7, today })).toEqual([
      "2026-11-10",
      "2026-11-11",
      "2026-11-12",
    ]);
  });

  it("never samples dates before today", () => {
    expect(sampleDates(range, { budget: 3, cycle: 0, today: "2026-11-08" })).toEqual([
      "2026-11-08",
      "2026-11-09",
      "2026-11-10",
    ]);
  });

  it("returns nothing once the range has passed", () => {
    expect(sampleDates(range, { budget: 3, cycle: 0, today: "2026-11-11" })).toEqual([]);
  });

  it("treats a budget below one as one", () => {
    expect(sampleDates(range, { budget: 0, cycle: 12, today })).toEqual(["2026-11-03"]);
  });
});
