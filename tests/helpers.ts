import type pg from "pg";
import { newDb } from "pg-mem";
import { vi } from "vitest";
import type { Clock } from "../src/clock.js";
import { initDb } from "../src/db.js";
import type { Tracker } from "../src/types.js";

/** In-process Postgres with the app schema already applied. */
export async function createTestPool(): Promise<pg.Pool> {
  const db = newDb();
  const { Pool } = db.adapters.createPg();
  const pool: pg.Pool = new Pool();
  await initDb(pool);
  return pool;
}

export function silentLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export class FakeClock implements Clock {
  private current: Date;

  constructor(iso: string) {
    this.current = new Date(iso);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(iso: string): void {
    this.current = new Date(iso);
  }

  advanceHours(hours: number): void {
    this.current = new Date(this.current.getTime() + hours * 60 * 60 * 1000);
  }
}

export const HOUR_MS = 60 * 60 * 1000;

export function makeTracker(overrides: Partial<Tracker> = {}): Tracker {
  return {
    id: "tracker-1",
    ownerId: "user-1",
    origin: "RDU",
    destination: "MIA",
    startDate: "2026-11-10",
    endDate: "2026-11-13",
    adults: 1,
    seatClass: "economy",
    maxStops: null,
    maxPrice: 400,
    createdAt: "2026-10-19T12:00:00.000Z",
    lastCheckedAt: null,
    lastPrice: null,
    lastPriceDate: null,
    bestPrice: null,
    bestPriceDate: null,
    lastNotifiedPrice: null,
    lastNotifiedDate: null,
    lastNotifiedAt: null,
    sampleCycle: 0,
    stale: false,
    ...overrides,
  };
}
