import type pg from "pg";
import { randomUUID } from "node:crypto";
import { toIso, toIsoOrNull } from "../db.js";
import { PersistenceError } from "../errors.js";
import {
  isMaxStops,
  isSeatClass,
  type NewTracker,
  type RemoveResult,
  type Tracker,
  type TrackerPatch,
} from "../types.js";

export interface TrackerStore {
  create(tracker: NewTracker): Promise<Tracker>;
  get(id: string): Promise<Tracker | null>;
  listByOwner(ownerId: string): Promise<Tracker[]>;
  /** Returns false when no tracker has that id. */
  update(id: string, patch: TrackerPatch): Promise<boolean>;
  remove(id: string, ownerId: string): Promise<RemoveResult>;
  /** Non-stale trackers never checked, or last checked a full poll interval ago. */
  listDue(now: Date): Promise<Tracker[]>;
}

interface TrackerRow {
  id: string;
  ownerId: string;
  origin: string;
  destination: string;
  startDate: string;
  endDate: string;
  adults: number;
  seatClass: string;
  maxStops: number | null;
  maxPrice: number;
  createdAt: Date | string;
  lastCheckedAt: Date | string | null;
  lastPrice: number | null;
  lastPriceDate: string | null;
  bestPrice: number | null;
  bestPriceDate: string | null;
  lastNotifiedPrice: number | null;
  lastNotifiedDate: string | null;
  lastNotifiedAt: Date | string | null;
  sampleCycle: number;
  stale: boolean;
}

const TRACKER_COLUMNS = `
  id, owner_id AS "ownerId", origin, destination,
  start_date AS "startDate", end_date AS "endDate",
  adults, seat_class AS "seatClass", max_stops AS "maxStops", max_price AS "maxPrice",
  created_at AS "createdAt", last_checked_at AS "lastCheckedAt",
  last_price AS "lastPrice", last_price_date AS "lastPriceDate",
  best_price AS "bestPrice", best_price_date AS "bestPriceDate",
  last_notified_price AS "lastNotifiedPrice", last_notified_date AS "lastNotifiedDate",
  last_notified_at AS "lastNotifiedAt",
  sample_cycle AS "sampleCycle", stale
`;

// Column and placeholder cast for every patchable field.
const PATCH_COLUMNS: { [K in keyof Required<TrackerPatch>]: [column: string, cast: string] } = {
  lastCheckedAt: ["last_checked_at", "::timestamptz"],
  lastPrice: ["last_price", ""],
  lastPriceDate: ["last_price_date", ""],
  bestPrice: ["best_price", ""],
  bestPriceDate: ["best_price_date", ""],
  lastNotifiedPrice: ["last_notified_price", ""],
  lastNotifiedDate: ["last_notified_date", ""],
  lastNotifiedAt: ["last_notified_at", "::timestamptz"],
  sampleCycle: ["sample_cycle", ""],
  stale: ["stale", ""],
};

function isPatchKey(key: string): key is keyof TrackerPatch {
  return Object.prototype.hasOwnProperty.call(PATCH_COLUMNS, key);
}

function rowToTracker(row: TrackerRow): Tracker {
  if (!isSeatClass(row.seatClass)) {
    throw new Error(`Tracker ${row.id} has unknown seat class "${row.seatClass}"`);
  }
  const maxStops = row.maxStops == null ? null : Number(row.maxStops);
  if (maxStops != null && !isMaxStops(maxStops)) {
    throw new Error(`Tracker ${row.id} has invalid stop limit ${maxStops}`);
  }
  return {
    id: row.id,
    ownerId: row.ownerId,
    origin: row.origin,
    destination: row.destination,
    startDate: row.startDate,
    endDate: row.endDate,
    adults: Number(row.adults),
    seatClass: row.seatClass,
    maxStops,
    maxPrice: Number(row.maxPrice),
    createdAt: toIso(row.createdAt),
    lastCheckedAt: toIsoOrNull(row.lastCheckedAt),
    lastPrice: row.lastPrice == null ? null : Number(row.lastPrice),
    lastPriceDate: row.lastPriceDate,
    bestPrice: row.bestPrice == null ? null : Number(row.bestPrice),
    bestPriceDate: row.bestPriceDate,
    lastNotifiedPrice: row.lastNotifiedPrice == null ? null : Number(row.lastNotifiedPrice),
    lastNotifiedDate: row.lastNotifiedDate,
    lastNotifiedAt: toIsoOrNull(row.lastNotifiedAt),
    sampleCycle: Number(row.sampleCycle),
    stale: row.stale,
  };
}

/**
 * PostgreSQL-backed tracker registry. Every operation is a single statement,
 * so concurrent callers never see half-written rows.
 */
export class PgTrackerStore implements TrackerStore {
  constructor(
    private readonly pool: pg.Pool,
    private readonly pollIntervalMs: number,
  ) {}

  /** Query and row mapping both fail as PersistenceError. */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new PersistenceError(operation, err);
    }
  }

  async create(tracker: NewTracker): Promise<Tracker> {
    const id = randomUUID();
    return this.run("create tracker", async () => {
      const { rows } = await this.pool.query<TrackerRow>(
        `INSERT INTO trackers (
           id, owner_id, origin, destination, start_date, end_date,
           adults, seat_class, max_stops, max_price, created_at
         )
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11::timestamptz)
         RETURNING ${TRACKER_COLUMNS}`,
        [
          id,
          tracker.ownerId,
          tracker.origin,
          tracker.destination,
          tracker.startDate,
          tracker.endDate,
          tracker.adults,
          tracker.seatClass,
          tracker.maxStops,
          tracker.maxPrice,
          tracker.createdAt,
        ],
      );
      return rowToTracker(rows[0]);
    });
  }

  async get(id: string): Promise<Tracker | null> {
    return this.run("get tracker", async () => {
      const { rows } = await this.pool.query<TrackerRow>(`SELECT ${TRACKER_COLUMNS} FROM trackers WHERE id = $1`, [id]);
      return rows.length === 0 ? null : rowToTracker(rows[0]);
    });
  }

  async listByOwner(ownerId: string): Promise<Tracker[]> {
    return this.run("list trackers", async () => {
      const { rows } = await this.pool.query<TrackerRow>(
        `SELECT ${TRACKER_COLUMNS} FROM trackers WHERE owner_id = $1 ORDER BY created_at, id`,
        [ownerId],
      );
      return rows.map(rowToTracker);
    });
  }

  async update(id: string, patch: TrackerPatch): Promise<boolean> {
    const sets: string[] = [];
    const values: unknown[] = [id];
    for (const [key, value] of Object.entries(patch)) {
      if (!isPatchKey(key) || value === undefined) continue;
      const [column, cast] = PATCH_COLUMNS[key];
      values.push(value);
      sets.push(`${column} = $${values.length}${cast}`);
    }
    if (sets.length === 0) return (await this.get(id)) !== null;

    const { rowCount } = await this.run("update tracker", () =>
      this.pool.query(`UPDATE trackers SET ${sets.join(", ")} WHERE id = $1`, values),
    );
    return (rowCount ?? 0) > 0;
  }

  async remove(id: string, ownerId: string): Promise<RemoveResult> {
    const { rowCount } = await this.run("remove tracker", () =>
      this.pool.query(`DELETE FROM trackers WHERE id = $1 AND owner_id = $2`, [id, ownerId]),
    );
    if ((rowCount ?? 0) > 0) return "removed";

    const { rows } = await this.run("remove tracker", () =>
      this.pool.query<{ id: string }>(`SELECT id FROM trackers WHERE id = $1`, [id]),
    );
    return rows.length > 0 ? "forbidden" : "not_found";
  }

  async listDue(now: Date): Promise<Tracker[]> {
    const cutoff = new Date(now.getTime() - this.pollIntervalMs).toISOString();
    return this.run("list due trackers", async () => {
      const { rows } = await this.pool.query<TrackerRow>(
        `SELECT ${TRACKER_COLUMNS} FROM trackers
         WHERE stale = false
           AND (last_checked_at IS NULL OR last_checked_at <= $1::timestamptz)
         ORDER BY created_at, id`,
        [cutoff],
      );
      return rows.map(rowToTracker);
    });
  }
}
