import pg from "pg";

export function createPool(databaseUrl: string): pg.Pool {
  const isLocal = databaseUrl.includes("localhost") || databaseUrl.includes("127.0.0.1");
  const dbUrl = !isLocal && !databaseUrl.includes("sslmode=")
    ? databaseUrl + (databaseUrl.includes("?") ? "&" : "?") + "sslmode=require"
    : databaseUrl;

  return new pg.Pool({
    connectionString: dbUrl,
    ssl: isLocal ? false : { rejectUnauthorized: false },
  });
}

// ── Schema initialization ────────────────────────────────────────────────

export async function initDb(pool: pg.Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS users (
      id            TEXT PRIMARY KEY,
      username      TEXT UNIQUE NOT NULL,
      password_hash TEXT NOT NULL,
      email         TEXT,
      phone         TEXT,
      created_at    TIMESTAMPTZ NOT NULL DEFAULT now()
    );

    CREATE UNIQUE INDEX IF NOT EXISTS users_username_lower_idx ON users (LOWER(username));

    CREATE TABLE IF NOT EXISTS trackers (
      id                  TEXT PRIMARY KEY,
      owner_id            TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      origin              TEXT NOT NULL,
      destination         TEXT NOT NULL,
      start_date          TEXT NOT NULL,
      end_date            TEXT NOT NULL,
      adults              INTEGER NOT NULL,
      seat_class          TEXT NOT NULL,
      max_stops           INTEGER,
      max_price           DOUBLE PRECISION NOT NULL,
      created_at          TIMESTAMPTZ NOT NULL,
      last_checked_at     TIMESTAMPTZ,
      last_price          DOUBLE PRECISION,
      last_price_date     TEXT,
      best_price          DOUBLE PRECISION,
      best_price_date     TEXT,
      last_notified_price DOUBLE PRECISION,
      last_notified_date  TEXT,
      last_notified_at    TIMESTAMPTZ,
      sample_cycle        INTEGER NOT NULL DEFAULT 0,
      stale               BOOLEAN NOT NULL DEFAULT false
    );
  `);
}

/** pg hands back Date for TIMESTAMPTZ; some drivers and mocks give strings. */
export function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

export function toIsoOrNull(value: Date | string | null): string | null {
  return value == null ? null : toIso(value);
}
