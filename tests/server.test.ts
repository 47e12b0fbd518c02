import type { Server } from "node:http";
import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { z } from "zod";
import { ProviderError } from "../src/errors.js";
import { createApp } from "../src/server.js";
import { FlightQueryClient } from "../src/services/flight-client.js";
import { TrackerService } from "../src/services/tracker-service.js";
import { flightQuerySchema, parseOrThrow } from "../src/services/validation.js";
import { PgTrackerStore } from "../src/store/tracker-store.js";
import { UserStore } from "../src/store/user-store.js";
import type { FlightQuery, FlightSearchResult } from "../src/types.js";
import { FakeClock, HOUR_MS, createTestPool, silentLogger } from "./helpers.js";

describe("server API", () => {
  let baseUrl: string;
  let server: Server;
  let cookie = "";
  let otherCookie = "";
  let trackerId = "";

  beforeAll(async () => {
    const pool = await createTestPool();
    const clock = new FakeClock("2026-10-19T12:00:00Z");
    const users = new UserStore(pool, 4);
    const trackers = new TrackerService(new PgTrackerStore(pool, 6 * HOUR_MS), clock);
    const client = new FlightQueryClient(
      {
        async search(query: FlightQuery): Promise<FlightSearchResult> {
          if (query.destination === "LAX") throw new ProviderError("provider responded 400", { transient: false });
          return { itineraries: [{ price: 350, stops: 0, duration: "2 hr", carrier: "Delta" }], priceLevel: "low" };
        },
      },
      { timeoutMs: 1000, retries: 0, backoffMs: 0, logger: silentLogger() },
    );

    const app = createApp({
      trackers,
      users,
      searchFlights: async (request) => client.query(parseOrThrow(flightQuerySchema, request)),
      sessionSecret: "test-secret",
      logger: silentLogger(),
    });

    await new Promise<void>((resolve) => {
      server = app.listen(0, () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  function headers(withCookie: string, json = false): Record<string, string> {
    const h: Record<string, string> = {};
    if (json) h["Content-Type"] = "application/json";
    if (withCookie) h["Cookie"] = withCookie;
    return h;
  }

  async function post(path: string, body: object, withCookie = cookie) {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: headers(withCookie, true),
      body: JSON.stringify(body),
    });
  }

  async function get(path: string, withCookie = cookie) {
    return fetch(`${baseUrl}${path}`, { headers: headers(withCookie) });
  }

  async function del(path: string, withCookie = cookie) {
    return fetch(`${baseUrl}${path}`, { method: "DELETE", headers: headers(withCookie) });
  }

  function sessionCookie(res: Response): string {
    const setCookie = res.headers.get("set-cookie");
    return setCookie ? setCookie.split(";")[0] : "";
  }

  it("rejects unauthenticated access to /api/trackers", async () => {
    const res = await get("/api/trackers", "");
    expect(res.status).toBe(401);
  });

  it("registers a new user", async () => {
    const res = await post("/api/auth/register", { username: "alice", password: "testpass123", email: "a@example.com" }, "");
    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({ username: "alice" });
    cookie = sessionCookie(res);
    expect(cookie).toMatch(/^sid=/);
  });

  it("rejects duplicate registration", async () => {
    const res = await post("/api/auth/register", { username: "ALICE", password: "testpass123" }, "");
    expect(res.status).toBe(409);
  });

  it("validates register input", async () => {
    expect((await post("/api/auth/register", { username: "ab", password: "123456" }, "")).status).toBe(400);
    expect((await post("/api/auth/register", { username: "validuser", password: "12345" }, "")).status).toBe(400);
  });

  it("GET /api/auth/me returns current user", async () => {
    const res = await get("/api/auth/me");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ username: "alice" });
  });

  it("rejects a wrong password", async () => {
    const res = await post("/api/auth/login", { username: "alice", password: "nope-nope" }, "");
    expect(res.status).toBe(401);
  });

  it("creates a tracker", async () => {
    const res = await post("/api/trackers", {
      origin: "rdu",
      destination: "mia",
      maxPrice: 400,
      range: { kind: "days", start: "2026-11-10", days: 3 },
    });
    expect(res.status).toBe(201);
    const data: unknown = await res.json();
    expect(data).toMatchObject({ origin: "RDU", destination: "MIA", startDate: "2026-11-10", endDate: "2026-11-13" });
    trackerId = z.object({ id: z.string() }).parse(data).id;
  });

  it("returns every validation issue", async () => {
    const res = await post("/api/trackers", { origin: "RDU", destination: "RDU", maxPrice: 400 });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ issues: ["destination: origin and destination must differ"] });
  });

  it("lists the caller's trackers", async () => {
    const res = await get("/api/trackers");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual([expect.objectContaining({ id: trackerId })]);
  });

  it("keeps other users away from the tracker", async () => {
    const res = await post("/api/auth/register", { username: "bob", password: "testpass123" }, "");
    otherCookie = sessionCookie(res);

    expect((await get(`/api/trackers/${trackerId}`, otherCookie)).status).toBe(403);
    expect((await del(`/api/trackers/${trackerId}`, otherCookie)).status).toBe(403);
    expect(await (await get("/api/trackers", otherCookie)).json()).toEqual([]);
  });

  it("returns 404 for an unknown tracker", async () => {
    const res = await get("/api/trackers/does-not-exist");
    expect(res.status).toBe(404);
  });

  it("searches flights", async () => {
    const res = await get("/api/flights/search?origin=rdu&destination=mia&date=2026-11-10");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      itineraries: [{ price: 350, stops: 0, duration: "2 hr", carrier: "Delta" }],
      priceLevel: "low",
    });
  });

  it("validates search parameters", async () => {
    const res = await get("/api/flights/search?origin=RDU&destination=MIA&date=2026-02-30");
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ issues: ["date: must be a valid YYYY-MM-DD date"] });
  });

  it("rejects a return date before the outbound date", async () => {
    const res = await get("/api/flights/search?origin=RDU&destination=MIA&date=2026-11-10&returnDate=2026-11-08");
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ issues: ["returnDate: must be on or after date"] });
  });

  it("maps provider failures to 502", async () => {
    const res = await get("/api/flights/search?origin=SFO&destination=LAX&date=2026-11-10");
    expect(res.status).toBe(502);
  });

  it("removes a tracker by its short id", async () => {
    const res = await del(`/api/trackers/${trackerId.slice(0, 8)}`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, id: trackerId });
    expect(await (await get("/api/trackers")).json()).toEqual([]);
  });

  it("logs out", async () => {
    const res = await post("/api/auth/logout", {});
    expect(res.status).toBe(200);
    expect((await get("/api/auth/me")).status).toBe(401);
  });
});
