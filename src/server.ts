import express from "express";
import session from "express-session";
import { randomUUID } from "node:crypto";
import {
  ForbiddenError,
  NotFoundError,
  PersistenceError,
  ProviderError,
  ValidationError,
} from "./errors.js";
import type { Logger } from "./logger.js";
import type { TrackerService } from "./services/tracker-service.js";
import type { FlightQueryRequest, Unvalidated } from "./services/validation.js";
import { UsernameTakenError, type UserStore } from "./store/user-store.js";
import type { FlightSearchResult } from "./types.js";

declare module "express-session" {
  interface SessionData {
    userId: string;
    username: string;
  }
}

export interface AppDeps {
  trackers: TrackerService;
  users: UserStore;
  searchFlights(request: Unvalidated<FlightQueryRequest>): Promise<FlightSearchResult>;
  sessionSecret?: string;
  isProduction?: boolean;
  logger?: Logger;
}

const RATE_LIMIT_WINDOW_MS = 15 * 60 * 1000; // 15 minutes
const RATE_LIMIT_MAX = 10; // max attempts per window

function optionalNumber(value: unknown): number | undefined {
  if (typeof value !== "string" || value.trim() === "") return undefined;
  return Number(value);
}

export function createApp(deps: AppDeps): express.Express {
  const { trackers, users } = deps;
  const logger = deps.logger ?? console;
  const isProduction = deps.isProduction ?? false;

  if (isProduction && !deps.sessionSecret) {
    throw new Error("SESSION_SECRET is required in production.");
  }
  if (!deps.sessionSecret) {
    logger.warn("WARNING: SESSION_SECRET is not set. Using a random secret, sessions will not survive restarts.");
  }

  const app = express();
  app.use(express.json());
  app.use(
    session({
      secret: deps.sessionSecret || randomUUID(),
      resave: false,
      saveUninitialized: false,
      name: "sid",
      cookie: {
        httpOnly: true,
        sameSite: "strict",
        secure: isProduction,
        maxAge: 7 * 24 * 60 * 60 * 1000, // 7 days
      },
    }),
  );
  if (isProduction) {
    app.set("trust proxy", 1);
  }

  // ── Rate limiting for auth endpoints ─────────────────────────────────────
  const loginAttempts = new Map<string, { count: number; resetAt: number }>();

  function rateLimitAuth(req: express.Request, res: express.Response, next: express.NextFunction) {
    const key = req.ip || "unknown";
    const now = Date.now();
    const entry = loginAttempts.get(key);

    if (entry && now < entry.resetAt) {
      if (entry.count >= RATE_LIMIT_MAX) {
        res.status(429).json({
          error: "Too many attempts. Please try again later.",
          retryAfterSeconds: Math.ceil((entry.resetAt - now) / 1000),
        });
        return;
      }
      entry.count++;
    } else {
      loginAttempts.set(key, { count: 1, resetAt: now + RATE_LIMIT_WINDOW_MS });
    }

    if (loginAttempts.size > 10000) {
      for (const [k, v] of loginAttempts) {
        if (now >= v.resetAt) loginAttempts.delete(k);
      }
    }
    next();
  }

  function requireAuth(req: express.Request, res: express.Response, next: express.NextFunction) {
    if (!req.session.userId) {
      res.status(401).json({ error: "Not authenticated" });
      return;
    }
    next();
  }

  function ownerOf(req: express.Request): string {
    const { userId } = req.session;
    if (!userId) throw new Error("requireAuth must run before ownerOf");
    return userId;
  }

  function sendError(res: express.Response, route: string, err: unknown) {
    if (err instanceof ValidationError) {
      res.status(400).json({ error: err.message, issues: err.issues });
    } else if (err instanceof NotFoundError) {
      res.status(404).json({ error: "Tracker not found" });
    } else if (err instanceof ForbiddenError) {
      res.status(403).json({ error: "Tracker belongs to another user" });
    } else if (err instanceof ProviderError) {
      res.status(502).json({ error: "Flight search failed" });
    } else if (err instanceof PersistenceError) {
      logger.error(`${route} error:`, err.message);
      res.status(503).json({ error: "Storage unavailable, try again later" });
    } else {
      logger.error(`${route} error:`, err);
      res.status(500).json({ error: "Internal error" });
    }
  }

  // ── Auth routes ─────────────────────────────────────────────────────────

  app.post("/api/auth/register", rateLimitAuth, async (req, res) => {
    try {
      const { username, password, email, phone } = req.body ?? {};
      if (typeof username !== "string" || typeof password !== "string" || !username || !password) {
        res.status(400).json({ error: "username and password required" });
        return;
      }
      if (username.length < 3 || username.length > 30) {
        res.status(400).json({ error: "Username must be 3-30 characters" });
        return;
      }
      if (password.length < 6) {
        res.status(400).json({ error: "Password must be at least 6 characters" });
        return;
      }
      const user = await users.createUser(username, password, {
        email: typeof email === "string" && email ? email : null,
        phone: typeof phone === "string" && phone ? phone : null,
      });
      req.session.userId = user.id;
      req.session.username = user.username;
      res.status(201).json({ id: user.id, username: user.username });
    } catch (err) {
      if (err instanceof UsernameTakenError) {
        res.status(409).json({ error: err.message });
        return;
      }
      sendError(res, "POST /api/auth/register", err);
    }
  });

  app.post("/api/auth/login", rateLimitAuth, async (req, res) => {
    try {
      const { username, password } = req.body ?? {};
      if (typeof username !== "string" || typeof password !== "string" || !username || !password) {
        res.status(400).json({ error: "username and password required" });
        return;
      }
      const user = await users.verifyUser(username, password);
      if (!user) {
        res.status(401).json({ error: "Invalid username or password" });
        return;
      }
      req.session.userId = user.id;
      req.session.username = user.username;
      res.json({ id: user.id, username: user.username });
    } catch (err) {
      sendError(res, "POST /api/auth/login", err);
    }
  });

  app.post("/api/auth/logout", (req, res) => {
    req.session.destroy(() => {
      res.json({ ok: true });
    });
  });

  app.get("/api/auth/me", requireAuth, (req, res) => {
    res.json({ id: req.session.userId, username: req.session.username });
  });

  app.patch("/api/auth/contact", requireAuth, async (req, res) => {
    try {
      const { email, phone } = req.body ?? {};
      const valid = (v: unknown) => v === undefined || v === null || typeof v === "string";
      if (!valid(email) || !valid(phone)) {
        res.status(400).json({ error: "email and phone must be strings or null" });
        return;
      }
      await users.updateContact(ownerOf(req), {
        email: typeof email === "string" ? email || null : email,
        phone: typeof phone === "string" ? phone || null : phone,
      });
      res.json({ ok: true });
    } catch (err) {
      sendError(res, "PATCH /api/auth/contact", err);
    }
  });

  // ── Tracker routes (protected) ──────────────────────────────────────────

  app.get("/api/trackers", requireAuth, async (req, res) => {
    try {
      res.json(await trackers.list(ownerOf(req)));
    } catch (err) {
      sendError(res, "GET /api/trackers", err);
    }
  });

  app.post("/api/trackers", requireAuth, async (req, res) => {
    try {
      const tracker = await trackers.create(ownerOf(req), req.body);
      res.status(201).json(tracker);
    } catch (err) {
      sendError(res, "POST /api/trackers", err);
    }
  });

  app.get("/api/trackers/:id", requireAuth, async (req, res) => {
    try {
      res.json(await trackers.get(ownerOf(req), String(req.params.id)));
    } catch (err) {
      sendError(res, "GET /api/trackers/:id", err);
    }
  });

  app.delete("/api/trackers/:id", requireAuth, async (req, res) => {
    try {
      const removed = await trackers.remove(ownerOf(req), String(req.params.id));
      res.json({ ok: true, id: removed.id });
    } catch (err) {
      sendError(res, "DELETE /api/trackers/:id", err);
    }
  });

  // ── Flight search (protected) ───────────────────────────────────────────

  app.get("/api/flights/search", requireAuth, async (req, res) => {
    try {
      const { origin, destination, date, returnDate, seatClass } = req.query;
      const result = await deps.searchFlights({
        origin,
        destination,
        date,
        returnDate,
        adults: optionalNumber(req.query.adults),
        seatClass,
        maxStops: optionalNumber(req.query.maxStops),
      });
      res.json(result);
    } catch (err) {
      sendError(res, "GET /api/flights/search", err);
    }
  });

  return app;
}
