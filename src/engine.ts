import type pg from "pg";
import { systemClock, type Clock } from "./clock.js";
import { config, isEmailConfigured, isSmsConfigured, type AppConfig } from "./config.js";
import { createPool } from "./db.js";
import type { Logger } from "./logger.js";
import { PollScheduler } from "./scheduler.js";
import { EmailChannel } from "./services/email-sender.js";
import { FlightQueryClient, type FlightProvider } from "./services/flight-client.js";
import { HttpFlightProvider } from "./services/flight-provider.js";
import { Notifier, type NotificationChannel } from "./services/notifier.js";
import { SmsChannel } from "./services/sms-sender.js";
import { TrackerService } from "./services/tracker-service.js";
import { flightQuerySchema, parseOrThrow, type FlightQueryRequest, type Unvalidated } from "./services/validation.js";
import { PgTrackerStore } from "./store/tracker-store.js";
import { UserStore } from "./store/user-store.js";
import type { FlightSearchResult } from "./types.js";

export interface Engine {
  pool: pg.Pool;
  users: UserStore;
  store: PgTrackerStore;
  trackers: TrackerService;
  client: FlightQueryClient;
  notifier: Notifier;
  scheduler: PollScheduler;
  searchFlights(request: Unvalidated<FlightQueryRequest>): Promise<FlightSearchResult>;
  close(): Promise<void>;
}

export interface EngineOverrides {
  pool?: pg.Pool;
  provider?: FlightProvider;
  channels?: NotificationChannel[];
  clock?: Clock;
  logger?: Logger;
}

function channelsFromConfig(settings: AppConfig): NotificationChannel[] {
  const channels: NotificationChannel[] = [];
  const { smtp, twilio } = settings;
  if (isEmailConfigured(settings) && smtp.host && smtp.user && smtp.pass) {
    channels.push(new EmailChannel({ host: smtp.host, port: smtp.port, user: smtp.user, pass: smtp.pass }));
  }
  if (isSmsConfigured(settings) && twilio.accountSid && twilio.authToken && twilio.fromNumber) {
    channels.push(
      new SmsChannel({ accountSid: twilio.accountSid, authToken: twilio.authToken, fromNumber: twilio.fromNumber }),
    );
  }
  return channels;
}

/**
 * Builds one engine instance. Every component gets its collaborators here;
 * nothing reaches for shared module state.
 */
export function createEngine(settings: AppConfig = config, overrides: EngineOverrides = {}): Engine {
  const clock = overrides.clock ?? systemClock;
  const logger = overrides.logger ?? console;
  const pool = overrides.pool ?? createPool(settings.databaseUrl);

  const users = new UserStore(pool);
  const store = new PgTrackerStore(pool, settings.pollIntervalHours * 60 * 60 * 1000);
  const trackers = new TrackerService(store, clock);

  const provider =
    overrides.provider ??
    new HttpFlightProvider({
      baseUrl: settings.flightApi.baseUrl,
      apiKey: settings.flightApi.apiKey,
      timeoutMs: settings.flightApi.timeoutMs,
    });
  const client = new FlightQueryClient(provider, {
    timeoutMs: settings.flightApi.timeoutMs,
    retries: settings.flightApi.retries,
    backoffMs: settings.flightApi.backoffMs,
    logger,
  });

  const notifier = new Notifier(
    overrides.channels ?? channelsFromConfig(settings),
    users,
    { email: settings.notifyEmail ?? null, phone: settings.notifySms ?? null },
    logger,
  );

  const scheduler = new PollScheduler(
    { store, client, notifier, clock, logger },
    {
      samplingBudget: settings.samplingBudget,
      cooldownMinutes: settings.cooldownHours * 60,
      concurrency: settings.concurrency,
      requestDelayMs: settings.requestDelayMs,
    },
  );

  return {
    pool,
    users,
    store,
    trackers,
    client,
    notifier,
    scheduler,
    async searchFlights(request) {
      return client.query(parseOrThrow(flightQuerySchema, request));
    },
    async close() {
      await scheduler.stop();
      await pool.end();
    },
  };
}
