import cron from "node-cron";
import { systemClock, type Clock } from "./clock.js";
import { DeliveryError, PersistenceError, ProviderError, errorMessage } from "./errors.js";
import { timestamp, type Logger } from "./logger.js";
import type { TrackerStore } from "./store/tracker-store.js";
import { isRangeExhausted, toIsoDate } from "./services/date-range.js";
import { sampleDates } from "./services/date-sampler.js";
import { cheapestQuote, describeQuery, sleep, type FlightQueryClient } from "./services/flight-client.js";
import type { AlertNotifier } from "./services/notifier.js";
import { evaluateTracker } from "./services/price-evaluator.js";
import { runPool } from "./services/worker-pool.js";
import type { QuoteSample, Tracker, TrackerPatch } from "./types.js";

/** Fires a callback on some schedule until the returned stop function is called. */
export interface Ticker {
  start(task: () => void): () => void;
}

export function cronTicker(expression: string): Ticker {
  if (!cron.validate(expression)) throw new Error(`Invalid cron expression: ${expression}`);
  return {
    start(task) {
      const job = cron.schedule(expression, task);
      return () => job.stop();
    },
  };
}

export type CyclePhase = "idle" | "selecting" | "fanout" | "settling";

export type TrackerStatus = "checked" | "failed" | "stale" | "removed" | "persist_failed";

export interface TrackerOutcome {
  trackerId: string;
  status: TrackerStatus;
  notified: boolean;
  bestPrice: number | null;
}

export interface CycleReport {
  startedAt: string;
  finishedAt: string;
  due: number;
  checked: number;
  failed: number;
  stale: number;
  removed: number;
  persistFailed: number;
  notified: number;
  outcomes: TrackerOutcome[];
}

export interface SchedulerOptions {
  samplingBudget: number;
  cooldownMinutes: number;
  concurrency: number;
  /** Pause between two queries of the same tracker. */
  requestDelayMs: number;
}

export interface SchedulerDeps {
  store: TrackerStore;
  client: FlightQueryClient;
  notifier: AlertNotifier;
  clock?: Clock;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Periodic fare check. Each cycle selects the due trackers, runs them through
 * sample -> query -> evaluate -> notify -> persist on a bounded pool, and
 * settles every tracker on its own, so one failing route never holds up the rest.
 */
export class PollScheduler {
  private readonly store: TrackerStore;
  private readonly client: FlightQueryClient;
  private readonly notifier: AlertNotifier;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  private currentPhase: CyclePhase = "idle";
  private inFlight: Promise<CycleReport> | null = null;
  private stopTicker: (() => void) | null = null;

  constructor(
    deps: SchedulerDeps,
    private readonly options: SchedulerOptions,
  ) {
    this.store = deps.store;
    this.client = deps.client;
    this.notifier = deps.notifier;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? console;
    this.sleep = deps.sleep ?? sleep;
  }

  get phase(): CyclePhase {
    return this.currentPhase;
  }

  get running(): boolean {
    return this.stopTicker !== null;
  }

  /** Runs a cycle now, then one per tick. */
  start(ticker: Ticker): void {
    if (this.stopTicker) return;
    this.stopTicker = ticker.start(() => this.tick());
    this.tick();
  }

  /** Stops ticking and waits for the cycle in progress, if any. */
  async stop(): Promise<void> {
    this.stopTicker?.();
    this.stopTicker = null;
    if (this.inFlight) await this.inFlight;
  }

  private tick(): void {
    void this.runCycle().catch((err) => {
      this.logger.error(`[${timestamp()}] Poll cycle crashed:`, errorMessage(err));
    });
  }

  /** One poll cycle. A call made while a cycle is running joins that cycle. */
  runCycle(): Promise<CycleReport> {
    if (!this.inFlight) {
      this.inFlight = this.cycle().finally(() => {
        this.inFlight = null;
        this.currentPhase = "idle";
      });
    }
    return this.inFlight;
  }

  private async cycle(): Promise<CycleReport> {
    const startedAt = this.clock.now();
    this.currentPhase = "selecting";

    let due: Tracker[];
    try {
      due = await this.store.listDue(startedAt);
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      this.logger.error(`[${timestamp()}] Could not load due trackers:`, err.message);
      return summarize(startedAt, this.clock.now(), 0, []);
    }

    if (due.length === 0) {
      this.logger.log(`[${timestamp()}] No trackers due.`);
      return summarize(startedAt, this.clock.now(), 0, []);
    }

    this.logger.log(`[${timestamp()}] Checking ${due.length} tracker(s)`);
    this.currentPhase = "fanout";
    const settled = await runPool(due, this.options.concurrency, (tracker) => this.processTracker(tracker));

    this.currentPhase = "settling";
    const outcomes = settled.map((result, i): TrackerOutcome => {
      if (result.status === "fulfilled") return result.value;
      this.logger.error(`  Tracker ${due[i].id} crashed:`, errorMessage(result.reason));
      return { trackerId: due[i].id, status: "failed", notified: false, bestPrice: null };
    });

    const report = summarize(startedAt, this.clock.now(), due.length, outcomes);
    this.logger.log(
      `[${timestamp()}] Cycle done: ${report.checked} checked, ${report.failed} failed, ` +
        `${report.stale} stale, ${report.notified} alert(s)`,
    );
    return report;
  }

  private async processTracker(tracker: Tracker): Promise<TrackerOutcome> {
    const now = this.clock.now();
    const today = toIsoDate(now);
    const outcome = (status: TrackerStatus, notified = false, bestPrice: number | null = null): TrackerOutcome => ({
      trackerId: tracker.id,
      status,
      notified,
      bestPrice,
    });

    if (isRangeExhausted(tracker, today)) {
      this.logger.log(`  ${tracker.origin} -> ${tracker.destination}: range ended ${tracker.endDate}, marking stale`);
      const status = await this.settle(tracker, { lastCheckedAt: now.toISOString(), stale: true }, "stale");
      return outcome(status);
    }

    const dates = sampleDates(tracker, {
      budget: this.options.samplingBudget,
      cycle: tracker.sampleCycle,
      today,
    });

    const samples: QuoteSample[] = [];
    let failures = 0;
    for (const [i, date] of dates.entries()) {
      if (i > 0 && this.options.requestDelayMs > 0) await this.sleep(this.options.requestDelayMs);
      try {
        const result = await this.client.query({
          origin: tracker.origin,
          destination: tracker.destination,
          date,
          adults: tracker.adults,
          seatClass: tracker.seatClass,
          maxStops: tracker.maxStops,
        });
        const sample = cheapestQuote(date, result, tracker.maxStops);
        if (sample) samples.push(sample);
      } catch (err) {
        if (!(err instanceof ProviderError)) throw err;
        failures++;
        this.logger.warn(`  Error checking ${describeQuery({ ...tracker, date })}: ${err.message}`);
      }
    }

    const evaluation = evaluateTracker(tracker, samples, {
      now,
      cooldownMinutes: this.options.cooldownMinutes,
    });
    let patch: TrackerPatch = { ...evaluation.patch, sampleCycle: tracker.sampleCycle + 1 };

    if (evaluation.best) {
      this.logger.log(
        `  ${tracker.origin} -> ${tracker.destination}: $${evaluation.best.price.toFixed(2)} on ${evaluation.best.date}`,
      );
    }

    let notified = false;
    if (evaluation.alert) {
      try {
        await this.notifier.notify(tracker.ownerId, evaluation.alert);
        patch = { ...patch, ...evaluation.notifiedPatch };
        notified = true;
      } catch (err) {
        if (!(err instanceof DeliveryError)) throw err;
        this.logger.error(`  Alert for tracker ${tracker.id} not delivered:`, err.message);
      }
    }

    const checked: TrackerStatus = dates.length > 0 && failures === dates.length ? "failed" : "checked";
    const status = await this.settle(tracker, patch, checked);
    return outcome(status, notified, evaluation.best?.price ?? null);
  }

  private async settle(tracker: Tracker, patch: TrackerPatch, status: TrackerStatus): Promise<TrackerStatus> {
    try {
      const found = await this.store.update(tracker.id, patch);
      return found ? status : "removed";
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      this.logger.error(`  Could not save tracker ${tracker.id}, will retry next cycle:`, err.message);
      return "persist_failed";
    }
  }
}

function summarize(startedAt: Date, finishedAt: Date, due: number, outcomes: TrackerOutcome[]): CycleReport {
  const count = (status: TrackerStatus) => outcomes.filter((o) => o.status === status).length;
  return {
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    due,
    checked: count("checked"),
    failed: count("failed"),
    stale: count("stale"),
    removed: count("removed"),
    persistFailed: count("persist_failed"),
    notified: outcomes.filter((o) => o.notified).length,
    outcomes,
  };
}
