import { ProviderError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { withinStopLimit, type FlightQuery, type FlightSearchResult, type MaxStops, type QuoteSample } from "../types.js";

export interface FlightProvider {
  search(query: FlightQuery, signal: AbortSignal): Promise<FlightSearchResult>;
}

export interface FlightClientOptions {
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export const sleep = (ms: number): Promise<void> => new Promise((r) => setTimeout(r, ms));

/**
 * Wraps a provider with a per-attempt timeout and retries for transient
 * failures. Holds no per-call state, so one instance serves every worker.
 */
export class FlightQueryClient {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(
    private readonly provider: FlightProvider,
    private readonly options: FlightClientOptions,
  ) {
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? console;
  }

  async query(query: FlightQuery): Promise<FlightSearchResult> {
    const { retries, backoffMs } = this.options;
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.attempt(query);
      } catch (err) {
        const providerErr = toProviderError(err);
        if (!providerErr.transient || attempt >= retries) throw providerErr;
        const delay = (attempt + 1) * backoffMs;
        this.logger.warn(
          `  ${describeQuery(query)}: ${providerErr.message}, retrying in ${delay / 1000}s (attempt ${attempt + 1}/${retries})`,
        );
        await this.sleep(delay);
      }
    }
  }

  private async attempt(query: FlightQuery): Promise<FlightSearchResult> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ProviderError(`timed out after ${timeoutMs}ms`, { transient: true }));
      }, timeoutMs);
    });
    try {
      return await Promise.race([this.provider.search(query, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function toProviderError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  return new ProviderError(errorMessage(err), { transient: false, cause: err });
}

export function describeQuery(query: Pick<FlightQuery, "origin" | "destination" | "date">): string {
  return `${query.origin} -> ${query.destination} on ${query.date}`;
}

/** Cheapest itinerary of one date that respects the stop limit. */
export function cheapestQuote(
  date: string,
  result: FlightSearchResult,
  maxStops: MaxStops | null,
): QuoteSample | null {
  let best: QuoteSample | null = null;
  for (const it of result.itineraries) {
    if (!withinStopLimit(it, maxStops)) continue;
    if (best === null || it.price < best.price) {
      best = {
        date,
        price: it.price,
        stops: it.stops,
        priceLevel: result.priceLevel,
        carrier: it.carrier,
        duration: it.duration,
      };
    }
  }
  return best;
}
