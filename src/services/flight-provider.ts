import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { ProviderError } from "../errors.js";
import type { FlightQuery, FlightSearchResult, Itinerary, PriceLevel } from "../types.js";
import type { FlightProvider } from "./flight-client.js";

export interface HttpFlightProviderOptions {
  baseUrl: string;
  apiKey?: string;
  /** Transport-level timeout; the query client applies its own on top. */
  timeoutMs?: number;
  http?: AxiosInstance;
}

const flightSchema = z.object({
  name: z.string().nullish(),
  price: z.union([z.number(), z.string()]),
  stops: z.union([z.number(), z.string()]).nullish(),
  duration: z.string().nullish(),
});

const searchResponseSchema = z.object({
  current_price: z.string().nullish(),
  flights: z.array(flightSchema).default([]),
});

/** Handles "$1,234", "1234.50", "USD 980" and plain numbers. */
export function parsePrice(value: number | string): number | null {
  if (typeof value === "number") return Number.isFinite(value) && value > 0 ? value : null;
  const cleaned = value.replace(/,/g, "").replace(/[^\d.]/g, "");
  if (!cleaned) return null;
  const price = Number(cleaned);
  return Number.isFinite(price) && price > 0 ? price : null;
}

function parseStops(value: number | string | null | undefined): number | null {
  if (value == null) return null;
  if (typeof value === "number") return Number.isInteger(value) && value >= 0 ? value : null;
  if (/nonstop/i.test(value)) return 0;
  const match = /\d+/.exec(value);
  return match ? Number(match[0]) : null;
}

function parsePriceLevel(value: string | null | undefined): PriceLevel | null {
  if (value === "low" || value === "typical" || value === "high") return value;
  return null;
}

/**
 * Client for a JSON flight-search endpoint shaped like Google Flights results:
 * `GET /search` returning `{ current_price, flights: [{ name, price, stops, duration }] }`.
 */
export class HttpFlightProvider implements FlightProvider {
  private readonly http: AxiosInstance;

  constructor(options: HttpFlightProviderOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs ?? 30_000,
        headers: options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {},
      });
  }

  async search(query: FlightQuery, signal: AbortSignal): Promise<FlightSearchResult> {
    let data: unknown;
    try {
      const res = await this.http.get<unknown>("/search", {
        params: {
          origin: query.origin,
          destination: query.destination,
          date: query.date,
          return_date: query.returnDate,
          adults: query.adults,
          seat: query.seatClass,
          max_stops: query.maxStops ?? undefined,
        },
        signal,
      });
      data = res.data;
    } catch (err) {
      if (axios.isAxiosError(err) && err.response?.status === 404) {
        return { itineraries: [], priceLevel: null };
      }
      throw classifyHttpError(err);
    }

    const parsed = searchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(`unexpected response: ${parsed.error.issues[0]?.message ?? "invalid body"}`, {
        transient: false,
      });
    }

    const itineraries: Itinerary[] = [];
    for (const flight of parsed.data.flights) {
      const price = parsePrice(flight.price);
      const stops = parseStops(flight.stops);
      if (price == null) continue;
      itineraries.push({
        price,
        stops,
        duration: flight.duration ?? null,
        carrier: flight.name ?? null,
      });
    }
    return { itineraries, priceLevel: parsePriceLevel(parsed.data.current_price) };
  }
}

function classifyHttpError(err: unknown): ProviderError {
  if (!axios.isAxiosError(err)) {
    return new ProviderError(err instanceof Error ? err.message : String(err), { transient: false, cause: err });
  }
  const status = err.response?.status;
  if (status == null) {
    // no response: DNS, refused, reset, timeout, abort
    return new ProviderError(`network error: ${err.code ?? err.message}`, { transient: true, cause: err });
  }
  const transient = status === 408 || status === 429 || status >= 500;
  return new ProviderError(`provider responded ${status}`, { transient, cause: err });
}
