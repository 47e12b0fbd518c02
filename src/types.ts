export const SEAT_CLASSES = ["economy", "premium-economy", "business", "first"] as const;
export type SeatClass = (typeof SEAT_CLASSES)[number];

export const STOP_LIMITS = [0, 1, 2] as const;
export type MaxStops = (typeof STOP_LIMITS)[number];

export type PriceLevel = "low" | "typical" | "high";

/** Resolved date span, `YYYY-MM-DD`, end exclusive. */
export interface DateRange {
  startDate: string;
  endDate: string;
}

export type DateRangeRequest =
  | { kind: "days"; start: string; days: number }
  | { kind: "month" };

export interface Tracker extends DateRange {
  id: string;
  ownerId: string;
  origin: string;
  destination: string;
  adults: number;
  seatClass: SeatClass;
  maxStops: MaxStops | null;
  maxPrice: number;
  createdAt: string;
  lastCheckedAt: string | null;
  lastPrice: number | null;
  lastPriceDate: string | null;
  bestPrice: number | null;
  bestPriceDate: string | null;
  lastNotifiedPrice: number | null;
  /** Travel date of the fare last alerted on. */
  lastNotifiedDate: string | null;
  lastNotifiedAt: string | null;
  sampleCycle: number;
  stale: boolean;
}

export type NewTracker = Pick<
  Tracker,
  | "ownerId"
  | "origin"
  | "destination"
  | "startDate"
  | "endDate"
  | "adults"
  | "seatClass"
  | "maxStops"
  | "maxPrice"
  | "createdAt"
>;

/** Fields the poll cycle is allowed to change. */
export type TrackerPatch = Partial<
  Pick<
    Tracker,
    | "lastCheckedAt"
    | "lastPrice"
    | "lastPriceDate"
    | "bestPrice"
    | "bestPriceDate"
    | "lastNotifiedPrice"
    | "lastNotifiedDate"
    | "lastNotifiedAt"
    | "sampleCycle"
    | "stale"
  >
>;

export type RemoveResult = "removed" | "not_found" | "forbidden";

export interface FlightQuery {
  origin: string;
  destination: string;
  date: string;
  /** Round-trip searches only. */
  returnDate?: string;
  adults: number;
  seatClass: SeatClass;
  maxStops: MaxStops | null;
}

export interface Itinerary {
  price: number;
  /** null when the provider did not say. */
  stops: number | null;
  duration: string | null;
  carrier: string | null;
}

export interface FlightSearchResult {
  itineraries: Itinerary[];
  priceLevel: PriceLevel | null;
}

export interface QuoteSample {
  date: string;
  price: number;
  stops: number | null;
  priceLevel: PriceLevel | null;
  carrier: string | null;
  duration: string | null;
}

export interface PriceAlert {
  tracker: Tracker;
  price: number;
  date: string;
  stops: number | null;
  priceLevel: PriceLevel | null;
  carrier: string | null;
  duration: string | null;
}

export interface User {
  id: string;
  username: string;
  passwordHash: string;
  email: string | null;
  phone: string | null;
  createdAt: string;
}

export interface OwnerContact {
  email: string | null;
  phone: string | null;
}

export function isSeatClass(value: string): value is SeatClass {
  return SEAT_CLASSES.some((seatClass) => seatClass === value);
}

export function isMaxStops(value: number): value is MaxStops {
  return STOP_LIMITS.some((limit) => limit === value);
}

/** Unknown stop counts pass only when there is no limit. */
export function withinStopLimit(quote: { stops: number | null }, maxStops: number | null): boolean {
  if (maxStops == null) return true;
  return quote.stops != null && quote.stops <= maxStops;
}
