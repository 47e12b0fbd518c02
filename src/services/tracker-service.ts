import { ForbiddenError, NotFoundError, ValidationError } from "../errors.js";
import type { Clock } from "../clock.js";
import type { TrackerStore } from "../store/tracker-store.js";
import type { Tracker } from "../types.js";
import { isRangeExhausted, resolveDateRange, toIsoDate } from "./date-range.js";
import { parseOrThrow, trackerRequestSchema, type TrackerRequest, type Unvalidated } from "./validation.js";

/** Shortest id prefix accepted by `remove`. */
export const MIN_ID_PREFIX = 4;

/**
 * Create / list / remove operations for the command layer. Requests are
 * validated here once; the store only ever sees well-formed trackers.
 */
export class TrackerService {
  constructor(
    private readonly store: TrackerStore,
    private readonly clock: Clock,
  ) {}

  async create(ownerId: string, request: Unvalidated<TrackerRequest>): Promise<Tracker> {
    const valid = parseOrThrow(trackerRequestSchema, request);
    const now = this.clock.now();
    const range = resolveDateRange(valid.range, now);

    if (isRangeExhausted(range, toIsoDate(now))) {
      throw new ValidationError([`range: ${range.startDate} to ${range.endDate} is already in the past`]);
    }

    return this.store.create({
      ownerId,
      origin: valid.origin,
      destination: valid.destination,
      startDate: range.startDate,
      endDate: range.endDate,
      adults: valid.adults,
      seatClass: valid.seatClass,
      maxStops: valid.maxStops,
      maxPrice: valid.maxPrice,
      createdAt: now.toISOString(),
    });
  }

  list(ownerId: string): Promise<Tracker[]> {
    return this.store.listByOwner(ownerId);
  }

  async get(ownerId: string, id: string): Promise<Tracker> {
    const tracker = await this.store.get(id);
    if (!tracker) throw new NotFoundError(id);
    if (tracker.ownerId !== ownerId) throw new ForbiddenError(id);
    return tracker;
  }

  /**
   * Removes by full id, or by a unique prefix of one of the owner's own
   * tracker ids (the short ids shown in listings).
   */
  async remove(ownerId: string, idOrPrefix: string): Promise<Tracker> {
    const tracker = await this.resolve(ownerId, idOrPrefix.trim());
    const result = await this.store.remove(tracker.id, ownerId);
    if (result === "not_found") throw new NotFoundError(tracker.id);
    if (result === "forbidden") throw new ForbiddenError(tracker.id);
    return tracker;
  }

  private async resolve(ownerId: string, idOrPrefix: string): Promise<Tracker> {
    if (!idOrPrefix) throw new ValidationError(["id: must not be empty"]);

    const exact = await this.store.get(idOrPrefix);
    if (exact) {
      if (exact.ownerId !== ownerId) throw new ForbiddenError(idOrPrefix);
      return exact;
    }

    if (idOrPrefix.length < MIN_ID_PREFIX) throw new NotFoundError(idOrPrefix);
    const matches = (await this.store.listByOwner(ownerId)).filter((t) => t.id.startsWith(idOrPrefix));
    if (matches.length === 0) throw new NotFoundError(idOrPrefix);
    if (matches.length > 1) {
      throw new ValidationError([`id: "${idOrPrefix}" matches ${matches.length} trackers, use a longer id`]);
    }
    return matches[0];
  }
}
