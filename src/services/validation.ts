import { z } from "zod";
import { ValidationError } from "../errors.js";
import { SEAT_CLASSES, isMaxStops } from "../types.js";
import { isValidIsoDate } from "./date-range.js";

const airportCode = z
  .string()
  .trim()
  .regex(/^[A-Za-z]{3}$/, "must be a 3-letter airport code")
  .transform((code) => code.toUpperCase());

const isoDate = z.string().refine(isValidIsoDate, "must be a valid YYYY-MM-DD date");

const maxStops = z
  .number()
  .int()
  .refine(isMaxStops, "must be 0, 1 or 2")
  .nullable()
  .default(null);

export const dateRangeSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("days"),
    start: isoDate,
    days: z.number().int().min(1, "must be at least 1").max(365, "must be at most 365"),
  }),
  z.object({ kind: z.literal("month") }),
]);

export const trackerRequestSchema = z
  .object({
    origin: airportCode,
    destination: airportCode,
    maxPrice: z.number().finite().positive("must be greater than 0"),
    range: dateRangeSchema.default({ kind: "month" }),
    adults: z.number().int().min(1).max(9).default(1),
    seatClass: z.enum(SEAT_CLASSES).default("economy"),
    maxStops,
  })
  .refine((r) => r.origin !== r.destination, {
    message: "origin and destination must differ",
    path: ["destination"],
  });

export const flightQuerySchema = z
  .object({
    origin: airportCode,
    destination: airportCode,
    date: isoDate,
    returnDate: isoDate.optional(),
    adults: z.number().int().min(1).max(9).default(1),
    seatClass: z.enum(SEAT_CLASSES).default("economy"),
    maxStops,
  })
  .refine((q) => q.origin !== q.destination, {
    message: "origin and destination must differ",
    path: ["destination"],
  })
  .refine((q) => q.returnDate === undefined || q.returnDate >= q.date, {
    message: "must be on or after date",
    path: ["returnDate"],
  });

export type TrackerRequest = z.input<typeof trackerRequestSchema>;
export type FlightQueryRequest = z.input<typeof flightQuerySchema>;

/** A request as it arrives from a query string or form; the schema checks every field. */
export type Unvalidated<T> = { [K in keyof T]?: unknown };

/** Parses `input` or throws a ValidationError listing every issue as `path: message`. */
export function parseOrThrow<O, I>(schema: z.ZodType<O, z.ZodTypeDef, I>, input: unknown): O {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    );
  }
  return result.data;
}
