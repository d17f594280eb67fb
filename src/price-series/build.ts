import { Duration, Effect } from "effect";
import type { MarketDay } from "./market-day.js";
import { MalformedPriceDataError, type PriceSeries, type RawPriceData } from "./types.js";

const malformed = (message: string) => new MalformedPriceDataError({ message });

/**
 * Validates provider output into a PriceSeries covering exactly one market
 * day. Input order does not matter; the series is sorted by start.
 */
export const buildPriceSeries = (
  zone: string,
  day: MarketDay,
  raw: RawPriceData,
): Effect.Effect<PriceSeries, MalformedPriceDataError> =>
  Effect.gen(function* () {
    if (raw.intervals.length === 0) {
      return yield* malformed(`No price intervals for ${zone} on ${day.date}`);
    }

    const intervals = [...raw.intervals].sort((a, b) => a.start.getTime() - b.start.getTime());

    let cursor = day.start.getTime();

    for (const interval of intervals) {
      const start = interval.start.getTime();
      const length = Duration.toMillis(interval.duration);

      if (Number.isNaN(start) || !Number.isFinite(length) || length <= 0) {
        return yield* malformed(`Invalid interval starting at ${interval.start.toString()}`);
      }
      if (!Number.isFinite(interval.price)) {
        return yield* malformed(`Invalid price for interval starting at ${interval.start.toISOString()}`);
      }
      if (start < day.start.getTime()) {
        return yield* malformed(`Interval starting at ${interval.start.toISOString()} precedes ${day.date}`);
      }
      if (start < cursor) {
        return yield* malformed(`Interval starting at ${interval.start.toISOString()} overlaps ${new Date(cursor).toISOString()}`);
      }
      if (start > cursor) {
        return yield* malformed(`Missing prices between ${new Date(cursor).toISOString()} and ${interval.start.toISOString()}`);
      }

      cursor = start + length;
    }

    if (cursor < day.end.getTime()) {
      return yield* malformed(`Missing prices between ${new Date(cursor).toISOString()} and ${day.end.toISOString()}`);
    }
    if (cursor > day.end.getTime()) {
      return yield* malformed(`Prices extend past the end of ${day.date} (${day.end.toISOString()})`);
    }

    return {
      zone,
      day,
      currency: raw.currency,
      unit: raw.unit,
      intervals,
    };
  });
