import { Data, Duration } from "effect";
import type { MarketDay } from "./market-day.js";

export type PriceInterval = {
  readonly start: Date;
  readonly duration: Duration.Duration;
  readonly price: number; // currency per energy unit, may be negative
};

/**
 * Prices as delivered by a provider, before validation.
 */
export type RawPriceData = {
  readonly currency: string;
  readonly unit: string;
  readonly intervals: ReadonlyArray<PriceInterval>;
};

export type PriceSeries = {
  readonly zone: string;
  readonly day: MarketDay;
  readonly currency: string;
  readonly unit: string;
  readonly intervals: ReadonlyArray<PriceInterval>;
};

export class MalformedPriceDataError extends Data.TaggedError("MalformedPriceData")<{
  readonly message: string;
}> {}

export const intervalEnd = (interval: PriceInterval): Date =>
  new Date(interval.start.getTime() + Duration.toMillis(interval.duration));

export const intervalHours = (interval: PriceInterval): number =>
  Duration.toMillis(interval.duration) / Duration.toMillis(Duration.hours(1));

/**
 * Price weighted by interval length: what drawing one unit of power over the
 * intervals costs.
 */
export const priceHours = (intervals: ReadonlyArray<PriceInterval>): number =>
  intervals.reduce((sum, interval) => sum + interval.price * intervalHours(interval), 0);

/**
 * Splits chronologically ordered intervals into maximal runs without gaps.
 */
export const contiguousBlocks = (
  intervals: ReadonlyArray<PriceInterval>,
): ReadonlyArray<ReadonlyArray<PriceInterval>> => {
  const blocks: PriceInterval[][] = [];
  let current: PriceInterval[] = [];

  for (const interval of intervals) {
    const previous = current[current.length - 1];
    if (previous !== undefined && intervalEnd(previous).getTime() !== interval.start.getTime()) {
      blocks.push(current);
      current = [];
    }
    current.push(interval);
  }

  if (current.length > 0) {
    blocks.push(current);
  }

  return blocks;
};
