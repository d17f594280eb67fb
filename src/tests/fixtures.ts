import { Duration, Effect } from "effect";
import { resolveMarketDay, type MarketDay } from "../price-series/market-day.js";
import type { PriceInterval, PriceSeries } from "../price-series/types.js";

export const HELSINKI = "Europe/Helsinki";

const HOUR_MS = 60 * 60 * 1000;

// Hour h of the day costs SAMPLE_PRICES[h]. Cheapest hours are 4 and 22.
export const SAMPLE_PRICES = [5, 4, 3, 2, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 9, 8, 7, 6, 5, 4, 3, 2, 1, 2];

export const marketDay = (date: string, timeZone: string = HELSINKI): MarketDay =>
  Effect.runSync(resolveMarketDay(date, timeZone));

export const atHour = (day: MarketDay, hour: number): Date =>
  new Date(day.start.getTime() + hour * HOUR_MS);

export const hourlyIntervals = (day: MarketDay, prices: ReadonlyArray<number>): PriceInterval[] =>
  prices.map((price, hour) => ({
    start: atHour(day, hour),
    duration: Duration.hours(1),
    price,
  }));

export const hourlySeries = (
  day: MarketDay,
  prices: ReadonlyArray<number>,
  zone = "FI",
): PriceSeries => ({
  zone,
  day,
  currency: "EUR",
  unit: "MWh",
  intervals: hourlyIntervals(day, prices),
});
