import { Context, Data, Effect } from "effect";
import type { MarketDay } from "../price-series/market-day.js";
import type { RawPriceData } from "../price-series/types.js";

export class PriceFetchFailedError extends Data.TaggedError("PriceFetchFailed")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class PriceProvider extends Context.Tag("PriceProvider")<
  PriceProvider,
  {
    readonly fetch: (day: MarketDay, zone: string) => Effect.Effect<RawPriceData, PriceFetchFailedError>;
  }
>() {}

export type IPriceProvider = Context.Tag.Service<typeof PriceProvider>;
