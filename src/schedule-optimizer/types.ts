import { Data, Duration } from "effect";
import type { PriceInterval } from "../price-series/types.js";

export type ChargeConstraints = {
  readonly requiredDuration: Duration.Duration;
  readonly earliestStart: Date;
  readonly deadline: Date;
  readonly minContiguousBlock?: Duration.Duration; // some chargers penalise on/off cycling
  readonly maxSessions?: number;
  readonly chargingPowerKw?: number;
};

export type Funding =
  | { readonly _tag: "FullyFunded" }
  | { readonly _tag: "Underfunded"; readonly shortfall: Duration.Duration };

export type Schedule = {
  readonly intervals: ReadonlyArray<PriceInterval>; // chronological
  readonly requiredDuration: Duration.Duration;
  readonly totalDuration: Duration.Duration;
  readonly totalCost: number;
  readonly funding: Funding;
  readonly chargingPowerKw?: number;
};

export class WindowEmptyError extends Data.TaggedError("WindowEmpty")<{
  readonly earliestStart: Date;
  readonly deadline: Date;
}> {
  public override readonly message =
    `No price intervals between ${this.earliestStart.toISOString()} and ${this.deadline.toISOString()}`;
}
