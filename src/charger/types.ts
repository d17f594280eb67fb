import { Context, Data, Effect } from "effect";
import type { PriceInterval } from "../price-series/types.js";

export class ChargerCommandError extends Data.TaggedError("ChargerCommandError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export type ChargerCommand = "start_charging" | "stop_charging";

/**
 * A charge point that can be told to charge during a price interval. When
 * the command takes effect is up to the implementation: device-side
 * scheduling, or holding the command until the interval boundary.
 */
export class ChargerController extends Context.Tag("ChargerController")<
  ChargerController,
  {
    readonly startCharging: (interval: PriceInterval) => Effect.Effect<void, ChargerCommandError>;
    readonly stopCharging: (interval: PriceInterval) => Effect.Effect<void, ChargerCommandError>;
  }
>() {}

export type IChargerController = Context.Tag.Service<typeof ChargerController>;

export type CommandOutcome =
  | { readonly _tag: "Succeeded"; readonly attempts: number }
  | { readonly _tag: "Failed"; readonly attempts: number; readonly message: string }
  | { readonly _tag: "Skipped"; readonly reason: string };

/**
 * One charging session over a contiguous run of selected intervals: started
 * at the first interval, stopped at the end of the last.
 */
export type SessionOutcome = {
  readonly intervals: ReadonlyArray<PriceInterval>;
  readonly start: CommandOutcome;
  readonly stop: CommandOutcome;
};
