import { Duration, Option } from "effect";
import { atLocalTime, type MarketDay } from "./price-series/market-day.js";
import type { ChargeConstraints } from "./schedule-optimizer/types.js";

export type ChargeNeed =
  | { readonly _tag: "Duration"; readonly minutes: number }
  | { readonly _tag: "Energy"; readonly energyKwh: number; readonly chargingPowerKw: number };

/**
 * Charging constraints as configured: local times of day rather than
 * instants, so they can be resolved against any market day.
 */
export type ChargeSettings = {
  readonly need: ChargeNeed;
  readonly earliestStart: string; // HH:mm
  readonly deadline: string; // HH:mm, 24:00 = end of day
  readonly minBlockMinutes: Option.Option<number>;
  readonly maxSessions: Option.Option<number>;
  readonly chargingPowerKw: Option.Option<number>;
};

export const requiredDuration = (need: ChargeNeed): Duration.Duration => {
  switch (need._tag) {
    case "Duration":
      return Duration.minutes(need.minutes);
    case "Energy":
      // rounded to whole minutes
      return Duration.minutes(Math.ceil((need.energyKwh / need.chargingPowerKw) * 60));
  }
};

export const resolveConstraints = (settings: ChargeSettings, day: MarketDay): ChargeConstraints => ({
  requiredDuration: requiredDuration(settings.need),
  earliestStart: atLocalTime(day, settings.earliestStart),
  deadline: atLocalTime(day, settings.deadline),
  minContiguousBlock: Option.getOrUndefined(Option.map(settings.minBlockMinutes, Duration.minutes)),
  maxSessions: Option.getOrUndefined(settings.maxSessions),
  chargingPowerKw: settings.need._tag === "Energy"
    ? settings.need.chargingPowerKw
    : Option.getOrUndefined(settings.chargingPowerKw),
});
