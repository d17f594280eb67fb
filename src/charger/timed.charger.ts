import { Clock, Duration, Effect } from "effect";
import { intervalEnd } from "../price-series/types.js";
import type { IChargerController } from "./types.js";

const waitUntil = (instant: Date) => Effect.gen(function* () {
  const now = yield* Clock.currentTimeMillis;
  const delay = instant.getTime() - now;

  if (delay > 0) {
    yield* Effect.logDebug(`Holding charger command until ${instant.toISOString()}`);
    yield* Effect.sleep(Duration.millis(delay));
  }
});

/**
 * Holds each command in-process until its interval boundary: start at the
 * interval's start, stop at its end. For a long-lived process driving a
 * charger without device-side scheduling.
 */
export const withTimedCommands = (controller: IChargerController): IChargerController => ({
  startCharging: (interval) => waitUntil(interval.start).pipe(
    Effect.zipRight(controller.startCharging(interval)),
  ),
  stopCharging: (interval) => waitUntil(intervalEnd(interval)).pipe(
    Effect.zipRight(controller.stopCharging(interval)),
  ),
});
