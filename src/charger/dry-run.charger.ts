import { Effect, Layer } from "effect";
import { intervalEnd } from "../price-series/types.js";
import { ChargerController, type IChargerController } from "./types.js";

export const dryRunChargerController: IChargerController = {
  startCharging: (interval) =>
    Effect.log(`Dry run: would start charging at ${interval.start.toISOString()} (price ${interval.price})`),
  stopCharging: (interval) =>
    Effect.log(`Dry run: would stop charging at ${intervalEnd(interval).toISOString()}`),
};

export const DryRunChargerLayer = Layer.succeed(ChargerController, dryRunChargerController);
