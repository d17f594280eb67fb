import { Effect, Layer } from "effect";
import { ZaptecClient } from "../zaptec-client/index.js";
import type { ZaptecError } from "../zaptec-client/errors.js";
import { ChargerCommandError, ChargerController, type IChargerController } from "./types.js";

const toCommandError = (error: ZaptecError) =>
  new ChargerCommandError({ message: error.message, cause: error });

/**
 * Zaptec has no per-interval scheduling API: commands take effect when sent.
 * Combine with `withTimedCommands` to send them at the interval boundaries.
 */
export const makeZaptecChargerController = (client: ZaptecClient): IChargerController => ({
  startCharging: () => client.resumeCharging().pipe(Effect.mapError(toCommandError)),
  stopCharging: () => client.stopCharging().pipe(Effect.mapError(toCommandError)),
});

export const ZaptecChargerLayer = Layer.effect(
  ChargerController,
  Effect.map(ZaptecClient, makeZaptecChargerController),
);
