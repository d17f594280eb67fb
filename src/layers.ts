import { Effect, Layer } from "effect";
import { AppConfig } from "./config.js";
import { EntsoePriceProviderLayer } from "./price-provider/entsoe.price-provider.js";
import { ZaptecClientLayer } from "./zaptec-client/index.js";
import { ZaptecChargerLayer } from "./charger/zaptec.charger.js";
import { DryRunChargerLayer } from "./charger/dry-run.charger.js";
import { withTimedCommands } from "./charger/timed.charger.js";
import { ChargerController } from "./charger/types.js";
import { SmtpMailerLayer } from "./mailer/smtp.mailer.js";
import { LogMailerLayer } from "./mailer/log.mailer.js";

export type RunMode = {
  readonly dryRun: boolean;
  readonly timed: boolean;
  readonly mail: boolean;
};

const ZaptecLayer = Layer.unwrapEffect(Effect.gen(function* () {
  const config = AppConfig.zaptec;

  return ZaptecClientLayer({
    baseUrl: yield* config.baseUrl,
    credentials: yield* config.credentials,
    chargerId: yield* config.chargerId,
  });
}));

const TimedChargerLayer = Layer.effect(
  ChargerController,
  Effect.map(ChargerController, withTimedCommands),
);

// Zaptec acts on commands as soon as they arrive, so they are always held
// until the interval boundaries. A dry run only waits when asked to.
const chargerLayer = (mode: RunMode) => {
  if (!mode.dryRun) {
    return TimedChargerLayer.pipe(
      Layer.provide(ZaptecChargerLayer),
      Layer.provide(ZaptecLayer),
    );
  }

  return mode.timed ? TimedChargerLayer.pipe(Layer.provide(DryRunChargerLayer)) : DryRunChargerLayer;
};

export const serviceLayers = (mode: RunMode) => Layer.mergeAll(
  EntsoePriceProviderLayer,
  chargerLayer(mode),
  mode.mail ? SmtpMailerLayer : LogMailerLayer,
);
