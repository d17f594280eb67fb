#!/usr/bin/env node
import { NodeHttpClient, NodeRuntime } from "@effect/platform-node"
import { Cause, Clock, Duration, Effect, Logger, LogLevel, Option } from "effect"
import { NodeSdk } from "@effect/opentelemetry"
import { SentrySpanProcessor } from "@sentry/opentelemetry";
import * as Sentry from "@sentry/node";
import { AppConfig } from "./config.js";
import { serviceLayers } from "./layers.js";
import { ChargeOrchestrator } from "./charge-orchestrator.js";
import { EventLogger } from "./event-logger/index.js";
import { resolveConstraints } from "./charge-constraints.js";
import { InvalidMarketDayError, nextMarketDate, resolveMarketDay } from "./price-series/market-day.js";
import { BIDDING_ZONES } from "./price-provider/entsoe-zones.js";
import { PriceProvider } from "./price-provider/types.js";
import { ChargerController } from "./charger/types.js";
import { Mailer } from "./mailer/types.js";

const isProd = process.env.NODE_ENV == 'production';

Sentry.init({
  dsn: process.env.SENTRY_DSN,
  tracesSampleRate: 1.0,
});

const NodeSdkLive = NodeSdk.layer(() => ({
  resource: { serviceName: "spot-charge-scheduler" },
  spanProcessor: new SentrySpanProcessor()
}))

const mode = {
  dryRun: process.argv.includes('--dry-run'),
  timed: process.argv.includes('--timed'),
  mail: !process.argv.includes('--no-mail'),
};

const resolveTimeZone = (zone: string) => Effect.gen(function*() {
  const configured = yield* AppConfig.market.timeZone;
  if (Option.isSome(configured)) {
    return configured.value;
  }

  const biddingZone = BIDDING_ZONES[zone];
  if (biddingZone === undefined) {
    return yield* new InvalidMarketDayError({ message: `Unknown market zone ${zone}; set MARKET_TIMEZONE` });
  }
  return biddingZone.timeZone;
});

const program = Effect.gen(function*() {
  const zone = yield* AppConfig.market.zone;
  const timeZone = yield* resolveTimeZone(zone);
  const now = new Date(yield* Clock.currentTimeMillis);
  const date = Option.getOrElse(yield* AppConfig.market.date, () => nextMarketDate(timeZone, now));
  const day = yield* resolveMarketDay(date, timeZone);
  const constraints = resolveConstraints(yield* AppConfig.charge, day);

  yield* Effect.log(`Scheduling charging for ${zone} on ${date}`, mode);

  const orchestrator = new ChargeOrchestrator(
    yield* PriceProvider,
    yield* ChargerController,
    yield* Mailer,
    new EventLogger(),
    {
      commandRetries: yield* AppConfig.commandRetries,
      commandRetryDelay: Duration.seconds(5),
      subjectTemplate: yield* AppConfig.mail.subjectTemplate,
      contract: Option.getOrUndefined(yield* AppConfig.contract),
    },
  );

  yield* orchestrator.run(day, zone, constraints);
}).pipe(
  Effect.provide(serviceLayers(mode)),
  Effect.provide(NodeHttpClient.layer),
  Effect.tapErrorCause((cause) => Effect.logError("Charging run failed", cause).pipe(
    Effect.zipRight(Effect.sync(() => Sentry.captureException(Cause.squash(cause)))),
  )),
  Effect.ensuring(Effect.promise(() => Sentry.flush(2000))),
  Effect.provide(NodeSdkLive),
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);

NodeRuntime.runMain(program);
