import { Duration, Effect, Either, Schedule } from 'effect';
import type { IPriceProvider, PriceFetchFailedError } from './price-provider/types.js';
import type { ChargerCommand, CommandOutcome, IChargerController, SessionOutcome } from './charger/types.js';
import type { IMailer, MailSendError } from './mailer/types.js';
import type { IEventLogger } from './event-logger/types.js';
import { EventLogger } from './event-logger/index.js';
import { buildPriceSeries } from './price-series/build.js';
import type { MarketDay } from './price-series/market-day.js';
import { contiguousBlocks, type MalformedPriceDataError, type PriceInterval, type PriceSeries } from './price-series/types.js';
import { selectSchedule } from './schedule-optimizer/index.js';
import type { ChargeConstraints, Schedule as ChargeSchedule, WindowEmptyError } from './schedule-optimizer/types.js';
import { DEFAULT_SUBJECT_TEMPLATE, renderFailureNotice, renderReport, renderSubject, type ContractPricing } from './report/charge-decision-report.js';

type OrchestratorOptions = {
  commandRetries: number;
  commandRetryDelay: Duration.Duration;
  subjectTemplate: string;
  contract?: ContractPricing;
};

export type ChargeRun = {
  readonly series: PriceSeries;
  readonly schedule: ChargeSchedule;
  readonly sessions: ReadonlyArray<SessionOutcome>;
  readonly report: {
    readonly subject: string;
    readonly body: string;
  };
};

export type ChargeRunError =
  | PriceFetchFailedError
  | MalformedPriceDataError
  | WindowEmptyError
  | MailSendError;

export class ChargeOrchestrator {
  public constructor(
    private readonly priceProvider: IPriceProvider,
    private readonly charger: IChargerController,
    private readonly mailer: IMailer,
    private readonly eventLogger: IEventLogger = new EventLogger(),
    private readonly options: OrchestratorOptions = {
      commandRetries: 2,
      commandRetryDelay: Duration.seconds(5),
      subjectTemplate: DEFAULT_SUBJECT_TEMPLATE,
    },
  ) { }

  /**
   * One scheduling pass for a market day: fetch prices, pick the cheapest
   * intervals, drive the charger through them and mail the report.
   */
  public run(day: MarketDay, zone: string, constraints: ChargeConstraints): Effect.Effect<ChargeRun, ChargeRunError> {
    const deps = this;

    return Effect.gen(function* () {
      const raw = yield* deps.priceProvider.fetch(day, zone);
      const series = yield* buildPriceSeries(zone, day, raw);

      yield* Effect.logDebug(`Built price series with ${series.intervals.length} intervals`, {
        currency: series.currency,
        unit: series.unit,
      });

      const schedule = yield* selectSchedule(series, constraints);
      yield* deps.eventLogger.onScheduleSelected(schedule);

      if (schedule.funding._tag === 'Underfunded') {
        yield* Effect.logWarning(`Schedule is short of the requirement by ${Duration.format(schedule.funding.shortfall)}`);
      }

      const sessions = yield* Effect.forEach(
        contiguousBlocks(schedule.intervals),
        (block) => deps.driveSession(block),
      );

      const subject = renderSubject(series, schedule, sessions, deps.options.subjectTemplate);
      const body = renderReport(series, schedule, sessions, { contract: deps.options.contract });

      yield* deps.mailer.send(subject, body);
      yield* deps.eventLogger.onReportSent(subject);

      return { series, schedule, sessions, report: { subject, body } };
    }).pipe(
      Effect.tapError((error) => error._tag === 'MailSendError'
        ? Effect.void
        : deps.notifyFailure(day, zone, error.message)),
      Effect.withSpan('charge-run', { attributes: { zone, date: day.date } }),
    );
  }

  // Adjacent intervals share one session: started at the first, stopped after the last.
  private driveSession(intervals: ReadonlyArray<PriceInterval>): Effect.Effect<SessionOutcome> {
    const deps = this;
    const first = intervals[0];
    const last = intervals[intervals.length - 1];

    return Effect.gen(function* () {
      const start = yield* deps.issue('start_charging', first);

      // Without a start there is nothing to stop.
      const stop: CommandOutcome = start._tag === 'Succeeded'
        ? yield* deps.issue('stop_charging', last)
        : { _tag: 'Skipped', reason: 'start_charging failed' };

      return { intervals, start, stop };
    }).pipe(
      Effect.withSpan('charge-session', {
        attributes: { start: first.start.toISOString(), intervals: intervals.length },
      }),
    );
  }

  // Retries repeat only this command; a start that went through is never sent again.
  private issue(command: ChargerCommand, interval: PriceInterval): Effect.Effect<CommandOutcome> {
    const deps = this;

    return Effect.gen(function* () {
      let attempts = 0;

      const attempt = Effect.suspend(() => {
        attempts += 1;
        return deps.eventLogger.onChargingCommandIssued(command, interval, attempts).pipe(
          Effect.zipRight(command === 'start_charging'
            ? deps.charger.startCharging(interval)
            : deps.charger.stopCharging(interval)),
          Effect.tapError((error) => Effect.logWarning(`${command} attempt ${attempts} failed: ${error.message}`)),
        );
      });

      const result = yield* attempt.pipe(
        Effect.retry({
          times: deps.options.commandRetries,
          schedule: Schedule.spaced(deps.options.commandRetryDelay),
        }),
        Effect.either,
      );

      if (Either.isLeft(result)) {
        yield* deps.eventLogger.onChargingCommandFailed(command, interval, result.left.message);
        return { _tag: 'Failed', attempts, message: result.left.message } satisfies CommandOutcome;
      }

      return { _tag: 'Succeeded', attempts } satisfies CommandOutcome;
    });
  }

  private notifyFailure(day: MarketDay, zone: string, reason: string): Effect.Effect<void> {
    const notice = renderFailureNotice(day.date, zone, reason, this.options.subjectTemplate);

    return Effect.logError(`Charging run failed: ${reason}`).pipe(
      Effect.zipRight(this.mailer.send(notice.subject, notice.body)),
      Effect.catchAll((error) => Effect.logWarning(`Failure notice could not be sent: ${error.message}`)),
    );
  }
}
