import { Duration, Effect, Layer, Redacted, Schedule, Schema } from "effect";
import { HttpClient, HttpClientRequest } from "@effect/platform";
import { XMLParser } from "fast-xml-parser";
import { DateTime } from "luxon";
import { AppConfig } from "../config.js";
import type { MarketDay } from "../price-series/market-day.js";
import type { PriceInterval, RawPriceData } from "../price-series/types.js";
import { BIDDING_ZONES, type BiddingZone } from "./entsoe-zones.js";
import { PriceFetchFailedError, PriceProvider, type IPriceProvider } from "./types.js";

export type EntsoeConfig = {
  readonly apiToken: Redacted.Redacted;
  readonly baseUrl: string;
};

const DAY_AHEAD_PRICES_DOCUMENT = "A44";
// Curve type A03 leaves out points whose price repeats the previous one.
const VARIABLE_SIZED_BLOCKS = "A03";

// ============================================================================
// Document schema (Publication_MarketDocument / Acknowledgement_MarketDocument)
// ============================================================================

const PointSchema = Schema.Struct({
  position: Schema.Number,
  "price.amount": Schema.Number,
});

const PeriodSchema = Schema.Struct({
  timeInterval: Schema.Struct({
    start: Schema.String,
    end: Schema.String,
  }),
  resolution: Schema.String,
  Point: Schema.Array(PointSchema),
});

const TimeSeriesSchema = Schema.Struct({
  "currency_Unit.name": Schema.optional(Schema.String),
  "price_Measure_Unit.name": Schema.optional(Schema.String),
  curveType: Schema.optional(Schema.String),
  Period: Schema.Array(PeriodSchema),
});

const PublicationSchema = Schema.Struct({
  Publication_MarketDocument: Schema.Struct({
    TimeSeries: Schema.Array(TimeSeriesSchema),
  }),
});

const AcknowledgementSchema = Schema.Struct({
  Acknowledgement_MarketDocument: Schema.Struct({
    Reason: Schema.Array(Schema.Struct({
      code: Schema.optional(Schema.Union(Schema.String, Schema.Number)),
      text: Schema.optional(Schema.String),
    })),
  }),
});

const DayAheadDocumentSchema = Schema.Union(PublicationSchema, AcknowledgementSchema);

type Period = Schema.Schema.Type<typeof PeriodSchema>;

const ARRAY_ELEMENTS = new Set(["TimeSeries", "Period", "Point", "Reason"]);

const xmlParser = new XMLParser({
  removeNSPrefix: true,
  isArray: (name: string) => ARRAY_ELEMENTS.has(name),
});

const parseResolution = (resolution: string): Effect.Effect<Duration.Duration, PriceFetchFailedError> => {
  const match = /^PT(\d+)M$/.exec(resolution);
  return match
    ? Effect.succeed(Duration.minutes(parseInt(match[1], 10)))
    : Effect.fail(new PriceFetchFailedError({ message: `Unsupported ENTSO-E resolution ${resolution}` }));
};

const periodIntervals = (
  period: Period,
  curveType: string | undefined,
): Effect.Effect<PriceInterval[], PriceFetchFailedError> =>
  Effect.gen(function* () {
    const resolution = yield* parseResolution(period.resolution);
    const step = Duration.toMillis(resolution);
    const start = Date.parse(period.timeInterval.start);
    const end = Date.parse(period.timeInterval.end);

    if (Number.isNaN(start) || Number.isNaN(end)) {
      return yield* new PriceFetchFailedError({
        message: `Invalid ENTSO-E time interval ${period.timeInterval.start}/${period.timeInterval.end}`,
      });
    }

    const pricesByPosition = new Map(period.Point.map((point) => [point.position, point["price.amount"]]));
    const positions = Math.round((end - start) / step);
    const intervals: PriceInterval[] = [];
    let previous: number | undefined;

    for (let position = 1; position <= positions; position++) {
      const price = pricesByPosition.get(position)
        ?? (curveType === VARIABLE_SIZED_BLOCKS ? previous : undefined);

      if (price !== undefined) {
        intervals.push({
          start: new Date(start + (position - 1) * step),
          duration: resolution,
          price,
        });
      }
      previous = price;
    }

    return intervals;
  });

const normalizeUnit = (unit: string): string =>
  unit.toUpperCase() === "MWH" ? "MWh" : unit;

/**
 * Converts an ENTSO-E day-ahead document into the price intervals that fall
 * on `day`. Missing positions are left as gaps for the caller to reject.
 */
export const parseDayAheadDocument = (
  xml: string,
  day: MarketDay,
): Effect.Effect<RawPriceData, PriceFetchFailedError> =>
  Effect.gen(function* () {
    const parsed: unknown = yield* Effect.try({
      try: () => xmlParser.parse(xml),
      catch: (cause) => new PriceFetchFailedError({ message: "Unreadable ENTSO-E response", cause }),
    });

    const document = yield* Schema.decodeUnknown(DayAheadDocumentSchema)(parsed).pipe(
      Effect.mapError((cause) => new PriceFetchFailedError({ message: "Unrecognized ENTSO-E document", cause })),
    );

    if ("Acknowledgement_MarketDocument" in document) {
      const reasons = document.Acknowledgement_MarketDocument.Reason
        .map((reason) => reason.text ?? String(reason.code ?? "unknown"))
        .join("; ");
      return yield* new PriceFetchFailedError({ message: `ENTSO-E returned no prices: ${reasons}` });
    }

    const timeSeries = document.Publication_MarketDocument.TimeSeries;
    const intervals: PriceInterval[] = [];

    for (const series of timeSeries) {
      for (const period of series.Period) {
        intervals.push(...(yield* periodIntervals(period, series.curveType)));
      }
    }

    const dayStart = day.start.getTime();
    const dayEnd = day.end.getTime();

    return {
      currency: timeSeries[0]?.["currency_Unit.name"] ?? "EUR",
      unit: normalizeUnit(timeSeries[0]?.["price_Measure_Unit.name"] ?? "MWH"),
      intervals: intervals.filter(({ start }) => start.getTime() >= dayStart && start.getTime() < dayEnd),
    };
  });

const formatPeriodBoundary = (instant: Date): string =>
  DateTime.fromJSDate(instant, { zone: "utc" }).toFormat("yyyyLLddHHmm");

export class EntsoePriceProvider implements IPriceProvider {
  private readonly TIMEOUT_MS = 15_000;

  constructor(
    private readonly config: EntsoeConfig,
    private readonly httpClient: HttpClient.HttpClient,
  ) { }

  public fetch(day: MarketDay, zone: string): Effect.Effect<RawPriceData, PriceFetchFailedError> {
    const config = this.config;
    const httpClient = this.httpClient;

    return Effect.gen(function* () {
      const biddingZone: BiddingZone | undefined = BIDDING_ZONES[zone];
      if (biddingZone === undefined) {
        return yield* new PriceFetchFailedError({ message: `Unknown market zone ${zone}` });
      }

      const request = HttpClientRequest.get(config.baseUrl).pipe(
        HttpClientRequest.setUrlParams({
          securityToken: Redacted.value(config.apiToken),
          documentType: DAY_AHEAD_PRICES_DOCUMENT,
          in_Domain: biddingZone.eic,
          out_Domain: biddingZone.eic,
          periodStart: formatPeriodBoundary(day.start),
          periodEnd: formatPeriodBoundary(day.end),
        }),
      );

      const response = yield* httpClient.execute(request);
      const body = yield* response.text;

      yield* Effect.logDebug(`ENTSO-E responded with HTTP ${response.status}`, { zone, date: day.date });

      // "No matching data" comes back as an acknowledgement, sometimes with a 400.
      if (response.status !== 200 && !body.includes("Acknowledgement_MarketDocument")) {
        return yield* new PriceFetchFailedError({
          message: `ENTSO-E responded with HTTP ${response.status}`,
        });
      }

      return yield* parseDayAheadDocument(body, day);
    }).pipe(
      Effect.timeout(Duration.millis(this.TIMEOUT_MS)),
      Effect.retry({
        schedule: Schedule.compose(
          Schedule.recurs(3),
          Schedule.exponential(Duration.seconds(2), 2), // 2s, 4s, 8s
        ),
        while: (err) => err._tag === "TimeoutException" || (err._tag === "RequestError" && err.reason === "Transport"),
      }),
      Effect.catchTags({
        TimeoutException: (cause) => Effect.fail(new PriceFetchFailedError({ message: "ENTSO-E did not respond in time", cause })),
        RequestError: (cause) => Effect.fail(new PriceFetchFailedError({ message: `ENTSO-E request failed: ${cause.message}`, cause })),
        ResponseError: (cause) => Effect.fail(new PriceFetchFailedError({ message: `ENTSO-E response failed: ${cause.message}`, cause })),
      }),
      Effect.withSpan("entsoe-fetch", { attributes: { zone, date: day.date } }),
    );
  }
}

export const EntsoePriceProviderLayer = Layer.effect(
  PriceProvider,
  Effect.gen(function* () {
    const config = AppConfig.entsoe;

    return new EntsoePriceProvider(
      {
        apiToken: yield* config.apiToken,
        baseUrl: yield* config.baseUrl,
      },
      yield* HttpClient.HttpClient,
    );
  }),
);
