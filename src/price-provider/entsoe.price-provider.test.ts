import { Duration, Effect, Fiber, Redacted, TestClock } from "effect";
import { HttpClient, HttpClientRequest, HttpClientResponse } from "@effect/platform";
import { RequestError } from "@effect/platform/HttpClientError";
import { describe, it, expect } from "@effect/vitest";
import { EntsoePriceProvider, parseDayAheadDocument, type EntsoeConfig } from "./entsoe.price-provider.js";
import { resolveMarketDay } from "../price-series/market-day.js";

type PeriodSpec = {
  start: string;
  end: string;
  resolution?: string;
  points: ReadonlyArray<readonly [number, number]>;
};

const publication = (periods: ReadonlyArray<PeriodSpec>, curveType = "A01") => `<?xml version="1.0" encoding="utf-8"?>
<Publication_MarketDocument xmlns="urn:iec62325.351:tc57wg16:451-3:publicationdocument:7:3">
  <mRID>test-document</mRID>
  <TimeSeries>
    <mRID>1</mRID>
    <currency_Unit.name>EUR</currency_Unit.name>
    <price_Measure_Unit.name>MWH</price_Measure_Unit.name>
    <curveType>${curveType}</curveType>
${periods.map((period) => `    <Period>
      <timeInterval>
        <start>${period.start}</start>
        <end>${period.end}</end>
      </timeInterval>
      <resolution>${period.resolution ?? "PT60M"}</resolution>
${period.points.map(([position, price]) => `      <Point>
        <position>${position}</position>
        <price.amount>${price}</price.amount>
      </Point>`).join("\n")}
    </Period>`).join("\n")}
  </TimeSeries>
</Publication_MarketDocument>`;

const acknowledgement = (text: string) => `<?xml version="1.0" encoding="utf-8"?>
<Acknowledgement_MarketDocument xmlns="urn:iec62325.351:tc57wg16:451-1:acknowledgementdocument:7:0">
  <mRID>test-ack</mRID>
  <Reason>
    <code>999</code>
    <text>${text}</text>
  </Reason>
</Acknowledgement_MarketDocument>`;

const hourlyPoints = (count: number, price: (position: number) => number = (position) => position * 10) =>
  Array.from({ length: count }, (_, index) => [index + 1, price(index + 1)] as const);

const mockResponse = (req: HttpClientRequest.HttpClientRequest, body: string, status = 200): HttpClientResponse.HttpClientResponse =>
  HttpClientResponse.fromWeb(req, new Response(body, { status, headers: { "Content-Type": "application/xml" } }));

const config: EntsoeConfig = {
  apiToken: Redacted.make("test-token"),
  baseUrl: "https://entsoe.test/api",
};

const day = Effect.runSync(resolveMarketDay("2026-06-15", "Europe/Helsinki"));

// The Helsinki day in UTC
const DAY_PERIOD = { start: "2026-06-14T21:00Z", end: "2026-06-15T21:00Z" };

describe("parseDayAheadDocument", () => {
  it.effect("reads hourly prices", () => Effect.gen(function* () {
    const raw = yield* parseDayAheadDocument(publication([{ ...DAY_PERIOD, points: hourlyPoints(24) }]), day);

    expect(raw.currency).toBe("EUR");
    expect(raw.unit).toBe("MWh");
    expect(raw.intervals).toHaveLength(24);
    expect(raw.intervals[0]).toEqual({
      start: new Date("2026-06-14T21:00:00Z"),
      duration: Duration.minutes(60),
      price: 10,
    });
    expect(raw.intervals[23].start.toISOString()).toBe("2026-06-15T20:00:00.000Z");
    expect(raw.intervals[23].price).toBe(240);
  }));

  it.effect("reads negative and fractional prices", () => Effect.gen(function* () {
    const raw = yield* parseDayAheadDocument(publication([{
      ...DAY_PERIOD,
      points: hourlyPoints(24, (position) => (position === 3 ? -1.25 : 42.5)),
    }]), day);

    expect(raw.intervals[2].price).toBe(-1.25);
    expect(raw.intervals[3].price).toBe(42.5);
  }));

  it.effect("fills positions left out of an A03 curve with the previous price", () => Effect.gen(function* () {
    const raw = yield* parseDayAheadDocument(publication([{
      ...DAY_PERIOD,
      points: [[1, 30], [2, 25], [5, 40]],
    }], "A03"), day);

    expect(raw.intervals.map((interval) => interval.price)).toEqual([30, 25, 25, 25, ...Array.from({ length: 20 }, () => 40)]);
  }));

  it.effect("leaves positions missing from an A01 curve out", () => Effect.gen(function* () {
    const raw = yield* parseDayAheadDocument(publication([{
      ...DAY_PERIOD,
      points: hourlyPoints(24).filter(([position]) => position !== 6),
    }]), day);

    expect(raw.intervals).toHaveLength(23);
  }));

  it.effect("drops points outside the market day", () => Effect.gen(function* () {
    // a CET delivery day overlaps two Helsinki days
    const raw = yield* parseDayAheadDocument(publication([
      { start: "2026-06-13T22:00Z", end: "2026-06-14T22:00Z", points: hourlyPoints(24) },
      { start: "2026-06-14T22:00Z", end: "2026-06-15T22:00Z", points: hourlyPoints(24, (position) => position + 100) },
    ]), day);

    expect(raw.intervals).toHaveLength(24);
    expect(raw.intervals[0].start.toISOString()).toBe("2026-06-14T21:00:00.000Z");
    expect(raw.intervals[0].price).toBe(240);
    expect(raw.intervals[1].price).toBe(101);
    expect(raw.intervals[23].price).toBe(123);
  }));

  it.effect("reads quarter-hour resolution", () => Effect.gen(function* () {
    const raw = yield* parseDayAheadDocument(publication([{
      ...DAY_PERIOD,
      resolution: "PT15M",
      points: hourlyPoints(96),
    }]), day);

    expect(raw.intervals).toHaveLength(96);
    expect(raw.intervals[1].start.toISOString()).toBe("2026-06-14T21:15:00.000Z");
  }));

  it.effect("fails on an acknowledgement", () => Effect.gen(function* () {
    const error = yield* Effect.flip(parseDayAheadDocument(acknowledgement("No matching data found"), day));

    expect(error._tag).toBe("PriceFetchFailed");
    expect(error.message).toBe("ENTSO-E returned no prices: No matching data found");
  }));

  it.effect("fails on an unknown resolution", () => Effect.gen(function* () {
    const error = yield* Effect.flip(parseDayAheadDocument(publication([{
      ...DAY_PERIOD,
      resolution: "P1D",
      points: [[1, 10]],
    }]), day));

    expect(error.message).toBe("Unsupported ENTSO-E resolution P1D");
  }));

  it.effect("fails on a document it does not know", () => Effect.gen(function* () {
    const error = yield* Effect.flip(parseDayAheadDocument("<Other_MarketDocument><mRID>1</mRID></Other_MarketDocument>", day));

    expect(error.message).toBe("Unrecognized ENTSO-E document");
  }));
});

describe("EntsoePriceProvider", () => {
  it.effect("requests the day-ahead document for the zone and day", () => Effect.gen(function* () {
    const requests: HttpClientRequest.HttpClientRequest[] = [];
    const httpClient = HttpClient.make((req) => {
      requests.push(req);
      return Effect.succeed(mockResponse(req, publication([{ ...DAY_PERIOD, points: hourlyPoints(24) }])));
    });

    const raw = yield* new EntsoePriceProvider(config, httpClient).fetch(day, "FI");

    expect(raw.intervals).toHaveLength(24);
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe("https://entsoe.test/api");
    expect(Object.fromEntries(requests[0].urlParams)).toEqual({
      securityToken: "test-token",
      documentType: "A44",
      in_Domain: "10YFI-1--------U",
      out_Domain: "10YFI-1--------U",
      periodStart: "202606142100",
      periodEnd: "202606152100",
    });
  }));

  it.effect("fails on an unknown zone without a request", () => Effect.gen(function* () {
    let requested = false;
    const httpClient = HttpClient.make((req) => {
      requested = true;
      return Effect.succeed(mockResponse(req, ""));
    });

    const error = yield* Effect.flip(new EntsoePriceProvider(config, httpClient).fetch(day, "XX"));

    expect(error.message).toBe("Unknown market zone XX");
    expect(requested).toBe(false);
  }));

  it.effect("fails on an error status", () => Effect.gen(function* () {
    const httpClient = HttpClient.make((req) => Effect.succeed(mockResponse(req, "<html>Unauthorized</html>", 401)));

    const error = yield* Effect.flip(new EntsoePriceProvider(config, httpClient).fetch(day, "FI"));

    expect(error._tag).toBe("PriceFetchFailed");
    expect(error.message).toBe("ENTSO-E responded with HTTP 401");
  }));

  it.effect("reads the reason from an acknowledgement sent with an error status", () => Effect.gen(function* () {
    const httpClient = HttpClient.make((req) => Effect.succeed(mockResponse(req, acknowledgement("No matching data found"), 400)));

    const error = yield* Effect.flip(new EntsoePriceProvider(config, httpClient).fetch(day, "FI"));

    expect(error.message).toBe("ENTSO-E returned no prices: No matching data found");
  }));

  it.effect("retries after a transport failure", () => Effect.gen(function* () {
    let calls = 0;
    const httpClient = HttpClient.make((req) => {
      calls++;
      return calls === 1
        ? Effect.fail(new RequestError({ request: req, reason: "Transport", cause: new Error("connection reset") }))
        : Effect.succeed(mockResponse(req, publication([{ ...DAY_PERIOD, points: hourlyPoints(24) }])));
    });

    const fiber = yield* new EntsoePriceProvider(config, httpClient).fetch(day, "FI").pipe(Effect.fork);
    yield* TestClock.adjust(Duration.seconds(2));
    const raw = yield* Fiber.join(fiber);

    expect(calls).toBe(2);
    expect(raw.intervals).toHaveLength(24);
  }));
});
