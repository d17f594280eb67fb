import { describe, it, expect } from "@effect/vitest";
import { Effect } from "effect";
import {
  atLocalTime,
  formatLocalTime,
  isTimeOfDay,
  nextMarketDate,
  resolveMarketDay,
} from "../../../price-series/market-day.js";
import { HELSINKI, marketDay } from "../../fixtures.js";

const HOUR_MS = 60 * 60 * 1000;

describe("resolveMarketDay", () => {
  it.effect("bounds the day by local midnights", () => Effect.gen(function* () {
    const day = yield* resolveMarketDay("2026-06-15", HELSINKI);

    expect(day.start.toISOString()).toBe("2026-06-14T21:00:00.000Z");
    expect(day.end.toISOString()).toBe("2026-06-15T21:00:00.000Z");
    expect(day.end.getTime() - day.start.getTime()).toBe(24 * HOUR_MS);
  }));

  it.effect("is 23 hours long when clocks go forward", () => Effect.gen(function* () {
    const day = yield* resolveMarketDay("2026-03-29", HELSINKI);

    expect(day.start.toISOString()).toBe("2026-03-28T22:00:00.000Z");
    expect(day.end.getTime() - day.start.getTime()).toBe(23 * HOUR_MS);
  }));

  it.effect("is 25 hours long when clocks go back", () => Effect.gen(function* () {
    const day = yield* resolveMarketDay("2026-10-25", HELSINKI);

    expect(day.end.getTime() - day.start.getTime()).toBe(25 * HOUR_MS);
  }));

  it.effect("rejects dates that do not exist", () => Effect.gen(function* () {
    const error = yield* Effect.flip(resolveMarketDay("2026-02-30", HELSINKI));

    expect(error._tag).toBe("InvalidMarketDay");
    expect(error.message).toBe('Cannot resolve market day "2026-02-30" in time zone "Europe/Helsinki"');
  }));

  it.effect("rejects dates that are not YYYY-MM-DD", () => Effect.gen(function* () {
    const error = yield* Effect.flip(resolveMarketDay("15.06.2026", HELSINKI));

    expect(error._tag).toBe("InvalidMarketDay");
  }));

  it.effect("rejects unknown time zones", () => Effect.gen(function* () {
    const error = yield* Effect.flip(resolveMarketDay("2026-06-15", "Europe/Atlantis"));

    expect(error._tag).toBe("InvalidMarketDay");
  }));
});

describe("nextMarketDate", () => {
  it("is tomorrow in the market's time zone", () => {
    // 01:30 on 15 June in Helsinki, still 14 June in UTC
    expect(nextMarketDate(HELSINKI, new Date("2026-06-14T22:30:00Z"))).toBe("2026-06-16");
  });
});

describe("atLocalTime", () => {
  const day = marketDay("2026-06-15");

  it("resolves a local time on the market day", () => {
    expect(atLocalTime(day, "07:30").toISOString()).toBe("2026-06-15T04:30:00.000Z");
  });

  it("treats 24:00 as the end of the day", () => {
    expect(atLocalTime(day, "24:00")).toBe(day.end);
  });

  it("uses summer time after clocks go forward", () => {
    const shortDay = marketDay("2026-03-29");

    expect(atLocalTime(shortDay, "04:00").toISOString()).toBe("2026-03-29T01:00:00.000Z");
  });
});

describe("isTimeOfDay", () => {
  it("accepts HH:mm and 24:00", () => {
    expect(isTimeOfDay("00:00")).toBe(true);
    expect(isTimeOfDay("07:30")).toBe(true);
    expect(isTimeOfDay("24:00")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isTimeOfDay("7:30")).toBe(false);
    expect(isTimeOfDay("24:30")).toBe(false);
    expect(isTimeOfDay("12:60")).toBe(false);
  });
});

describe("formatLocalTime", () => {
  it("formats in the given zone", () => {
    expect(formatLocalTime(new Date("2026-06-15T04:30:00Z"), HELSINKI)).toBe("07:30 +03:00");
  });
});
