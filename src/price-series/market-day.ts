import { Data, Effect } from "effect";
import { DateTime } from "luxon";

/**
 * A calendar day in the market zone's local time, with the UTC instants that
 * bound it. Around daylight-saving changes the day is 23 or 25 hours long.
 */
export type MarketDay = {
  readonly date: string; // YYYY-MM-DD, local to the market
  readonly timeZone: string;
  readonly start: Date;
  readonly end: Date;
};

export class InvalidMarketDayError extends Data.TaggedError("InvalidMarketDay")<{
  readonly message: string;
}> {}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)$/;

export const isTimeOfDay = (value: string): boolean =>
  value === "24:00" || TIME_OF_DAY.test(value);

export const resolveMarketDay = (
  date: string,
  timeZone: string,
): Effect.Effect<MarketDay, InvalidMarketDayError> => {
  const start = DateTime.fromISO(date, { zone: timeZone }).startOf("day");

  if (!ISO_DATE.test(date) || !start.isValid) {
    return Effect.fail(new InvalidMarketDayError({
      message: `Cannot resolve market day "${date}" in time zone "${timeZone}"`,
    }));
  }

  return Effect.succeed({
    date,
    timeZone,
    start: start.toJSDate(),
    end: start.plus({ days: 1 }).toJSDate(),
  });
};

/**
 * The next full market day: tomorrow, as seen from the market's time zone.
 */
export const nextMarketDate = (timeZone: string, now: Date): string =>
  DateTime.fromJSDate(now, { zone: timeZone }).plus({ days: 1 }).toFormat("yyyy-LL-dd");

/**
 * Resolves a local "HH:mm" on the market day to an instant. "24:00" is the
 * end of the day.
 */
export const atLocalTime = (day: MarketDay, timeOfDay: string): Date => {
  if (timeOfDay === "24:00") {
    return day.end;
  }

  const [hour, minute] = timeOfDay.split(":").map((part) => parseInt(part, 10));

  return DateTime.fromJSDate(day.start, { zone: day.timeZone })
    .set({ hour, minute })
    .toJSDate();
};

export const formatLocalTime = (instant: Date, timeZone: string): string =>
  DateTime.fromJSDate(instant, { zone: timeZone }).toFormat("HH:mm ZZ");
