import { Duration } from "effect";
import { formatLocalTime } from "../price-series/market-day.js";
import { intervalEnd, intervalHours, contiguousBlocks, priceHours, type PriceInterval, type PriceSeries } from "../price-series/types.js";
import type { Schedule } from "../schedule-optimizer/types.js";
import type { CommandOutcome, SessionOutcome } from "../charger/types.js";

export const DEFAULT_SUBJECT_TEMPLATE = "EV charging schedule {date} ({zone})";

const MINUTE_MS = 60 * 1000;

export const formatDuration = (duration: Duration.Duration): string => {
  const minutes = Math.round(Duration.toMillis(duration) / MINUTE_MS);
  return `${Math.floor(minutes / 60)} h ${String(minutes % 60).padStart(2, "0")} min`;
};

const formatAmount = (value: number): string => value.toFixed(2);

// Converts a price per `unit` into a price per kWh.
const perKwhFactor = (unit: string): number | null => {
  switch (unit.toLowerCase()) {
    case "mwh":
      return 1 / 1000;
    case "kwh":
      return 1;
    default:
      return null;
  }
};

/**
 * Fixed consumer-side components of the electricity contract. Amounts are
 * in cents per kWh; VAT applies to the spot part only.
 */
export type ContractPricing = {
  readonly vatPercent: number;
  readonly transferCentsPerKwh: number;
  readonly taxCentsPerKwh: number;
  readonly marginCentsPerKwh: number;
};

export type ReportOptions = {
  readonly contract?: ContractPricing;
};

const hasFailures = (sessions: ReadonlyArray<SessionOutcome>): boolean =>
  sessions.some(({ start, stop }) => start._tag === "Failed" || stop._tag === "Failed");

// A failed start leaves the whole session uncharged; a failed stop shows on its last interval.
const describeOutcome = ({ intervals, start, stop }: SessionOutcome, interval: PriceInterval): string => {
  if (start._tag === "Failed") {
    return `FAILED start_charging: ${start.message}`;
  }
  if (stop._tag === "Failed" && interval === intervals[intervals.length - 1]) {
    return `FAILED stop_charging: ${stop.message}`;
  }
  return "ok";
};

const failureLine = (
  at: Date,
  command: string,
  outcome: CommandOutcome,
  timeZone: string,
): string | null =>
  outcome._tag === "Failed"
    ? `  ${formatLocalTime(at, timeZone)} ${command} failed after ${outcome.attempts} attempt(s): ${outcome.message}`
    : null;

const contractLines = (
  contract: ContractPricing,
  selectedAverage: number,
  selectedHours: number,
  toPerKwh: number,
  currency: string,
  chargingPowerKw: number | undefined,
): string[] => {
  const spotCents = selectedAverage * toPerKwh * 100 * (1 + contract.vatPercent / 100);
  const fixedCents = contract.transferCentsPerKwh + contract.taxCentsPerKwh + contract.marginCentsPerKwh;
  const consumerCents = spotCents + fixedCents;

  return [
    `Consumer price, selected average: ${formatAmount(consumerCents)} c/kWh incl. VAT ${contract.vatPercent}% (spot ${formatAmount(spotCents)}, fixed ${formatAmount(fixedCents)})`,
    ...(chargingPowerKw === undefined
      ? []
      : [`Estimated consumer cost at ${chargingPowerKw} kW: ${formatAmount(consumerCents * selectedHours * chargingPowerKw / 100)} ${currency} incl. VAT`]),
  ];
};

/**
 * Plain-text summary of the day's prices and the chosen schedule. When
 * session outcomes are given they are shown per interval and failures are
 * listed separately.
 */
export const renderReport = (
  series: PriceSeries,
  schedule: Schedule,
  sessions?: ReadonlyArray<SessionOutcome>,
  options: ReportOptions = {},
): string => {
  const { timeZone } = series.day;
  const priceUnit = `${series.currency}/${series.unit}`;
  const lines: string[] = [
    `Charging schedule for ${series.zone}, ${series.day.date} (${timeZone})`,
    "",
  ];

  if (schedule.intervals.length === 0) {
    lines.push("Selected intervals: none");
  } else {
    lines.push("Selected intervals:");
    let cumulative = 0;
    for (const interval of schedule.intervals) {
      cumulative += interval.price * intervalHours(interval);
      const session = sessions?.find((candidate) => candidate.intervals.includes(interval));
      lines.push([
        `  ${formatLocalTime(interval.start, timeZone)}`,
        `${Math.round(Duration.toMillis(interval.duration) / MINUTE_MS)} min`,
        `price ${formatAmount(interval.price)}`,
        `cumulative ${formatAmount(cumulative)}`,
        ...(session ? [describeOutcome(session, interval)] : []),
      ].join("  "));
    }
  }

  const selectedHours = Duration.toMillis(schedule.totalDuration) / Duration.toMillis(Duration.hours(1));
  const dayHours = series.intervals.reduce((sum, interval) => sum + intervalHours(interval), 0);
  const dayAverage = priceHours(series.intervals) / dayHours;

  lines.push(
    "",
    `Total duration: ${formatDuration(schedule.totalDuration)}`,
    `Total cost: ${formatAmount(schedule.totalCost)} (${priceUnit} x h)`,
    `Sessions: ${contiguousBlocks(schedule.intervals).length}`,
  );

  if (selectedHours > 0) {
    const selectedAverage = schedule.totalCost / selectedHours;
    const difference = dayAverage - selectedAverage;
    lines.push(
      `Average price, selected: ${formatAmount(selectedAverage)} ${priceUnit}`,
      `Average price, full day: ${formatAmount(dayAverage)} ${priceUnit}`,
      difference >= 0
        ? `Selected average is ${formatAmount(difference)} ${priceUnit} below the day average`
        : `Selected average is ${formatAmount(-difference)} ${priceUnit} above the day average`,
    );
  } else {
    lines.push(`Average price, full day: ${formatAmount(dayAverage)} ${priceUnit}`);
  }

  const toPerKwh = perKwhFactor(series.unit);
  if (schedule.chargingPowerKw !== undefined && toPerKwh !== null) {
    const energyCost = schedule.totalCost * schedule.chargingPowerKw * toPerKwh;
    lines.push(`Estimated energy cost at ${schedule.chargingPowerKw} kW: ${formatAmount(energyCost)} ${series.currency}`);
  }

  if (options.contract !== undefined && toPerKwh !== null && selectedHours > 0) {
    lines.push(...contractLines(
      options.contract,
      schedule.totalCost / selectedHours,
      selectedHours,
      toPerKwh,
      series.currency,
      schedule.chargingPowerKw,
    ));
  }

  if (schedule.funding._tag === "Underfunded") {
    lines.push(
      "",
      `UNDERFUNDED: required ${formatDuration(schedule.requiredDuration)}, scheduled ${formatDuration(schedule.totalDuration)}, shortfall ${formatDuration(schedule.funding.shortfall)}`,
    );
  }

  if (sessions && hasFailures(sessions)) {
    lines.push("", "Charger command failures:");
    for (const { intervals, start, stop } of sessions) {
      if (intervals.length === 0) {
        continue;
      }
      for (const line of [
        failureLine(intervals[0].start, "start_charging", start, timeZone),
        failureLine(intervalEnd(intervals[intervals.length - 1]), "stop_charging", stop, timeZone),
      ]) {
        if (line !== null) {
          lines.push(line);
        }
      }
    }
  }

  return lines.join("\n");
};

export const renderSubject = (
  series: PriceSeries,
  schedule: Schedule,
  sessions: ReadonlyArray<SessionOutcome> = [],
  template: string = DEFAULT_SUBJECT_TEMPLATE,
): string => {
  const flags = [
    ...(schedule.funding._tag === "Underfunded" ? ["[underfunded]"] : []),
    ...(hasFailures(sessions) ? ["[charger errors]"] : []),
  ];

  return [fillTemplate(template, series.day.date, series.zone), ...flags].join(" ");
};

const fillTemplate = (template: string, date: string, zone: string): string =>
  template.replaceAll("{date}", date).replaceAll("{zone}", zone);

/**
 * Notice mailed when a run fails before any charging was scheduled.
 */
export const renderFailureNotice = (
  date: string,
  zone: string,
  reason: string,
  template: string = DEFAULT_SUBJECT_TEMPLATE,
): { readonly subject: string; readonly body: string } => ({
  subject: `${fillTemplate(template, date, zone)} [failed]`,
  body: [
    `No charging was scheduled for ${zone}, ${date}.`,
    "",
    `Reason: ${reason}`,
  ].join("\n"),
});
