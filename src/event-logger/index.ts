import type { IEventLogger } from "./types.js";
import { Duration, Effect } from "effect";
import type { ChargerCommand } from "../charger/types.js";
import type { PriceInterval } from "../price-series/types.js";
import type { Schedule } from "../schedule-optimizer/types.js";

export class EventLogger implements IEventLogger {

  public onScheduleSelected(schedule: Schedule) {
    return Effect.log(`Selected ${schedule.intervals.length} interval(s) covering ${Duration.format(schedule.totalDuration)}`, {
      totalCost: schedule.totalCost,
      funding: schedule.funding._tag,
    });
  }

  public onChargingCommandIssued(command: ChargerCommand, interval: PriceInterval, attempt: number) {
    return Effect.log(`Issuing ${command} for interval starting ${interval.start.toISOString()}`, { attempt });
  }

  public onChargingCommandFailed(command: ChargerCommand, interval: PriceInterval, message: string) {
    return Effect.logError(`${command} failed for interval starting ${interval.start.toISOString()}: ${message}`);
  }

  public onReportSent(subject: string) {
    return Effect.log(`Report sent: ${subject}`);
  }
}
