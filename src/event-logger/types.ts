import type { Effect } from "effect";
import type { ChargerCommand } from "../charger/types.js";
import type { PriceInterval } from "../price-series/types.js";
import type { Schedule } from "../schedule-optimizer/types.js";

export type IEventLogger = {
  onScheduleSelected: (schedule: Schedule) => Effect.Effect<void>;
  onChargingCommandIssued: (command: ChargerCommand, interval: PriceInterval, attempt: number) => Effect.Effect<void>;
  onChargingCommandFailed: (command: ChargerCommand, interval: PriceInterval, message: string) => Effect.Effect<void>;
  onReportSent: (subject: string) => Effect.Effect<void>;
};
