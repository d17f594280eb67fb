import { Config as EffectConfig, ConfigError, Either, Option } from "effect";
import type { ChargeNeed, ChargeSettings } from "./charge-constraints.js";
import type { ContractPricing } from "./report/charge-decision-report.js";
import { isTimeOfDay } from "./price-series/market-day.js";
import type { ZaptecCredentials } from "./zaptec-client/index.js";

const optionalNumber = (name: string) => EffectConfig.option(EffectConfig.number(name));

const optionalString = (name: string) => EffectConfig.option(EffectConfig.string(name));

const addressList = (name: string) =>
  EffectConfig.array(EffectConfig.string(), name).pipe(
    EffectConfig.map((addresses) => addresses.map((address) => address.trim()).filter((address) => address.length > 0)),
    EffectConfig.withDefault<ReadonlyArray<string>>([]),
  );

const timeOfDay = (name: string, fallback: string) =>
  EffectConfig.string(name).pipe(
    EffectConfig.withDefault(fallback),
    EffectConfig.validate({
      message: `${name} must be a local time HH:mm (00:00 to 24:00)`,
      validation: isTimeOfDay,
    }),
  );

const positive = (value: number) => value > 0;

const ChargeNeedConfig = EffectConfig.all({
  sessionMinutes: optionalNumber("CHARGE_SESSION_MINUTES"),
  energyKwh: optionalNumber("CHARGE_ENERGY_KWH"),
  chargingPowerKw: optionalNumber("CHARGER_POWER_KW"),
}).pipe(
  EffectConfig.mapOrFail(({ sessionMinutes, energyKwh, chargingPowerKw }): Either.Either<ChargeNeed, ConfigError.ConfigError> => {
    if (Option.isSome(sessionMinutes) && Option.isNone(energyKwh)) {
      return positive(sessionMinutes.value)
        ? Either.right<ChargeNeed>({ _tag: "Duration", minutes: sessionMinutes.value })
        : Either.left(ConfigError.InvalidData(["CHARGE_SESSION_MINUTES"], "CHARGE_SESSION_MINUTES must be positive"));
    }
    if (Option.isSome(energyKwh) && Option.isNone(sessionMinutes)) {
      if (Option.isNone(chargingPowerKw) || !positive(chargingPowerKw.value)) {
        return Either.left(ConfigError.InvalidData(["CHARGER_POWER_KW"], "CHARGER_POWER_KW must be a positive number when CHARGE_ENERGY_KWH is set"));
      }
      return positive(energyKwh.value)
        ? Either.right<ChargeNeed>({ _tag: "Energy", energyKwh: energyKwh.value, chargingPowerKw: chargingPowerKw.value })
        : Either.left(ConfigError.InvalidData(["CHARGE_ENERGY_KWH"], "CHARGE_ENERGY_KWH must be positive"));
    }
    return Either.left(ConfigError.InvalidData([], "Set exactly one of CHARGE_SESSION_MINUTES or CHARGE_ENERGY_KWH"));
  }),
);

const ChargeSettingsConfig: EffectConfig.Config<ChargeSettings> = EffectConfig.all({
  need: ChargeNeedConfig,
  earliestStart: timeOfDay("CHARGE_EARLIEST_START", "00:00"),
  deadline: timeOfDay("CHARGE_DEADLINE", "24:00"),
  minBlockMinutes: EffectConfig.option(EffectConfig.integer("CHARGE_MIN_BLOCK_MINUTES").pipe(
    EffectConfig.validate({ message: "CHARGE_MIN_BLOCK_MINUTES must be positive", validation: positive }),
  )),
  maxSessions: EffectConfig.option(EffectConfig.integer("CHARGE_MAX_SESSIONS").pipe(
    EffectConfig.validate({ message: "CHARGE_MAX_SESSIONS must be at least 1", validation: positive }),
  )),
  chargingPowerKw: optionalNumber("CHARGER_POWER_KW"),
});

const ZaptecCredentialsConfig = EffectConfig.all({
  apiKey: EffectConfig.option(EffectConfig.redacted("ZAPTEC_APIKEY")),
  username: optionalString("ZAPTEC_USERNAME"),
  password: EffectConfig.option(EffectConfig.redacted("ZAPTEC_PASSWORD")),
}).pipe(
  EffectConfig.mapOrFail(({ apiKey, username, password }): Either.Either<ZaptecCredentials, ConfigError.ConfigError> => {
    if (Option.isSome(apiKey)) {
      return Either.right<ZaptecCredentials>({ _tag: "ApiKey", apiKey: apiKey.value });
    }
    if (Option.isSome(username) && Option.isSome(password)) {
      return Either.right<ZaptecCredentials>({ _tag: "Password", username: username.value, password: password.value });
    }
    return Either.left(ConfigError.InvalidData([], "Set either ZAPTEC_APIKEY or ZAPTEC_USERNAME and ZAPTEC_PASSWORD"));
  }),
);

const centsPerKwh = (name: string) => EffectConfig.number(name).pipe(EffectConfig.withDefault(0));

// Present only when CONTRACT_VAT_PERCENT is set.
const ContractPricingConfig: EffectConfig.Config<Option.Option<ContractPricing>> = EffectConfig.option(EffectConfig.all({
  vatPercent: EffectConfig.number("CONTRACT_VAT_PERCENT").pipe(
    EffectConfig.validate({ message: "CONTRACT_VAT_PERCENT must not be negative", validation: (value: number) => value >= 0 }),
  ),
  transferCentsPerKwh: centsPerKwh("CONTRACT_TRANSFER_C_KWH"),
  taxCentsPerKwh: centsPerKwh("CONTRACT_TAX_C_KWH"),
  marginCentsPerKwh: centsPerKwh("CONTRACT_MARGIN_C_KWH"),
}));

export const AppConfig = {
  market: {
    zone: EffectConfig.string("MARKET_ZONE").pipe(EffectConfig.withDefault("FI")),
    timeZone: optionalString("MARKET_TIMEZONE"),
    date: optionalString("CHARGE_DATE"),
  },

  charge: ChargeSettingsConfig,

  contract: ContractPricingConfig,

  commandRetries: EffectConfig.integer("CHARGER_COMMAND_RETRIES").pipe(
    EffectConfig.withDefault(2),
    EffectConfig.validate({ message: "CHARGER_COMMAND_RETRIES must not be negative", validation: (value: number) => value >= 0 }),
  ),

  entsoe: {
    apiToken: EffectConfig.redacted("ENTSOE_API_TOKEN"),
    baseUrl: EffectConfig.string("ENTSOE_BASE_URL").pipe(
      EffectConfig.withDefault("https://web-api.tp.entsoe.eu/api"),
    ),
  },

  zaptec: {
    credentials: ZaptecCredentialsConfig,
    chargerId: optionalString("ZAPTEC_CHARGER_ID"),
    baseUrl: EffectConfig.string("ZAPTEC_BASE_URL").pipe(
      EffectConfig.withDefault("https://api.zaptec.com"),
    ),
  },

  smtp: {
    host: EffectConfig.string("SMTP_HOST"),
    port: EffectConfig.integer("SMTP_PORT").pipe(EffectConfig.withDefault(587)),
    user: EffectConfig.string("SMTP_USER"),
    password: EffectConfig.redacted("SMTP_PASSWORD"),
  },

  mail: {
    fromAddress: EffectConfig.string("MAIL_FROM"),
    fromName: EffectConfig.string("MAIL_FROM_NAME").pipe(EffectConfig.withDefault("EV charging")),
    to: addressList("MAIL_TO"),
    cc: addressList("MAIL_CC"),
    bcc: addressList("MAIL_BCC"),
    subjectTemplate: EffectConfig.string("MAIL_SUBJECT").pipe(
      EffectConfig.withDefault("EV charging schedule {date} ({zone})"),
    ),
  },
};
