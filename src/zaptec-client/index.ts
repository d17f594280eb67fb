import { ZaptecAuthenticationFailedError, ZaptecChargerNotFoundError, ZaptecRequestFailedError, type ZaptecError } from './errors.js';
import { Clock, Context, Effect, Layer, Option, Redacted, Schema } from 'effect';
import { HttpClient, HttpClientRequest } from "@effect/platform";
import { ZaptecChargerListSchema, ZaptecTokenResponseSchema, type ZaptecCharger } from './schema.js';

// Zaptec API command ids
const RESUME_CHARGING = 507;
const STOP_CHARGING_FINAL = 506;

export type ZaptecCredentials =
  | { readonly _tag: "ApiKey"; readonly apiKey: Redacted.Redacted }
  | { readonly _tag: "Password"; readonly username: string; readonly password: Redacted.Redacted };

export type ZaptecClientConfig = {
  readonly baseUrl: string;
  readonly credentials: ZaptecCredentials;
  readonly chargerId: Option.Option<string>;
};

type CommandResult = Effect.Effect<void, ZaptecError>;

export type ZaptecClient = {
  readonly listChargers: () => Effect.Effect<ReadonlyArray<ZaptecCharger>, ZaptecAuthenticationFailedError | ZaptecRequestFailedError>;
  readonly resumeCharging: () => CommandResult;
  readonly stopCharging: () => CommandResult;
}

export const ZaptecClient = Context.GenericTag<ZaptecClient>("@spot-charge-scheduler/ZaptecClient");

// Tokens are renewed this long before Zaptec says they expire.
const TOKEN_RENEWAL_MARGIN_MS = 60 * 1000;

type AccessToken = {
  readonly value: string;
  readonly expiresAt: number | null; // epoch ms
};

/**
 * Builds the client and checks the account up front: credentials are
 * exercised and the charger resolved before any command is due.
 */
export const makeZaptecClient = (config: ZaptecClientConfig) => Effect.gen(function* () {
  const httpClient = yield* HttpClient.HttpClient;

  let accessToken: AccessToken | null = null;

  const requestAccessToken = (username: string, password: Redacted.Redacted) => Effect.gen(function* () {
    const response = yield* httpClient.execute(
      HttpClientRequest.post(`${config.baseUrl}/oauth/token`).pipe(
        HttpClientRequest.acceptJson,
        HttpClientRequest.bodyUrlParams({
          grant_type: "password",
          username,
          password: Redacted.value(password),
        }),
      ),
    );

    if (response.status !== 200) {
      return yield* new ZaptecAuthenticationFailedError({
        message: `Zaptec token request failed with HTTP ${response.status}`,
      });
    }

    const token = yield* Schema.decodeUnknown(ZaptecTokenResponseSchema)(yield* response.json);
    const now = yield* Clock.currentTimeMillis;

    yield* Effect.logDebug('Fetched Zaptec access token', { expiresIn: token.expires_in });

    return {
      value: token.access_token,
      expiresAt: token.expires_in === undefined ? null : now + token.expires_in * 1000 - TOKEN_RENEWAL_MARGIN_MS,
    } satisfies AccessToken;
  }).pipe(
    Effect.catchTags({
      RequestError: (previous) => Effect.fail(new ZaptecAuthenticationFailedError({ message: `Zaptec token request failed: ${previous.message}`, previous })),
      ResponseError: (previous) => Effect.fail(new ZaptecAuthenticationFailedError({ message: `Zaptec token request failed: ${previous.message}`, previous })),
      ParseError: (previous) => Effect.fail(new ZaptecAuthenticationFailedError({ message: 'Unrecognized Zaptec token response', previous })),
    }),
  );

  const currentAccessToken = (username: string, password: Redacted.Redacted) => Effect.gen(function* () {
    const now = yield* Clock.currentTimeMillis;
    if (accessToken !== null && (accessToken.expiresAt === null || now < accessToken.expiresAt)) {
      return accessToken.value;
    }

    const token = yield* requestAccessToken(username, password);
    accessToken = token;
    return token.value;
  });

  const authorize = (
    request: HttpClientRequest.HttpClientRequest,
  ): Effect.Effect<HttpClientRequest.HttpClientRequest, ZaptecAuthenticationFailedError> => {
    const credentials = config.credentials;

    switch (credentials._tag) {
      case "ApiKey":
        return Effect.succeed(HttpClientRequest.setHeader(request, "X-Api-Key", Redacted.value(credentials.apiKey)));
      case "Password":
        return currentAccessToken(credentials.username, credentials.password).pipe(
          Effect.map((token) => HttpClientRequest.bearerToken(request, token)),
        );
    }
  };

  // A token can be revoked before it expires: on 401 it is fetched again, once.
  const executeAuthorized = (request: HttpClientRequest.HttpClientRequest) => Effect.gen(function* () {
    const response = yield* httpClient.execute(yield* authorize(request));

    if (response.status !== 401 || config.credentials._tag !== "Password") {
      return response;
    }

    yield* Effect.logWarning('Zaptec rejected the access token, fetching a new one');
    accessToken = null;
    return yield* httpClient.execute(yield* authorize(request));
  });

  const listChargers = () => Effect.gen(function* () {
    const response = yield* executeAuthorized(
      HttpClientRequest.get(`${config.baseUrl}/api/chargers`).pipe(HttpClientRequest.acceptJson),
    );

    if (response.status !== 200) {
      return yield* new ZaptecRequestFailedError({
        message: `Listing Zaptec chargers failed with HTTP ${response.status}`,
        status: response.status,
      });
    }

    const body = yield* Schema.decodeUnknown(ZaptecChargerListSchema)(yield* response.json);
    return body.Data;
  }).pipe(
    Effect.catchTags({
      RequestError: (previous) => Effect.fail(new ZaptecRequestFailedError({ message: `Listing Zaptec chargers failed: ${previous.message}`, previous })),
      ResponseError: (previous) => Effect.fail(new ZaptecRequestFailedError({ message: `Listing Zaptec chargers failed: ${previous.message}`, previous })),
      ParseError: (previous) => Effect.fail(new ZaptecRequestFailedError({ message: 'Unrecognized Zaptec charger list', previous })),
    }),
  );

  const resolveChargerId = (): Effect.Effect<string, ZaptecError> =>
    listChargers().pipe(
      Effect.flatMap((chargers) => {
        if (Option.isSome(config.chargerId)) {
          const configured = config.chargerId.value;
          return chargers.some((charger) => charger.Id === configured)
            ? Effect.succeed(configured)
            : Effect.fail(new ZaptecChargerNotFoundError({
              message: `Charger ${configured} is not visible to the Zaptec account`,
            }));
        }

        if (chargers.length !== 1) {
          return Effect.fail(new ZaptecChargerNotFoundError({
            message: chargers.length === 0
              ? 'No chargers are visible to the Zaptec account'
              : `The Zaptec account has ${chargers.length} chargers; set ZAPTEC_CHARGER_ID to pick one`,
          }));
        }

        return Effect.succeed(chargers[0].Id);
      }),
    );

  const chargerId = yield* resolveChargerId();
  yield* Effect.log(`Using Zaptec charger ${chargerId}`);

  const sendCommand = (commandId: number): CommandResult => Effect.gen(function* () {
    const response = yield* executeAuthorized(
      HttpClientRequest.post(`${config.baseUrl}/api/chargers/${chargerId}/sendCommand/${commandId}`).pipe(
        HttpClientRequest.acceptJson,
      ),
    );

    if (response.status < 200 || response.status >= 300) {
      const body = yield* response.text;
      return yield* new ZaptecRequestFailedError({
        message: `Zaptec rejected command ${commandId} with HTTP ${response.status}${body.length > 0 ? `: ${body}` : ''}`,
        status: response.status,
      });
    }
  }).pipe(
    Effect.catchTags({
      RequestError: (previous) => Effect.fail(new ZaptecRequestFailedError({ message: `Zaptec command ${commandId} failed: ${previous.message}`, previous })),
      ResponseError: (previous) => Effect.fail(new ZaptecRequestFailedError({ message: `Zaptec command ${commandId} failed: ${previous.message}`, previous })),
    }),
    Effect.tap(() => Effect.annotateCurrentSpan({ command: commandId })),
    Effect.withSpan('zaptec-command'),
  );

  return ZaptecClient.of({
    listChargers,
    resumeCharging: () => sendCommand(RESUME_CHARGING),
    stopCharging: () => sendCommand(STOP_CHARGING_FINAL),
  });
});

export const ZaptecClientLayer = (config: ZaptecClientConfig) => Layer.effect(
  ZaptecClient,
  makeZaptecClient(config),
);
