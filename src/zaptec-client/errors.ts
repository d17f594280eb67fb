import type { HttpClientError } from "@effect/platform/HttpClientError";
import type { ParseError } from "effect/ParseResult";
import { Data } from "effect";

export class ZaptecAuthenticationFailedError extends Data.TaggedError("ZaptecAuthenticationFailed")<{
  message: string;
  previous?: HttpClientError | ParseError;
}> {}

export class ZaptecChargerNotFoundError extends Data.TaggedError("ZaptecChargerNotFound")<{
  message: string;
}> {}

export class ZaptecRequestFailedError extends Data.TaggedError("ZaptecRequestFailed")<{
  message: string;
  status?: number;
  previous?: HttpClientError | ParseError;
}> {}

export type ZaptecError =
  | ZaptecAuthenticationFailedError
  | ZaptecChargerNotFoundError
  | ZaptecRequestFailedError;
