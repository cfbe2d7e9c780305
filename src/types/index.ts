export type {
  CredentialParser,
  FailureReason,
  FailureStatus,
  GuardFailure,
  GuardOutcome,
  HeaderSource,
  ParseResult,
} from "./guard.js";
export type { HawkField, HawkHeader, HawkHeaderName } from "./hawk.js";
export type { ErrorResponseBody, HTTPErrorOptions } from "./http.js";
