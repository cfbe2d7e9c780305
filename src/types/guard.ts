import type { HawkParseError } from "../lib/errors.js";

export type HeaderSource = (name: string) => readonly string[];

export type FailureReason = { kind: "no-header" } | { kind: "malformed-credential"; error: HawkParseError };

export type FailureStatus = 400 | 401;

export interface GuardFailure {
  ok: false;
  status: FailureStatus;
  reason: FailureReason;
}

export type GuardOutcome<T> = { ok: true; value: T } | GuardFailure;

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: HawkParseError };

export type CredentialParser<T> = (payload: string) => ParseResult<T>;
