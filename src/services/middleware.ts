import type { Context } from "hono";
import { createMiddleware } from "hono/factory";
import { HawkError } from "../lib/errors.js";
import type { CredentialParser, GuardFailure, GuardOutcome, HawkHeader, HeaderSource } from "../types/index.js";
import { fromFetchHeaders, fromIncomingHeaders } from "./auth.js";
import { AuthorizationHeader, ServerAuthorizationHeader } from "./guards.js";

/** The part of `@hono/node-server`'s bindings the guards read. */
export interface HawkBindings {
  incoming?: { headersDistinct: NodeJS.Dict<string[]> };
}

export type AuthorizationEnv = {
  Bindings: HawkBindings;
  Variables: { hawkAuthorization: GuardOutcome<AuthorizationHeader> };
};

export type ServerAuthorizationEnv = {
  Bindings: HawkBindings;
  Variables: { hawkServerAuthorization: GuardOutcome<ServerAuthorizationHeader> };
};

export interface HawkGuardOptions {
  /**
   * Reject failed requests (default). When false the handler reads the outcome itself.
   * Either way a repeated header only counts as a duplicate when Node bindings are
   * present; see {@link headerSourceFor}.
   */
  required?: boolean;
  parser?: CredentialParser<HawkHeader>;
  onFailure?: (c: Context, failure: GuardFailure) => void;
}

/**
 * Duplicate headers are only detected under `@hono/node-server`, which keeps
 * repeated values apart in `incoming.headersDistinct`. Elsewhere the fetch
 * `Headers` have already joined them with `, `: the joined value is checked
 * as one header and may even parse as a single credential.
 */
export function headerSourceFor(env: HawkBindings | undefined, request: Request): HeaderSource {
  const incoming = env?.incoming;
  return incoming ? fromIncomingHeaders(incoming.headersDistinct) : fromFetchHeaders(request.headers);
}

function rejection(c: Context, outcome: GuardOutcome<unknown>, options: HawkGuardOptions): Response | undefined {
  if (outcome.ok) return undefined;

  options.onFailure?.(c, outcome);
  if (options.required === false) return undefined;
  return HawkError.fromFailure(outcome).toResponse();
}

export function hawkAuthorization(options: HawkGuardOptions = {}) {
  return createMiddleware<AuthorizationEnv>(async (c, next) => {
    const outcome = AuthorizationHeader.fromRequest(headerSourceFor(c.env, c.req.raw), options.parser);
    c.set("hawkAuthorization", outcome);

    const response = rejection(c, outcome, options);
    if (response) return response;
    await next();
  });
}

export function hawkServerAuthorization(options: HawkGuardOptions = {}) {
  return createMiddleware<ServerAuthorizationEnv>(async (c, next) => {
    const outcome = ServerAuthorizationHeader.fromRequest(headerSourceFor(c.env, c.req.raw), options.parser);
    c.set("hawkServerAuthorization", outcome);

    const response = rejection(c, outcome, options);
    if (response) return response;
    await next();
  });
}
