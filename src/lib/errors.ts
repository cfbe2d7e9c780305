import type { ErrorResponseBody, GuardFailure, HTTPErrorOptions } from "../types/index.js";

export class HTTPError extends Error {
  readonly status: number;
  readonly code?: string;

  constructor(options: HTTPErrorOptions) {
    super(options.message);
    this.name = "HTTPError";
    this.status = options.status;
    this.code = options.code;
  }

  toResponse(): Response {
    return new Response(JSON.stringify(this.toJSON()), {
      status: this.status,
      headers: { "Content-Type": "application/json" },
    });
  }

  toJSON(): ErrorResponseBody {
    const body: ErrorResponseBody = { message: this.message };
    if (this.code) {
      body.code = this.code;
    }
    return body;
  }
}

/**
 * Grammar error reported by a credential parser. Its message is part of the
 * parser contract and is surfaced unchanged inside a `malformed-credential`
 * failure.
 */
export class HawkParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HawkParseError";
  }
}

export class HawkError extends HTTPError {
  readonly reason: GuardFailure["reason"];
  readonly detail?: string;

  private constructor(failure: GuardFailure, message: string, code: string) {
    super({ status: failure.status, message, code });
    this.name = "HawkError";
    this.reason = failure.reason;
    if (failure.reason.kind === "malformed-credential") {
      this.detail = failure.reason.error.message;
    }
  }

  static fromFailure(failure: GuardFailure): HawkError {
    if (failure.reason.kind === "malformed-credential") {
      return new HawkError(failure, "Malformed Hawk credentials", "MALFORMED_CREDENTIAL");
    }
    return new HawkError(failure, "Hawk credentials required", "NO_HEADER");
  }

  toResponse(): Response {
    const response = super.toResponse();
    if (this.status === 401) {
      response.headers.set("WWW-Authenticate", "Hawk");
    }
    return response;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
