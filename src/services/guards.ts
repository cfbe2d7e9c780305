import type { CredentialParser, GuardOutcome, HawkHeader, HawkHeaderName, HeaderSource } from "../types/index.js";
import { evaluateHeader } from "./auth.js";
import { parseHawkHeader } from "./hawk.js";

/**
 * A syntactically valid Hawk header. Nothing here checks the MAC, nonce or
 * timestamp: callers wrap this in their own verification.
 */
abstract class HawkAuthzHeader {
  readonly header: Readonly<HawkHeader>;

  protected constructor(header: HawkHeader) {
    this.header = Object.freeze({ ...header });
  }

  get id(): string | undefined {
    return this.header.id;
  }

  get ts(): number | undefined {
    return this.header.ts;
  }

  get nonce(): string | undefined {
    return this.header.nonce;
  }

  get mac(): string | undefined {
    return this.header.mac;
  }

  get ext(): string | undefined {
    return this.header.ext;
  }

  get hash(): string | undefined {
    return this.header.hash;
  }

  get app(): string | undefined {
    return this.header.app;
  }

  get dlg(): string | undefined {
    return this.header.dlg;
  }
}

function evaluateAs<T>(
  source: HeaderSource,
  headerName: HawkHeaderName,
  parser: CredentialParser<HawkHeader>,
  wrap: (header: HawkHeader) => T
): GuardOutcome<T> {
  const outcome = evaluateHeader(source, headerName, parser);
  return outcome.ok ? { ok: true, value: wrap(outcome.value) } : outcome;
}

/** Hawk credentials sent by a client in `Authorization`. */
export class AuthorizationHeader extends HawkAuthzHeader {
  static readonly headerName: HawkHeaderName = "authorization";

  private constructor(header: HawkHeader) {
    super(header);
  }

  static fromRequest(
    source: HeaderSource,
    parser: CredentialParser<HawkHeader> = parseHawkHeader
  ): GuardOutcome<AuthorizationHeader> {
    return evaluateAs(source, AuthorizationHeader.headerName, parser, (h) => new AuthorizationHeader(h));
  }
}

/** Hawk response credentials sent by a server in `Server-Authorization`. */
export class ServerAuthorizationHeader extends HawkAuthzHeader {
  static readonly headerName: HawkHeaderName = "server-authorization";

  private constructor(header: HawkHeader) {
    super(header);
  }

  static fromRequest(
    source: HeaderSource,
    parser: CredentialParser<HawkHeader> = parseHawkHeader
  ): GuardOutcome<ServerAuthorizationHeader> {
    return evaluateAs(source, ServerAuthorizationHeader.headerName, parser, (h) => new ServerAuthorizationHeader(h));
  }
}
