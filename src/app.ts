import { type Context, Hono } from "hono";
import type { Logger } from "pino";
import { HawkError } from "./lib/index.js";
import { type HawkBindings, hawkAuthorization, hawkServerAuthorization } from "./services/middleware.js";
import type { GuardFailure, HawkHeaderName } from "./types/index.js";

export interface AppOptions {
  logger: Logger;
}

export function createApp({ logger }: AppOptions) {
  const app = new Hono<{ Bindings: HawkBindings }>();

  // Never log the header value itself
  const logFailure = (header: HawkHeaderName) => (c: Context, failure: GuardFailure) => {
    logger.debug(
      { header, kind: failure.reason.kind, status: failure.status, path: c.req.path },
      "Hawk guard rejected request"
    );
  };

  // Health check endpoint
  app.get("/health", (c) => {
    return c.json({ status: "ok" });
  });

  // Guards run in optional mode; each handler renders its own failure
  app.get("/credentials", hawkAuthorization({ required: false, onFailure: logFailure("authorization") }), (c) => {
    const outcome = c.get("hawkAuthorization");
    if (!outcome.ok) {
      return HawkError.fromFailure(outcome).toResponse();
    }

    const header = outcome.value;
    return c.json({ id: header.id, ts: header.ts, nonce: header.nonce, ext: header.ext, app: header.app, dlg: header.dlg });
  });

  app.post(
    "/server-credentials",
    hawkServerAuthorization({ required: false, onFailure: logFailure("server-authorization") }),
    (c) => {
      const outcome = c.get("hawkServerAuthorization");
      if (!outcome.ok) {
        return HawkError.fromFailure(outcome).toResponse();
      }

      const header = outcome.value;
      return c.json({ mac: header.mac, hash: header.hash, ext: header.ext });
    }
  );

  return app;
}
