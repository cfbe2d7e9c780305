import { describe, expect, it } from "vitest";
import { ConfigError, HawkError, HawkParseError, HTTPError } from "../../src/lib/errors.js";
import type { GuardFailure } from "../../src/types/index.js";

describe("HTTPError", () => {
  describe("constructor", () => {
    it.each([
      [400, "Bad Request"],
      [401, "Unauthorized"],
      [500, "Internal Server Error"],
    ])("creates error with status %d and message '%s'", (status, message) => {
      const error = new HTTPError({ status, message });
      expect(error.status).toBe(status);
      expect(error.message).toBe(message);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe("HTTPError");
    });

    it("has undefined code when not provided", () => {
      const error = new HTTPError({ status: 400, message: "Bad Request" });
      expect(error.code).toBeUndefined();
    });
  });

  describe("toResponse", () => {
    it("returns Response with status and JSON content type", () => {
      const response = new HTTPError({ status: 403, message: "Forbidden" }).toResponse();
      expect(response.status).toBe(403);
      expect(response.headers.get("Content-Type")).toBe("application/json");
    });

    it("omits the code from the body when absent", async () => {
      const response = new HTTPError({ status: 404, message: "Not Found" }).toResponse();
      expect(await response.json()).toEqual({ message: "Not Found" });
    });

    it("includes the code in the body when provided", async () => {
      const response = new HTTPError({ status: 400, message: "Invalid", code: "VALIDATION_ERROR" }).toResponse();
      expect(await response.json()).toEqual({ message: "Invalid", code: "VALIDATION_ERROR" });
    });
  });
});

describe("HawkParseError", () => {
  it("keeps the parser message and name", () => {
    const error = new HawkParseError("Invalid Hawk field nosuchfield");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("HawkParseError");
    expect(error.message).toBe("Invalid Hawk field nosuchfield");
  });
});

describe("HawkError", () => {
  const missing: GuardFailure = { ok: false, status: 401, reason: { kind: "no-header" } };
  const duplicated: GuardFailure = { ok: false, status: 400, reason: { kind: "no-header" } };
  const malformed: GuardFailure = {
    ok: false,
    status: 401,
    reason: { kind: "malformed-credential", error: new HawkParseError("Expected comma") },
  };

  describe("fromFailure", () => {
    it.each([
      [missing, 401, "Hawk credentials required", "NO_HEADER"],
      [duplicated, 400, "Hawk credentials required", "NO_HEADER"],
      [malformed, 401, "Malformed Hawk credentials", "MALFORMED_CREDENTIAL"],
    ])("maps %o to status %d", (failure, status, message, code) => {
      const error = HawkError.fromFailure(failure);
      expect(error).toBeInstanceOf(HTTPError);
      expect(error.name).toBe("HawkError");
      expect(error.status).toBe(status);
      expect(error.message).toBe(message);
      expect(error.code).toBe(code);
      expect(error.reason).toBe(failure.reason);
    });

    it("keeps the parser message as detail", () => {
      expect(HawkError.fromFailure(malformed).detail).toBe("Expected comma");
      expect(HawkError.fromFailure(missing).detail).toBeUndefined();
    });
  });

  describe("toResponse", () => {
    it("challenges with WWW-Authenticate on 401", () => {
      const response = HawkError.fromFailure(missing).toResponse();
      expect(response.status).toBe(401);
      expect(response.headers.get("WWW-Authenticate")).toBe("Hawk");
    });

    it("does not challenge on 400", () => {
      const response = HawkError.fromFailure(duplicated).toResponse();
      expect(response.status).toBe(400);
      expect(response.headers.get("WWW-Authenticate")).toBeNull();
    });

    it("does not send the parser detail to the client", async () => {
      const body = await HawkError.fromFailure(malformed).toResponse().json();
      expect(body).toEqual({ message: "Malformed Hawk credentials", code: "MALFORMED_CREDENTIAL" });
    });
  });
});

describe("ConfigError", () => {
  it("joins issues into the message", () => {
    const error = new ConfigError(["PORT: too big", "HOST: required"]);
    expect(error.name).toBe("ConfigError");
    expect(error.issues).toEqual(["PORT: too big", "HOST: required"]);
    expect(error.message).toBe("Invalid configuration: PORT: too big; HOST: required");
  });
});
