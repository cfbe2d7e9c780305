import { describe, expect, it } from "vitest";
import { loadConfig } from "../../src/lib/config.js";
import { ConfigError } from "../../src/lib/errors.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({ port: 3000, host: "0.0.0.0", logLevel: "info" });
  });

  it("reads values from the environment", () => {
    const config = loadConfig({ PORT: "8080", HOST: "127.0.0.1", LOG_LEVEL: "debug" });

    expect(config).toEqual({ port: 8080, host: "127.0.0.1", logLevel: "debug" });
  });

  it("ignores unrelated variables", () => {
    expect(loadConfig({ PATH: "/usr/bin", NODE_ENV: "test" }).port).toBe(3000);
  });

  it.each([
    [{ PORT: "abc" }, "PORT"],
    [{ PORT: "0" }, "PORT"],
    [{ PORT: "65536" }, "PORT"],
    [{ PORT: "80.5" }, "PORT"],
    [{ HOST: "" }, "HOST"],
    [{ LOG_LEVEL: "verbose" }, "LOG_LEVEL"],
  ])("rejects %o", (env, variable) => {
    expect(() => loadConfig(env)).toThrow(ConfigError);

    try {
      loadConfig(env);
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0]).toMatch(new RegExp(`^${variable}: `));
    }
  });

  it("reports every failing variable", () => {
    expect(() => loadConfig({ PORT: "abc", LOG_LEVEL: "verbose" })).toThrow(
      /^Invalid configuration: PORT: .+; LOG_LEVEL: .+$/
    );
  });
});
