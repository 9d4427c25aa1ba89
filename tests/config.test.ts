import { afterEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG, resolveConfig } from "../src/config";
import type { EnvAccessor } from "../src/config";
import { ConfigError } from "../src/errors";
import { createConsoleLogger } from "../src/logger";

const noEnv: EnvAccessor = () => undefined;

function envOf(vars: Record<string, string>): EnvAccessor {
  return (name) => vars[name];
}

describe("resolveConfig", () => {
  afterEach(() => vi.restoreAllMocks());

  it("uses built-in defaults", () => {
    const config = resolveConfig({}, noEnv);

    expect(config.baseURL).toBe("https://furnilytics-api.fly.dev");
    expect(config.apiKey).toBeUndefined();
    expect(config.timeoutSeconds).toBe(20);
    expect(config.maxRetries).toBe(4);
    expect(config.userAgent).toBe("furnilytics-js/0.2.0");
    expect(config.headers).toEqual({});
  });

  it("falls back to the environment", () => {
    const config = resolveConfig(
      {},
      envOf({
        FURNILYTICS_API_KEY: "test-key",
        FURNILYTICS_BASE_URL: "http://localhost:8000/",
      }),
    );

    expect(config.apiKey).toBe("test-key");
    expect(config.baseURL).toBe("http://localhost:8000");
  });

  it("prefers explicit options over the environment", () => {
    const config = resolveConfig(
      { apiKey: "explicit-key", baseURL: "https://api.test" },
      envOf({
        FURNILYTICS_API_KEY: "env-key",
        FURNILYTICS_BASE_URL: "http://localhost:8000",
      }),
    );

    expect(config.apiKey).toBe("explicit-key");
    expect(config.baseURL).toBe("https://api.test");
  });

  it("treats an explicit empty API key as public access", () => {
    const config = resolveConfig({ apiKey: "" }, envOf({ FURNILYTICS_API_KEY: "env-key" }));
    expect(config.apiKey).toBeUndefined();
  });

  it("ignores blank environment values", () => {
    const config = resolveConfig({}, envOf({ FURNILYTICS_BASE_URL: "   ", FURNILYTICS_API_KEY: "" }));
    expect(config.baseURL).toBe(DEFAULT_CONFIG.baseURL);
    expect(config.apiKey).toBeUndefined();
  });

  it("keeps a path prefix on the base URL", () => {
    const config = resolveConfig({ baseURL: "https://gateway.test/furnilytics/" }, noEnv);
    expect(config.baseURL).toBe("https://gateway.test/furnilytics");
  });

  it.each(["not a url", "/relative/path", "ftp://files.test"])(
    "rejects base URL %s",
    (baseURL) => {
      expect(() => resolveConfig({ baseURL }, noEnv)).toThrow(ConfigError);
      expect(() => resolveConfig({ baseURL }, noEnv)).toThrow(/baseURL/);
    },
  );

  it("rejects an invalid base URL from the environment", () => {
    expect(() => resolveConfig({}, envOf({ FURNILYTICS_BASE_URL: "nope" }))).toThrow(ConfigError);
  });

  it("rejects non-positive timeouts and fractional retry counts", () => {
    expect(() => resolveConfig({ timeoutSeconds: 0 }, noEnv)).toThrow(ConfigError);
    expect(() => resolveConfig({ timeoutSeconds: Number.POSITIVE_INFINITY }, noEnv)).toThrow(ConfigError);
    expect(() => resolveConfig({ maxRetries: 1.5 }, noEnv)).toThrow(ConfigError);
    expect(() => resolveConfig({ maxRetries: -1 }, noEnv)).toThrow(ConfigError);
  });

  it("accepts zero retries", () => {
    expect(resolveConfig({ maxRetries: 0 }, noEnv).maxRetries).toBe(0);
  });

  it("freezes the resolved config", () => {
    const headers = { "X-Team": "analytics" };
    const config = resolveConfig({ headers }, noEnv);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.headers)).toBe(true);
    headers["X-Team"] = "changed";
    expect(config.headers).toEqual({ "X-Team": "analytics" });
  });

  it("reads the log level from the environment", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const config = resolveConfig({}, envOf({ FURNILYTICS_LOG_LEVEL: "DEBUG" }));

    config.logger.debug("hello");
    expect(debug).toHaveBeenCalledWith("[furnilytics] hello");
  });

  it("uses an injected logger as-is", () => {
    const logger = createConsoleLogger("silent");
    expect(resolveConfig({ logger }, noEnv).logger).toBe(logger);
  });
});

describe("createConsoleLogger", () => {
  afterEach(() => vi.restoreAllMocks());

  it("drops messages below the level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createConsoleLogger("warn");

    logger.info("quiet");
    logger.warn("loud", { attempt: 1 });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[furnilytics] loud", { attempt: 1 });
  });

  it("writes nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createConsoleLogger("silent").error("boom");
    expect(error).not.toHaveBeenCalled();
  });
});
