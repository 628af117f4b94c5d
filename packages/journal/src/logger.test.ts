import { describe, it, expect, vi, afterEach } from "vitest";
import { ConsoleLogger, resolveLogLevel } from "./logger.js";
import { redactPayload } from "./redact.js";

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages with the component", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    new ConsoleLogger("executor", "info").info("plan ready", { steps: 2 });
    expect(log).toHaveBeenCalledWith("[goapbot:executor] plan ready", { steps: 2 });
  });

  it("drops messages below the threshold", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = new ConsoleLogger("planner", "warn");
    logger.debug("expanding");
    logger.warn("budget low");
    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[goapbot:planner] budget low", "");
  });

  it("replaces control characters in the component name", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    new ConsoleLogger("bad\nname", "error").error("boom");
    expect(error).toHaveBeenCalledWith("[goapbot:bad_name] boom", "");
  });
});

describe("resolveLogLevel", () => {
  it("parses known levels case-insensitively", () => {
    expect(resolveLogLevel(" DEBUG ")).toBe("debug");
  });

  it("falls back on unknown input", () => {
    expect(resolveLogLevel("verbose")).toBe("info");
    expect(resolveLogLevel(undefined, "warn")).toBe("warn");
  });
});

describe("redactPayload", () => {
  it("redacts nested keys and values but keeps structure", () => {
    expect(
      redactPayload({
        request: { api_key: "test-secret", path: "/my/tester/action/move" },
        headers: ["Bearer test-secret", "accept: json"],
        attempts: 2,
      }),
    ).toEqual({
      request: { api_key: "[REDACTED]", path: "/my/tester/action/move" },
      headers: ["[REDACTED]", "accept: json"],
      attempts: 2,
    });
  });

  it("leaves non-string secrets alone", () => {
    expect(redactPayload({ token: 42 })).toEqual({ token: 42 });
  });
});
