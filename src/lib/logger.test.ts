import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, normalizeLogLevel } from "./logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("normalizeLogLevel", () => {
  it("accepts known levels case-insensitively", () => {
    expect(normalizeLogLevel(" WARN ")).toBe("warn");
    expect(normalizeLogLevel("silent")).toBe("silent");
  });

  it("falls back for unknown values", () => {
    expect(normalizeLogLevel("verbose")).toBe("info");
    expect(normalizeLogLevel(undefined, "error")).toBe("error");
  });
});

describe("createLogger", () => {
  it("drops messages below the threshold", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = createLogger("desk", "warn");
    logger.info("not shown");
    logger.warn("shown", { ticker: "ACME" });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[desk:desk] shown {"ticker":"ACME"}');
  });

  it("prefixes child scopes and redacts secrets", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});

    createLogger("desk").child("llm").info("configured", { api_key: "test-secret" });

    expect(info).toHaveBeenCalledWith('[desk:desk:llm] configured {"api_key":"[REDACTED]"}');
  });

  it("serializes errors with their code", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const failure = Object.assign(new Error("feed down"), { code: "PROVIDER_ERROR" });

    createLogger("desk").error("Stage failed", failure, { runId: "run:1" });

    expect(error).toHaveBeenCalledWith(
      '[desk:desk] Stage failed {"runId":"run:1","error":{"name":"Error","message":"feed down","code":"PROVIDER_ERROR"}}'
    );
  });

  it("writes nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("desk", "silent").error("hidden");
    expect(error).not.toHaveBeenCalled();
  });
});
