import { afterEach, describe, expect, it, vi } from "vitest";
import { Logger, parseLogLevel } from "../src/logger.js";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes the call site's tag once, after the timestamp", () => {
    const write = vi.spyOn(console, "error").mockImplementation(() => undefined);

    new Logger("info").info("[INFO] Logged in", "Jane.Doe");

    expect(write).toHaveBeenCalledTimes(1);
    const [line, extra] = write.mock.calls[0];
    expect(line).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \[INFO\] Logged in$/);
    expect(extra).toBe("Jane.Doe");
  });

  it("drops messages below its level", () => {
    const write = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const logger = new Logger("warn");
    logger.info("[INFO] quiet");
    logger.warn("[WARNING] loud");

    expect(write).toHaveBeenCalledTimes(1);
  });
});

describe("parseLogLevel", () => {
  it("accepts aliases and falls back to info", () => {
    expect(parseLogLevel("WARNING")).toBe("warn");
    expect(parseLogLevel("none")).toBe("silent");
    expect(parseLogLevel(undefined)).toBe("info");
  });
});
