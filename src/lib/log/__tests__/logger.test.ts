import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("tags messages with the scope", () => {
    vi.stubEnv("LOG_LEVEL", "debug");
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);

    createLogger("Collector").info("Collection finished", { items: 3 });

    expect(info).toHaveBeenCalledWith("[Collector]", "Collection finished", { items: 3 });
  });

  it("drops messages below the configured level", () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createLogger("Collector");

    logger.info("hidden");
    logger.warn("shown");

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[Collector]", "shown", {});
  });

  it("falls back to info for unknown levels and stays quiet when silent", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    vi.stubEnv("LOG_LEVEL", "verbose");
    createLogger("Route").debug("hidden");
    expect(debug).not.toHaveBeenCalled();

    vi.stubEnv("LOG_LEVEL", "silent");
    createLogger("Route").error("hidden");
    expect(error).not.toHaveBeenCalled();
  });
});
