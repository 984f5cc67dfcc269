import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createConsoleLogger", () => {
  it("routes levels to the console", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createConsoleLogger();

    logger.info("started");
    logger.warn("slow");

    expect(info).toHaveBeenCalledWith("started");
    expect(warn).toHaveBeenCalledWith("slow");
    expect(logger.debug).toBeUndefined();
  });

  it("emits debug output only when asked", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    createConsoleLogger({ debug: true }).debug?.("poll");
    expect(debug).toHaveBeenCalledWith("poll");
  });
});
