import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../src/logger.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes at or above its level to stderr", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger("warn", "test");
    logger.info("hidden");
    logger.warn("shown", 42);
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ WARN \[test\] shown$/);
    expect(stderr.mock.calls[0][1]).toBe(42);
  });

  it("writes nothing when silent", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("silent").error("nothing");
    expect(stderr).not.toHaveBeenCalled();
  });
});
