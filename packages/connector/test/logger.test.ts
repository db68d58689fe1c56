import { describe, expect, it, vi } from "vitest";

import { createLogger } from "../src/logger";

function fakeConsole() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("createLogger", () => {
  it("drops messages below the configured level", () => {
    const sink = fakeConsole();
    const logger = createLogger("warn", sink);

    logger.debug("page fetched");
    logger.info("entity sync complete");
    logger.warn("fetch retry scheduled");
    logger.error("entity sync failed");

    expect(sink.log).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith("fetch retry scheduled");
    expect(sink.error).toHaveBeenCalledWith("entity sync failed");
  });

  it("falls back to info for unknown levels and forwards error causes", () => {
    const sink = fakeConsole();
    const logger = createLogger("chatty", sink);
    const cause = new Error("boom");

    logger.debug("hidden");
    logger.info("shown");
    logger.error("weather sync failed", cause);

    expect(sink.log.mock.calls).toEqual([["shown"]]);
    expect(sink.error).toHaveBeenCalledWith("weather sync failed", cause);
  });
});
