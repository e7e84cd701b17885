import { describe, it, expect, afterEach, vi } from "vitest";
import { formatLogLine, logger } from "./logs.js";

describe("formatLogLine", () => {
  it("should render every part of an entry", () => {
    const line = formatLogLine({
      timestamp: "2024-01-01T00:00:00.000Z",
      level: "warn",
      event: "filestore.orphans",
      store: "file:///data",
      message: "Orphans found",
      details: { count: 2 },
    });
    expect(line).toBe(
      '[2024-01-01T00:00:00.000Z] [WARN] [filestore.orphans] <file:///data> Orphans found {"count":2}'
    );
  });

  it("should omit missing parts", () => {
    expect(
      formatLogLine({ timestamp: "2024-01-01T00:00:00.000Z", level: "info", event: "connect" })
    ).toBe("[2024-01-01T00:00:00.000Z] [INFO] [connect]");
  });
});

describe("logger", () => {
  afterEach(() => {
    logger.setEnabled(true);
    delete process.env.STRATA_DEBUG;
    vi.restoreAllMocks();
  });

  it("should tag scoped entries with the store name", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    logger.forStore("memory").warn("index.duplicate", { message: "dup" });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toMatch(/^\[[^\]]+\] \[WARN\] \[index\.duplicate\] <memory> dup$/);
  });

  it("should write nothing while disabled", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    logger.setEnabled(false);
    logger.error("document.invalid");
    logger.forStore("memory").error("document.invalid");

    expect(error).not.toHaveBeenCalled();
  });

  it("should only write debug lines when STRATA_DEBUG is set", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    delete process.env.STRATA_DEBUG;
    logger.debug("database.connect");
    expect(debug).not.toHaveBeenCalled();

    process.env.STRATA_DEBUG = "1";
    logger.debug("database.connect");
    expect(debug).toHaveBeenCalledTimes(1);
  });
});
