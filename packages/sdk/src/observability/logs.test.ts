import { describe, it, expect, vi, afterEach } from "vitest";
import { logger } from "./logs.js";

describe("logger", () => {
  const original = process.env.KVDOC_DEBUG;

  afterEach(() => {
    vi.restoreAllMocks();
    logger.setEnabled(true);
    if (original !== undefined) {
      process.env.KVDOC_DEBUG = original;
    } else {
      delete process.env.KVDOC_DEBUG;
    }
  });

  it("should format level, event, message and details on one line", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

    logger.warn("manifest.large", { message: "many keys", details: { keys: 3 } });

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(String(warnSpy.mock.calls[0]?.[0])).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[WARN\] \[manifest\.large\] many keys \{"keys":3\}$/
    );
  });

  it("should only print debug output when KVDOC_DEBUG is set", () => {
    const debugSpy = vi.spyOn(console, "debug").mockImplementation(() => {});

    delete process.env.KVDOC_DEBUG;
    logger.debug("revision.compiled");
    expect(debugSpy).not.toHaveBeenCalled();

    process.env.KVDOC_DEBUG = "1";
    logger.debug("revision.compiled");
    expect(debugSpy).toHaveBeenCalledTimes(1);
  });

  it("should stay silent when disabled", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    logger.setEnabled(false);
    logger.error("manifest.malformed");

    expect(errorSpy).not.toHaveBeenCalled();
  });
});
