import { afterEach, describe, expect, it, vi } from "vitest";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("logger", () => {
  it("formats console lines with level and timestamp", async () => {
    const { formatConsolePayload } = await import("../logger");

    const [line, metadata] = formatConsolePayload("info", "Engine ready");

    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] /);
    expect(line.endsWith("Engine ready")).toBe(true);
    expect(metadata).toEqual({});
  });

  it("enriches metadata with the module and process type", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.resetModules();
    const { getLogger } = await import("../logger");

    getLogger("frame-processor").warn("Discarding payload", { issue: "x" });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      expect.stringContaining("[WARN] Discarding payload"),
      expect.objectContaining({
        issue: "x",
        module: "frame-processor",
        processType: "engine",
        level: "warn",
      }),
    );
  });

  it("drops entries below the minimum level", async () => {
    const debug = vi
      .spyOn(console, "debug")
      .mockImplementation(() => undefined);
    const error = vi
      .spyOn(console, "error")
      .mockImplementation(() => undefined);
    vi.resetModules();
    const { createLogger } = await import("../logger");

    const logger = createLogger({
      module: "blink",
      processType: "engine",
      minLevel: "warn",
    });
    logger.debug("Blink detected");
    logger.error("Stage failed");

    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("caches loggers per process type and module", async () => {
    const { getLogger } = await import("../logger");

    expect(getLogger("calibration")).toBe(getLogger("calibration"));
    expect(getLogger("calibration", "host")).not.toBe(
      getLogger("calibration"),
    );
  });
});
