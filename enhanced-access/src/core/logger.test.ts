import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "./logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("is silent for trace and debug by default", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = createLogger();
    log.trace("step");
    log.debug("details");
    expect(debug).not.toHaveBeenCalled();
  });

  it("prints debug but not trace at the debug level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = createLogger("debug");
    log.trace("step");
    log.debug("details", { n: 1 });
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("[enhanced-access] details", { n: 1 });
  });

  it("prints trace at the trace level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    createLogger("trace").trace("step");
    expect(debug).toHaveBeenCalledWith("[enhanced-access] step");
  });

  it("prints warnings and errors by default", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = createLogger();
    log.warn("careful");
    log.error("broken");
    expect(warn).toHaveBeenCalledWith("[enhanced-access] careful");
    expect(error).toHaveBeenCalledWith("[enhanced-access] broken");
  });

  it("prints only errors at the error level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = createLogger("error");
    log.warn("careful");
    log.error("broken");
    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("prints nothing when off", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = createLogger("off");
    log.trace("step");
    log.debug("details");
    log.warn("careful");
    log.error("broken");
    expect(debug).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });

  it("puts the prefix in front of non-string first arguments", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger().warn({ code: 1 });
    expect(warn).toHaveBeenCalledWith("[enhanced-access]", { code: 1 });
  });
});
