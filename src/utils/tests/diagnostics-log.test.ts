import { afterEach, describe, expect, it, vi } from "vitest";
import type { AppLogger } from "@/logging";
import { createDiagnosticsLog } from "../diagnostics-log";

const makeLogger = (): AppLogger => ({
  info: vi.fn(() => "info-id"),
  warn: vi.fn(() => "warn-id"),
  error: vi.fn(() => "error-id"),
});

describe("createDiagnosticsLog", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should do nothing when diagnostics are off", () => {
    const logger = makeLogger();
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {
      // silence output
    });

    createDiagnosticsLog("REST", { diagnostics: false, logger })("ready");

    expect(logger.info).not.toHaveBeenCalled();
    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it("should write through the logger with a prefixed message", () => {
    const logger = makeLogger();

    createDiagnosticsLog("TaskServer", { diagnostics: true, logger })(
      "Store ready",
      { tasks: 0 }
    );

    expect(logger.info).toHaveBeenCalledWith({
      atFunction: "TaskServer",
      message: "[TaskServer] Store ready",
      data: { tasks: 0 },
    });
  });

  it("should fall back to console.log without a logger", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {
      // silence output
    });

    createDiagnosticsLog("REST", { diagnostics: true })("ready");

    expect(consoleSpy).toHaveBeenCalledWith("[REST] ready", "");
  });
});
