import { afterEach, describe, expect, it, vi } from "vitest";
import { createSubsystemLogger, resolveLogFormat, resolveLogLevel } from "./subsystem.js";

describe("subsystem logger", () => {
  it("should resolve known log levels case-insensitively", () => {
    expect(resolveLogLevel("DEBUG")).toBe("debug");
    expect(resolveLogLevel(" warn ")).toBe("warn");
  });

  it("should fall back to info for unknown or missing levels", () => {
    expect(resolveLogLevel("verbose")).toBe("info");
    expect(resolveLogLevel(undefined)).toBe("info");
  });

  it("should only switch to json output when asked", () => {
    expect(resolveLogFormat("JSON")).toBe("json");
    expect(resolveLogFormat("text")).toBe("pretty");
    expect(resolveLogFormat(undefined)).toBe("pretty");
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write log lines to stderr under the subsystem name", () => {
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    const log = createSubsystemLogger("launcher/test");
    log.info("hello");

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(1);
    const line = String(stderr.mock.calls[0]?.[0]).replace(/\u001b\[[0-9;]*m/g, "");
    expect(line).toMatch(/INFO\s+\[launcher\/test\] hello\n$/);
    expect(log.subsystem).toBe("launcher/test");
  });
});
