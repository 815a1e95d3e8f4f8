import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger, formatContext, silentLogger, withContext } from "../src/utils/logger.js";
import type { LoggerOptions } from "../src/utils/logger.js";

const TIMESTAMP = "[2026-02-08T01:02:03.004Z]";

describe("createLogger", () => {
  const originalNoColor = process.env.NO_COLOR;
  const originalLogFormat = process.env.PBR_LOG_FORMAT;
  let lines: string[];

  function capture(verbose: boolean, options: LoggerOptions = {}) {
    return createLogger(verbose, { color: false, ...options, sink: (line) => lines.push(line) });
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-02-08T01:02:03.004Z"));
    lines = [];
    delete process.env.NO_COLOR;
    delete process.env.PBR_LOG_FORMAT;
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    if (originalNoColor === undefined) {
      delete process.env.NO_COLOR;
    } else {
      process.env.NO_COLOR = originalNoColor;
    }
    if (originalLogFormat === undefined) {
      delete process.env.PBR_LOG_FORMAT;
    } else {
      process.env.PBR_LOG_FORMAT = originalLogFormat;
    }
  });

  it("writes plain lines with the level label", () => {
    const logger = capture(false);

    logger.info("Found 12 patch title(s)");
    logger.warn("careful");
    logger.error("failed");

    expect(lines).toEqual([
      `${TIMESTAMP} +0ms INFO Found 12 patch title(s)`,
      `${TIMESTAMP} +0ms WARN careful`,
      `${TIMESTAMP} +0ms ERR! failed`
    ]);
  });

  it("colors the label and message when enabled", () => {
    const logger = capture(true, { color: true });

    logger.info("ok");
    logger.debug("dbg");

    expect(lines[0]).toBe(
      `\x1b[90m${TIMESTAMP} +0ms\x1b[0m \x1b[32m\x1b[1mINFO\x1b[0m \x1b[32mok\x1b[0m`
    );
    expect(lines[1]).toContain("\x1b[90m\x1b[1mDEBG");
  });

  it("prints debug messages only in verbose mode", () => {
    capture(false).debug("hidden");
    capture(true).debug("visible");

    expect(lines).toEqual([`${TIMESTAMP} +0ms DEBG visible`]);
  });

  it("appends context pairs", () => {
    const logger = capture(false);

    logger.info("Patch report page", { titleId: "42", page: 1 });
    logger.info("Fetching patch report", { title: "Google Chrome", skipped: undefined });

    expect(lines).toEqual([
      `${TIMESTAMP} +0ms INFO Patch report page titleId=42 page=1`,
      `${TIMESTAMP} +0ms INFO Fetching patch report title="Google Chrome"`
    ]);
  });

  it("outputs JSON when PBR_LOG_FORMAT=json", () => {
    process.env.PBR_LOG_FORMAT = "json";
    const logger = capture(false);

    logger.info("structured", { title: "Zoom" });

    expect(JSON.parse(lines[0] ?? "")).toEqual({
      level: "info",
      timestamp: "2026-02-08T01:02:03.004Z",
      elapsedMs: 0,
      message: "structured",
      context: { title: "Zoom" }
    });
  });

  it("tracks elapsed time between calls", () => {
    const logger = capture(false);

    logger.info("first");
    vi.setSystemTime(new Date("2026-02-08T01:02:04.004Z"));
    logger.info("second");
    vi.setSystemTime(new Date("2026-02-08T01:04:03.004Z"));
    logger.info("third");

    expect(lines.map((line) => line.split(" ")[1])).toEqual(["+0ms", "+1.0s", "+2.0m"]);
  });

  it("writes to stderr by default and skips color when NO_COLOR is set", () => {
    process.env.NO_COLOR = "1";
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    createLogger(false).warn("to stderr");

    expect(write).toHaveBeenCalledWith(`${TIMESTAMP} +0ms WARN to stderr\n`);
  });
});

describe("formatContext", () => {
  it("keeps null and boolean values", () => {
    expect(formatContext({ file: null, ok: true, note: "two words" })).toBe(
      'file=null ok=true note="two words"'
    );
  });
});

describe("withContext", () => {
  it("merges fixed context into every line", () => {
    const lines: string[] = [];
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-02-08T01:02:03.004Z"));
    const logger = withContext(
      createLogger(true, { format: "human", color: false, sink: (line) => lines.push(line) }),
      { title: "Zoom" }
    );

    logger.info("Fetching patch report");
    logger.debug("Classified devices", { active: 3 });
    vi.useRealTimers();

    expect(lines).toEqual([
      `${TIMESTAMP} +0ms INFO Fetching patch report title=Zoom`,
      `${TIMESTAMP} +0ms DEBG Classified devices title=Zoom active=3`
    ]);
  });

  it("lets per-call context override the fixed context", () => {
    const sink = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const logger = withContext(sink, { title: "Zoom", page: 0 });

    logger.warn("Skipping snapshot row", { page: 2 });

    expect(sink.warn).toHaveBeenCalledWith("Skipping snapshot row", { title: "Zoom", page: 2 });
  });

  it("drops everything through the silent logger", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    silentLogger.info("nothing");
    silentLogger.error("nothing");

    expect(write).not.toHaveBeenCalled();
    write.mockRestore();
  });
});
