import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type MockInstance,
  vi,
} from "vitest";

import {
  configureLogger,
  debug,
  error,
  failure,
  info,
  progress,
  section,
  success,
  table,
  verbose,
  warn,
} from "../../../src/utils/logging.js";

function resetLogger(): void {
  configureLogger({ level: "info", timestamps: false, colors: true, file: undefined });
}

describe("log level filtering", () => {
  let debugSpy: MockInstance;
  let infoSpy: MockInstance;
  let warnSpy: MockInstance;
  let errorSpy: MockInstance;

  beforeEach(() => {
    debugSpy = vi.spyOn(console, "debug").mockImplementation(vi.fn());
    infoSpy = vi.spyOn(console, "info").mockImplementation(vi.fn());
    warnSpy = vi.spyOn(console, "warn").mockImplementation(vi.fn());
    errorSpy = vi.spyOn(console, "error").mockImplementation(vi.fn());
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("filters messages below configured level", () => {
    configureLogger({ level: "warn" });

    debug("debug message");
    verbose("verbose message");
    info("info message");
    warn("warn message");
    error("error message");

    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("shows verbose messages between debug and info", () => {
    configureLogger({ level: "verbose", colors: false });

    debug("debug message");
    verbose("running the command");

    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).toHaveBeenCalledWith("[VERBOSE] running the command");
  });

  it("shows all messages at debug level", () => {
    configureLogger({ level: "debug" });

    debug("debug message");
    info("info message");

    expect(debugSpy).toHaveBeenCalledTimes(1);
    expect(infoSpy).toHaveBeenCalledTimes(1);
  });
});

describe("message formatting", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("prefixes the level without colors", () => {
    configureLogger({ colors: false });
    const spy = vi.spyOn(console, "warn").mockImplementation(vi.fn());

    warn("core dump missing");

    expect(spy).toHaveBeenCalledWith("[WARN] core dump missing");
  });

  it("adds ISO timestamps when enabled", () => {
    configureLogger({ colors: false, timestamps: true });
    const spy = vi.spyOn(console, "info").mockImplementation(vi.fn());

    info("test");

    expect(spy.mock.calls[0]?.[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] test$/);
  });

  it("prints success and failure lines", () => {
    configureLogger({ colors: false });
    const spy = vi.spyOn(console, "log").mockImplementation(vi.fn());

    success("all passed");
    failure("1 failed");

    expect(spy.mock.calls).toEqual([["[SUCCESS] all passed"], ["[FAILURE] 1 failed"]]);
  });
});

describe("section", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("prints a banner", () => {
    configureLogger({ colors: false });
    const spy = vi.spyOn(console, "log").mockImplementation(vi.fn());

    section("curl-721", "triggering");

    expect(spy.mock.calls).toEqual([
      ["=".repeat(60)],
      ["TRIGGERING: curl-721"],
      ["=".repeat(60)],
    ]);
  });
});

describe("progress", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("draws a bar", () => {
    configureLogger({ colors: false });
    const spy = vi.spyOn(console, "log").mockImplementation(vi.fn());

    progress(2, 4, "pbzip-2094");

    expect(spy).toHaveBeenCalledWith(
      `[2/4] [${"█".repeat(10)}${"░".repeat(10)}] 50% - pbzip-2094`,
    );
  });

  it("clamps a bar past its total", () => {
    configureLogger({ colors: false });
    const spy = vi.spyOn(console, "log").mockImplementation(vi.fn());

    progress(5, 4, "bug");

    expect(spy).toHaveBeenCalledWith(`[5/4] [${"█".repeat(20)}] 125% - bug`);
  });
});

describe("table", () => {
  it("pads columns to their widest cell", () => {
    expect(table(["a", "bb"], [["xyz", "1"]])).toBe("a   | bb\n----+---\nxyz | 1 ");
  });

  it("renders headers alone when there are no rows", () => {
    expect(table(["bug", "plugin"], [])).toBe("bug | plugin\n----+-------");
  });
});

describe("log file", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(os.tmpdir(), "logging-test-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("appends emitted lines without colors", () => {
    const file = path.join(tempDir, "bugbase.log");
    configureLogger({ file });
    vi.spyOn(console, "info").mockImplementation(vi.fn());
    vi.spyOn(console, "debug").mockImplementation(vi.fn());

    info("first");
    debug("filtered out");

    const lines = readFileSync(file, "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\S+ \[INFO\] first$/);
  });
});
