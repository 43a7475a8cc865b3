import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  Configuration,
  ConfigLoadError,
  ConfigValidationError,
  loadYamlFile,
  mergeSettings,
  readSettings,
  resolveConfigDirectory,
  validateSettings,
} from "../../../src/config/loader.js";
import { CONF_PATH } from "../../../src/constants.js";

describe("loadYamlFile", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(os.tmpdir(), "loader-test-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("parses YAML", () => {
    const file = path.join(tempDir, "conf.yaml");
    writeFileSync(file, "trigger:\n  show_progress: false\n");

    expect(loadYamlFile(file)).toEqual({ trigger: { show_progress: false } });
  });

  it("returns an empty object for an empty document", () => {
    const file = path.join(tempDir, "empty.yaml");
    writeFileSync(file, "");

    expect(loadYamlFile(file)).toEqual({});
  });

  it("throws on missing file", () => {
    expect(() => loadYamlFile("/non/existent/config.yaml")).toThrow(ConfigLoadError);
  });

  it("throws on invalid YAML", () => {
    const file = path.join(tempDir, "broken.yaml");
    writeFileSync(file, "trigger: [unclosed\n");

    expect(() => loadYamlFile(file)).toThrow(ConfigLoadError);
  });
});

describe("validateSettings", () => {
  it("throws ConfigValidationError on invalid settings", () => {
    expect(() => validateSettings({ helpers: { isolation: "thread" } })).toThrow(
      ConfigValidationError,
    );
  });

  it("includes field path in error message", () => {
    expect(() => validateSettings({ benchmark: { wanted_results: 0 } })).toThrow(
      "benchmark.wanted_results",
    );
  });
});

describe("mergeSettings", () => {
  it("merges sections key by key", () => {
    const merged = mergeSettings(
      { trigger: { show_progress: true, core_dump_filter: "0x7f" }, helpers: { max_errors: 20 } },
      { trigger: { show_progress: false } },
    );

    expect(merged).toEqual({
      trigger: { show_progress: false, core_dump_filter: "0x7f" },
      helpers: { max_errors: 20 },
    });
  });

  it("replaces lists instead of merging them", () => {
    const merged = mergeSettings(
      { plugins: { enabled: ["base"] } },
      { plugins: { enabled: ["./extra.js"] } },
    );

    expect(merged).toEqual({ plugins: { enabled: ["./extra.js"] } });
  });
});

describe("readSettings", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(os.tmpdir(), "loader-test-"));
    writeFileSync(
      path.join(tempDir, "default.yaml"),
      "benchmark:\n  wanted_results: 20\n  kept_runs: 10\nlogging:\n  level: info\n",
    );
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("reads defaults alone", () => {
    const settings = readSettings(tempDir);

    expect(settings.benchmark.wanted_results).toBe(20);
    expect(settings.logging.level).toBe("info");
  });

  it("lets custom.yaml override defaults", () => {
    writeFileSync(path.join(tempDir, "custom.yaml"), "benchmark:\n  kept_runs: 5\n");

    const settings = readSettings(tempDir);

    expect(settings.benchmark.kept_runs).toBe(5);
    expect(settings.benchmark.wanted_results).toBe(20);
  });

  it("loads the bundled configuration", () => {
    const settings = readSettings(CONF_PATH);

    expect(settings.plugins.enabled).toEqual(["base"]);
    expect(settings.helpers.isolation).toBe("process");
  });
});

describe("resolveConfigDirectory", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("uses BUGBASE_CONFIG when set", () => {
    vi.stubEnv("BUGBASE_CONFIG", "/etc/bugbase");

    expect(resolveConfigDirectory()).toBe("/etc/bugbase");
  });

  it("falls back to the bundled directory", () => {
    vi.stubEnv("BUGBASE_CONFIG", "");

    expect(resolveConfigDirectory()).toBe(CONF_PATH);
  });
});

describe("Configuration", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(os.tmpdir(), "loader-test-"));
    writeFileSync(path.join(tempDir, "default.yaml"), "helpers:\n  max_errors: 3\n");
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("reloads settings from its directory", () => {
    const configuration = Configuration.load(tempDir);
    expect(configuration.settings.helpers.max_errors).toBe(3);

    writeFileSync(path.join(tempDir, "custom.yaml"), "helpers:\n  max_errors: 7\n");
    configuration.reload();

    expect(configuration.settings.helpers.max_errors).toBe(7);
  });
});
