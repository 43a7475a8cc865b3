import { mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ProgramCatalog, validateCatalog } from "../../../src/catalog/catalog.js";
import { ConfigValidationError } from "../../../src/config/loader.js";
import { CATALOG_FILE } from "../../../src/constants.js";
import { UnknownBugError } from "../../../src/errors.js";
import { bugEntry, createTestCatalog, createTestSettings } from "../../mocks/harness.js";

import type { Settings } from "../../../src/types/index.js";

const PLAIN = { kind: "plain", failure_cmd: "{executable}", expected_failure: 139 } as const;
const PLAIN_TRIGGER = {
  ...PLAIN,
  exit_code_aliases: {},
  hang_signal: "SIGKILL",
  hang_exit_code: 1,
};

describe("validateCatalog", () => {
  it("fills entry defaults", () => {
    const catalog = validateCatalog({
      "prog-1": { install_directory: "prog-1", executable: "prog", trigger: PLAIN },
    });

    expect(catalog["prog-1"]).toEqual({
      location: "install",
      install_directory: "prog-1",
      executable_directory: "bin",
      executable: "prog",
      options: {},
      trigger: PLAIN_TRIGGER,
      benchmark: {},
      cleanup_paths: [],
    });
  });

  it("rejects invalid bug names", () => {
    expect(() =>
      validateCatalog({ "Prog 1": { install_directory: "p", executable: "p", trigger: PLAIN } }),
    ).toThrow(ConfigValidationError);
  });

  it("lists every issue", () => {
    expect(() =>
      validateCatalog({
        "prog-1": {
          install_directory: "p",
          executable: "p",
          trigger: { kind: "client-server", start_cmd: "p", helper: { action: "a", commands: [] } },
        },
      }),
    ).toThrow(
      "Bug catalog validation failed:\n  - prog-1.trigger.helper.commands: At least one helper is required",
    );
  });
});

describe("ProgramCatalog", () => {
  let tempDir: string;
  let settings: Settings;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(os.tmpdir(), "catalog-test-"));
    settings = createTestSettings(tempDir);
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("loads the bundled catalog", () => {
    const catalog = ProgramCatalog.load(CATALOG_FILE, settings);

    expect(catalog.names()).toEqual([
      "apache-21287",
      "apache-25520",
      "apache-45605",
      "cppcheck-148",
      "cppcheck-152",
      "curl-721",
      "memcached-127",
      "pbzip-2094",
      "sqlite-333",
      "transmission-142",
    ]);
    expect(catalog.entry("memcached-127").trigger.kind).toBe("client-server");
  });

  it("resolves install directories by location", () => {
    const catalog = new ProgramCatalog(
      {
        installed: bugEntry({ executable: "a", install_directory: "a-1", trigger: PLAIN_TRIGGER }),
        utility: bugEntry({ executable: "b", install_directory: "/b-1", location: "utility", trigger: PLAIN_TRIGGER }),
        system: bugEntry({ executable: "c", install_directory: "/usr", location: "system", trigger: PLAIN_TRIGGER }),
      },
      settings,
    );

    expect(catalog.installDirectory("installed")).toBe(path.join(tempDir, "install", "a-1"));
    expect(catalog.installDirectory("utility")).toBe(path.join(tempDir, "utilities", "b-1"));
    expect(catalog.installDirectory("system")).toBe("/usr");
  });

  it("builds a fresh program configuration per call", () => {
    const catalog = ProgramCatalog.load(CATALOG_FILE, settings);

    const first = catalog.program("memcached-127");
    first.executable = "memcached-fail";
    const second = catalog.program("memcached-127");

    expect(second.executablePath()).toBe(
      path.join(tempDir, "install", "memcached-127", "bin", "memcached"),
    );
    expect(second.listeningPort).toBe(11211);
    expect(second.options).toEqual({ host: "127.0.0.1" });
  });

  it("reports only installed bugs", () => {
    const catalog = createTestCatalog(
      {
        "prog-1": bugEntry({ executable: "prog", trigger: PLAIN_TRIGGER }),
        "prog-2": bugEntry({ executable: "other", trigger: PLAIN_TRIGGER }),
      },
      settings,
      ["prog-2"],
    );

    expect(catalog.isInstalled("prog-1")).toBe(false);
    expect(catalog.installed()).toEqual(["prog-2"]);
  });

  it("rejects unknown bugs", () => {
    const catalog = new ProgramCatalog({}, settings);

    expect(catalog.has("nope")).toBe(false);
    expect(() => catalog.entry("nope")).toThrow(UnknownBugError);
    expect(() => catalog.program("nope")).toThrow("Unknown bug: nope");
  });
});
