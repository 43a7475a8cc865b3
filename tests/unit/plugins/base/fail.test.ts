import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { PLUGIN_ERROR } from "../../../../src/constants.js";
import { FailPlugin, coreDumpCandidates } from "../../../../src/plugins/base/fail.js";
import { logger } from "../../../../src/utils/logging.js";
import { createPlainTrigger, createTestSettings } from "../../../mocks/harness.js";

import type { Trigger } from "../../../../src/trigger/trigger.js";
import type { Classification, Settings } from "../../../../src/types/index.js";

describe("FailPlugin", () => {
  let tempDir: string;
  let settings: Settings;
  let trigger: Trigger;
  let plugin: FailPlugin;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(os.tmpdir(), "fail-plugin-test-"));
    settings = createTestSettings(tempDir);
    trigger = createPlainTrigger(settings);
    plugin = new FailPlugin({ coreDumpWaitMs: 0, cwd: () => path.join(tempDir, "cwd") });
    vi.spyOn(logger, "info").mockImplementation(() => {});
    vi.spyOn(logger, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  async function check(error: Classification): Promise<number> {
    return plugin.checkTriggerSuccess({ trigger, mainPlugin: plugin, settings, error });
  }

  function writeCore(file: string): void {
    mkdirSync(path.dirname(file), { recursive: true });
    writeFileSync(file, "core");
  }

  it("lists where else a core dump may land", () => {
    const install = path.join(tempDir, "install", "prog");

    expect(coreDumpCandidates(trigger.program, "/work")).toEqual([
      path.join(install, "core"),
      "/work/core",
      path.join(install, "var", "core"),
      trigger.program.corePath().replace(/-core$/, ""),
    ]);
  });

  it("clears the previous core dump before the run", async () => {
    const corePath = trigger.program.corePath();
    writeCore(corePath);

    await plugin.preTriggerRun({ trigger, mainPlugin: plugin, settings });

    expect(existsSync(corePath)).toBe(false);
    expect(existsSync(path.join(tempDir, "cores"))).toBe(true);
  });

  it("succeeds when the bug fired and left a core dump", async () => {
    writeCore(trigger.program.corePath());

    await expect(check(1)).resolves.toBe(0);
  });

  it("collects a core dump left in the install directory", async () => {
    writeCore(path.join(tempDir, "install", "prog", "core"));

    await expect(check(1)).resolves.toBe(0);
    expect(existsSync(trigger.program.corePath())).toBe(true);
  });

  it("fails without a core dump", async () => {
    await expect(check(1)).resolves.toBe(PLUGIN_ERROR);
    expect(logger.error).toHaveBeenCalledWith("Could not generate coredump for prog-1");
  });

  it("fails when the program did not crash as expected", async () => {
    writeCore(trigger.program.corePath());

    await expect(check(0)).resolves.toBe(PLUGIN_ERROR);
    await expect(check(null)).resolves.toBe(PLUGIN_ERROR);
  });

  it("saves the core dump with the results", async () => {
    const corePath = trigger.program.corePath();
    writeCore(corePath);

    await plugin.postTriggerClean({ trigger, mainPlugin: plugin, settings });

    const saved = path.join(tempDir, "results", "prog-1", path.basename(corePath));
    expect(readFileSync(saved, "utf-8")).toBe("core");
    expect(existsSync(corePath)).toBe(false);
  });
});
