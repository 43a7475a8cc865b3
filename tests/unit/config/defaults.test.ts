/**
 * Unit tests for config/defaults.ts
 */

import { describe, expect, it } from "vitest";

import {
  createDefaultSettings,
  DEFAULT_BENCHMARK,
  DEFAULT_TRIGGER,
} from "../../../src/config/defaults.js";
import { validateSettings } from "../../../src/config/loader.js";

describe("createDefaultSettings", () => {
  it("holds the default of every section", () => {
    const settings = createDefaultSettings();

    expect(settings.trigger).toEqual(DEFAULT_TRIGGER);
    expect(settings.benchmark).toEqual(DEFAULT_BENCHMARK);
    expect(settings.plugins.enabled).toEqual(["base"]);
    expect(settings.helpers.isolation).toBe("process");
  });

  it("matches what validation fills in for an empty document", () => {
    expect(validateSettings({})).toEqual(createDefaultSettings());
  });

  it("returns independent copies", () => {
    const first = createDefaultSettings();
    first.trigger.show_progress = false;

    expect(createDefaultSettings().trigger.show_progress).toBe(true);
  });
});
