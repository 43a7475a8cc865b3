import { describe, expect, it, vi } from "vitest";

import { ClientServerBenchmark } from "../../../../src/trigger/benchmark/client-server.js";
import { counterClassifier } from "../../../../src/trigger/classifiers.js";
import { registerHelperAction } from "../../../../src/trigger/helpers/actions.js";
import { ClientServerLaunch } from "../../../../src/trigger/launch/client-server.js";
import { Trigger } from "../../../../src/trigger/trigger.js";
import { logger } from "../../../../src/utils/logging.js";
import {
  createTestContext,
  createTestProgram,
  createTestSettings,
  FakeLauncher,
} from "../../../mocks/harness.js";

const ROOT = "/srv/bugbase-test";

// Reports what two workers sharing a counter would see at the end.
registerHelperAction({
  name: "test-full-count",
  run: async (spec) => Number(spec.params["iterations"]) * 2,
});
registerHelperAction({ name: "test-lost-key", run: async () => null });

function createTrigger(launcher: FakeLauncher, action: string): Trigger {
  return new Trigger({
    bug: "prog-2",
    program: createTestProgram(ROOT),
    command: "prog -p 11211",
    strategy: new ClientServerLaunch({
      delayMs: 0,
      stopGraceMs: 10,
      helper: { action, commands: ["counter", "counter"], iterations: 10, params: {} },
    }),
    classifier: counterClassifier(),
    context: createTestContext(createTestSettings(ROOT), launcher),
  });
}

function createBenchmark(trigger: Trigger, maximumTries = 3): ClientServerBenchmark {
  if (!(trigger.strategy instanceof ClientServerLaunch)) {
    throw new Error("client/server trigger expected");
  }
  return new ClientServerBenchmark(
    trigger,
    { expectedResults: 2, maximumTries, keptRuns: 1, apacheRequests: 1, showProgress: false },
    trigger.strategy,
  );
}

describe("ClientServerBenchmark", () => {
  it("times the helpers against a fresh server per sample", async () => {
    const launcher = new FakeLauncher();
    const trigger = createTrigger(launcher, "test-full-count");
    const benchmark = createBenchmark(trigger);

    await expect(benchmark.run()).resolves.toBe(0);

    expect(benchmark.accepted).toEqual([1, 1]);
    expect(trigger.result).toEqual([1]);
    expect(launcher.calls.filter((call) => call.mode === "spawn")).toHaveLength(2);
    expect(launcher.servers.every((server) => server.stopped)).toBe(true);
    expect(trigger.state).toBe("classified");
  });

  it("discards samples where the bug showed up", async () => {
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => {});
    vi.spyOn(logger, "error").mockImplementation(() => {});
    const launcher = new FakeLauncher();
    const trigger = createTrigger(launcher, "test-lost-key");
    const benchmark = createBenchmark(trigger);

    await expect(benchmark.run()).resolves.toBe(1);

    expect(benchmark.attempts).toBe(3);
    expect(warn).toHaveBeenCalledWith("Trigger did not work, retrying");
    expect(launcher.servers).toHaveLength(3);
  });
});
