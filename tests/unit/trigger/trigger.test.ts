import { describe, expect, it } from "vitest";

import { InvalidTriggerStateError, ResultAlreadyRecordedError } from "../../../src/errors.js";
import { exitCodeClassifier } from "../../../src/trigger/classifiers.js";
import { PlainLaunch } from "../../../src/trigger/launch/plain.js";
import { Trigger } from "../../../src/trigger/trigger.js";
import {
  createTestContext,
  createTestProgram,
  createTestSettings,
  FakeLauncher,
} from "../../mocks/harness.js";

const ROOT = "/srv/bugbase-test";

function createTrigger(launcher = new FakeLauncher()): Trigger {
  return new Trigger({
    bug: "prog-1",
    program: createTestProgram(ROOT),
    command: "prog --crash",
    strategy: new PlainLaunch(),
    classifier: exitCodeClassifier(139),
    context: createTestContext(createTestSettings(ROOT), launcher),
    templateValues: { port: 8080, data: "/srv/data" },
  });
}

describe("Trigger", () => {
  describe("command", () => {
    it("can be rewritten", () => {
      const trigger = createTrigger();

      trigger.command = `valgrind ${trigger.command}`;

      expect(trigger.command).toBe("valgrind prog --crash");
    });

    it("refuses an empty command", () => {
      const trigger = createTrigger();

      expect(() => {
        trigger.command = "  ";
      }).toThrow("Empty command for prog-1");
      expect(trigger.command).toBe("prog --crash");
    });
  });

  describe("state machine", () => {
    it("walks a client/server run", () => {
      const trigger = createTrigger();

      trigger.beginRun();
      trigger.transition("server-started");
      trigger.transition("workers-running");
      trigger.transition("stopped");
      trigger.transition("classified");

      expect(trigger.state).toBe("classified");
    });

    it("allows restarting a stopped server", () => {
      const trigger = createTrigger();
      trigger.beginRun();
      trigger.transition("server-started");
      trigger.transition("stopped");

      trigger.transition("server-started");

      expect(trigger.state).toBe("server-started");
    });

    it("refuses illegal moves", () => {
      const trigger = createTrigger();

      expect(() => trigger.transition("stopped")).toThrow(InvalidTriggerStateError);
      expect(() => trigger.transition("stopped")).toThrow(
        "Illegal trigger transition: idle -> stopped",
      );
      expect(trigger.state).toBe("idle");
    });

    it("settles from any running state", () => {
      const trigger = createTrigger();
      trigger.beginRun();

      trigger.settle();

      expect(trigger.state).toBe("classified");
    });

    it("starts every run from command-set", () => {
      const trigger = createTrigger();
      trigger.beginRun();
      trigger.settle();

      trigger.beginRun();

      expect(trigger.state).toBe("command-set");
    });
  });

  describe("recordResult", () => {
    it("keeps one result per run", () => {
      const trigger = createTrigger();
      trigger.beginRun();

      trigger.recordResult([1, 2]);

      expect(trigger.result).toEqual([1, 2]);
      expect(() => trigger.recordResult([3])).toThrow(ResultAlreadyRecordedError);
    });

    it("forgets the result when a new run begins", () => {
      const trigger = createTrigger();
      trigger.recordResult([1]);

      trigger.beginRun();

      expect(trigger.result).toBeNull();
      trigger.recordResult([2]);
      expect(trigger.result).toEqual([2]);
    });
  });

  describe("run", () => {
    it("runs the launch strategy and classifies", async () => {
      const launcher = new FakeLauncher();
      launcher.handler = () => ({ exitCode: 139 });
      const trigger = createTrigger(launcher);

      await expect(trigger.run()).resolves.toBe(1);
      expect(launcher.commands()).toEqual(["prog --crash"]);
      expect(trigger.state).toBe("classified");
    });

    it("uses a replacement runner until it is removed", async () => {
      const launcher = new FakeLauncher();
      const trigger = createTrigger(launcher);

      trigger.useRunner(async () => null);
      await expect(trigger.run()).resolves.toBeNull();
      expect(launcher.calls).toHaveLength(0);

      trigger.useRunner(null);
      await expect(trigger.run()).resolves.toBe(0);
      expect(launcher.calls).toHaveLength(1);
    });
  });

  describe("format", () => {
    it("fills the trigger's values and the executable", () => {
      const trigger = createTrigger();

      expect(trigger.format("{executable} -p {port} {data}/in.txt")).toBe(
        "/srv/bugbase-test/install/prog/bin/prog -p 8080 /srv/data/in.txt",
      );
    });

    it("follows executable switches", () => {
      const trigger = createTrigger();

      trigger.program.executable = "prog-fail";

      expect(trigger.format("{executable}")).toBe("/srv/bugbase-test/install/prog/bin/prog-fail");
    });

    it("lets extra values win", () => {
      const trigger = createTrigger();

      expect(trigger.format("{port}", { port: 9090 })).toBe("9090");
    });
  });
});
