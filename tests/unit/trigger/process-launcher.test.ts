import { execa } from "execa";
import { beforeEach, describe, expect, it, type Mock, vi } from "vitest";

import { ProcessLaunchError } from "../../../src/errors.js";
import {
  buildScript,
  ExecaLauncher,
  isSignalName,
  killProcessGroup,
  shellQuote,
  signalNumber,
  toLaunchResult,
  toScript,
} from "../../../src/trigger/process-launcher.js";

vi.mock("execa", () => ({ execa: vi.fn() }));

type ExecaCall = (file: string, args: string[], options: Record<string, unknown>) => unknown;

const execaMock = vi.mocked(execa) as unknown as Mock<ExecaCall>;

function settled(outcome: Record<string, unknown>): Promise<unknown> {
  return Promise.resolve({ timedOut: false, failed: false, all: "", ...outcome });
}

describe("shellQuote", () => {
  it("leaves plain arguments alone", () => {
    expect(shellQuote("/opt/bin/ab")).toBe("/opt/bin/ab");
  });

  it("quotes arguments with shell characters", () => {
    expect(shellQuote("http://127.0.0.1/?a=1")).toBe("'http://127.0.0.1/?a=1'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});

describe("buildScript", () => {
  it("keeps string commands verbatim", () => {
    expect(toScript("curl {}{")).toBe("curl {}{");
  });

  it("joins argument vectors", () => {
    expect(toScript(["ab", "-n", "5", "http://h/?x"])).toBe("ab -n 5 'http://h/?x'");
  });

  it("lifts the core size limit", () => {
    expect(buildScript("prog", true)).toBe("ulimit -c unlimited 2>/dev/null; prog");
  });

  it("replaces the shell for background processes", () => {
    expect(buildScript("httpd -k start", true, true)).toBe(
      "ulimit -c unlimited 2>/dev/null; exec httpd -k start",
    );
  });
});

describe("killProcessGroup", () => {
  it("signals the negated pid", () => {
    const kill = vi.spyOn(process, "kill").mockImplementation(() => true);

    killProcessGroup(4321, "SIGKILL");

    expect(kill).toHaveBeenCalledWith(-4321, "SIGKILL");
  });

  it("ignores a group that already exited", () => {
    vi.spyOn(process, "kill").mockImplementation(() => {
      throw new Error("kill ESRCH");
    });

    expect(() => killProcessGroup(4321, "SIGKILL")).not.toThrow();
  });

  it("does nothing without a pid", () => {
    const kill = vi.spyOn(process, "kill").mockImplementation(() => true);

    killProcessGroup(undefined, "SIGKILL");

    expect(kill).not.toHaveBeenCalled();
  });
});

describe("signals", () => {
  it("knows signal numbers", () => {
    expect(signalNumber("SIGSEGV")).toBe(11);
    expect(signalNumber("SIGNOPE")).toBeUndefined();
  });

  it("recognises signal names", () => {
    expect(isSignalName("SIGKILL")).toBe(true);
    expect(isSignalName("KILL")).toBe(false);
    expect(isSignalName(undefined)).toBe(false);
  });
});

describe("toLaunchResult", () => {
  it("maps a signal to 128 plus its number", () => {
    expect(
      toLaunchResult("prog", { signal: "SIGSEGV", timedOut: false, failed: true, all: "boom" }),
    ).toEqual({ exitCode: 139, output: "boom", signal: "SIGSEGV", timedOut: false });
  });

  it("keeps a plain exit code", () => {
    expect(toLaunchResult("prog", { exitCode: 3, timedOut: false, failed: true })).toEqual({
      exitCode: 3,
      output: "",
      signal: null,
      timedOut: false,
    });
  });

  it("throws when the process never started", () => {
    expect(() =>
      toLaunchResult("missing-binary", {
        timedOut: false,
        failed: true,
        message: "spawn ENOENT",
      }),
    ).toThrow(ProcessLaunchError);
  });
});

describe("ExecaLauncher", () => {
  beforeEach(() => {
    execaMock.mockImplementation(() => settled({ exitCode: 0 }));
  });

  describe("run", () => {
    it("runs through the shell without rejecting", async () => {
      const launcher = new ExecaLauncher();

      const result = await launcher.run("prog --flag", { cwd: "/tmp", liftCoreLimit: true });

      expect(result.exitCode).toBe(0);
      expect(execaMock).toHaveBeenCalledWith(
        "/bin/sh",
        ["-c", "ulimit -c unlimited 2>/dev/null; prog --flag"],
        expect.objectContaining({ cwd: "/tmp", reject: false, all: true, killSignal: "SIGTERM" }),
      );
    });

    it("runs a timed command in its own process group", async () => {
      execaMock.mockImplementation(() => settled({ exitCode: 0 }));

      await new ExecaLauncher().run("sqlite", { timeoutMs: 500, killSignal: "SIGSEGV" });

      expect(execaMock).toHaveBeenCalledWith(
        "/bin/sh",
        ["-c", "sqlite"],
        expect.objectContaining({ detached: true, killSignal: "SIGSEGV" }),
      );
      expect(execaMock.mock.calls[0]?.[2]).not.toHaveProperty("timeout");
    });

    it("sends the kill signal to the whole group on timeout", async () => {
      vi.useFakeTimers();
      try {
        let exit: (outcome: unknown) => void = () => {};
        execaMock.mockImplementation(() =>
          Object.assign(
            new Promise((resolve) => {
              exit = resolve;
            }),
            { pid: 90 },
          ),
        );
        const kill = vi.spyOn(process, "kill").mockImplementation(() => {
          exit({ signal: "SIGSEGV", timedOut: false, failed: true, all: "" });
          return true;
        });

        const pending = new ExecaLauncher().run("sqlite3 test.db", {
          liftCoreLimit: true,
          timeoutMs: 500,
          killSignal: "SIGSEGV",
        });
        await vi.advanceTimersByTimeAsync(499);
        expect(kill).not.toHaveBeenCalled();
        await vi.advanceTimersByTimeAsync(1);

        await expect(pending).resolves.toEqual({
          exitCode: 139,
          output: "",
          signal: "SIGSEGV",
          timedOut: true,
        });
        expect(kill).toHaveBeenCalledWith(-90, "SIGSEGV");
      } finally {
        vi.useRealTimers();
      }
    });

    it("does not signal a group that finished in time", async () => {
      vi.useFakeTimers();
      try {
        execaMock.mockImplementation(() =>
          Object.assign(settled({ exitCode: 0 }), { pid: 91 }),
        );
        const kill = vi.spyOn(process, "kill").mockImplementation(() => true);

        await new ExecaLauncher().run("prog", { timeoutMs: 500 });
        await vi.advanceTimersByTimeAsync(1000);

        expect(kill).not.toHaveBeenCalled();
      } finally {
        vi.useRealTimers();
      }
    });

    it("runs untimed commands in the harness's group", async () => {
      await new ExecaLauncher().run("mkdir -p a && tar -xf b.tar");

      expect(execaMock).toHaveBeenCalledWith(
        "/bin/sh",
        ["-c", "mkdir -p a && tar -xf b.tar"],
        expect.objectContaining({ detached: false }),
      );
    });

    it("returns non-zero exits instead of throwing", async () => {
      execaMock.mockImplementation(() => settled({ exitCode: 134, failed: true }));

      await expect(new ExecaLauncher().run("transmissioncli")).resolves.toMatchObject({
        exitCode: 134,
      });
    });
  });

  describe("spawn", () => {
    it("execs the command and reports when it exits", async () => {
      const launcher = new ExecaLauncher();
      execaMock.mockImplementation(() =>
        Object.assign(settled({ exitCode: 0 }), { pid: 77, kill: vi.fn() }),
      );

      const server = launcher.spawn("memcached -t 2");
      const result = await server.wait();

      expect(execaMock).toHaveBeenCalledWith(
        "/bin/sh",
        ["-c", "exec memcached -t 2"],
        expect.any(Object),
      );
      expect(server.pid).toBe(77);
      expect(result.exitCode).toBe(0);
      expect(server.isRunning()).toBe(false);
    });

    it("stops a running process with its kill signal", async () => {
      let exit: (outcome: unknown) => void = () => {};
      const kill = vi.fn(() => {
        exit({ signal: "SIGTERM", timedOut: false, failed: true, all: "" });
      });
      execaMock.mockImplementation(() =>
        Object.assign(
          new Promise((resolve) => {
            exit = resolve;
          }),
          { pid: 78, kill },
        ),
      );

      const server = new ExecaLauncher().spawn("httpd");
      expect(server.isRunning()).toBe(true);

      await server.stop(1000);

      expect(kill).toHaveBeenCalledTimes(1);
      expect(kill).toHaveBeenCalledWith("SIGTERM");
      expect(server.isRunning()).toBe(false);
    });

    it("kills a process that ignores its stop signal", async () => {
      let exit: (outcome: unknown) => void = () => {};
      const kill = vi.fn((signal: string) => {
        if (signal === "SIGKILL") {
          exit({ signal: "SIGKILL", timedOut: false, failed: true, all: "" });
        }
      });
      execaMock.mockImplementation(() =>
        Object.assign(
          new Promise((resolve) => {
            exit = resolve;
          }),
          { pid: 79, kill },
        ),
      );

      const server = new ExecaLauncher().spawn("stubborn");
      await server.stop(10);

      expect(kill.mock.calls).toEqual([["SIGTERM"], ["SIGKILL"]]);
    });
  });
});
