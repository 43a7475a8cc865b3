import { describe, expect, it } from "vitest";

import { KeyedMutex, waitFor } from "../../../src/utils/concurrency.js";

describe("waitFor", () => {
  it("reports a promise settled in time", async () => {
    await expect(waitFor(Promise.resolve("done"), 1000)).resolves.toBe(true);
  });

  it("gives up after the timeout", async () => {
    const never = new Promise(() => {});

    await expect(waitFor(never, 10)).resolves.toBe(false);
  });

  it("waits forever without a timeout", async () => {
    const later = new Promise((resolve) => setTimeout(resolve, 5));

    await expect(waitFor(later)).resolves.toBe(true);
  });
});

describe("KeyedMutex", () => {
  it("serializes holders of the same key", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const hold = async (name: string): Promise<void> =>
      mutex.runExclusive("bug", async () => {
        events.push(`${name} in`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        events.push(`${name} out`);
      });

    await Promise.all([hold("first"), hold("second")]);

    expect(events).toEqual(["first in", "first out", "second in", "second out"]);
  });

  it("lets different keys run together", async () => {
    const mutex = new KeyedMutex();
    let release: () => void = () => {};
    let entered: () => void = () => {};
    const inside = new Promise<void>((resolve) => {
      entered = resolve;
    });
    const blocker = mutex.runExclusive(
      "a",
      async () =>
        new Promise<void>((resolve) => {
          release = resolve;
          entered();
        }),
    );
    await inside;

    await expect(mutex.runExclusive("b", async () => "ran")).resolves.toBe("ran");
    expect(mutex.isLocked("a")).toBe(true);
    expect(mutex.isLocked("b")).toBe(false);

    release();
    await blocker;
    expect(mutex.isLocked("a")).toBe(false);
  });
});
