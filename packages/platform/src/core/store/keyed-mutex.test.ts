/**
 * Keyed Mutex — Test Suite
 *
 *   - work for one key runs strictly one at a time, in arrival order
 *   - different keys run concurrently
 *   - a failing holder releases the key for the next waiter
 *   - keys are forgotten once nobody holds or awaits them
 *   - acquire() hands out a release function usable outside a callback
 */

import { describe, it, expect } from "vitest";
import { KeyedMutex } from "./keyed-mutex.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs work for the same key one at a time, in order", async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive("item-1", async () => {
      log.push("first:start");
      await gate.promise;
      log.push("first:end");
    });
    const second = mutex.runExclusive("item-1", async () => {
      log.push("second:start");
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(log).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);

    expect(log).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("does not block work for other keys", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const log: string[] = [];

    const held = mutex.runExclusive("item-1", async () => {
      await gate.promise;
      log.push("item-1");
    });
    await mutex.runExclusive("item-2", async () => {
      log.push("item-2");
    });

    expect(log).toEqual(["item-2"]);
    gate.resolve();
    await held;
    expect(log).toEqual(["item-2", "item-1"]);
  });

  it("releases the key when the holder throws", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive("item-1", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    const value = await mutex.runExclusive("item-1", async () => 42);
    expect(value).toBe(42);
  });

  it("forgets idle keys", async () => {
    const mutex = new KeyedMutex();

    await mutex.runExclusive("item-1", async () => undefined);

    expect(mutex.size).toBe(0);
  });

  it("holds an acquired key until released, and ignores a second release", async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];

    const release = await mutex.acquire("workflow-1");
    const waiter = mutex.runExclusive("workflow-1", async () => {
      log.push("waiter");
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(log).toEqual([]);

    release();
    release();
    await waiter;

    expect(log).toEqual(["waiter"]);
    expect(mutex.size).toBe(0);
  });
});
