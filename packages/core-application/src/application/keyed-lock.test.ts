import { describe, expect, it } from "vitest";
import { KeyedLock } from "./keyed-lock";
import { runWithConcurrencyLimit } from "./concurrency";

function tick() {
  return new Promise<void>((resolve) => setTimeout(resolve, 5));
}

describe("KeyedLock", () => {
  it("runs work on the same key one at a time, in order", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const job = (name: string) =>
      lock.run("dir", async () => {
        events.push(`${name}:start`);
        await tick();
        events.push(`${name}:end`);
        return name;
      });

    await expect(Promise.all([job("a"), job("b")])).resolves.toEqual(["a", "b"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("lets different keys run concurrently", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all(
      ["x", "y"].map((key) =>
        lock.run(key, async () => {
          events.push(`${key}:start`);
          await tick();
          events.push(`${key}:end`);
        })
      )
    );
    expect(events.slice(0, 2)).toEqual(["x:start", "y:start"]);
  });

  it("releases the key when work throws", async () => {
    const lock = new KeyedLock();
    await expect(lock.run("k", async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(lock.run("k", async () => 1)).resolves.toBe(1);
  });
});

describe("runWithConcurrencyLimit", () => {
  it("never runs more than the limit at once", async () => {
    let running = 0;
    let peak = 0;
    const seen: number[] = [];

    await runWithConcurrencyLimit([1, 2, 3, 4, 5], 2, async (item) => {
      running++;
      peak = Math.max(peak, running);
      await tick();
      seen.push(item);
      running--;
    });

    expect(peak).toBe(2);
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
  });
});
