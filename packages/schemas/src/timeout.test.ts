import { describe, it, expect } from "vitest";
import { TimeoutError, deadlinePassed, withTimeout } from "./timeout.js";

describe("withTimeout", () => {
  it("resolves when the promise settles first", async () => {
    await expect(withTimeout(Promise.resolve("moved"), 1000)).resolves.toBe("moved");
  });

  it("rejects with a TimeoutError carrying the label and limit", async () => {
    const stalled = new Promise<void>((resolve) => setTimeout(resolve, 5000));
    const err = await withTimeout(stalled, 20, "fight_goblin").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toMatchObject({ message: "fight_goblin timed out after 20ms", timeoutMs: 20 });
  });

  it("passes through the original rejection", async () => {
    await expect(withTimeout(Promise.reject(new Error("socket closed")), 1000)).rejects.toThrow("socket closed");
  });

  it("returns the promise untouched when no limit is set", async () => {
    const p = Promise.resolve(3);
    expect(withTimeout(p, undefined)).toBe(p);
    expect(withTimeout(p, 0)).toBe(p);
  });
});

describe("deadlinePassed", () => {
  it("is false without a timeout", () => {
    expect(deadlinePassed(0, undefined, 10_000_000)).toBe(false);
  });

  it("compares elapsed milliseconds against seconds", () => {
    expect(deadlinePassed(1000, 5, 5999)).toBe(false);
    expect(deadlinePassed(1000, 5, 6000)).toBe(true);
  });
});
