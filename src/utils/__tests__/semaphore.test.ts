import { describe, it, expect } from "vitest";
import { Semaphore } from "../semaphore.js";

const tick = () => new Promise((resolve) => setTimeout(resolve, 1));

describe("Semaphore", () => {
  it("rejects a non-positive limit", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow(RangeError);
  });

  it("never admits more than the limit", async () => {
    const gate = new Semaphore(2);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 8 }, () =>
        gate.use(async () => {
          active++;
          peak = Math.max(peak, active);
          await tick();
          active--;
        })
      )
    );

    expect(peak).toBe(2);
    expect(gate.maxInUse).toBe(2);
    expect(gate.inUse).toBe(0);
  });

  it("admits waiters in FIFO order", async () => {
    const gate = new Semaphore(1);
    const order: number[] = [];

    await gate.acquire();
    const waiters = [1, 2, 3].map((n) => gate.acquire().then(() => order.push(n)));
    expect(gate.pending).toBe(3);

    for (let i = 0; i < 3; i++) {
      gate.release();
      await tick();
    }
    gate.release();
    await Promise.all(waiters);

    expect(order).toEqual([1, 2, 3]);
    expect(gate.inUse).toBe(0);
  });

  it("releases the slot when the task throws", async () => {
    const gate = new Semaphore(1);
    await expect(gate.use(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(gate.inUse).toBe(0);
  });

  it("throws on an unmatched release", () => {
    expect(() => new Semaphore(1).release()).toThrow("released more times than acquired");
  });
});
