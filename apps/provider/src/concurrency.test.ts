import { describe, it, expect } from "vitest";
import { abortable, createLimiter } from "./concurrency.js";
import { gate } from "./fakeGitHub.js";

describe("createLimiter", () => {
  it("never runs more than the limit at once", async () => {
    const limit = createLimiter(2);
    let running = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, (_, i) =>
        limit(async () => {
          running++;
          peak = Math.max(peak, running);
          await new Promise((r) => setTimeout(r, 5));
          running--;
          return i;
        }),
      ),
    );

    expect(peak).toBe(2);
  });

  it("keeps FIFO order with a single slot", async () => {
    const limit = createLimiter(1);
    const order: number[] = [];
    await Promise.all([1, 2, 3].map((n) => limit(async () => order.push(n))));
    expect(order).toEqual([1, 2, 3]);
  });

  it("frees the slot when a task throws", async () => {
    const limit = createLimiter(1);
    await expect(limit(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(limit(async () => "next")).resolves.toBe("next");
  });

  it("rejects a non-positive limit", () => {
    expect(() => createLimiter(0)).toThrow(RangeError);
  });
});

describe("abortable", () => {
  it("passes the result through without a signal", async () => {
    await expect(abortable(Promise.resolve(7))).resolves.toBe(7);
  });

  it("rejects with the abort reason but leaves the work running", async () => {
    const g = gate();
    let finished = false;
    const work = g.opened.then(() => {
      finished = true;
      return "done";
    });
    const controller = new AbortController();

    const wait = abortable(work, controller.signal);
    controller.abort(new Error("caller gave up"));
    await expect(wait).rejects.toThrow("caller gave up");

    g.open();
    await expect(work).resolves.toBe("done");
    expect(finished).toBe(true);
  });

  it("rejects immediately for an already aborted signal", async () => {
    await expect(abortable(Promise.resolve(1), AbortSignal.abort(new Error("late")))).rejects.toThrow("late");
  });
});
