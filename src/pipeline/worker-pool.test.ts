import { describe, expect, it } from "vitest";

import { UserFacingError } from "../core/errors.js";

import { BoundedWorkerPool } from "./worker-pool.js";

type Deferred = { promise: Promise<void>; resolve: () => void };

function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("BoundedWorkerPool", () => {
  it("never runs more than maxConcurrency jobs at once", async () => {
    const pool = new BoundedWorkerPool(2);
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    const runs = gates.map((gate, index) =>
      pool.run(async () => {
        started.push(index);
        await gate.promise;
        return index;
      }),
    );

    await Promise.resolve();
    expect(started).toEqual([0, 1]);
    expect(pool.activeCount).toBe(2);
    expect(pool.pendingCount).toBe(1);

    gates[0].resolve();
    await runs[0];
    await Promise.resolve();
    expect(started).toEqual([0, 1, 2]);

    gates[1].resolve();
    gates[2].resolve();
    expect(await Promise.all(runs)).toEqual([0, 1, 2]);
    expect(pool.activeCount).toBe(0);
  });

  it("frees the slot when a job rejects", async () => {
    const pool = new BoundedWorkerPool(1);

    await expect(pool.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(pool.run(async () => "next")).resolves.toBe("next");
    expect(pool.activeCount).toBe(0);
  });

  it("rejects a non-positive size", () => {
    expect(() => new BoundedWorkerPool(0)).toThrow(UserFacingError);
    expect(() => new BoundedWorkerPool(1.5)).toThrow("max_parallel must be a positive integer");
  });
});
