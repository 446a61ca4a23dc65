import { describe, it, expect } from "vitest";
import { pendingVersionLocks, withVersionLock } from "./versionLock";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("withVersionLock", () => {
  it("runs operations on the same version one after another", async () => {
    const order: string[] = [];
    const gate = deferred();
    const first = withVersionLock("1.2.1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
      return 1;
    });
    const second = withVersionLock("1.2.1", async () => {
      order.push("second");
      return 2;
    });
    await Promise.resolve();
    await Promise.resolve();
    expect(order).toEqual(["first:start"]);
    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not make different versions wait on each other", async () => {
    const gate = deferred();
    const blocked = withVersionLock("1.2.1", () => gate.promise);
    const other = await withVersionLock("1.2.2", async () => "done");
    expect(other).toBe("done");
    gate.resolve();
    await blocked;
  });

  it("keeps the queue going after a failure and releases the lock", async () => {
    const failing = withVersionLock("1.2.3", async () => {
      throw new Error("boom");
    });
    const next = withVersionLock("1.2.3", async () => "ok");
    await expect(failing).rejects.toThrow("boom");
    expect(await next).toBe("ok");
    expect(pendingVersionLocks()).toBe(0);
  });
});
