import { describe, it, expect, vi } from "vitest";
import { createCoalescedTask } from "../coalesce";

function deferred() {
  let resolve = () => {};
  const promise = new Promise<void>((done) => {
    resolve = () => done();
  });
  return { promise, resolve };
}

describe("createCoalescedTask", () => {
  it("runs one more pass for requests made while a pass is running", async () => {
    const gates = [deferred(), deferred()];
    const seen: string[] = [];
    let caption = "Hell";
    let call = 0;
    const task = vi.fn(async () => {
      const gate = gates[call];
      call += 1;
      seen.push(caption);
      await gate.promise;
    });
    const request = createCoalescedTask(task);

    const pass = request();
    caption = "Hello";
    expect(request()).toBeNull();
    expect(request()).toBeNull();
    gates[0].resolve();
    gates[1].resolve();
    await pass;

    expect(task).toHaveBeenCalledTimes(2);
    expect(seen).toEqual(["Hell", "Hello"]);
  });

  it("starts a fresh pass once the previous one settled", async () => {
    const task = vi.fn(async () => {});
    const request = createCoalescedTask(task);

    await request();
    await request();

    expect(task).toHaveBeenCalledTimes(2);
  });

  it("reports a failure to the caller that started the pass", async () => {
    const task = vi.fn(async (): Promise<void> => {
      throw new Error("canvas lost");
    });
    const request = createCoalescedTask(task);

    await expect(request()).rejects.toThrow("canvas lost");
    task.mockResolvedValueOnce(undefined);
    await expect(request()).resolves.toBeUndefined();
  });
});
