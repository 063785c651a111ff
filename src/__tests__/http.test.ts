import { describe, it, expect, vi } from "vitest";
import { computeBackoffMs, parseRetryAfterMs, sleep, snippet } from "../net/http";

describe("parseRetryAfterMs", () => {
  it("reads delay seconds", () => {
    expect(parseRetryAfterMs("2")).toBe(2000);
    expect(parseRetryAfterMs("0.5")).toBe(500);
  });

  it("reads an HTTP date relative to now", () => {
    const now = Date.parse("2024-05-01T12:00:00Z");
    expect(parseRetryAfterMs("Wed, 01 May 2024 12:00:30 GMT", now)).toBe(30_000);
  });

  it("returns null for missing or unreadable values", () => {
    expect(parseRetryAfterMs(null)).toBeNull();
    expect(parseRetryAfterMs("soon")).toBeNull();
  });
});

describe("computeBackoffMs", () => {
  it("doubles per attempt and honours Retry-After", () => {
    const noJitter = () => 0;
    expect(computeBackoffMs(0, null, 600, noJitter)).toBe(600);
    expect(computeBackoffMs(2, null, 600, noJitter)).toBe(2400);
    expect(computeBackoffMs(0, 5000, 600, noJitter)).toBe(5000);
    expect(computeBackoffMs(0, null, 600, () => 1)).toBe(780);
  });
});

describe("sleep", () => {
  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    const done = vi.fn();
    const pending = sleep(100).then(done);
    await vi.advanceTimersByTimeAsync(99);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
    vi.useRealTimers();
  });

  it("rejects when aborted", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(1000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ name: "AbortError" });
    vi.useRealTimers();
  });
});

describe("snippet", () => {
  it("collapses whitespace and truncates", () => {
    expect(snippet("  runtime\n error:   timeout  ")).toBe("runtime error: timeout");
    expect(snippet("abcdef", 3)).toBe("abc…");
  });
});
