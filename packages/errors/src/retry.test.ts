import { describe, it, expect, vi } from "vitest";
import { withRetry, calculateDelay } from "./retry.js";
import { PermanentError, TransientError, AuthExpiredError, ValidationError } from "./errors.js";

const noSleep = () => Promise.resolve();

describe("withRetry", () => {
  it("returns result on success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");

    const result = await withRetry(fn);

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledOnce();
    expect(fn).toHaveBeenCalledWith(1);
  });

  it("retries transient failures and returns on eventual success", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new TransientError("blip")).mockResolvedValue("ok");

    const result = await withRetry(fn, { sleep: noSleep });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenLastCalledWith(2);
  });

  it("throws after maxAttempts exhausted", async () => {
    const fn = vi.fn().mockRejectedValue(new TransientError("persistent"));

    await expect(withRetry(fn, { maxAttempts: 3, sleep: noSleep })).rejects.toThrow("persistent");

    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does NOT retry permanent errors", async () => {
    const fn = vi.fn().mockRejectedValue(new PermanentError("quota exceeded"));

    await expect(withRetry(fn, { maxAttempts: 5, sleep: noSleep })).rejects.toThrow(
      "quota exceeded",
    );

    expect(fn).toHaveBeenCalledOnce();
  });

  it("does NOT retry auth failures", async () => {
    const fn = vi.fn().mockRejectedValue(new AuthExpiredError("token revoked"));

    await expect(withRetry(fn, { maxAttempts: 5, sleep: noSleep })).rejects.toThrow(
      "token revoked",
    );

    expect(fn).toHaveBeenCalledOnce();
  });

  it("does NOT retry validation errors", async () => {
    const fn = vi.fn().mockRejectedValue(new ValidationError("bad input"));

    await expect(withRetry(fn, { maxAttempts: 5, sleep: noSleep })).rejects.toThrow("bad input");

    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries socket-level errors", async () => {
    const refused = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
    const fn = vi.fn().mockRejectedValueOnce(refused).mockResolvedValue("ok");

    const result = await withRetry(fn, { sleep: noSleep });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does NOT retry unclassified programmer errors", async () => {
    const fn = vi.fn().mockRejectedValue(new RangeError("index out of bounds"));

    await expect(withRetry(fn, { maxAttempts: 3, sleep: noSleep })).rejects.toThrow(RangeError);

    expect(fn).toHaveBeenCalledOnce();
  });

  it("reports each retry with its delay", async () => {
    const onRetry = vi.fn();
    const sleep = vi.fn().mockResolvedValue(undefined);
    vi.spyOn(Math, "random").mockReturnValue(1);
    const fn = vi.fn().mockRejectedValue(new TransientError("down"));

    await expect(
      withRetry(fn, { maxAttempts: 3, baseDelayMs: 100, factor: 2, maxDelayMs: 1_000, onRetry, sleep }),
    ).rejects.toThrow("down");

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });
});

describe("calculateDelay", () => {
  const policy = { maxAttempts: 10, baseDelayMs: 1_000, factor: 2, maxDelayMs: 5_000 };

  it("grows exponentially and caps at maxDelayMs", () => {
    vi.spyOn(Math, "random").mockReturnValue(1);

    expect(calculateDelay(1, policy)).toBe(1_000);
    expect(calculateDelay(2, policy)).toBe(2_000);
    expect(calculateDelay(3, policy)).toBe(4_000);
    expect(calculateDelay(4, policy)).toBe(5_000);
    expect(calculateDelay(9, policy)).toBe(5_000);
  });

  it("applies jitter of at least half the delay", () => {
    vi.spyOn(Math, "random").mockReturnValue(0);

    expect(calculateDelay(2, policy)).toBe(1_000);
  });
});
