import { describe, expect, it } from "vitest";
import { backoffDelayMs, isExhausted, type RetryPolicy } from "../../src/application/retryPolicy";

const policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 10_000, jitterMs: 500 };

describe("retry policy", () => {
  it("doubles the delay per attempt", () => {
    const noJitter = () => 0;
    expect(backoffDelayMs(1, policy, noJitter)).toBe(1000);
    expect(backoffDelayMs(2, policy, noJitter)).toBe(2000);
    expect(backoffDelayMs(3, policy, noJitter)).toBe(4000);
  });

  it("caps the delay before adding jitter", () => {
    expect(backoffDelayMs(10, policy, () => 0)).toBe(10_000);
    expect(backoffDelayMs(10, policy, () => 0.5)).toBe(10_250);
  });

  it("skips the random source when jitter is off", () => {
    const random = () => {
      throw new Error("should not be called");
    };
    expect(backoffDelayMs(2, { ...policy, jitterMs: 0 }, random)).toBe(2000);
  });

  it("is exhausted once the attempt reaches maxAttempts", () => {
    expect(isExhausted(2, policy)).toBe(false);
    expect(isExhausted(3, policy)).toBe(true);
  });
});
