import { describe, expect, it } from "vitest";
import { retryBudgetMs } from "./retry";

describe("retryBudgetMs", () => {
  it("is a single attempt when retries are off", () => {
    expect(retryBudgetMs({ attemptTimeoutMs: 30_000, retries: 0 })).toBe(30_000);
  });

  it("adds the doubling backoff between attempts", () => {
    // 3 attempts, then 500 + 1000 ms of backoff
    expect(retryBudgetMs({ attemptTimeoutMs: 30_000 })).toBe(91_500);
  });

  it("caps each backoff delay at the maximum", () => {
    // 500 + 1000 + 2000 + 4000 + 5000 (capped from 8000)
    expect(retryBudgetMs({ attemptTimeoutMs: 30_000, retries: 5 })).toBe(192_500);
  });
});
