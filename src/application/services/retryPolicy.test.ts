import { describe, expect, it } from "vitest";
import { err, ok } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { SleeperPort } from "../../core/ports/outboundPorts";
import { withRetry, type RetryPolicy } from "./retryPolicy";

const failure: AppBoundaryError = {
  source: "provider",
  code: "provider_error",
  provider: "test-provider",
  message: "upstream unavailable",
};

const createSleeper = () => {
  const pauses: number[] = [];
  const sleeper: SleeperPort = {
    sleep: async (ms) => {
      pauses.push(ms);
    },
  };
  return { sleeper, pauses };
};

const policy: RetryPolicy = {
  mode: "supplementary",
  maxAttempts: 3,
  delayMs: 5_000,
};

describe("withRetry", () => {
  it("succeeds on the last allowed attempt after N-1 failures", async () => {
    const { sleeper, pauses } = createSleeper();
    let invocations = 0;

    const result = await withRetry(
      async () => {
        invocations += 1;
        return invocations < 3 ? err(failure) : ok("done");
      },
      policy,
      sleeper,
      { operation: "fetch" },
    );

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.lastError.message);
    }
    expect(result.value).toEqual({ value: "done", attempts: 3 });
    expect(invocations).toBe(3);
    expect(pauses).toEqual([5_000, 5_000]);
  });

  it("signals exhaustion after exactly N invocations of an always-failing operation", async () => {
    const { sleeper, pauses } = createSleeper();
    let invocations = 0;

    const result = await withRetry(
      async () => {
        invocations += 1;
        return err(failure);
      },
      { ...policy, mode: "foundational" },
      sleeper,
      { operation: "resolve" },
    );

    expect(invocations).toBe(3);
    expect(pauses).toEqual([5_000, 5_000]);
    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected exhaustion");
    }
    expect(result.error).toEqual({
      kind: "retry_exhausted",
      mode: "foundational",
      attempts: 3,
      lastError: failure,
    });
  });

  it("retries every failure kind, rejected credentials included", async () => {
    const { sleeper, pauses } = createSleeper();
    let invocations = 0;
    const rejectedKey: AppBoundaryError = {
      source: "provider",
      code: "auth_invalid",
      provider: "alphavantage",
      message: "Alpha Vantage auth failed with status 403.",
      httpStatus: 403,
    };

    const result = await withRetry(
      async () => {
        invocations += 1;
        return err(rejectedKey);
      },
      policy,
      sleeper,
      { operation: "fetch" },
    );

    expect(invocations).toBe(3);
    expect(pauses).toEqual([5_000, 5_000]);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.lastError).toBe(rejectedKey);
    }
  });

  it("counts thrown exceptions as failed attempts", async () => {
    const { sleeper } = createSleeper();
    const failedAttempts: number[] = [];
    let invocations = 0;

    const result = await withRetry(
      async () => {
        invocations += 1;
        if (invocations === 1) {
          throw new Error("socket reset");
        }
        return ok(42);
      },
      policy,
      sleeper,
      {
        operation: "fetch",
        onAttemptFailed: (error, attempt) => {
          failedAttempts.push(attempt);
          expect(error.code).toBe("unexpected");
          expect(error.message).toBe("socket reset");
        },
      },
    );

    expect(result.isOk()).toBe(true);
    expect(failedAttempts).toEqual([1]);
  });

  it("does not pause when the first attempt succeeds", async () => {
    const { sleeper, pauses } = createSleeper();

    const result = await withRetry(async () => ok("first"), policy, sleeper, {
      operation: "fetch",
    });

    expect(result.isOk()).toBe(true);
    expect(pauses).toEqual([]);
  });

  it("still attempts once when the policy allows fewer than one attempt", async () => {
    const { sleeper } = createSleeper();
    let invocations = 0;

    const result = await withRetry(
      async () => {
        invocations += 1;
        return err(failure);
      },
      { ...policy, maxAttempts: 0 },
      sleeper,
      { operation: "fetch" },
    );

    expect(invocations).toBe(1);
    expect(result.isErr()).toBe(true);
  });
});
