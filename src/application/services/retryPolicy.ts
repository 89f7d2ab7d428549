import { err, ok, type Result } from "neverthrow";
import {
  toUnexpectedError,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type { SleeperPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";

/**
 * Foundational exhaustion aborts the enclosing unit of work; supplementary exhaustion only degrades it.
 */
export type RetryMode = "foundational" | "supplementary";

export type RetryPolicy = {
  mode: RetryMode;
  maxAttempts: number;
  delayMs: number;
};

export type RetrySuccess<T> = {
  value: T;
  attempts: number;
};

export type RetryExhausted = {
  kind: "retry_exhausted";
  mode: RetryMode;
  attempts: number;
  lastError: AppBoundaryError;
};

export type RetryContext = {
  operation: string;
  ticker?: string;
  onAttemptFailed?: (error: AppBoundaryError, attempt: number) => void;
};

/**
 * Runs an operation with a constant pause between attempts. Thrown exceptions count as failed attempts.
 */
export const withRetry = async <T>(
  operation: (attempt: number) => Promise<Result<T, AppBoundaryError>>,
  policy: RetryPolicy,
  sleeper: SleeperPort,
  context: RetryContext,
): Promise<Result<RetrySuccess<T>, RetryExhausted>> => {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastError: AppBoundaryError = {
    source: "ingestion",
    code: "unexpected",
    provider: context.operation,
    message: "Operation was never attempted.",
  };

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    let result: Result<T, AppBoundaryError>;
    try {
      result = await operation(attempt);
    } catch (error) {
      result = err(toUnexpectedError("ingestion", context.operation, error));
    }

    if (result.isOk()) {
      return ok({ value: result.value, attempts: attempt });
    }

    lastError = result.error;
    context.onAttemptFailed?.(lastError, attempt);
    logger.warn(
      {
        operation: context.operation,
        ticker: context.ticker,
        mode: policy.mode,
        attempt,
        maxAttempts,
        code: lastError.code,
        reason: lastError.message,
      },
      "Attempt failed",
    );

    if (attempt < maxAttempts) {
      await sleeper.sleep(policy.delayMs);
    }
  }

  return err({
    kind: "retry_exhausted",
    mode: policy.mode,
    attempts: maxAttempts,
    lastError,
  });
};
