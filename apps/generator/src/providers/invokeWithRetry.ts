import { setTimeout as delay } from "node:timers/promises";
import type { RetryPolicy } from "../config";
import {
  CancelledError,
  DeadlineExceededError,
  RateLimitError,
  RetriesExhaustedError,
  TimeoutError,
  UnknownProviderError,
  UpstreamError,
} from "../errors";
import type { Logger } from "../logger";
import type { PromptPayload } from "../prompt/buildPrompt";
import type { LLMGateway, RawModelResponse } from "./llmGateway";
import type { ProviderBudget } from "./providerBudget";

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type InvokeContext = {
  retry: RetryPolicy;
  attemptTimeoutMs: number;
  /** Aborts when the run's overall deadline elapses. */
  deadlineSignal: AbortSignal;
  /** Caller cancellation. */
  signal?: AbortSignal;
  budget?: ProviderBudget;
  logger?: Logger;
  sleep?: Sleep;
  random?: () => number;
  /** Called as each provider call starts, with its 1-based number. */
  onAttempt?: (attempt: number) => void;
};

export type InvokeResult = {
  response: RawModelResponse;
  attempts: number;
};

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Delay before retry number `attempt` (1-based): base * 2^(attempt-1), capped at
 * maxDelayMs, scaled by a factor in [1 - jitter, 1 + jitter]. A rate limit's
 * retry-after, when given, is a floor.
 */
export function backoffDelay(
  policy: RetryPolicy,
  attempt: number,
  error: UpstreamError,
  random: () => number = Math.random
): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const jittered = exponential * (1 - policy.jitter + 2 * policy.jitter * random());
  const floor = error instanceof RateLimitError ? (error.retryAfterMs ?? 0) : 0;
  return Math.round(Math.max(jittered, floor));
}

function stoppedError(ctx: InvokeContext, attempts: number, cause?: unknown): Error | null {
  if (ctx.signal?.aborted) {
    return new CancelledError();
  }
  if (ctx.deadlineSignal.aborted) {
    return new DeadlineExceededError(attempts, { cause });
  }
  return null;
}

function toUpstreamError(err: unknown, attemptTimedOut: boolean, timeoutMs: number): UpstreamError {
  if (attemptTimedOut) {
    return new TimeoutError(timeoutMs);
  }
  if (err instanceof UpstreamError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new UnknownProviderError(`Provider call failed unexpectedly: ${message}`, { cause: err });
}

async function sleepUnlessStopped(
  sleep: Sleep,
  ms: number,
  stopSignal: AbortSignal,
  ctx: InvokeContext,
  attempts: number
) {
  try {
    await sleep(ms, stopSignal);
  } catch (err) {
    throw stoppedError(ctx, attempts, err) ?? err;
  }
}

/**
 * Sends one payload through `gateway`, retrying retryable failures with
 * exponential backoff. Makes at most `retry.maxAttempts` calls; each call gets
 * a fresh `attemptTimeoutMs`. Non-retryable failures are rethrown after the
 * first attempt. Cancellation and the overall deadline stop both in-flight
 * calls and backoff sleeps.
 */
export async function invokeWithRetry(
  gateway: LLMGateway,
  payload: PromptPayload,
  ctx: InvokeContext
): Promise<InvokeResult> {
  const sleep = ctx.sleep ?? defaultSleep;
  const random = ctx.random ?? Math.random;
  const stopSignal = ctx.signal ? AbortSignal.any([ctx.deadlineSignal, ctx.signal]) : ctx.deadlineSignal;
  let attempts = 0;

  for (;;) {
    const stopped = stoppedError(ctx, attempts);
    if (stopped) throw stopped;

    let attemptSignal: AbortSignal | undefined;

    try {
      const releasePermit = ctx.budget ? await ctx.budget.acquire(stopSignal) : undefined;
      try {
        attempts += 1;
        ctx.onAttempt?.(attempts);
        attemptSignal = AbortSignal.timeout(ctx.attemptTimeoutMs);
        ctx.logger?.debug({ provider: gateway.provider, attempt: attempts }, "Calling provider");
        const response = await gateway.send(payload, AbortSignal.any([attemptSignal, stopSignal]));
        return { response, attempts };
      } finally {
        releasePermit?.();
      }
    } catch (err) {
      const interrupted = stoppedError(ctx, attempts, err);
      if (interrupted) throw interrupted;

      const error = toUpstreamError(err, attemptSignal?.aborted === true, ctx.attemptTimeoutMs);
      if (!error.retryable) {
        throw error;
      }
      if (attempts >= ctx.retry.maxAttempts) {
        throw new RetriesExhaustedError(error, attempts);
      }

      const delayMs = backoffDelay(ctx.retry, attempts, error, random);
      ctx.logger?.warn(
        { provider: gateway.provider, attempt: attempts, reason: error.reason, delayMs },
        "Provider call failed, retrying"
      );
      await sleepUnlessStopped(sleep, delayMs, stopSignal, ctx, attempts);
    }
  }
}
