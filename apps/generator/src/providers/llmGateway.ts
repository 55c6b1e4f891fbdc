import type { ProviderName } from "../config";
import {
  AuthError,
  PayloadRejectedError,
  RateLimitError,
  TransientNetworkError,
  UnknownProviderError,
  type UpstreamError,
} from "../errors";
import type { PromptPayload } from "../prompt/buildPrompt";

/** What a provider answered, before any parsing. Discarded once validated. */
export type RawModelResponse = {
  readonly text: string;
  readonly tokensUsed: number;
  readonly latencyMs: number;
  readonly finishReason: string | null;
};

/**
 * One provider, one request/response exchange. Implementations make exactly
 * one outbound call per `send`, honour `signal`, and raise `UpstreamError`
 * subclasses for provider failures. Retries and timeouts live in
 * `invokeWithRetry`, not here.
 */
export interface LLMGateway {
  readonly provider: ProviderName;
  send(payload: PromptPayload, signal: AbortSignal): Promise<RawModelResponse>;
}

export type FetchLike = typeof fetch;

export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (!value?.trim()) {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }

  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

// Maps a non-2xx provider answer onto the upstream taxonomy.
export function classifyHttpFailure(
  provider: string,
  status: number,
  body: string,
  retryAfter: string | null
): UpstreamError {
  const message = `${provider} request failed with ${status}: ${body.trim().slice(0, 500) || "no body"}`;

  if (status === 401 || status === 403 || body.includes("API_KEY_INVALID")) {
    return new AuthError(message);
  }
  if (status === 429) {
    return new RateLimitError(message, parseRetryAfter(retryAfter));
  }
  if (status === 408 || status === 409 || status >= 500) {
    return new TransientNetworkError(message);
  }
  if (status === 400 || status === 404 || status === 413 || status === 422) {
    return new PayloadRejectedError(message);
  }
  return new UnknownProviderError(message);
}

/**
 * Runs the fetch for one attempt. Aborts are rethrown untouched so the caller
 * can tell its own timeout, deadline and cancellation apart; any other
 * transport failure is transient.
 */
export async function postJson(
  fetchImpl: FetchLike,
  provider: string,
  url: string,
  init: { headers: Record<string, string>; body: unknown; signal: AbortSignal }
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...init.headers },
      body: JSON.stringify(init.body),
      signal: init.signal,
    });
  } catch (err) {
    if (init.signal.aborted) {
      throw err;
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new TransientNetworkError(`${provider} request did not complete: ${message}`, { cause: err });
  }

  if (!response.ok) {
    const body = await response.text().catch(() => "");
    throw classifyHttpFailure(provider, response.status, body, response.headers.get("retry-after"));
  }

  try {
    return await response.json();
  } catch (err) {
    if (init.signal.aborted) {
      throw err;
    }
    throw new UnknownProviderError(`${provider} returned a body that is not JSON.`, { cause: err });
  }
}
