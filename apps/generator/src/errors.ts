import type { DroppedCaseWarning, UpstreamFailureReason } from "@testforge/shared";

/**
 * Failure taxonomy for one pipeline run.
 *
 * - input: the caller's requirements, options or format are unusable. Never retried.
 * - upstream: the provider call failed. Retryable kinds are retried by the gateway.
 * - validation: the provider answered but nothing usable could be extracted.
 */
export type ErrorCategory = "input" | "upstream" | "validation";

export abstract class PipelineError extends Error {
  abstract readonly kind: string;
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/* --------------------------------- Input --------------------------------- */

// Largest delay a Node timer accepts.
export const MAX_DEADLINE_MS = 2_147_483_647;

export abstract class InputError extends PipelineError {
  readonly category = "input" as const;
}

export class EmptyInputError extends InputError {
  readonly kind = "empty_input";

  constructor() {
    super("Requirements text is empty.");
  }
}

export class PayloadTooLargeError extends InputError {
  readonly kind = "payload_too_large";

  constructor(
    message: string,
    readonly limit: number,
    readonly actual: number
  ) {
    super(message);
  }
}

export class InvalidOptionsError extends InputError {
  readonly kind = "invalid_options";

  constructor(readonly issues: string[]) {
    super(`Invalid generation options: ${issues.join("; ")}`);
  }
}

export class UnsupportedFormatError extends InputError {
  readonly kind = "unsupported_format";

  constructor(readonly format: string) {
    super(`Unsupported output format: ${format}`);
  }
}

export class InvalidDeadlineError extends InputError {
  readonly kind = "invalid_deadline";

  constructor(readonly deadlineMs: number) {
    super(`Deadline must be a whole number of milliseconds between 1 and ${MAX_DEADLINE_MS}, got ${deadlineMs}.`);
  }
}

/* -------------------------------- Upstream ------------------------------- */

export abstract class UpstreamError extends PipelineError {
  readonly category = "upstream" as const;
  abstract readonly reason: UpstreamFailureReason;
  abstract readonly retryable: boolean;
}

export class TimeoutError extends UpstreamError {
  readonly kind = "timeout";
  readonly reason = "timeout" as const;
  readonly retryable = true;

  constructor(readonly timeoutMs: number) {
    super(`Provider did not answer within ${timeoutMs}ms.`);
  }
}

export class RateLimitError extends UpstreamError {
  readonly kind = "rate_limit";
  readonly reason = "rate_limit" as const;
  readonly retryable = true;

  constructor(
    message: string,
    readonly retryAfterMs?: number
  ) {
    super(message);
  }
}

export class TransientNetworkError extends UpstreamError {
  readonly kind = "transient_network";
  readonly reason = "transient_network" as const;
  readonly retryable = true;
}

export class AuthError extends UpstreamError {
  readonly kind = "auth";
  readonly reason = "auth" as const;
  readonly retryable = false;
}

// The provider refused the request itself (bad shape, unknown model, too long).
export class PayloadRejectedError extends UpstreamError {
  readonly kind = "payload_rejected";
  readonly reason = "payload_rejected" as const;
  readonly retryable = false;
}

export class UnknownProviderError extends UpstreamError {
  readonly kind = "unknown_provider";
  readonly reason = "unknown_provider" as const;
  readonly retryable = false;
}

export class DeadlineExceededError extends UpstreamError {
  readonly kind = "deadline_exceeded";
  readonly reason = "deadline_exceeded" as const;
  readonly retryable = false;

  constructor(
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(`Overall deadline exceeded after ${attempts} attempt(s).`, options);
  }
}

export class RetriesExhaustedError extends UpstreamError {
  readonly kind = "retries_exhausted";
  readonly retryable = false;

  constructor(
    readonly lastError: UpstreamError,
    readonly attempts: number
  ) {
    super(`Provider call failed after ${attempts} attempt(s): ${lastError.message}`, { cause: lastError });
  }

  get reason(): UpstreamFailureReason {
    return this.lastError.reason;
  }
}

// Raised when the caller's signal aborts the run; never surfaced as an upstream fault.
export class CancelledError extends Error {
  constructor() {
    super("Generation was cancelled.");
    this.name = "CancelledError";
  }
}

/* ------------------------------- Validation ------------------------------ */

export abstract class ValidationError extends PipelineError {
  readonly category = "validation" as const;

  constructor(
    message: string,
    readonly violations: string[],
    readonly repaired: boolean
  ) {
    super(message);
  }
}

export class ResponseValidationError extends ValidationError {
  readonly kind = "unparseable";
}

export class EmptySuiteError extends ValidationError {
  readonly kind = "empty_suite";

  constructor(
    readonly warnings: DroppedCaseWarning[],
    repaired: boolean
  ) {
    super(
      "No generated test case survived validation.",
      warnings.map((warning) => `case ${warning.index}: ${warning.reason} (${warning.detail})`),
      repaired
    );
  }
}

/* ---------------------------------- Config -------------------------------- */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
