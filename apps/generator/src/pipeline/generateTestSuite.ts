import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  GenerationOptionsSchema,
  type GenerationOptions,
  type GenerationRequest,
  type Outcome,
} from "@testforge/shared";
import type { PipelineConfig } from "../config";
import {
  CancelledError,
  EmptySuiteError,
  InputError,
  InvalidDeadlineError,
  InvalidOptionsError,
  MAX_DEADLINE_MS,
  RetriesExhaustedError,
  UpstreamError,
  ValidationError,
} from "../errors";
import type { Logger } from "../logger";
import { normalizeRequirements } from "../normalizer/normalizeRequirements";
import { parseTestSuite, type Clock } from "../parser/parseTestSuite";
import { buildPrompt } from "../prompt/buildPrompt";
import { invokeWithRetry, type Sleep } from "../providers/invokeWithRetry";
import type { LLMGateway, RawModelResponse } from "../providers/llmGateway";
import { createProviderBudget, type ProviderBudget } from "../providers/providerBudget";
import { CONTENT_TYPES, defaultFormatFor, renderTestSuite, resolveFormat } from "../render/renderTestSuite";
import { PipelineRun } from "./pipelineRun";

export type GenerateInput = {
  requirementsText: string;
  /** Partial generation options; missing keys come from the configured defaults. */
  options?: unknown;
  /** Output format; defaults to the one that fits the test framework. */
  format?: string;
  /** Overall deadline for this run, retries included. */
  deadlineMs?: number;
  featureName?: string;
  signal?: AbortSignal;
  /** Receives the provider's raw answer before it is parsed. */
  onRawResponse?: (response: RawModelResponse, requestId: string) => void | Promise<void>;
};

export type TestSuiteGeneratorDeps = {
  config: PipelineConfig;
  gateway: LLMGateway;
  logger: Logger;
  /** Shared across generators in the same process; created from config when omitted. */
  budget?: ProviderBudget;
  clock?: Clock;
  createRequestId?: () => string;
  sleep?: Sleep;
  random?: () => number;
};

export interface TestSuiteGenerator {
  generate(input: GenerateInput): Promise<Outcome>;
  defaultOptions(): GenerationOptions;
}

const OptionsObjectSchema = z.record(z.string(), z.unknown());

function summarizeZodIssues(error: z.ZodError) {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${path}: ${issue.message}`;
  });
}

export function resolveOptions(raw: unknown, defaults: Readonly<GenerationOptions>): GenerationOptions {
  const partial = OptionsObjectSchema.optional().safeParse(raw);
  if (!partial.success) {
    throw new InvalidOptionsError(["<root>: options must be an object"]);
  }

  const provided = Object.entries(partial.data ?? {}).filter(([, value]) => value !== undefined);
  const parsed = GenerationOptionsSchema.safeParse({ ...defaults, ...Object.fromEntries(provided) });
  if (!parsed.success) {
    throw new InvalidOptionsError(summarizeZodIssues(parsed.error));
  }
  return parsed.data;
}

const DeadlineSchema = z.number().int().positive().max(MAX_DEADLINE_MS);

export function resolveDeadline(deadlineMs: number | undefined, fallback: number): number {
  if (deadlineMs === undefined) {
    return fallback;
  }
  if (!DeadlineSchema.safeParse(deadlineMs).success) {
    throw new InvalidDeadlineError(deadlineMs);
  }
  return deadlineMs;
}

function toFailureOutcome(err: unknown, run: PipelineRun, attempts: number): Outcome {
  const { requestId } = run;

  if (err instanceof CancelledError) {
    run.fail("cancelled");
    return { status: "cancelled", requestId, stages: run.stages };
  }

  if (err instanceof InputError) {
    run.fail(err.kind);
    return { status: "bad_request", requestId, kind: err.kind, message: err.message, stages: run.stages };
  }

  if (err instanceof UpstreamError) {
    run.fail(err.reason);
    const exhausted = err instanceof RetriesExhaustedError;
    return {
      status: "upstream_failure",
      requestId,
      reason: err.reason,
      retryable: exhausted ? err.lastError.retryable : err.retryable,
      exhausted,
      attempts: exhausted ? err.attempts : attempts,
      message: err.message,
      stages: run.stages,
    };
  }

  if (err instanceof ValidationError) {
    const reason = err instanceof EmptySuiteError ? "empty_suite" : "unparseable";
    run.fail(reason);
    return {
      status: "generation_failed",
      requestId,
      reason,
      message: err.message,
      violations: err.violations,
      warnings: err instanceof EmptySuiteError ? err.warnings : [],
      repaired: err.repaired,
      stages: run.stages,
    };
  }

  run.fail("internal");
  throw err;
}

/**
 * Wires the pipeline stages into one run per `generate` call:
 * normalize, build the prompt, call the provider (with retries), validate,
 * render. Every expected failure comes back as an `Outcome`; only programming
 * errors are thrown.
 */
export function createTestSuiteGenerator(deps: TestSuiteGeneratorDeps): TestSuiteGenerator {
  const { config, gateway, logger } = deps;
  const budget = deps.budget ?? createProviderBudget(config.maxConcurrentRequests);
  const clock = deps.clock ?? (() => new Date());
  const createRequestId = deps.createRequestId ?? randomUUID;

  return {
    defaultOptions() {
      return { ...config.generationDefaults };
    },

    async generate(input: GenerateInput): Promise<Outcome> {
      const requestId = createRequestId();
      const log = logger.child({ requestId });
      const run = new PipelineRun(requestId, log);
      const startedAt = Date.now();
      let attempts = 0;

      try {
        if (input.signal?.aborted) {
          throw new CancelledError();
        }

        const options = resolveOptions(input.options, config.generationDefaults);
        const deadlineMs = resolveDeadline(input.deadlineMs, config.deadlineMs);
        const format = resolveFormat(input.format ?? defaultFormatFor(options.testFramework));
        const requirements = normalizeRequirements(input.requirementsText);
        log.info({ requirements: requirements.length, format, options }, "Requirements normalized");

        run.moveTo("prompting");
        const featureName = input.featureName?.trim();
        const request: GenerationRequest = {
          requirements,
          options,
          ...(featureName ? { featureName } : {}),
        };
        const payload = buildPrompt(request, config);

        run.moveTo("invoking");
        const { response } = await invokeWithRetry(gateway, payload, {
          retry: config.retry,
          attemptTimeoutMs: config.attemptTimeoutMs,
          deadlineSignal: AbortSignal.timeout(deadlineMs),
          signal: input.signal,
          budget,
          logger: log,
          sleep: deps.sleep,
          random: deps.random,
          onAttempt: (attempt) => {
            attempts = attempt;
          },
        });
        log.debug(
          {
            attempts,
            tokensUsed: response.tokensUsed,
            latencyMs: response.latencyMs,
            finishReason: response.finishReason,
          },
          "Provider answered"
        );
        if (input.signal?.aborted) {
          throw new CancelledError();
        }
        await input.onRawResponse?.(response, requestId);

        run.moveTo("validating");
        const { suite, warnings, repaired, analysisIssue } = parseTestSuite(response.text, request, clock);
        for (const warning of warnings) {
          log.warn(warning, "Dropped generated test case");
        }
        if (analysisIssue) {
          log.warn({ detail: analysisIssue }, "Ignored unreadable requirements analysis");
        }

        run.moveTo("rendering");
        const artifact = renderTestSuite(suite, format);

        run.moveTo("done");
        log.info(
          { cases: suite.cases.length, dropped: warnings.length, repaired, attempts, durationMs: Date.now() - startedAt },
          "Test suite generated"
        );

        return {
          status: "success",
          requestId,
          format,
          contentType: CONTENT_TYPES[format],
          artifact,
          suite,
          warnings,
          repaired,
          stages: run.stages,
        };
      } catch (err) {
        const failedAt = run.stage;
        const outcome = toFailureOutcome(err, run, attempts);
        log.warn(
          { status: outcome.status, stage: failedAt, attempts, durationMs: Date.now() - startedAt },
          err instanceof Error ? err.message : "Generation failed"
        );
        return outcome;
      }
    },
  };
}
