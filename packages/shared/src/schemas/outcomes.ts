import { z } from "zod";
import { PIPELINE_STAGES, UPSTREAM_FAILURE_REASONS } from "../constants";
import {
  DroppedCaseWarningSchema,
  OutputFormatSchema,
  TestSuiteSchema,
} from "./testSuite";

export const PipelineStageSchema = z.enum(PIPELINE_STAGES);
export type PipelineStage = z.infer<typeof PipelineStageSchema>;

export const UpstreamFailureReasonSchema = z.enum(UPSTREAM_FAILURE_REASONS);
export type UpstreamFailureReason = z.infer<typeof UpstreamFailureReasonSchema>;

export const SuccessOutcomeSchema = z
  .object({
    status: z.literal("success"),
    requestId: z.string().min(1),
    format: OutputFormatSchema,
    contentType: z.string().min(1),
    artifact: z.string(),
    suite: TestSuiteSchema,
    warnings: z.array(DroppedCaseWarningSchema),
    repaired: z.boolean(),
    stages: z.array(PipelineStageSchema),
  })
  .strict();

export type SuccessOutcome = z.infer<typeof SuccessOutcomeSchema>;

// Malformed or empty requirements, unknown options or format, payload too large.
export const BadRequestOutcomeSchema = z
  .object({
    status: z.literal("bad_request"),
    requestId: z.string().min(1),
    kind: z.string().min(1),
    message: z.string().min(1),
    stages: z.array(PipelineStageSchema),
  })
  .strict();

export type BadRequestOutcome = z.infer<typeof BadRequestOutcomeSchema>;

export const UpstreamFailureOutcomeSchema = z
  .object({
    status: z.literal("upstream_failure"),
    requestId: z.string().min(1),
    reason: UpstreamFailureReasonSchema,
    retryable: z.boolean(), // whether the last cause was of a retryable kind
    exhausted: z.boolean(), // true when retries ran out on a retryable cause
    attempts: z.number().int().nonnegative(),
    message: z.string().min(1),
    stages: z.array(PipelineStageSchema),
  })
  .strict();

export type UpstreamFailureOutcome = z.infer<typeof UpstreamFailureOutcomeSchema>;

export const GenerationFailedOutcomeSchema = z
  .object({
    status: z.literal("generation_failed"),
    requestId: z.string().min(1),
    reason: z.enum(["unparseable", "empty_suite"]),
    message: z.string().min(1),
    violations: z.array(z.string()),
    warnings: z.array(DroppedCaseWarningSchema),
    repaired: z.boolean(),
    stages: z.array(PipelineStageSchema),
  })
  .strict();

export type GenerationFailedOutcome = z.infer<typeof GenerationFailedOutcomeSchema>;

export const CancelledOutcomeSchema = z
  .object({
    status: z.literal("cancelled"),
    requestId: z.string().min(1),
    stages: z.array(PipelineStageSchema),
  })
  .strict();

export type CancelledOutcome = z.infer<typeof CancelledOutcomeSchema>;

export const OutcomeSchema = z.discriminatedUnion("status", [
  SuccessOutcomeSchema,
  BadRequestOutcomeSchema,
  UpstreamFailureOutcomeSchema,
  GenerationFailedOutcomeSchema,
  CancelledOutcomeSchema,
]);

export type Outcome = z.infer<typeof OutcomeSchema>;
