import { z } from "zod";

// Value checks (enums, ranges) happen in the pipeline so the API and the CLI
// reject the same options with the same messages.
export const GenerationOptionsBodySchema = z
  .object({
    test_framework: z.string().optional(),
    coverage_level: z.string().optional(),
    language: z.string().optional(),
    max_tests_per_requirement: z.number().optional(),
  })
  .strict();

export type GenerationOptionsBody = z.infer<typeof GenerationOptionsBodySchema>;

export const CreateTestSuiteRequestSchema = z
  .object({
    requirements_text: z.string(),
    options: GenerationOptionsBodySchema.optional(),
    format: z.string().optional(),
    deadline_ms: z.number().int().positive().max(600_000).optional(),
    feature_name: z.string().max(200).optional(),
  })
  .strict();

export type CreateTestSuiteRequest = z.infer<typeof CreateTestSuiteRequestSchema>;

export const GenerationDefaultsResponseSchema = z
  .object({
    test_framework: z.string(),
    coverage_level: z.string(),
    language: z.string(),
    max_tests_per_requirement: z.number().int().positive(),
  })
  .strict();
