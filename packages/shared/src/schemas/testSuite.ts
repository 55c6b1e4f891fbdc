// packages/shared/src/schemas/testSuite.ts
import { z } from "zod";
import {
  CASE_PRIORITIES,
  COVERAGE_LEVELS,
  DROP_REASONS,
  OUTPUT_FORMATS,
  SCENARIO_CATEGORIES,
  SUITE_SCHEMA_VERSION,
  TEST_FRAMEWORKS,
} from "../constants";

/* ----------------------------- Shared enums ------------------------------ */

export const TestFrameworkSchema = z.enum(TEST_FRAMEWORKS);
export type TestFramework = z.infer<typeof TestFrameworkSchema>;

export const CoverageLevelSchema = z.enum(COVERAGE_LEVELS);
export type CoverageLevel = z.infer<typeof CoverageLevelSchema>;

export const ScenarioCategorySchema = z.enum(SCENARIO_CATEGORIES);
export type ScenarioCategory = z.infer<typeof ScenarioCategorySchema>;

export const CasePrioritySchema = z.enum(CASE_PRIORITIES);
export type CasePriority = z.infer<typeof CasePrioritySchema>;

export const OutputFormatSchema = z.enum(OUTPUT_FORMATS);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const DropReasonSchema = z.enum(DROP_REASONS);
export type DropReason = z.infer<typeof DropReasonSchema>;

/* --------------------------- Generation Options -------------------------- */
/**
 * Every option has an explicit default so a parsed value is always total.
 * Callers may send a partial object; unknown keys are rejected.
 */
export const GENERATION_OPTION_DEFAULTS = {
  testFramework: "generic",
  coverageLevel: "basic",
  language: "en",
  maxTestsPerRequirement: 3,
} as const satisfies {
  testFramework: TestFramework;
  coverageLevel: CoverageLevel;
  language: string;
  maxTestsPerRequirement: number;
};

export const GenerationOptionsSchema = z
  .object({
    testFramework: TestFrameworkSchema.default(GENERATION_OPTION_DEFAULTS.testFramework),
    coverageLevel: CoverageLevelSchema.default(GENERATION_OPTION_DEFAULTS.coverageLevel),
    language: z.string().trim().min(1).max(32).default(GENERATION_OPTION_DEFAULTS.language),
    maxTestsPerRequirement: z
      .number()
      .int()
      .positive()
      .max(20)
      .default(GENERATION_OPTION_DEFAULTS.maxTestsPerRequirement),
  })
  .strict();

export type GenerationOptions = z.infer<typeof GenerationOptionsSchema>;
export type GenerationOptionsInput = z.input<typeof GenerationOptionsSchema>;

/* ------------------------------ Requirements ----------------------------- */

export const SourceOffsetSchema = z
  .object({
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
  })
  .strict();

export type SourceOffset = z.infer<typeof SourceOffsetSchema>;

// One atomic, addressable piece of requirement text.
export const RequirementUnitSchema = z
  .object({
    id: z.string().min(1),
    text: z.string().min(1),
    sourceOffset: SourceOffsetSchema,
    section: z.string().min(1).optional(),
  })
  .strict();

export type RequirementUnit = z.infer<typeof RequirementUnitSchema>;

export type GenerationRequest = {
  readonly requirements: readonly RequirementUnit[];
  readonly options: GenerationOptions;
  readonly featureName?: string;
};

/* ------------------------------- Test Suite ------------------------------ */

// List entries are one trimmed line each; tabular and feature-file exports put one entry per line.
const ListEntrySchema = z
  .string()
  .min(1)
  .refine((value) => value === value.trim() && !/[\r\n]/.test(value), {
    message: "must be a single line without surrounding whitespace",
  });

const TagSchema = ListEntrySchema.refine((value) => !value.includes(";"), {
  message: "must not contain ';'",
});

export const TestCaseSchema = z
  .object({
    id: z.string().min(1),
    requirementId: z.string().min(1),
    title: z.string().min(1),
    category: ScenarioCategorySchema,
    priority: CasePrioritySchema,
    preconditions: z.array(ListEntrySchema),
    steps: z.array(ListEntrySchema).min(1),
    expectedResult: z.string().min(1),
    tags: z.array(TagSchema),
  })
  .strict();

export type TestCase = z.infer<typeof TestCaseSchema>;

export const SuiteRequirementSchema = z
  .object({
    id: z.string().min(1),
    text: z.string().min(1),
  })
  .strict();

export type SuiteRequirement = z.infer<typeof SuiteRequirementSchema>;

// Risks and assumptions the model noted while reading the requirements.
export const RequirementsAnalysisSchema = z
  .object({
    risks: z.array(ListEntrySchema),
    assumptions: z.array(ListEntrySchema),
  })
  .strict();

export type RequirementsAnalysis = z.infer<typeof RequirementsAnalysisSchema>;

export const TestSuiteSchema = z
  .object({
    schemaVersion: z.literal(SUITE_SCHEMA_VERSION),
    generatedAt: z.string().datetime(),
    featureName: z.string().min(1).optional(),
    sourceRequirementCount: z.number().int().nonnegative(),
    requirements: z.array(SuiteRequirementSchema),
    analysis: RequirementsAnalysisSchema.optional(),
    cases: z.array(TestCaseSchema),
  })
  .strict()
  .superRefine((suite, ctx) => {
    const known = new Set(suite.requirements.map((item) => item.id));
    suite.cases.forEach((testCase, index) => {
      if (!known.has(testCase.requirementId)) {
        ctx.addIssue({
          code: "custom",
          path: ["cases", index, "requirementId"],
          message: `unknown requirement id ${testCase.requirementId}`,
        });
      }
    });
  });

export type TestSuite = z.infer<typeof TestSuiteSchema>;

export const DroppedCaseWarningSchema = z
  .object({
    index: z.number().int().nonnegative(),
    caseId: z.string().optional(),
    requirementId: z.string().optional(),
    reason: DropReasonSchema,
    detail: z.string().min(1),
  })
  .strict();

export type DroppedCaseWarning = z.infer<typeof DroppedCaseWarningSchema>;
