import { z } from "zod";
import { CasePrioritySchema, ScenarioCategorySchema } from "@testforge/shared";

/** Root shape the prompt asks for. Cases are checked one by one afterwards. */
export const ModelOutputSchema = z.object({
  test_cases: z.array(z.unknown()),
  analysis: z.unknown().optional(),
});

export type ModelOutput = z.infer<typeof ModelOutputSchema>;

const LIST_MARKER = /^\s*(?:\d+[.)]|[-*•])\s+/;

function collapseWhitespace(value: string) {
  return value.replace(/\s+/g, " ").trim();
}

// Accepts a list or a multi-line string; yields single-line, non-empty entries.
function toLines(value: string | string[]) {
  const items = typeof value === "string" ? value.split("\n") : value;
  return items.map((item) => collapseWhitespace(item.replace(LIST_MARKER, ""))).filter(Boolean);
}

// Tags are a set: split on separators, first occurrence wins.
function toTags(value: string | string[]) {
  const items = (typeof value === "string" ? [value] : value).flatMap((item) => item.split(/[,;\n]/));
  return [...new Set(items.map(collapseWhitespace).filter(Boolean))];
}

const LinesSchema = z.union([z.array(z.string()), z.string()]).transform(toLines);
/** Optional notes the prompt asks for next to the cases. */
export const AnalysisDraftSchema = z.object({
  risks: LinesSchema.default([]),
  assumptions: LinesSchema.default([]),
});

const IdSchema = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

/**
 * One case as the model emits it. Lenient about list encodings and letter
 * case; the semantic checks (known requirement, non-empty steps and expected
 * result) happen in `parseTestSuite` so each gets its own drop reason.
 */
export const DraftTestCaseSchema = z.object({
  id: IdSchema.optional(),
  requirement_id: IdSchema,
  title: z.string().transform(collapseWhitespace).pipe(z.string().min(1)),
  category: z.string().trim().toLowerCase().pipe(ScenarioCategorySchema).default("functional"),
  priority: z.string().trim().toLowerCase().pipe(CasePrioritySchema).default("medium"),
  preconditions: LinesSchema.default([]),
  steps: LinesSchema.default([]),
  expected_result: z.string().trim().default(""),
  tags: z.union([z.array(z.string()), z.string()]).transform(toTags).default([]),
});

export type DraftTestCase = z.infer<typeof DraftTestCaseSchema>;

const CAMEL_CASE_ALIASES: Record<string, string> = {
  requirementId: "requirement_id",
  expectedResult: "expected_result",
};

// Models sometimes answer in camelCase; fold those keys onto the requested ones.
export function withSnakeCaseKeys(value: unknown): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return value;
  }

  const entries = Object.entries(value).map(([key, item]): [string, unknown] => {
    const alias = CAMEL_CASE_ALIASES[key];
    return alias && !(alias in value) ? [alias, item] : [key, item];
  });
  return Object.fromEntries(entries);
}
