import type { z } from "zod";
import {
  SUITE_SCHEMA_VERSION,
  type DroppedCaseWarning,
  type DropReason,
  type GenerationRequest,
  type RequirementsAnalysis,
  type TestCase,
  type TestSuite,
} from "@testforge/shared";
import { EmptySuiteError, ResponseValidationError } from "../errors";
import { AnalysisDraftSchema, DraftTestCaseSchema, ModelOutputSchema, withSnakeCaseKeys, type DraftTestCase, type ModelOutput } from "./modelOutput";
import { repairModelOutput } from "./repair";

export type Clock = () => Date;

export type ParseResult = {
  suite: TestSuite;
  warnings: DroppedCaseWarning[];
  repaired: boolean;
  /** Set when the model sent an analysis that could not be read; the suite then carries none. */
  analysisIssue?: string;
};

type StructureCheck = { ok: true; output: ModelOutput } | { ok: false; violations: string[] };

function summarizeZodIssues(error: z.ZodError) {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${path}: ${issue.message}`;
  });
}

function readStructure(text: string): StructureCheck {
  let json: unknown;
  try {
    json = JSON.parse(text.trim());
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, violations: [`invalid JSON: ${message}`] };
  }

  const parsed = ModelOutputSchema.safeParse(json);
  return parsed.success
    ? { ok: true, output: parsed.data }
    : { ok: false, violations: summarizeZodIssues(parsed.error) };
}

function positionalId(position: number) {
  return `TC-${String(position).padStart(3, "0")}`;
}

function freezeCase(testCase: TestCase): TestCase {
  Object.freeze(testCase.preconditions);
  Object.freeze(testCase.steps);
  Object.freeze(testCase.tags);
  return Object.freeze(testCase);
}

type AnalysisRead = { analysis?: RequirementsAnalysis; issue?: string };

function readAnalysis(value: unknown): AnalysisRead {
  if (value === undefined || value === null) {
    return {};
  }
  const parsed = AnalysisDraftSchema.safeParse(value);
  if (!parsed.success) {
    return { issue: summarizeZodIssues(parsed.error).join("; ") };
  }
  const { risks, assumptions } = parsed.data;
  return risks.length === 0 && assumptions.length === 0 ? {} : { analysis: { risks, assumptions } };
}

type Accepted = { draft: DraftTestCase };

function validateCases(items: unknown[], request: GenerationRequest) {
  const knownRequirements = new Set(request.requirements.map((unit) => unit.id));
  const perRequirement = new Map<string, number>();
  const seenTitles = new Set<string>();
  const accepted: Accepted[] = [];
  const warnings: DroppedCaseWarning[] = [];
  const limit = request.options.maxTestsPerRequirement;

  const drop = (index: number, reason: DropReason, detail: string, draft?: DraftTestCase) => {
    warnings.push({
      index,
      ...(draft?.id ? { caseId: draft.id } : {}),
      ...(draft ? { requirementId: draft.requirement_id } : {}),
      reason,
      detail,
    });
  };

  items.forEach((item, index) => {
    const parsed = DraftTestCaseSchema.safeParse(withSnakeCaseKeys(item));
    if (!parsed.success) {
      drop(index, "malformed", summarizeZodIssues(parsed.error).join("; "));
      return;
    }

    const draft = parsed.data;
    if (!knownRequirements.has(draft.requirement_id)) {
      drop(index, "unknown_requirement", `requirement "${draft.requirement_id}" is not in the request`, draft);
      return;
    }
    if (draft.steps.length === 0) {
      drop(index, "missing_steps", "case has no steps", draft);
      return;
    }
    if (!draft.expected_result) {
      drop(index, "missing_expected_result", "case has no expected result", draft);
      return;
    }

    const titleKey = `${draft.requirement_id}\u0000${draft.title}`;
    if (seenTitles.has(titleKey)) {
      drop(index, "duplicate", `"${draft.title}" repeats an earlier case for requirement ${draft.requirement_id}`, draft);
      return;
    }

    const count = perRequirement.get(draft.requirement_id) ?? 0;
    if (count >= limit) {
      drop(index, "over_limit", `requirement ${draft.requirement_id} already has ${limit} case(s)`, draft);
      return;
    }

    seenTitles.add(titleKey);
    perRequirement.set(draft.requirement_id, count + 1);
    accepted.push({ draft });
  });

  return { accepted, warnings };
}

// Keeps the first occurrence of each model id; everything else gets TC-### by position.
function assignIds(accepted: Accepted[]): string[] {
  const modelIds = new Set<string>();
  const keep = accepted.map(({ draft }) => {
    if (!draft.id || modelIds.has(draft.id)) {
      return false;
    }
    modelIds.add(draft.id);
    return true;
  });

  const used = new Set(accepted.filter((_, index) => keep[index]).map(({ draft }) => draft.id ?? ""));
  return accepted.map(({ draft }, index) => {
    if (keep[index] && draft.id) {
      return draft.id;
    }
    const base = positionalId(index + 1);
    let candidate = base;
    for (let suffix = 2; used.has(candidate); suffix += 1) {
      candidate = `${base}-${suffix}`;
    }
    used.add(candidate);
    return candidate;
  });
}

/**
 * Turns raw model text into a validated suite.
 *
 * The text is parsed strictly first; if that fails, one repair pass runs and
 * the result is parsed again. Cases that fail a check are dropped in model
 * order and reported as warnings. Throws `ResponseValidationError` when the
 * text cannot be read as a case list and `EmptySuiteError` when no case
 * survives.
 */
export function parseTestSuite(
  rawText: string,
  request: GenerationRequest,
  clock: Clock = () => new Date()
): ParseResult {
  let structure = readStructure(rawText);
  let repaired = false;

  if (!structure.ok) {
    repaired = true;
    structure = readStructure(repairModelOutput(rawText));
    if (!structure.ok) {
      throw new ResponseValidationError(
        "Model output is not a JSON object with a test_cases list.",
        structure.violations,
        repaired
      );
    }
  }

  const { accepted, warnings } = validateCases(structure.output.test_cases, request);
  if (accepted.length === 0) {
    throw new EmptySuiteError(warnings, repaired);
  }

  const { analysis, issue } = readAnalysis(structure.output.analysis);
  const ids = assignIds(accepted);
  const cases = accepted.map(({ draft }, index) =>
    freezeCase({
      id: ids[index] ?? positionalId(index + 1),
      requirementId: draft.requirement_id,
      title: draft.title,
      category: draft.category,
      priority: draft.priority,
      preconditions: draft.preconditions,
      steps: draft.steps,
      expectedResult: draft.expected_result,
      tags: draft.tags,
    })
  );

  const suite: TestSuite = {
    schemaVersion: SUITE_SCHEMA_VERSION,
    generatedAt: clock().toISOString(),
    ...(request.featureName ? { featureName: request.featureName } : {}),
    sourceRequirementCount: request.requirements.length,
    requirements: request.requirements.map((unit) => ({ id: unit.id, text: unit.text })),
    ...(analysis ? { analysis } : {}),
    cases,
  };

  return { suite, warnings, repaired, ...(issue ? { analysisIssue: issue } : {}) };
}
