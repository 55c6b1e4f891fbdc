import { parse as parseCsv } from "csv-parse/sync";
import { stringify as stringifyCsv } from "csv-stringify/sync";
import { z } from "zod";
import {
  OutputFormatSchema,
  TestCaseSchema,
  TestSuiteSchema,
  type OutputFormat,
  type RequirementsAnalysis,
  type TestCase,
  type TestFramework,
  type TestSuite,
} from "@testforge/shared";
import { UnsupportedFormatError } from "../errors";

export const CONTENT_TYPES: Record<OutputFormat, string> = {
  markdown: "text/markdown; charset=utf-8",
  json: "application/json; charset=utf-8",
  csv: "text/csv; charset=utf-8",
  gherkin: "text/x-gherkin; charset=utf-8",
};

export const FILE_EXTENSIONS: Record<OutputFormat, string> = {
  markdown: ".md",
  json: ".json",
  csv: ".csv",
  gherkin: ".feature",
};

const DEFAULT_FORMATS: Record<TestFramework, OutputFormat> = {
  generic: "markdown",
  bdd: "gherkin",
  tabular: "csv",
};

export function defaultFormatFor(testFramework: TestFramework): OutputFormat {
  return DEFAULT_FORMATS[testFramework];
}

export function resolveFormat(format: string): OutputFormat {
  const parsed = OutputFormatSchema.safeParse(format);
  if (!parsed.success) {
    throw new UnsupportedFormatError(format);
  }
  return parsed.data;
}

function casesByRequirement(suite: TestSuite) {
  return suite.requirements.map((requirement) => ({
    requirement,
    cases: suite.cases.filter((testCase) => testCase.requirementId === requirement.id),
  }));
}

/* -------------------------------- Markdown ------------------------------- */

function renderMarkdownCase(testCase: TestCase) {
  return [
    `### ${testCase.id}: ${testCase.title}`,
    "",
    `- Category: ${testCase.category}`,
    `- Priority: ${testCase.priority}`,
    `- Tags: ${testCase.tags.length > 0 ? testCase.tags.join(", ") : "none"}`,
    "",
    "**Preconditions**",
    "",
    ...(testCase.preconditions.length > 0 ? testCase.preconditions.map((item) => `- ${item}`) : ["- None"]),
    "",
    "**Steps**",
    "",
    ...testCase.steps.map((step, index) => `${index + 1}. ${step}`),
    "",
    "**Expected result**",
    "",
    testCase.expectedResult,
    "",
  ];
}

function renderMarkdownAnalysis(analysis: RequirementsAnalysis) {
  const list = (items: string[]) => (items.length > 0 ? items.map((item) => `- ${item}`) : ["- None"]);
  return [
    "## Requirements analysis",
    "",
    "**Risks**",
    "",
    ...list(analysis.risks),
    "",
    "**Assumptions**",
    "",
    ...list(analysis.assumptions),
    "",
  ];
}

function renderMarkdown(suite: TestSuite) {
  const lines = [
    `# ${suite.featureName ?? "Test suite"}`,
    "",
    `- Schema version: ${suite.schemaVersion}`,
    `- Generated at: ${suite.generatedAt}`,
    `- Requirements: ${suite.sourceRequirementCount}`,
    `- Test cases: ${suite.cases.length}`,
    "",
  ];

  if (suite.analysis) {
    lines.push(...renderMarkdownAnalysis(suite.analysis));
  }

  for (const { requirement, cases } of casesByRequirement(suite)) {
    lines.push(`## Requirement ${requirement.id}`, "", requirement.text, "");
    if (cases.length === 0) {
      lines.push("_No test cases._", "");
    }
    for (const testCase of cases) {
      lines.push(...renderMarkdownCase(testCase));
    }
  }

  return lines.join("\n");
}

/* ---------------------------------- JSON --------------------------------- */

// Fixed key order keeps the artifact byte-stable whatever order the suite was built in.
function canonicalSuite(suite: TestSuite): TestSuite {
  return {
    schemaVersion: suite.schemaVersion,
    generatedAt: suite.generatedAt,
    ...(suite.featureName ? { featureName: suite.featureName } : {}),
    sourceRequirementCount: suite.sourceRequirementCount,
    requirements: suite.requirements.map((requirement) => ({ id: requirement.id, text: requirement.text })),
    ...(suite.analysis
      ? { analysis: { risks: [...suite.analysis.risks], assumptions: [...suite.analysis.assumptions] } }
      : {}),
    cases: suite.cases.map((testCase) => ({
      id: testCase.id,
      requirementId: testCase.requirementId,
      title: testCase.title,
      category: testCase.category,
      priority: testCase.priority,
      preconditions: [...testCase.preconditions],
      steps: [...testCase.steps],
      expectedResult: testCase.expectedResult,
      tags: [...testCase.tags],
    })),
  };
}

export function parseJsonArtifact(text: string): TestSuite {
  return TestSuiteSchema.parse(JSON.parse(text));
}

/* ---------------------------------- CSV ---------------------------------- */

export const CSV_COLUMNS = [
  "id",
  "requirement_id",
  "requirement",
  "title",
  "category",
  "priority",
  "preconditions",
  "steps",
  "expected_result",
  "tags",
] as const;

const LIST_SEPARATOR = "\n";
const TAG_SEPARATOR = ";";

function renderCsv(suite: TestSuite) {
  const requirementText = new Map(suite.requirements.map((requirement) => [requirement.id, requirement.text]));
  const rows = suite.cases.map((testCase) => [
    testCase.id,
    testCase.requirementId,
    requirementText.get(testCase.requirementId) ?? "",
    testCase.title,
    testCase.category,
    testCase.priority,
    testCase.preconditions.join(LIST_SEPARATOR),
    testCase.steps.join(LIST_SEPARATOR),
    testCase.expectedResult,
    testCase.tags.join(TAG_SEPARATOR),
  ]);

  return stringifyCsv([[...CSV_COLUMNS], ...rows], { record_delimiter: "unix" });
}

function splitCell(value: string, separator: string) {
  return value
    .split(separator)
    .map((item) => item.trim())
    .filter(Boolean);
}

const CsvRowsSchema = z.array(z.array(z.string()));

/** Reads the cases back from a CSV artifact. Requirement text is informational and ignored. */
export function parseCsvArtifact(text: string): TestCase[] {
  const records: unknown = parseCsv(text, { bom: true, skip_empty_lines: true });
  const [header, ...rows] = CsvRowsSchema.parse(records);

  if (!header || header.join(",") !== CSV_COLUMNS.join(",")) {
    throw new Error(`Unexpected CSV header: ${header?.join(",") ?? "<empty>"}`);
  }

  return rows.map((row) => {
    const cell = (column: (typeof CSV_COLUMNS)[number]) => row[CSV_COLUMNS.indexOf(column)] ?? "";
    return TestCaseSchema.parse({
      id: cell("id"),
      requirementId: cell("requirement_id"),
      title: cell("title"),
      category: cell("category"),
      priority: cell("priority"),
      preconditions: splitCell(cell("preconditions"), LIST_SEPARATOR),
      steps: splitCell(cell("steps"), LIST_SEPARATOR),
      expectedResult: cell("expected_result"),
      tags: splitCell(cell("tags"), TAG_SEPARATOR),
    });
  });
}

/* --------------------------------- Gherkin -------------------------------- */

const GHERKIN_KEYWORD = /^(Given|When|Then|And|But)\b/;

function singleLine(value: string) {
  return value.replace(/\s+/g, " ").trim();
}

function gherkinTag(value: string) {
  return `@${value.replace(/\s+/g, "-")}`;
}

function gherkinStep(keyword: string, text: string) {
  const line = singleLine(text);
  return GHERKIN_KEYWORD.test(line) ? line : `${keyword} ${line}`;
}

function renderGherkinScenario(testCase: TestCase) {
  const tags = [
    testCase.id,
    `req-${testCase.requirementId}`,
    `priority-${testCase.priority}`,
    testCase.category,
    ...testCase.tags,
  ].map(gherkinTag);

  return [
    `  ${tags.join(" ")}`,
    `  Scenario: ${singleLine(testCase.title)}`,
    ...testCase.preconditions.map((item, index) => `    ${gherkinStep(index === 0 ? "Given" : "And", item)}`),
    ...testCase.steps.map((step, index) => `    ${gherkinStep(index === 0 ? "When" : "And", step)}`),
    `    ${gherkinStep("Then", testCase.expectedResult)}`,
    "",
  ];
}

function renderGherkin(suite: TestSuite) {
  const lines = [
    `Feature: ${singleLine(suite.featureName ?? "Generated test suite")}`,
    `  Generated at ${suite.generatedAt} from ${suite.sourceRequirementCount} requirement(s), schema ${suite.schemaVersion}.`,
    ...(suite.analysis?.risks ?? []).map((risk) => `  # Risk: ${singleLine(risk)}`),
    ...(suite.analysis?.assumptions ?? []).map((assumption) => `  # Assumption: ${singleLine(assumption)}`),
    "",
  ];

  for (const { requirement, cases } of casesByRequirement(suite)) {
    lines.push(`  # Requirement ${requirement.id}: ${singleLine(requirement.text)}`, "");
    for (const testCase of cases) {
      lines.push(...renderGherkinScenario(testCase));
    }
  }

  return lines.join("\n");
}

/**
 * Serializes a validated suite. Pure and byte-stable for a given suite and
 * format; every case field appears in every format.
 */
export function renderTestSuite(suite: TestSuite, format: string): string {
  switch (resolveFormat(format)) {
    case "markdown":
      return renderMarkdown(suite);
    case "json":
      return `${JSON.stringify(canonicalSuite(suite), null, 2)}\n`;
    case "csv":
      return renderCsv(suite);
    case "gherkin":
      return renderGherkin(suite);
  }
}
