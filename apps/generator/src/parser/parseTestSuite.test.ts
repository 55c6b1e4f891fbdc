import { describe, it, expect } from "vitest";
import { GenerationOptionsSchema, type GenerationOptionsInput, type GenerationRequest } from "@testforge/shared";
import { EmptySuiteError, ResponseValidationError } from "../errors";
import { normalizeRequirements } from "../normalizer/normalizeRequirements";
import { parseTestSuite } from "./parseTestSuite";

const clock = () => new Date("2026-01-15T10:00:00.000Z");

function makeRequest(options: GenerationOptionsInput = {}): GenerationRequest {
  return {
    requirements: normalizeRequirements(
      "1. User can log in with valid credentials.\n2. User sees error on invalid password."
    ),
    options: GenerationOptionsSchema.parse(options),
    featureName: "Login",
  };
}

function modelCase(overrides: Record<string, unknown> = {}) {
  return {
    id: "TC-001",
    requirement_id: "1",
    title: "Log in with valid credentials",
    category: "functional",
    priority: "high",
    preconditions: ["A registered user exists"],
    steps: ["Open the login page", "Submit valid credentials"],
    expected_result: "The dashboard is shown",
    tags: ["login"],
    ...overrides,
  };
}

const twoCases = [
  modelCase(),
  modelCase({
    id: "TC-002",
    requirement_id: "2",
    title: "Reject an invalid password",
    category: "negative",
    priority: "medium",
    expected_result: 'An "Invalid password" error is shown',
  }),
];

function modelText(cases: unknown[]) {
  return JSON.stringify({ test_cases: cases });
}

describe("parseTestSuite", () => {
  it("builds a suite from well-formed output without repair", () => {
    const { suite, warnings, repaired } = parseTestSuite(modelText(twoCases), makeRequest(), clock);

    expect(repaired).toBe(false);
    expect(warnings).toEqual([]);
    expect(suite.generatedAt).toBe("2026-01-15T10:00:00.000Z");
    expect(suite.schemaVersion).toBe("1.0");
    expect(suite.featureName).toBe("Login");
    expect(suite.sourceRequirementCount).toBe(2);
    expect(suite.requirements).toEqual([
      { id: "1", text: "User can log in with valid credentials." },
      { id: "2", text: "User sees error on invalid password." },
    ]);
    expect(suite.cases.map((testCase) => testCase.requirementId)).toEqual(["1", "2"]);
    expect(suite.cases[0]).toEqual({
      id: "TC-001",
      requirementId: "1",
      title: "Log in with valid credentials",
      category: "functional",
      priority: "high",
      preconditions: ["A registered user exists"],
      steps: ["Open the login page", "Submit valid credentials"],
      expectedResult: "The dashboard is shown",
      tags: ["login"],
    });
    expect(suite.analysis).toBeUndefined();
    expect(Object.isFrozen(suite.cases[0])).toBe(true);
    expect(Object.isFrozen(suite.cases[0]?.steps)).toBe(true);
  });

  it("recovers prose-wrapped JSON through the repair pass", () => {
    const { suite, repaired } = parseTestSuite(`Here is the suite:\n${modelText(twoCases)}`, makeRequest(), clock);

    expect(repaired).toBe(true);
    expect(suite.cases).toHaveLength(2);
  });

  it("recovers fenced output with trailing commas", () => {
    const text = "```json\n" + modelText(twoCases).replace(/\]\}$/, ",]}") + "\n```";
    const { suite, repaired } = parseTestSuite(text, makeRequest(), clock);

    expect(repaired).toBe(true);
    expect(suite.cases.map((testCase) => testCase.id)).toEqual(["TC-001", "TC-002"]);
  });

  it("drops cases that reference an unknown requirement", () => {
    const cases = [twoCases[0], modelCase({ id: "TC-002", requirement_id: "99", title: "Ghost" }), twoCases[1]];
    const { suite, warnings } = parseTestSuite(modelText(cases), makeRequest(), clock);

    expect(suite.cases.map((testCase) => testCase.requirementId)).toEqual(["1", "2"]);
    expect(warnings).toEqual([
      {
        index: 1,
        caseId: "TC-002",
        requirementId: "99",
        reason: "unknown_requirement",
        detail: 'requirement "99" is not in the request',
      },
    ]);
  });

  it("reports cases without steps or expected result", () => {
    const cases = [
      modelCase({ steps: [] }),
      modelCase({ title: "Second", expected_result: "   " }),
      twoCases[1],
    ];
    const { warnings } = parseTestSuite(modelText(cases), makeRequest(), clock);

    expect(warnings.map((warning) => [warning.index, warning.reason])).toEqual([
      [0, "missing_steps"],
      [1, "missing_expected_result"],
    ]);
  });

  it("collapses duplicates and enforces the per-requirement cap", () => {
    const cases = [
      modelCase(),
      modelCase({ id: "TC-002" }),
      modelCase({ id: "TC-003", title: "Log in after password reset" }),
      twoCases[1],
    ];
    const { suite, warnings } = parseTestSuite(modelText(cases), makeRequest({ maxTestsPerRequirement: 1 }), clock);

    expect(suite.cases.map((testCase) => testCase.id)).toEqual(["TC-001", "TC-002"]);
    expect(warnings.map((warning) => [warning.index, warning.reason])).toEqual([
      [1, "duplicate"],
      [2, "over_limit"],
    ]);
  });

  it("reports entries that are not cases as malformed", () => {
    const { warnings } = parseTestSuite(modelText(["not a case", ...twoCases]), makeRequest(), clock);

    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.index).toBe(0);
    expect(warnings[0]?.reason).toBe("malformed");
  });

  it("coerces loose field encodings", () => {
    const { suite } = parseTestSuite(
      modelText([
        {
          requirementId: 2,
          title: "Lock the account",
          category: "Negative",
          steps: "1. Enter a wrong password\n2. Repeat five times",
          expectedResult: "The account is locked",
          tags: "auth, login, auth",
        },
      ]),
      makeRequest(),
      clock
    );

    expect(suite.cases[0]).toEqual({
      id: "TC-001",
      requirementId: "2",
      title: "Lock the account",
      category: "negative",
      priority: "medium",
      preconditions: [],
      steps: ["Enter a wrong password", "Repeat five times"],
      expectedResult: "The account is locked",
      tags: ["auth", "login"],
    });
  });

  it("replaces missing and repeated case ids by position", () => {
    const cases = [
      modelCase({ id: "X-1" }),
      modelCase({ id: undefined, title: "Remember me keeps the session" }),
      modelCase({ id: "X-1", title: "Log in with an uppercase email" }),
    ];
    const { suite } = parseTestSuite(modelText(cases), makeRequest(), clock);

    expect(suite.cases.map((testCase) => testCase.id)).toEqual(["X-1", "TC-002", "TC-003"]);
  });

  it("keeps the requirements analysis next to the cases", () => {
    const text = JSON.stringify({
      analysis: { risks: "- Lockout rules are unspecified\n- Error text may leak account existence", assumptions: [] },
      test_cases: twoCases,
    });

    const result = parseTestSuite(text, makeRequest(), clock);

    expect(result.suite.analysis).toEqual({
      risks: ["Lockout rules are unspecified", "Error text may leak account existence"],
      assumptions: [],
    });
    expect(result.analysisIssue).toBeUndefined();
  });

  it("leaves out an empty analysis", () => {
    const text = JSON.stringify({ analysis: { risks: [], assumptions: [] }, test_cases: twoCases });

    const { suite } = parseTestSuite(text, makeRequest(), clock);

    expect("analysis" in suite).toBe(false);
  });

  it("reports an unreadable analysis without failing the suite", () => {
    const text = JSON.stringify({ analysis: { risks: 5 }, test_cases: twoCases });

    const result = parseTestSuite(text, makeRequest(), clock);

    expect(result.suite.analysis).toBeUndefined();
    expect(result.suite.cases).toHaveLength(2);
    expect(result.analysisIssue).toMatch(/^risks: /);
  });

  it("fails when the output cannot be read as a case list", () => {
    try {
      parseTestSuite("I cannot help with that.", makeRequest(), clock);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ResponseValidationError);
      if (err instanceof ResponseValidationError) {
        expect(err.kind).toBe("unparseable");
        expect(err.repaired).toBe(true);
        expect(err.violations).toHaveLength(1);
      }
    }
  });

  it("fails when no case survives", () => {
    const cases = [modelCase({ requirement_id: "99" })];

    try {
      parseTestSuite(modelText(cases), makeRequest(), clock);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EmptySuiteError);
      if (err instanceof EmptySuiteError) {
        expect(err.repaired).toBe(false);
        expect(err.violations).toEqual(['case 0: unknown_requirement (requirement "99" is not in the request)']);
      }
    }
  });
});
