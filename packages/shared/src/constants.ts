// packages/shared/src/constants.ts

/** Test suite artifact contract version. */
export const SUITE_SCHEMA_VERSION = "1.0" as const;

/** Step phrasing the model is asked to follow. */
export const TEST_FRAMEWORKS = ["generic", "bdd", "tabular"] as const;

/** How deep the generated suite goes per requirement. */
export const COVERAGE_LEVELS = ["basic", "thorough"] as const;

/** Scenario kinds a generated case can belong to. */
export const SCENARIO_CATEGORIES = [
  "functional",
  "negative",
  "boundary",
  "integration",
  "usability",
  "performance",
  "stress",
  "acceptance",
  "smoke",
  "exploratory",
  "compatibility",
  "recovery",
  "security",
] as const;

/** Categories requested when coverage is basic; thorough asks for all of them. */
export const BASIC_SCENARIO_CATEGORIES = ["functional", "negative"] as const;

export const CASE_PRIORITIES = ["high", "medium", "low"] as const;

/** Serializations the renderer supports. */
export const OUTPUT_FORMATS = ["markdown", "json", "csv", "gherkin"] as const;

/** Pipeline lifecycle, in execution order, plus the single failure terminal. */
export const PIPELINE_STAGES = [
  "normalizing",
  "prompting",
  "invoking",
  "validating",
  "rendering",
  "done",
  "failed",
] as const;

/** Providers with a gateway implementation. */
export const PROVIDER_NAMES = ["anthropic", "gemini"] as const;

/** Why a model-emitted case did not make it into the suite. */
export const DROP_REASONS = [
  "malformed",
  "unknown_requirement",
  "missing_steps",
  "missing_expected_result",
  "duplicate",
  "over_limit",
] as const;

/** Upstream failure reasons reported to callers. */
export const UPSTREAM_FAILURE_REASONS = [
  "timeout",
  "rate_limit",
  "auth",
  "transient_network",
  "payload_rejected",
  "unknown_provider",
  "deadline_exceeded",
] as const;
