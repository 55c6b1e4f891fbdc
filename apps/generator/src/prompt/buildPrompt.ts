import {
  BASIC_SCENARIO_CATEGORIES,
  CASE_PRIORITIES,
  SCENARIO_CATEGORIES,
  type GenerationOptions,
  type GenerationRequest,
  type TestFramework,
} from "@testforge/shared";
import type { PipelineConfig } from "../config";
import { EmptyInputError, PayloadTooLargeError } from "../errors";

export type PromptSettings = Pick<PipelineConfig, "model" | "maxTokens" | "temperature" | "limits">;

export type PromptParameters = {
  readonly model: string;
  readonly maxTokens: number;
  readonly temperature: number;
};

/** Exact request content handed to a gateway; provider-neutral. */
export type PromptPayload = {
  readonly system: string;
  readonly user: string;
  readonly parameters: PromptParameters;
};

export const OUTPUT_SHAPE_EXAMPLE =
  '{"analysis":{"risks":["..."],"assumptions":["..."]},"test_cases":[{"id":"TC-001","requirement_id":"1","title":"...","category":"functional","priority":"high","preconditions":["..."],"steps":["..."],"expected_result":"...","tags":["..."]}]}';

function compactJson(value: unknown) {
  return JSON.stringify(value);
}

export function allowedCategories(options: GenerationOptions): readonly string[] {
  return options.coverageLevel === "thorough" ? SCENARIO_CATEGORIES : BASIC_SCENARIO_CATEGORIES;
}

function buildSystemPrompt(options: GenerationOptions) {
  return [
    "You are a senior QA engineer turning software requirements into a structured test suite.",
    "Return exactly one JSON object.",
    "Do not use markdown.",
    "Do not add explanatory text.",
    "Do not add keys that were not requested.",
    `Write titles, preconditions, steps and expected results in this language: ${options.language}.`,
  ].join("\n");
}

function coverageInstructions(options: GenerationOptions) {
  const max = options.maxTestsPerRequirement;

  if (options.coverageLevel === "thorough") {
    const min = Math.min(2, max);
    return [
      "Coverage level: thorough.",
      "For every requirement cover the success path, the negative paths and the boundary values.",
      "Add integration, security, usability, performance, compatibility or recovery cases wherever the requirement implies them.",
      `Write between ${min} and ${max} test cases per requirement.`,
    ];
  }

  return [
    "Coverage level: basic.",
    "For every requirement cover the main success path and, when it fits, its most likely failure.",
    `Write between 1 and ${max} test cases per requirement.`,
  ];
}

const FRAMEWORK_INSTRUCTIONS: Record<TestFramework, string[]> = {
  generic: ["Write steps as short imperative actions, one action per step."],
  bdd: [
    "Write steps in Gherkin style: every step starts with Given, When, And or Then.",
    "Put the final observable outcome in expected_result, not in the steps.",
  ],
  tabular: [
    "Write every step as one short action that fits in a single spreadsheet cell.",
    "Do not number the steps and do not put line breaks inside a step.",
  ],
};

function buildUserPrompt(request: GenerationRequest) {
  const { options } = request;

  return [
    `Return JSON with this exact shape: ${OUTPUT_SHAPE_EXAMPLE}`,
    "Use requirement_id only from the requirement ids listed below; every test case traces to exactly one requirement.",
    `Use category only from ${allowedCategories(options).join(", ")}.`,
    `Use priority only from ${CASE_PRIORITIES.join(", ")}.`,
    "Every test case needs at least one step and a verifiable expected_result.",
    "In analysis, list the risks and the assumptions you made while reading the requirements, one short sentence each; use empty lists when there are none.",
    "Use unique test case ids in the form TC-001, TC-002.",
    ...coverageInstructions(options),
    ...FRAMEWORK_INSTRUCTIONS[options.testFramework],
    ...(request.featureName ? [`Feature under test: ${request.featureName}`] : []),
    "Requirements JSON:",
    compactJson(
      request.requirements.map((unit) => ({
        id: unit.id,
        text: unit.text,
        ...(unit.section ? { section: unit.section } : {}),
      }))
    ),
  ].join("\n");
}

/**
 * Builds the provider request for one generation run. Pure: equal requests and
 * settings give byte-identical payloads. Size limits are enforced here so an
 * oversized request never reaches the network.
 */
export function buildPrompt(request: GenerationRequest, settings: PromptSettings): PromptPayload {
  const { maxRequirements, maxPayloadChars } = settings.limits;

  if (request.requirements.length === 0) {
    throw new EmptyInputError();
  }

  if (request.requirements.length > maxRequirements) {
    throw new PayloadTooLargeError(
      `Too many requirements: ${request.requirements.length} (limit ${maxRequirements}).`,
      maxRequirements,
      request.requirements.length
    );
  }

  const system = buildSystemPrompt(request.options);
  const user = buildUserPrompt(request);
  const size = system.length + user.length;

  if (size > maxPayloadChars) {
    throw new PayloadTooLargeError(
      `Prompt is ${size} characters (limit ${maxPayloadChars}); split the requirements into smaller documents.`,
      maxPayloadChars,
      size
    );
  }

  return {
    system,
    user,
    parameters: {
      model: settings.model,
      maxTokens: settings.maxTokens,
      temperature: settings.temperature,
    },
  };
}
