import { describe, it, expect } from "vitest";
import { GenerationOptionsSchema, type GenerationOptionsInput, type GenerationRequest } from "@testforge/shared";
import { EmptyInputError, PayloadTooLargeError } from "../errors";
import { normalizeRequirements } from "../normalizer/normalizeRequirements";
import { buildPrompt, OUTPUT_SHAPE_EXAMPLE, type PromptSettings } from "./buildPrompt";

const settings: PromptSettings = {
  model: "test-model",
  maxTokens: 2048,
  temperature: 0,
  limits: { maxRequirements: 50, maxPayloadChars: 15000 },
};

function makeRequest(options: GenerationOptionsInput = {}, featureName?: string): GenerationRequest {
  return {
    requirements: normalizeRequirements(
      "# Login\n1. User can log in with valid credentials.\n2. User sees error on invalid password."
    ),
    options: GenerationOptionsSchema.parse(options),
    ...(featureName ? { featureName } : {}),
  };
}

describe("buildPrompt", () => {
  it("produces byte-identical payloads for identical requests", () => {
    const first = JSON.stringify(buildPrompt(makeRequest({ coverageLevel: "thorough" }), settings));
    const second = JSON.stringify(buildPrompt(makeRequest({ coverageLevel: "thorough" }), settings));
    expect(first).toBe(second);
  });

  it("embeds the output shape and every requirement with its id", () => {
    const payload = buildPrompt(makeRequest(), settings);

    expect(payload.user).toContain(`Return JSON with this exact shape: ${OUTPUT_SHAPE_EXAMPLE}`);
    expect(payload.user).toContain("In analysis, list the risks and the assumptions you made");
    expect(payload.user).toContain(
      '[{"id":"1","text":"User can log in with valid credentials.","section":"Login"},{"id":"2","text":"User sees error on invalid password.","section":"Login"}]'
    );
    expect(payload.parameters).toEqual({ model: "test-model", maxTokens: 2048, temperature: 0 });
  });

  it("turns coverage level into different instructions", () => {
    const basic = buildPrompt(makeRequest({ coverageLevel: "basic" }), settings).user;
    const thorough = buildPrompt(makeRequest({ coverageLevel: "thorough" }), settings).user;

    expect(basic).toContain("Coverage level: basic.");
    expect(basic).toContain("Use category only from functional, negative.");
    expect(basic).not.toContain("boundary values");
    expect(thorough).toContain("Coverage level: thorough.");
    expect(thorough).toContain("the negative paths and the boundary values.");
    expect(thorough).toContain("Write between 2 and 3 test cases per requirement.");
  });

  it("renders framework, language, limits and feature name as instructions", () => {
    const payload = buildPrompt(
      makeRequest({ testFramework: "bdd", language: "pt-BR", maxTestsPerRequirement: 5 }, "Checkout"),
      settings
    );

    expect(payload.system).toContain("in this language: pt-BR.");
    expect(payload.user).toContain("every step starts with Given, When, And or Then.");
    expect(payload.user).toContain("Write between 1 and 5 test cases per requirement.");
    expect(payload.user).toContain("Feature under test: Checkout");
  });

  it("refuses a request without requirements", () => {
    expect(() => buildPrompt({ ...makeRequest(), requirements: [] }, settings)).toThrow(EmptyInputError);
  });

  it("rejects too many requirements before building anything", () => {
    const build = () =>
      buildPrompt(makeRequest(), { ...settings, limits: { maxRequirements: 1, maxPayloadChars: 15000 } });

    expect(build).toThrow(PayloadTooLargeError);
    expect(build).toThrow("Too many requirements: 2 (limit 1).");
  });

  it("rejects payloads over the character limit", () => {
    try {
      buildPrompt(makeRequest(), { ...settings, limits: { maxRequirements: 50, maxPayloadChars: 100 } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PayloadTooLargeError);
      if (err instanceof PayloadTooLargeError) {
        expect(err.limit).toBe(100);
        expect(err.actual).toBeGreaterThan(100);
        expect(err.category).toBe("input");
      }
    }
  });
});
