import type { FastifyReply, FastifyRequest } from "fastify";
import type { GenerationOptions, Outcome } from "@testforge/shared";
import type { TestSuiteGenerator } from "@testforge/generator";

import {
  CreateTestSuiteRequestSchema,
  GenerationDefaultsResponseSchema,
  type GenerationOptionsBody,
} from "./testSuites.dtos";

// 499 follows the nginx convention for a client that went away mid-request.
export function statusCodeFor(outcome: Outcome): number {
  switch (outcome.status) {
    case "success":
      return 200;
    case "bad_request":
      return 400;
    case "generation_failed":
      return 422;
    case "cancelled":
      return 499;
    case "upstream_failure":
      if (outcome.reason === "timeout" || outcome.reason === "deadline_exceeded") {
        return 504;
      }
      return outcome.reason === "rate_limit" ? 503 : 502;
  }
}

function toGenerationOptions(body: GenerationOptionsBody | undefined) {
  if (!body) {
    return undefined;
  }
  return Object.fromEntries(
    Object.entries({
      testFramework: body.test_framework,
      coverageLevel: body.coverage_level,
      language: body.language,
      maxTestsPerRequirement: body.max_tests_per_requirement,
    }).filter(([, value]) => value !== undefined)
  );
}

function toOptionsBody(options: GenerationOptions) {
  return {
    test_framework: options.testFramework,
    coverage_level: options.coverageLevel,
    language: options.language,
    max_tests_per_requirement: options.maxTestsPerRequirement,
  };
}

export function createTestSuitesController(deps: { generator: TestSuiteGenerator }) {
  const { generator } = deps;

  return {
    async createTestSuite(request: FastifyRequest, reply: FastifyReply) {
      const parsed = CreateTestSuiteRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.code(400).send({ error: "bad_request", issues: parsed.error.issues });
      }
      const input = parsed.data;

      // Aborts the run when the client disconnects before the reply is written.
      const disconnect = new AbortController();
      const onClose = () => {
        if (!reply.raw.writableFinished) {
          disconnect.abort();
        }
      };
      reply.raw.on("close", onClose);

      try {
        const outcome = await generator.generate({
          requirementsText: input.requirements_text,
          options: toGenerationOptions(input.options),
          format: input.format,
          deadlineMs: input.deadline_ms,
          featureName: input.feature_name,
          signal: disconnect.signal,
        });
        request.log.info({ requestId: outcome.requestId, status: outcome.status }, "Generation finished");
        return reply.code(statusCodeFor(outcome)).send(outcome);
      } finally {
        reply.raw.off("close", onClose);
      }
    },

    async getGenerationDefaults(_request: FastifyRequest, reply: FastifyReply) {
      return reply.send(GenerationDefaultsResponseSchema.parse(toOptionsBody(generator.defaultOptions())));
    },
  };
}
