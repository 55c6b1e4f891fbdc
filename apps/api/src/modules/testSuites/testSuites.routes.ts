import type { FastifyInstance } from "fastify";
import type { TestSuiteGenerator } from "@testforge/generator";
import { createTestSuitesController } from "./testSuites.controller";

export function registerTestSuitesRoutes(app: FastifyInstance, deps: { generator: TestSuiteGenerator }) {
  const controller = createTestSuitesController(deps);

  app.post("/test-suites", controller.createTestSuite); // Runs the pipeline once and returns its outcome.
  app.get("/generation-options/defaults", controller.getGenerationDefaults); // Options applied when a request omits them.
}
