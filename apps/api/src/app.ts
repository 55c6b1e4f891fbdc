import Fastify, { type FastifyBaseLogger } from "fastify";
import type { Logger, TestSuiteGenerator } from "@testforge/generator";
import { registerTestSuitesRoutes } from "./modules/testSuites/testSuites.routes";

export function buildApp(deps: { generator: TestSuiteGenerator; logger: Logger }) {
  const loggerInstance: FastifyBaseLogger = deps.logger;
  const app = Fastify({ loggerInstance });

  app.get("/health", async () => ({ ok: true }));

  registerTestSuitesRoutes(app, { generator: deps.generator });

  return app;
}
