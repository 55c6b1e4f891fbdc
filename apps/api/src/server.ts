import { config as loadDotenv } from "dotenv";
import { resolve } from "node:path";
import { createGateway, createLogger, createTestSuiteGenerator, loadPipelineConfig } from "@testforge/generator";
import { buildApp } from "./app";

loadDotenv({ path: resolve(__dirname, "../../../.env") });

async function start() {
  const config = loadPipelineConfig();
  const logger = createLogger(config);
  const generator = createTestSuiteGenerator({ config, gateway: createGateway(config), logger });
  const app = buildApp({ generator, logger });

  const port = Number(process.env.PORT ?? 3001);
  const host = "0.0.0.0";

  await app.listen({ port, host });
}

start().catch((err) => {
  console.error(err);
  process.exit(1);
});
