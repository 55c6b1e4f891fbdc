import { config as loadDotenv } from "dotenv";
import { resolve } from "node:path";
import { loadPipelineConfig } from "../config";
import { createLogger } from "../logger";
import { createTestSuiteGenerator } from "../pipeline/generateTestSuite";
import { createGateway } from "../providers/createGateway";
import { CliUsageError, parseGenerateArgs } from "./args";
import { runBatch } from "./runBatch";

loadDotenv({ path: resolve(__dirname, "../../../../.env") });

async function main() {
  const args = parseGenerateArgs(process.argv.slice(2));
  const config = loadPipelineConfig();
  const logger = createLogger(config, { pretty: process.stdout.isTTY });
  const generator = createTestSuiteGenerator({ config, gateway: createGateway(config), logger });

  const summary = await runBatch(args, generator, logger);
  logger.info(summary.totals, `Summary written to ${resolve(args.outDir, "summary.json")}`);
  if (summary.totals.failed > 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error instanceof CliUsageError ? error.message : error);
  process.exit(1);
});
