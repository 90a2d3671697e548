import { config } from "./reporting/config.js";
import { logger } from "./reporting/logger.js";
import { ReportingApp } from "./reporting/app.js";

async function main(): Promise<void> {
  const app = new ReportingApp();

  try {
    await app.start();
    logger.info(
      {
        httpPort: config.HTTP_PORT,
        metricsPort: config.PROMETHEUS_PORT,
        dataset: config.DATASET_PATH,
      },
      "Reporting service started",
    );
  } catch (error) {
    logger.error({ error }, "Failed to start reporting service");
    process.exit(1);
  }
}

void main();
