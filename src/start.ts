import { loadConfig } from "./config.js";
import { loadDataset, type Dataset } from "./db.js";
import { makeLogger } from "./logger.js";
import { buildServer } from "./server.js";

const logger = makeLogger();

let dataset: Dataset | null = null;
let app: Awaited<ReturnType<typeof buildServer>> | null = null;

async function cleanup(): Promise<void> {
  if (app) {
    await app.close();
    app = null;
  }
  if (dataset) {
    dataset.close();
    dataset = null;
  }
}

function exitAfterCleanup(code: number): void {
  cleanup()
    .catch((err: unknown) => {
      logger.error({ err }, "cleanup failed");
    })
    .finally(() => process.exit(code));
}

// Handle exit
process.on("SIGINT", () => {
  logger.info({ signal: "SIGINT" }, "shutting down");
  exitAfterCleanup(0);
});

process.on("SIGTERM", () => {
  logger.info({ signal: "SIGTERM" }, "shutting down");
  exitAfterCleanup(0);
});

// Load once, then serve
async function main(): Promise<void> {
  const config = loadConfig();
  dataset = await loadDataset(config.dataFiles, logger);
  if (dataset.isEmpty) {
    logger.warn({ files: config.dataFiles }, "no records loaded; analytics endpoints will return {}");
  }

  app = await buildServer({ dataset, logger, corsOrigin: config.corsOrigin });
  const address = await app.listen({ port: config.port, host: config.host });
  logger.info({ address, records: dataset.size }, "prompt analytics API listening");
}

main().catch((err: unknown) => {
  logger.error({ err }, "failed to start");
  exitAfterCleanup(1);
});
