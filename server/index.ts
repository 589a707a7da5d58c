import { getEngineConfig } from "./config/engineConfig";
import { getCanonicalMappings } from "./services/canonicalMapper";
import { startInsightsScheduler, stopInsightsScheduler } from "./services/insightsScheduler";
import { logger } from "./utils/logger";

// Worker process: validates configuration, loads the mapping table and runs
// the insight scheduler until it receives SIGINT or SIGTERM.
(async () => {
  const config = getEngineConfig();
  if (!config.DATABASE_URL) {
    throw new Error("DATABASE_URL must be set to run the engine worker");
  }

  // Fail fast on a broken mapping table rather than on the first upload
  getCanonicalMappings();

  startInsightsScheduler();
  logger.info(`Engine worker started (default timezone ${config.DEFAULT_TIMEZONE})`);

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, stopping scheduler`);
    stopInsightsScheduler()
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error("Error while stopping scheduler", error);
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
})().catch((error) => {
  logger.error("Engine worker failed to start", error);
  process.exit(1);
});
