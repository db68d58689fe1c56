import { buildRunOptions, createFetcher, openStores } from "./app";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { createProgressLogger } from "./sync/progressLogger";
import { runSync } from "./sync/syncRunner";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const runOptions = buildRunOptions(config);
  const stores = await openStores(config, logger);

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn(`received ${signal}, cancelling in-flight syncs`);
    controller.abort(new Error(signal));
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  const progress = createProgressLogger({
    intervalMs: config.progressLogIntervalMs,
    log: logger.info
  });

  logger.info(
    `weather sync started (sink=${config.sinkMode}, entities=${runOptions.entities.map((entity) => entity.id).join(",")}, concurrency=${runOptions.concurrency})`
  );

  try {
    const result = await runSync(
      {
        fetcher: createFetcher(config),
        sink: stores.sink,
        cursorStore: stores.cursorStore,
        logger,
        progress
      },
      { ...runOptions, signal: controller.signal }
    );

    progress.flush();

    for (const report of result.failed) {
      logger.error(`entity error report ${JSON.stringify(report)}`);
    }

    logger.info(
      `weather sync complete (succeeded=${result.succeeded.length}, failed=${result.failed.length}, cancelled=${result.cancelled})`
    );

    if (result.failed.length > 0) {
      process.exitCode = 1;
    }
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await stores.close();
  }
}

main().catch((error: unknown) => {
  console.error("weather sync failed", error);
  process.exit(1);
});
