import { createRefreshTokenAuth } from "./api/auth";
import { createWeatherClient } from "./api/weatherClient";
import { createPostgresCursorStore } from "./db/cursorStore";
import { runMigrations } from "./db/migrations";
import { createPool } from "./db/pool";
import { createPostgresSink } from "./db/sinkWriter";
import type { Logger } from "./logger";
import { defineObservationEntity } from "./mapping/weatherSchema";
import { createMemorySyncStore } from "./store/memoryStore";
import type { CursorStore, PageFetcher, SyncSink } from "./sync/capabilities";
import type { RunSyncOptions } from "./sync/syncRunner";
import type { ConnectorConfig } from "./types";

export interface OpenedStores {
  sink: SyncSink;
  cursorStore: CursorStore;
  close: () => Promise<void>;
}

export function buildRunOptions(config: ConnectorConfig): RunSyncOptions {
  return {
    entities: config.locations.map(defineObservationEntity),
    concurrency: config.syncConcurrency,
    deadlineMs: config.syncDeadlineMs,
    planner: {
      windowHours: config.windowHours,
      lookbackDays: config.lookbackDays,
      pageLimit: config.apiPageLimit,
      cursorPolicy: config.cursorPolicy
    },
    retry: {
      maxRetries: config.apiMaxRetries,
      baseDelayMs: config.apiRetryBaseMs,
      maxDelayMs: config.apiRetryMaxMs
    },
    batchMaxRows: config.batchMaxRows,
    batchMaxAgeMs: config.batchMaxAgeMs,
    mappingErrorThreshold: config.mappingErrorThreshold
  };
}

export function createFetcher(config: ConnectorConfig): PageFetcher {
  return createWeatherClient(config, {
    auth: config.oauth ? createRefreshTokenAuth(config.oauth) : undefined
  });
}

export async function openStores(config: ConnectorConfig, logger: Logger): Promise<OpenedStores> {
  if (config.sinkMode === "memory") {
    logger.warn("sink mode is memory: rows and cursors are discarded at exit");
    const store = createMemorySyncStore();
    return {
      sink: store.sink,
      cursorStore: store.cursorStore,
      close: async () => undefined
    };
  }

  const pool = createPool(config.databaseUrl, Math.max(2, config.syncConcurrency * 2));

  try {
    const applied = await runMigrations(pool);
    logger.info(`migrations applied (count=${applied.length}${applied.length > 0 ? `, names=${applied.join(",")}` : ""})`);
  } catch (error) {
    await pool.end();
    throw error;
  }

  return {
    sink: createPostgresSink(pool),
    cursorStore: createPostgresCursorStore(pool),
    close: () => pool.end()
  };
}
