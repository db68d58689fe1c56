export { createApiKeyAuth, createRefreshTokenAuth } from "./api/auth";
export type { AuthProvider } from "./api/auth";
export { buildObservationsUrl, createWeatherClient } from "./api/weatherClient";
export { buildRunOptions, createFetcher, openStores } from "./app";
export { loadConfig } from "./config";
export { createPostgresCursorStore } from "./db/cursorStore";
export { runMigrations } from "./db/migrations";
export { createPostgresSink } from "./db/sinkWriter";
export * from "./errors";
export { createLogger } from "./logger";
export type { Logger } from "./logger";
export { mapPage, mapRecord } from "./mapping/recordMapper";
export {
  defineObservationEntity,
  hourlyObservationsSchema,
  observationEntityId
} from "./mapping/weatherSchema";
export type { Result } from "./result";
export { createMemorySyncStore } from "./store/memoryStore";
export { createBatchEmitter } from "./sync/batchEmitter";
export type { BatchEmitter, FlushOutcome } from "./sync/batchEmitter";
export type {
  CursorStore,
  FetchResult,
  PageFetcher,
  SinkBatch,
  SinkWriteResult,
  SyncSink
} from "./sync/capabilities";
export { runEntitySync } from "./sync/entitySync";
export type { EntitySyncOutcome, EntitySyncSummary } from "./sync/entitySync";
export { candidateCursor, createPlanner, finalCursor, transition } from "./sync/planner";
export type { PlannerEvent, PlannerState } from "./sync/planner";
export { fetchWithRetry } from "./sync/retryController";
export { runSync } from "./sync/syncRunner";
export type { RunSyncOptions, SyncRunResult } from "./sync/syncRunner";
export type * from "./types";
