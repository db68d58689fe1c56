import {
  type EntityErrorReport,
  SyncError,
  throwIfAborted,
  toSyncError
} from "../errors";
import { type Logger, silentLogger } from "../logger";
import { mapPage } from "../mapping/recordMapper";
import type { EntityDefinition } from "../types";
import { type BatchEmitter, createBatchEmitter } from "./batchEmitter";
import type { CursorStore, PageFetcher, SyncSink } from "./capabilities";
import {
  type PlannerOptions,
  type PlannerState,
  candidateCursor,
  createPlanner,
  isTerminal,
  transition
} from "./planner";
import type { ProgressLogger } from "./progressLogger";
import { fetchWithRetry } from "./retryController";
import type { SleepLike } from "./sleep";

export interface EntitySyncDependencies {
  fetcher: PageFetcher;
  sink: SyncSink;
  cursorStore: CursorStore;
  logger?: Logger;
  progress?: ProgressLogger;
  now?: () => number;
  sleep?: SleepLike;
  random?: () => number;
  createBatchToken?: (entityId: string, sequence: number) => string;
}

export interface RetrySettings {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface EntitySyncOptions {
  planner: PlannerOptions;
  retry: RetrySettings;
  batchMaxRows: number;
  batchMaxAgeMs: number;
  mappingErrorThreshold: number;
  signal?: AbortSignal;
}

export interface EntitySyncSummary {
  entityId: string;
  startCursor: string | null;
  finalCursor: string | null;
  pagesFetched: number;
  recordsFetched: number;
  rowsCommitted: number;
  mappingErrors: number;
  checkpoints: number;
  outOfOrder: number;
}

export type EntitySyncOutcome =
  | { status: "succeeded"; summary: EntitySyncSummary }
  | { status: "failed"; summary: EntitySyncSummary; report: EntityErrorReport };

/**
 * Drives one entity through the planner until it checkpoints or fails.
 * Never throws: every failure becomes a report carrying the last cursor
 * that was actually committed.
 */
export async function runEntitySync(
  entity: EntityDefinition,
  dependencies: EntitySyncDependencies,
  options: EntitySyncOptions
): Promise<EntitySyncOutcome> {
  const logger = dependencies.logger ?? silentLogger;
  const now = dependencies.now ?? Date.now;

  const summary: EntitySyncSummary = {
    entityId: entity.id,
    startCursor: null,
    finalCursor: null,
    pagesFetched: 0,
    recordsFetched: 0,
    rowsCommitted: 0,
    mappingErrors: 0,
    checkpoints: 0,
    outOfOrder: 0
  };

  let emitter: BatchEmitter | null = null;

  const flushOrThrow = async (active: BatchEmitter, cursor: string | null): Promise<void> => {
    const flushed = await active.flush(cursor);

    if (!flushed.ok) {
      throw new SyncError(
        "commit",
        `Checkpoint failed at ${flushed.error.stage}: ${flushed.error.message}`
      );
    }

    if (!flushed.value.flushed) {
      return;
    }

    summary.checkpoints += 1;
    summary.rowsCommitted += flushed.value.rowCount;
    dependencies.progress?.onFlush(entity.id, flushed.value.rowCount, flushed.value.cursor);
    logger.debug(
      `batch flushed (entity=${entity.id}, rows=${flushed.value.rowCount}, upserted=${flushed.value.upserted}, deleted=${flushed.value.deleted}, cursor=${flushed.value.cursor ?? "null"})`
    );
  };

  try {
    throwIfAborted(options.signal);

    const cursor = await dependencies.cursorStore.load(entity.id);
    summary.startCursor = cursor.value;
    summary.finalCursor = cursor.value;

    const active = createBatchEmitter({
      entityId: entity.id,
      schema: entity.schema,
      sink: dependencies.sink,
      cursorStore: dependencies.cursorStore,
      committedCursor: cursor.value,
      maxRows: options.batchMaxRows,
      maxAgeMs: options.batchMaxAgeMs,
      now,
      createBatchToken: dependencies.createBatchToken
    });
    emitter = active;

    let state: PlannerState = transition(
      createPlanner(entity, cursor.value, options.planner),
      { type: "start", now: now() }
    );

    while (!isTerminal(state)) {
      throwIfAborted(options.signal);

      switch (state.phase) {
        case "fetching": {
          const request = state.request;
          const result = await fetchWithRetry(dependencies.fetcher, request, {
            ...options.retry,
            sleep: dependencies.sleep,
            random: dependencies.random,
            signal: options.signal,
            onRetry(failure, attempt, delayMs) {
              logger.warn(
                `fetch retry scheduled (entity=${entity.id}, page=${request.pageNumber}, attempt=${attempt}, delayMs=${delayMs}, status=${failure.status ?? "none"}, reason=${failure.message})`
              );
            }
          });

          if (!result.ok) {
            state = transition(state, { type: "fetch-failed", failure: result.error });
            break;
          }

          summary.pagesFetched += 1;
          summary.recordsFetched += result.value.records.length;
          dependencies.progress?.onPage(entity.id, result.value.records.length);
          logger.debug(
            `page fetched (entity=${entity.id}, page=${request.pageNumber}, window=${request.window.start}..${request.window.end}, size=${result.value.records.length}, nextToken=${result.value.continuationToken ?? "null"})`
          );
          state = transition(state, { type: "page-fetched", page: result.value });
          break;
        }

        case "paginating": {
          const { page, request } = state;
          const mapped = mapPage(page.records, entity.schema, options.mappingErrorThreshold);

          for (const error of mapped.errors) {
            logger.warn(
              `mapping error (entity=${entity.id}, page=${request.pageNumber}, column=${error.column ?? "none"}, reason=${error.reason})`
            );
          }

          if (mapped.errors.length > 0) {
            summary.mappingErrors += mapped.errors.length;
            dependencies.progress?.onMappingErrors(entity.id, mapped.errors.length);
          }

          if (mapped.thresholdExceeded) {
            state = transition(state, {
              type: "page-rejected",
              error: new SyncError(
                "mapping_threshold",
                `Mapping error threshold exceeded on page ${request.pageNumber}: ${mapped.errors.length} of ${page.records.length} records failed (threshold=${options.mappingErrorThreshold})`
              )
            });
            break;
          }

          for (const operation of mapped.operations) {
            active.add(operation);
          }

          state = transition(state, {
            type: "page-forwarded",
            orderingValues: mapped.operations.map((operation) => operation.orderingValue)
          });

          if (state.phase === "fetching" && active.isFlushDue()) {
            await flushOrThrow(active, candidateCursor(state.context));
          }
          break;
        }

        case "checkpointing": {
          await flushOrThrow(active, state.cursor);
          summary.outOfOrder = state.context.outOfOrder;
          state = transition(state, { type: "checkpointed" });
          break;
        }

        case "idle":
        case "failed":
          throw new Error(`Planner stalled in ${state.phase}`);
      }
    }

    summary.finalCursor = active.committedCursor();

    if (state.phase === "failed") {
      throw state.error;
    }

    if (summary.outOfOrder > 0) {
      logger.warn(
        `out-of-order records observed (entity=${entity.id}, count=${summary.outOfOrder})`
      );
    }

    logger.info(
      `entity sync complete (entity=${entity.id}, pages=${summary.pagesFetched}, records=${summary.recordsFetched}, committed=${summary.rowsCommitted}, mappingErrors=${summary.mappingErrors}, checkpoints=${summary.checkpoints}, cursor=${summary.finalCursor ?? "null"})`
    );

    return { status: "succeeded", summary };
  } catch (error) {
    const syncError = toSyncError(error);
    summary.finalCursor = emitter?.committedCursor() ?? summary.startCursor;

    const report: EntityErrorReport = {
      entityId: entity.id,
      errorKind: syncError.kind,
      message: syncError.message,
      lastGoodCursor: summary.finalCursor
    };

    logger.error(
      `entity sync failed (entity=${entity.id}, kind=${report.errorKind}, lastGoodCursor=${report.lastGoodCursor ?? "null"}, discardedRows=${emitter?.pendingCount() ?? 0}): ${report.message}`
    );

    return { status: "failed", summary, report };
  }
}
