import type { EntityErrorReport } from "../errors";
import type { EntityDefinition } from "../types";
import {
  type EntitySyncDependencies,
  type EntitySyncOptions,
  type EntitySyncOutcome,
  type EntitySyncSummary,
  runEntitySync
} from "./entitySync";

export interface RunSyncOptions extends Omit<EntitySyncOptions, "signal"> {
  entities: EntityDefinition[];
  concurrency: number;
  /** Zero or negative means no deadline. */
  deadlineMs?: number;
  signal?: AbortSignal;
}

export interface SyncRunResult {
  succeeded: EntitySyncSummary[];
  failed: EntityErrorReport[];
  cancelled: boolean;
}

function uniqueEntities(entities: EntityDefinition[]): EntityDefinition[] {
  const seen = new Map<string, EntityDefinition>();

  for (const entity of entities) {
    if (!seen.has(entity.id)) {
      seen.set(entity.id, entity);
    }
  }

  return [...seen.values()];
}

function linkRunSignal(
  controller: AbortController,
  signal: AbortSignal | undefined,
  deadlineMs: number | undefined
): () => void {
  const onAbort = (): void => {
    controller.abort(signal?.reason);
  };

  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }

  const deadlineId =
    deadlineMs !== undefined && deadlineMs > 0
      ? setTimeout(() => {
          controller.abort(new Error(`deadline of ${deadlineMs}ms exceeded`));
        }, deadlineMs)
      : null;

  return () => {
    signal?.removeEventListener("abort", onAbort);
    if (deadlineId !== null) {
      clearTimeout(deadlineId);
    }
  };
}

/**
 * Syncs each entity in its own task, at most `concurrency` at a time. One
 * entity failing, or being cancelled, leaves the others untouched.
 */
export async function runSync(
  dependencies: EntitySyncDependencies,
  options: RunSyncOptions
): Promise<SyncRunResult> {
  const entities = uniqueEntities(options.entities);
  const controller = new AbortController();
  const unlink = linkRunSignal(controller, options.signal, options.deadlineMs);
  const outcomes: Array<EntitySyncOutcome | undefined> = new Array(entities.length);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < entities.length) {
      const index = nextIndex;
      nextIndex += 1;

      outcomes[index] = await runEntitySync(entities[index], dependencies, {
        planner: options.planner,
        retry: options.retry,
        batchMaxRows: options.batchMaxRows,
        batchMaxAgeMs: options.batchMaxAgeMs,
        mappingErrorThreshold: options.mappingErrorThreshold,
        signal: controller.signal
      });
    }
  };

  try {
    const workerCount = Math.min(Math.max(1, options.concurrency), entities.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
  } finally {
    unlink();
  }

  const result: SyncRunResult = {
    succeeded: [],
    failed: [],
    cancelled: controller.signal.aborted
  };

  for (const outcome of outcomes) {
    if (!outcome) {
      continue;
    }

    if (outcome.status === "succeeded") {
      result.succeeded.push(outcome.summary);
    } else {
      result.failed.push(outcome.report);
    }
  }

  return result;
}
