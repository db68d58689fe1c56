import { type FetchFailure, SyncError } from "../errors";
import type { CursorPolicy, EntityDefinition, Page, PageRequest, SyncWindow } from "../types";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface PlannerOptions {
  windowHours: number;
  lookbackDays: number;
  pageLimit: number;
  cursorPolicy: CursorPolicy;
}

export interface PlannerContext {
  entityId: string;
  locationId: string;
  options: PlannerOptions;
  startCursor: string | null;
  runUntil: string | null;
  pagesFetched: number;
  recordsSeen: number;
  maxObserved: string | null;
  watermark: string | null;
  outOfOrder: number;
  completed: boolean;
}

export type PlannerState =
  | { phase: "idle"; context: PlannerContext }
  | { phase: "fetching"; context: PlannerContext; request: PageRequest }
  | { phase: "paginating"; context: PlannerContext; request: PageRequest; page: Page }
  | { phase: "checkpointing"; context: PlannerContext; cursor: string | null }
  | { phase: "failed"; context: PlannerContext; error: SyncError };

export type PlannerEvent =
  | { type: "start"; now: number }
  | { type: "page-fetched"; page: Page }
  | { type: "fetch-failed"; failure: FetchFailure }
  | { type: "page-forwarded"; orderingValues: string[] }
  | { type: "page-rejected"; error: SyncError }
  | { type: "checkpointed" };

export function maxCursor(left: string | null, right: string | null): string | null {
  if (left === null) {
    return right;
  }

  if (right === null) {
    return left;
  }

  return right > left ? right : left;
}

function minIso(left: string, right: string): string {
  return left < right ? left : right;
}

function addHours(iso: string, hours: number): string {
  return new Date(Date.parse(iso) + hours * HOUR_MS).toISOString();
}

export function createPlanner(
  entity: Pick<EntityDefinition, "id" | "locationId">,
  startCursor: string | null,
  options: PlannerOptions
): PlannerState {
  return {
    phase: "idle",
    context: {
      entityId: entity.id,
      locationId: entity.locationId,
      options,
      startCursor,
      runUntil: null,
      pagesFetched: 0,
      recordsSeen: 0,
      maxObserved: null,
      watermark: null,
      outOfOrder: 0,
      completed: false
    }
  };
}

/**
 * Cursor that is safe to commit once everything fetched so far is durable.
 * Equal to the largest emitted ordering value, so records sharing that value
 * on a later page are re-read next run rather than skipped.
 */
export function candidateCursor(context: PlannerContext): string | null {
  return maxCursor(context.startCursor, context.maxObserved);
}

export function finalCursor(context: PlannerContext): string | null {
  const observed = candidateCursor(context);

  if (
    context.options.cursorPolicy !== "upstream-watermark" ||
    context.watermark === null ||
    context.runUntil === null
  ) {
    return observed;
  }

  return maxCursor(observed, minIso(context.watermark, context.runUntil));
}

function buildRequest(
  context: PlannerContext,
  window: SyncWindow,
  continuationToken: string | null
): PageRequest {
  return {
    entityId: context.entityId,
    locationId: context.locationId,
    window,
    limit: context.options.pageLimit,
    continuationToken,
    pageNumber: context.pagesFetched + 1
  };
}

function windowFrom(start: string, context: PlannerContext, runUntil: string): SyncWindow {
  return {
    start,
    end: minIso(addHours(start, context.options.windowHours), runUntil)
  };
}

function nextWindowOrCheckpoint(context: PlannerContext, current: SyncWindow): PlannerState {
  const runUntil = context.runUntil;

  if (runUntil === null || current.end >= runUntil) {
    return { phase: "checkpointing", context, cursor: finalCursor(context) };
  }

  return {
    phase: "fetching",
    context,
    request: buildRequest(context, windowFrom(current.end, context, runUntil), null)
  };
}

function invalidTransition(state: PlannerState, event: PlannerEvent): never {
  throw new Error(`Invalid planner transition: ${event.type} while ${state.phase}`);
}

export function transition(state: PlannerState, event: PlannerEvent): PlannerState {
  switch (state.phase) {
    case "idle": {
      if (event.type !== "start" || state.context.completed) {
        return invalidTransition(state, event);
      }

      const runUntil = new Date(event.now).toISOString();
      const context: PlannerContext = { ...state.context, runUntil };
      const lookbackStart = new Date(
        event.now - context.options.lookbackDays * DAY_MS
      ).toISOString();
      const windowStart = context.startCursor ?? lookbackStart;

      if (windowStart >= runUntil) {
        return { phase: "checkpointing", context, cursor: finalCursor(context) };
      }

      return {
        phase: "fetching",
        context,
        request: buildRequest(context, windowFrom(windowStart, context, runUntil), null)
      };
    }

    case "fetching": {
      if (event.type === "fetch-failed") {
        return {
          phase: "failed",
          context: state.context,
          error: new SyncError("fatal_fetch", event.failure.message)
        };
      }

      if (event.type !== "page-fetched") {
        return invalidTransition(state, event);
      }

      const { page } = event;
      const context: PlannerContext = {
        ...state.context,
        pagesFetched: state.context.pagesFetched + 1,
        watermark: page.watermark ?? state.context.watermark
      };

      if (
        page.continuationToken !== null &&
        page.continuationToken === state.request.continuationToken
      ) {
        return {
          phase: "failed",
          context,
          error: new SyncError(
            "invalid_pagination",
            "Invalid pagination state: continuation token did not advance"
          )
        };
      }

      if (page.records.length > 0) {
        return { phase: "paginating", context, request: state.request, page };
      }

      if (page.continuationToken !== null) {
        return {
          phase: "fetching",
          context,
          request: buildRequest(context, state.request.window, page.continuationToken)
        };
      }

      return nextWindowOrCheckpoint(context, state.request.window);
    }

    case "paginating": {
      if (event.type === "page-rejected") {
        return { phase: "failed", context: state.context, error: event.error };
      }

      if (event.type !== "page-forwarded") {
        return invalidTransition(state, event);
      }

      let maxObserved = state.context.maxObserved;
      let outOfOrder = state.context.outOfOrder;

      for (const value of event.orderingValues) {
        if (maxObserved !== null && value < maxObserved) {
          outOfOrder += 1;
        }
        maxObserved = maxCursor(maxObserved, value);
      }

      const context: PlannerContext = {
        ...state.context,
        recordsSeen: state.context.recordsSeen + event.orderingValues.length,
        maxObserved,
        outOfOrder
      };

      if (state.page.continuationToken !== null) {
        return {
          phase: "fetching",
          context,
          request: buildRequest(context, state.request.window, state.page.continuationToken)
        };
      }

      return nextWindowOrCheckpoint(context, state.request.window);
    }

    case "checkpointing": {
      if (event.type !== "checkpointed") {
        return invalidTransition(state, event);
      }

      return { phase: "idle", context: { ...state.context, completed: true } };
    }

    case "failed":
      return invalidTransition(state, event);
  }
}

export function isTerminal(state: PlannerState): boolean {
  return state.phase === "failed" || (state.phase === "idle" && state.context.completed);
}
