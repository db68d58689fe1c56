import { ok } from "../src/result";
import type { FetchResult, PageFetcher } from "../src/sync/capabilities";
import type { PageRequest, RowOperation } from "../src/types";

export function observationOperation(
  observedAt: string,
  temperature: number | null = 1,
  kind: RowOperation["kind"] = "upsert"
): RowOperation {
  const key = { location_id: "oslo", observed_at: observedAt };

  return {
    kind,
    primaryKey: JSON.stringify(["oslo", observedAt]),
    key,
    values: kind === "delete" ? { ...key } : { ...key, temperature_c: temperature },
    orderingValue: observedAt
  };
}

export interface FakeObservationsApi extends PageFetcher {
  requests: PageRequest[];
}

/**
 * Serves `records` the way the observations endpoint does: filtered to the
 * requested `[start, end)` window, ascending, `limit` per page with an offset
 * token.
 */
export function createFakeObservationsApi(records: Array<Record<string, unknown>>): FakeObservationsApi {
  const requests: PageRequest[] = [];

  return {
    requests,
    async fetchPage(request: PageRequest): Promise<FetchResult> {
      requests.push(request);

      const startMs = Date.parse(request.window.start);
      const endMs = Date.parse(request.window.end);
      const inWindow = records.filter((record) => {
        const observedMs = Date.parse(String(record.observed_at));
        return observedMs >= startMs && observedMs < endMs;
      });
      const offset = request.continuationToken
        ? Number.parseInt(request.continuationToken.replace("offset:", ""), 10)
        : 0;
      const next = offset + request.limit;

      return ok({
        records: inWindow.slice(offset, next),
        continuationToken: next < inWindow.length ? `offset:${next}` : null,
        watermark: request.window.end
      });
    }
  };
}

export function observation(
  observedAt: string,
  temperature = 1,
  locationId = "oslo"
): Record<string, unknown> {
  return { location_id: locationId, observed_at: observedAt, temperature_c: temperature };
}
