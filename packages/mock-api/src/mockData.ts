export interface MockObservation {
  location_id: string;
  observed_at: string;
  temperature_c: string;
  humidity_pct: number;
  wind_speed_kph: number;
  precipitation_mm: number | null;
  conditions: string;
}

export interface MockObservationsPage {
  observations: MockObservation[];
  next_page_token: string | null;
  watermark: string;
}

export interface ObservationQuery {
  start: string;
  end: string;
  limit: number;
  pageToken: string | null;
}

const HOUR_MS = 60 * 60 * 1000;
const CONDITIONS = ["clear", "cloudy", "rain", "fog", "snow"];

export function buildMockObservations(
  locationId: string,
  startMs: number,
  total: number
): MockObservation[] {
  const observations: MockObservation[] = [];

  for (let index = 0; index < total; index += 1) {
    const condition = CONDITIONS[index % CONDITIONS.length];

    observations.push({
      location_id: locationId,
      observed_at: new Date(startMs + index * HOUR_MS).toISOString(),
      temperature_c: (10 + Math.sin(index / 6) * 8).toFixed(1),
      humidity_pct: 40 + (index % 50),
      wind_speed_kph: (index * 7) % 40,
      precipitation_mm: condition === "rain" || condition === "snow" ? (index % 9) / 2 : null,
      conditions: condition
    });
  }

  return observations;
}

function encodePageToken(offset: number): string {
  return Buffer.from(String(offset), "utf8").toString("base64");
}

function decodePageToken(token: string): number {
  const decoded = Buffer.from(token, "base64").toString("utf8");
  const parsed = Number.parseInt(decoded, 10);

  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`Invalid page token: ${token}`);
  }

  return parsed;
}

/** Serves `[start, end)` in ascending time order, `limit` records per page. */
export function paginateObservations(
  observations: MockObservation[],
  query: ObservationQuery
): MockObservationsPage {
  const inWindow = observations.filter(
    (observation) => observation.observed_at >= query.start && observation.observed_at < query.end
  );
  const offset = query.pageToken ? decodePageToken(query.pageToken) : 0;
  const endIndex = Math.min(offset + Math.max(query.limit, 1), inWindow.length);
  const hasMore = endIndex < inWindow.length;

  return {
    observations: inWindow.slice(offset, endIndex),
    next_page_token: hasMore ? encodePageToken(endIndex) : null,
    watermark: query.end
  };
}
