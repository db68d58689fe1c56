import type { EntityDefinition, TableSchema } from "../types";

export const HOURLY_OBSERVATIONS_TABLE = "hourly_observations";

export const hourlyObservationsSchema: TableSchema = {
  table: HOURLY_OBSERVATIONS_TABLE,
  primaryKey: ["location_id", "observed_at"],
  orderingColumn: "observed_at",
  deletedFlagField: "deleted",
  columns: {
    location_id: {
      type: "STRING",
      nullable: false,
      sourceFields: ["location_id", "locationId", "station"]
    },
    observed_at: {
      type: "UTC_DATETIME",
      nullable: false,
      sourceFields: ["observed_at", "observedAt", "timestamp", "time"]
    },
    temperature_c: {
      type: "DOUBLE",
      nullable: true,
      sourceFields: ["temperature_c", "temperatureC", "temp"]
    },
    humidity_pct: {
      type: "DOUBLE",
      nullable: true,
      sourceFields: ["humidity_pct", "humidityPct", "humidity"]
    },
    wind_speed_kph: {
      type: "DOUBLE",
      nullable: true,
      sourceFields: ["wind_speed_kph", "windSpeedKph", "wind_speed"]
    },
    precipitation_mm: {
      type: "DOUBLE",
      nullable: true,
      sourceFields: ["precipitation_mm", "precipitationMm", "precip"]
    },
    conditions: {
      type: "STRING",
      nullable: true,
      sourceFields: ["conditions", "summary"]
    }
  }
};

export function observationEntityId(locationId: string): string {
  return `${HOURLY_OBSERVATIONS_TABLE}:${locationId}`;
}

export function defineObservationEntity(locationId: string): EntityDefinition {
  const trimmed = locationId.trim();
  if (trimmed.length === 0) {
    throw new Error("Invalid location id: must not be empty");
  }

  return {
    id: observationEntityId(trimmed),
    locationId: trimmed,
    schema: hourlyObservationsSchema
  };
}
