export type ColumnType =
  | "STRING"
  | "INT"
  | "DOUBLE"
  | "BOOLEAN"
  | "UTC_DATETIME"
  | "NAIVE_DATE"
  | "JSON";

export type CellValue = string | number | boolean | null;

export interface ColumnSpec {
  type: ColumnType;
  nullable: boolean;
  /** Raw field names tried in order; defaults to the column name. */
  sourceFields?: string[];
}

export interface TableSchema {
  table: string;
  primaryKey: string[];
  columns: Record<string, ColumnSpec>;
  orderingColumn: string;
  /** Raw field that marks a record as deleted upstream. */
  deletedFlagField?: string;
}

export interface EntityDefinition {
  id: string;
  locationId: string;
  schema: TableSchema;
}

export interface RawRecord {
  [key: string]: unknown;
}

export interface Page {
  records: unknown[];
  continuationToken: string | null;
  watermark: string | null;
}

export interface SyncWindow {
  start: string;
  end: string;
}

export interface PageRequest {
  entityId: string;
  locationId: string;
  window: SyncWindow;
  limit: number;
  continuationToken: string | null;
  pageNumber: number;
}

export interface RowOperation {
  kind: "upsert" | "delete";
  primaryKey: string;
  key: Record<string, CellValue>;
  values: Record<string, CellValue>;
  orderingValue: string;
}

export interface CursorState {
  entityId: string;
  value: string | null;
  batchToken: string | null;
  rowsCommitted: number;
  updatedAt: string | null;
}

export type CursorPolicy = "max-observed" | "upstream-watermark";

export type SinkMode = "postgres" | "memory";

export interface OAuthRefreshConfig {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface ConnectorConfig {
  databaseUrl: string;
  sinkMode: SinkMode;
  apiBaseUrl: string;
  apiKey: string;
  oauth: OAuthRefreshConfig | null;
  apiPageLimit: number;
  apiTimeoutMs: number;
  apiMaxRetries: number;
  apiRetryBaseMs: number;
  apiRetryMaxMs: number;
  locations: string[];
  windowHours: number;
  lookbackDays: number;
  cursorPolicy: CursorPolicy;
  syncConcurrency: number;
  syncDeadlineMs: number;
  batchMaxRows: number;
  batchMaxAgeMs: number;
  mappingErrorThreshold: number;
  progressLogIntervalMs: number;
  logLevel: string;
}
