import type { MappingError } from "../errors";
import type { Result } from "../result";
import { err, ok } from "../result";
import type { CellValue, ColumnSpec, RawRecord, RowOperation, TableSchema } from "../types";
import {
  type Coerced,
  coerceBoolean,
  coerceInteger,
  coerceJson,
  coerceNaiveDate,
  coerceNumber,
  coerceString,
  coerceTimestamp,
  isBlank
} from "./coerce";

export interface PageMappingResult {
  operations: RowOperation[];
  errors: MappingError[];
  thresholdExceeded: boolean;
}

function isRecordLike(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readSourceValue(record: RawRecord, column: string, spec: ColumnSpec): unknown {
  const fields = spec.sourceFields ?? [column];

  for (const field of fields) {
    if (record[field] !== undefined) {
      return record[field];
    }
  }

  return undefined;
}

function coerceCell(value: unknown, spec: ColumnSpec): Coerced<CellValue> {
  switch (spec.type) {
    case "STRING":
      return coerceString(value);
    case "INT":
      return coerceInteger(value);
    case "DOUBLE":
      return coerceNumber(value);
    case "BOOLEAN":
      return coerceBoolean(value);
    case "UTC_DATETIME":
      return coerceTimestamp(value);
    case "NAIVE_DATE":
      return coerceNaiveDate(value);
    case "JSON":
      return coerceJson(value);
  }
}

function serializePrimaryKey(key: Record<string, CellValue>, columns: string[]): string {
  return JSON.stringify(columns.map((column) => key[column] ?? null));
}

function isDeleted(record: RawRecord, schema: TableSchema): boolean {
  if (!schema.deletedFlagField) {
    return false;
  }

  const flag = record[schema.deletedFlagField];
  if (flag === undefined || flag === null) {
    return false;
  }

  const coerced = coerceBoolean(flag);
  return coerced.ok && coerced.value;
}

export function mapRecord(
  rawRecord: unknown,
  schema: TableSchema
): Result<RowOperation, MappingError> {
  if (!isRecordLike(rawRecord)) {
    return err({ column: null, reason: "record must be an object", record: rawRecord });
  }

  const deleted = isDeleted(rawRecord, schema);
  const keyColumns = new Set([...schema.primaryKey, schema.orderingColumn]);
  const values: Record<string, CellValue> = {};

  for (const [column, spec] of Object.entries(schema.columns)) {
    if (deleted && !keyColumns.has(column)) {
      continue;
    }

    const raw = readSourceValue(rawRecord, column, spec);

    if (isBlank(raw)) {
      if (spec.nullable && !keyColumns.has(column)) {
        values[column] = null;
        continue;
      }

      return err({ column, reason: "missing required field", record: rawRecord });
    }

    const coerced = coerceCell(raw, spec);
    if (!coerced.ok) {
      return err({ column, reason: coerced.error, record: rawRecord });
    }

    values[column] = coerced.value;
  }

  const key: Record<string, CellValue> = {};
  for (const column of schema.primaryKey) {
    key[column] = values[column] ?? null;
  }

  const orderingValue = values[schema.orderingColumn];
  if (typeof orderingValue !== "string") {
    return err({
      column: schema.orderingColumn,
      reason: "ordering column must map to a string value",
      record: rawRecord
    });
  }

  return ok({
    kind: deleted ? "delete" : "upsert",
    primaryKey: serializePrimaryKey(key, schema.primaryKey),
    key,
    values,
    orderingValue
  });
}

/**
 * Maps every record of one page. Rows that fail are skipped; the page is
 * poisoned once more than `errorThreshold` records fail.
 */
export function mapPage(
  records: unknown[],
  schema: TableSchema,
  errorThreshold: number
): PageMappingResult {
  const operations: RowOperation[] = [];
  const errors: MappingError[] = [];

  for (const record of records) {
    const mapped = mapRecord(record, schema);

    if (mapped.ok) {
      operations.push(mapped.value);
    } else {
      errors.push(mapped.error);
    }
  }

  return {
    operations,
    errors,
    thresholdExceeded: errors.length > Math.max(0, errorThreshold)
  };
}
