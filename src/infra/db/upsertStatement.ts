import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  UpsertRow,
  UpsertValue,
} from "../../core/entities/financialRecord";

export type UpsertStatement = {
  text: string;
  params: UpsertValue[];
};

const IDENTIFIER_PATTERN = /^[a-z0-9_]+$/;
// Postgres truncates longer identifiers, which can merge two distinct columns.
const MAX_IDENTIFIER_LENGTH = 63;

const isValidIdentifier = (name: string): boolean =>
  IDENTIFIER_PATTERN.test(name) && name.length <= MAX_IDENTIFIER_LENGTH;

const invalid = (message: string): AppBoundaryError => ({
  source: "datastore",
  code: "datastore_error",
  provider: "postgres",
  message,
});

const quoteIdentifier = (name: string): string => `"${name}"`;

/**
 * Schema-qualified names are quoted per segment: `financials.x` → `"financials"."x"`.
 */
export const quoteTableName = (
  table: string,
): Result<string, AppBoundaryError> => {
  const segments = table.split(".");
  if (segments.some((segment) => !isValidIdentifier(segment))) {
    return err(invalid(`Invalid table name "${table}".`));
  }

  return ok(segments.map(quoteIdentifier).join("."));
};

/**
 * Builds one multi-row INSERT … ON CONFLICT DO UPDATE over the union of the batch's columns.
 * Rows sharing a conflict key collapse to the last one, since Postgres rejects updating a row twice per statement.
 */
export const buildUpsertStatement = (
  table: string,
  rows: UpsertRow[],
  conflictKeys: string[],
): Result<UpsertStatement, AppBoundaryError> => {
  const tableName = quoteTableName(table);
  if (tableName.isErr()) {
    return err(tableName.error);
  }

  if (rows.length === 0) {
    return err(invalid(`Upsert into ${table} requires at least one row.`));
  }

  if (conflictKeys.length === 0) {
    return err(invalid(`Upsert into ${table} requires conflict keys.`));
  }

  const columns: string[] = [];
  for (const row of rows) {
    for (const column of Object.keys(row)) {
      if (!columns.includes(column)) {
        columns.push(column);
      }
    }
  }

  const badColumn = columns.find((column) => !IDENTIFIER_PATTERN.test(column));
  if (badColumn !== undefined) {
    return err(invalid(`Invalid column name "${badColumn}" for ${table}.`));
  }

  const longColumn = columns.find(
    (column) => column.length > MAX_IDENTIFIER_LENGTH,
  );
  if (longColumn !== undefined) {
    return err(
      invalid(
        `Column name "${longColumn}" for ${table} exceeds ${MAX_IDENTIFIER_LENGTH} characters.`,
      ),
    );
  }

  const missingKey = conflictKeys.find((key) => !columns.includes(key));
  if (missingKey !== undefined) {
    return err(invalid(`Conflict key "${missingKey}" is missing from ${table} rows.`));
  }

  const byConflictKey = new Map<string, UpsertRow>();
  for (const row of rows) {
    byConflictKey.set(
      JSON.stringify(conflictKeys.map((key) => row[key] ?? null)),
      row,
    );
  }

  const params: UpsertValue[] = [];
  const tuples = Array.from(byConflictKey.values()).map((row) => {
    const placeholders = columns.map((column) => {
      params.push(row[column] ?? null);
      return `$${params.length}`;
    });
    return `(${placeholders.join(", ")})`;
  });

  const updatable = columns.filter((column) => !conflictKeys.includes(column));
  const conflictAction =
    updatable.length === 0
      ? "DO NOTHING"
      : `DO UPDATE SET ${updatable
          .map((column) => `${quoteIdentifier(column)} = EXCLUDED.${quoteIdentifier(column)}`)
          .join(", ")}`;

  const text = [
    `INSERT INTO ${tableName.value} (${columns.map(quoteIdentifier).join(", ")})`,
    `VALUES ${tuples.join(", ")}`,
    `ON CONFLICT (${conflictKeys.map(quoteIdentifier).join(", ")}) ${conflictAction}`,
  ].join(" ");

  return ok({ text, params });
};
