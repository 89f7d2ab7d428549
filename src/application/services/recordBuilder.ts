import type {
  FieldValue,
  FinancialRecord,
  FinancialRecordHeader,
  StatementTable,
  UpsertRow,
  UpsertValue,
} from "../../core/entities/financialRecord";
import { logger } from "../../shared/logger/logger";
import { toIsoDate } from "../../shared/utils/dateUtils";
import { normalizeColumnName } from "./columnNormalizer";

const HEADER_COLUMNS = new Set([
  "security_id",
  "report_date",
  "fiscal_year",
  "fiscal_quarter",
]);

const isMissing = (value: unknown): boolean =>
  value === undefined ||
  value === null ||
  (typeof value === "number" && Number.isNaN(value)) ||
  (value instanceof Date && Number.isNaN(value.getTime()));

export const toFieldValue = (value: unknown): FieldValue => {
  if (isMissing(value)) {
    return { kind: "null" };
  }

  if (value instanceof Date) {
    return { kind: "date", value: toIsoDate(value) };
  }

  if (typeof value === "number") {
    return { kind: "number", value };
  }

  if (typeof value === "boolean") {
    return { kind: "boolean", value };
  }

  return { kind: "text", value: String(value) };
};

/**
 * Pivots a wide statement table into one record per reporting period.
 * Periods that share a calendar date collapse into one record; later cells win.
 * Line items whose label normalizes to an empty name are dropped.
 */
export const buildFinancialRecords = (
  table: StatementTable,
  securityId: string,
  fiscalQuarter: number | null = null,
): FinancialRecord[] => {
  const byReportDate = new Map<string, FinancialRecord>();
  const columns: Array<{ name: string; values: unknown[] }> = [];
  for (const lineItem of table.lineItems) {
    const name = normalizeColumnName(lineItem.label);
    if (!name) {
      logger.warn(
        { securityId, label: String(lineItem.label) },
        "Dropping line item without a usable column name",
      );
      continue;
    }
    columns.push({ name, values: lineItem.values });
  }

  table.periods.forEach((period, periodIndex) => {
    if (Number.isNaN(period.getTime())) {
      return;
    }

    const reportDate = toIsoDate(period);
    let record = byReportDate.get(reportDate);
    if (!record) {
      const header: FinancialRecordHeader = {
        securityId: String(securityId),
        reportDate,
        fiscalYear: period.getUTCFullYear(),
        fiscalQuarter,
      };
      record = { header, fields: new Map() };
      byReportDate.set(reportDate, record);
    }

    for (const column of columns) {
      record.fields.set(column.name, toFieldValue(column.values[periodIndex]));
    }
  });

  return Array.from(byReportDate.values());
};

const toUpsertValue = (field: FieldValue): UpsertValue =>
  field.kind === "null" ? null : field.value;

/**
 * Flattens a record into the column map sent to the datastore; header columns always take precedence.
 */
export const toUpsertRow = (record: FinancialRecord): UpsertRow => {
  const row: UpsertRow = {
    security_id: record.header.securityId,
    report_date: record.header.reportDate,
    fiscal_year: record.header.fiscalYear,
    fiscal_quarter: record.header.fiscalQuarter,
  };

  for (const [column, field] of record.fields) {
    if (HEADER_COLUMNS.has(column)) {
      continue;
    }
    row[column] = toUpsertValue(field);
  }

  return row;
};
