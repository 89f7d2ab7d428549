export type StatementKind = "income_statement" | "balance_sheet" | "cash_flow";

/**
 * Wide provider table: one column per reporting period, one row per line item.
 * `values[i]` belongs to `periods[i]`.
 */
export type StatementTable = {
  periods: Date[];
  lineItems: Array<{ label: string; values: unknown[] }>;
};

export type FieldValue =
  | { kind: "null" }
  | { kind: "number"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "text"; value: string }
  | { kind: "date"; value: string };

export type FinancialRecordHeader = {
  securityId: string;
  reportDate: string;
  fiscalYear: number;
  fiscalQuarter: number | null;
};

export type FinancialRecord = {
  header: FinancialRecordHeader;
  fields: Map<string, FieldValue>;
};

export type UpsertValue = string | number | boolean | null;

export type UpsertRow = Record<string, UpsertValue>;
