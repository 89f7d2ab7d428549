import { describe, expect, it } from "vitest";
import { buildUpsertStatement, quoteTableName } from "./upsertStatement";

const conflictKeys = ["security_id", "fiscal_year", "fiscal_quarter"];

describe("quoteTableName", () => {
  it("quotes each schema segment", () => {
    const result = quoteTableName("financials.income_statements_annual");
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toBe('"financials"."income_statements_annual"');
    }
  });

  it("rejects names that are not identifier-safe", () => {
    expect(quoteTableName('financials."x"; drop table y').isErr()).toBe(true);
    expect(quoteTableName("financials.").isErr()).toBe(true);
    expect(quoteTableName(`financials.${"t".repeat(64)}`).isErr()).toBe(true);
  });
});

describe("buildUpsertStatement", () => {
  it("builds one multi-row upsert over the union of columns", () => {
    const result = buildUpsertStatement(
      "financials.cash_flows_annual",
      [
        {
          security_id: "sec-1",
          fiscal_year: 2024,
          fiscal_quarter: null,
          operating_cashflow: 10,
        },
        {
          security_id: "sec-1",
          fiscal_year: 2023,
          fiscal_quarter: null,
          capital_expenditures: -4,
        },
      ],
      conflictKeys,
    );

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value.text).toBe(
      'INSERT INTO "financials"."cash_flows_annual" ("security_id", "fiscal_year", "fiscal_quarter", "operating_cashflow", "capital_expenditures") ' +
        "VALUES ($1, $2, $3, $4, $5), ($6, $7, $8, $9, $10) " +
        'ON CONFLICT ("security_id", "fiscal_year", "fiscal_quarter") DO UPDATE SET "operating_cashflow" = EXCLUDED."operating_cashflow", "capital_expenditures" = EXCLUDED."capital_expenditures"',
    );
    expect(result.value.params).toEqual([
      "sec-1",
      2024,
      null,
      10,
      null,
      "sec-1",
      2023,
      null,
      null,
      -4,
    ]);
  });

  it("keeps only the last row per conflict key", () => {
    const result = buildUpsertStatement(
      "financials.income_statements_annual",
      [
        { security_id: "sec-1", fiscal_year: 2024, fiscal_quarter: null, revenue: 1 },
        { security_id: "sec-1", fiscal_year: 2024, fiscal_quarter: null, revenue: 2 },
      ],
      conflictKeys,
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.params).toEqual(["sec-1", 2024, null, 2]);
    }
  });

  it("does nothing on conflict when every column is part of the key", () => {
    const result = buildUpsertStatement(
      "core.tags",
      [{ security_id: "sec-1", fiscal_year: 2024, fiscal_quarter: 1 }],
      conflictKeys,
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.text.endsWith("DO NOTHING")).toBe(true);
    }
  });

  it("rejects empty column names and missing conflict keys", () => {
    const emptyColumn = buildUpsertStatement(
      "financials.income_statements_annual",
      [{ security_id: "sec-1", fiscal_year: 2024, fiscal_quarter: null, "": 1 }],
      conflictKeys,
    );
    expect(emptyColumn.isErr()).toBe(true);
    if (emptyColumn.isErr()) {
      expect(emptyColumn.error.message).toBe(
        'Invalid column name "" for financials.income_statements_annual.',
      );
    }

    const missingKey = buildUpsertStatement(
      "financials.income_statements_annual",
      [{ security_id: "sec-1", fiscal_year: 2024 }],
      conflictKeys,
    );
    expect(missingKey.isErr()).toBe(true);
    if (missingKey.isErr()) {
      expect(missingKey.error.message).toBe(
        'Conflict key "fiscal_quarter" is missing from financials.income_statements_annual rows.',
      );
    }
  });

  it("rejects column names Postgres would truncate", () => {
    const longName = `${"change_in_operating_liabilities_".repeat(2)}x`;
    const result = buildUpsertStatement(
      "financials.cash_flows_annual",
      [
        {
          security_id: "sec-1",
          fiscal_year: 2024,
          fiscal_quarter: null,
          [longName]: 1,
        },
      ],
      conflictKeys,
    );

    expect(longName).toHaveLength(65);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(
        `Column name "${longName}" for financials.cash_flows_annual exceeds 63 characters.`,
      );
    }
  });

  it("accepts a column name of exactly 63 characters", () => {
    const result = buildUpsertStatement(
      "financials.cash_flows_annual",
      [
        {
          security_id: "sec-1",
          fiscal_year: 2024,
          fiscal_quarter: null,
          ["c".repeat(63)]: 1,
        },
      ],
      conflictKeys,
    );

    expect(result.isOk()).toBe(true);
  });
});
