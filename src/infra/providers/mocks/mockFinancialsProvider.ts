import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { CompanyProfile } from "../../../core/entities/company";
import type {
  StatementKind,
  StatementTable,
} from "../../../core/entities/financialRecord";
import type {
  FinancialDataProviderPort,
  ProfileRequest,
  StatementRequest,
} from "../../../core/ports/inboundPorts";

const mockLineItems: Record<StatementKind, Array<[string, number[]]>> = {
  income_statement: [
    ["Total Revenue", [1_250_000_000, 1_100_000_000]],
    ["Gross Profit", [480_000_000, 415_000_000]],
    ["Net Income", [120_000_000, 97_500_000]],
  ],
  balance_sheet: [
    ["Total Assets", [5_400_000_000, 5_050_000_000]],
    ["Total Liabilities", [2_900_000_000, 2_750_000_000]],
    ["Cash And Cash Equivalents", [610_000_000, 540_000_000]],
  ],
  cash_flow: [
    ["Operating Cashflow", [310_000_000, 288_000_000]],
    ["Capital Expenditures", [-95_000_000, -88_000_000]],
    ["Dividend Payout", [-60_000_000, -55_000_000]],
  ],
};

/**
 * Serves fixed fundamentals so the ingestion flow can run locally without provider credentials.
 */
export class MockFinancialsProvider implements FinancialDataProviderPort {
  async fetchProfile(
    request: ProfileRequest,
  ): Promise<Result<CompanyProfile, AppBoundaryError>> {
    const symbol = request.symbol.toUpperCase();
    const base = symbol.split(".")[0] ?? symbol;

    return ok({
      symbol,
      name: `${base} Mock Holdings Limited`,
      exchange: "ASX",
      sector: "Industrials",
      industry: "Conglomerates",
      country: "Australia",
      website: "https://example.com",
      description: `Deterministic mock profile for ${symbol}.`,
      currency: "AUD",
    });
  }

  async fetchStatement(
    request: StatementRequest,
  ): Promise<Result<StatementTable, AppBoundaryError>> {
    return ok({
      periods: [
        new Date("2024-06-30T00:00:00.000Z"),
        new Date("2023-06-30T00:00:00.000Z"),
      ],
      lineItems: mockLineItems[request.statement].map(([label, values]) => ({
        label,
        values,
      })),
    });
  }
}
