import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { CompanyProfile } from "../entities/company";
import type {
  StatementKind,
  StatementTable,
} from "../entities/financialRecord";

export type ProfileRequest = {
  symbol: string;
};

export type StatementRequest = {
  symbol: string;
  statement: StatementKind;
};

export interface FinancialDataProviderPort {
  fetchProfile(
    request: ProfileRequest,
  ): Promise<Result<CompanyProfile, AppBoundaryError>>;
  fetchStatement(
    request: StatementRequest,
  ): Promise<Result<StatementTable, AppBoundaryError>>;
}

export interface TickerSourcePort {
  loadTickers(): Promise<string[]>;
}
