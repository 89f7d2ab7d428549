import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { Company, Security } from "../entities/company";
import type { UpsertRow } from "../entities/financialRecord";

export type TableUpsertResult = {
  // Null when the store accepted the batch but reported no affected rows.
  rowCount: number | null;
};

export interface EntityRepositoryPort {
  upsertCompany(company: Company): Promise<Result<string, AppBoundaryError>>;
  upsertSecurity(security: Security): Promise<Result<string, AppBoundaryError>>;
}

export interface TableUpsertPort {
  upsertRows(
    table: string,
    rows: UpsertRow[],
    conflictKeys: string[],
  ): Promise<Result<TableUpsertResult, AppBoundaryError>>;
}

export interface SleeperPort {
  sleep(ms: number): Promise<void>;
}
