import { sql } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import { err, ok, type Result } from "neverthrow";
import type postgres from "postgres";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { Company, Security } from "../../core/entities/company";
import type { UpsertRow } from "../../core/entities/financialRecord";
import type {
  EntityRepositoryPort,
  TableUpsertPort,
  TableUpsertResult,
} from "../../core/ports/outboundPorts";
import { companiesTable, securitiesTable } from "./schema";
import { buildUpsertStatement } from "./upsertStatement";

const toDatastoreError = (error: unknown): AppBoundaryError => ({
  source: "datastore",
  code: "datastore_error",
  provider: "postgres",
  message: error instanceof Error ? error.message : String(error),
  cause: error,
});

const missingIdError = (message: string): AppBoundaryError => ({
  source: "datastore",
  code: "datastore_error",
  provider: "postgres",
  message,
});

/**
 * Upserts company and security identity rows and hands back the stored ids.
 */
export class PostgresEntityRepositoryService implements EntityRepositoryPort {
  constructor(private readonly db: PostgresJsDatabase<Record<string, never>>) {}

  async upsertCompany(
    company: Company,
  ): Promise<Result<string, AppBoundaryError>> {
    try {
      const [row] = await this.db
        .insert(companiesTable)
        .values(company)
        .onConflictDoUpdate({
          target: companiesTable.ticker,
          set: {
            companyName: sql`excluded.company_name`,
            exchange: sql`excluded.exchange`,
            sector: sql`excluded.sector`,
            industry: sql`excluded.industry`,
            country: sql`excluded.country`,
            website: sql`excluded.website`,
            description: sql`excluded.description`,
          },
        })
        .returning({ id: companiesTable.id });

      if (!row) {
        return err(
          missingIdError(
            `Failed to get company_id for ${company.ticker} after upsert.`,
          ),
        );
      }

      return ok(row.id);
    } catch (error) {
      return err(toDatastoreError(error));
    }
  }

  /**
   * The company_id foreign key rejects securities whose company row does not exist.
   */
  async upsertSecurity(
    security: Security,
  ): Promise<Result<string, AppBoundaryError>> {
    try {
      const [row] = await this.db
        .insert(securitiesTable)
        .values(security)
        .onConflictDoUpdate({
          target: securitiesTable.symbol,
          set: {
            companyId: sql`excluded.company_id`,
            securityType: sql`excluded.security_type`,
            currency: sql`excluded.currency`,
          },
        })
        .returning({ id: securitiesTable.id });

      if (!row) {
        return err(
          missingIdError(
            `Failed to get security_id for ${security.symbol} after upsert.`,
          ),
        );
      }

      return ok(row.id);
    } catch (error) {
      return err(toDatastoreError(error));
    }
  }
}

/**
 * Writes financial statement rows whose column set varies per entity, so it bypasses the typed schema.
 */
export class PostgresTableUpsertService implements TableUpsertPort {
  constructor(private readonly sqlClient: postgres.Sql) {}

  async upsertRows(
    table: string,
    rows: UpsertRow[],
    conflictKeys: string[],
  ): Promise<Result<TableUpsertResult, AppBoundaryError>> {
    const statement = buildUpsertStatement(table, rows, conflictKeys);
    if (statement.isErr()) {
      return err(statement.error);
    }

    try {
      const result = await this.sqlClient.unsafe(
        statement.value.text,
        statement.value.params,
      );
      return ok({ rowCount: result.count });
    } catch (error) {
      return err(toDatastoreError(error));
    }
  }
}
