import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import { SECURITY_TYPE_COMMON_STOCK } from "../../core/entities/company";
import type { StatementKind } from "../../core/entities/financialRecord";
import type {
  IngestionRunReport,
  IngestionRunStatus,
  ResolvedEntity,
  TickerFailure,
  TickerOutcome,
  TickerState,
  UploadOutcome,
} from "../../core/entities/ingestion";
import type {
  FinancialDataProviderPort,
  TickerSourcePort,
} from "../../core/ports/inboundPorts";
import type {
  EntityRepositoryPort,
  SleeperPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { buildFinancialRecords, toUpsertRow } from "./recordBuilder";
import {
  withRetry,
  type RetryExhausted,
  type RetryPolicy,
} from "./retryPolicy";
import type { UpsertGateway } from "./upsertGateway";

export type StatementTarget = {
  statement: StatementKind;
  table: string;
  label: string;
};

export const STATEMENT_TARGETS: readonly StatementTarget[] = [
  {
    statement: "income_statement",
    table: "financials.income_statements_annual",
    label: "Income Statement",
  },
  {
    statement: "balance_sheet",
    table: "financials.balance_sheets_annual",
    label: "Balance Sheet",
  },
  {
    statement: "cash_flow",
    table: "financials.cash_flows_annual",
    label: "Cash Flow",
  },
];

export const FINANCIAL_CONFLICT_KEYS = [
  "security_id",
  "fiscal_year",
  "fiscal_quarter",
];

export type IngestionSettings = {
  maxAttempts: number;
  retryDelayMs: number;
  // Courtesy pause after every statement, independent of its outcome.
  requestDelayMs: number;
};

const listOrNone = (tickers: string[]): string =>
  tickers.length > 0 ? tickers.join(", ") : "None";

/**
 * Decides the run-level status from per-ticker outcomes.
 */
export const deriveRunStatus = (
  successful: string[],
  partiallyFailed: string[],
  skipped: string[],
): IngestionRunStatus => {
  if (skipped.length === 0 && partiallyFailed.length === 0) {
    return "success";
  }

  return successful.length > 0 ? "partial_success" : "error";
};

/**
 * Walks every ticker sequentially: resolve company and security, then ingest each annual statement.
 */
export class IngestionDriver {
  constructor(
    private readonly provider: FinancialDataProviderPort,
    private readonly entities: EntityRepositoryPort,
    private readonly gateway: UpsertGateway,
    private readonly tickerSource: TickerSourcePort,
    private readonly sleeper: SleeperPort,
    private readonly settings: IngestionSettings,
  ) {}

  private get foundationalPolicy(): RetryPolicy {
    return {
      mode: "foundational",
      maxAttempts: this.settings.maxAttempts,
      delayMs: this.settings.retryDelayMs,
    };
  }

  private get supplementaryPolicy(): RetryPolicy {
    return {
      mode: "supplementary",
      maxAttempts: this.settings.maxAttempts,
      delayMs: this.settings.retryDelayMs,
    };
  }

  private transition(ticker: string, state: TickerState): void {
    logger.debug({ ticker, state }, "Ticker state changed");
  }

  /**
   * Loads the ticker list and runs the full ingestion; an empty list short-circuits before any provider call.
   */
  async run(): Promise<Result<IngestionRunReport, AppBoundaryError>> {
    const tickers = await this.tickerSource.loadTickers();

    if (tickers.length === 0) {
      return err({
        source: "tickers",
        code: "not_found",
        provider: "ticker-file",
        message:
          "No tickers loaded from file. Please ensure the ticker file exists and contains tickers.",
      });
    }

    return ok(await this.runForTickers(tickers));
  }

  async runForTickers(tickers: string[]): Promise<IngestionRunReport> {
    const log: string[] = [];
    const outcomes: TickerOutcome[] = [];

    for (const ticker of tickers) {
      outcomes.push(await this.ingestTicker(ticker, log));
    }

    const tickersWith = (status: TickerOutcome["status"]) =>
      outcomes
        .filter((outcome) => outcome.status === status)
        .map((outcome) => outcome.ticker);

    const successful = tickersWith("success");
    const partiallyFailed = tickersWith("partial");
    const skipped = tickersWith("skipped");

    log.push(
      "--- Ingestion Summary ---",
      `Total tickers attempted: ${tickers.length}`,
      `Successfully processed (all financials): ${successful.length} - ${listOrNone(successful)}`,
      `Partially failed (core data OK, some financials failed): ${partiallyFailed.length} - ${listOrNone(partiallyFailed)}`,
      `Skipped (provider data not found): ${skipped.length} - ${listOrNone(skipped)}`,
    );

    const status = deriveRunStatus(successful, partiallyFailed, skipped);
    logger.info(
      {
        status,
        total: tickers.length,
        successful: successful.length,
        partiallyFailed: partiallyFailed.length,
        skipped: skipped.length,
      },
      "Ingestion run finished",
    );

    return {
      status,
      tickers,
      successful,
      partiallyFailed,
      skipped,
      outcomes,
      log,
    };
  }

  private async ingestTicker(
    ticker: string,
    log: string[],
  ): Promise<TickerOutcome> {
    this.transition(ticker, "start");
    log.push(`--- Processing Ticker: ${ticker} ---`);

    this.transition(ticker, "resolving_entity");
    const resolution = await this.resolveEntity(ticker, log);

    if (resolution.isErr()) {
      log.push(
        `Failed to ensure core data for ${ticker} after ${resolution.error.attempts} retries. Skipping this ticker.`,
      );
      this.transition(ticker, "skipped");
      return {
        ticker,
        status: "skipped",
        failures: [
          {
            kind: "entity_resolution_failure",
            message: resolution.error.lastError.message,
          },
        ],
      };
    }

    const entity = resolution.value;
    this.transition(ticker, "fetching_statements");
    log.push(`Fetching financial statements for ${ticker}...`);

    const failures: TickerFailure[] = [];
    for (const target of STATEMENT_TARGETS) {
      const failure = await this.ingestStatement(entity, target, log);
      if (failure) {
        failures.push(failure);
      }
      await this.sleeper.sleep(this.settings.requestDelayMs);
    }

    const status = failures.length === 0 ? "success" : "partial";
    this.transition(ticker, status);
    return { ticker, status, entity, failures };
  }

  /**
   * Company first, then its security; any gap is a failed attempt so the whole resolution retries.
   */
  private async resolveEntity(
    ticker: string,
    log: string[],
  ): Promise<Result<ResolvedEntity, RetryExhausted>> {
    const result = await withRetry(
      async (): Promise<Result<ResolvedEntity, AppBoundaryError>> => {
        const profile = await this.provider.fetchProfile({ symbol: ticker });
        if (profile.isErr()) {
          return err(profile.error);
        }

        const companyName = profile.value.name?.trim();
        if (!companyName) {
          return err({
            source: "provider",
            code: "not_found",
            provider: "ingestion",
            message: `Could not fetch info for ticker ${ticker}. It might be invalid or delisted.`,
          });
        }

        const companyId = await this.entities.upsertCompany({
          ticker,
          companyName,
          exchange: profile.value.exchange,
          sector: profile.value.sector,
          industry: profile.value.industry,
          country: profile.value.country,
          website: profile.value.website,
          description: profile.value.description,
        });
        if (companyId.isErr()) {
          return err(companyId.error);
        }

        const securityId = await this.entities.upsertSecurity({
          companyId: companyId.value,
          symbol: ticker,
          securityType: SECURITY_TYPE_COMMON_STOCK,
          currency: profile.value.currency,
        });
        if (securityId.isErr()) {
          return err(securityId.error);
        }

        return ok({
          ticker,
          companyId: companyId.value,
          securityId: securityId.value,
        });
      },
      this.foundationalPolicy,
      this.sleeper,
      {
        operation: "resolve-entity",
        ticker,
        onAttemptFailed: (error) => {
          log.push(`Error ensuring core data for ${ticker}: ${error.message}`);
        },
      },
    );

    if (result.isOk()) {
      const entity = result.value.value;
      log.push(
        `Ensured core data for ${ticker} (Company ID: ${entity.companyId}, Security ID: ${entity.securityId}).`,
      );
      return ok(entity);
    }

    return err(result.error);
  }

  /**
   * Provider failures are retried; an upload the datastore rejected ends the statement without retry.
   */
  private async ingestStatement(
    entity: ResolvedEntity,
    target: StatementTarget,
    log: string[],
  ): Promise<TickerFailure | null> {
    const { ticker } = entity;
    log.push(`--- Processing ${target.label} (Annual) ---`);

    const result = await withRetry(
      async (): Promise<Result<UploadOutcome, AppBoundaryError>> => {
        const table = await this.provider.fetchStatement({
          symbol: ticker,
          statement: target.statement,
        });
        if (table.isErr()) {
          return err(table.error);
        }

        const rows = buildFinancialRecords(
          table.value,
          entity.securityId,
          null,
        ).map(toUpsertRow);

        return ok(
          await this.gateway.upload(target.table, rows, FINANCIAL_CONFLICT_KEYS),
        );
      },
      this.supplementaryPolicy,
      this.sleeper,
      {
        operation: `fetch-${target.statement}`,
        ticker,
        onAttemptFailed: (error) => {
          log.push(
            `Error fetching/uploading ${target.label} for ${ticker}: ${error.message}`,
          );
        },
      },
    );

    if (result.isErr()) {
      log.push(
        `Failed to fetch/upload ${target.label} for ${ticker} after ${result.error.attempts} retries.`,
      );
      return {
        kind: "statement_fetch_failure",
        statement: target.statement,
        message: result.error.lastError.message,
      };
    }

    const outcome = result.value.value;
    log.push(outcome.message);

    if (outcome.status === "error") {
      return {
        kind: "upload_failure",
        statement: target.statement,
        message: outcome.message,
      };
    }

    return null;
  }
}
