import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { FinancialDataProviderPort } from "../../core/ports/inboundPorts";
import type { SleeperPort } from "../../core/ports/outboundPorts";
import { createDb } from "../../infra/db/client";
import {
  PostgresEntityRepositoryService,
  PostgresTableUpsertService,
} from "../../infra/db/repositories";
import { FileTickerSource } from "../../infra/files/fileTickerSource";
import { AlphaVantageFinancialsProvider } from "../../infra/providers/alphavantage/alphaVantageFinancialsProvider";
import { MockFinancialsProvider } from "../../infra/providers/mocks/mockFinancialsProvider";
import { SystemSleeper } from "../../infra/system/systemPorts";
import type { AppEnv } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import { IngestionDriver } from "../services/ingestionDriver";
import { UpsertGateway } from "../services/upsertGateway";

export type IngestionRuntime = {
  driver: IngestionDriver;
  close: () => Promise<void>;
};

const configError = (provider: string, message: string): AppBoundaryError => ({
  source: "config",
  code: "config_invalid",
  provider,
  message,
});

/**
 * Resolves the configured financials adapter while preserving a mock fallback for local development.
 */
export const createFinancialsProvider = (
  appEnv: AppEnv,
): Result<FinancialDataProviderPort, AppBoundaryError> => {
  if (appEnv.FINANCIALS_PROVIDER !== "alphavantage") {
    return ok(new MockFinancialsProvider());
  }

  if (!appEnv.ALPHA_VANTAGE_API_KEY.trim()) {
    return err(
      configError(
        "alphavantage",
        "ALPHA_VANTAGE_API_KEY is required when Alpha Vantage financials provider is enabled.",
      ),
    );
  }

  return ok(
    new AlphaVantageFinancialsProvider(
      appEnv.ALPHA_VANTAGE_BASE_URL,
      appEnv.ALPHA_VANTAGE_API_KEY,
      appEnv.ALPHA_VANTAGE_TIMEOUT_MS,
    ),
  );
};

/**
 * Composition root for one ingestion runtime: a single datastore client is built here and injected.
 */
export const createRuntime = (
  appEnv: AppEnv,
  sleeper: SleeperPort = new SystemSleeper(),
): Result<IngestionRuntime, AppBoundaryError> => {
  const postgresUrl = appEnv.POSTGRES_URL;
  if (!postgresUrl) {
    return err(
      configError(
        "postgres",
        "POSTGRES_URL is not configured; datastore credentials are required to run ingestion.",
      ),
    );
  }

  const provider = createFinancialsProvider(appEnv);
  if (provider.isErr()) {
    return err(provider.error);
  }

  let database: ReturnType<typeof createDb>;
  try {
    database = createDb(postgresUrl);
  } catch (error) {
    return err(
      configError(
        "postgres",
        `Error initializing datastore client: ${error instanceof Error ? error.message : String(error)}`,
      ),
    );
  }

  const { db, sql } = database;
  const driver = new IngestionDriver(
    provider.value,
    new PostgresEntityRepositoryService(db),
    new UpsertGateway(new PostgresTableUpsertService(sql)),
    new FileTickerSource(appEnv.TICKER_FILE_PATH, appEnv.TICKER_EXCHANGE_SUFFIX),
    sleeper,
    {
      maxAttempts: appEnv.INGEST_MAX_ATTEMPTS,
      retryDelayMs: appEnv.INGEST_RETRY_DELAY_MS,
      requestDelayMs: appEnv.INGEST_REQUEST_DELAY_MS,
    },
  );

  logger.info(
    {
      provider: appEnv.FINANCIALS_PROVIDER,
      tickerFile: appEnv.TICKER_FILE_PATH,
      maxAttempts: appEnv.INGEST_MAX_ATTEMPTS,
    },
    "Datastore client initialized",
  );

  return ok({
    driver,
    close: async () => {
      await sql.end();
    },
  });
};
