import "dotenv/config";
import { z } from "zod";

const supportedFinancialsProviders = ["mock", "alphavantage"] as const;

export type FinancialsProviderName =
  (typeof supportedFinancialsProviders)[number];

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  // Datastore credentials carry no fallback; the trigger path rejects a missing value.
  POSTGRES_URL: z.string().trim().optional(),
  FINANCIALS_PROVIDER: z.enum(supportedFinancialsProviders).default("mock"),
  ALPHA_VANTAGE_BASE_URL: z.string().default("https://www.alphavantage.co"),
  ALPHA_VANTAGE_API_KEY: z.string().default(""),
  ALPHA_VANTAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TICKER_FILE_PATH: z.string().default("tickers_to_use.txt"),
  TICKER_EXCHANGE_SUFFIX: z.string().default(".AX"),
  INGEST_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  INGEST_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(5_000),
  INGEST_REQUEST_DELAY_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(2_000),
});

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Parses an arbitrary environment map; exported so tests can build isolated configurations.
 */
export const parseEnv = (source: NodeJS.ProcessEnv): AppEnv =>
  envSchema.parse(source);

export const env: AppEnv = parseEnv(process.env);
