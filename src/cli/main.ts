import { Command } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import { createHttpApp } from "../http/app";
import { env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

/**
 * Defines a single command surface so the HTTP trigger and one-off runs share one composition root.
 */
export const buildCli = () => {
  const cli = new Command();
  cli.name("financials-sync").description("Company financials ingestion job");

  cli
    .command("serve")
    .description("Start the HTTP trigger server")
    .action(() => {
      const app = createHttpApp({ createRuntime: () => createRuntime(env) });
      const server = app.listen(env.PORT, () => {
        logger.info({ port: env.PORT }, "HTTP trigger listening");
      });

      const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down");
        server.close(() => {
          process.exit(0);
        });
      };

      process.on("SIGTERM", () => shutdown("SIGTERM"));
      process.on("SIGINT", () => shutdown("SIGINT"));
    });

  cli
    .command("ingest")
    .description("Run one ingestion over the ticker file and print the run log")
    .action(async () => {
      const runtime = createRuntime(env);
      if (runtime.isErr()) {
        logger.error({ reason: runtime.error.message }, "Configuration invalid");
        process.exitCode = 1;
        return;
      }

      try {
        const result = await runtime.value.driver.run();
        if (result.isErr()) {
          logger.error({ reason: result.error.message }, "Ingestion not started");
          process.exitCode = 1;
          return;
        }

        console.log(result.value.log.join("\n"));
        process.exitCode = result.value.status === "error" ? 1 : 0;
      } finally {
        await runtime.value.close();
      }
    });

  cli
    .command("status")
    .description("Report ingestion configuration")
    .action(() => {
      logger.info(
        {
          provider: env.FINANCIALS_PROVIDER,
          alphaVantageApiKeyConfigured: env.ALPHA_VANTAGE_API_KEY.trim().length > 0,
          postgresConfigured: Boolean(env.POSTGRES_URL),
          tickerFile: env.TICKER_FILE_PATH,
          exchangeSuffix: env.TICKER_EXCHANGE_SUFFIX,
          maxAttempts: env.INGEST_MAX_ATTEMPTS,
          retryDelayMs: env.INGEST_RETRY_DELAY_MS,
          requestDelayMs: env.INGEST_REQUEST_DELAY_MS,
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
