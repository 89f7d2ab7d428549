import { runCli } from "./cli/main";
import { logger } from "./shared/logger/logger";

process.on("unhandledRejection", (reason) => {
  logger.error(
    { reason: reason instanceof Error ? reason.message : String(reason) },
    "Unhandled rejection",
  );
  process.exitCode = 1;
});

try {
  await runCli(process.argv);
} catch (error) {
  logger.error(
    {
      name: error instanceof Error ? error.name : "UnknownError",
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    },
    "financials-sync command failed",
  );
  process.exitCode = 1;
}
