import express, {
  type NextFunction,
  type Request,
  type Response,
} from "express";
import type { Result } from "neverthrow";
import type { IngestionRuntime } from "../application/bootstrap/runtimeFactory";
import type { AppBoundaryError } from "../core/entities/appError";
import type { IngestionRunStatus } from "../core/entities/ingestion";
import { logger } from "../shared/logger/logger";

export type IngestionResponseBody = {
  status: IngestionRunStatus;
  message: string;
};

export type HttpAppOptions = {
  createRuntime: () => Result<IngestionRuntime, AppBoundaryError>;
};

export const GREETING =
  "Welcome to the financials sync service! Go to /run-ingestion to start.";

/**
 * Builds the trigger surface. The runtime is created on first trigger and reused afterwards.
 */
export const createHttpApp = (options: HttpAppOptions) => {
  const app = express();
  let runtime: IngestionRuntime | undefined;
  let running = false;

  app.get("/", (_req, res) => {
    res.type("text/plain").send(GREETING);
  });

  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.get(
    "/run-ingestion",
    async (_req: Request, res: Response<IngestionResponseBody>, next: NextFunction) => {
      if (running) {
        res.status(409).json({
          status: "error",
          message: "An ingestion run is already in progress.",
        });
        return;
      }

      if (!runtime) {
        const created = options.createRuntime();
        if (created.isErr()) {
          logger.error(
            { code: created.error.code, reason: created.error.message },
            "Runtime initialization failed",
          );
          res.status(500).json({ status: "error", message: created.error.message });
          return;
        }
        runtime = created.value;
      }

      running = true;
      try {
        const result = await runtime.driver.run();

        if (result.isErr()) {
          res.status(400).json({ status: "error", message: result.error.message });
          return;
        }

        res.status(200).json({
          status: result.value.status,
          message: result.value.log.join("\n"),
        });
      } catch (error) {
        next(error);
      } finally {
        running = false;
      }
    },
  );

  app.use((req, res) => {
    res.status(404).json({ error: "Route not found", path: req.originalUrl });
  });

  app.use(
    (
      error: unknown,
      req: Request,
      res: Response<IngestionResponseBody>,
      _next: NextFunction,
    ) => {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ path: req.path, reason: message }, "Request failed");
      res.status(500).json({ status: "error", message });
    },
  );

  return app;
};
