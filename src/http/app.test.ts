import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { err, ok } from "neverthrow";
import type { IngestionRuntime } from "../application/bootstrap/runtimeFactory";
import { IngestionDriver } from "../application/services/ingestionDriver";
import { UpsertGateway } from "../application/services/upsertGateway";
import type { FinancialDataProviderPort } from "../core/ports/inboundPorts";
import { FileTickerSource } from "../infra/files/fileTickerSource";
import type {
  EntityRepositoryPort,
  SleeperPort,
  TableUpsertPort,
} from "../core/ports/outboundPorts";
import { createHttpApp, GREETING } from "./app";

const provider: FinancialDataProviderPort = {
  fetchProfile: async ({ symbol }) => ok({ symbol, name: `${symbol} Ltd` }),
  fetchStatement: async () => ok({ periods: [], lineItems: [] }),
};

const entities: EntityRepositoryPort = {
  upsertCompany: async (company) => ok(`company-${company.ticker}`),
  upsertSecurity: async (security) => ok(`security-${security.symbol}`),
};

const store: TableUpsertPort = {
  upsertRows: async (_table, rows) => ok({ rowCount: rows.length }),
};

const sleeper: SleeperPort = { sleep: async () => {} };

const createTestRuntime = (tickers: string[]): IngestionRuntime => ({
  driver: new IngestionDriver(
    provider,
    entities,
    new UpsertGateway(store),
    { loadTickers: async () => tickers },
    sleeper,
    { maxAttempts: 3, retryDelayMs: 0, requestDelayMs: 0 },
  ),
  close: async () => {},
});

describe("HTTP app", () => {
  it("serves a static greeting at the root", async () => {
    const app = createHttpApp({
      createRuntime: () => ok(createTestRuntime(["BHP.AX"])),
    });

    const response = await request(app).get("/");

    expect(response.status).toBe(200);
    expect(response.text).toBe(GREETING);
  });

  it("reports health without building a runtime", async () => {
    let created = 0;
    const app = createHttpApp({
      createRuntime: () => {
        created += 1;
        return ok(createTestRuntime(["BHP.AX"]));
      },
    });

    const response = await request(app).get("/health");

    expect(response.status).toBe(200);
    expect(response.body.status).toBe("healthy");
    expect(typeof response.body.uptime).toBe("number");
    expect(created).toBe(0);
  });

  it("rejects a trigger while another run is in progress", async () => {
    let markStarted: () => void = () => {};
    let release: () => void = () => {};
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const app = createHttpApp({
      createRuntime: () =>
        ok({
          ...createTestRuntime([]),
          driver: new IngestionDriver(
            provider,
            entities,
            new UpsertGateway(store),
            {
              loadTickers: async () => {
                markStarted();
                await gate;
                return [];
              },
            },
            sleeper,
            { maxAttempts: 1, retryDelayMs: 0, requestDelayMs: 0 },
          ),
        }),
    });

    const first = request(app)
      .get("/run-ingestion")
      .then((response) => response);
    await started;

    const second = await request(app).get("/run-ingestion");
    release();
    const firstResponse = await first;

    expect(second.status).toBe(409);
    expect(second.body).toEqual({
      status: "error",
      message: "An ingestion run is already in progress.",
    });
    expect(firstResponse.status).toBe(400);
  });

  it("runs the ingestion and returns the run log", async () => {
    const app = createHttpApp({
      createRuntime: () => ok(createTestRuntime(["BHP.AX"])),
    });

    const response = await request(app).get("/run-ingestion");

    expect(response.status).toBe(200);
    expect(response.body.status).toBe("success");
    expect(response.body.message).toBe(
      [
        "--- Processing Ticker: BHP.AX ---",
        "Ensured core data for BHP.AX (Company ID: company-BHP.AX, Security ID: security-BHP.AX).",
        "Fetching financial statements for BHP.AX...",
        "--- Processing Income Statement (Annual) ---",
        "No data to upload for financials.income_statements_annual.",
        "--- Processing Balance Sheet (Annual) ---",
        "No data to upload for financials.balance_sheets_annual.",
        "--- Processing Cash Flow (Annual) ---",
        "No data to upload for financials.cash_flows_annual.",
        "--- Ingestion Summary ---",
        "Total tickers attempted: 1",
        "Successfully processed (all financials): 1 - BHP.AX",
        "Partially failed (core data OK, some financials failed): 0 - None",
        "Skipped (provider data not found): 0 - None",
      ].join("\n"),
    );
  });

  it("answers 400 when no tickers are available", async () => {
    const app = createHttpApp({
      createRuntime: () => ok(createTestRuntime([])),
    });

    const response = await request(app).get("/run-ingestion");

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      status: "error",
      message:
        "No tickers loaded from file. Please ensure the ticker file exists and contains tickers.",
    });
  });

  it("answers 400 when the ticker path is not a readable file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "tickers-"));
    try {
      const app = createHttpApp({
        createRuntime: () =>
          ok({
            ...createTestRuntime([]),
            driver: new IngestionDriver(
              provider,
              entities,
              new UpsertGateway(store),
              new FileTickerSource(dir, ".AX"),
              sleeper,
              { maxAttempts: 1, retryDelayMs: 0, requestDelayMs: 0 },
            ),
          }),
      });

      const response = await request(app).get("/run-ingestion");

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        status: "error",
        message:
          "No tickers loaded from file. Please ensure the ticker file exists and contains tickers.",
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("answers 500 when the runtime cannot be configured", async () => {
    const app = createHttpApp({
      createRuntime: () =>
        err({
          source: "config",
          code: "config_invalid",
          provider: "postgres",
          message: "POSTGRES_URL is not configured",
        }),
    });

    const response = await request(app).get("/run-ingestion");

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      status: "error",
      message: "POSTGRES_URL is not configured",
    });
  });

  it("builds the runtime once and reuses it across runs", async () => {
    let created = 0;
    const app = createHttpApp({
      createRuntime: () => {
        created += 1;
        return ok(createTestRuntime(["BHP.AX"]));
      },
    });

    await request(app).get("/run-ingestion");
    await request(app).get("/run-ingestion");

    expect(created).toBe(1);
  });

  it("routes unexpected failures to the error handler", async () => {
    const app = createHttpApp({
      createRuntime: () =>
        ok({
          ...createTestRuntime(["BHP.AX"]),
          driver: new IngestionDriver(
            provider,
            entities,
            new UpsertGateway(store),
            {
              loadTickers: async () => {
                throw new Error("disk unavailable");
              },
            },
            sleeper,
            { maxAttempts: 1, retryDelayMs: 0, requestDelayMs: 0 },
          ),
        }),
    });

    const response = await request(app).get("/run-ingestion");

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      status: "error",
      message: "disk unavailable",
    });
  });

  it("returns 404 JSON for unknown routes", async () => {
    const app = createHttpApp({
      createRuntime: () => ok(createTestRuntime(["BHP.AX"])),
    });

    const response = await request(app).get("/nope");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: "Route not found", path: "/nope" });
  });
});
