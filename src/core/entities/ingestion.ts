import type { StatementKind } from "./financialRecord";

export type TickerState =
  | "start"
  | "resolving_entity"
  | "skipped"
  | "fetching_statements"
  | "success"
  | "partial";

export type TickerOutcomeStatus = Extract<
  TickerState,
  "success" | "partial" | "skipped"
>;

export type IngestionFailureKind =
  | "entity_resolution_failure"
  | "statement_fetch_failure"
  | "upload_failure";

export type TickerFailure = {
  kind: IngestionFailureKind;
  statement?: StatementKind;
  message: string;
};

export type ResolvedEntity = {
  ticker: string;
  companyId: string;
  securityId: string;
};

export type TickerOutcome = {
  ticker: string;
  status: TickerOutcomeStatus;
  entity?: ResolvedEntity;
  failures: TickerFailure[];
};

export type IngestionRunStatus = "success" | "partial_success" | "error";

export type IngestionRunReport = {
  status: IngestionRunStatus;
  tickers: string[];
  successful: string[];
  partiallyFailed: string[];
  skipped: string[];
  outcomes: TickerOutcome[];
  log: string[];
};

export type UploadOutcome =
  | { status: "skipped"; table: string; message: string }
  | {
      status: "success";
      table: string;
      rowCount: number | null;
      message: string;
    }
  | { status: "error"; table: string; message: string };
