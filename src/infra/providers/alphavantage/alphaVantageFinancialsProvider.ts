import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { CompanyProfile } from "../../../core/entities/company";
import type {
  StatementKind,
  StatementTable,
} from "../../../core/entities/financialRecord";
import type {
  FinancialDataProviderPort,
  ProfileRequest,
  StatementRequest,
} from "../../../core/ports/inboundPorts";
import { parseIsoDate } from "../../../shared/utils/dateUtils";
import { HttpJsonClient, type HttpClientError } from "../../http/httpJsonClient";

const PROVIDER = "alphavantage";

const statementFunctions: Record<StatementKind, string> = {
  income_statement: "INCOME_STATEMENT",
  balance_sheet: "BALANCE_SHEET",
  cash_flow: "CASH_FLOW",
};

const noticeFields = {
  Note: z.string().optional(),
  Information: z.string().optional(),
  "Error Message": z.string().optional(),
};

const overviewSchema = z.object({
  ...noticeFields,
  Symbol: z.string().optional(),
  Name: z.string().optional(),
  Exchange: z.string().optional(),
  Sector: z.string().optional(),
  Industry: z.string().optional(),
  Country: z.string().optional(),
  OfficialSite: z.string().optional(),
  Description: z.string().optional(),
  Currency: z.string().optional(),
});

const statementSchema = z.object({
  ...noticeFields,
  symbol: z.string().optional(),
  annualReports: z.array(z.record(z.string(), z.unknown())).optional(),
});

type ProviderNotice = {
  Note?: string;
  Information?: string;
  "Error Message"?: string;
};

const PERIOD_FIELD = "fiscalDateEnding";
const NUMERIC_PATTERN = /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;

/**
 * Alpha Vantage encodes every figure as a string and uses "None" for gaps.
 */
const parseCell = (raw: unknown): unknown => {
  if (typeof raw !== "string") {
    return raw;
  }

  const trimmed = raw.trim();
  if (!trimmed || trimmed === "None" || trimmed === "-") {
    return undefined;
  }

  return NUMERIC_PATTERN.test(trimmed) ? Number(trimmed) : trimmed;
};

/**
 * Turns camelCase report keys into spaced labels, e.g. `totalRevenue` → `Total Revenue`.
 */
export const toLineItemLabel = (key: string): string => {
  const spaced = key.replace(/([a-z0-9])([A-Z])/g, "$1 $2");
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
};

const optionalText = (raw: string | undefined): string | undefined => {
  const trimmed = raw?.trim();
  return trimmed && trimmed !== "None" ? trimmed : undefined;
};

/**
 * Pivots Alpha Vantage annual reports (one object per period) into a wide statement table.
 */
export const toStatementTable = (
  reports: Array<Record<string, unknown>>,
): StatementTable => {
  const periods: Date[] = [];
  const periodReports: Array<Record<string, unknown>> = [];

  for (const report of reports) {
    const raw = report[PERIOD_FIELD];
    const period = typeof raw === "string" ? parseIsoDate(raw) : null;
    if (!period) {
      continue;
    }
    periods.push(period);
    periodReports.push(report);
  }

  const keys: string[] = [];
  for (const report of periodReports) {
    for (const key of Object.keys(report)) {
      if (key !== PERIOD_FIELD && !keys.includes(key)) {
        keys.push(key);
      }
    }
  }

  return {
    periods,
    lineItems: keys.map((key) => ({
      label: toLineItemLabel(key),
      values: periodReports.map((report) => parseCell(report[key])),
    })),
  };
};

/**
 * Adapts Alpha Vantage OVERVIEW and statement endpoints to the financial data port.
 */
export class AlphaVantageFinancialsProvider implements FinancialDataProviderPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error(
        "ALPHA_VANTAGE_API_KEY is required when Alpha Vantage financials provider is enabled.",
      );
    }
  }

  async fetchProfile(
    request: ProfileRequest,
  ): Promise<Result<CompanyProfile, AppBoundaryError>> {
    const payload = await this.query("OVERVIEW", request.symbol);
    if (payload.isErr()) {
      return err(payload.error);
    }

    const parsed = overviewSchema.safeParse(payload.value);
    if (!parsed.success) {
      return err(this.malformed("Overview payload did not match the expected shape."));
    }

    const notice = this.toNoticeError(parsed.data);
    if (notice) {
      return err(notice);
    }

    const overview = parsed.data;
    return ok({
      symbol: request.symbol.toUpperCase(),
      name: optionalText(overview.Name),
      exchange: optionalText(overview.Exchange),
      sector: optionalText(overview.Sector),
      industry: optionalText(overview.Industry),
      country: optionalText(overview.Country),
      website: optionalText(overview.OfficialSite),
      description: optionalText(overview.Description),
      currency: optionalText(overview.Currency),
    });
  }

  async fetchStatement(
    request: StatementRequest,
  ): Promise<Result<StatementTable, AppBoundaryError>> {
    const payload = await this.query(
      statementFunctions[request.statement],
      request.symbol,
    );
    if (payload.isErr()) {
      return err(payload.error);
    }

    const parsed = statementSchema.safeParse(payload.value);
    if (!parsed.success) {
      return err(
        this.malformed(
          `${statementFunctions[request.statement]} payload did not match the expected shape.`,
        ),
      );
    }

    const notice = this.toNoticeError(parsed.data);
    if (notice) {
      return err(notice);
    }

    return ok(toStatementTable(parsed.data.annualReports ?? []));
  }

  private async query(
    fn: string,
    symbol: string,
  ): Promise<Result<unknown, AppBoundaryError>> {
    const response = await this.httpClient.getQuery({
      baseUrl: this.baseUrl,
      path: "/query",
      query: {
        function: fn,
        symbol: symbol.toUpperCase(),
        apikey: this.apiKey,
      },
      secretParams: ["apikey"],
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(this.fromHttpError(response.error));
    }

    return ok(response.value);
  }

  private fromHttpError(error: HttpClientError): AppBoundaryError {
    const status = error.httpStatus;

    if (status === 401 || status === 403) {
      return {
        source: "provider",
        code: "auth_invalid",
        provider: PROVIDER,
        message: `Alpha Vantage auth failed with status ${status}.`,
        httpStatus: status,
        cause: error.cause,
      };
    }

    if (status === 429) {
      return {
        source: "provider",
        code: "rate_limited",
        provider: PROVIDER,
        message: "Alpha Vantage rate limit reached.",
        httpStatus: status,
      };
    }

    return {
      source: "provider",
      code: error.code === "non_success_status" ? "provider_error" : error.code,
      provider: PROVIDER,
      message: error.message,
      httpStatus: status,
      cause: error.cause,
    };
  }

  /**
   * Alpha Vantage answers 200 with a Note/Information/Error Message body for throttling and bad symbols.
   */
  private toNoticeError(payload: ProviderNotice): AppBoundaryError | null {
    const note = payload.Note?.trim() || payload.Information?.trim();
    if (note) {
      const isRateLimit = /rate|frequency|limit|calls per minute/i.test(note);
      return {
        source: "provider",
        code: isRateLimit ? "rate_limited" : "provider_error",
        provider: PROVIDER,
        message: note,
      };
    }

    const errorMessage = payload["Error Message"]?.trim();
    if (errorMessage) {
      return {
        source: "provider",
        code: "not_found",
        provider: PROVIDER,
        message: errorMessage,
      };
    }

    return null;
  }

  private malformed(message: string): AppBoundaryError {
    return {
      source: "provider",
      code: "malformed_response",
      provider: PROVIDER,
      message,
    };
  }
}
