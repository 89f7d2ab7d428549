import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parseTickerList } from "../../application/services/tickerListService";
import type { TickerSourcePort } from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";

const readErrorCode = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;

/**
 * Loads the ticker list from a plain-text file. Any unreadable file yields an empty list.
 */
export class FileTickerSource implements TickerSourcePort {
  constructor(
    private readonly filePath: string,
    private readonly exchangeSuffix: string,
  ) {}

  async loadTickers(): Promise<string[]> {
    const fullPath = resolve(this.filePath);

    try {
      const contents = await readFile(fullPath, "utf8");
      const tickers = parseTickerList(contents, this.exchangeSuffix);
      logger.info({ filePath: fullPath, count: tickers.length }, "Loaded tickers");
      return tickers;
    } catch (error) {
      const code = readErrorCode(error);
      logger.error(
        {
          filePath: fullPath,
          code,
          reason: error instanceof Error ? error.message : String(error),
        },
        code === "ENOENT" ? "Ticker file not found" : "Ticker file unreadable",
      );
      return [];
    }
  }
}
