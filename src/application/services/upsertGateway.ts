import type { UpsertRow } from "../../core/entities/financialRecord";
import type { UploadOutcome } from "../../core/entities/ingestion";
import type { TableUpsertPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";

/**
 * Sends one insert-or-update batch per call and reduces the datastore answer to a tri-state outcome.
 */
export class UpsertGateway {
  constructor(private readonly store: TableUpsertPort) {}

  async upload(
    table: string,
    rows: UpsertRow[],
    conflictKeys: string[],
  ): Promise<UploadOutcome> {
    if (rows.length === 0) {
      logger.debug({ table }, "No rows to upload");
      return {
        status: "skipped",
        table,
        message: `No data to upload for ${table}.`,
      };
    }

    try {
      const result = await this.store.upsertRows(table, rows, conflictKeys);

      if (result.isErr()) {
        logger.error(
          { table, code: result.error.code, reason: result.error.message },
          "Upload failed",
        );
        return {
          status: "error",
          table,
          message: `Failed to upload data to ${table}: ${result.error.message}`,
        };
      }

      const { rowCount } = result.value;
      logger.info({ table, rowCount, batchSize: rows.length }, "Upload done");

      if (rowCount === null || rowCount === 0) {
        return {
          status: "success",
          table,
          rowCount,
          message: `Upload to ${table} completed with no data returned (might be no changes).`,
        };
      }

      return {
        status: "success",
        table,
        rowCount,
        message: `Successfully uploaded ${rowCount} records to ${table}.`,
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error({ table, reason }, "Upload threw");
      return {
        status: "error",
        table,
        message: `An error occurred during upload to ${table}: ${reason}`,
      };
    }
  }
}
