/**
 * Import driver: reads the CSV, maps each row, creates one task per row,
 * and keeps the ledger of outcomes.
 */

import { ClickUpClient } from "./clickup-client.js";
import { readCsv, writeCsv } from "./csv.js";
import { ConfigurationError, CSVError } from "./errors.js";
import { LEDGER_FIELDS, Ledger } from "./ledger.js";
import { silentLogger, type Logger } from "./logger.js";
import { mapRow } from "./row-mapper.js";
import type { CreateTaskResult, ResultEntry, TaskPayload } from "./types.js";

export interface ImportOptions {
  csvFile: string;
  listId: string;
  token: string;
  baseUrl?: string;
  dryRun?: boolean;
  /** Where to write the results ledger, if anywhere. */
  output?: string;
}

/** The subset of ClickUpClient the driver needs. */
export interface TaskService {
  verifyAccess(): Promise<string>;
  createTask(payload: TaskPayload): Promise<CreateTaskResult>;
}

export interface ImportDeps {
  client?: TaskService;
  logger?: Logger;
}

export interface ImportSummary {
  totalRows: number;
  successCount: number;
  errorCount: number;
  skippedCount: number;
  entries: readonly ResultEntry[];
}

export async function runImport(
  options: ImportOptions,
  deps: ImportDeps = {},
): Promise<ImportSummary> {
  const logger = deps.logger ?? silentLogger;
  const dryRun = options.dryRun ?? false;

  // ── Initializing ─────────────────────────────────────────────────
  if (!options.token) throw new ConfigurationError("API token is required");
  if (!options.listId) throw new ConfigurationError("List ID is required");

  const { fields, rows, errors } = readCsv(options.csvFile);
  if (!fields.includes("name")) {
    throw new CSVError("CSV must contain a 'name' column for task names");
  }
  for (const problem of errors) logger.warn(`CSV parse problem: ${problem}`);
  logger.info(`Found ${rows.length} tasks in CSV file`);

  const client =
    deps.client ??
    new ClickUpClient({
      token: options.token,
      listId: options.listId,
      baseUrl: options.baseUrl,
      dryRun,
      logger,
    });

  // ── Verifying ────────────────────────────────────────────────────
  if (!dryRun) {
    const listName = await client.verifyAccess();
    logger.info(`API token and list ID verified. List name: ${listName}`);
  }

  // ── Processing ───────────────────────────────────────────────────
  const ledger = new Ledger();
  let skippedCount = 0;

  for (const [index, row] of rows.entries()) {
    const rowNumber = index + 1;
    const mapped = mapRow(row, rowNumber);
    if (mapped.skip) {
      logger.warn(`Skipping row ${rowNumber} - no task name provided`);
      skippedCount++;
      continue;
    }
    for (const warning of mapped.warnings) logger.warn(warning);

    const { payload } = mapped;
    logger.info(`Creating task ${rowNumber}/${rows.length}: ${payload.name}`);
    logger.debug(JSON.stringify(payload));

    const result = await client.createTask(payload);
    if (result.ok) {
      logger.info(`Created task "${payload.name}" with ID ${result.id}`);
      ledger.recordSuccess(payload.name, rowNumber, result.id, result.url);
    } else {
      logger.error(`Failed to create task "${payload.name}": ${result.error}`);
      ledger.recordFailure(payload.name, rowNumber, result.error);
    }
  }

  // ── Finalizing ───────────────────────────────────────────────────
  if (options.output) {
    try {
      writeCsv(options.output, LEDGER_FIELDS, ledger.toRecords());
      logger.info(`Results written to ${options.output}`);
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      logger.error(`Failed to write results to ${options.output}: ${msg}`);
    }
  }

  // ── Done ─────────────────────────────────────────────────────────
  const summary: ImportSummary = {
    totalRows: rows.length,
    successCount: ledger.successCount,
    errorCount: ledger.errorCount,
    skippedCount,
    entries: ledger.entries,
  };

  if (dryRun) {
    logger.info(
      `[dry-run] Would have created ${summary.successCount} tasks, ` +
        `${summary.errorCount} would have failed.`,
    );
  } else {
    logger.info(
      `Import completed. Created ${summary.successCount} tasks, ${summary.errorCount} failed.`,
    );
  }

  return summary;
}
