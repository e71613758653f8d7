import path from 'node:path';
import type { SummaryLoadOutcome, SummaryTable } from '../../shared/types.js';
import { describeLoadFailure } from './errors.js';
import { readCsvTable } from './io.js';
import { consoleLogger, type AnalysisLogger } from './logger.js';
import { SUMMARY_RECORD_SCHEMA, validateRecords } from './schema.js';

/** Metadata lines written ahead of the summary header. */
export const SUMMARY_PREAMBLE_LINES = 6;

export function loadSummaryTable(filePath: string, skipLines = SUMMARY_PREAMBLE_LINES): SummaryTable {
  const fileName = path.basename(filePath);
  const table = readCsvTable(filePath, skipLines);
  const records = validateRecords(fileName, table, SUMMARY_RECORD_SCHEMA);

  return Object.freeze({
    fileName,
    filePath,
    records: Object.freeze(records.map((record) => Object.freeze(record)))
  });
}

export function loadSummaryOutcome(
  filePath: string | null,
  skipLines = SUMMARY_PREAMBLE_LINES,
  logger: AnalysisLogger = consoleLogger
): SummaryLoadOutcome {
  if (filePath === null) {
    const note = 'No summary dataset found.';
    logger.info(`[summary-loader] ${note}`);
    return { status: 'missing', note };
  }

  const fileName = path.basename(filePath);
  try {
    const table = loadSummaryTable(filePath, skipLines);
    logger.info(`[summary-loader] Loaded summary: ${fileName} (${table.records.length} simulations)`);
    return { status: 'loaded', fileName, table };
  } catch (error) {
    const failed = describeLoadFailure(fileName, error);
    logger.error(`[summary-loader] Error loading summary ${fileName}: ${failed.note}`);
    return { status: 'failed', ...failed };
  }
}
