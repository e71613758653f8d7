import path from 'node:path';
import type { RunLoadOutcome, RunTable } from '../../shared/types.js';
import { describeLoadFailure } from './errors.js';
import { readCsvTable } from './io.js';
import { consoleLogger, type AnalysisLogger } from './logger.js';
import { RUN_RECORD_SCHEMA, validateRecords } from './schema.js';

/** Parses one per-run CSV. The file name becomes the run's source id. */
export function loadRunTable(filePath: string): RunTable {
  const fileName = path.basename(filePath);
  const table = readCsvTable(filePath);
  const records = validateRecords(fileName, table, RUN_RECORD_SCHEMA);

  return Object.freeze({
    sourceId: fileName,
    fileName,
    filePath,
    records: Object.freeze(records.map((record) => Object.freeze(record)))
  });
}

export function loadRunTables(filePaths: string[], logger: AnalysisLogger = consoleLogger): RunLoadOutcome[] {
  return filePaths.map((filePath): RunLoadOutcome => {
    const fileName = path.basename(filePath);
    try {
      const table = loadRunTable(filePath);
      logger.info(`[run-loader] Loaded: ${fileName} (${table.records.length} period(s))`);
      return { status: 'loaded', fileName, table };
    } catch (error) {
      const failed = describeLoadFailure(fileName, error);
      logger.error(`[run-loader] Error loading ${fileName}: ${failed.note}`);
      return { status: 'failed', ...failed };
    }
  });
}

export function loadedRunTables(outcomes: RunLoadOutcome[]): RunTable[] {
  return outcomes.flatMap((outcome) => (outcome.status === 'loaded' ? [outcome.table] : []));
}
