import path from 'node:path';
import type { DatasetLocation } from '../../shared/types.js';
import { describeError } from './errors.js';
import { listFileNames } from './io.js';
import { consoleLogger, type AnalysisLogger } from './logger.js';

export interface DatasetNaming {
  runPattern: RegExp;
  /** Run files whose name contains this are never treated as runs. */
  summaryInfix: string;
  summaryPattern: RegExp;
}

export const DEFAULT_DATASET_NAMING: DatasetNaming = {
  runPattern: /^simulation_.*_pop.*\.csv$/,
  summaryInfix: 'summary',
  summaryPattern: /^simulation_summary_.*\.csv$/
};

function compareFileNames(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function readFileNames(root: string, logger: AnalysisLogger): string[] {
  try {
    return listFileNames(root);
  } catch (error) {
    logger.error(`[locator] Could not read ${root}: ${describeError(error)}`);
    return [];
  }
}

/** An unreadable root is logged and treated as holding no datasets. */
export function locateDatasets(
  root: string,
  naming: DatasetNaming = DEFAULT_DATASET_NAMING,
  logger: AnalysisLogger = consoleLogger
): DatasetLocation {
  const fileNames = readFileNames(root, logger).sort(compareFileNames);

  const runFiles = fileNames
    .filter((name) => naming.runPattern.test(name))
    .filter((name) => !name.includes(naming.summaryInfix))
    .map((name) => path.join(root, name));

  const summaryName = fileNames.find((name) => naming.summaryPattern.test(name));

  return {
    root,
    runFiles,
    summaryFile: summaryName === undefined ? null : path.join(root, summaryName)
  };
}
