import fs from 'node:fs';
import path from 'node:path';
import { DatasetParseError, describeError } from './errors.js';

export interface CsvRow {
  /** 1-based data row index, not counting the header. */
  row: number;
  cells: string[];
}

export interface CsvTable {
  header: string[];
  headerIndex: Map<string, number>;
  rows: CsvRow[];
}

export function parseCsvRow(line: string): string[] {
  return line.split(',').map((token) => token.trim().replace(/^"(.*)"$/, '$1'));
}

export function buildHeaderIndex(header: string[]): Map<string, number> {
  const headerIndex = new Map<string, number>();
  header.forEach((columnName, index) => {
    if (!headerIndex.has(columnName)) {
      headerIndex.set(columnName, index);
    }
  });
  return headerIndex;
}

/**
 * Reads a comma separated file with a header row. `skipLines` raw lines are
 * dropped before the header is looked for; blank lines after that are ignored.
 */
export function readCsvTable(filePath: string, skipLines = 0): CsvTable {
  const fileName = path.basename(filePath);
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new DatasetParseError(fileName, `Failed to read file: ${describeError(error)}`, { cause: error });
  }

  const lines = content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .slice(skipLines)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.length === 0) {
    throw new DatasetParseError(fileName, 'File is empty.');
  }

  const header = parseCsvRow(lines[0]);
  return {
    header,
    headerIndex: buildHeaderIndex(header),
    rows: lines.slice(1).map((line, index) => ({ row: index + 1, cells: parseCsvRow(line) }))
  };
}

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * File names directly under root, following symbolic links to files.
 * A missing root lists nothing; any other read error is thrown.
 */
export function listFileNames(root: string): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(root, { withFileTypes: true });
  } catch (error) {
    if (isMissingPath(error)) {
      return [];
    }
    throw error;
  }

  return entries
    .filter(
      (entry) =>
        entry.isFile() ||
        (entry.isSymbolicLink() && (fs.statSync(path.join(root, entry.name), { throwIfNoEntry: false })?.isFile() ?? false))
    )
    .map((entry) => entry.name);
}
