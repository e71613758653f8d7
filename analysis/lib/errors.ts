import type { InvalidCell } from '../../shared/types.js';

export class DatasetParseError extends Error {
  readonly fileName: string;

  constructor(fileName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatasetParseError';
    this.fileName = fileName;
  }
}

/** Raised once per file when its header or cells do not satisfy the record schema. */
export class DatasetValidationError extends DatasetParseError {
  readonly missingColumns: string[];
  readonly invalidCells: InvalidCell[];

  constructor(fileName: string, missingColumns: string[], invalidCells: InvalidCell[]) {
    super(fileName, describeValidationFailure(missingColumns, invalidCells));
    this.name = 'DatasetValidationError';
    this.missingColumns = missingColumns;
    this.invalidCells = invalidCells;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const MAX_LISTED_CELLS = 5;

function describeValidationFailure(missingColumns: string[], invalidCells: InvalidCell[]): string {
  const parts: string[] = [];
  if (missingColumns.length > 0) {
    parts.push(`Missing required columns: ${missingColumns.join(', ')}`);
  }
  if (invalidCells.length > 0) {
    const listed = invalidCells
      .slice(0, MAX_LISTED_CELLS)
      .map((cell) => `row ${cell.row} ${cell.column}="${cell.value}" (${cell.message})`)
      .join('; ');
    const remainder = invalidCells.length - MAX_LISTED_CELLS;
    parts.push(`Invalid cells: ${listed}${remainder > 0 ? `; and ${remainder} more` : ''}`);
  }
  return parts.join('. ') || 'Dataset failed validation.';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function describeLoadFailure(fileName: string, error: unknown): {
  fileName: string;
  note: string;
  missingColumns: string[];
  invalidCells: InvalidCell[];
} {
  if (error instanceof DatasetValidationError) {
    return {
      fileName,
      note: error.message,
      missingColumns: error.missingColumns,
      invalidCells: error.invalidCells
    };
  }
  const note = error instanceof DatasetParseError ? error.message : `Failed to parse: ${describeError(error)}`;
  return { fileName, note, missingColumns: [], invalidCells: [] };
}
