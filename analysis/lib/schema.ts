import { z } from 'zod';
import type { InvalidCell, RunRecord, SummaryRecord } from '../../shared/types.js';
import { DatasetValidationError } from './errors.js';
import type { CsvTable } from './io.js';

const rawCell = z
  .string({ required_error: 'value is missing' })
  .trim()
  .min(1, { message: 'value is empty' });

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

// Plain decimal notation only; hex, binary and exponent forms are mis-typed cells.
const integerCell = rawCell
  .pipe(z.string().regex(DECIMAL_PATTERN, { message: 'not a number' }))
  .pipe(z.string().regex(INTEGER_PATTERN, { message: 'not an integer' }))
  .pipe(z.coerce.number());

const countCell = integerCell.pipe(z.number().nonnegative({ message: 'must be zero or positive' }));

export interface RecordSchema<T> {
  /** Record field to CSV header name. */
  columns: { readonly [K in keyof T]: string };
  row: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export const RUN_RECORD_SCHEMA: RecordSchema<RunRecord> = {
  columns: {
    period: 'Month',
    totalAlive: 'Total_Alive',
    males: 'Males',
    females: 'Females',
    births: 'Births',
    deaths: 'Deaths'
  },
  row: z.object({
    period: countCell,
    totalAlive: countCell,
    males: countCell,
    females: countCell,
    births: countCell,
    deaths: countCell
  })
};

export const SUMMARY_RECORD_SCHEMA: RecordSchema<SummaryRecord> = {
  columns: {
    simNumber: 'Sim_Number',
    finalAlive: 'Final_Alive',
    monthsSimulated: 'Months_Simulated',
    extinctionMonth: 'Extinction_Month'
  },
  row: z.object({
    simNumber: integerCell,
    finalAlive: countCell,
    monthsSimulated: countCell,
    extinctionMonth: countCell
  })
};

/**
 * Checks the header once and every row against the schema. Throws a single
 * DatasetValidationError listing every missing column or bad cell.
 */
export function validateRecords<T>(fileName: string, table: CsvTable, schema: RecordSchema<T>): T[] {
  const columnEntries: Array<[string, string]> = Object.entries(schema.columns);
  const columnByField = new Map(columnEntries);

  const missingColumns = columnEntries
    .map(([, column]) => column)
    .filter((column) => !table.headerIndex.has(column));
  if (missingColumns.length > 0) {
    throw new DatasetValidationError(fileName, missingColumns, []);
  }

  const records: T[] = [];
  const invalidCells: InvalidCell[] = [];

  for (const { row, cells } of table.rows) {
    const raw: Record<string, string | undefined> = {};
    for (const [field, column] of columnEntries) {
      const index = table.headerIndex.get(column);
      raw[field] = index === undefined ? undefined : cells[index];
    }

    const parsed = schema.row.safeParse(raw);
    if (parsed.success) {
      records.push(parsed.data);
      continue;
    }

    for (const issue of parsed.error.issues) {
      const field = String(issue.path[0] ?? '');
      invalidCells.push({
        row,
        column: columnByField.get(field) ?? field,
        value: raw[field] ?? '',
        message: issue.message
      });
    }
  }

  if (invalidCells.length > 0) {
    throw new DatasetValidationError(fileName, [], invalidCells);
  }

  return records;
}
