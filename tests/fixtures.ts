import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { RunRecord, RunTable, SummaryRecord, SummaryTable } from '../shared/types.js';

export const RUN_HEADER = 'Month,Total_Alive,Males,Females,Births,Deaths';

export type RunRow = [period: number, totalAlive: number, males: number, females: number, births: number, deaths: number];

export function createFixtureDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'sim-analysis-'));
}

export function removeFixtureDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function buildRunCsv(rows: RunRow[]): string {
  return [RUN_HEADER, ...rows.map((row) => row.join(','))].join('\n') + '\n';
}

export function buildSummaryCsv(rows: Array<[number, number, number, number]>): string {
  return [
    '# Population simulation summary',
    '# Months: 24',
    '# Initial population: 20',
    '# Simulations: 2',
    '# Seed: 42',
    '#',
    'Sim_Number,Final_Alive,Months_Simulated,Extinction_Month',
    ...rows.map((row) => row.join(','))
  ].join('\n');
}

export function writeFixtureFile(dir: string, fileName: string, content: string): string {
  const filePath = path.join(dir, fileName);
  fs.writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

export function runTable(sourceId: string, rows: RunRow[]): RunTable {
  const records: RunRecord[] = rows.map(([period, totalAlive, males, females, births, deaths]) => ({
    period,
    totalAlive,
    males,
    females,
    births,
    deaths
  }));
  return { sourceId, fileName: sourceId, filePath: `/fixtures/${sourceId}`, records };
}

export function summaryTable(rows: Array<[number, number, number, number]>): SummaryTable {
  const records: SummaryRecord[] = rows.map(([simNumber, finalAlive, monthsSimulated, extinctionMonth]) => ({
    simNumber,
    finalAlive,
    monthsSimulated,
    extinctionMonth
  }));
  return { fileName: 'simulation_summary_test.csv', filePath: '/fixtures/simulation_summary_test.csv', records };
}

export function populationRows(populations: number[]): RunRow[] {
  return populations.map((total, period) => [period, total, Math.floor(total / 2), total - Math.floor(total / 2), 0, 0]);
}
