import type {
  AnalysisResult,
  CohortPartition,
  CombinedRunRecord,
  GrowthRatePoint,
  NetChangePoint,
  OutcomeStats,
  PhaseSeries,
  RunDerivedSeries,
  RunTable,
  SexRatio,
  SummaryTable
} from '../../shared/types.js';

const CI95_Z = 1.96;

export function growthRateSeries(table: RunTable): GrowthRatePoint[] {
  const { records } = table;
  const points: GrowthRatePoint[] = [];

  for (let index = 0; index + 1 < records.length; index += 1) {
    const current = records[index].totalAlive;
    const next = records[index + 1].totalAlive;
    points.push({
      period: records[index + 1].period,
      value: current === 0 ? null : ((next - current) / current) * 100
    });
  }

  return points;
}

export function phasePairs(table: RunTable): PhaseSeries {
  const { records } = table;
  const pairs = records.slice(0, -1).map((record, index) => ({
    period: record.period,
    current: record.totalAlive,
    next: records[index + 1].totalAlive
  }));

  if (records.length === 0) {
    return { pairs, min: null, max: null };
  }

  let min = records[0].totalAlive;
  let max = records[0].totalAlive;
  for (const record of records) {
    min = Math.min(min, record.totalAlive);
    max = Math.max(max, record.totalAlive);
  }

  return { pairs, min, max };
}

export function netChangeSeries(table: Pick<RunTable, 'records'>): NetChangePoint[] {
  return table.records.map((record): NetChangePoint => {
    const value = record.births - record.deaths;
    return { period: record.period, value, category: value >= 0 ? 'non_negative' : 'negative' };
  });
}

/** Counts at the latest period; the first such row wins on ties. */
export function finalSexRatio(table: RunTable): SexRatio | null {
  if (table.records.length === 0) {
    return null;
  }
  let latest = table.records[0];
  for (const record of table.records) {
    if (record.period > latest.period) {
      latest = record;
    }
  }

  const total = latest.males + latest.females;
  return {
    period: latest.period,
    males: latest.males,
    females: latest.females,
    malePercent: total === 0 ? null : (latest.males / total) * 100,
    femalePercent: total === 0 ? null : (latest.females / total) * 100
  };
}

export function partitionCohorts(summary: SummaryTable): CohortPartition {
  const extinct = summary.records.filter((record) => record.extinctionMonth > 0);
  const surviving = summary.records.filter((record) => record.extinctionMonth === 0);
  return { extinct, surviving };
}

/** Rows keep discovery order then file order; nothing is re-sorted by period. */
export function concatenateRuns(tables: readonly RunTable[]): CombinedRunRecord[] {
  return tables.flatMap((table) => table.records.map((record) => ({ ...record, sourceId: table.sourceId })));
}

export function summarizeOutcomes(summary: SummaryTable): OutcomeStats | null {
  const values = summary.records.map((record) => record.finalAlive);
  const n = values.length;
  if (n === 0) {
    return null;
  }

  const mean = values.reduce((total, value) => total + value, 0) / n;
  const meanOfSquares = values.reduce((total, value) => total + value * value, 0) / n;
  const variance = Math.max(0, meanOfSquares - mean * mean);
  const stdDev = Math.sqrt(variance);
  const halfWidth = (CI95_Z * stdDev) / Math.sqrt(n);
  const extinctionCount = summary.records.filter((record) => record.extinctionMonth > 0).length;

  return {
    runCount: n,
    finalAliveMean: mean,
    finalAliveStdDev: stdDev,
    finalAliveMin: Math.min(...values),
    finalAliveMax: Math.max(...values),
    finalAliveCi95: [mean - halfWidth, mean + halfWidth],
    extinctionCount,
    extinctionPercent: (extinctionCount / n) * 100
  };
}

export function deriveRunSeries(table: RunTable): RunDerivedSeries {
  return {
    sourceId: table.sourceId,
    table,
    growthRate: growthRateSeries(table),
    phase: phasePairs(table),
    netChange: netChangeSeries(table),
    finalSexRatio: finalSexRatio(table)
  };
}

export function deriveAnalysis(tables: readonly RunTable[], summary: SummaryTable | null): AnalysisResult {
  const combined = concatenateRuns(tables);
  return {
    runs: tables.map(deriveRunSeries),
    combined,
    combinedNetChange: netChangeSeries({ records: combined }),
    summary,
    cohorts: summary ? partitionCohorts(summary) : null,
    outcomeStats: summary ? summarizeOutcomes(summary) : null
  };
}
