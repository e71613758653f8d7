export type SourceId = string;

export interface RunRecord {
  period: number;
  totalAlive: number;
  males: number;
  females: number;
  births: number;
  deaths: number;
}

export interface RunTable {
  sourceId: SourceId;
  fileName: string;
  filePath: string;
  records: readonly RunRecord[];
}

export interface SummaryRecord {
  simNumber: number;
  finalAlive: number;
  monthsSimulated: number;
  extinctionMonth: number;
}

export interface SummaryTable {
  fileName: string;
  filePath: string;
  records: readonly SummaryRecord[];
}

export interface DatasetLocation {
  root: string;
  runFiles: string[];
  summaryFile: string | null;
}

export interface InvalidCell {
  /** 1-based data row index, not counting the header. */
  row: number;
  column: string;
  value: string;
  message: string;
}

export type RunLoadOutcome =
  | { status: 'loaded'; fileName: string; table: RunTable }
  | {
      status: 'failed';
      fileName: string;
      note: string;
      missingColumns: string[];
      invalidCells: InvalidCell[];
    };

export type SummaryLoadOutcome =
  | { status: 'loaded'; fileName: string; table: SummaryTable }
  | { status: 'missing'; note: string }
  | {
      status: 'failed';
      fileName: string;
      note: string;
      missingColumns: string[];
      invalidCells: InvalidCell[];
    };

export interface GrowthRatePoint {
  period: number;
  /** Percent change from the previous period; null when the previous population was zero. */
  value: number | null;
}

export interface PhasePair {
  period: number;
  current: number;
  next: number;
}

export interface PhaseSeries {
  pairs: PhasePair[];
  min: number | null;
  max: number | null;
}

export type NetChangeCategory = 'non_negative' | 'negative';

export interface NetChangePoint {
  period: number;
  value: number;
  category: NetChangeCategory;
}

export interface SexRatio {
  period: number;
  males: number;
  females: number;
  malePercent: number | null;
  femalePercent: number | null;
}

export interface CombinedRunRecord extends RunRecord {
  sourceId: SourceId;
}

export interface CohortPartition {
  extinct: SummaryRecord[];
  surviving: SummaryRecord[];
}

export interface OutcomeStats {
  runCount: number;
  finalAliveMean: number;
  finalAliveStdDev: number;
  finalAliveMin: number;
  finalAliveMax: number;
  finalAliveCi95: [number, number];
  extinctionCount: number;
  extinctionPercent: number;
}

export interface RunDerivedSeries {
  sourceId: SourceId;
  table: RunTable;
  growthRate: GrowthRatePoint[];
  phase: PhaseSeries;
  netChange: NetChangePoint[];
  finalSexRatio: SexRatio | null;
}

export interface AnalysisResult {
  runs: RunDerivedSeries[];
  combined: CombinedRunRecord[];
  combinedNetChange: NetChangePoint[];
  summary: SummaryTable | null;
  cohorts: CohortPartition | null;
  outcomeStats: OutcomeStats | null;
}

export type ChartId =
  | '01_population_over_time'
  | '02_growth_rate_over_time'
  | '03_phase_plot'
  | '04_population_structure'
  | '05_births_vs_deaths'
  | '08_extinction_outcomes';

export type ChartOutcome =
  | { id: ChartId; status: 'rendered'; title: string; filePath: string }
  | { id: ChartId; status: 'skipped'; title: string; note: string }
  | { id: ChartId; status: 'failed'; title: string; note: string };

export type AnalysisStatus = 'completed' | 'no_data';

export interface AnalysisReport {
  status: AnalysisStatus;
  location: DatasetLocation;
  runOutcomes: RunLoadOutcome[];
  summaryOutcome: SummaryLoadOutcome;
  charts: ChartOutcome[];
  outcomeStats: OutcomeStats | null;
}
