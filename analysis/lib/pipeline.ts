import { renderCharts } from '../../charts/renderer.js';
import type { ChartDefinition } from '../../charts/chartOptions.js';
import type { AnalysisReport, ChartOutcome, OutcomeStats } from '../../shared/types.js';
import type { AnalysisConfig } from './config.js';
import { DEFAULT_DATASET_NAMING, locateDatasets, type DatasetNaming } from './locator.js';
import { consoleLogger, type AnalysisLogger } from './logger.js';
import { deriveAnalysis, summarizeOutcomes } from './metrics.js';
import { loadedRunTables, loadRunTables } from './runLoader.js';
import { loadSummaryOutcome } from './summaryLoader.js';

const RULE = '='.repeat(60);

type RenderedChart = Extract<ChartOutcome, { status: 'rendered' }>;

export interface AnalysisRunOptions {
  config: AnalysisConfig;
  naming?: DatasetNaming;
  charts?: ChartDefinition[];
  logger?: AnalysisLogger;
}

/**
 * Locate, load, derive and render in one pass. Failures of individual files
 * and charts are reported in the returned value; nothing here throws for bad data.
 */
export function runAnalysis(options: AnalysisRunOptions): AnalysisReport {
  const { config } = options;
  const logger = options.logger ?? consoleLogger;

  logger.info(RULE);
  logger.info('POPULATION SIMULATION ANALYSIS - GENERATING PLOTS');
  logger.info(RULE);

  const location = locateDatasets(config.dataDir, options.naming ?? DEFAULT_DATASET_NAMING, logger);
  logger.info(
    `[locator] Found ${location.runFiles.length} run dataset(s) in ${location.root}` +
      (location.summaryFile ? ' and a summary dataset' : '')
  );

  const runOutcomes = loadRunTables(location.runFiles, logger);
  const summaryOutcome = loadSummaryOutcome(location.summaryFile, config.summarySkipLines, logger);
  const tables = loadedRunTables(runOutcomes);
  const summary = summaryOutcome.status === 'loaded' ? summaryOutcome.table : null;

  if (tables.length === 0) {
    const report: AnalysisReport = {
      status: 'no_data',
      location,
      runOutcomes,
      summaryOutcome,
      charts: [],
      outcomeStats: summary ? summarizeOutcomes(summary) : null
    };
    formatReport(report).forEach((line) => logger.info(line));
    return report;
  }

  const analysis = deriveAnalysis(tables, summary);
  const charts = renderCharts(analysis, {
    outDir: config.outDir,
    size: { width: config.chartWidth, height: config.chartHeight },
    definitions: options.charts,
    logger
  });

  const report: AnalysisReport = {
    status: 'completed',
    location,
    runOutcomes,
    summaryOutcome,
    charts,
    outcomeStats: analysis.outcomeStats
  };
  formatReport(report).forEach((line) => logger.info(line));
  return report;
}

function formatStats(stats: OutcomeStats): string[] {
  const [low, high] = stats.finalAliveCi95;
  return [
    `[analysis] Final alive: mean ${stats.finalAliveMean.toFixed(2)}, sd ${stats.finalAliveStdDev.toFixed(2)}, ` +
      `min/max ${stats.finalAliveMin}/${stats.finalAliveMax}, 95% CI [${low.toFixed(2)} ; ${high.toFixed(2)}]`,
    `[analysis] Extinctions: ${stats.extinctionCount} of ${stats.runCount} (${stats.extinctionPercent.toFixed(2)}%)`
  ];
}

export function formatReport(report: AnalysisReport): string[] {
  const lines: string[] = [RULE];
  const failedRuns = report.runOutcomes.filter((outcome) => outcome.status === 'failed').length;

  if (report.status === 'no_data') {
    if (report.location.runFiles.length === 0) {
      lines.push(`[analysis] No data: no simulation run datasets found in ${report.location.root}.`);
    } else {
      lines.push(`[analysis] No data: all ${failedRuns} simulation run dataset(s) failed to load.`);
    }
    lines.push('[analysis] No charts were produced.');
    lines.push(RULE);
    return lines;
  }

  const loadedRuns = report.runOutcomes.length - failedRuns;
  lines.push(`[analysis] Loaded ${loadedRuns} of ${report.runOutcomes.length} run dataset(s) (${failedRuns} failed).`);
  if (report.outcomeStats) {
    lines.push(...formatStats(report.outcomeStats));
  }

  const rendered = report.charts.filter((chart): chart is RenderedChart => chart.status === 'rendered');
  if (rendered.length === 0) {
    lines.push('[analysis] No charts were produced.');
  } else {
    lines.push('[analysis] Output files:');
    for (const chart of rendered) {
      lines.push(`[analysis]   ${chart.filePath} - ${chart.title}`);
    }
  }

  for (const chart of report.charts) {
    if (chart.status !== 'rendered') {
      lines.push(`[analysis] Not produced (${chart.status}): ${chart.id} - ${chart.note}`);
    }
  }

  lines.push(RULE);
  return lines;
}
