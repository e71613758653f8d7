#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { resolveAnalysisConfig } from './lib/config.js';
import { ConfigError, describeError } from './lib/errors.js';
import { runAnalysis } from './lib/pipeline.js';

const argv = yargs(hideBin(process.argv))
  .scriptName('simulation-analysis')
  .usage('$0 [options]', 'Load simulation run outputs and render comparison charts.')
  .option('data-dir', {
    type: 'string',
    describe: 'Directory holding simulation_*_pop*.csv and simulation_summary_*.csv (env SIM_ANALYSIS_DATA_DIR)'
  })
  .option('out-dir', {
    type: 'string',
    describe: 'Directory charts are written to (env SIM_ANALYSIS_OUT_DIR)'
  })
  .option('summary-skip-lines', {
    type: 'number',
    describe: 'Metadata lines ahead of the summary header (env SIM_ANALYSIS_SUMMARY_SKIP_LINES)'
  })
  .option('width', {
    type: 'number',
    describe: 'Base chart width in pixels (env SIM_ANALYSIS_CHART_WIDTH)'
  })
  .option('height', {
    type: 'number',
    describe: 'Base chart height in pixels (env SIM_ANALYSIS_CHART_HEIGHT)'
  })
  .strict()
  .help()
  .parseSync();

try {
  const config = resolveAnalysisConfig({
    dataDir: argv['data-dir'],
    outDir: argv['out-dir'],
    summarySkipLines: argv['summary-skip-lines'],
    chartWidth: argv.width,
    chartHeight: argv.height
  });
  runAnalysis({ config });
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(`[analysis] ${error.message}`);
  } else {
    console.error(`[analysis] Unexpected failure: ${describeError(error)}`);
  }
  process.exitCode = 1;
}
