import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { SUMMARY_PREAMBLE_LINES } from './summaryLoader.js';

const DEFAULT_CHART_WIDTH = 1400;
const DEFAULT_CHART_HEIGHT = 700;

const configSchema = z.object({
  dataDir: z.string().trim().min(1, { message: 'must not be empty' }),
  outDir: z.string().trim().min(1, { message: 'must not be empty' }),
  summarySkipLines: z.coerce.number().int().nonnegative(),
  chartWidth: z.coerce.number().int().positive(),
  chartHeight: z.coerce.number().int().positive()
});

export type AnalysisConfig = z.infer<typeof configSchema>;

export interface AnalysisConfigInput {
  dataDir?: string;
  outDir?: string;
  summarySkipLines?: number | string;
  chartWidth?: number | string;
  chartHeight?: number | string;
}

type Env = Record<string, string | undefined>;

function readEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/** CLI values win over SIM_ANALYSIS_* environment variables, which win over defaults. */
export function resolveAnalysisConfig(input: AnalysisConfigInput = {}, env: Env = process.env): AnalysisConfig {
  const parsed = configSchema.safeParse({
    dataDir: input.dataDir ?? readEnv(env, 'SIM_ANALYSIS_DATA_DIR') ?? '.',
    outDir: input.outDir ?? readEnv(env, 'SIM_ANALYSIS_OUT_DIR') ?? '.',
    summarySkipLines: input.summarySkipLines ?? readEnv(env, 'SIM_ANALYSIS_SUMMARY_SKIP_LINES') ?? SUMMARY_PREAMBLE_LINES,
    chartWidth: input.chartWidth ?? readEnv(env, 'SIM_ANALYSIS_CHART_WIDTH') ?? DEFAULT_CHART_WIDTH,
    chartHeight: input.chartHeight ?? readEnv(env, 'SIM_ANALYSIS_CHART_HEIGHT') ?? DEFAULT_CHART_HEIGHT
  });

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid analysis configuration: ${details}`);
  }

  return {
    ...parsed.data,
    dataDir: path.resolve(parsed.data.dataDir),
    outDir: path.resolve(parsed.data.outDir)
  };
}
