import fs from 'node:fs';
import path from 'node:path';
import * as echarts from 'echarts';
import type { EChartsOption } from 'echarts';
import { describeError } from '../analysis/lib/errors.js';
import { consoleLogger, type AnalysisLogger } from '../analysis/lib/logger.js';
import type { AnalysisResult, ChartOutcome } from '../shared/types.js';
import { CHART_DEFINITIONS, type ChartDefinition, type ChartSize } from './chartOptions.js';

export interface RenderOptions {
  outDir: string;
  size: ChartSize;
  definitions?: ChartDefinition[];
  logger?: AnalysisLogger;
}

export function renderChartSvg(option: EChartsOption, size: ChartSize): string {
  const chart = echarts.init(null, null, {
    renderer: 'svg',
    ssr: true,
    width: size.width,
    height: size.height
  });
  try {
    chart.setOption({ backgroundColor: '#ffffff', ...option, animation: false });
    return chart.renderToSVGString();
  } finally {
    chart.dispose();
  }
}

/** Each chart is drawn in isolation; one failing chart does not stop the rest. */
export function renderCharts(analysis: AnalysisResult, options: RenderOptions): ChartOutcome[] {
  const logger = options.logger ?? consoleLogger;
  const definitions = options.definitions ?? CHART_DEFINITIONS;

  return definitions.map((definition): ChartOutcome => {
    const { id, title } = definition;
    const skipReason = definition.skipReason(analysis);
    if (skipReason) {
      logger.info(`[charts] Skipped ${id}: ${skipReason}`);
      return { id, status: 'skipped', title, note: skipReason };
    }

    try {
      const svg = renderChartSvg(definition.build(analysis), definition.size(analysis, options.size));
      fs.mkdirSync(options.outDir, { recursive: true });
      const filePath = path.join(options.outDir, `${id}.svg`);
      fs.writeFileSync(filePath, svg, 'utf-8');
      logger.info(`[charts] Saved: ${path.basename(filePath)}`);
      return { id, status: 'rendered', title, filePath };
    } catch (error) {
      const note = `Failed to render chart: ${describeError(error)}`;
      logger.error(`[charts] ${id}: ${note}`);
      return { id, status: 'failed', title, note };
    }
  });
}
