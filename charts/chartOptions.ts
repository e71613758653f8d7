import type {
  BarSeriesOption,
  EChartsOption,
  GridComponentOption,
  LineSeriesOption,
  PieSeriesOption,
  ScatterSeriesOption,
  TitleComponentOption,
  XAXisComponentOption,
  YAXisComponentOption
} from 'echarts';
import type { AnalysisResult, ChartId, NetChangePoint } from '../shared/types.js';
import { getChartSpec, getSecondaryAxes } from './chartAxes.js';

export interface ChartSize {
  width: number;
  height: number;
}

export interface ChartDefinition {
  id: ChartId;
  title: string;
  /** Why the chart cannot be drawn from this analysis, or null when it can. */
  skipReason: (analysis: AnalysisResult) => string | null;
  size: (analysis: AnalysisResult, base: ChartSize) => ChartSize;
  build: (analysis: AnalysisResult) => EChartsOption;
}

const RUN_COLORS = ['#0b7285', '#e8590c', '#5c7cfa', '#2b8a3e', '#ae3ec9', '#f08c00', '#1864ab', '#c2255c', '#18958b', '#495057'];
const RUN_SYMBOLS = ['circle', 'rect', 'triangle', 'diamond', 'pin', 'arrow', 'roundRect'];
const RUN_LINE_TYPES = ['solid', 'dashed', 'dotted'] as const;
const MALE_COLOR = '#1c7ed6';
const FEMALE_COLOR = '#e03131';
const NON_NEGATIVE_COLOR = '#2b8a3e';
const NEGATIVE_COLOR = '#c92a2a';
const REFERENCE_COLOR = '#212529';
const AXIS_NAME_STYLE = { fontSize: 12, fontWeight: 600, color: '#495057' } as const;
const TITLE_STYLE = { fontSize: 14, fontWeight: 'bold' } as const;

interface AxisName {
  name: string;
  nameLocation: 'middle';
  nameGap: number;
  nameTextStyle: typeof AXIS_NAME_STYLE;
}

function axisName(name: string, nameGap: number): AxisName {
  return { name, nameLocation: 'middle', nameGap, nameTextStyle: AXIS_NAME_STYLE };
}

export function runColor(index: number): string {
  return RUN_COLORS[index % RUN_COLORS.length];
}

function zeroLine(): LineSeriesOption['markLine'] {
  return {
    symbol: 'none',
    silent: true,
    label: { show: false },
    lineStyle: { type: 'dashed', width: 1, color: REFERENCE_COLOR },
    data: [{ yAxis: 0 }]
  };
}

function percent(value: number): string {
  return `${Number(value.toFixed(2))}%`;
}

/** Position inside one panel, as a percentage of the whole canvas. */
function panelPercent(panelStart: number, panelSpan: number, fraction: number): string {
  return percent(panelStart + panelSpan * fraction);
}

export function populationOverTimeOption(analysis: AnalysisResult): EChartsOption {
  const spec = getChartSpec('01_population_over_time');

  return {
    title: { text: spec.title, left: 'center', textStyle: TITLE_STYLE },
    tooltip: { trigger: 'axis' },
    legend: { top: 32 },
    grid: { left: 82, right: 36, top: 80, bottom: 64, containLabel: true },
    xAxis: { type: 'value', ...axisName(spec.primary.xTitle, 36) },
    yAxis: { type: 'value', ...axisName(spec.primary.yTitle, 58) },
    series: analysis.runs.map(
      (run, index): LineSeriesOption => ({
        name: run.sourceId,
        type: 'line',
        symbol: RUN_SYMBOLS[index % RUN_SYMBOLS.length],
        symbolSize: 5,
        data: run.table.records.map((record) => [record.period, record.totalAlive]),
        itemStyle: { color: runColor(index) },
        lineStyle: { color: runColor(index), width: 1.8, type: RUN_LINE_TYPES[index % RUN_LINE_TYPES.length] }
      })
    )
  };
}

/** Undefined growth (previous population of zero) is drawn as a gap. */
export function growthRateOption(analysis: AnalysisResult): EChartsOption {
  const spec = getChartSpec('02_growth_rate_over_time');

  return {
    title: { text: spec.title, left: 'center', textStyle: TITLE_STYLE },
    tooltip: { trigger: 'axis' },
    legend: { top: 32 },
    grid: { left: 82, right: 36, top: 80, bottom: 64, containLabel: true },
    xAxis: { type: 'value', ...axisName(spec.primary.xTitle, 36) },
    yAxis: { type: 'value', ...axisName(spec.primary.yTitle, 58) },
    series: analysis.runs.map(
      (run, index): LineSeriesOption => ({
        name: run.sourceId,
        type: 'line',
        symbol: 'rect',
        symbolSize: 3,
        connectNulls: false,
        data: run.growthRate.map((point) => [point.period, point.value ?? '-']),
        itemStyle: { color: runColor(index) },
        lineStyle: { color: runColor(index), width: 2, opacity: 0.7 },
        ...(index === 0 ? { markLine: zeroLine() } : {})
      })
    )
  };
}

export function phasePlotOption(analysis: AnalysisResult): EChartsOption {
  const spec = getChartSpec('03_phase_plot');
  const panelWidth = 100 / Math.max(analysis.runs.length, 1);

  const grid = analysis.runs.map(
    (_run, index): GridComponentOption => ({
      left: panelPercent(index * panelWidth, panelWidth, 0.06),
      width: panelPercent(0, panelWidth, 0.86),
      top: 80,
      bottom: 64,
      containLabel: true
    })
  );
  const title = analysis.runs.map(
    (run, index): TitleComponentOption => ({
      text: `${spec.title} - ${run.sourceId}`,
      left: panelPercent(index * panelWidth, panelWidth, 0.5),
      textAlign: 'center',
      textStyle: { fontSize: 12, fontWeight: 'bold' }
    })
  );
  const xAxis = analysis.runs.map(
    (_run, index): XAXisComponentOption => ({ type: 'value', gridIndex: index, scale: true, ...axisName(spec.primary.xTitle, 32) })
  );
  const yAxis = analysis.runs.map(
    (_run, index): YAXisComponentOption => ({ type: 'value', gridIndex: index, scale: true, ...axisName(spec.primary.yTitle, 52) })
  );

  const series = analysis.runs.flatMap((run, index): Array<ScatterSeriesOption | LineSeriesOption> => {
    const scatter: ScatterSeriesOption = {
      name: run.sourceId,
      type: 'scatter',
      xAxisIndex: index,
      yAxisIndex: index,
      symbolSize: 8,
      data: run.phase.pairs.map((pair) => [pair.current, pair.next]),
      itemStyle: { color: runColor(index), opacity: 0.6 }
    };
    const { min, max } = run.phase;
    if (min === null || max === null) {
      return [scatter];
    }
    const diagonal: LineSeriesOption = {
      name: 'No change',
      type: 'line',
      xAxisIndex: index,
      yAxisIndex: index,
      showSymbol: false,
      silent: true,
      data: [
        [min, min],
        [max, max]
      ],
      itemStyle: { color: NEGATIVE_COLOR },
      lineStyle: { type: 'dashed', width: 2, color: NEGATIVE_COLOR }
    };
    return [scatter, diagonal];
  });

  return {
    title,
    tooltip: { trigger: 'item' },
    legend: { top: 32, data: ['No change'] },
    grid,
    xAxis,
    yAxis,
    series
  };
}

export function populationStructureOption(analysis: AnalysisResult): EChartsOption {
  const spec = getChartSpec('04_population_structure');
  const rowHeight = 100 / Math.max(analysis.runs.length, 1);

  const grid = analysis.runs.map(
    (_run, index): GridComponentOption => ({
      left: '6%',
      width: '52%',
      top: panelPercent(index * rowHeight, rowHeight, 0.14),
      height: panelPercent(0, rowHeight, 0.7),
      containLabel: true
    })
  );
  const xAxis = analysis.runs.map(
    (_run, index): XAXisComponentOption => ({ type: 'value', gridIndex: index, ...axisName(spec.primary.xTitle, 28) })
  );
  const yAxis = analysis.runs.map(
    (_run, index): YAXisComponentOption => ({ type: 'value', gridIndex: index, ...axisName(spec.primary.yTitle, 48) })
  );

  const title: TitleComponentOption[] = [];
  const series: Array<LineSeriesOption | PieSeriesOption> = [];

  analysis.runs.forEach((run, index) => {
    const rowTop = index * rowHeight;
    title.push({
      text: `${spec.title} - ${run.sourceId}`,
      left: '32%',
      top: panelPercent(rowTop, rowHeight, 0.03),
      textAlign: 'center',
      textStyle: { fontSize: 12, fontWeight: 'bold' }
    });
    series.push(
      {
        name: 'Males',
        type: 'line',
        xAxisIndex: index,
        yAxisIndex: index,
        symbol: 'circle',
        symbolSize: 4,
        data: run.table.records.map((record) => [record.period, record.males]),
        itemStyle: { color: MALE_COLOR },
        lineStyle: { color: MALE_COLOR, width: 2 }
      },
      {
        name: 'Females',
        type: 'line',
        xAxisIndex: index,
        yAxisIndex: index,
        symbol: 'rect',
        symbolSize: 4,
        data: run.table.records.map((record) => [record.period, record.females]),
        itemStyle: { color: FEMALE_COLOR },
        lineStyle: { color: FEMALE_COLOR, width: 2 }
      }
    );

    const ratio = run.finalSexRatio;
    if (!ratio || ratio.malePercent === null) {
      return;
    }
    title.push({
      text: `Final Sex Ratio (Month ${ratio.period})`,
      left: '80%',
      top: panelPercent(rowTop, rowHeight, 0.03),
      textAlign: 'center',
      textStyle: { fontSize: 12, fontWeight: 'bold' }
    });
    series.push({
      name: `Final sex ratio - ${run.sourceId}`,
      type: 'pie',
      center: ['80%', panelPercent(rowTop, rowHeight, 0.52)],
      radius: `${Math.min(rowHeight * 0.3, 30)}%`,
      startAngle: 90,
      label: { formatter: (params) => `${params.name}: ${percent(params.percent ?? 0)}` },
      data: [
        { name: 'Males', value: ratio.males, itemStyle: { color: MALE_COLOR } },
        { name: 'Females', value: ratio.females, itemStyle: { color: FEMALE_COLOR } }
      ]
    });
  });

  return {
    title,
    tooltip: { trigger: 'axis' },
    legend: { top: 0, data: ['Males', 'Females'] },
    grid,
    xAxis,
    yAxis,
    series
  };
}

export function netChangeBarData(points: NetChangePoint[]): NonNullable<BarSeriesOption['data']> {
  return points.map((point) => ({
    value: [point.period, point.value],
    itemStyle: { color: point.category === 'negative' ? NEGATIVE_COLOR : NON_NEGATIVE_COLOR }
  }));
}

export function birthsVsDeathsOption(analysis: AnalysisResult): EChartsOption {
  const spec = getChartSpec('05_births_vs_deaths');
  const secondary = getSecondaryAxes('05_births_vs_deaths');

  return {
    title: [
      { text: spec.title, left: '26%', textAlign: 'center', textStyle: TITLE_STYLE },
      { text: 'Net Population Change Per Month', left: '76%', textAlign: 'center', textStyle: TITLE_STYLE }
    ],
    tooltip: { trigger: 'item' },
    legend: { top: 32, left: '26%', data: ['Births', 'Deaths'] },
    grid: [
      { left: '6%', width: '40%', top: 80, bottom: 64, containLabel: true },
      { left: '56%', width: '40%', top: 80, bottom: 64, containLabel: true }
    ],
    xAxis: [
      { type: 'value', gridIndex: 0, ...axisName(spec.primary.xTitle, 32) },
      { type: 'value', gridIndex: 1, ...axisName(secondary.xTitle, 32) }
    ],
    yAxis: [
      { type: 'value', gridIndex: 0, ...axisName(spec.primary.yTitle, 52) },
      { type: 'value', gridIndex: 1, ...axisName(secondary.yTitle, 52) }
    ],
    series: [
      {
        name: 'Births',
        type: 'bar',
        xAxisIndex: 0,
        yAxisIndex: 0,
        barMaxWidth: 12,
        data: analysis.combined.map((record) => [record.period - 0.2, record.births]),
        itemStyle: { color: '#0b7285', opacity: 0.8 }
      },
      {
        name: 'Deaths',
        type: 'bar',
        xAxisIndex: 0,
        yAxisIndex: 0,
        barMaxWidth: 12,
        data: analysis.combined.map((record) => [record.period + 0.2, record.deaths]),
        itemStyle: { color: '#e8590c', opacity: 0.8 }
      },
      {
        name: 'Net change',
        type: 'bar',
        xAxisIndex: 1,
        yAxisIndex: 1,
        barMaxWidth: 16,
        data: netChangeBarData(analysis.combinedNetChange),
        markLine: {
          symbol: 'none',
          silent: true,
          label: { show: false },
          lineStyle: { type: 'solid', width: 0.8, color: REFERENCE_COLOR },
          data: [{ yAxis: 0 }]
        }
      }
    ]
  };
}

export function extinctionOutcomesOption(analysis: AnalysisResult): EChartsOption {
  const spec = getChartSpec('08_extinction_outcomes');
  const secondary = getSecondaryAxes('08_extinction_outcomes');
  const records = analysis.summary?.records ?? [];
  const extinct = new Set(analysis.cohorts?.extinct ?? []);
  const surviving = new Set(analysis.cohorts?.surviving ?? []);
  const categories = records.map((record) => String(record.simNumber));

  return {
    title: [
      { text: spec.title, left: '26%', textAlign: 'center', textStyle: TITLE_STYLE },
      { text: 'Survival vs Extinction', left: '76%', textAlign: 'center', textStyle: TITLE_STYLE }
    ],
    tooltip: { trigger: 'axis' },
    legend: { top: 32, left: '76%', data: [`Extinct (${extinct.size})`, `Surviving (${surviving.size})`] },
    grid: [
      { left: '6%', width: '40%', top: 80, bottom: 64, containLabel: true },
      { left: '56%', width: '40%', top: 80, bottom: 64, containLabel: true }
    ],
    xAxis: [
      { type: 'category', gridIndex: 0, data: categories, ...axisName(spec.primary.xTitle, 32) },
      { type: 'category', gridIndex: 1, data: categories, ...axisName(secondary.xTitle, 32) }
    ],
    yAxis: [
      { type: 'value', gridIndex: 0, ...axisName(spec.primary.yTitle, 52) },
      { type: 'value', gridIndex: 1, ...axisName(secondary.yTitle, 52) }
    ],
    series: [
      {
        name: 'Final population',
        type: 'bar',
        xAxisIndex: 0,
        yAxisIndex: 0,
        data: records.map((record) => record.finalAlive),
        itemStyle: { color: '#4682b4', opacity: 0.7 }
      },
      {
        name: `Extinct (${extinct.size})`,
        type: 'bar',
        xAxisIndex: 1,
        yAxisIndex: 1,
        barGap: '-100%',
        data: records.map((record) => (extinct.has(record) ? record.extinctionMonth : '-')),
        itemStyle: { color: NEGATIVE_COLOR, opacity: 0.7 }
      },
      {
        name: `Surviving (${surviving.size})`,
        type: 'bar',
        xAxisIndex: 1,
        yAxisIndex: 1,
        data: records.map((record) => (surviving.has(record) ? record.monthsSimulated : '-')),
        itemStyle: { color: NON_NEGATIVE_COLOR, opacity: 0.7 }
      }
    ]
  };
}

function hasRuns(analysis: AnalysisResult): string | null {
  return analysis.runs.length === 0 ? 'No individual data to plot.' : null;
}

function hasSeries(analysis: AnalysisResult): string | null {
  const runsReason = hasRuns(analysis);
  if (runsReason) {
    return runsReason;
  }
  return analysis.runs.some((run) => run.table.records.length >= 2)
    ? null
    : 'No run has two or more periods to compare.';
}

function baseSize(_analysis: AnalysisResult, base: ChartSize): ChartSize {
  return base;
}

export const CHART_DEFINITIONS: ChartDefinition[] = [
  {
    id: '01_population_over_time',
    title: 'Main population trajectory',
    skipReason: hasRuns,
    size: baseSize,
    build: populationOverTimeOption
  },
  {
    id: '02_growth_rate_over_time',
    title: 'Monthly population changes',
    skipReason: hasSeries,
    size: baseSize,
    build: growthRateOption
  },
  {
    id: '03_phase_plot',
    title: 'Population dynamics (current vs next month)',
    skipReason: hasSeries,
    size: (analysis, base) => ({
      width: Math.max(base.width, Math.round((base.width * 3 * analysis.runs.length) / 7)),
      height: Math.round((base.height * 5) / 7)
    }),
    build: phasePlotOption
  },
  {
    id: '04_population_structure',
    title: 'Sex distribution over time and final distribution',
    skipReason: hasRuns,
    size: (analysis, base) => ({
      width: base.width,
      height: Math.max(base.height, Math.round((base.height * 4 * analysis.runs.length) / 7))
    }),
    build: populationStructureOption
  },
  {
    id: '05_births_vs_deaths',
    title: 'Reproduction and mortality',
    skipReason: (analysis) => hasRuns(analysis) ?? (analysis.combined.length === 0 ? 'No periods to plot.' : null),
    size: baseSize,
    build: birthsVsDeathsOption
  },
  {
    id: '08_extinction_outcomes',
    title: 'Final population and survival vs extinction',
    skipReason: (analysis) =>
      analysis.summary && analysis.summary.records.length > 0
        ? null
        : 'No summary data available for extinction analysis.',
    size: baseSize,
    build: extinctionOutcomesOption
  }
];
