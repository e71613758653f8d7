import type { ChartId } from '../shared/types.js';

export interface AxisTitles {
  xTitle: string;
  yTitle: string;
}

export interface ChartSpec {
  title: string;
  primary: AxisTitles;
  secondary?: AxisTitles;
}

export const CHART_IDS: ChartId[] = [
  '01_population_over_time',
  '02_growth_rate_over_time',
  '03_phase_plot',
  '04_population_structure',
  '05_births_vs_deaths',
  '08_extinction_outcomes'
];

const CHART_SPECS: Record<ChartId, ChartSpec> = {
  '01_population_over_time': {
    title: 'Population Over Time',
    primary: { xTitle: 'Month', yTitle: 'Population (total alive)' }
  },
  '02_growth_rate_over_time': {
    title: 'Monthly Population Growth Rate',
    primary: { xTitle: 'Month', yTitle: 'Growth rate (%)' }
  },
  '03_phase_plot': {
    title: 'Phase Plot',
    primary: { xTitle: 'Population at month t', yTitle: 'Population at month t+1' }
  },
  '04_population_structure': {
    title: 'Sex Distribution Over Time',
    primary: { xTitle: 'Month', yTitle: 'Count' }
  },
  '05_births_vs_deaths': {
    title: 'Monthly Births vs Deaths',
    primary: { xTitle: 'Month', yTitle: 'Count' },
    secondary: { xTitle: 'Month', yTitle: 'Net change (births - deaths)' }
  },
  '08_extinction_outcomes': {
    title: 'Final Population by Simulation',
    primary: { xTitle: 'Simulation #', yTitle: 'Final population' },
    secondary: { xTitle: 'Simulation #', yTitle: 'Month' }
  }
};

export function getChartSpec(chartId: ChartId): ChartSpec {
  return CHART_SPECS[chartId];
}

export function getSecondaryAxes(chartId: ChartId): AxisTitles {
  const spec = CHART_SPECS[chartId];
  if (!spec.secondary) {
    throw new Error(`Chart "${chartId}" has no secondary panel`);
  }
  return spec.secondary;
}
