import type { ResultSet } from '../db/types.js';

export type Chart =
  | { kind: 'bar'; categoryAxis: string; valueAxis: string }
  | { kind: 'line'; timeAxis: string; valueAxis: string; series?: string }
  | { kind: 'pie'; label: string; value: string }
  | { kind: 'scatter'; x: string; y: string }
  | { kind: 'table' };

export type ChartKind = Chart['kind'];

/** Chosen visualization plus the result it applies to */
export interface ChartDirective {
  chart: Chart;
  result: ResultSet;
}

export interface ChartOptions {
  /** Most slices a pie may have */
  pieThreshold?: number;
  /** Most series a line chart may have */
  seriesThreshold?: number;
}
