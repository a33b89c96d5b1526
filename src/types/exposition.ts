/**
 * Parsed Prometheus text exposition data model.
 * One Metric per distinct name; samples keep their input order.
 */

export type MetricType = 'untyped' | 'counter' | 'gauge' | 'histogram' | 'summary';

export const METRIC_TYPES: readonly MetricType[] = ['counter', 'gauge', 'histogram', 'untyped', 'summary'];

/** Label name → label value. Null-prototype, so every token is a plain key. */
export type Labels = Record<string, string>;

export interface Sample {
  labels: Labels;
  value: number; // may be NaN or ±Infinity
  timestamp?: bigint; // milliseconds since epoch; omitted when the line has none
}

export interface Metric {
  name: string;
  type: MetricType;
  samples: Sample[];
  help?: string;
}

/** How `# HELP` lines are folded into the result. */
export type HelpMode = 'attach' | 'discard';
