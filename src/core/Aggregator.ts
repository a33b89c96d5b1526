/**
 * Folds classified lines into one Metric per name.
 *
 *  - `# TYPE`: create the metric or overwrite its type (last write wins)
 *  - `# HELP`: with helpMode 'attach', overwrite the metric's help; for a name
 *              not seen yet the text waits until a TYPE or sample line creates
 *              the metric. HELP alone never creates one.
 *  - sample:   create an untyped metric or append to its samples
 *  - blank / other comments: no change
 *
 * Samples are appended as plain values in first-seen order and never
 * reordered, deduplicated or checked against the declared type.
 */

import type { HelpMode, Metric, MetricType, Sample } from '../types/exposition.ts';
import type { CommentLine } from '../grammar/comment.ts';
import type { LineType } from '../grammar/line.ts';
import type { SampleEntry } from '../grammar/sample.ts';
import { assertSameName } from './errors.ts';

function toSample(entry: SampleEntry): Sample {
  const sample: Sample = { labels: entry.labels, value: entry.value };
  if (entry.timestampMs !== undefined) sample.timestamp = entry.timestampMs;
  return sample;
}

function newMetric(name: string, type: MetricType): Metric {
  return { name, type, samples: [] };
}

export class MetricAggregator {
  private readonly metrics = new Map<string, Metric>();
  private readonly pendingHelp = new Map<string, string>();

  constructor(private readonly helpMode: HelpMode = 'attach') {}

  get size(): number {
    return this.metrics.size;
  }

  add(line: LineType): void {
    switch (line.kind) {
      case 'comment': this.addComment(line.comment); return;
      case 'sample':  this.addSample(line.sample); return;
      case 'empty':   return;
    }
  }

  addComment(comment: CommentLine): void {
    if (comment.kind === 'type') {
      const existing = this.metrics.get(comment.name);
      if (existing) {
        assertSameName(existing.name, comment.name);
        existing.type = comment.type;
      } else {
        this.insert(newMetric(comment.name, comment.type));
      }
      return;
    }
    if (comment.kind === 'help' && this.helpMode === 'attach' && comment.name !== undefined) {
      const metric = this.metrics.get(comment.name);
      if (metric) {
        assertSameName(metric.name, comment.name);
        metric.help = comment.help;
      } else {
        this.pendingHelp.set(comment.name, comment.help);
      }
    }
  }

  addSample(entry: SampleEntry): void {
    const existing = this.metrics.get(entry.name);
    if (existing) {
      assertSameName(existing.name, entry.name);
      existing.samples.push(toSample(entry));
    } else {
      this.insert({ name: entry.name, type: 'untyped', samples: [toSample(entry)] });
    }
  }

  private insert(metric: Metric): void {
    const help = this.pendingHelp.get(metric.name);
    if (help !== undefined) {
      metric.help = help;
      this.pendingHelp.delete(metric.name);
    }
    this.metrics.set(metric.name, metric);
  }

  /** Metrics sorted by name (code-unit order); the only ordering the result guarantees. */
  finalize(): Metric[] {
    return finalizeMetrics(this.metrics.values());
  }
}

export function finalizeMetrics(metrics: Iterable<Metric>): Metric[] {
  return [...metrics].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
