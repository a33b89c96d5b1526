import { bench, group, run } from 'mitata';
import { tokenParser } from './src/grammar/token.ts';
import { valueParser } from './src/grammar/value.ts';
import { labelsParser } from './src/grammar/labels.ts';
import { sampleParser } from './src/grammar/sample.ts';
import { parseComplete } from './src/core/ExpositionParser.ts';

// ─── Fixtures ──────────────────────────────────────────────────────────────

function makeGaugeText(metricCount: number, samplesPerMetric: number): string {
  let out = '';
  for (let mi = 0; mi < metricCount; mi++) {
    out += `# HELP metric_${mi} Bench gauge ${mi}\n`;
    out += `# TYPE metric_${mi} gauge\n`;
    for (let si = 0; si < samplesPerMetric; si++) {
      out += `metric_${mi}{host="host-${si}",region="us-east-1",env="prod"} ${(si * 1.5).toFixed(2)} 1700000000000\n`;
    }
  }
  return out;
}

function makeHistogramText(metricCount: number): string {
  const bounds = ['1', '5', '10', '25', '50', '100', '250', '500', '1000', '+Inf'];
  let out = '';
  for (let mi = 0; mi < metricCount; mi++) {
    out += `# TYPE latency_${mi} histogram\n`;
    bounds.forEach((le, i) => {
      out += `latency_${mi}_bucket{method="GET",le="${le}"} ${(i + 1) * 100}\n`;
    });
    out += `latency_${mi}_sum{method="GET"} 12345.6\n`;
    out += `latency_${mi}_count{method="GET"} 1000\n`;
  }
  return out;
}

const smallText = makeGaugeText(1, 1);
const medText = makeGaugeText(10, 5);      // 50 samples
const largeText = makeGaugeText(50, 10);   // 500 samples
const histText = makeHistogramText(10);    // 10 histograms → 120 samples

const sampleLine = 'http_requests_total{method="post",code="200"} 1027 1395066363000\n';

// ─── Benchmarks ────────────────────────────────────────────────────────────

group('recognizers', () => {
  bench('token', () => tokenParser('http_request_duration_seconds_bucket{le="0.05"}'));
  bench('value (float)', () => valueParser('1.458255915e9 1395066363000'));
  bench('value (+Inf)', () => valueParser('+Inf\n'));
  bench('labels (escaped)', () => labelsParser('{path="C:\\\\DIR\\\\FILE.TXT",error="Cannot find file:\\n\\"FILE.TXT\\""} 1'));
  bench('sample line', () => sampleParser(sampleLine));
});

group('parseComplete', () => {
  bench('1 gauge (1 sample)', () => parseComplete(smallText));
  bench('10 gauges × 5 samples = 50 samples', () => parseComplete(medText));
  bench('50 gauges × 10 samples = 500 samples', () => parseComplete(largeText));
  bench('10 histograms → 120 samples', () => parseComplete(histText));
});

await run({ format: 'mitata', colors: true });
