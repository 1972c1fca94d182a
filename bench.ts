import { bench, group, run } from 'mitata';
import { snappyCompression } from './src/compress/snappy.ts';
import { ExportRequest } from './src/core/Envelope.ts';
import { Metrics } from './src/model/Metrics.ts';
import { encodeVarint } from './src/util/varint.ts';

// ─── Fixtures ──────────────────────────────────────────────────────────────

function makeGaugeTree(metricCount: number, dpPerMetric: number): Metrics {
  const metrics = new Metrics();
  const rm = metrics.resourceMetrics().appendEmpty();
  rm.resource().attributes.push({ key: 'service.name', value: { stringValue: 'bench-svc' } });
  const sm = rm.scopeMetrics().appendEmpty();
  for (let mi = 0; mi < metricCount; mi++) {
    const m = sm.metrics().appendEmpty();
    m.name = `metric_${mi}`;
    const points = m.setEmptyGauge().dataPoints();
    for (let di = 0; di < dpPerMetric; di++) {
      const dp = points.appendEmpty();
      dp.attributes.push(
        { key: 'host', value: { stringValue: `host-${di}` } },
        { key: 'region', value: { stringValue: 'us-east-1' } },
        { key: 'env', value: { stringValue: 'prod' } }
      );
      dp.timeUnixNano = 1700000000000000000n;
      dp.asDouble = Math.random() * 100;
    }
  }
  return metrics;
}

function makeHistogramTree(metricCount: number): Metrics {
  const metrics = new Metrics();
  const sm = metrics.resourceMetrics().appendEmpty().scopeMetrics().appendEmpty();
  for (let mi = 0; mi < metricCount; mi++) {
    const m = sm.metrics().appendEmpty();
    m.name = `latency_${mi}`;
    const dp = m.setEmptyHistogram().dataPoints().appendEmpty();
    dp.attributes.push({ key: 'method', value: { stringValue: 'GET' } });
    dp.timeUnixNano = 1700000000000000000n;
    dp.count = 1000n;
    dp.sum = 12345.6;
    dp.explicitBounds = [1, 5, 10, 25, 50, 100, 250, 500, 1000];
    dp.bucketCounts = [10n, 50n, 100n, 200n, 250n, 150n, 100n, 80n, 50n, 10n];
  }
  return metrics;
}

const small = ExportRequest.fromMetrics(makeGaugeTree(1, 1));
const med = ExportRequest.fromMetrics(makeGaugeTree(10, 5)); // 50 points
const large = ExportRequest.fromMetrics(makeGaugeTree(50, 10)); // 500 points
const hist = ExportRequest.fromMetrics(makeHistogramTree(10));

const medJson = med.marshalJson();
const largeJson = large.marshalJson();
const medProto = med.marshalProto();
const largeProto = large.marshalProto();

// ─── Benchmarks ────────────────────────────────────────────────────────────

group('varint', () => {
  bench('encode 1', () => encodeVarint(1n));
  bench('encode 128', () => encodeVarint(128n));
  bench('encode 2^32', () => encodeVarint(4294967296n));
  bench('encode 2^63 (max timestamp ns)', () => encodeVarint(9223372036854775808n));
});

group('protobuf encode', () => {
  bench('1 gauge (1 dp)', () => small.marshalProto());
  bench('10 gauges × 5 dp', () => med.marshalProto());
  bench('50 gauges × 10 dp', () => large.marshalProto());
  bench('10 histograms', () => hist.marshalProto());
});

group('protobuf decode', () => {
  bench(`~${medProto.length}B (50 dp)`, () => new ExportRequest().unmarshalProto(medProto));
  bench(`~${largeProto.length}B (500 dp)`, () => new ExportRequest().unmarshalProto(largeProto));
});

group('json encode', () => {
  bench('10 gauges × 5 dp', () => med.marshalJson());
  bench('50 gauges × 10 dp', () => large.marshalJson());
});

group('json decode', () => {
  bench(`~${medJson.length}B (50 dp)`, () => new ExportRequest().unmarshalJson(medJson));
  bench(`~${largeJson.length}B (500 dp)`, () => new ExportRequest().unmarshalJson(largeJson));
});

group('snappy compress', () => {
  bench(`proto ~${medProto.length}B`, () => snappyCompression.compress(medProto));
  bench(`proto ~${largeProto.length}B`, () => snappyCompression.compress(largeProto));
});

await run({ format: 'mitata', colors: true });
