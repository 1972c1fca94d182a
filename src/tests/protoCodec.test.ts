import { describe, it, expect } from 'vitest';
import { DecodeError, EncodeError } from '../core/errors.ts';
import { decodeMetricsData, decodeResourceMetrics } from '../proto/metricsDecode.ts';
import { encodeMetricsData, encodeResourceMetrics } from '../proto/metricsEncode.ts';
import { migrateInstrumentationLibraryMetrics } from '../transform/migrateScope.ts';
import { fullTree, singleGaugeTree } from './helpers.ts';
import { Metrics } from '../model/Metrics.ts';

function minimalTree(): Metrics {
  const metrics = new Metrics();
  metrics.resourceMetrics().appendEmpty().scopeMetrics().appendEmpty().metrics().appendEmpty().name = 'a';
  return metrics;
}

// MetricsData { ResourceMetrics { resource {}, ScopeMetrics { scope {}, Metric { name: "a" } } } }
const MINIMAL = [0x0a, 0x0b, 0x0a, 0x00, 0x12, 0x07, 0x0a, 0x00, 0x12, 0x03, 0x0a, 0x01, 0x61];

describe('protobuf encoding', () => {
  it('writes empty resource and scope messages', () => {
    expect([...encodeMetricsData(minimalTree().orig)]).toEqual(MINIMAL);
  });

  it('encodes an empty tree as zero bytes', () => {
    expect(encodeMetricsData(new Metrics().orig).length).toBe(0);
  });

  it('round-trips every variant', () => {
    const tree = fullTree();
    const decoded = decodeMetricsData(encodeMetricsData(tree.orig));
    expect(decoded).toEqual(tree.orig);
    expect(new Metrics(decoded).equals(tree)).toBe(true);
  });

  it('re-encodes decoded bytes identically', () => {
    const bytes = encodeMetricsData(fullTree().orig);
    expect(encodeMetricsData(decodeMetricsData(bytes))).toEqual(bytes);
  });

  it('preserves counts through a round trip', () => {
    const tree = singleGaugeTree();
    const decoded = new Metrics(decodeMetricsData(encodeMetricsData(tree.orig)));
    expect(decoded.metricCount()).toBe(1);
    expect(decoded.dataPointCount()).toBe(1);
  });

  it('encodes one resource entry standalone', () => {
    const rm = fullTree().orig.resourceMetrics[0];
    if (rm === undefined) throw new Error('fixture has no resource');
    expect(decodeResourceMetrics(encodeResourceMetrics(rm))).toEqual(rm);
  });

  it('rejects strings with an unpaired surrogate', () => {
    const tree = minimalTree();
    tree.resourceMetrics().at(0).scopeMetrics().at(0).metrics().at(0).name = 'bad\uD800';
    expect(() => encodeMetricsData(tree.orig)).toThrow(EncodeError);
  });

  it('rejects uint32 fields outside their range', () => {
    const negative = singleGaugeTree();
    negative.resourceMetrics().at(0).resource().droppedAttributesCount = -1;
    expect(() => encodeMetricsData(negative.orig)).toThrow('field 2: -1 is not a valid uint32');

    const wide = singleGaugeTree();
    const points = wide.resourceMetrics().at(0).scopeMetrics().at(0).metrics().at(0).gauge().dataPoints();
    points.at(0).flags = 2 ** 32;
    expect(() => encodeMetricsData(wide.orig)).toThrow('field 8: 4294967296 is not a valid uint32');
    points.at(0).flags = 1.5;
    expect(() => encodeMetricsData(wide.orig)).toThrow(EncodeError);
  });

  it('rejects 64-bit fields outside their range', () => {
    const tree = singleGaugeTree();
    const dp = tree.resourceMetrics().at(0).scopeMetrics().at(0).metrics().at(0).gauge().dataPoints().at(0);
    dp.timeUnixNano = -1n;
    expect(() => encodeMetricsData(tree.orig)).toThrow('field 3: -1 is not a valid uint64');

    dp.timeUnixNano = 0n;
    dp.asInt = 1n << 63n;
    expect(() => encodeMetricsData(tree.orig)).toThrow('field 6: 9223372036854775808 is not a valid int64');
  });

  it('rejects sint32 fields outside their range', () => {
    const tree = new Metrics();
    const m = tree.resourceMetrics().appendEmpty().scopeMetrics().appendEmpty().metrics().appendEmpty();
    m.setEmptyExponentialHistogram().dataPoints().appendEmpty().scale = 2 ** 31;
    expect(() => encodeMetricsData(tree.orig)).toThrow('field 6: 2147483648 is not a valid int32');
  });

  it('keeps aggregation temporalities it does not know', () => {
    for (const value of [7, -1]) {
      const tree = new Metrics();
      const m = tree.resourceMetrics().appendEmpty().scopeMetrics().appendEmpty().metrics().appendEmpty();
      m.setEmptySum().aggregationTemporality = value;

      const decoded = new Metrics(decodeMetricsData(encodeMetricsData(tree.orig)));
      expect(decoded.resourceMetrics().at(0).scopeMetrics().at(0).metrics().at(0).sum().aggregationTemporality).toBe(
        value
      );
    }
  });
});

describe('protobuf decoding', () => {
  it('reads the deprecated instrumentation_library_metrics field', () => {
    // ResourceMetrics { 1000: InstrumentationLibraryMetrics { library { name: "lib" }, Metric { name: "a" } } }
    const bytes = new Uint8Array([
      0x0a, 0x0f, 0xc2, 0x3e, 0x0c, 0x0a, 0x05, 0x0a, 0x03, 0x6c, 0x69, 0x62, 0x12, 0x03, 0x0a, 0x01, 0x61,
    ]);
    const data = decodeMetricsData(bytes);
    const rm = data.resourceMetrics[0];
    expect(rm?.scopeMetrics).toEqual([]);
    expect(rm?.instrumentationLibraryMetrics[0]?.instrumentationLibrary).toEqual({ name: 'lib', version: '' });

    migrateInstrumentationLibraryMetrics(data.resourceMetrics);
    expect(data).toEqual(minimalTree().orig);
    expect([...encodeMetricsData(data)]).toEqual(MINIMAL);
  });

  it('skips unknown fields', () => {
    // field 15 varint 1, then the minimal payload
    const bytes = new Uint8Array([0x78, 0x01, ...MINIMAL]);
    expect(decodeMetricsData(bytes)).toEqual(minimalTree().orig);
  });

  it('accepts unpacked repeated scalars', () => {
    // HistogramDataPoint.bucket_counts (6) as two separate fixed64 fields
    const point = [0x31, 1, 0, 0, 0, 0, 0, 0, 0, 0x31, 2, 0, 0, 0, 0, 0, 0, 0];
    const histogram = [0x0a, point.length, ...point];
    const metric = [0x4a, histogram.length, ...histogram];
    const scopeMetrics = [0x12, metric.length, ...metric];
    const resourceMetrics = [0x12, scopeMetrics.length, ...scopeMetrics];
    const bytes = new Uint8Array([0x0a, resourceMetrics.length, ...resourceMetrics]);

    const data = decodeMetricsData(bytes);
    const m = data.resourceMetrics[0]?.scopeMetrics[0]?.metrics[0];
    expect(m?.data?.type).toBe('histogram');
    if (m?.data?.type !== 'histogram') return;
    expect(m.data.dataPoints[0]?.bucketCounts).toEqual([1n, 2n]);
  });

  it('fails on truncated input', () => {
    expect(() => decodeMetricsData(new Uint8Array(MINIMAL.slice(0, 8)))).toThrow(DecodeError);
  });

  it('fails on a wire-type mismatch', () => {
    // resource_metrics sent as varint
    expect(() => decodeMetricsData(new Uint8Array([0x08, 0x01]))).toThrow(
      'field 1: wire type 0, expected 2'
    );
  });

  it('fails on invalid UTF-8 in a string field', () => {
    const bytes = new Uint8Array([...MINIMAL.slice(0, 12), 0xff]);
    expect(() => decodeMetricsData(bytes)).toThrow('string field is not valid UTF-8');
  });

  it('reads an unknown aggregation temporality as its number', () => {
    // MetricsData { ResourceMetrics { resource {}, ScopeMetrics { scope {}, Metric { name: "a", sum { temporality: 7 } } } } }
    const bytes = new Uint8Array([
      0x0a, 0x0f, 0x0a, 0x00, 0x12, 0x0b, 0x0a, 0x00, 0x12, 0x07, 0x0a, 0x01, 0x61, 0x3a, 0x02, 0x10, 0x07,
    ]);
    const metric = new Metrics(decodeMetricsData(bytes)).resourceMetrics().at(0).scopeMetrics().at(0).metrics().at(0);
    expect(metric.name).toBe('a');
    expect(metric.sum().aggregationTemporality).toBe(7);
  });
});
