import { Metrics } from '../model/Metrics.ts';
import { AggregationTemporality } from '../types/otlp.ts';

/** One resource, one scope, one metric named `name` with one gauge point. */
export function singleGaugeTree(name = 'test_metric'): Metrics {
  const metrics = new Metrics();
  const m = metrics.resourceMetrics().appendEmpty().scopeMetrics().appendEmpty().metrics().appendEmpty();
  m.name = name;
  m.setEmptyGauge().dataPoints().appendEmpty();
  return metrics;
}

/** A tree exercising every variant and most optional fields. */
export function fullTree(): Metrics {
  const metrics = new Metrics();
  const rm = metrics.resourceMetrics().appendEmpty();
  rm.schemaUrl = 'https://opentelemetry.io/schemas/1.9.0';
  const resource = rm.resource();
  resource.attributes.push(
    { key: 'service.name', value: { stringValue: 'checkout' } },
    { key: 'replicas', value: { intValue: -3n } },
    { key: 'ratio', value: { doubleValue: 0.25 } },
    { key: 'canary', value: { boolValue: false } },
    { key: 'blob', value: { bytesValue: new Uint8Array([0, 1, 254, 255]) } },
    { key: 'tags', value: { arrayValue: { values: [{ stringValue: 'a' }, { intValue: 7n }] } } },
    { key: 'nested', value: { kvlistValue: { values: [{ key: 'inner', value: { stringValue: 'ü' } }] } } },
    { key: 'unset', value: {} }
  );
  resource.droppedAttributesCount = 2;

  const sm = rm.scopeMetrics().appendEmpty();
  const scope = sm.scope();
  scope.name = 'io.example.meter';
  scope.version = '1.2.3';
  scope.attributes.push({ key: 'scope.attr', value: { stringValue: 'x' } });
  sm.schemaUrl = 'https://opentelemetry.io/schemas/1.9.0';

  const metricsList = sm.metrics();

  const gauge = metricsList.appendEmpty();
  gauge.name = 'queue.depth';
  gauge.description = 'items waiting';
  gauge.unit = '{item}';
  const gp = gauge.setEmptyGauge().dataPoints().appendEmpty();
  gp.attributes.push({ key: 'queue', value: { stringValue: 'orders' } });
  gp.startTimeUnixNano = 1_700_000_000_000_000_000n;
  gp.timeUnixNano = 1_700_000_001_000_000_000n;
  gp.asInt = -42n;
  gp.flags = 1;
  gp.exemplars.push({
    filteredAttributes: [{ key: 'user', value: { stringValue: 'u1' } }],
    timeUnixNano: 1_700_000_000_500_000_000n,
    asDouble: 0,
    spanId: new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]),
    traceId: new Uint8Array([
      0xde, 0xad, 0xbe, 0xef, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 1,
    ]),
  });

  const sum = metricsList.appendEmpty();
  sum.name = 'requests';
  const s = sum.setEmptySum();
  s.aggregationTemporality = AggregationTemporality.CUMULATIVE;
  s.isMonotonic = true;
  s.dataPoints().appendEmpty().asDouble = 1.5;
  s.dataPoints().appendEmpty().asDouble = Number.NaN;

  const histogram = metricsList.appendEmpty();
  histogram.name = 'latency';
  const h = histogram.setEmptyHistogram();
  h.aggregationTemporality = AggregationTemporality.DELTA;
  const hp = h.dataPoints().appendEmpty();
  hp.count = 6n;
  hp.sum = 0;
  hp.bucketCounts = [1n, 2n, 3n];
  hp.explicitBounds = [0.5, 1];
  hp.min = 0.1;
  hp.max = Number.POSITIVE_INFINITY;

  const expo = metricsList.appendEmpty();
  expo.name = 'sizes';
  const e = expo.setEmptyExponentialHistogram();
  e.aggregationTemporality = AggregationTemporality.CUMULATIVE;
  const ep = e.dataPoints().appendEmpty();
  ep.count = 4n;
  ep.sum = 10;
  ep.scale = -2;
  ep.zeroCount = 1n;
  ep.positive = { offset: -3, bucketCounts: [1n, 2n] };
  ep.zeroThreshold = 1e-9;

  const summary = metricsList.appendEmpty();
  summary.name = 'gc.pause';
  const sp = summary.setEmptySummary().dataPoints().appendEmpty();
  sp.count = 3n;
  sp.sum = 9;
  sp.quantileValues.push({ quantile: 0, value: 1 }, { quantile: 0.99, value: 5 });

  metricsList.appendEmpty().name = 'no.data';

  return metrics;
}
