/**
 * Protobuf encoder for OTLP metrics (opentelemetry/proto/metrics/v1).
 *
 * Proto schema (field numbers written here):
 *   MetricsData            { repeated ResourceMetrics resource_metrics = 1; }
 *   ResourceMetrics        { Resource resource = 1; repeated ScopeMetrics scope_metrics = 2; string schema_url = 3; }
 *   ScopeMetrics           { InstrumentationScope scope = 1; repeated Metric metrics = 2; string schema_url = 3; }
 *   Metric                 { string name = 1; string description = 2; string unit = 3;
 *                            oneof data { Gauge gauge = 5; Sum sum = 7; Histogram histogram = 9;
 *                                         ExponentialHistogram exponential_histogram = 10; Summary summary = 11; } }
 *
 * The deprecated instrumentation_library_metrics (1000) is never written.
 */

import type {
  OtlpAnyValue,
  OtlpBuckets,
  OtlpExemplar,
  OtlpExponentialHistogramDataPoint,
  OtlpHistogramDataPoint,
  OtlpInstrumentationScope,
  OtlpKeyValue,
  OtlpMetric,
  OtlpMetricData,
  OtlpMetricsData,
  OtlpNumberDataPoint,
  OtlpResource,
  OtlpResourceMetrics,
  OtlpScopeMetrics,
  OtlpSummaryDataPoint,
  OtlpValueAtQuantile,
} from '../types/otlp.ts';
import { encodeMessage } from './ProtoSink.ts';
import type { ProtoSink } from './ProtoSink.ts';

// ─── Common ─────────────────────────────────────────────────────────────────

function visitAnyValue(v: OtlpAnyValue, s: ProtoSink): void {
  if (v.stringValue !== undefined) s.string(1, v.stringValue, true);
  else if (v.boolValue !== undefined) s.bool(2, v.boolValue, true);
  else if (v.intValue !== undefined) s.int64(3, v.intValue, true);
  else if (v.doubleValue !== undefined) s.double(4, v.doubleValue, true);
  else if (v.arrayValue !== undefined) s.message(5, v.arrayValue, visitArrayValue);
  else if (v.kvlistValue !== undefined) s.message(6, v.kvlistValue, visitKeyValueList);
  else if (v.bytesValue !== undefined) s.bytes(7, v.bytesValue, true);
}

function visitArrayValue(v: { values: OtlpAnyValue[] }, s: ProtoSink): void {
  for (const item of v.values) s.message(1, item, visitAnyValue);
}

function visitKeyValueList(v: { values: OtlpKeyValue[] }, s: ProtoSink): void {
  for (const kv of v.values) s.message(1, kv, visitKeyValue);
}

function visitKeyValue(kv: OtlpKeyValue, s: ProtoSink): void {
  s.string(1, kv.key);
  s.message(2, kv.value, visitAnyValue);
}

function visitResource(r: OtlpResource, s: ProtoSink): void {
  for (const kv of r.attributes) s.message(1, kv, visitKeyValue);
  s.uint32(2, r.droppedAttributesCount);
}

function visitScope(sc: OtlpInstrumentationScope, s: ProtoSink): void {
  s.string(1, sc.name);
  s.string(2, sc.version);
  for (const kv of sc.attributes) s.message(3, kv, visitKeyValue);
  s.uint32(4, sc.droppedAttributesCount);
}

function visitExemplar(e: OtlpExemplar, s: ProtoSink): void {
  s.fixed64(2, e.timeUnixNano);
  if (e.asDouble !== undefined) s.double(3, e.asDouble, true);
  s.bytes(4, e.spanId);
  s.bytes(5, e.traceId);
  if (e.asInt !== undefined) s.sfixed64(6, e.asInt, true);
  for (const kv of e.filteredAttributes) s.message(7, kv, visitKeyValue);
}

// ─── Data points ────────────────────────────────────────────────────────────

function visitNumberDataPoint(dp: OtlpNumberDataPoint, s: ProtoSink): void {
  s.fixed64(2, dp.startTimeUnixNano);
  s.fixed64(3, dp.timeUnixNano);
  if (dp.asDouble !== undefined) s.double(4, dp.asDouble, true);
  for (const e of dp.exemplars) s.message(5, e, visitExemplar);
  if (dp.asInt !== undefined) s.sfixed64(6, dp.asInt, true);
  for (const kv of dp.attributes) s.message(7, kv, visitKeyValue);
  s.uint32(8, dp.flags);
}

function visitHistogramDataPoint(dp: OtlpHistogramDataPoint, s: ProtoSink): void {
  s.fixed64(2, dp.startTimeUnixNano);
  s.fixed64(3, dp.timeUnixNano);
  s.fixed64(4, dp.count);
  if (dp.sum !== undefined) s.double(5, dp.sum, true);
  s.packedFixed64(6, dp.bucketCounts);
  s.packedDouble(7, dp.explicitBounds);
  for (const e of dp.exemplars) s.message(8, e, visitExemplar);
  for (const kv of dp.attributes) s.message(9, kv, visitKeyValue);
  s.uint32(10, dp.flags);
  if (dp.min !== undefined) s.double(11, dp.min, true);
  if (dp.max !== undefined) s.double(12, dp.max, true);
}

function visitBuckets(b: OtlpBuckets, s: ProtoSink): void {
  s.sint32(1, b.offset);
  s.packedUint64(2, b.bucketCounts);
}

function visitExponentialHistogramDataPoint(
  dp: OtlpExponentialHistogramDataPoint,
  s: ProtoSink
): void {
  for (const kv of dp.attributes) s.message(1, kv, visitKeyValue);
  s.fixed64(2, dp.startTimeUnixNano);
  s.fixed64(3, dp.timeUnixNano);
  s.fixed64(4, dp.count);
  if (dp.sum !== undefined) s.double(5, dp.sum, true);
  s.sint32(6, dp.scale);
  s.fixed64(7, dp.zeroCount);
  s.message(8, dp.positive, visitBuckets);
  s.message(9, dp.negative, visitBuckets);
  s.uint32(10, dp.flags);
  for (const e of dp.exemplars) s.message(11, e, visitExemplar);
  if (dp.min !== undefined) s.double(12, dp.min, true);
  if (dp.max !== undefined) s.double(13, dp.max, true);
  s.double(14, dp.zeroThreshold);
}

function visitValueAtQuantile(q: OtlpValueAtQuantile, s: ProtoSink): void {
  s.double(1, q.quantile);
  s.double(2, q.value);
}

function visitSummaryDataPoint(dp: OtlpSummaryDataPoint, s: ProtoSink): void {
  s.fixed64(2, dp.startTimeUnixNano);
  s.fixed64(3, dp.timeUnixNano);
  s.fixed64(4, dp.count);
  s.double(5, dp.sum);
  for (const q of dp.quantileValues) s.message(6, q, visitValueAtQuantile);
  for (const kv of dp.attributes) s.message(7, kv, visitKeyValue);
  s.uint32(8, dp.flags);
}

// ─── Metric variants ────────────────────────────────────────────────────────

function visitMetricData(data: OtlpMetricData, s: ProtoSink): void {
  switch (data.type) {
    case 'gauge':
      for (const dp of data.dataPoints) s.message(1, dp, visitNumberDataPoint);
      return;
    case 'sum':
      for (const dp of data.dataPoints) s.message(1, dp, visitNumberDataPoint);
      s.int32(2, data.aggregationTemporality);
      s.bool(3, data.isMonotonic);
      return;
    case 'histogram':
      for (const dp of data.dataPoints) s.message(1, dp, visitHistogramDataPoint);
      s.int32(2, data.aggregationTemporality);
      return;
    case 'exponentialHistogram':
      for (const dp of data.dataPoints) s.message(1, dp, visitExponentialHistogramDataPoint);
      s.int32(2, data.aggregationTemporality);
      return;
    case 'summary':
      for (const dp of data.dataPoints) s.message(1, dp, visitSummaryDataPoint);
      return;
  }
}

const METRIC_DATA_FIELD: Record<OtlpMetricData['type'], number> = {
  gauge: 5,
  sum: 7,
  histogram: 9,
  exponentialHistogram: 10,
  summary: 11,
};

function visitMetric(m: OtlpMetric, s: ProtoSink): void {
  s.string(1, m.name);
  s.string(2, m.description);
  s.string(3, m.unit);
  if (m.data !== undefined) s.message(METRIC_DATA_FIELD[m.data.type], m.data, visitMetricData);
}

// ─── Envelope levels ────────────────────────────────────────────────────────

function visitScopeMetrics(sm: OtlpScopeMetrics, s: ProtoSink): void {
  s.message(1, sm.scope, visitScope);
  for (const m of sm.metrics) s.message(2, m, visitMetric);
  s.string(3, sm.schemaUrl);
}

function visitResourceMetrics(rm: OtlpResourceMetrics, s: ProtoSink): void {
  s.message(1, rm.resource, visitResource);
  for (const sm of rm.scopeMetrics) s.message(2, sm, visitScopeMetrics);
  s.string(3, rm.schemaUrl);
}

function visitMetricsData(md: OtlpMetricsData, s: ProtoSink): void {
  for (const rm of md.resourceMetrics) s.message(1, rm, visitResourceMetrics);
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Encode a metrics tree as MetricsData. The bytes are also a valid
 * ExportMetricsServiceRequest, which shares field 1.
 */
export function encodeMetricsData(data: OtlpMetricsData): Uint8Array {
  return encodeMessage(data, visitMetricsData);
}

/** Encode one resource entry as a standalone ResourceMetrics message. */
export function encodeResourceMetrics(rm: OtlpResourceMetrics): Uint8Array {
  return encodeMessage(rm, visitResourceMetrics);
}
