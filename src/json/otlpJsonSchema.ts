/**
 * zod schemas for the OTLP/JSON metrics encoding.
 *
 * Each schema validates the wire shape and converts it straight into the
 * canonical records of types/otlp.ts: `null` and absent fields become zero
 * values, int64 accepts numbers or decimal strings, doubles accept the
 * "NaN" / "Infinity" / "-Infinity" spellings, enums accept numbers or names,
 * trace/span ids are hex and other bytes are base64. Unknown keys are ignored.
 */

import { z } from 'zod';
import {
  newBuckets,
  newInstrumentationScope,
  newResource,
} from '../model/defaults.ts';
import type {
  AggregationTemporality,
  AggregationTemporalityValue,
  OtlpAnyValue,
  OtlpExemplar,
  OtlpExponentialHistogram,
  OtlpExponentialHistogramDataPoint,
  OtlpGauge,
  OtlpHistogram,
  OtlpHistogramDataPoint,
  OtlpKeyValue,
  OtlpMetric,
  OtlpNumberDataPoint,
  OtlpSum,
  OtlpSummary,
} from '../types/otlp.ts';
import { INT32_MAX, INT32_MIN, INT64_MAX, INT64_MIN, UINT32_MAX, UINT64_MAX } from '../util/varint.ts';

/** Absent or null → fallback(). */
function opt<T extends z.ZodTypeAny>(schema: T, fallback: () => z.output<T>) {
  return schema.nullish().transform((value) => value ?? fallback());
}

// ─── Scalars ────────────────────────────────────────────────────────────────

const str = z.string();
const uint32 = z.number().int().min(0).max(UINT32_MAX);
const int32 = z.number().int().min(INT32_MIN).max(INT32_MAX);

const int64 = z
  .union([z.number().int(), z.string().regex(/^-?\d+$/, 'expected a decimal integer')])
  .transform((v) => BigInt(v))
  .refine((v) => v >= INT64_MIN && v <= INT64_MAX, 'int64 out of range');

const uint64 = z
  .union([z.number().int().min(0), z.string().regex(/^\d+$/, 'expected an unsigned decimal integer')])
  .transform((v) => BigInt(v))
  .refine((v) => v <= UINT64_MAX, 'uint64 out of range');

const double = z
  .union([z.number(), z.enum(['NaN', 'Infinity', '-Infinity'])])
  .transform((v) => (typeof v === 'number' ? v : Number(v)));

const base64Bytes = z
  .string()
  .regex(/^[A-Za-z0-9+/_-]*={0,2}$/, 'expected base64')
  .transform((s) => new Uint8Array(Buffer.from(s, 'base64')));

const hexId = z
  .string()
  .regex(/^(?:[0-9a-fA-F]{2})*$/, 'expected hex')
  .transform((s) => new Uint8Array(Buffer.from(s, 'hex')));

const TEMPORALITY_BY_NAME = {
  AGGREGATION_TEMPORALITY_UNSPECIFIED: 0,
  AGGREGATION_TEMPORALITY_DELTA: 1,
  AGGREGATION_TEMPORALITY_CUMULATIVE: 2,
} as const satisfies Record<string, AggregationTemporality>;

/** Known names map to their numbers; any other int32 passes through. */
const temporality = z
  .union([
    int32,
    z.enum([
      'AGGREGATION_TEMPORALITY_UNSPECIFIED',
      'AGGREGATION_TEMPORALITY_DELTA',
      'AGGREGATION_TEMPORALITY_CUMULATIVE',
    ]),
  ])
  .transform((v): AggregationTemporalityValue => (typeof v === 'number' ? v : TEMPORALITY_BY_NAME[v]));

const emptyBytes = (): Uint8Array => new Uint8Array(0);

// ─── Attributes ─────────────────────────────────────────────────────────────

const anyValue: z.ZodType<OtlpAnyValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      stringValue: str.nullish(),
      boolValue: z.boolean().nullish(),
      intValue: int64.nullish(),
      doubleValue: double.nullish(),
      arrayValue: z.object({ values: opt(z.array(anyValue), () => []) }).nullish(),
      kvlistValue: z.object({ values: opt(z.array(keyValue), () => []) }).nullish(),
      bytesValue: base64Bytes.nullish(),
    })
    .transform((v): OtlpAnyValue => {
      if (v.stringValue != null) return { stringValue: v.stringValue };
      if (v.boolValue != null) return { boolValue: v.boolValue };
      if (v.intValue != null) return { intValue: v.intValue };
      if (v.doubleValue != null) return { doubleValue: v.doubleValue };
      if (v.arrayValue != null) return { arrayValue: v.arrayValue };
      if (v.kvlistValue != null) return { kvlistValue: v.kvlistValue };
      if (v.bytesValue != null) return { bytesValue: v.bytesValue };
      return {};
    })
);

const keyValue: z.ZodType<OtlpKeyValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    key: opt(str, () => ''),
    value: opt(anyValue, () => ({})),
  })
);

const attributes = opt(z.array(keyValue), () => []);

const resource = z.object({
  attributes,
  droppedAttributesCount: opt(uint32, () => 0),
});

const scope = z.object({
  name: opt(str, () => ''),
  version: opt(str, () => ''),
  attributes,
  droppedAttributesCount: opt(uint32, () => 0),
});

const instrumentationLibrary = z.object({
  name: opt(str, () => ''),
  version: opt(str, () => ''),
});

// ─── Data points ────────────────────────────────────────────────────────────

const exemplar = z
  .object({
    filteredAttributes: attributes,
    timeUnixNano: opt(uint64, () => 0n),
    asDouble: double.nullish(),
    asInt: int64.nullish(),
    spanId: opt(hexId, emptyBytes),
    traceId: opt(hexId, emptyBytes),
  })
  .transform((e): OtlpExemplar => {
    const out: OtlpExemplar = {
      filteredAttributes: e.filteredAttributes,
      timeUnixNano: e.timeUnixNano,
      spanId: e.spanId,
      traceId: e.traceId,
    };
    if (e.asDouble != null) out.asDouble = e.asDouble;
    else if (e.asInt != null) out.asInt = e.asInt;
    return out;
  });

const exemplars = opt(z.array(exemplar), () => []);

const numberDataPoint = z
  .object({
    attributes,
    startTimeUnixNano: opt(uint64, () => 0n),
    timeUnixNano: opt(uint64, () => 0n),
    asDouble: double.nullish(),
    asInt: int64.nullish(),
    exemplars,
    flags: opt(uint32, () => 0),
  })
  .transform((dp): OtlpNumberDataPoint => {
    const out: OtlpNumberDataPoint = {
      attributes: dp.attributes,
      startTimeUnixNano: dp.startTimeUnixNano,
      timeUnixNano: dp.timeUnixNano,
      exemplars: dp.exemplars,
      flags: dp.flags,
    };
    if (dp.asDouble != null) out.asDouble = dp.asDouble;
    else if (dp.asInt != null) out.asInt = dp.asInt;
    return out;
  });

const histogramDataPoint = z
  .object({
    attributes,
    startTimeUnixNano: opt(uint64, () => 0n),
    timeUnixNano: opt(uint64, () => 0n),
    count: opt(uint64, () => 0n),
    sum: double.nullish(),
    bucketCounts: opt(z.array(uint64), () => []),
    explicitBounds: opt(z.array(double), () => []),
    exemplars,
    flags: opt(uint32, () => 0),
    min: double.nullish(),
    max: double.nullish(),
  })
  .transform((dp): OtlpHistogramDataPoint => {
    const out: OtlpHistogramDataPoint = {
      attributes: dp.attributes,
      startTimeUnixNano: dp.startTimeUnixNano,
      timeUnixNano: dp.timeUnixNano,
      count: dp.count,
      bucketCounts: dp.bucketCounts,
      explicitBounds: dp.explicitBounds,
      exemplars: dp.exemplars,
      flags: dp.flags,
    };
    if (dp.sum != null) out.sum = dp.sum;
    if (dp.min != null) out.min = dp.min;
    if (dp.max != null) out.max = dp.max;
    return out;
  });

const buckets = z.object({
  offset: opt(int32, () => 0),
  bucketCounts: opt(z.array(uint64), () => []),
});

const exponentialHistogramDataPoint = z
  .object({
    attributes,
    startTimeUnixNano: opt(uint64, () => 0n),
    timeUnixNano: opt(uint64, () => 0n),
    count: opt(uint64, () => 0n),
    sum: double.nullish(),
    scale: opt(int32, () => 0),
    zeroCount: opt(uint64, () => 0n),
    positive: opt(buckets, newBuckets),
    negative: opt(buckets, newBuckets),
    flags: opt(uint32, () => 0),
    exemplars,
    min: double.nullish(),
    max: double.nullish(),
    zeroThreshold: opt(double, () => 0),
  })
  .transform((dp): OtlpExponentialHistogramDataPoint => {
    const out: OtlpExponentialHistogramDataPoint = {
      attributes: dp.attributes,
      startTimeUnixNano: dp.startTimeUnixNano,
      timeUnixNano: dp.timeUnixNano,
      count: dp.count,
      scale: dp.scale,
      zeroCount: dp.zeroCount,
      positive: dp.positive,
      negative: dp.negative,
      flags: dp.flags,
      exemplars: dp.exemplars,
      zeroThreshold: dp.zeroThreshold,
    };
    if (dp.sum != null) out.sum = dp.sum;
    if (dp.min != null) out.min = dp.min;
    if (dp.max != null) out.max = dp.max;
    return out;
  });

const summaryDataPoint = z.object({
  attributes,
  startTimeUnixNano: opt(uint64, () => 0n),
  timeUnixNano: opt(uint64, () => 0n),
  count: opt(uint64, () => 0n),
  sum: opt(double, () => 0),
  quantileValues: opt(
    z.array(
      z.object({
        quantile: opt(double, () => 0),
        value: opt(double, () => 0),
      })
    ),
    () => []
  ),
  flags: opt(uint32, () => 0),
});

// ─── Metric variants ────────────────────────────────────────────────────────

const gauge = z
  .object({ dataPoints: opt(z.array(numberDataPoint), () => []) })
  .transform((g): OtlpGauge => ({ type: 'gauge', dataPoints: g.dataPoints }));

const sum = z
  .object({
    dataPoints: opt(z.array(numberDataPoint), () => []),
    aggregationTemporality: opt(temporality, () => 0),
    isMonotonic: opt(z.boolean(), () => false),
  })
  .transform((s): OtlpSum => ({ type: 'sum', ...s }));

const histogram = z
  .object({
    dataPoints: opt(z.array(histogramDataPoint), () => []),
    aggregationTemporality: opt(temporality, () => 0),
  })
  .transform((h): OtlpHistogram => ({ type: 'histogram', ...h }));

const exponentialHistogram = z
  .object({
    dataPoints: opt(z.array(exponentialHistogramDataPoint), () => []),
    aggregationTemporality: opt(temporality, () => 0),
  })
  .transform((h): OtlpExponentialHistogram => ({ type: 'exponentialHistogram', ...h }));

const summary = z
  .object({ dataPoints: opt(z.array(summaryDataPoint), () => []) })
  .transform((s): OtlpSummary => ({ type: 'summary', dataPoints: s.dataPoints }));

const metric = z
  .object({
    name: opt(str, () => ''),
    description: opt(str, () => ''),
    unit: opt(str, () => ''),
    gauge: gauge.nullish(),
    sum: sum.nullish(),
    histogram: histogram.nullish(),
    exponentialHistogram: exponentialHistogram.nullish(),
    summary: summary.nullish(),
  })
  .transform((m): OtlpMetric => {
    const out: OtlpMetric = { name: m.name, description: m.description, unit: m.unit };
    const data = m.gauge ?? m.sum ?? m.histogram ?? m.exponentialHistogram ?? m.summary;
    if (data != null) out.data = data;
    return out;
  });

// ─── Envelope levels ────────────────────────────────────────────────────────

const metrics = opt(z.array(metric), () => []);
const schemaUrl = opt(str, () => '');

const scopeMetrics = z.object({
  scope: opt(scope, newInstrumentationScope),
  metrics,
  schemaUrl,
});

const instrumentationLibraryMetrics = z.object({
  instrumentationLibrary: opt(instrumentationLibrary, () => ({ name: '', version: '' })),
  metrics,
  schemaUrl,
});

const resourceMetrics = z.object({
  resource: opt(resource, newResource),
  scopeMetrics: opt(z.array(scopeMetrics), () => []),
  instrumentationLibraryMetrics: opt(z.array(instrumentationLibraryMetrics), () => []),
  schemaUrl,
});

/** Top-level OTLP/JSON metrics document (MetricsData / ExportMetricsServiceRequest). */
export const metricsDataSchema = z.object({
  resourceMetrics: opt(z.array(resourceMetrics), () => []),
});
