/**
 * OTLP/JSON metrics codec.
 *
 * Decoding parses, validates and converts in one zod pass (see
 * otlpJsonSchema.ts). Encoding walks the tree in proto declaration order,
 * omits zero-valued scalars and empty lists, writes 64-bit integers as
 * decimal strings and emits minified output. Resource, scope and bucket
 * messages are always written, even when empty.
 */

import { DecodeError, EncodeError } from '../core/errors.ts';
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
} from '../types/otlp.ts';
import { isWellFormedUtf16 } from '../util/utf8.ts';
import { INT32_MAX, INT32_MIN, INT64_MAX, INT64_MIN, UINT32_MAX, UINT64_MAX } from '../util/varint.ts';
import { metricsDataSchema } from './otlpJsonSchema.ts';

type JsonValue = string | number | boolean | JsonValue[] | JsonObject;
type JsonObject = { [key: string]: JsonValue };

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });
const utf8Encoder = new TextEncoder();

// ─── Decode ─────────────────────────────────────────────────────────────────

/**
 * Parse an OTLP/JSON document into canonical records. Both the current
 * `scopeMetrics` and the deprecated `instrumentationLibraryMetrics` keys are
 * read; callers are expected to migrate afterwards.
 */
export function decodeMetricsJson(input: string | Uint8Array): OtlpMetricsData {
  let text: string;
  if (typeof input === 'string') {
    text = input;
  } else {
    try {
      text = utf8Decoder.decode(input);
    } catch (err) {
      throw new DecodeError('JSON payload is not valid UTF-8', { cause: err });
    }
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new DecodeError(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }

  const parsed = metricsDataSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new DecodeError(`invalid OTLP/JSON metrics: ${where}${issue?.message ?? 'invalid input'}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

// ─── Encode helpers ─────────────────────────────────────────────────────────

function text(value: string, field: string): string {
  if (!isWellFormedUtf16(value)) {
    throw new EncodeError(`field ${field}: string contains an unpaired surrogate`);
  }
  return value;
}

function putString(out: JsonObject, key: string, value: string): void {
  if (value !== '') out[key] = text(value, key);
}

function putUint32(out: JsonObject, key: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
    throw new EncodeError(`field ${key}: ${value} is not a valid uint32`);
  }
  if (value !== 0) out[key] = value;
}

function putInt32(out: JsonObject, key: string, value: number): void {
  if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    throw new EncodeError(`field ${key}: ${value} is not a valid int32`);
  }
  if (value !== 0) out[key] = value;
}

function int64(value: bigint, key: string): string {
  if (value < INT64_MIN || value > INT64_MAX) {
    throw new EncodeError(`field ${key}: ${value} is not a valid int64`);
  }
  return value.toString();
}

function uint64(value: bigint, key: string): string {
  if (value < 0n || value > UINT64_MAX) {
    throw new EncodeError(`field ${key}: ${value} is not a valid uint64`);
  }
  return value.toString();
}

function putUint64(out: JsonObject, key: string, value: bigint): void {
  const encoded = uint64(value, key);
  if (value !== 0n) out[key] = encoded;
}

/** Non-finite doubles use the proto3 JSON spellings. */
function jsonDouble(value: number): JsonValue {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'Infinity';
  if (value === -Infinity) return '-Infinity';
  return value;
}

function putDouble(out: JsonObject, key: string, value: number | undefined, always = false): void {
  if (value === undefined) return;
  if (always || !Object.is(value, 0)) out[key] = jsonDouble(value);
}

function putList<T>(out: JsonObject, key: string, items: T[], map: (item: T) => JsonValue): void {
  if (items.length > 0) out[key] = items.map(map);
}

function putBytes(out: JsonObject, key: string, value: Uint8Array, encoding: 'base64' | 'hex'): void {
  if (value.length > 0) out[key] = Buffer.from(value.buffer, value.byteOffset, value.length).toString(encoding);
}

// ─── Encode ─────────────────────────────────────────────────────────────────

function anyValueJson(v: OtlpAnyValue): JsonObject {
  if (v.stringValue !== undefined) return { stringValue: text(v.stringValue, 'stringValue') };
  if (v.boolValue !== undefined) return { boolValue: v.boolValue };
  if (v.intValue !== undefined) return { intValue: int64(v.intValue, 'intValue') };
  if (v.doubleValue !== undefined) return { doubleValue: jsonDouble(v.doubleValue) };
  if (v.arrayValue !== undefined) return { arrayValue: { values: v.arrayValue.values.map(anyValueJson) } };
  if (v.kvlistValue !== undefined) return { kvlistValue: { values: v.kvlistValue.values.map(keyValueJson) } };
  if (v.bytesValue !== undefined) {
    return { bytesValue: Buffer.from(v.bytesValue.buffer, v.bytesValue.byteOffset, v.bytesValue.length).toString('base64') };
  }
  return {};
}

function keyValueJson(kv: OtlpKeyValue): JsonObject {
  const out: JsonObject = {};
  putString(out, 'key', kv.key);
  out.value = anyValueJson(kv.value);
  return out;
}

function resourceJson(r: OtlpResource): JsonObject {
  const out: JsonObject = {};
  putList(out, 'attributes', r.attributes, keyValueJson);
  putUint32(out, 'droppedAttributesCount', r.droppedAttributesCount);
  return out;
}

function scopeJson(s: OtlpInstrumentationScope): JsonObject {
  const out: JsonObject = {};
  putString(out, 'name', s.name);
  putString(out, 'version', s.version);
  putList(out, 'attributes', s.attributes, keyValueJson);
  putUint32(out, 'droppedAttributesCount', s.droppedAttributesCount);
  return out;
}

function exemplarJson(e: OtlpExemplar): JsonObject {
  const out: JsonObject = {};
  putList(out, 'filteredAttributes', e.filteredAttributes, keyValueJson);
  putUint64(out, 'timeUnixNano', e.timeUnixNano);
  if (e.asDouble !== undefined) putDouble(out, 'asDouble', e.asDouble, true);
  else if (e.asInt !== undefined) out.asInt = int64(e.asInt, 'asInt');
  putBytes(out, 'spanId', e.spanId, 'hex');
  putBytes(out, 'traceId', e.traceId, 'hex');
  return out;
}

function numberDataPointJson(dp: OtlpNumberDataPoint): JsonObject {
  const out: JsonObject = {};
  putList(out, 'attributes', dp.attributes, keyValueJson);
  putUint64(out, 'startTimeUnixNano', dp.startTimeUnixNano);
  putUint64(out, 'timeUnixNano', dp.timeUnixNano);
  if (dp.asDouble !== undefined) putDouble(out, 'asDouble', dp.asDouble, true);
  else if (dp.asInt !== undefined) out.asInt = int64(dp.asInt, 'asInt');
  putList(out, 'exemplars', dp.exemplars, exemplarJson);
  putUint32(out, 'flags', dp.flags);
  return out;
}

function histogramDataPointJson(dp: OtlpHistogramDataPoint): JsonObject {
  const out: JsonObject = {};
  putList(out, 'attributes', dp.attributes, keyValueJson);
  putUint64(out, 'startTimeUnixNano', dp.startTimeUnixNano);
  putUint64(out, 'timeUnixNano', dp.timeUnixNano);
  putUint64(out, 'count', dp.count);
  putDouble(out, 'sum', dp.sum, true);
  putList(out, 'bucketCounts', dp.bucketCounts, (c) => uint64(c, 'bucketCounts'));
  putList(out, 'explicitBounds', dp.explicitBounds, jsonDouble);
  putList(out, 'exemplars', dp.exemplars, exemplarJson);
  putUint32(out, 'flags', dp.flags);
  putDouble(out, 'min', dp.min, true);
  putDouble(out, 'max', dp.max, true);
  return out;
}

function bucketsJson(b: OtlpBuckets): JsonObject {
  const out: JsonObject = {};
  putInt32(out, 'offset', b.offset);
  putList(out, 'bucketCounts', b.bucketCounts, (c) => uint64(c, 'bucketCounts'));
  return out;
}

function exponentialHistogramDataPointJson(dp: OtlpExponentialHistogramDataPoint): JsonObject {
  const out: JsonObject = {};
  putList(out, 'attributes', dp.attributes, keyValueJson);
  putUint64(out, 'startTimeUnixNano', dp.startTimeUnixNano);
  putUint64(out, 'timeUnixNano', dp.timeUnixNano);
  putUint64(out, 'count', dp.count);
  putDouble(out, 'sum', dp.sum, true);
  putInt32(out, 'scale', dp.scale);
  putUint64(out, 'zeroCount', dp.zeroCount);
  out.positive = bucketsJson(dp.positive);
  out.negative = bucketsJson(dp.negative);
  putUint32(out, 'flags', dp.flags);
  putList(out, 'exemplars', dp.exemplars, exemplarJson);
  putDouble(out, 'min', dp.min, true);
  putDouble(out, 'max', dp.max, true);
  putDouble(out, 'zeroThreshold', dp.zeroThreshold);
  return out;
}

function summaryDataPointJson(dp: OtlpSummaryDataPoint): JsonObject {
  const out: JsonObject = {};
  putList(out, 'attributes', dp.attributes, keyValueJson);
  putUint64(out, 'startTimeUnixNano', dp.startTimeUnixNano);
  putUint64(out, 'timeUnixNano', dp.timeUnixNano);
  putUint64(out, 'count', dp.count);
  putDouble(out, 'sum', dp.sum);
  putList(out, 'quantileValues', dp.quantileValues, (q) => {
    const qv: JsonObject = {};
    putDouble(qv, 'quantile', q.quantile);
    putDouble(qv, 'value', q.value);
    return qv;
  });
  putUint32(out, 'flags', dp.flags);
  return out;
}

function metricDataJson(data: OtlpMetricData): JsonObject {
  const out: JsonObject = {};
  switch (data.type) {
    case 'gauge':
      putList(out, 'dataPoints', data.dataPoints, numberDataPointJson);
      break;
    case 'sum':
      putList(out, 'dataPoints', data.dataPoints, numberDataPointJson);
      putInt32(out, 'aggregationTemporality', data.aggregationTemporality);
      if (data.isMonotonic) out.isMonotonic = true;
      break;
    case 'histogram':
      putList(out, 'dataPoints', data.dataPoints, histogramDataPointJson);
      putInt32(out, 'aggregationTemporality', data.aggregationTemporality);
      break;
    case 'exponentialHistogram':
      putList(out, 'dataPoints', data.dataPoints, exponentialHistogramDataPointJson);
      putInt32(out, 'aggregationTemporality', data.aggregationTemporality);
      break;
    case 'summary':
      putList(out, 'dataPoints', data.dataPoints, summaryDataPointJson);
      break;
  }
  return out;
}

function metricJson(m: OtlpMetric): JsonObject {
  const out: JsonObject = {};
  putString(out, 'name', m.name);
  putString(out, 'description', m.description);
  putString(out, 'unit', m.unit);
  if (m.data !== undefined) out[m.data.type] = metricDataJson(m.data);
  return out;
}

function scopeMetricsJson(sm: OtlpScopeMetrics): JsonObject {
  const out: JsonObject = { scope: scopeJson(sm.scope) };
  putList(out, 'metrics', sm.metrics, metricJson);
  putString(out, 'schemaUrl', sm.schemaUrl);
  return out;
}

function resourceMetricsJson(rm: OtlpResourceMetrics): JsonObject {
  const out: JsonObject = { resource: resourceJson(rm.resource) };
  putList(out, 'scopeMetrics', rm.scopeMetrics, scopeMetricsJson);
  putString(out, 'schemaUrl', rm.schemaUrl);
  return out;
}

/** Minified OTLP/JSON text. The deprecated grouping is never written. */
export function encodeMetricsJsonString(data: OtlpMetricsData): string {
  const out: JsonObject = {};
  putList(out, 'resourceMetrics', data.resourceMetrics, resourceMetricsJson);
  return JSON.stringify(out);
}

/** UTF-8 bytes of {@link encodeMetricsJsonString}. */
export function encodeMetricsJson(data: OtlpMetricsData): Uint8Array {
  return utf8Encoder.encode(encodeMetricsJsonString(data));
}
