/**
 * Protobuf decoder for OTLP metrics. Reads both the current scope_metrics (2)
 * and the deprecated instrumentation_library_metrics (1000) grouping; the
 * caller is expected to run the scope migration afterwards.
 */

import {
  newBuckets,
  newExemplar,
  newExponentialHistogramDataPoint,
  newHistogramDataPoint,
  newInstrumentationLibraryMetrics,
  newInstrumentationScope,
  newMetric,
  newMetricsData,
  newNumberDataPoint,
  newResource,
  newResourceMetrics,
  newScopeMetrics,
  newSummaryDataPoint,
  newValueAtQuantile,
} from '../model/defaults.ts';
import type {
  AggregationTemporalityValue,
  OtlpAnyValue,
  OtlpBuckets,
  OtlpExemplar,
  OtlpExponentialHistogram,
  OtlpExponentialHistogramDataPoint,
  OtlpGauge,
  OtlpHistogram,
  OtlpHistogramDataPoint,
  OtlpInstrumentationLibrary,
  OtlpInstrumentationLibraryMetrics,
  OtlpInstrumentationScope,
  OtlpKeyValue,
  OtlpMetric,
  OtlpMetricsData,
  OtlpNumberDataPoint,
  OtlpResource,
  OtlpResourceMetrics,
  OtlpScopeMetrics,
  OtlpSum,
  OtlpSummary,
  OtlpSummaryDataPoint,
  OtlpValueAtQuantile,
} from '../types/otlp.ts';
import { ProtoReader } from './ProtoReader.ts';
import { WireType } from './ProtoSink.ts';

const { VARINT, FIXED64, LEN } = WireType;

// ─── Common ─────────────────────────────────────────────────────────────────

function decodeAnyValue(r: ProtoReader): OtlpAnyValue {
  // oneof: the last member on the wire wins
  let value: OtlpAnyValue = {};
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 1:
        r.expect(field, wt, LEN);
        value = { stringValue: r.string() };
        break;
      case 2:
        r.expect(field, wt, VARINT);
        value = { boolValue: r.bool() };
        break;
      case 3:
        r.expect(field, wt, VARINT);
        value = { intValue: r.int64() };
        break;
      case 4:
        r.expect(field, wt, FIXED64);
        value = { doubleValue: r.double() };
        break;
      case 5:
        r.expect(field, wt, LEN);
        value = { arrayValue: { values: decodeRepeated(r.sub(), decodeAnyValue) } };
        break;
      case 6:
        r.expect(field, wt, LEN);
        value = { kvlistValue: { values: decodeRepeated(r.sub(), decodeKeyValue) } };
        break;
      case 7:
        r.expect(field, wt, LEN);
        value = { bytesValue: r.bytes() };
        break;
      default:
        r.skip(wt);
    }
  }
  return value;
}

/** ArrayValue and KeyValueList: `repeated T values = 1`. */
function decodeRepeated<T>(r: ProtoReader, decode: (r: ProtoReader) => T): T[] {
  const out: T[] = [];
  while (!r.done) {
    const [field, wt] = r.tag();
    if (field === 1) {
      r.expect(field, wt, LEN);
      out.push(decode(r.sub()));
    } else {
      r.skip(wt);
    }
  }
  return out;
}

function decodeKeyValue(r: ProtoReader): OtlpKeyValue {
  const kv: OtlpKeyValue = { key: '', value: {} };
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 1:
        r.expect(field, wt, LEN);
        kv.key = r.string();
        break;
      case 2:
        r.expect(field, wt, LEN);
        kv.value = decodeAnyValue(r.sub());
        break;
      default:
        r.skip(wt);
    }
  }
  return kv;
}

function decodeResource(r: ProtoReader): OtlpResource {
  const res = newResource();
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 1:
        r.expect(field, wt, LEN);
        res.attributes.push(decodeKeyValue(r.sub()));
        break;
      case 2:
        r.expect(field, wt, VARINT);
        res.droppedAttributesCount = r.uint32();
        break;
      default:
        r.skip(wt);
    }
  }
  return res;
}

function decodeScope(r: ProtoReader): OtlpInstrumentationScope {
  const scope = newInstrumentationScope();
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 1:
        r.expect(field, wt, LEN);
        scope.name = r.string();
        break;
      case 2:
        r.expect(field, wt, LEN);
        scope.version = r.string();
        break;
      case 3:
        r.expect(field, wt, LEN);
        scope.attributes.push(decodeKeyValue(r.sub()));
        break;
      case 4:
        r.expect(field, wt, VARINT);
        scope.droppedAttributesCount = r.uint32();
        break;
      default:
        r.skip(wt);
    }
  }
  return scope;
}

function decodeInstrumentationLibrary(r: ProtoReader): OtlpInstrumentationLibrary {
  const lib: OtlpInstrumentationLibrary = { name: '', version: '' };
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 1:
        r.expect(field, wt, LEN);
        lib.name = r.string();
        break;
      case 2:
        r.expect(field, wt, LEN);
        lib.version = r.string();
        break;
      default:
        r.skip(wt);
    }
  }
  return lib;
}

function decodeExemplar(r: ProtoReader): OtlpExemplar {
  const e = newExemplar();
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 2:
        r.expect(field, wt, FIXED64);
        e.timeUnixNano = r.fixed64();
        break;
      case 3:
        r.expect(field, wt, FIXED64);
        delete e.asInt;
        e.asDouble = r.double();
        break;
      case 4:
        r.expect(field, wt, LEN);
        e.spanId = r.bytes();
        break;
      case 5:
        r.expect(field, wt, LEN);
        e.traceId = r.bytes();
        break;
      case 6:
        r.expect(field, wt, FIXED64);
        delete e.asDouble;
        e.asInt = r.sfixed64();
        break;
      case 7:
        r.expect(field, wt, LEN);
        e.filteredAttributes.push(decodeKeyValue(r.sub()));
        break;
      default:
        r.skip(wt);
    }
  }
  return e;
}

// ─── Data points ────────────────────────────────────────────────────────────

function decodeNumberDataPoint(r: ProtoReader): OtlpNumberDataPoint {
  const dp = newNumberDataPoint();
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 2:
        r.expect(field, wt, FIXED64);
        dp.startTimeUnixNano = r.fixed64();
        break;
      case 3:
        r.expect(field, wt, FIXED64);
        dp.timeUnixNano = r.fixed64();
        break;
      case 4:
        r.expect(field, wt, FIXED64);
        delete dp.asInt;
        dp.asDouble = r.double();
        break;
      case 5:
        r.expect(field, wt, LEN);
        dp.exemplars.push(decodeExemplar(r.sub()));
        break;
      case 6:
        r.expect(field, wt, FIXED64);
        delete dp.asDouble;
        dp.asInt = r.sfixed64();
        break;
      case 7:
        r.expect(field, wt, LEN);
        dp.attributes.push(decodeKeyValue(r.sub()));
        break;
      case 8:
        r.expect(field, wt, VARINT);
        dp.flags = r.uint32();
        break;
      default:
        r.skip(wt);
    }
  }
  return dp;
}

function decodeHistogramDataPoint(r: ProtoReader): OtlpHistogramDataPoint {
  const dp = newHistogramDataPoint();
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 2:
        r.expect(field, wt, FIXED64);
        dp.startTimeUnixNano = r.fixed64();
        break;
      case 3:
        r.expect(field, wt, FIXED64);
        dp.timeUnixNano = r.fixed64();
        break;
      case 4:
        r.expect(field, wt, FIXED64);
        dp.count = r.fixed64();
        break;
      case 5:
        r.expect(field, wt, FIXED64);
        dp.sum = r.double();
        break;
      case 6:
        r.fixed64s(field, wt, dp.bucketCounts);
        break;
      case 7:
        r.doubles(field, wt, dp.explicitBounds);
        break;
      case 8:
        r.expect(field, wt, LEN);
        dp.exemplars.push(decodeExemplar(r.sub()));
        break;
      case 9:
        r.expect(field, wt, LEN);
        dp.attributes.push(decodeKeyValue(r.sub()));
        break;
      case 10:
        r.expect(field, wt, VARINT);
        dp.flags = r.uint32();
        break;
      case 11:
        r.expect(field, wt, FIXED64);
        dp.min = r.double();
        break;
      case 12:
        r.expect(field, wt, FIXED64);
        dp.max = r.double();
        break;
      default:
        r.skip(wt);
    }
  }
  return dp;
}

function decodeBuckets(r: ProtoReader): OtlpBuckets {
  const b = newBuckets();
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 1:
        r.expect(field, wt, VARINT);
        b.offset = r.sint32();
        break;
      case 2:
        r.uint64s(field, wt, b.bucketCounts);
        break;
      default:
        r.skip(wt);
    }
  }
  return b;
}

function decodeExponentialHistogramDataPoint(r: ProtoReader): OtlpExponentialHistogramDataPoint {
  const dp = newExponentialHistogramDataPoint();
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 1:
        r.expect(field, wt, LEN);
        dp.attributes.push(decodeKeyValue(r.sub()));
        break;
      case 2:
        r.expect(field, wt, FIXED64);
        dp.startTimeUnixNano = r.fixed64();
        break;
      case 3:
        r.expect(field, wt, FIXED64);
        dp.timeUnixNano = r.fixed64();
        break;
      case 4:
        r.expect(field, wt, FIXED64);
        dp.count = r.fixed64();
        break;
      case 5:
        r.expect(field, wt, FIXED64);
        dp.sum = r.double();
        break;
      case 6:
        r.expect(field, wt, VARINT);
        dp.scale = r.sint32();
        break;
      case 7:
        r.expect(field, wt, FIXED64);
        dp.zeroCount = r.fixed64();
        break;
      case 8:
        r.expect(field, wt, LEN);
        dp.positive = decodeBuckets(r.sub());
        break;
      case 9:
        r.expect(field, wt, LEN);
        dp.negative = decodeBuckets(r.sub());
        break;
      case 10:
        r.expect(field, wt, VARINT);
        dp.flags = r.uint32();
        break;
      case 11:
        r.expect(field, wt, LEN);
        dp.exemplars.push(decodeExemplar(r.sub()));
        break;
      case 12:
        r.expect(field, wt, FIXED64);
        dp.min = r.double();
        break;
      case 13:
        r.expect(field, wt, FIXED64);
        dp.max = r.double();
        break;
      case 14:
        r.expect(field, wt, FIXED64);
        dp.zeroThreshold = r.double();
        break;
      default:
        r.skip(wt);
    }
  }
  return dp;
}

function decodeValueAtQuantile(r: ProtoReader): OtlpValueAtQuantile {
  const q = newValueAtQuantile();
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 1:
        r.expect(field, wt, FIXED64);
        q.quantile = r.double();
        break;
      case 2:
        r.expect(field, wt, FIXED64);
        q.value = r.double();
        break;
      default:
        r.skip(wt);
    }
  }
  return q;
}

function decodeSummaryDataPoint(r: ProtoReader): OtlpSummaryDataPoint {
  const dp = newSummaryDataPoint();
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 2:
        r.expect(field, wt, FIXED64);
        dp.startTimeUnixNano = r.fixed64();
        break;
      case 3:
        r.expect(field, wt, FIXED64);
        dp.timeUnixNano = r.fixed64();
        break;
      case 4:
        r.expect(field, wt, FIXED64);
        dp.count = r.fixed64();
        break;
      case 5:
        r.expect(field, wt, FIXED64);
        dp.sum = r.double();
        break;
      case 6:
        r.expect(field, wt, LEN);
        dp.quantileValues.push(decodeValueAtQuantile(r.sub()));
        break;
      case 7:
        r.expect(field, wt, LEN);
        dp.attributes.push(decodeKeyValue(r.sub()));
        break;
      case 8:
        r.expect(field, wt, VARINT);
        dp.flags = r.uint32();
        break;
      default:
        r.skip(wt);
    }
  }
  return dp;
}

// ─── Metric variants ────────────────────────────────────────────────────────

/** Open enum: unknown values are kept as received. */
function decodeTemporality(r: ProtoReader): AggregationTemporalityValue {
  return r.int32();
}

function decodeGauge(r: ProtoReader): OtlpGauge {
  const g: OtlpGauge = { type: 'gauge', dataPoints: [] };
  while (!r.done) {
    const [field, wt] = r.tag();
    if (field === 1) {
      r.expect(field, wt, LEN);
      g.dataPoints.push(decodeNumberDataPoint(r.sub()));
    } else {
      r.skip(wt);
    }
  }
  return g;
}

function decodeSum(r: ProtoReader): OtlpSum {
  const sum: OtlpSum = { type: 'sum', dataPoints: [], aggregationTemporality: 0, isMonotonic: false };
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 1:
        r.expect(field, wt, LEN);
        sum.dataPoints.push(decodeNumberDataPoint(r.sub()));
        break;
      case 2:
        r.expect(field, wt, VARINT);
        sum.aggregationTemporality = decodeTemporality(r);
        break;
      case 3:
        r.expect(field, wt, VARINT);
        sum.isMonotonic = r.bool();
        break;
      default:
        r.skip(wt);
    }
  }
  return sum;
}

function decodeHistogram(r: ProtoReader): OtlpHistogram {
  const h: OtlpHistogram = { type: 'histogram', dataPoints: [], aggregationTemporality: 0 };
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 1:
        r.expect(field, wt, LEN);
        h.dataPoints.push(decodeHistogramDataPoint(r.sub()));
        break;
      case 2:
        r.expect(field, wt, VARINT);
        h.aggregationTemporality = decodeTemporality(r);
        break;
      default:
        r.skip(wt);
    }
  }
  return h;
}

function decodeExponentialHistogram(r: ProtoReader): OtlpExponentialHistogram {
  const h: OtlpExponentialHistogram = {
    type: 'exponentialHistogram',
    dataPoints: [],
    aggregationTemporality: 0,
  };
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 1:
        r.expect(field, wt, LEN);
        h.dataPoints.push(decodeExponentialHistogramDataPoint(r.sub()));
        break;
      case 2:
        r.expect(field, wt, VARINT);
        h.aggregationTemporality = decodeTemporality(r);
        break;
      default:
        r.skip(wt);
    }
  }
  return h;
}

function decodeSummary(r: ProtoReader): OtlpSummary {
  const s: OtlpSummary = { type: 'summary', dataPoints: [] };
  while (!r.done) {
    const [field, wt] = r.tag();
    if (field === 1) {
      r.expect(field, wt, LEN);
      s.dataPoints.push(decodeSummaryDataPoint(r.sub()));
    } else {
      r.skip(wt);
    }
  }
  return s;
}

function decodeMetric(r: ProtoReader): OtlpMetric {
  const m = newMetric();
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 1:
        r.expect(field, wt, LEN);
        m.name = r.string();
        break;
      case 2:
        r.expect(field, wt, LEN);
        m.description = r.string();
        break;
      case 3:
        r.expect(field, wt, LEN);
        m.unit = r.string();
        break;
      case 5:
        r.expect(field, wt, LEN);
        m.data = decodeGauge(r.sub());
        break;
      case 7:
        r.expect(field, wt, LEN);
        m.data = decodeSum(r.sub());
        break;
      case 9:
        r.expect(field, wt, LEN);
        m.data = decodeHistogram(r.sub());
        break;
      case 10:
        r.expect(field, wt, LEN);
        m.data = decodeExponentialHistogram(r.sub());
        break;
      case 11:
        r.expect(field, wt, LEN);
        m.data = decodeSummary(r.sub());
        break;
      default:
        r.skip(wt);
    }
  }
  return m;
}

// ─── Envelope levels ────────────────────────────────────────────────────────

function decodeScopeMetrics(r: ProtoReader): OtlpScopeMetrics {
  const sm = newScopeMetrics();
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 1:
        r.expect(field, wt, LEN);
        sm.scope = decodeScope(r.sub());
        break;
      case 2:
        r.expect(field, wt, LEN);
        sm.metrics.push(decodeMetric(r.sub()));
        break;
      case 3:
        r.expect(field, wt, LEN);
        sm.schemaUrl = r.string();
        break;
      default:
        r.skip(wt);
    }
  }
  return sm;
}

function decodeInstrumentationLibraryMetrics(r: ProtoReader): OtlpInstrumentationLibraryMetrics {
  const ilm = newInstrumentationLibraryMetrics();
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 1:
        r.expect(field, wt, LEN);
        ilm.instrumentationLibrary = decodeInstrumentationLibrary(r.sub());
        break;
      case 2:
        r.expect(field, wt, LEN);
        ilm.metrics.push(decodeMetric(r.sub()));
        break;
      case 3:
        r.expect(field, wt, LEN);
        ilm.schemaUrl = r.string();
        break;
      default:
        r.skip(wt);
    }
  }
  return ilm;
}

function readResourceMetrics(r: ProtoReader): OtlpResourceMetrics {
  const rm = newResourceMetrics();
  while (!r.done) {
    const [field, wt] = r.tag();
    switch (field) {
      case 1:
        r.expect(field, wt, LEN);
        rm.resource = decodeResource(r.sub());
        break;
      case 2:
        r.expect(field, wt, LEN);
        rm.scopeMetrics.push(decodeScopeMetrics(r.sub()));
        break;
      case 3:
        r.expect(field, wt, LEN);
        rm.schemaUrl = r.string();
        break;
      case 1000:
        r.expect(field, wt, LEN);
        rm.instrumentationLibraryMetrics.push(decodeInstrumentationLibraryMetrics(r.sub()));
        break;
      default:
        r.skip(wt);
    }
  }
  return rm;
}

// ─── Public API ─────────────────────────────────────────────────────────────

/** Decode MetricsData (or ExportMetricsServiceRequest) bytes. */
export function decodeMetricsData(bytes: Uint8Array): OtlpMetricsData {
  const r = new ProtoReader(bytes);
  const md = newMetricsData();
  while (!r.done) {
    const [field, wt] = r.tag();
    if (field === 1) {
      r.expect(field, wt, LEN);
      md.resourceMetrics.push(readResourceMetrics(r.sub()));
    } else {
      r.skip(wt);
    }
  }
  return md;
}

/** Decode one standalone ResourceMetrics message. */
export function decodeResourceMetrics(bytes: Uint8Array): OtlpResourceMetrics {
  return readResourceMetrics(new ProtoReader(bytes));
}
