/**
 * Zero-valued record factories shared by the tree handles and both decoders.
 */

import type {
  OtlpBuckets,
  OtlpExemplar,
  OtlpExponentialHistogramDataPoint,
  OtlpHistogramDataPoint,
  OtlpInstrumentationLibraryMetrics,
  OtlpInstrumentationScope,
  OtlpMetric,
  OtlpMetricsData,
  OtlpNumberDataPoint,
  OtlpResource,
  OtlpResourceMetrics,
  OtlpScopeMetrics,
  OtlpSummaryDataPoint,
  OtlpValueAtQuantile,
} from '../types/otlp.ts';

export function newMetricsData(): OtlpMetricsData {
  return { resourceMetrics: [] };
}

export function newResource(): OtlpResource {
  return { attributes: [], droppedAttributesCount: 0 };
}

export function newInstrumentationScope(): OtlpInstrumentationScope {
  return { name: '', version: '', attributes: [], droppedAttributesCount: 0 };
}

export function newResourceMetrics(): OtlpResourceMetrics {
  return {
    resource: newResource(),
    scopeMetrics: [],
    instrumentationLibraryMetrics: [],
    schemaUrl: '',
  };
}

export function newScopeMetrics(): OtlpScopeMetrics {
  return { scope: newInstrumentationScope(), metrics: [], schemaUrl: '' };
}

export function newInstrumentationLibraryMetrics(): OtlpInstrumentationLibraryMetrics {
  return { instrumentationLibrary: { name: '', version: '' }, metrics: [], schemaUrl: '' };
}

export function newMetric(): OtlpMetric {
  return { name: '', description: '', unit: '' };
}

export function newExemplar(): OtlpExemplar {
  return {
    filteredAttributes: [],
    timeUnixNano: 0n,
    spanId: new Uint8Array(0),
    traceId: new Uint8Array(0),
  };
}

export function newNumberDataPoint(): OtlpNumberDataPoint {
  return {
    attributes: [],
    startTimeUnixNano: 0n,
    timeUnixNano: 0n,
    exemplars: [],
    flags: 0,
  };
}

export function newHistogramDataPoint(): OtlpHistogramDataPoint {
  return {
    attributes: [],
    startTimeUnixNano: 0n,
    timeUnixNano: 0n,
    count: 0n,
    bucketCounts: [],
    explicitBounds: [],
    exemplars: [],
    flags: 0,
  };
}

export function newBuckets(): OtlpBuckets {
  return { offset: 0, bucketCounts: [] };
}

export function newExponentialHistogramDataPoint(): OtlpExponentialHistogramDataPoint {
  return {
    attributes: [],
    startTimeUnixNano: 0n,
    timeUnixNano: 0n,
    count: 0n,
    scale: 0,
    zeroCount: 0n,
    positive: newBuckets(),
    negative: newBuckets(),
    flags: 0,
    exemplars: [],
    zeroThreshold: 0,
  };
}

export function newSummaryDataPoint(): OtlpSummaryDataPoint {
  return {
    attributes: [],
    startTimeUnixNano: 0n,
    timeUnixNano: 0n,
    count: 0n,
    sum: 0,
    quantileValues: [],
    flags: 0,
  };
}

export function newValueAtQuantile(): OtlpValueAtQuantile {
  return { quantile: 0, value: 0 };
}
