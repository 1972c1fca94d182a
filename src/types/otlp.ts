/**
 * Canonical in-memory OTLP metrics records.
 * Field names follow the OTLP/JSON mapping; 64-bit integers are bigint and
 * byte strings are Uint8Array. Zero values are stored explicitly so that two
 * records describing the same data compare equal field by field.
 */

export interface OtlpKeyValue {
  key: string;
  value: OtlpAnyValue;
}

/** At most one member is set. An empty object is a valid (unset) value. */
export interface OtlpAnyValue {
  stringValue?: string;
  boolValue?: boolean;
  intValue?: bigint;
  doubleValue?: number;
  arrayValue?: { values: OtlpAnyValue[] };
  kvlistValue?: { values: OtlpKeyValue[] };
  bytesValue?: Uint8Array;
}

export interface OtlpResource {
  attributes: OtlpKeyValue[];
  droppedAttributesCount: number;
}

export interface OtlpInstrumentationScope {
  name: string;
  version: string;
  attributes: OtlpKeyValue[];
  droppedAttributesCount: number;
}

/** @deprecated Superseded by OtlpInstrumentationScope. */
export interface OtlpInstrumentationLibrary {
  name: string;
  version: string;
}

export interface OtlpExemplar {
  filteredAttributes: OtlpKeyValue[];
  timeUnixNano: bigint;
  asDouble?: number;
  asInt?: bigint;
  spanId: Uint8Array;
  traceId: Uint8Array;
}

export interface OtlpNumberDataPoint {
  attributes: OtlpKeyValue[];
  startTimeUnixNano: bigint;
  timeUnixNano: bigint;
  asDouble?: number;
  asInt?: bigint;
  exemplars: OtlpExemplar[];
  flags: number;
}

export interface OtlpHistogramDataPoint {
  attributes: OtlpKeyValue[];
  startTimeUnixNano: bigint;
  timeUnixNano: bigint;
  count: bigint;
  sum?: number;
  bucketCounts: bigint[];
  explicitBounds: number[];
  exemplars: OtlpExemplar[];
  flags: number;
  min?: number;
  max?: number;
}

export interface OtlpBuckets {
  offset: number;
  bucketCounts: bigint[];
}

export interface OtlpExponentialHistogramDataPoint {
  attributes: OtlpKeyValue[];
  startTimeUnixNano: bigint;
  timeUnixNano: bigint;
  count: bigint;
  sum?: number;
  scale: number;
  zeroCount: bigint;
  positive: OtlpBuckets;
  negative: OtlpBuckets;
  flags: number;
  exemplars: OtlpExemplar[];
  min?: number;
  max?: number;
  zeroThreshold: number;
}

export interface OtlpValueAtQuantile {
  quantile: number;
  value: number;
}

export interface OtlpSummaryDataPoint {
  attributes: OtlpKeyValue[];
  startTimeUnixNano: bigint;
  timeUnixNano: bigint;
  count: bigint;
  sum: number;
  quantileValues: OtlpValueAtQuantile[];
  flags: number;
}

export const AggregationTemporality = {
  UNSPECIFIED: 0,
  DELTA: 1,
  CUMULATIVE: 2,
} as const;

export type AggregationTemporality =
  (typeof AggregationTemporality)[keyof typeof AggregationTemporality];

/**
 * Wire value of an aggregation temporality. The enum is open: numbers other
 * than the AggregationTemporality members are kept as received.
 */
export type AggregationTemporalityValue = number;

export interface OtlpGauge {
  type: 'gauge';
  dataPoints: OtlpNumberDataPoint[];
}

export interface OtlpSum {
  type: 'sum';
  dataPoints: OtlpNumberDataPoint[];
  aggregationTemporality: AggregationTemporalityValue;
  isMonotonic: boolean;
}

export interface OtlpHistogram {
  type: 'histogram';
  dataPoints: OtlpHistogramDataPoint[];
  aggregationTemporality: AggregationTemporalityValue;
}

export interface OtlpExponentialHistogram {
  type: 'exponentialHistogram';
  dataPoints: OtlpExponentialHistogramDataPoint[];
  aggregationTemporality: AggregationTemporalityValue;
}

export interface OtlpSummary {
  type: 'summary';
  dataPoints: OtlpSummaryDataPoint[];
}

export type OtlpMetricData =
  | OtlpGauge
  | OtlpSum
  | OtlpHistogram
  | OtlpExponentialHistogram
  | OtlpSummary;

export type MetricDataType = OtlpMetricData['type'] | 'empty';

export interface OtlpMetric {
  name: string;
  description: string;
  unit: string;
  data?: OtlpMetricData;
}

export interface OtlpScopeMetrics {
  scope: OtlpInstrumentationScope;
  metrics: OtlpMetric[];
  schemaUrl: string;
}

/** @deprecated Superseded by OtlpScopeMetrics; only read during migration. */
export interface OtlpInstrumentationLibraryMetrics {
  instrumentationLibrary: OtlpInstrumentationLibrary;
  metrics: OtlpMetric[];
  schemaUrl: string;
}

export interface OtlpResourceMetrics {
  resource: OtlpResource;
  scopeMetrics: OtlpScopeMetrics[];
  /** Deprecated grouping. Emptied by migration and never encoded. */
  instrumentationLibraryMetrics: OtlpInstrumentationLibraryMetrics[];
  schemaUrl: string;
}

export interface OtlpMetricsData {
  resourceMetrics: OtlpResourceMetrics[];
}
