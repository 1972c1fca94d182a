// otlp-metrics-envelope: OTLP metrics export envelope and MetricsService transport

// Envelope
export { MetricsEnvelope, ExportRequest, ExportResponse } from './src/core/Envelope.ts';
export { DecodeError, EncodeError, ExportError, ConfigDecodeError } from './src/core/errors.ts';

// Builder
export { MetricsExportService, BuiltMetricsExportService } from './src/core/MetricsExportService.ts';

// Metrics tree
export { Metrics, ResourceMetrics, ScopeMetrics } from './src/model/Metrics.ts';
export { Metric, Gauge, Sum, Histogram, ExponentialHistogram, Summary } from './src/model/Metric.ts';
export { Slice } from './src/model/Slice.ts';
export { AggregationTemporality } from './src/types/otlp.ts';
export type {
  AggregationTemporalityValue,
  MetricDataType,
  OtlpAnyValue,
  OtlpExemplar,
  OtlpExponentialHistogramDataPoint,
  OtlpHistogramDataPoint,
  OtlpInstrumentationScope,
  OtlpKeyValue,
  OtlpMetric,
  OtlpMetricsData,
  OtlpNumberDataPoint,
  OtlpResource,
  OtlpResourceMetrics,
  OtlpScopeMetrics,
  OtlpSummaryDataPoint,
} from './src/types/otlp.ts';

// Schema migration
export {
  migrateInstrumentationLibraryMetrics,
  hasInstrumentationLibraryMetrics,
} from './src/transform/migrateScope.ts';

// Transport
export { MetricsClient } from './src/rpc/client.ts';
export type { ExportCallOptions } from './src/rpc/client.ts';
export { registerMetricsServer } from './src/rpc/server.ts';
export type { ExportContext, ExportHandler, MetricsServerOptions } from './src/rpc/server.ts';
export {
  MetricsService,
  ExportMetricsServiceRequestSchema,
  ExportMetricsServiceResponseSchema,
} from './src/rpc/metricsService.ts';
export { createMetricsNodeHandler, createMetricsTransport } from './src/adapters/node.ts';
export type { CompressionName, MetricsTransportOptions } from './src/adapters/node.ts';
export { snappyCompression } from './src/compress/snappy.ts';

// Host
export { ServiceHost } from './src/host/ServiceHost.ts';
export type { ServiceHostOptions } from './src/host/ServiceHost.ts';
export { ErrorChannel } from './src/host/ErrorChannel.ts';
export { ComponentKind, newComponentID, parseComponentID } from './src/host/component.ts';
export type {
  Component,
  ComponentID,
  ComponentType,
  DataType,
  Exporter,
  Extension,
  Factories,
  Factory,
  Host,
} from './src/host/component.ts';

// Config
export { ConfigMap, KEY_DELIMITER } from './src/config/ConfigMap.ts';
export type { StringMap } from './src/config/ConfigMap.ts';
export { configStruct, optionalField, structMap, textKeyMap } from './src/config/hooks.ts';
export type { TextKey } from './src/config/hooks.ts';
export { serviceConfigSchema } from './src/config/serviceConfig.ts';
export type { ServiceConfig } from './src/config/serviceConfig.ts';

// Logging
export { createLogger, silentLogger } from './src/logging/logger.ts';

// Codecs (for advanced use)
export { encodeMetricsData, encodeResourceMetrics } from './src/proto/metricsEncode.ts';
export { decodeMetricsData, decodeResourceMetrics } from './src/proto/metricsDecode.ts';
export { encodeMetricsJson, decodeMetricsJson } from './src/json/metricsJson.ts';
