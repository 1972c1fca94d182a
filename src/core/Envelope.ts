/**
 * Export envelopes: the request and response carried by MetricsService/Export.
 *
 * An envelope shares its Metrics tree by reference. `fromMetrics(tree)` does
 * not copy, so mutations through either handle are visible through the other.
 * Decoding replaces the tree's content in place and then migrates the
 * deprecated instrumentation-library grouping; if a decode throws, the
 * envelope is left in an unspecified state and should be discarded.
 */

import { encodeMetricsJson, decodeMetricsJson } from '../json/metricsJson.ts';
import { Metrics } from '../model/Metrics.ts';
import { decodeMetricsData } from '../proto/metricsDecode.ts';
import { encodeMetricsData } from '../proto/metricsEncode.ts';
import { migrateInstrumentationLibraryMetrics } from '../transform/migrateScope.ts';
import type { OtlpMetricsData } from '../types/otlp.ts';

export abstract class MetricsEnvelope {
  private readonly tree: Metrics;

  constructor(metrics: Metrics = new Metrics()) {
    this.tree = metrics;
  }

  /** The wrapped tree, shared by reference. */
  metrics(): Metrics {
    return this.tree;
  }

  /** Parse OTLP/JSON into the wrapped tree. Throws DecodeError. */
  unmarshalJson(input: string | Uint8Array): void {
    this.load(decodeMetricsJson(input));
  }

  /** Minified OTLP/JSON using only the current scope grouping. Throws EncodeError. */
  marshalJson(): Uint8Array {
    return encodeMetricsJson(this.tree.orig);
  }

  /** Parse protobuf bytes into the wrapped tree. Throws DecodeError. */
  unmarshalProto(bytes: Uint8Array): void {
    this.load(decodeMetricsData(bytes));
  }

  /** Protobuf bytes. Throws EncodeError. */
  marshalProto(): Uint8Array {
    return encodeMetricsData(this.tree.orig);
  }

  /** Fold any hand-built deprecated grouping into scope groups. */
  normalize(): void {
    migrateInstrumentationLibraryMetrics(this.tree.orig.resourceMetrics);
  }

  /** Same envelope kind and structurally equal trees. */
  equals(other: MetricsEnvelope): boolean {
    return this.constructor === other.constructor && this.tree.equals(other.tree);
  }

  private load(data: OtlpMetricsData): void {
    this.tree.replaceContent(data);
    this.normalize();
  }
}

export class ExportRequest extends MetricsEnvelope {
  static fromMetrics(metrics: Metrics): ExportRequest {
    return new ExportRequest(metrics);
  }
}

/** A default-constructed response is the "accepted, nothing to report" value. */
export class ExportResponse extends MetricsEnvelope {
  static fromMetrics(metrics: Metrics): ExportResponse {
    return new ExportResponse(metrics);
  }
}
