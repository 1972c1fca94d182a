/**
 * Metrics tree: resources → scope groups → metrics → data points.
 *
 * Handles wrap the canonical records by reference; mutating through any
 * handle is visible through every other handle on the same records. Nothing
 * here is synchronized, so a tree shared with an envelope must not be
 * mutated while it is being encoded.
 */

import { isDeepStrictEqual } from 'node:util';
import type {
  OtlpInstrumentationScope,
  OtlpMetric,
  OtlpMetricsData,
  OtlpResource,
  OtlpResourceMetrics,
  OtlpScopeMetrics,
} from '../types/otlp.ts';
import { newMetric, newMetricsData, newResourceMetrics, newScopeMetrics } from './defaults.ts';
import { Metric, countDataPoints } from './Metric.ts';
import { Slice } from './Slice.ts';

export class ScopeMetrics {
  constructor(readonly orig: OtlpScopeMetrics) {}

  /** Opaque scope descriptor, mutable in place. */
  scope(): OtlpInstrumentationScope {
    return this.orig.scope;
  }

  get schemaUrl(): string {
    return this.orig.schemaUrl;
  }

  set schemaUrl(value: string) {
    this.orig.schemaUrl = value;
  }

  metrics(): Slice<OtlpMetric, Metric> {
    return new Slice(this.orig.metrics, newMetric, (m) => new Metric(m));
  }
}

export class ResourceMetrics {
  constructor(readonly orig: OtlpResourceMetrics) {}

  /** Opaque resource descriptor, mutable in place. */
  resource(): OtlpResource {
    return this.orig.resource;
  }

  get schemaUrl(): string {
    return this.orig.schemaUrl;
  }

  set schemaUrl(value: string) {
    this.orig.schemaUrl = value;
  }

  scopeMetrics(): Slice<OtlpScopeMetrics, ScopeMetrics> {
    return new Slice(this.orig.scopeMetrics, newScopeMetrics, (sm) => new ScopeMetrics(sm));
  }
}

export class Metrics {
  readonly orig: OtlpMetricsData;

  constructor(orig: OtlpMetricsData = newMetricsData()) {
    this.orig = orig;
  }

  resourceMetrics(): Slice<OtlpResourceMetrics, ResourceMetrics> {
    return new Slice(this.orig.resourceMetrics, newResourceMetrics, (rm) => new ResourceMetrics(rm));
  }

  /** Number of metric nodes across every resource and scope group. */
  metricCount(): number {
    let count = 0;
    for (const rm of this.orig.resourceMetrics) {
      for (const sm of rm.scopeMetrics) {
        count += sm.metrics.length;
      }
    }
    return count;
  }

  /** Sum of the active variant's data points over every metric node. */
  dataPointCount(): number {
    let count = 0;
    for (const rm of this.orig.resourceMetrics) {
      for (const sm of rm.scopeMetrics) {
        for (const m of sm.metrics) {
          count += countDataPoints(m.data);
        }
      }
    }
    return count;
  }

  /** Swap in new content while keeping this tree's identity. */
  replaceContent(data: OtlpMetricsData): void {
    const target = this.orig.resourceMetrics;
    if (data.resourceMetrics === target) return;
    target.length = 0;
    for (const rm of data.resourceMetrics) target.push(rm);
  }

  equals(other: Metrics): boolean {
    return isDeepStrictEqual(this.orig, other.orig);
  }
}
