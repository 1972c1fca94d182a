import type {
  AggregationTemporalityValue,
  MetricDataType,
  OtlpExponentialHistogram,
  OtlpExponentialHistogramDataPoint,
  OtlpGauge,
  OtlpHistogram,
  OtlpHistogramDataPoint,
  OtlpMetric,
  OtlpMetricData,
  OtlpNumberDataPoint,
  OtlpSum,
  OtlpSummary,
  OtlpSummaryDataPoint,
} from '../types/otlp.ts';
import { AggregationTemporality } from '../types/otlp.ts';
import {
  newExponentialHistogramDataPoint,
  newHistogramDataPoint,
  newNumberDataPoint,
  newSummaryDataPoint,
} from './defaults.ts';
import { Slice, identity } from './Slice.ts';

export class Gauge {
  constructor(readonly orig: OtlpGauge) {}

  dataPoints(): Slice<OtlpNumberDataPoint> {
    return new Slice(this.orig.dataPoints, newNumberDataPoint, identity);
  }
}

export class Sum {
  constructor(readonly orig: OtlpSum) {}

  get aggregationTemporality(): AggregationTemporalityValue {
    return this.orig.aggregationTemporality;
  }

  set aggregationTemporality(value: AggregationTemporalityValue) {
    this.orig.aggregationTemporality = value;
  }

  get isMonotonic(): boolean {
    return this.orig.isMonotonic;
  }

  set isMonotonic(value: boolean) {
    this.orig.isMonotonic = value;
  }

  dataPoints(): Slice<OtlpNumberDataPoint> {
    return new Slice(this.orig.dataPoints, newNumberDataPoint, identity);
  }
}

export class Histogram {
  constructor(readonly orig: OtlpHistogram) {}

  get aggregationTemporality(): AggregationTemporalityValue {
    return this.orig.aggregationTemporality;
  }

  set aggregationTemporality(value: AggregationTemporalityValue) {
    this.orig.aggregationTemporality = value;
  }

  dataPoints(): Slice<OtlpHistogramDataPoint> {
    return new Slice(this.orig.dataPoints, newHistogramDataPoint, identity);
  }
}

export class ExponentialHistogram {
  constructor(readonly orig: OtlpExponentialHistogram) {}

  get aggregationTemporality(): AggregationTemporalityValue {
    return this.orig.aggregationTemporality;
  }

  set aggregationTemporality(value: AggregationTemporalityValue) {
    this.orig.aggregationTemporality = value;
  }

  dataPoints(): Slice<OtlpExponentialHistogramDataPoint> {
    return new Slice(this.orig.dataPoints, newExponentialHistogramDataPoint, identity);
  }
}

export class Summary {
  constructor(readonly orig: OtlpSummary) {}

  dataPoints(): Slice<OtlpSummaryDataPoint> {
    return new Slice(this.orig.dataPoints, newSummaryDataPoint, identity);
  }
}

/**
 * A named metric holding at most one data-point variant.
 * setEmpty*() replaces whatever variant was active before.
 */
export class Metric {
  constructor(readonly orig: OtlpMetric) {}

  get name(): string {
    return this.orig.name;
  }

  set name(value: string) {
    this.orig.name = value;
  }

  get description(): string {
    return this.orig.description;
  }

  set description(value: string) {
    this.orig.description = value;
  }

  get unit(): string {
    return this.orig.unit;
  }

  set unit(value: string) {
    this.orig.unit = value;
  }

  get dataType(): MetricDataType {
    return this.orig.data?.type ?? 'empty';
  }

  setEmptyGauge(): Gauge {
    const data: OtlpGauge = { type: 'gauge', dataPoints: [] };
    this.orig.data = data;
    return new Gauge(data);
  }

  setEmptySum(): Sum {
    const data: OtlpSum = {
      type: 'sum',
      dataPoints: [],
      aggregationTemporality: AggregationTemporality.UNSPECIFIED,
      isMonotonic: false,
    };
    this.orig.data = data;
    return new Sum(data);
  }

  setEmptyHistogram(): Histogram {
    const data: OtlpHistogram = {
      type: 'histogram',
      dataPoints: [],
      aggregationTemporality: AggregationTemporality.UNSPECIFIED,
    };
    this.orig.data = data;
    return new Histogram(data);
  }

  setEmptyExponentialHistogram(): ExponentialHistogram {
    const data: OtlpExponentialHistogram = {
      type: 'exponentialHistogram',
      dataPoints: [],
      aggregationTemporality: AggregationTemporality.UNSPECIFIED,
    };
    this.orig.data = data;
    return new ExponentialHistogram(data);
  }

  setEmptySummary(): Summary {
    const data: OtlpSummary = { type: 'summary', dataPoints: [] };
    this.orig.data = data;
    return new Summary(data);
  }

  gauge(): Gauge {
    const data = this.orig.data;
    if (data?.type !== 'gauge') throw this.wrongType('gauge');
    return new Gauge(data);
  }

  sum(): Sum {
    const data = this.orig.data;
    if (data?.type !== 'sum') throw this.wrongType('sum');
    return new Sum(data);
  }

  histogram(): Histogram {
    const data = this.orig.data;
    if (data?.type !== 'histogram') throw this.wrongType('histogram');
    return new Histogram(data);
  }

  exponentialHistogram(): ExponentialHistogram {
    const data = this.orig.data;
    if (data?.type !== 'exponentialHistogram') throw this.wrongType('exponentialHistogram');
    return new ExponentialHistogram(data);
  }

  summary(): Summary {
    const data = this.orig.data;
    if (data?.type !== 'summary') throw this.wrongType('summary');
    return new Summary(data);
  }

  dataPointCount(): number {
    return countDataPoints(this.orig.data);
  }

  private wrongType(requested: MetricDataType): TypeError {
    return new TypeError(`metric "${this.orig.name}" holds ${this.dataType}, not ${requested}`);
  }
}

export function countDataPoints(data: OtlpMetricData | undefined): number {
  return data === undefined ? 0 : data.dataPoints.length;
}
