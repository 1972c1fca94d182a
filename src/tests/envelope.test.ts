import { describe, it, expect } from 'vitest';
import { ExportRequest, ExportResponse } from '../core/Envelope.ts';
import { DecodeError } from '../core/errors.ts';
import { Metrics } from '../model/Metrics.ts';
import { newInstrumentationLibraryMetrics, newMetric } from '../model/defaults.ts';
import { fullTree, singleGaugeTree } from './helpers.ts';

const CURRENT =
  '{"resourceMetrics":[{"resource":{},"scopeMetrics":[{"scope":{},"metrics":[{"name":"test_metric"}]}]}]}';
const DEPRECATED =
  '{"resourceMetrics":[{"resource":{},"instrumentationLibraryMetrics":[{"instrumentationLibrary":{},"metrics":[{"name":"test_metric"}]}]}]}';
const BOTH =
  '{"resourceMetrics":[{"resource":{},' +
  '"scopeMetrics":[{"scope":{},"metrics":[{"name":"test_metric"}]}],' +
  '"instrumentationLibraryMetrics":[{"instrumentationLibrary":{},"metrics":[{"name":"test_metric"}]}]}]}';

const text = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

describe('ExportRequest JSON', () => {
  it('round-trips current-schema input', () => {
    const req = new ExportRequest();
    req.unmarshalJson(CURRENT);
    expect(text(req.marshalJson())).toBe(CURRENT);
    expect(req.metrics().metricCount()).toBe(1);
  });

  it('migrates deprecated input and re-emits the current schema', () => {
    const req = new ExportRequest();
    req.unmarshalJson(DEPRECATED);
    expect(text(req.marshalJson())).toBe(CURRENT);
    expect(req.metrics().resourceMetrics().at(0).scopeMetrics().at(0).metrics().at(0).name).toBe('test_metric');
  });

  it('decodes deprecated and current documents to equal requests', () => {
    const current = new ExportRequest();
    current.unmarshalJson(CURRENT);
    const deprecated = new ExportRequest();
    deprecated.unmarshalJson(DEPRECATED);
    expect(deprecated.equals(current)).toBe(true);
  });

  it('resolves dual presence toward the scope grouping', () => {
    const both = new ExportRequest();
    both.unmarshalJson(BOTH);
    const current = new ExportRequest();
    current.unmarshalJson(CURRENT);

    expect(both.equals(current)).toBe(true);
    expect(both.metrics().metricCount()).toBe(1);
    expect(text(both.marshalJson())).toBe(CURRENT);
  });

  it('never writes the deprecated field name', () => {
    const req = new ExportRequest();
    req.unmarshalJson(DEPRECATED);
    expect(text(req.marshalJson())).not.toContain('instrumentationLibrary');
  });

  it('round-trips a tree built by appends', () => {
    const req = ExportRequest.fromMetrics(fullTree());
    const json = req.marshalJson();
    const back = new ExportRequest();
    back.unmarshalJson(json);

    expect(back.equals(req)).toBe(true);
    expect(back.metrics().metricCount()).toBe(req.metrics().metricCount());
    expect(back.metrics().dataPointCount()).toBe(req.metrics().dataPointCount());
    expect(back.marshalJson()).toEqual(json);
  });

  it('throws DecodeError on malformed input', () => {
    expect(() => new ExportRequest().unmarshalJson('{')).toThrow(DecodeError);
  });
});

describe('ExportRequest protobuf', () => {
  it('round-trips a tree built by appends', () => {
    const req = ExportRequest.fromMetrics(fullTree());
    const back = new ExportRequest();
    back.unmarshalProto(req.marshalProto());
    expect(back.equals(req)).toBe(true);
    expect(back.marshalProto()).toEqual(req.marshalProto());
  });

  it('throws DecodeError on malformed input', () => {
    expect(() => new ExportRequest().unmarshalProto(new Uint8Array([0x0a, 0x05]))).toThrow(DecodeError);
  });
});

describe('envelope sharing and equality', () => {
  it('fromMetrics shares the tree by reference', () => {
    const tree = new Metrics();
    const req = ExportRequest.fromMetrics(tree);
    expect(req.metrics()).toBe(tree);

    tree.resourceMetrics().appendEmpty().scopeMetrics().appendEmpty().metrics().appendEmpty();
    expect(req.metrics().metricCount()).toBe(1);
  });

  it('decoding into an envelope updates the tree the caller holds', () => {
    const tree = new Metrics();
    ExportRequest.fromMetrics(tree).unmarshalJson(CURRENT);
    expect(tree.metricCount()).toBe(1);
  });

  it('default-constructed responses are equal', () => {
    expect(new ExportResponse().equals(new ExportResponse())).toBe(true);
    expect(new ExportResponse().equals(ExportResponse.fromMetrics(singleGaugeTree()))).toBe(false);
  });

  it('a request never equals a response', () => {
    expect(new ExportRequest().equals(new ExportResponse())).toBe(false);
  });

  it('normalize() migrates a hand-built deprecated tree', () => {
    const req = new ExportRequest();
    const rm = req.metrics().resourceMetrics().appendEmpty();
    const ilm = newInstrumentationLibraryMetrics();
    ilm.metrics.push({ ...newMetric(), name: 'test_metric' });
    rm.orig.instrumentationLibraryMetrics.push(ilm);

    expect(req.metrics().metricCount()).toBe(0);
    req.normalize();
    expect(req.metrics().metricCount()).toBe(1);
    expect(text(req.marshalJson())).toBe(CURRENT);
  });
});
