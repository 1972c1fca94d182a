import { describe, it, expect, vi } from 'vitest';
import { Code, ConnectError, createClient, createRouterTransport } from '@connectrpc/connect';
import type { Transport } from '@connectrpc/connect';
import { ExportRequest, ExportResponse } from '../core/Envelope.ts';
import { ExportError } from '../core/errors.ts';
import { silentLogger } from '../logging/logger.ts';
import { newInstrumentationLibraryMetrics, newMetric } from '../model/defaults.ts';
import { MetricsClient } from '../rpc/client.ts';
import { MetricsService } from '../rpc/metricsService.ts';
import { registerMetricsServer } from '../rpc/server.ts';
import type { ExportContext, ExportHandler } from '../rpc/server.ts';
import { singleGaugeTree } from './helpers.ts';

const DEPRECATED =
  '{"resourceMetrics":[{"resource":{},"instrumentationLibraryMetrics":[{"instrumentationLibrary":{},"metrics":[{"name":"test_metric"}]}]}]}';

function transportFor(handler: ExportHandler): Transport {
  return createRouterTransport((router) => {
    registerMetricsServer(router, handler, { logger: silentLogger });
  });
}

async function exportError(promise: Promise<unknown>): Promise<ExportError> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e
  );
  if (!(err instanceof ExportError)) throw new Error(`expected ExportError, got ${String(err)}`);
  return err;
}

/** Accepts requests holding exactly one metric named test_metric. */
class ExpectingHandler implements ExportHandler {
  readonly seen: ExportRequest[] = [];

  async export(request: ExportRequest): Promise<ExportResponse> {
    this.seen.push(request);
    const metrics = request.metrics();
    if (metrics.metricCount() !== 1) throw new Error(`expected 1 metric, got ${metrics.metricCount()}`);
    const name = metrics.resourceMetrics().at(0).scopeMetrics().at(0).metrics().at(0).name;
    if (name !== 'test_metric') throw new Error(`unexpected metric ${name}`);
    return new ExportResponse();
  }
}

describe('MetricsService Export', () => {
  it('returns the handler response for a current-schema request', async () => {
    const handler = new ExpectingHandler();
    const client = new MetricsClient(transportFor(handler));

    const response = await client.export(ExportRequest.fromMetrics(singleGaugeTree()));
    expect(response.equals(new ExportResponse())).toBe(true);
    expect(handler.seen).toHaveLength(1);
    expect(handler.seen[0]?.metrics().dataPointCount()).toBe(1);
  });

  it('accepts requests decoded from deprecated-schema JSON', async () => {
    const client = new MetricsClient(transportFor(new ExpectingHandler()));
    const request = new ExportRequest();
    request.unmarshalJson(DEPRECATED);

    const response = await client.export(request);
    expect(response.equals(new ExportResponse())).toBe(true);
  });

  it('normalizes hand-built deprecated trees before sending', async () => {
    const handler = new ExpectingHandler();
    const client = new MetricsClient(transportFor(handler));
    const request = new ExportRequest();
    const ilm = newInstrumentationLibraryMetrics();
    ilm.metrics.push({ ...newMetric(), name: 'test_metric' });
    request.metrics().resourceMetrics().appendEmpty().orig.instrumentationLibraryMetrics.push(ilm);

    expect(request.metrics().metricCount()).toBe(0);
    await client.export(request);
    expect(handler.seen[0]?.metrics().orig.resourceMetrics[0]?.instrumentationLibraryMetrics).toEqual([]);
    // the caller's own tree is migrated in place
    expect(request.metrics().metricCount()).toBe(1);
    expect(request.metrics().orig.resourceMetrics[0]?.instrumentationLibraryMetrics).toEqual([]);
  });

  it('carries response trees back to the client', async () => {
    const client = new MetricsClient(
      transportFor({ export: async () => ExportResponse.fromMetrics(singleGaugeTree('echo')) })
    );
    const response = await client.export(new ExportRequest());
    expect(response.equals(ExportResponse.fromMetrics(singleGaugeTree('echo')))).toBe(true);
  });

  it('maps a plain handler error to Unknown with its literal message', async () => {
    const client = new MetricsClient(
      transportFor({
        export: async () => {
          throw new Error('my error');
        },
      })
    );

    const err = await exportError(client.export(ExportRequest.fromMetrics(singleGaugeTree())));
    expect(err.message).toBe('my error');
    expect(err.code).toBe(Code.Unknown);
  });

  it('keeps the code of an ExportError or ConnectError thrown by the handler', async () => {
    const quota = new MetricsClient(
      transportFor({
        export: async () => {
          throw new ExportError('over quota', Code.ResourceExhausted);
        },
      })
    );
    const err = await exportError(quota.export(new ExportRequest()));
    expect(err.message).toBe('over quota');
    expect(err.code).toBe(Code.ResourceExhausted);

    const unavailable = new MetricsClient(
      transportFor({
        export: async () => {
          throw new ConnectError('try later', Code.Unavailable);
        },
      })
    );
    const err2 = await exportError(unavailable.export(new ExportRequest()));
    expect(err2.message).toBe('try later');
    expect(err2.code).toBe(Code.Unavailable);
  });

  it('passes the call signal and headers to the handler', async () => {
    const contexts: ExportContext[] = [];
    const client = new MetricsClient(
      transportFor({
        export: async (_request, ctx) => {
          contexts.push(ctx);
          return new ExportResponse();
        },
      })
    );
    await client.export(new ExportRequest(), { headers: { 'x-tenant': 'acme' } });
    expect(contexts).toHaveLength(1);
    expect(contexts[0]?.signal).toBeInstanceOf(AbortSignal);
    expect(contexts[0]?.requestHeader.get('x-tenant')).toBe('acme');
  });

  it('fails a cancelled call with Canceled without dispatching', async () => {
    const handler = { export: vi.fn(async () => new ExportResponse()) };
    const client = new MetricsClient(transportFor(handler));
    const abort = new AbortController();
    abort.abort();

    const err = await exportError(client.export(new ExportRequest(), { signal: abort.signal }));
    expect(err.code).toBe(Code.Canceled);
    expect(handler.export).not.toHaveBeenCalled();
  });

  it('migrates deprecated binary entries before dispatch', async () => {
    const handler = new ExpectingHandler();
    const raw = createClient(MetricsService, transportFor(handler));
    const name = new TextEncoder().encode('test_metric');
    // ResourceMetrics { instrumentation_library_metrics (1000) { instrumentation_library {}, metrics { name } } }
    const entry = new Uint8Array([0xc2, 0x3e, 0x11, 0x0a, 0x00, 0x12, 0x0d, 0x0a, 0x0b, ...name]);

    const reply = await raw.export({ resourceMetrics: [entry] });
    expect(reply.resourceMetrics).toEqual([]);
    expect(handler.seen).toHaveLength(1);
    const rm = handler.seen[0]?.metrics().orig.resourceMetrics[0];
    expect(rm?.instrumentationLibraryMetrics).toEqual([]);
    expect(rm?.scopeMetrics[0]?.metrics[0]?.name).toBe('test_metric');
  });

  it('rejects undecodable entries with InvalidArgument without dispatching', async () => {
    const handler = { export: vi.fn(async () => new ExportResponse()) };
    const raw = createClient(MetricsService, transportFor(handler));

    const err = await raw.export({ resourceMetrics: [new Uint8Array([0x0a, 0x05])] }).then(
      () => undefined,
      (e: unknown) => ConnectError.from(e)
    );
    expect(err?.code).toBe(Code.InvalidArgument);
    expect(handler.export).not.toHaveBeenCalled();
  });
});
