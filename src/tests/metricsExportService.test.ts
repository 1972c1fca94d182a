import { describe, it, expect } from 'vitest';
import { ConfigMap } from '../config/ConfigMap.ts';
import { ExportRequest, ExportResponse } from '../core/Envelope.ts';
import { ConfigDecodeError } from '../core/errors.ts';
import { MetricsExportService } from '../core/MetricsExportService.ts';
import { silentLogger } from '../logging/logger.ts';
import { MetricsClient } from '../rpc/client.ts';
import type { ExportHandler } from '../rpc/server.ts';
import { singleGaugeTree } from './helpers.ts';

const countingHandler = (): ExportHandler & { count: number } => {
  const handler = {
    count: 0,
    async export(request: ExportRequest): Promise<ExportResponse> {
      handler.count += request.metrics().metricCount();
      return new ExportResponse();
    },
  };
  return handler;
};

describe('MetricsExportService builder', () => {
  it('requires a handler', () => {
    expect(() => new MetricsExportService().build()).toThrow(
      'MetricsExportService: handler() must be called before build()'
    );
  });

  it('defaults to no response compression', () => {
    const service = new MetricsExportService().handler(countingHandler()).logger(silentLogger).build();
    expect(service.compressionName).toBe('none');
  });

  it('serves exports over the in-memory transport', async () => {
    const handler = countingHandler();
    const service = new MetricsExportService().handler(handler).logger(silentLogger).build();
    const client = new MetricsClient(service.inMemoryTransport());

    const response = await client.export(ExportRequest.fromMetrics(singleGaugeTree()));
    expect(response.equals(new ExportResponse())).toBe(true);
    expect(handler.count).toBe(1);
  });

  it('reads the service section of a config file', async () => {
    const config = await ConfigMap.fromFile(new URL('./testdata/service.yaml', import.meta.url));
    const service = new MetricsExportService().handler(countingHandler()).configure(config).build();
    expect(service.compressionName).toBe('snappy');
  });

  it('keeps builder values the config leaves unset', () => {
    const service = new MetricsExportService()
      .handler(countingHandler())
      .compression('gzip')
      .logger(silentLogger)
      .configure(ConfigMap.fromStringMap({ service: { log_level: 'silent' } }))
      .build();
    expect(service.compressionName).toBe('gzip');
  });

  it('rejects unknown service settings', () => {
    const config = ConfigMap.fromStringMap({ service: { compresion: 'gzip' } });
    expect(() => new MetricsExportService().configure(config)).toThrow(ConfigDecodeError);
  });

  it('rejects unsupported compression names', () => {
    const config = ConfigMap.fromStringMap({ service: { compression: 'zstd' } });
    let caught: unknown;
    try {
      new MetricsExportService().configure(config);
    } catch (err) {
      caught = err;
    }
    expect(caught instanceof ConfigDecodeError && caught.path).toBe('compression');
  });

  it('produces a node request handler', () => {
    const service = new MetricsExportService().handler(countingHandler()).logger(silentLogger).build();
    expect(typeof service.nodeHandler()).toBe('function');
  });
});
