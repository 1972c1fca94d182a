// MetricsExportService fluent builder and built instance.
//
// Usage:
//   const service = new MetricsExportService()
//     .handler({ export: async (req) => new ExportResponse() })
//     .compression('snappy')
//     .build();
//
//   http2.createServer(service.nodeHandler()).listen(4317);
//   const client = new MetricsClient(service.inMemoryTransport());

import { createRouterTransport } from '@connectrpc/connect';
import type { ConnectRouter, Transport } from '@connectrpc/connect';
import type { Logger } from 'pino';
import { createMetricsNodeHandler } from '../adapters/node.ts';
import type { CompressionName, NodeHandler } from '../adapters/node.ts';
import type { ConfigMap } from '../config/ConfigMap.ts';
import { serviceConfigSchema } from '../config/serviceConfig.ts';
import { createLogger } from '../logging/logger.ts';
import { registerMetricsServer } from '../rpc/server.ts';
import type { ExportHandler } from '../rpc/server.ts';

/** MetricsExportService fluent builder. */
export class MetricsExportService {
  private _handler?: ExportHandler;
  private _compression: CompressionName = 'none';
  private _logger?: Logger;

  /** The export capability every call is dispatched to. Required. */
  handler(handler: ExportHandler): this {
    this._handler = handler;
    return this;
  }

  /**
   * Compression preferred for responses. All of none, gzip and snappy are
   * always accepted on requests.
   */
  compression(name: CompressionName): this {
    this._compression = name;
    return this;
  }

  logger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  /**
   * Apply the `service` section of a config map: `compression` and
   * `log_level`. Throws ConfigDecodeError on unknown keys or bad values.
   */
  configure(config: ConfigMap): this {
    const settings = config.sub('service').unmarshalExact(serviceConfigSchema);
    if (settings.compression !== undefined) this._compression = settings.compression;
    if (settings.log_level !== undefined) {
      this._logger = createLogger('metrics-server', { level: settings.log_level });
    }
    return this;
  }

  /** Build the service. Throws if handler() was not called. */
  build(): BuiltMetricsExportService {
    if (!this._handler) {
      throw new Error('MetricsExportService: handler() must be called before build()');
    }
    return new BuiltMetricsExportService(
      this._handler,
      this._compression,
      this._logger ?? createLogger('metrics-server')
    );
  }
}

/** A configured MetricsService ready to be mounted or called. */
export class BuiltMetricsExportService {
  constructor(
    private readonly exportHandler: ExportHandler,
    readonly compressionName: CompressionName,
    private readonly log: Logger
  ) {}

  /** Route registration for any Connect server adapter. */
  routes(): (router: ConnectRouter) => void {
    return (router) => {
      registerMetricsServer(router, this.exportHandler, { logger: this.log });
    };
  }

  /**
   * `(req, res)` handler for `http2.createServer`.
   *
   * Usage: http2.createServer(service.nodeHandler()).listen(4317)
   */
  nodeHandler(): NodeHandler {
    return createMetricsNodeHandler(this.exportHandler, {
      compression: this.compressionName,
      logger: this.log,
    });
  }

  /** Transport that calls this service in-process, without sockets. */
  inMemoryTransport(): Transport {
    return createRouterTransport(this.routes());
  }
}
