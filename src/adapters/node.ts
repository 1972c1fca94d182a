/**
 * Node.js entry points: a request handler for `http2` servers and a gRPC
 * client transport, both speaking MetricsService.
 *
 * Usage:
 *   http2.createServer(createMetricsNodeHandler(handler)).listen(4317);
 *   const client = new MetricsClient(createMetricsTransport({ baseUrl: 'http://localhost:4317' }));
 */

import type { ConnectRouter, Transport } from '@connectrpc/connect';
import type { Compression } from '@connectrpc/connect/protocol';
import { compressionGzip, connectNodeAdapter, createGrpcTransport } from '@connectrpc/connect-node';
import type { Logger } from 'pino';
import { snappyCompression } from '../compress/snappy.ts';
import { registerMetricsServer } from '../rpc/server.ts';
import type { ExportHandler } from '../rpc/server.ts';

export type CompressionName = 'none' | 'gzip' | 'snappy';

const COMPRESSIONS: Record<Exclude<CompressionName, 'none'>, Compression> = {
  gzip: compressionGzip,
  snappy: snappyCompression,
};

/** Every compression the server accepts; `send` comes first when set. */
export function acceptCompression(send: CompressionName = 'none'): Compression[] {
  const all = [COMPRESSIONS.gzip, COMPRESSIONS.snappy];
  if (send === 'none') return all;
  const preferred = COMPRESSIONS[send];
  return [preferred, ...all.filter((c) => c !== preferred)];
}

export function sendCompression(name: CompressionName): Compression | undefined {
  return name === 'none' ? undefined : COMPRESSIONS[name];
}

export interface MetricsNodeHandlerOptions {
  compression?: CompressionName;
  logger?: Logger;
}

export type NodeHandler = ReturnType<typeof connectNodeAdapter>;

/** `(req, res)` handler for `http.createServer` / `http2.createServer`. */
export function createMetricsNodeHandler(
  handler: ExportHandler,
  options: MetricsNodeHandlerOptions = {}
): NodeHandler {
  return connectNodeAdapter({
    routes: (router: ConnectRouter) => {
      registerMetricsServer(router, handler, { logger: options.logger });
    },
    acceptCompression: acceptCompression(options.compression),
  });
}

export interface MetricsTransportOptions {
  baseUrl: string;
  compression?: CompressionName;
}

/** gRPC (HTTP/2) client transport to a MetricsService endpoint. */
export function createMetricsTransport(options: MetricsTransportOptions): Transport {
  const compression = options.compression ?? 'none';
  return createGrpcTransport({
    baseUrl: options.baseUrl,
    sendCompression: sendCompression(compression),
    acceptCompression: acceptCompression(compression),
  });
}
