/**
 * Client side of MetricsService/Export over any Connect transport.
 *
 * A failed call rejects with ExportError carrying the status message as sent
 * by the server and its code; no response is produced.
 */

import { Code, ConnectError, createClient } from '@connectrpc/connect';
import type { CallOptions, Client, Transport } from '@connectrpc/connect';
import { ExportResponse } from '../core/Envelope.ts';
import type { ExportRequest } from '../core/Envelope.ts';
import { ExportError } from '../core/errors.ts';
import { MetricsService, fromWireEntries, toWireEntries } from './metricsService.ts';

export interface ExportCallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  headers?: CallOptions['headers'];
}

export class MetricsClient {
  private readonly client: Client<typeof MetricsService>;

  constructor(transport: Transport) {
    this.client = createClient(MetricsService, transport);
  }

  /**
   * Send one export. The request tree is normalized in place first: a tree
   * built in the deprecated shape is migrated, and the caller's tree (and any
   * handle sharing it) sees the migrated shape after this call.
   */
  async export(request: ExportRequest, options: ExportCallOptions = {}): Promise<ExportResponse> {
    if (options.signal?.aborted) {
      throw new ExportError('export cancelled before sending', Code.Canceled);
    }
    request.normalize();
    const resourceMetrics = toWireEntries(request.metrics());

    const reply = await this.client.export({ resourceMetrics }, options).catch((err: unknown) => {
      const status = ConnectError.from(err);
      throw new ExportError(status.rawMessage, status.code, { cause: err });
    });

    const response = ExportResponse.fromMetrics(fromWireEntries(reply.resourceMetrics));
    response.normalize();
    return response;
  }
}
