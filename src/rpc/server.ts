/**
 * Server side of MetricsService/Export.
 *
 * Per call: decode → normalize → dispatch to the handler → encode the
 * response. A handler failure never reaches the encoder; it becomes a
 * status whose message is the error's own text and whose code is
 * Code.Unknown unless the handler threw an ExportError or ConnectError.
 */

import { Code, ConnectError } from '@connectrpc/connect';
import type { ConnectRouter, HandlerContext } from '@connectrpc/connect';
import type { Logger } from 'pino';
import { ExportRequest, ExportResponse } from '../core/Envelope.ts';
import { ExportError, errorMessage } from '../core/errors.ts';
import { createLogger } from '../logging/logger.ts';
import { MetricsService, fromWireEntries, toWireEntries } from './metricsService.ts';

/** What a handler sees of the call besides the request. */
export interface ExportContext {
  /** Aborted when the caller cancels or the deadline passes. */
  signal: AbortSignal;
  requestHeader: Headers;
}

/** The export capability. One instance serves concurrent calls. */
export interface ExportHandler {
  export(request: ExportRequest, context: ExportContext): Promise<ExportResponse>;
}

export interface MetricsServerOptions {
  logger?: Logger;
}

function toConnectError(err: unknown): ConnectError {
  if (err instanceof ConnectError) return err;
  if (err instanceof ExportError) return new ConnectError(err.message, err.code, undefined, undefined, err);
  return new ConnectError(errorMessage(err), Code.Unknown, undefined, undefined, err);
}

/** Register MetricsService on a Connect router, dispatching to `handler`. */
export function registerMetricsServer(
  router: ConnectRouter,
  handler: ExportHandler,
  options: MetricsServerOptions = {}
): ConnectRouter {
  const log = options.logger ?? createLogger('metrics-server');

  return router.service(MetricsService, {
    async export(req, ctx: HandlerContext) {
      if (ctx.signal.aborted) {
        throw new ConnectError('export cancelled before dispatch', Code.Canceled);
      }

      let request: ExportRequest;
      try {
        request = ExportRequest.fromMetrics(fromWireEntries(req.resourceMetrics));
      } catch (err) {
        log.warn({ err }, 'rejecting undecodable export request');
        throw new ConnectError(errorMessage(err), Code.InvalidArgument, undefined, undefined, err);
      }
      request.normalize();

      log.debug(
        { resources: req.resourceMetrics.length, metrics: request.metrics().metricCount() },
        'dispatching export'
      );

      let response: ExportResponse;
      try {
        response = await handler.export(request, {
          signal: ctx.signal,
          requestHeader: ctx.requestHeader,
        });
      } catch (err) {
        const status = toConnectError(err);
        log.warn({ code: Code[status.code], err }, 'export handler failed');
        throw status;
      }

      return { resourceMetrics: toWireEntries(response.metrics()) };
    },
  });
}
