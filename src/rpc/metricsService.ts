/**
 * Run-time descriptors for opentelemetry.proto.collector.metrics.v1.MetricsService.
 *
 *   message ExportMetricsServiceRequest  { repeated bytes resource_metrics = 1; }
 *   message ExportMetricsServiceResponse { repeated bytes resource_metrics = 1; }
 *   service MetricsService { rpc Export(ExportMetricsServiceRequest) returns (ExportMetricsServiceResponse); }
 *
 * `repeated bytes` shares its wire format with `repeated ResourceMetrics`, so
 * peers using the OTLP request message interoperate; each entry is encoded and
 * decoded by the hand-written codec in src/proto.
 */

import { create, createFileRegistry } from '@bufbuild/protobuf';
import type { Message } from '@bufbuild/protobuf';
import { messageDesc, serviceDesc } from '@bufbuild/protobuf/codegenv1';
import type { GenMessage, GenService } from '@bufbuild/protobuf/codegenv1';
import {
  FieldDescriptorProto_Label,
  FieldDescriptorProto_Type,
  FileDescriptorSetSchema,
} from '@bufbuild/protobuf/wkt';
import { Metrics } from '../model/Metrics.ts';
import { decodeResourceMetrics } from '../proto/metricsDecode.ts';
import { encodeResourceMetrics } from '../proto/metricsEncode.ts';
import { newMetricsData } from '../model/defaults.ts';

const PACKAGE = 'opentelemetry.proto.collector.metrics.v1';
const FILE_NAME = 'opentelemetry/proto/collector/metrics/v1/metrics_service.proto';

export type ExportMetricsServiceRequest =
  Message<'opentelemetry.proto.collector.metrics.v1.ExportMetricsServiceRequest'> & {
    resourceMetrics: Uint8Array[];
  };

export type ExportMetricsServiceResponse =
  Message<'opentelemetry.proto.collector.metrics.v1.ExportMetricsServiceResponse'> & {
    resourceMetrics: Uint8Array[];
  };

const resourceMetricsField = {
  name: 'resource_metrics',
  number: 1,
  label: FieldDescriptorProto_Label.REPEATED,
  type: FieldDescriptorProto_Type.BYTES,
  jsonName: 'resourceMetrics',
};

const registry = createFileRegistry(
  create(FileDescriptorSetSchema, {
    file: [
      {
        name: FILE_NAME,
        package: PACKAGE,
        syntax: 'proto3',
        messageType: [
          { name: 'ExportMetricsServiceRequest', field: [resourceMetricsField] },
          { name: 'ExportMetricsServiceResponse', field: [resourceMetricsField] },
        ],
        service: [
          {
            name: 'MetricsService',
            method: [
              {
                name: 'Export',
                inputType: `.${PACKAGE}.ExportMetricsServiceRequest`,
                outputType: `.${PACKAGE}.ExportMetricsServiceResponse`,
              },
            ],
          },
        ],
      },
    ],
  })
);

const file = registry.getFile(FILE_NAME);
if (file === undefined) throw new Error(`descriptor ${FILE_NAME} failed to register`);

export const ExportMetricsServiceRequestSchema: GenMessage<ExportMetricsServiceRequest> =
  messageDesc<ExportMetricsServiceRequest>(file, 0);

export const ExportMetricsServiceResponseSchema: GenMessage<ExportMetricsServiceResponse> =
  messageDesc<ExportMetricsServiceResponse>(file, 1);

type MetricsServiceMethods = {
  export: {
    methodKind: 'unary';
    input: typeof ExportMetricsServiceRequestSchema;
    output: typeof ExportMetricsServiceResponseSchema;
  };
};

export const MetricsService: GenService<MetricsServiceMethods> =
  serviceDesc<MetricsServiceMethods>(file, 0);

// ─── Tree ↔ wire entries ────────────────────────────────────────────────────

/** One encoded ResourceMetrics message per resource entry. */
export function toWireEntries(metrics: Metrics): Uint8Array[] {
  return metrics.orig.resourceMetrics.map(encodeResourceMetrics);
}

/** Decode wire entries into a fresh tree. Throws DecodeError; does not migrate. */
export function fromWireEntries(entries: Uint8Array[]): Metrics {
  const data = newMetricsData();
  for (const entry of entries) data.resourceMetrics.push(decodeResourceMetrics(entry));
  return new Metrics(data);
}
