import type { Logger } from 'pino';
import { createLogger } from '../logging/logger.ts';
import { ComponentKind, emptyFactories } from './component.ts';
import type {
  ComponentID,
  ComponentType,
  DataType,
  Exporter,
  Extension,
  Factories,
  Factory,
  Host,
} from './component.ts';
import { ErrorChannel } from './ErrorChannel.ts';

export interface ServiceHostOptions {
  factories?: Factories;
  extensions?: Map<ComponentID, Extension>;
  exporters?: Map<ComponentID, Exporter>;
  logger?: Logger;
}

/**
 * Host handed to components at start. Owns the fatal-error channel for its
 * lifetime: created with the host, closed by `shutdown()`.
 */
export class ServiceHost implements Host {
  readonly errors: ErrorChannel;
  private readonly factories: Factories;
  private readonly extensions: Map<ComponentID, Extension>;
  private readonly exporters: Map<ComponentID, Exporter>;
  private readonly log: Logger;

  constructor(options: ServiceHostOptions = {}) {
    this.factories = options.factories ?? emptyFactories();
    this.extensions = options.extensions ?? new Map();
    this.exporters = options.exporters ?? new Map();
    this.log = options.logger ?? createLogger('host');
    this.errors = new ErrorChannel(this.log);
  }

  reportFatalError(err: Error): void {
    this.log.error({ err }, 'component reported a fatal error');
    this.errors.push(err);
  }

  getFactory(kind: ComponentKind, type: ComponentType): Factory | undefined {
    switch (kind) {
      case ComponentKind.RECEIVER:
        return this.factories.receivers.get(type);
      case ComponentKind.PROCESSOR:
        return this.factories.processors.get(type);
      case ComponentKind.EXPORTER:
        return this.factories.exporters.get(type);
      case ComponentKind.EXTENSION:
        return this.factories.extensions.get(type);
    }
  }

  /** Snapshot; mutating it does not affect the host. */
  getExtensions(): Map<ComponentID, Extension> {
    return new Map(this.extensions);
  }

  getExporters(): Map<DataType, Map<ComponentID, Exporter>> {
    const byType = new Map<DataType, Map<ComponentID, Exporter>>();
    for (const [id, exporter] of this.exporters) {
      let group = byType.get(exporter.dataType);
      if (group === undefined) {
        group = new Map();
        byType.set(exporter.dataType, group);
      }
      group.set(id, exporter);
    }
    return byType;
  }

  /** Close the error channel and return whatever was never consumed. */
  shutdown(): Error[] {
    this.errors.close();
    return this.errors.drain();
  }
}
