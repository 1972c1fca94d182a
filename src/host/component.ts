/**
 * Component vocabulary shared by the host and whatever builds pipelines.
 *
 * A ComponentID is `type` or `type/name`, e.g. `otlp` or `otlp/secondary`.
 */

export const ComponentKind = {
  RECEIVER: 'receiver',
  PROCESSOR: 'processor',
  EXPORTER: 'exporter',
  EXTENSION: 'extension',
} as const;

export type ComponentKind = (typeof ComponentKind)[keyof typeof ComponentKind];

export type ComponentType = string;

export type ComponentID = string;

export type DataType = 'traces' | 'metrics' | 'logs';

const TYPE_NAME_SEPARATOR = '/';

export function newComponentID(type: ComponentType, name = ''): ComponentID {
  return name === '' ? type : `${type}${TYPE_NAME_SEPARATOR}${name}`;
}

/** Split an id into type and name. Throws on an empty type or a trailing `/`. */
export function parseComponentID(id: string): { type: ComponentType; name: string } {
  const trimmed = id.trim();
  const at = trimmed.indexOf(TYPE_NAME_SEPARATOR);
  const type = (at === -1 ? trimmed : trimmed.slice(0, at)).trim();
  const name = at === -1 ? '' : trimmed.slice(at + 1).trim();
  if (type === '') throw new Error(`component id "${id}" has an empty type`);
  if (at !== -1 && name === '') throw new Error(`component id "${id}" has an empty name after "/"`);
  return { type, name };
}

/** Creates components of one type and kind. */
export interface Factory {
  readonly type: ComponentType;
  readonly kind: ComponentKind;
  createDefaultConfig(): unknown;
}

export interface Component {
  start(host: Host): Promise<void>;
  shutdown(): Promise<void>;
}

export type Extension = Component;

export interface Exporter extends Component {
  readonly dataType: DataType;
}

export interface Factories {
  receivers: Map<ComponentType, Factory>;
  processors: Map<ComponentType, Factory>;
  exporters: Map<ComponentType, Factory>;
  extensions: Map<ComponentType, Factory>;
}

export function emptyFactories(): Factories {
  return {
    receivers: new Map(),
    processors: new Map(),
    exporters: new Map(),
    extensions: new Map(),
  };
}

/** What a running component may ask of the process hosting it. */
export interface Host {
  getFactory(kind: ComponentKind, type: ComponentType): Factory | undefined;
  getExtensions(): Map<ComponentID, Extension>;
  getExporters(): Map<DataType, Map<ComponentID, Exporter>>;
  /**
   * Report an error the component cannot recover from, after its start has
   * returned. Never blocks.
   */
  reportFatalError(err: Error): void;
}
