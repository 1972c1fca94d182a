import { describe, it, expect } from 'vitest';
import { silentLogger } from '../logging/logger.ts';
import { ErrorChannel } from '../host/ErrorChannel.ts';
import { ServiceHost } from '../host/ServiceHost.ts';
import { ComponentKind, emptyFactories, newComponentID, parseComponentID } from '../host/component.ts';
import type { DataType, Exporter, Extension, Factory } from '../host/component.ts';

const factory = (type: string, kind: ComponentKind): Factory => ({
  type,
  kind,
  createDefaultConfig: () => ({}),
});

const extension = (): Extension => ({
  start: async () => {},
  shutdown: async () => {},
});

const exporter = (dataType: DataType): Exporter => ({ ...extension(), dataType });

describe('component ids', () => {
  it('joins type and name', () => {
    expect(newComponentID('otlp')).toBe('otlp');
    expect(newComponentID('otlp', 'secondary')).toBe('otlp/secondary');
  });

  it('splits type and name', () => {
    expect(parseComponentID('otlp')).toEqual({ type: 'otlp', name: '' });
    expect(parseComponentID(' otlp / secondary ')).toEqual({ type: 'otlp', name: 'secondary' });
  });

  it('rejects empty parts', () => {
    expect(() => parseComponentID('')).toThrow('component id "" has an empty type');
    expect(() => parseComponentID('/name')).toThrow('has an empty type');
    expect(() => parseComponentID('otlp/')).toThrow('component id "otlp/" has an empty name after "/"');
  });
});

describe('ServiceHost', () => {
  it('looks up factories by kind and type', () => {
    const factories = emptyFactories();
    const receiver = factory('nop', ComponentKind.RECEIVER);
    const exp = factory('nop', ComponentKind.EXPORTER);
    factories.receivers.set('nop', receiver);
    factories.exporters.set('nop', exp);
    const host = new ServiceHost({ factories, logger: silentLogger });

    expect(host.getFactory(ComponentKind.RECEIVER, 'nop')).toBe(receiver);
    expect(host.getFactory(ComponentKind.EXPORTER, 'nop')).toBe(exp);
    expect(host.getFactory(ComponentKind.PROCESSOR, 'nop')).toBeUndefined();
    expect(host.getFactory(ComponentKind.EXTENSION, 'nop')).toBeUndefined();
  });

  it('returns extensions as a snapshot', () => {
    const ext = extension();
    const host = new ServiceHost({ extensions: new Map([['health', ext]]), logger: silentLogger });

    const snapshot = host.getExtensions();
    snapshot.delete('health');
    expect(host.getExtensions().get('health')).toBe(ext);
  });

  it('groups exporters by data type', () => {
    const metricsA = exporter('metrics');
    const metricsB = exporter('metrics');
    const traces = exporter('traces');
    const host = new ServiceHost({
      exporters: new Map([
        ['otlp', metricsA],
        ['otlp/secondary', metricsB],
        ['debug', traces],
      ]),
      logger: silentLogger,
    });

    const grouped = host.getExporters();
    expect([...grouped.keys()]).toEqual(['metrics', 'traces']);
    expect([...(grouped.get('metrics')?.keys() ?? [])]).toEqual(['otlp', 'otlp/secondary']);
    expect(grouped.get('traces')?.get('debug')).toBe(traces);
    expect(grouped.get('logs')).toBeUndefined();
  });

  it('delivers fatal errors on its channel', async () => {
    const host = new ServiceHost({ logger: silentLogger });
    const err = new Error('listener died');
    host.reportFatalError(err);
    await expect(host.errors.receive()).resolves.toBe(err);
  });

  it('returns unconsumed errors on shutdown', () => {
    const host = new ServiceHost({ logger: silentLogger });
    const first = new Error('first');
    const second = new Error('second');
    host.reportFatalError(first);
    host.reportFatalError(second);

    expect(host.shutdown()).toEqual([first, second]);
    expect(host.errors.isClosed).toBe(true);
  });
});

describe('ErrorChannel', () => {
  it('wakes a waiting receiver', async () => {
    const channel = new ErrorChannel(silentLogger);
    const pending = channel.receive();
    const err = new Error('boom');
    expect(channel.push(err)).toBe(true);
    await expect(pending).resolves.toBe(err);
    expect(channel.size).toBe(0);
  });

  it('buffers in order', async () => {
    const channel = new ErrorChannel(silentLogger);
    const a = new Error('a');
    const b = new Error('b');
    channel.push(a);
    channel.push(b);
    expect(channel.size).toBe(2);
    await expect(channel.receive()).resolves.toBe(a);
    expect(channel.drain()).toEqual([b]);
    expect(channel.size).toBe(0);
  });

  it('resolves waiters with undefined on close and drops later pushes', async () => {
    const channel = new ErrorChannel(silentLogger);
    const pending = channel.receive();
    channel.close();
    await expect(pending).resolves.toBeUndefined();
    expect(channel.push(new Error('late'))).toBe(false);
    expect(channel.size).toBe(0);
  });

  it('iterates until closed', async () => {
    const channel = new ErrorChannel(silentLogger);
    channel.push(new Error('one'));
    channel.push(new Error('two'));
    channel.close();

    const messages: string[] = [];
    for await (const err of channel) messages.push(err.message);
    expect(messages).toEqual(['one', 'two']);
  });
});
