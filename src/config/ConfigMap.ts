/**
 * Hierarchical configuration map.
 *
 * Keys address nested levels with `::` (`exporters::otlp::endpoint`); a dot
 * is an ordinary key character. Values are whatever YAML produces: plain
 * objects, arrays, strings, numbers, booleans and null. Decoding into typed
 * settings goes through a zod schema, see hooks.ts for the decode rules.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import type { z } from 'zod';
import { ConfigDecodeError, errorMessage } from '../core/errors.ts';

export const KEY_DELIMITER = '::';

export type StringMap = { [key: string]: unknown };

function isStringMap(value: unknown): value is StringMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keys are always own data properties: `__proto__` and friends are stored as
 * ordinary entries and never reach a prototype.
 */
function putOwn(target: StringMap, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true });
}

function getOwn(target: StringMap, key: string): unknown {
  return Object.hasOwn(target, key) ? target[key] : undefined;
}

function deepCopy(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(deepCopy);
  if (isStringMap(value)) {
    const out: StringMap = {};
    for (const [k, v] of Object.entries(value)) putOwn(out, k, deepCopy(v));
    return out;
  }
  return value;
}

/** Copy `value`, splitting any delimited keys inside it into nested levels. */
function expand(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(expand);
  if (!isStringMap(value)) return value;
  const out: StringMap = {};
  for (const [k, v] of Object.entries(value)) setPath(out, k.split(KEY_DELIMITER), expand(v));
  return out;
}

/** Maps merge key by key; anything else replaces. */
function setPath(target: StringMap, path: string[], value: unknown): void {
  const [head, ...rest] = path;
  if (head === undefined) return;
  if (rest.length === 0) {
    const current = getOwn(target, head);
    if (isStringMap(current) && isStringMap(value)) {
      for (const [k, v] of Object.entries(value)) setPath(current, [k], v);
    } else {
      putOwn(target, head, value);
    }
    return;
  }
  const existing = getOwn(target, head);
  const next: StringMap = isStringMap(existing) ? existing : {};
  putOwn(target, head, next);
  setPath(next, rest, value);
}

export class ConfigMap {
  private readonly root: StringMap = {};

  static fromStringMap(data: StringMap): ConfigMap {
    const map = new ConfigMap();
    for (const [key, value] of Object.entries(data)) map.set(key, value);
    return map;
  }

  /** Parse a YAML document whose top level is a mapping (or empty). */
  static fromYaml(text: string): ConfigMap {
    let data: unknown;
    try {
      data = parse(text);
    } catch (err) {
      throw new ConfigDecodeError(`unable to parse yaml: ${errorMessage(err)}`, '', { cause: err });
    }
    if (data === null || data === undefined) return new ConfigMap();
    if (!isStringMap(data)) {
      throw new ConfigDecodeError('top level of a config document must be a mapping', '');
    }
    return ConfigMap.fromStringMap(data);
  }

  static async fromFile(path: string | URL): Promise<ConfigMap> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (err) {
      throw new ConfigDecodeError(`unable to read the file ${String(path)}: ${errorMessage(err)}`, '', {
        cause: err,
      });
    }
    return ConfigMap.fromYaml(text);
  }

  set(key: string, value: unknown): void {
    setPath(this.root, key.split(KEY_DELIMITER), expand(value));
  }

  /** Copy of the value at `key`, or undefined when no such key exists. */
  get(key: string): unknown {
    let node: unknown = this.root;
    for (const part of key.split(KEY_DELIMITER)) {
      if (!isStringMap(node) || !Object.hasOwn(node, part)) return undefined;
      node = getOwn(node, part);
    }
    return deepCopy(node);
  }

  /** True when the key exists, even if its value is null. */
  isSet(key: string): boolean {
    let node: unknown = this.root;
    for (const part of key.split(KEY_DELIMITER)) {
      if (!isStringMap(node) || !Object.hasOwn(node, part)) return false;
      node = getOwn(node, part);
    }
    return true;
  }

  /** Every leaf key, delimited and sorted. Empty maps count as leaves. */
  allKeys(): string[] {
    const keys: string[] = [];
    const walk = (node: StringMap, prefix: string): void => {
      for (const [k, v] of Object.entries(node)) {
        const key = prefix === '' ? k : `${prefix}${KEY_DELIMITER}${k}`;
        if (isStringMap(v) && Object.keys(v).length > 0) walk(v, key);
        else keys.push(key);
      }
    };
    walk(this.root, '');
    return keys.sort();
  }

  /** The sub-tree at `key` as its own map; empty when the key is unset or null. */
  sub(key: string): ConfigMap {
    const value = this.get(key);
    if (value === undefined || value === null) return new ConfigMap();
    if (!isStringMap(value)) {
      throw new ConfigDecodeError(`${key}: expected a mapping`, key);
    }
    return ConfigMap.fromStringMap(value);
  }

  /** Deep copy of the nested structure. */
  toStringMap(): StringMap {
    const out: StringMap = {};
    for (const [k, v] of Object.entries(this.root)) putOwn(out, k, deepCopy(v));
    return out;
  }

  /**
   * Decode the whole map through `schema`. Throws ConfigDecodeError naming the
   * first offending key path.
   */
  unmarshalExact<S extends z.ZodTypeAny>(schema: S): z.output<S> {
    const result = schema.safeParse(this.toStringMap());
    if (result.success) return result.data;
    const issue = result.error.issues[0];
    const path = issue?.path.map(String).join(KEY_DELIMITER) ?? '';
    const message = issue?.message ?? 'invalid config';
    throw new ConfigDecodeError(path === '' ? message : `${path}: ${message}`, path, {
      cause: result.error,
    });
  }
}
