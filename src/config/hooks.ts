/**
 * Decode rules for ConfigMap.unmarshalExact, expressed as zod schema builders.
 *
 * A null entry is treated differently depending on where it sits:
 *  - a plain struct field (`optionalField`) keeps its fallback; null does not
 *    materialize a value
 *  - an entry of a map of structs (`structMap`) becomes the zero-valued struct
 * Both rules are kept as-is rather than unified.
 */

import { z } from 'zod';
import { errorMessage } from '../core/errors.ts';

/** Struct with a fixed key set; unknown keys are decode errors. */
export function configStruct<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape).strict();
}

/** Absent or null → `fallback()`, or undefined without one. */
export function optionalField<T extends z.ZodTypeAny>(schema: T, fallback?: () => z.output<T>) {
  return schema
    .nullish()
    .transform((value): z.output<T> | undefined => value ?? fallback?.());
}

/** Map of structs; a null entry decodes as `{}` through the struct schema. */
export function structMap<T extends z.ZodTypeAny>(schema: T) {
  return z.record(z.string(), z.preprocess((value) => value ?? {}, schema)).nullish();
}

/** Key types compared by value, so duplicate detection sees equal keys. */
export type TextKey = string | number | bigint | boolean;

/**
 * Map whose keys decode from text. A key that fails to decode, or two keys
 * that decode to the same value, fail the whole map.
 */
export function textKeyMap<K extends TextKey, V extends z.ZodTypeAny>(
  decodeKey: (text: string) => K,
  value: V
) {
  return z.record(z.string(), value).transform((record, ctx) => {
    const out = new Map<K, z.output<V>>();
    const sources = new Map<K, string>();
    for (const [text, entry] of Object.entries(record)) {
      let key: K;
      try {
        key = decodeKey(text);
      } catch (err) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [text],
          message: `cannot decode key "${text}": ${errorMessage(err)}`,
        });
        continue;
      }
      const first = sources.get(key);
      if (first !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [text],
          message: `duplicate key "${String(key)}" (from "${first}" and "${text}")`,
        });
        continue;
      }
      sources.set(key, text);
      out.set(key, entry);
    }
    return out;
  });
}
