/**
 * Folds the deprecated instrumentation-library grouping into scope groups.
 *
 * Per resource entry:
 *  - scopeMetrics non-empty → authoritative; the deprecated list is dropped unread
 *  - else each deprecated group becomes a scope group with a zero scope and
 *    the very same metrics array (no copy)
 *  - the deprecated list is always left empty, so running twice is a no-op
 *
 * Decoders call this once, right after raw deserialization.
 */

import { newInstrumentationScope } from '../model/defaults.ts';
import type { OtlpResourceMetrics } from '../types/otlp.ts';

export function migrateInstrumentationLibraryMetrics(resourceMetrics: OtlpResourceMetrics[]): void {
  for (const rm of resourceMetrics) {
    const deprecated = rm.instrumentationLibraryMetrics;
    if (deprecated.length === 0) continue;

    // TODO: both groupings populated silently drops the deprecated one; revisit
    // if producers are found that split metrics across the two.
    if (rm.scopeMetrics.length === 0) {
      for (const ilm of deprecated) {
        rm.scopeMetrics.push({
          scope: newInstrumentationScope(),
          metrics: ilm.metrics,
          schemaUrl: ilm.schemaUrl,
        });
      }
    }
    deprecated.length = 0;
  }
}

/** True when any entry still carries the deprecated grouping. */
export function hasInstrumentationLibraryMetrics(resourceMetrics: OtlpResourceMetrics[]): boolean {
  return resourceMetrics.some((rm) => rm.instrumentationLibraryMetrics.length > 0);
}
