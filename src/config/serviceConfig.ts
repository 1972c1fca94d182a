import { z } from 'zod';
import { configStruct, optionalField } from './hooks.ts';

/**
 * Settings the export service reads from its `service` config section.
 * Unset keys decode as undefined so the builder keeps its own values.
 */
export const serviceConfigSchema = configStruct({
  compression: optionalField(z.enum(['none', 'gzip', 'snappy'])),
  log_level: optionalField(z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])),
});

export type ServiceConfig = z.output<typeof serviceConfigSchema>;
