/**
 * Zod schema for the checker configuration file.
 *
 * @module config/schema
 */

import { z } from 'zod';

const KeyListSchema = z.array(z.string().min(1, 'attribute key cannot be empty')).default([]);
const GroupListSchema = z.array(z.string().min(1, 'group name cannot be empty')).default([]);

export const ServerConfigSchema = z
  .object({
    host: z.string().min(1, 'host cannot be empty').default('0.0.0.0'),
    port: z.number().int().min(0, 'must be >= 0').max(65535, 'must be <= 65535').default(4318),
    path: z.string().startsWith('/', 'path must start with /').default('/v1/metrics'),
  })
  .default({});

export const LogConfigSchema = z
  .object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  })
  .default({});

export const SemconvConfigSchema = z
  .object({
    /** Registry file; relative paths resolve against the config file's directory. */
    registry: z.string().min(1).optional(),
    /** Overrides the registry's schema_url as the expected schema version. */
    schemaUrl: z.string().min(1).optional(),
  })
  .default({});

export const ResourceConfigSchema = z
  .object({
    groups: GroupListSchema,
    ignore: KeyListSchema,
  })
  .default({});

export const MetricRuleConfigSchema = z.object({
  match: z.string(),
  groups: GroupListSchema,
  ignore: KeyListSchema,
});

export const CheckerConfigSchema = z.object({
  server: ServerConfigSchema,
  log: LogConfigSchema,
  semconv: SemconvConfigSchema,
  resource: ResourceConfigSchema,
  metrics: z.array(MetricRuleConfigSchema).default([]),
  reportUnmatched: z.boolean().default(false),
  oneShot: z.boolean().default(false),
});

export type CheckerConfig = z.output<typeof CheckerConfigSchema>;
export type CheckerConfigInput = z.input<typeof CheckerConfigSchema>;
