/**
 * Configuration Loader
 *
 * Reads the YAML config file, fills defaults and validates it. Any problem
 * is a ConfigError; the process must not start serving with a bad config.
 */

import { readFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { CheckerConfigSchema } from './schema.ts';
import type { CheckerConfig } from './schema.ts';
import { ConfigError } from '../util/errors.ts';

export type { CheckerConfig };

/** Validate an already parsed document (null or empty → all defaults). */
export function parseConfig(doc: unknown): CheckerConfig {
  const result = CheckerConfigSchema.safeParse(doc ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ConfigError('INVALID_CONFIG', `Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

export function parseConfigYaml(text: string): CheckerConfig {
  let doc: unknown;
  try {
    doc = yaml.load(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError('INVALID_CONFIG', `Config is not valid YAML: ${msg}`);
  }
  return parseConfig(doc);
}

/**
 * Load a config file. A relative `semconv.registry` is resolved against the
 * directory of the config file.
 */
export function loadConfig(path: string): CheckerConfig {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError('INVALID_CONFIG', `Cannot read config ${path}: ${msg}`, { path });
  }

  const config = parseConfigYaml(text);
  const registry = config.semconv.registry;
  if (registry !== undefined && !isAbsolute(registry)) {
    return {
      ...config,
      semconv: { ...config.semconv, registry: resolve(dirname(path), registry) },
    };
  }
  return config;
}
