/**
 * Semantic-convention group catalog.
 *
 * Registry file layout (YAML):
 *
 *   schema_url: https://opentelemetry.io/schemas/1.26.0
 *   groups:
 *     - id: attributes.http.common
 *       prefix: http
 *       extends: attributes.error      # optional, parent attributes come first
 *       attributes:
 *         - id: request.method         # → http.request.method
 *         - ref: server.address        # → server.address
 *
 * Groups are resolved once at load time; lookups afterwards are read-only.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { AttributeSet } from '../types/schema.ts';
import { ConfigError } from '../util/errors.ts';

export const DEFAULT_REGISTRY_PATH = fileURLToPath(
  new URL('../../semconv/registry.yaml', import.meta.url)
);

const AttributeRefSchema = z.union([
  z.object({ id: z.string().min(1, 'attribute id cannot be empty') }),
  z.object({ ref: z.string().min(1, 'attribute ref cannot be empty') }),
]);

const GroupSchema = z.object({
  id: z.string().min(1, 'group id cannot be empty'),
  prefix: z.string().optional(),
  extends: z.string().optional(),
  attributes: z.array(AttributeRefSchema).default([]),
});

export const RegistrySchema = z.object({
  schema_url: z.string().min(1, 'schema_url cannot be empty'),
  groups: z.array(GroupSchema),
});

type GroupDefinition = z.output<typeof GroupSchema>;

export class SemconvCatalog {
  private readonly groups: ReadonlyMap<string, AttributeSet>;

  private constructor(
    groups: Map<string, AttributeSet>,
    public readonly version: string
  ) {
    this.groups = groups;
  }

  /** Build from an already parsed registry document. */
  static fromDocument(doc: unknown, versionOverride?: string): SemconvCatalog {
    const parsed = RegistrySchema.safeParse(doc);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
      throw new ConfigError('INVALID_REGISTRY', `Invalid semconv registry: ${issues.join('; ')}`, {
        issues,
      });
    }

    const definitions = new Map<string, GroupDefinition>();
    for (const g of parsed.data.groups) {
      if (definitions.has(g.id)) {
        throw new ConfigError('INVALID_REGISTRY', `Duplicate semconv group: ${g.id}`, { group: g.id });
      }
      definitions.set(g.id, g);
    }

    const resolved = new Map<string, AttributeSet>();
    for (const id of definitions.keys()) {
      resolveGroup(id, definitions, resolved, []);
    }

    return new SemconvCatalog(resolved, versionOverride ?? parsed.data.schema_url);
  }

  static fromYaml(text: string, versionOverride?: string): SemconvCatalog {
    let doc: unknown;
    try {
      doc = yaml.load(text);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new ConfigError('INVALID_REGISTRY', `Registry is not valid YAML: ${msg}`);
    }
    return SemconvCatalog.fromDocument(doc, versionOverride);
  }

  static fromFile(path: string = DEFAULT_REGISTRY_PATH, versionOverride?: string): SemconvCatalog {
    let text: string;
    try {
      text = readFileSync(path, 'utf8');
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new ConfigError('INVALID_REGISTRY', `Cannot read semconv registry ${path}: ${msg}`, { path });
    }
    return SemconvCatalog.fromYaml(text, versionOverride);
  }

  /** Attribute keys of one group. Unknown names are a configuration error. */
  group(name: string): AttributeSet {
    const attrs = this.groups.get(name);
    if (attrs === undefined) {
      throw new ConfigError('UNKNOWN_GROUP', `Unknown semconv group: ${name}`, { group: name });
    }
    return attrs;
  }

  /** Union of the named groups, duplicates collapsed, first-seen order. */
  attributes(...names: string[]): AttributeSet {
    const out = new Set<string>();
    for (const name of names) {
      for (const key of this.group(name)) out.add(key);
    }
    return out;
  }
}

function attributeKey(prefix: string | undefined, ref: z.output<typeof AttributeRefSchema>): string {
  if ('ref' in ref) return ref.ref;
  return prefix ? `${prefix}.${ref.id}` : ref.id;
}

function resolveGroup(
  id: string,
  definitions: ReadonlyMap<string, GroupDefinition>,
  resolved: Map<string, AttributeSet>,
  chain: string[]
): AttributeSet {
  const done = resolved.get(id);
  if (done !== undefined) return done;

  if (chain.includes(id)) {
    throw new ConfigError('INVALID_REGISTRY', `Cyclic extends: ${[...chain, id].join(' -> ')}`, {
      chain: [...chain, id],
    });
  }

  const def = definitions.get(id);
  if (def === undefined) {
    const parentOf = chain[chain.length - 1];
    throw new ConfigError('INVALID_REGISTRY', `Group ${parentOf ?? '<root>'} extends unknown group ${id}`, {
      group: parentOf,
      extends: id,
    });
  }

  const attrs = new Set<string>();
  if (def.extends !== undefined) {
    for (const key of resolveGroup(def.extends, definitions, resolved, [...chain, id])) attrs.add(key);
  }
  for (const ref of def.attributes) attrs.add(attributeKey(def.prefix, ref));

  resolved.set(id, attrs);
  return attrs;
}
