/**
 * Match table compilation and lookup.
 *
 * Compilation (once at build()):
 *  - match pattern → FastMatcher (any / exact / regex); bad regex → ConfigError
 *  - groups → union of catalog attribute sets; unknown group → ConfigError
 *  - ignore list → Set
 *  - result frozen; nothing mutates it afterwards
 *
 * Lookup (per metric):
 *  Every rule whose matcher accepts the metric name applies, in declaration
 *  order. There is no first-match-wins.
 */

import type {
  MatchRuleConfig,
  ResourceRuleConfig,
  MatchRule,
  MatchTable,
  ResourceSchema,
  FastMatcher,
} from '../types/schema.ts';
import type { SemconvCatalog } from '../semconv/Catalog.ts';
import { ConfigError } from '../util/errors.ts';

// ─── Compilation ────────────────────────────────────────────────────────────

export function compileFastMatcher(pattern: string): FastMatcher {
  let re: RegExp;
  try {
    re = new RegExp(pattern);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError('INVALID_PATTERN', `Invalid metric match pattern ${JSON.stringify(pattern)}: ${msg}`, {
      pattern,
    });
  }
  // "" and .* → always matches
  if (pattern === '' || pattern === '.*') return { type: 'any' };
  // ^exact$ where inner part has no regex special chars → equality
  const exactInner = pattern.match(/^\^([^.*+?[\](){}\\|^$]+)\$$/)?.[1];
  if (exactInner !== undefined) return { type: 'exact', value: exactInner };
  return { type: 'regex', re };
}

export function buildMatchTable(rules: readonly MatchRuleConfig[], catalog: SemconvCatalog): MatchTable {
  const table = rules.map((r): MatchRule =>
    Object.freeze({
      pattern: r.match,
      matcher: compileFastMatcher(r.match),
      required: catalog.attributes(...(r.groups ?? [])),
      ignore: new Set(r.ignore ?? []),
    })
  );
  return Object.freeze(table);
}

export function buildResourceSchema(resource: ResourceRuleConfig, catalog: SemconvCatalog): ResourceSchema {
  return Object.freeze({
    required: catalog.attributes(...(resource.groups ?? [])),
    ignore: new Set(resource.ignore ?? []),
    expectedVersion: catalog.version,
  });
}

// ─── Lookup ─────────────────────────────────────────────────────────────────

export function testFastMatcher(m: FastMatcher, value: string): boolean {
  switch (m.type) {
    case 'any':   return true;
    case 'exact': return value === m.value;
    case 'regex': return m.re.test(value);
  }
}

export function matchingRules(table: MatchTable, metricName: string): MatchRule[] {
  return table.filter((rule) => testFastMatcher(rule.matcher, metricName));
}
