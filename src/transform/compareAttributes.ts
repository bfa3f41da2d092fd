/**
 * Set-difference comparison of attribute keys.
 *
 *   missing = required − observed
 *   extra   = observed − required
 *
 * then every ignored key is dropped from both. Values are never looked at and
 * a key seen twice counts once. Output order is first-seen order of the
 * source (required for missing, observed for extra).
 */

import type { AttributeSet, ComparisonResult } from '../types/schema.ts';
import type { OtlpKeyValue } from '../types/otlp.ts';

const EMPTY: ReadonlySet<string> = new Set();

export function compareAttributes(
  required: AttributeSet,
  observed: Iterable<string> | null | undefined,
  ignore: AttributeSet = EMPTY
): ComparisonResult {
  const seen = new Set<string>(observed ?? []);

  const missing: string[] = [];
  for (const key of required) {
    if (!seen.has(key) && !ignore.has(key)) missing.push(key);
  }

  const extra: string[] = [];
  for (const key of seen) {
    if (!required.has(key) && !ignore.has(key)) extra.push(key);
  }

  return { missing, extra };
}

/** Attribute keys of an OTLP attribute list; absent lists yield nothing. */
export function attributeKeys(attrs: readonly (OtlpKeyValue | null)[] | null | undefined): string[] {
  if (!Array.isArray(attrs)) return [];
  const keys: string[] = [];
  for (const kv of attrs) {
    if (kv && typeof kv.key === 'string') keys.push(kv.key);
  }
  return keys;
}

/** Concatenate results; used to collapse a metric's data points into one result. */
export function concatResults(results: readonly ComparisonResult[]): ComparisonResult {
  const missing: string[] = [];
  const extra: string[] = [];
  for (const r of results) {
    missing.push(...r.missing);
    extra.push(...r.extra);
  }
  return { missing, extra };
}
