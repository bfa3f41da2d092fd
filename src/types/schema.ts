/**
 * User-facing rule config and the compiled, read-only match table types.
 */

/** A set of attribute keys. Insertion order is the first-seen order. */
export type AttributeSet = ReadonlySet<string>;

/** One configured metric rule, as it appears in the config file. */
export interface MatchRuleConfig {
  /** Regular expression searched in the metric name (unanchored). */
  match: string;
  /** Catalog group names whose attributes are required. */
  groups?: string[];
  /** Attribute keys that may be missing or extra without being reported. */
  ignore?: string[];
}

export interface ResourceRuleConfig {
  groups?: string[];
  ignore?: string[];
}

/**
 * Fast matcher that avoids regex overhead for common patterns.
 * Compiled once at build() time.
 */
export type FastMatcher =
  | { type: 'any' }                  // /.*/ — always true, zero cost
  | { type: 'exact'; value: string } // /^foo$/ — equality check
  | { type: 'regex'; re: RegExp }    // general fallback

export interface MatchRule {
  /** Source pattern, kept for logging. */
  pattern: string;
  matcher: FastMatcher;
  required: AttributeSet;
  ignore: AttributeSet;
}

/** Ordered, frozen sequence of rules. */
export type MatchTable = readonly MatchRule[];

export interface ResourceSchema {
  readonly required: AttributeSet;
  readonly ignore: AttributeSet;
  readonly expectedVersion: string;
}

export interface ComparisonResult {
  readonly missing: readonly string[];
  readonly extra: readonly string[];
}

export interface Verdict {
  readonly violationCount: number;
  readonly implicatedScopes: readonly string[];
}
