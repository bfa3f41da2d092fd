/**
 * Walks one export call: resources → scopes → metrics → data points.
 *
 * Steps per resource:
 *  1. schemaUrl mismatch → info log (never counted)
 *  2. resource attributes vs ResourceSchema → logged, advisory only
 *  3. per scope: schemaUrl mismatch → info log
 *  4. per metric: unsupported shape → one warning, skipped entirely;
 *     otherwise every matching rule yields a finding; no rule matched and
 *     reportUnmatched → info log
 *
 * The walk only reads the table and schema, and returns immutable findings;
 * Verdict.ts folds them. Null records anywhere are skipped without a log.
 */

import type { Logger } from 'pino';
import type { OtlpMetricsPayload, OtlpResourceMetrics, OtlpScopeMetrics, OtlpMetric } from '../types/otlp.ts';
import type { ComparisonResult, MatchTable, ResourceSchema } from '../types/schema.ts';
import { attributeKeys, compareAttributes, concatResults } from '../transform/compareAttributes.ts';
import { classifyMetric, numberDataPoints } from '../transform/metricData.ts';
import { matchingRules } from '../transform/SchemaEngine.ts';

export interface ResourceFinding {
  readonly section: 'resource';
  readonly version: string;
  readonly result: ComparisonResult;
}

export interface MetricFinding {
  readonly section: 'metric';
  readonly scope: string;
  readonly metric: string;
  readonly rule: string;
  readonly result: ComparisonResult;
}

export type Finding = ResourceFinding | MetricFinding;

export interface CheckContext {
  table: MatchTable;
  resource: ResourceSchema;
  reportUnmatched: boolean;
  logger: Logger;
  /** Checked at resource and scope boundaries. */
  signal?: AbortSignal;
}

export function checkExport(
  request: OtlpMetricsPayload | null | undefined,
  ctx: CheckContext
): Finding[] {
  if (!request) return [];
  const log = ctx.logger.child({ type: 'metrics' });
  const findings: Finding[] = [];
  for (const rm of listOf(request.resourceMetrics)) {
    ctx.signal?.throwIfAborted();
    if (!rm) continue;
    findings.push(...checkResourceMetrics(rm, ctx, log));
  }
  return findings;
}

function checkResourceMetrics(rm: OtlpResourceMetrics, ctx: CheckContext, log: Logger): Finding[] {
  const expected = ctx.resource.expectedVersion;
  const version = rm.schemaUrl ?? '';
  if (version !== expected) {
    log.info({ section: 'resource', version, expected }, 'incorrect resource version');
  }

  const result = compareAttributes(
    ctx.resource.required,
    attributeKeys(rm.resource?.attributes),
    ctx.resource.ignore
  );
  logAttributes(log.child({ section: 'resource', version }), result);

  const findings: Finding[] = [{ section: 'resource', version, result }];
  for (const sm of listOf(rm.scopeMetrics)) {
    ctx.signal?.throwIfAborted();
    if (!sm) continue;
    findings.push(...checkScopeMetrics(sm, ctx, log.child({ section: 'metric' })));
  }
  return findings;
}

function checkScopeMetrics(sm: OtlpScopeMetrics, ctx: CheckContext, log: Logger): MetricFinding[] {
  const expected = ctx.resource.expectedVersion;
  const schemaUrl = sm.schemaUrl ?? '';
  if (schemaUrl !== expected) {
    log.info({ schemaUrl, expected, scope: sm.scope ?? null }, 'incorrect scope version');
  }

  const scope = sm.scope?.name ?? '';
  const scopeLog = sm.scope ? log.child({ 'scope.name': scope }) : log;

  const findings: MetricFinding[] = [];
  for (const metric of listOf(sm.metrics)) {
    if (!metric) continue;
    findings.push(...checkMetric(metric, scope, ctx, scopeLog));
  }
  return findings;
}

function checkMetric(metric: OtlpMetric, scope: string, ctx: CheckContext, log: Logger): MetricFinding[] {
  const name = typeof metric.name === 'string' ? metric.name : '';
  const metricLog = log.child({ name });

  const data = classifyMetric(metric);
  const points = numberDataPoints(data);
  if (points === undefined) {
    metricLog.warn({ metricType: data.kind }, 'unsupported metric type');
    return [];
  }

  const rules = matchingRules(ctx.table, name);
  if (rules.length === 0) {
    if (ctx.reportUnmatched) metricLog.info('unmatched metric');
    return [];
  }

  return rules.map((rule): MetricFinding => {
    const result = concatResults(
      points.map((p) => compareAttributes(rule.required, attributeKeys(p.attributes), rule.ignore))
    );
    logAttributes(metricLog.child({ match: rule.pattern }), result);
    return { section: 'metric', scope, metric: name, rule: rule.pattern, result };
  });
}

function logAttributes(log: Logger, result: ComparisonResult): void {
  if (result.missing.length > 0) {
    log.warn({ missing: result.missing }, 'missing attributes');
  }
  if (result.extra.length > 0) {
    log.info({ extra: result.extra }, 'extra attributes');
  }
}

/** Producers omit empty repeated fields; anything but an array reads as empty. */
function listOf<T>(items: readonly (T | null)[] | null | undefined): readonly (T | null)[] {
  return Array.isArray(items) ? items : [];
}
