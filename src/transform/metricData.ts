/**
 * Classifies an OTLP metric's data field into a tagged variant.
 *
 * Supports (attribute extraction):
 *  - gauge → number data points
 *  - sum   → number data points
 *
 * Everything else is reported as unsupported and never partially checked.
 */

import type { OtlpMetric, OtlpNumberDataPoint } from '../types/otlp.ts';

export type MetricData =
  | { kind: 'gauge'; dataPoints: OtlpNumberDataPoint[] }
  | { kind: 'sum'; dataPoints: OtlpNumberDataPoint[] }
  | { kind: 'histogram' }
  | { kind: 'exponentialHistogram' }
  | { kind: 'summary' }
  | { kind: 'empty' };

export type MetricKind = MetricData['kind'];

export function classifyMetric(metric: OtlpMetric): MetricData {
  if (metric.gauge) return { kind: 'gauge', dataPoints: presentPoints(metric.gauge.dataPoints) };
  if (metric.sum) return { kind: 'sum', dataPoints: presentPoints(metric.sum.dataPoints) };
  if (metric.histogram) return { kind: 'histogram' };
  if (metric.exponentialHistogram) return { kind: 'exponentialHistogram' };
  if (metric.summary) return { kind: 'summary' };
  return { kind: 'empty' };
}

/**
 * Number data points of the checkable shapes, or undefined for shapes the
 * checker skips. Adding a MetricData variant fails to compile here until it
 * is handled.
 */
export function numberDataPoints(data: MetricData): OtlpNumberDataPoint[] | undefined {
  switch (data.kind) {
    case 'gauge':
    case 'sum':
      return data.dataPoints;
    case 'histogram':
    case 'exponentialHistogram':
    case 'summary':
    case 'empty':
      return undefined;
    default:
      return assertNever(data);
  }
}

function presentPoints(
  points: readonly (OtlpNumberDataPoint | null)[] | null | undefined
): OtlpNumberDataPoint[] {
  if (!Array.isArray(points)) return [];
  return points.filter((p): p is OtlpNumberDataPoint => p !== null && p !== undefined);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled metric data variant: ${JSON.stringify(value)}`);
}
