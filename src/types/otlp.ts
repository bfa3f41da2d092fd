/**
 * OTLP JSON payload types (the subset an export call carries for metrics).
 * Based on the OTLP specification for metrics export.
 *
 * Every collection is optional and nullable: producers omit empty fields and
 * the checker treats absent and null the same way.
 */

export interface OtlpKeyValue {
  key: string;
  value?: OtlpAnyValue;
}

export interface OtlpAnyValue {
  stringValue?: string;
  intValue?: string | number;
  doubleValue?: number;
  boolValue?: boolean;
  arrayValue?: { values: OtlpAnyValue[] };
  kvlistValue?: { values: OtlpKeyValue[] };
  bytesValue?: string;
}

export interface OtlpResource {
  attributes?: OtlpKeyValue[] | null;
  droppedAttributesCount?: number;
}

export interface OtlpNumberDataPoint {
  attributes?: OtlpKeyValue[] | null;
  startTimeUnixNano?: string;
  timeUnixNano?: string;
  asDouble?: number;
  asInt?: string | number;
  exemplars?: unknown[];
  flags?: number;
}

export interface OtlpHistogramDataPoint {
  attributes?: OtlpKeyValue[] | null;
  startTimeUnixNano?: string;
  timeUnixNano?: string;
  count?: string | number;
  sum?: number;
  bucketCounts?: (string | number)[];
  explicitBounds?: number[];
  exemplars?: unknown[];
  flags?: number;
}

export interface OtlpGauge {
  dataPoints?: (OtlpNumberDataPoint | null)[] | null;
}

export interface OtlpSum {
  dataPoints?: (OtlpNumberDataPoint | null)[] | null;
  aggregationTemporality?: number;
  isMonotonic?: boolean;
}

export interface OtlpHistogram {
  dataPoints?: (OtlpHistogramDataPoint | null)[] | null;
  aggregationTemporality?: number;
}

export interface OtlpExponentialHistogram {
  dataPoints?: unknown[] | null;
  aggregationTemporality?: number;
}

export interface OtlpSummary {
  dataPoints?: unknown[] | null;
}

export interface OtlpMetric {
  name: string;
  description?: string;
  unit?: string;
  gauge?: OtlpGauge;
  sum?: OtlpSum;
  histogram?: OtlpHistogram;
  exponentialHistogram?: OtlpExponentialHistogram;
  summary?: OtlpSummary;
}

export interface OtlpInstrumentationScope {
  name?: string;
  version?: string;
  attributes?: OtlpKeyValue[] | null;
}

export interface OtlpScopeMetrics {
  scope?: OtlpInstrumentationScope | null;
  metrics?: (OtlpMetric | null)[] | null;
  schemaUrl?: string;
}

export interface OtlpResourceMetrics {
  resource?: OtlpResource | null;
  scopeMetrics?: (OtlpScopeMetrics | null)[] | null;
  schemaUrl?: string;
}

export interface OtlpMetricsPayload {
  resourceMetrics?: (OtlpResourceMetrics | null)[] | null;
}

/** OTLP ExportMetricsPartialSuccess. */
export interface OtlpPartialSuccess {
  rejectedDataPoints: number;
  errorMessage: string;
}

/** OTLP ExportMetricsServiceResponse; empty when the whole batch was accepted. */
export interface OtlpExportResponse {
  partialSuccess?: OtlpPartialSuccess;
}
