// semconv-gate — OTLP metrics semantic-convention compliance checker

// Core builder
export { SemconvGate, BuiltSemconvGate } from './src/core/SemconvGate.ts';

// Pipeline (for advanced/testing use)
export { Pipeline } from './src/core/Pipeline.ts';
export type {
  PipelineResult,
  PipelineOptions,
  ProcessOptions,
  RejectionBody,
  VerdictListener,
} from './src/core/Pipeline.ts';
export { createIngestSession, IngestSession } from './src/core/Compat.ts';
export type { CompatRequestLike, CompatHeaders, IngestOptions } from './src/core/Compat.ts';

// Traversal and verdict
export { checkExport } from './src/core/ComplianceCheck.ts';
export type { Finding, MetricFinding, ResourceFinding, CheckContext } from './src/core/ComplianceCheck.ts';
export {
  foldVerdict,
  exitCodeFor,
  toExportResult,
  EXIT_CLEAN,
  EXIT_VIOLATION,
  FAILED_PRECONDITION,
} from './src/core/Verdict.ts';
export type { ExportResult } from './src/core/Verdict.ts';

// HTTP adapters
export { fetchHandler, routeHandler, routeMacro, nodeListener, serve, closeServer } from './src/adapters/node.ts';
export type { RouteMacro, ServeOptions } from './src/adapters/node.ts';

// Types
export type {
  AttributeSet,
  MatchRuleConfig,
  ResourceRuleConfig,
  MatchRule,
  MatchTable,
  ResourceSchema,
  ComparisonResult,
  Verdict,
  FastMatcher,
} from './src/types/schema.ts';
export type {
  OtlpMetricsPayload,
  OtlpResourceMetrics,
  OtlpScopeMetrics,
  OtlpMetric,
  OtlpExportResponse,
  OtlpPartialSuccess,
} from './src/types/otlp.ts';

// Schema catalog and config
export { SemconvCatalog, DEFAULT_REGISTRY_PATH } from './src/semconv/Catalog.ts';
export { loadConfig, parseConfig, parseConfigYaml } from './src/config/loader.ts';
export type { CheckerConfig, CheckerConfigInput } from './src/config/schema.ts';
export { ConfigError, isConfigError } from './src/util/errors.ts';
export type { ConfigErrorCode } from './src/util/errors.ts';
export { createLogger } from './src/util/logger.ts';

// Transform utilities (for advanced use)
export { compareAttributes, attributeKeys } from './src/transform/compareAttributes.ts';
export { buildMatchTable, buildResourceSchema, matchingRules } from './src/transform/SchemaEngine.ts';
export { classifyMetric } from './src/transform/metricData.ts';
export type { MetricData, MetricKind } from './src/transform/metricData.ts';
