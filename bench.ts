import { bench, group, run } from 'mitata';
import { compareAttributes } from './src/transform/compareAttributes.ts';
import { buildMatchTable, buildResourceSchema } from './src/transform/SchemaEngine.ts';
import { checkExport } from './src/core/ComplianceCheck.ts';
import { foldVerdict } from './src/core/Verdict.ts';
import { Pipeline } from './src/core/Pipeline.ts';
import { SemconvCatalog } from './src/semconv/Catalog.ts';
import { silentLogger } from './src/util/logger.ts';
import type { OtlpKeyValue, OtlpMetric, OtlpMetricsPayload, OtlpNumberDataPoint } from './src/types/otlp.ts';

const catalog = SemconvCatalog.fromFile();
const table = buildMatchTable(
  [
    { match: '^http\\.server\\.', groups: ['metric.http.server.request.duration'], ignore: ['error.type'] },
    { match: '^metric_', groups: ['server'] },
    { match: '.*', groups: [] },
  ],
  catalog
);
const resource = buildResourceSchema({ groups: ['service', 'telemetry.sdk'] }, catalog);
const logger = silentLogger();

const stringAttr = (key: string, stringValue: string): OtlpKeyValue => ({ key, value: { stringValue } });

/** One resource, one scope, `metrics` sums of `points` data points each. */
function exportCall(metrics: number, points: number): OtlpMetricsPayload {
  const metricList: OtlpMetric[] = [];
  for (let m = 0; m < metrics; m++) {
    const dataPoints: OtlpNumberDataPoint[] = [];
    for (let p = 0; p < points; p++) {
      dataPoints.push({
        attributes: [stringAttr('server.address', `10.0.0.${p}`), stringAttr('server.port', '8080')],
        asInt: String(p),
      });
    }
    metricList.push({ name: `metric_${m}`, sum: { dataPoints } });
  }
  return {
    resourceMetrics: [
      {
        schemaUrl: catalog.version,
        resource: { attributes: [stringAttr('service.name', 'bench')] },
        scopeMetrics: [{ scope: { name: 'bench' }, schemaUrl: catalog.version, metrics: metricList }],
      },
    ],
  };
}

const oneMetric = exportCall(1, 1);
const tenMetrics = exportCall(10, 5);
const fiftyMetrics = exportCall(50, 10);

const tenMetricsJson = JSON.stringify(tenMetrics);
const fiftyMetricsJson = JSON.stringify(fiftyMetrics);

const required = catalog.attributes('metric.http.server.request.duration');
const observed = ['http.request.method', 'http.route', 'url.scheme', 'user_agent.original'];
const ignore = new Set(['error.type']);

const ctx = { table, resource, reportUnmatched: true, logger };
const pipeline = new Pipeline(ctx);

group('compare', () => {
  bench('http.server required vs 4 observed', () => compareAttributes(required, observed, ignore));
  bench('empty required', () => compareAttributes(new Set(), observed));
});

group('check and fold', () => {
  bench('1 sum, 1 point', () => foldVerdict(checkExport(oneMetric, ctx)));
  bench('10 sums, 5 points', () => foldVerdict(checkExport(tenMetrics, ctx)));
  bench('50 sums, 10 points', () => foldVerdict(checkExport(fiftyMetrics, ctx)));
});

group('pipeline', () => {
  bench('10 sums, 5 points', async () => pipeline.process(tenMetricsJson, 'application/json'));
  bench('50 sums, 10 points', async () => pipeline.process(fiftyMetricsJson, 'application/json'));
});

await run();
