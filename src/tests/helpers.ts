import { createLogger } from '../util/logger.ts';
import type { Logger } from '../util/logger.ts';
import { SemconvCatalog } from '../semconv/Catalog.ts';
import type { OtlpKeyValue, OtlpMetric, OtlpMetricsPayload } from '../types/otlp.ts';

export const SCHEMA_URL = 'https://example.com/schemas/1.0.0';

export const CATALOG_YAML = `
schema_url: ${SCHEMA_URL}
groups:
  - id: service
    prefix: service
    attributes:
      - id: name
      - id: version
  - id: http
    prefix: http
    attributes:
      - id: method
      - id: status_code
  - id: server
    prefix: server
    attributes:
      - id: address
      - ref: http.method
`;

export function testCatalog(): SemconvCatalog {
  return SemconvCatalog.fromYaml(CATALOG_YAML);
}

export type LogLine = Record<string, unknown>;

/** Logger writing parsed JSON lines into an array. */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = createLogger({
    level: 'debug',
    destination: {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  });
  return { logger, lines };
}

export function linesWithMsg(lines: LogLine[], msg: string): LogLine[] {
  return lines.filter((l) => l['msg'] === msg);
}

export function kv(...keys: string[]): OtlpKeyValue[] {
  return keys.map((key) => ({ key, value: { stringValue: 'v' } }));
}

export function gauge(name: string, ...points: string[][]): OtlpMetric {
  return {
    name,
    gauge: { dataPoints: points.map((keys) => ({ attributes: kv(...keys), asDouble: 1 })) },
  };
}

export function sum(name: string, ...points: string[][]): OtlpMetric {
  return {
    name,
    sum: {
      dataPoints: points.map((keys) => ({ attributes: kv(...keys), asInt: '1' })),
      isMonotonic: true,
    },
  };
}

export function histogram(name: string, keys: string[]): OtlpMetric {
  return {
    name,
    histogram: {
      dataPoints: [{ attributes: kv(...keys), count: '1', sum: 1, bucketCounts: ['1'], explicitBounds: [] }],
    },
  };
}

/** One resource with one scope holding the given metrics. */
export function payload(
  metrics: OtlpMetric[],
  options: { resourceKeys?: string[]; schemaUrl?: string; scopeName?: string; scopeSchemaUrl?: string } = {}
): OtlpMetricsPayload {
  return {
    resourceMetrics: [
      {
        schemaUrl: options.schemaUrl ?? SCHEMA_URL,
        resource: { attributes: kv(...(options.resourceKeys ?? ['service.name', 'service.version'])) },
        scopeMetrics: [
          {
            scope: { name: options.scopeName ?? 'test-scope' },
            schemaUrl: options.scopeSchemaUrl ?? SCHEMA_URL,
            metrics,
          },
        ],
      },
    ],
  };
}
