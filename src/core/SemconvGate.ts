// SemconvGate fluent builder and built instance.
//
// Usage:
//   const gate = new SemconvGate()
//     .catalog(SemconvCatalog.fromFile())
//     .resource({ groups: ['service'] })
//     .metrics([{ match: '^http\\.server\\.', groups: ['metric.http.server.request.duration'] }])
//     .reportUnmatched(true)
//     .build();
//
//   const server = await gate.serve({ host: '0.0.0.0', port: 4318, path: '/v1/metrics' });

import type { Server } from 'node:http';
import type { Logger } from 'pino';
import type { MatchRuleConfig, ResourceRuleConfig, MatchTable, ResourceSchema } from '../types/schema.ts';
import type { SemconvCatalog } from '../semconv/Catalog.ts';
import { buildMatchTable, buildResourceSchema } from '../transform/SchemaEngine.ts';
import { Pipeline } from './Pipeline.ts';
import type { VerdictListener } from './Pipeline.ts';
import { fetchHandler, routeHandler, routeMacro, serve } from '../adapters/node.ts';
import type { RouteMacro, ServeOptions } from '../adapters/node.ts';
import { createIngestSession } from './Compat.ts';
import type { CompatRequestLike, IngestOptions, IngestSession } from './Compat.ts';
import { ConfigError } from '../util/errors.ts';
import { silentLogger } from '../util/logger.ts';

/** SemconvGate fluent builder. */
export class SemconvGate {
  private _catalog?: SemconvCatalog;
  private _resource: ResourceRuleConfig = {};
  private _metrics: MatchRuleConfig[] = [];
  private _reportUnmatched = false;
  private _logger?: Logger;

  /** Catalog that group names resolve against; also fixes the expected schema version. */
  catalog(catalog: SemconvCatalog): this {
    this._catalog = catalog;
    return this;
  }

  /** Groups every resource must carry, and keys that may be missing or extra. */
  resource(resource: ResourceRuleConfig): this {
    this._resource = {
      groups: [...(resource.groups ?? [])],
      ignore: [...(resource.ignore ?? [])],
    };
    return this;
  }

  /**
   * Register metric rules. Every rule whose pattern matches a metric name
   * applies; rules are checked in registration order.
   */
  metrics(rules: MatchRuleConfig[]): this {
    this._metrics = [...this._metrics, ...rules];
    return this;
  }

  /** Log metrics that match no rule. */
  reportUnmatched(enabled = true): this {
    this._reportUnmatched = enabled;
    return this;
  }

  logger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  /**
   * Compile the match table and resource schema.
   * Throws ConfigError for a missing catalog, a bad pattern or an unknown group.
   */
  build(): BuiltSemconvGate {
    if (!this._catalog) {
      throw new ConfigError('INVALID_CONFIG', 'SemconvGate: catalog() must be called before build()');
    }
    const table = buildMatchTable(this._metrics, this._catalog);
    const resource = buildResourceSchema(this._resource, this._catalog);
    const logger = this._logger ?? silentLogger();
    const pipeline = new Pipeline({
      table,
      resource,
      reportUnmatched: this._reportUnmatched,
      logger,
    });
    return new BuiltSemconvGate(pipeline, table, resource, logger);
  }
}

/** A configured gate ready to check export calls. */
export class BuiltSemconvGate {
  constructor(
    private readonly pipeline: Pipeline,
    public readonly table: MatchTable,
    public readonly resourceSchema: ResourceSchema,
    private readonly log: Logger
  ) {}

  /**
   * Returns a fetch handler: POST `path` is checked, other methods get 405,
   * other paths 404.
   */
  handler(path = '/v1/metrics'): (req: Request) => Promise<Response> {
    return fetchHandler(this.pipeline, path);
  }

  /** Returns a handler for a route already restricted to POST. */
  routeHandler(): (req: Request) => Promise<Response> {
    return routeHandler(this.pipeline);
  }

  /**
   * Route macro descriptor for framework-agnostic routing:
   * `{ method: 'POST', path, handler }`
   */
  routeMacro(path = '/v1/metrics'): RouteMacro {
    return routeMacro(this.pipeline, path);
  }

  /**
   * Starts an isolated check of one export call.
   *
   * Usage:
   *   await gate.ingest(req).push();
   *   await gate.ingest(rawJson).push();
   */
  ingest(
    input: Request | CompatRequestLike | string | Uint8Array | object | null | undefined,
    options?: IngestOptions
  ): IngestSession {
    return createIngestSession(this.pipeline, input, options);
  }

  /** Observe the verdict of every checked call. Returns an unsubscribe function. */
  onVerdict(listener: VerdictListener): () => void {
    return this.pipeline.onVerdict(listener);
  }

  /** Listen on node:http. Request handling failures are logged, never thrown. */
  serve(options: ServeOptions): Promise<Server> {
    return serve(this.pipeline, options, (err) => {
      this.log.error({ err }, 'export handler failed');
    });
  }
}
