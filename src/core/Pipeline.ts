/**
 * Stateless pipeline: process(body, contentType) → PipelineResult
 *
 * Steps:
 *  1. Validate content type (must be application/json)
 *  2. Parse OTLP JSON body
 *  3. Walk the batch against the match table and resource schema
 *  4. Fold findings into a Verdict and notify verdict listeners
 *  5. Render the Verdict: 200 {} or 400 failed-precondition + partialSuccess
 */

import type { Logger } from 'pino';
import type { MatchTable, ResourceSchema, Verdict } from '../types/schema.ts';
import type { OtlpExportResponse, OtlpMetricsPayload, OtlpPartialSuccess } from '../types/otlp.ts';
import { checkExport } from './ComplianceCheck.ts';
import { foldVerdict, toExportResult } from './Verdict.ts';

/** Body of a rejected export: a google.rpc.Status carrying the partial success. */
export interface RejectionBody {
  code: number;
  message: string;
  partialSuccess: OtlpPartialSuccess;
}

export interface PipelineResult {
  status: number;
  message: string;
  body?: OtlpExportResponse | RejectionBody;
  verdict?: Verdict;
}

export interface PipelineOptions {
  table: MatchTable;
  resource: ResourceSchema;
  reportUnmatched: boolean;
  logger: Logger;
}

export interface ProcessOptions {
  signal?: AbortSignal;
}

export type VerdictListener = (verdict: Verdict) => void;

export class Pipeline {
  private readonly listeners = new Set<VerdictListener>();

  constructor(private readonly options: PipelineOptions) {}

  /** Subscribe to the verdict of every checked export call. Returns an unsubscribe function. */
  onVerdict(listener: VerdictListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async process(
    body: string | Uint8Array,
    contentType: string,
    options?: ProcessOptions
  ): Promise<PipelineResult> {
    // Only accept JSON content types for OTLP
    const ct = (contentType.split(';')[0] ?? '').trim().toLowerCase();
    if (ct === 'application/x-protobuf') {
      return { status: 415, message: 'Protobuf OTLP not supported; use application/json' };
    }
    if (ct !== 'application/json') {
      return { status: 415, message: `Unsupported content type: ${contentType}` };
    }

    // Parse JSON
    let parsed: unknown;
    try {
      const text = typeof body === 'string' ? body : new TextDecoder().decode(body);
      parsed = text.trim() === '' ? null : JSON.parse(text);
    } catch {
      return { status: 400, message: 'Invalid JSON body' };
    }

    // Validate basic shape; null and {} are empty export calls
    if (!isPayload(parsed)) {
      return { status: 400, message: 'Invalid OTLP payload: resourceMetrics must be an array' };
    }

    let verdict: Verdict;
    try {
      verdict = foldVerdict(
        checkExport(parsed, {
          table: this.options.table,
          resource: this.options.resource,
          reportUnmatched: this.options.reportUnmatched,
          logger: this.options.logger,
          signal: options?.signal,
        })
      );
    } catch (err) {
      if (options?.signal?.aborted) {
        return { status: 499, message: 'Client closed request' };
      }
      throw err;
    }

    this.options.logger.debug(
      { violationCount: verdict.violationCount, scopes: verdict.implicatedScopes },
      'export checked'
    );
    for (const listener of this.listeners) listener(verdict);

    const result = toExportResult(verdict);
    if (result.status === 'ok') {
      return { status: 200, message: 'OK', body: result.response, verdict };
    }
    return {
      status: 400,
      message: result.message,
      body: {
        code: result.code,
        message: result.message,
        partialSuccess: result.response.partialSuccess,
      },
      verdict,
    };
  }
}

function isPayload(value: unknown): value is OtlpMetricsPayload | null {
  if (value === null) return true;
  if (typeof value !== 'object' || Array.isArray(value)) return false;
  if (!('resourceMetrics' in value)) return true;
  const rm = value.resourceMetrics;
  return rm === null || rm === undefined || Array.isArray(rm);
}
