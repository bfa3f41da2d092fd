import type { Pipeline, PipelineResult } from './Pipeline.ts';

const JSON_CONTENT_TYPE = 'application/json';

export type CompatHeaders =
  | Headers
  | { get?: (name: string) => string | null | undefined }
  | Record<string, string | string[] | undefined>;

/** Anything a framework hands us that looks like an HTTP request. */
export interface CompatRequestLike {
  method?: string;
  headers?: CompatHeaders;
  contentType?: string;
  body?: unknown;
  text?: () => Promise<string> | string;
  signal?: AbortSignal;
}

export interface IngestOptions {
  method?: string;
  headers?: CompatHeaders;
  contentType?: string;
  signal?: AbortSignal;
}

/** An export call reduced to what the pipeline needs. */
interface ExportCall {
  method: string | undefined;
  contentType: string;
  body: string | Uint8Array;
}

type CallSource = Request | CompatRequestLike;

/** One export call, checked when push() is awaited. */
export class IngestSession {
  private signal: AbortSignal | undefined;

  constructor(
    private readonly pipeline: Pipeline,
    private readonly source: CallSource
  ) {
    this.signal = source.signal ?? undefined;
  }

  /** Stop the check at the next resource or scope boundary once the signal aborts. */
  abortOn(signal: AbortSignal): this {
    this.signal = signal;
    return this;
  }

  async push(): Promise<PipelineResult> {
    const call = await readExportCall(this.source);
    if (call.method !== undefined && call.method !== 'POST') {
      return { status: 405, message: 'Method Not Allowed' };
    }
    return this.pipeline.process(call.body, call.contentType, { signal: this.signal });
  }
}

export function createIngestSession(
  pipeline: Pipeline,
  input: CallSource | string | Uint8Array | object | null | undefined,
  options: IngestOptions = {}
): IngestSession {
  if (input instanceof Request || looksLikeRequest(input)) {
    return new IngestSession(pipeline, input);
  }
  const wrapped: CompatRequestLike = {
    method: options.method ?? 'POST',
    headers: options.headers,
    contentType: options.contentType,
    signal: options.signal,
    body: input,
  };
  return new IngestSession(pipeline, wrapped);
}

async function readExportCall(source: CallSource): Promise<ExportCall> {
  if (source instanceof Request) {
    return {
      method: source.method,
      contentType: source.headers.get('content-type') ?? JSON_CONTENT_TYPE,
      body: await source.text(),
    };
  }
  return {
    method: source.method?.toUpperCase(),
    contentType: source.contentType ?? headerValue(source.headers, 'content-type') ?? JSON_CONTENT_TYPE,
    body: typeof source.text === 'function' ? await source.text() : encodeBody(source.body),
  };
}

// Plain objects are payloads already parsed by a framework; send them back through JSON.
function encodeBody(body: unknown): string | Uint8Array {
  if (body === undefined || body === null) return '';
  if (typeof body === 'string' || body instanceof Uint8Array) return body;
  if (body instanceof ArrayBuffer) return new Uint8Array(body);
  if (typeof body === 'object') return JSON.stringify(body);
  return String(body);
}

const REQUEST_KEYS = ['text', 'body', 'headers', 'contentType', 'method'] as const;

function looksLikeRequest(value: unknown): value is CompatRequestLike {
  if (typeof value !== 'object' || value === null || value instanceof Uint8Array) return false;
  return REQUEST_KEYS.some((key) => key in value);
}

function headerValue(headers: CompatHeaders | undefined, name: string): string | undefined {
  if (headers === undefined) return undefined;
  if (headers instanceof Headers) return headers.get(name) ?? undefined;
  if (typeof headers.get === 'function') return headers.get(name) ?? undefined;

  const record: Record<string, unknown> = headers;
  const entry = Object.entries(record).find(([key]) => key.toLowerCase() === name);
  const value = entry?.[1];
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}
