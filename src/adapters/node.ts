/**
 * HTTP adapters for the checking pipeline: a fetch-style handler for
 * frameworks that speak Request/Response, and a node:http listener/server.
 */

import { createServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import type { Pipeline, PipelineResult } from '../core/Pipeline.ts';
import { createIngestSession } from '../core/Compat.ts';

export interface RouteMacro {
  method: 'POST';
  path: string;
  handler: (req: Request) => Promise<Response>;
}

export interface ServeOptions {
  host: string;
  port: number;
  path: string;
}

/** Map pipeline results to HTTP responses. JSON bodies go out as JSON, the rest as text. */
export function pipelineResultToResponse(result: PipelineResult): Response {
  if (result.body !== undefined) {
    return new Response(JSON.stringify(result.body), {
      status: result.status,
      headers: { 'Content-Type': 'application/json' },
    });
  }
  return new Response(result.message, { status: result.status });
}

/**
 * Returns a handler for a route that only receives POST (method checking done
 * by the router).
 */
export function routeHandler(pipeline: Pipeline): (req: Request) => Promise<Response> {
  return async (req: Request): Promise<Response> => {
    const result = await createIngestSession(pipeline, req).push();
    return pipelineResultToResponse(result);
  };
}

/**
 * Returns a fetch handler that handles POST to the specified path.
 * Returns 405 for wrong method, 404 for unmatched paths.
 */
export function fetchHandler(
  pipeline: Pipeline,
  path: string
): (req: Request) => Promise<Response> {
  const route = routeHandler(pipeline);
  return async (req: Request): Promise<Response> => {
    const url = new URL(req.url);
    if (url.pathname !== path) {
      return new Response('Not Found', { status: 404 });
    }
    if (req.method !== 'POST') {
      return new Response('Method Not Allowed', {
        status: 405,
        headers: { Allow: 'POST' },
      });
    }
    return route(req);
  };
}

/**
 * Framework-agnostic route macro descriptor:
 * `{ method, path, handler }`
 */
export function routeMacro(pipeline: Pipeline, path = '/v1/metrics'): RouteMacro {
  return {
    method: 'POST',
    path,
    handler: routeHandler(pipeline),
  };
}

/** node:http request listener with the same routing as fetchHandler. */
export function nodeListener(
  pipeline: Pipeline,
  path: string,
  onError: (err: unknown) => void
): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    handleNodeRequest(pipeline, path, req, res).catch((err: unknown) => {
      onError(err);
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'text/plain' });
      }
      res.end('Internal Server Error');
    });
  };
}

async function handleNodeRequest(
  pipeline: Pipeline,
  path: string,
  req: IncomingMessage,
  res: ServerResponse
): Promise<void> {
  const url = new URL(req.url ?? '/', 'http://localhost');
  if (url.pathname !== path) {
    writeText(res, 404, 'Not Found');
    return;
  }
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    writeText(res, 405, 'Method Not Allowed');
    return;
  }

  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });

  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }

  const result = await createIngestSession(pipeline, new Uint8Array(Buffer.concat(chunks)), {
    contentType: req.headers['content-type'] ?? 'application/json',
    signal: controller.signal,
  }).push();

  if (result.body !== undefined) {
    res.writeHead(result.status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(result.body));
    return;
  }
  writeText(res, result.status, result.message);
}

function writeText(res: ServerResponse, status: number, message: string): void {
  res.writeHead(status, { 'Content-Type': 'text/plain' });
  res.end(message);
}

/** Start a node:http server; resolves once it is listening. */
export function serve(
  pipeline: Pipeline,
  options: ServeOptions,
  onError: (err: unknown) => void
): Promise<Server> {
  const server = createServer(nodeListener(pipeline, options.path, onError));
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}

/** Stop accepting connections; resolves once open connections have ended. */
export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeIdleConnections();
  });
}
