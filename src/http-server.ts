import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { PayloadTooLargeError, ValidationError, toErrorBody } from './errors.js';
import { createRouter, type ApiDependencies, type ApiResponse } from './routes.js';

export type HttpServerOptions = ApiDependencies & {
  port: number;
  host: string;
};

/**
 * Maximum request body size (1MB).
 */
export const MAX_BODY_SIZE = 1 * 1024 * 1024;

const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': '*',
} as const;

/**
 * Parse JSON body from request with size limit.
 *
 * An oversized body is drained rather than buffered, and the request
 * fails once it ends so the socket is still writable for the 413.
 */
export async function parseJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let chunks: Buffer[] = [];
    let totalSize = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      totalSize += chunk.length;
      if (totalSize > MAX_BODY_SIZE) {
        tooLarge = true;
        chunks = [];
        req.removeAllListeners('data');
        req.resume();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (tooLarge) {
        reject(new PayloadTooLargeError(MAX_BODY_SIZE));
        return;
      }
      const body = Buffer.concat(chunks).toString('utf-8');
      try {
        resolve(body ? JSON.parse(body) : undefined);
      } catch {
        reject(new ValidationError('Request body is not valid JSON'));
      }
    });
    req.on('error', reject);
  });
}

function send(res: ServerResponse, response: ApiResponse): void {
  // The client may still be mid-upload after a 413; don't reuse the socket.
  const headers = response.status === 413 ? { ...CORS_HEADERS, Connection: 'close' } : CORS_HEADERS;
  if (response.body === undefined) {
    res.writeHead(response.status, headers);
    res.end();
    return;
  }
  res.writeHead(response.status, { ...headers, 'Content-Type': 'application/json' });
  res.end(JSON.stringify(response.body));
}

/**
 * Build the HTTP server. Each request is handled independently; the
 * record store is the only state shared between them.
 */
export function createHttpServer(deps: ApiDependencies): Server {
  const dispatch = createRouter(deps);

  return createServer(async (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url || '/', 'http://localhost');
    const method = req.method ?? 'GET';

    try {
      const body = method === 'POST' ? await parseJsonBody(req) : undefined;
      send(res, await dispatch({ method, url, body }));
    } catch (error) {
      const { status, detail } = toErrorBody(error);
      if (status >= 500) {
        console.error(`[http] ${method} ${url.pathname} failed:`, error);
      }
      if (!res.headersSent) {
        send(res, { status, body: { detail } });
      }
    }
  });
}

/**
 * Run the HTTP API until SIGINT or SIGTERM.
 */
export async function runHttpServer(options: HttpServerOptions): Promise<void> {
  const { port, host, ...deps } = options;
  const httpServer = createHttpServer(deps);

  return new Promise<void>((resolve, reject) => {
    httpServer.on('error', reject);
    httpServer.listen(port, host, () => {
      console.error(`[http] Listening on http://${host}:${port} (search mode: ${deps.search.mode})`);
    });

    const shutdown = () => {
      console.error('[http] Shutting down...');
      httpServer.close(() => {
        console.error('[http] Server closed');
        resolve();
      });
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });
}
