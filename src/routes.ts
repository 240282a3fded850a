import { RecordsError, ValidationError, toErrorBody } from './errors.js';
import { assemble, toRecordResponse } from './response.js';
import {
  batchSchema,
  draftSchema,
  listQuerySchema,
  searchBodySchema,
  searchQuerySchema,
  toDraft,
  toSearchRequest,
} from './schemas.js';
import type { RecordStore, SearchRequest, SearchStrategy } from './types.js';

export interface ApiRequest {
  method: string;
  url: URL;
  body?: unknown;
}

export interface ApiResponse {
  status: number;
  body?: unknown;
}

export interface ApiDependencies {
  store: RecordStore;
  search: SearchStrategy;
}

type Handler = (request: ApiRequest, params: Record<string, string>) => Promise<ApiResponse>;

interface Route {
  pattern: RegExp;
  paramNames: string[];
  methods: Partial<Record<string, Handler>>;
}

// ── Route table ────────────────────────────────────────────────────

function buildRoutes({ store, search }: ApiDependencies): Route[] {
  const runSearch = async (request: SearchRequest): Promise<ApiResponse> => {
    const results = await search.search(request);
    return ok(assemble(results, request.query));
  };

  return [
    route('/', {
      GET: async () => ok({ message: 'Package records API: search any developer package.' }),
    }),
    route('/health', {
      GET: async () => ok({
        status: 'healthy',
        searchMode: search.mode,
        records: await store.count(),
      }),
    }),
    route('/records', {
      GET: async ({ url }) => {
        const { limit, offset } = listQuerySchema.parse({
          limit: url.searchParams.get('limit') ?? undefined,
          offset: url.searchParams.get('offset') ?? undefined,
        });
        const records = await store.list(limit, offset);
        return ok(records.map(toRecordResponse));
      },
      POST: async ({ body }) => {
        const record = await store.insert(toDraft(draftSchema.parse(body)));
        return ok(toRecordResponse(record));
      },
    }),
    route('/records/batch', {
      POST: async ({ body }) => {
        const drafts = batchSchema.parse(body).map(toDraft);
        const records = await store.insertBatch(drafts);
        return ok(records.map(toRecordResponse));
      },
    }),
    route('/records/:id', {
      GET: async (_request, params) => ok(toRecordResponse(await store.get(params.id))),
    }),
    route('/search', {
      GET: async ({ url }) => {
        const { query, limit } = searchQuerySchema.parse({
          query: url.searchParams.get('query') ?? undefined,
          limit: url.searchParams.get('limit') ?? undefined,
        });
        const tags = url.searchParams.getAll('tags');
        return runSearch({ query, limit, tags: tags.length > 0 ? tags : undefined });
      },
      POST: async ({ body }) => runSearch(toSearchRequest(searchBodySchema.parse(body))),
    }),
  ];
}

// ── Dispatcher ─────────────────────────────────────────────────────
// Transport-agnostic: the HTTP server parses the body and writes the
// response, everything in between happens here.

export function createRouter(deps: ApiDependencies): (request: ApiRequest) => Promise<ApiResponse> {
  const routes = buildRoutes(deps);

  return async (request) => {
    const path = normalisePath(request.url.pathname);
    const method = request.method.toUpperCase();

    for (const candidate of routes) {
      const match = candidate.pattern.exec(path);
      if (!match) continue;

      if (method === 'OPTIONS') return { status: 204 };

      const handler = candidate.methods[method];
      if (!handler) return failure(405, 'Method not allowed');

      try {
        const params: Record<string, string> = {};
        candidate.paramNames.forEach((name, i) => {
          params[name] = decodeParam(match[i + 1]);
        });
        return await handler(request, params);
      } catch (err) {
        return errorResponse(err, method, path);
      }
    }

    return failure(404, 'Not found');
  };
}

// ── Helpers ────────────────────────────────────────────────────────

function route(path: string, methods: Partial<Record<string, Handler>>): Route {
  const paramNames: string[] = [];
  const source = path.replace(/:([A-Za-z]+)/g, (_, name: string) => {
    paramNames.push(name);
    return '([^/]+)';
  });
  return { pattern: new RegExp(`^${source}$`), paramNames, methods };
}

function decodeParam(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch (err) {
    if (err instanceof URIError) throw new ValidationError(`Malformed path segment: ${raw}`);
    throw err;
  }
}

function normalisePath(pathname: string): string {
  return pathname.length > 1 ? pathname.replace(/\/+$/, '') : pathname;
}

function ok(body: unknown): ApiResponse {
  return { status: 200, body };
}

function failure(status: number, detail: string): ApiResponse {
  return { status, body: { detail } };
}

function errorResponse(err: unknown, method: string, path: string): ApiResponse {
  const { status, detail } = toErrorBody(err);
  if (status >= 500) {
    // Server-side failures keep their cause in the log; clients get the detail only.
    const cause = err instanceof RecordsError ? err.cause ?? err.message : err;
    console.error(`[http] ${method} ${path} failed with ${status}:`, cause);
  }
  return failure(status, detail);
}
