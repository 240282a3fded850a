import { z } from 'zod';
import {
  RecordsError,
  UpstreamFailureError,
  VectorIndexTimeoutError,
  formatZodError,
} from './errors.js';
import { packageUrlFor } from './response.js';
import type {
  SearchRequest,
  SearchResult,
  SearchStrategy,
  VectorIndex,
  VectorIndexSession,
} from './types.js';

// Weaviate returns null or omits text properties that were never set.
const documentSchema = z.object({
  name: z.string().nullish(),
  description: z.string().nullish(),
  readme: z.string().nullish(),
  repository: z.string().nullish(),
});

export type PackageDocument = z.infer<typeof documentSchema>;

export interface SemanticSearchOptions {
  /** Milliseconds before the request gives up; 0 waits indefinitely. */
  timeoutMs?: number;
}

// ── SemanticSearchStrategy ─────────────────────────────────────────
//
// Ranking is delegated entirely to the vector index: no local filtering,
// no re-ranking, and request tags are ignored. One session per request,
// closed once the index call settles, whatever the outcome. The timeout
// spans connecting and querying.

export class SemanticSearchStrategy implements SearchStrategy {
  readonly mode = 'semantic' as const;
  private readonly timeoutMs: number;

  constructor(
    private readonly index: VectorIndex,
    options: SemanticSearchOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  async search(request: SearchRequest): Promise<SearchResult[]> {
    if (request.limit === 0) return [];

    let expired = false;

    // The close is chained to the index work rather than to this method,
    // so a timed-out request still releases its session: straight away if
    // it connects after the deadline, otherwise when the query finishes.
    const pending = this.openSession().then(session => {
      if (expired) return closeSession(session).then((): unknown[] => []);
      return session
        .nearText(request.query, request.limit)
        .finally(() => closeSession(session));
    });

    let documents: unknown[];
    try {
      documents = await withTimeout(pending, this.timeoutMs);
    } catch (err) {
      if (err instanceof VectorIndexTimeoutError) expired = true;
      if (err instanceof RecordsError) throw err;
      throw new UpstreamFailureError('Semantic search failed', err);
    }

    return documents.map(toSearchResult);
  }

  private async openSession(): Promise<VectorIndexSession> {
    try {
      return await this.index.connect();
    } catch (err) {
      if (err instanceof RecordsError) throw err;
      throw new UpstreamFailureError('Could not connect to the vector index', err);
    }
  }
}

// ── Pure functions ─────────────────────────────────────────────────

export function toSearchResult(document: unknown): SearchResult {
  const parsed = documentSchema.safeParse(document);
  if (!parsed.success) {
    throw new UpstreamFailureError(
      `Vector index returned a malformed document (${formatZodError(parsed.error)})`,
    );
  }

  const name = parsed.data.name ?? '';
  return {
    name,
    description: parsed.data.description ?? '',
    readme: parsed.data.readme ?? '',
    packageUrl: packageUrlFor(name),
    repository: parsed.data.repository ?? '',
  };
}

async function closeSession(session: VectorIndexSession): Promise<void> {
  try {
    await session.close();
  } catch (err) {
    console.error('[semantic] Failed to close vector index session:', err);
  }
}

/**
 * Races `promise` against a timer. The underlying work is not cancelled;
 * it keeps running and settles on its own.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (timeoutMs <= 0) return promise;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new VectorIndexTimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
