import { sortNewestFirst } from './record-store.js';
import { recordToSearchResult } from './response.js';
import type {
  PackageRecord,
  RecordStore,
  SearchRequest,
  SearchResult,
  SearchStrategy,
} from './types.js';

export const MAX_SEARCH_LIMIT = 100;
export const DEFAULT_SEARCH_LIMIT = 10;

// ── Predicates ─────────────────────────────────────────────────────

export function matchesQuery(record: PackageRecord, query: string): boolean {
  const needle = query.toLowerCase();
  return (
    record.title.toLowerCase().includes(needle) ||
    record.content.toLowerCase().includes(needle) ||
    record.tags.some(tag => tag.toLowerCase().includes(needle))
  );
}

/** OR semantics: any shared tag passes. No filter passes everything. */
export function matchesTags(record: PackageRecord, tags: string[] | undefined): boolean {
  if (!tags || tags.length === 0) return true;
  return tags.some(tag => record.tags.includes(tag));
}

export function clampLimit(limit: number): number {
  return Math.min(limit, MAX_SEARCH_LIMIT);
}

/**
 * Substring and tag matching over every record, newest first, truncated
 * to the clamped limit.
 */
export function searchRecords(
  records: PackageRecord[],
  query: string,
  limit: number,
  tags?: string[],
): PackageRecord[] {
  const matches = records.filter(r => matchesQuery(r, query) && matchesTags(r, tags));
  return sortNewestFirst(matches).slice(0, Math.max(0, clampLimit(limit)));
}

// ── LocalSearchStrategy ────────────────────────────────────────────

export class LocalSearchStrategy implements SearchStrategy {
  readonly mode = 'local' as const;

  constructor(private readonly store: RecordStore) {}

  async search(request: SearchRequest): Promise<SearchResult[]> {
    const records = await this.store.snapshot();
    return searchRecords(
      records,
      request.query,
      request.limit ?? DEFAULT_SEARCH_LIMIT,
      request.tags,
    ).map(recordToSearchResult);
  }
}
