import type {
  PackageRecord,
  RecordResponse,
  SearchResponse,
  SearchResult,
  SearchResultResponse,
} from './types.js';

const PACKAGE_URL_TEMPLATE = 'https://crates.io/crates/{name}';

export function packageUrlFor(name: string): string {
  return PACKAGE_URL_TEMPLATE.replace('{name}', encodeURIComponent(name));
}

// ── Projections ────────────────────────────────────────────────────

export function toRecordResponse(record: PackageRecord): RecordResponse {
  return {
    id: record.id,
    title: record.title,
    content: record.content,
    repo_url: record.repoUrl ?? null,
    package_url: record.packageUrl ?? null,
    description: record.description ?? null,
    tags: [...record.tags],
    metadata: structuredClone(record.metadata),
    created_at: record.createdAt,
    updated_at: record.updatedAt,
  };
}

export function recordToSearchResult(record: PackageRecord): SearchResult {
  return {
    name: record.title,
    description: record.description ?? '',
    readme: record.content,
    packageUrl: record.packageUrl ?? packageUrlFor(record.title),
    repository: record.repoUrl ?? '',
  };
}

export function toSearchResultResponse(result: SearchResult): SearchResultResponse {
  return {
    name: result.name,
    description: result.description,
    readme: result.readme,
    package_url: result.packageUrl,
    repository: result.repository,
  };
}

/** Wraps already-truncated results; `total` is the count actually returned. */
export function assemble(results: SearchResult[], query: string): SearchResponse {
  return {
    results: results.map(toSearchResultResponse),
    total: results.length,
    query,
  };
}
