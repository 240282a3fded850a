// ── Metadata ───────────────────────────────────────────────────────

export type MetadataValue = string | number | boolean | MetadataMap;

export interface MetadataMap {
  [key: string]: MetadataValue;
}

// ── Domain objects ─────────────────────────────────────────────────

export interface PackageRecord {
  id: string;
  title: string;
  content: string;
  repoUrl?: string;
  packageUrl?: string;
  description?: string;
  tags: string[];
  metadata: MetadataMap;
  createdAt: string;
  updatedAt: string;
}

/** Display-oriented view shared by local and semantic search. */
export interface SearchResult {
  name: string;
  description: string;
  readme: string;
  packageUrl: string;
  repository: string;
}

// ── Request shapes ─────────────────────────────────────────────────

export interface RecordDraft {
  title: string;
  content: string;
  repoUrl?: string;
  packageUrl?: string;
  description?: string;
  tags?: string[];
  metadata?: MetadataMap;
}

export interface SearchRequest {
  query: string;
  limit?: number;
  tags?: string[];
}

export const SEARCH_MODES = ['semantic', 'local'] as const;

export type SearchMode = (typeof SEARCH_MODES)[number];

// ── Wire projections ───────────────────────────────────────────────

export interface RecordResponse {
  id: string;
  title: string;
  content: string;
  repo_url: string | null;
  package_url: string | null;
  description: string | null;
  tags: string[];
  metadata: MetadataMap;
  created_at: string;
  updated_at: string;
}

export interface SearchResultResponse {
  name: string;
  description: string;
  readme: string;
  package_url: string;
  repository: string;
}

export interface SearchResponse {
  results: SearchResultResponse[];
  total: number;
  query: string;
}

// ── Dependency interfaces ──────────────────────────────────────────

export interface RecordStore {
  initialize(): Promise<void>;
  insert(draft: RecordDraft): Promise<PackageRecord>;
  insertBatch(drafts: RecordDraft[]): Promise<PackageRecord[]>;
  get(id: string): Promise<PackageRecord>;
  list(limit: number, offset: number): Promise<PackageRecord[]>;
  count(): Promise<number>;
  snapshot(): Promise<PackageRecord[]>;
}

export interface SearchStrategy {
  readonly mode: SearchMode;
  search(request: SearchRequest): Promise<SearchResult[]>;
}

/**
 * One request-scoped connection to the external vector index.
 * `nearText` returns the raw property bags of the nearest documents;
 * callers validate them.
 */
export interface VectorIndexSession {
  nearText(query: string, limit?: number): Promise<unknown[]>;
  close(): Promise<void>;
}

export interface VectorIndex {
  connect(): Promise<VectorIndexSession>;
}
