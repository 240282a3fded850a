import { BatchTooLargeError, NotFoundError } from './errors.js';
import type { MetadataMap, PackageRecord, RecordDraft, RecordStore } from './types.js';

export const MAX_BATCH_SIZE = 100;

export interface InMemoryRecordStoreOptions {
  now?: () => Date;
  generateId?: () => string;
}

// ── InMemoryRecordStore ────────────────────────────────────────────
//
// Process-local repository keyed by record id. None of the methods
// await between reading and writing the map, so on the event loop every
// mutation is serialised and each read sees a consistent view.
// Records never leave the store by reference: every return is a copy.

export class InMemoryRecordStore implements RecordStore {
  private readonly records = new Map<string, PackageRecord>();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: InMemoryRecordStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
  }

  async initialize(): Promise<void> {}

  // ── Storage ────────────────────────────────────────────────────

  async insert(draft: RecordDraft): Promise<PackageRecord> {
    const timestamp = this.now().toISOString();
    const [record] = this.commit([toRecord(draft, this.freshId(new Set()), timestamp)]);
    return record;
  }

  async insertBatch(drafts: RecordDraft[]): Promise<PackageRecord[]> {
    if (drafts.length > MAX_BATCH_SIZE) {
      throw new BatchTooLargeError(MAX_BATCH_SIZE);
    }
    if (drafts.length === 0) return [];

    const timestamp = this.now().toISOString();
    const reserved = new Set<string>();
    const rows = drafts.map(draft => {
      const id = this.freshId(reserved);
      reserved.add(id);
      return toRecord(draft, id, timestamp);
    });
    return this.commit(rows);
  }

  // ── Reads ──────────────────────────────────────────────────────

  async get(id: string): Promise<PackageRecord> {
    const record = this.records.get(id);
    if (!record) throw new NotFoundError();
    return copyRecord(record);
  }

  async list(limit: number, offset: number): Promise<PackageRecord[]> {
    const start = Math.max(0, offset);
    return sortNewestFirst([...this.records.values()])
      .slice(start, start + Math.max(0, limit))
      .map(copyRecord);
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async snapshot(): Promise<PackageRecord[]> {
    return [...this.records.values()].map(copyRecord);
  }

  // ── Private ────────────────────────────────────────────────────

  /**
   * Generates an id that is neither stored nor reserved by the batch in
   * progress. A generator that keeps colliding is a fault, not something
   * to paper over by overwriting.
   */
  private freshId(reserved: Set<string>): string {
    const id = this.generateId();
    if (this.records.has(id) || reserved.has(id)) {
      throw new Error(`Record id ${id} is already in use`);
    }
    return id;
  }

  private commit(rows: PackageRecord[]): PackageRecord[] {
    for (const row of rows) {
      this.records.set(row.id, row);
    }
    return rows.map(copyRecord);
  }
}

// ── Pure functions ─────────────────────────────────────────────────

function toRecord(draft: RecordDraft, id: string, timestamp: string): PackageRecord {
  const record: PackageRecord = {
    id,
    title: draft.title,
    content: draft.content,
    tags: [...(draft.tags ?? [])],
    metadata: cloneMetadata(draft.metadata ?? {}),
    createdAt: timestamp,
    updatedAt: timestamp,
  };
  if (draft.repoUrl !== undefined) record.repoUrl = draft.repoUrl;
  if (draft.packageUrl !== undefined) record.packageUrl = draft.packageUrl;
  if (draft.description !== undefined) record.description = draft.description;
  return record;
}

export function copyRecord(record: PackageRecord): PackageRecord {
  return { ...record, tags: [...record.tags], metadata: cloneMetadata(record.metadata) };
}

function cloneMetadata(metadata: MetadataMap): MetadataMap {
  return structuredClone(metadata);
}

/** Newest first; `Array.prototype.sort` is stable, so ties keep insertion order. */
export function sortNewestFirst<T extends { createdAt: string }>(items: T[]): T[] {
  return [...items].sort((a, b) => compareTimestamps(b.createdAt, a.createdAt));
}

function compareTimestamps(a: string, b: string): number {
  return Date.parse(a) - Date.parse(b);
}
