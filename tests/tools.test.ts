import { describe, it, expect, beforeEach } from 'vitest';
import {
  handleCreateRecord,
  handleCreateRecordsBatch,
  handleGetRecord,
  handleListRecords,
  handleSearch,
} from '../src/tools.js';
import { InMemoryRecordStore } from '../src/record-store.js';
import { LocalSearchStrategy } from '../src/local-search.js';
import { ManualClock } from './mocks.js';

// ── Helpers ────────────────────────────────────────────────────────

function parseResult(result: { content: Array<{ type: string; text: string }>; isError?: boolean }) {
  return JSON.parse(result.content[0].text);
}

// ── Tests ──────────────────────────────────────────────────────────

describe('create_record', () => {
  let store: InMemoryRecordStore;

  beforeEach(() => {
    store = new InMemoryRecordStore({ now: new ManualClock().now });
  });

  it('creates a record and returns it with all fields', async () => {
    const handler = handleCreateRecord(store);
    const result = await handler({
      title: 'rayon',
      content: 'Data parallelism library',
      tags: ['parallel'],
      description: null,
    });

    expect(result.isError).toBeUndefined();
    const record = parseResult(result);
    expect(record.title).toBe('rayon');
    expect(record.tags).toEqual(['parallel']);
    expect(record.description).toBeNull();
    expect(record.created_at).toBe('2024-01-01T00:00:00.000Z');
    expect(await store.count()).toBe(1);
  });
});

describe('create_records_batch', () => {
  let store: InMemoryRecordStore;

  beforeEach(() => {
    store = new InMemoryRecordStore();
  });

  it('creates multiple records in one call', async () => {
    const handler = handleCreateRecordsBatch(store);
    const result = await handler({
      records: [
        { title: 'one', content: 'first' },
        { title: 'two', content: 'second' },
      ],
    });

    const data = parseResult(result);
    expect(data.created).toBe(2);
    expect(data.records).toHaveLength(2);
  });

  it('reports an oversized batch as an error', async () => {
    const handler = handleCreateRecordsBatch(store);
    const records = Array.from({ length: 101 }, (_, i) => ({ title: `t${i}`, content: '' }));
    const result = await handler({ records });

    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe(
      'Failed to create records: Batch size cannot exceed 100 records',
    );
    expect(await store.count()).toBe(0);
  });
});

describe('get_record', () => {
  it('errors on an unknown id', async () => {
    const handler = handleGetRecord(new InMemoryRecordStore());
    const result = await handler({ id: 'nonexistent' });

    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe('Get record failed: Record not found');
  });
});

describe('list_records', () => {
  it('returns records newest first', async () => {
    const store = new InMemoryRecordStore({ now: new ManualClock().now });
    await store.insert({ title: 'old', content: '' });
    await store.insert({ title: 'new', content: '' });

    const data = parseResult(await handleListRecords(store)({}));
    expect(data.count).toBe(2);
    expect(data.records.map((r: { title: string }) => r.title)).toEqual(['new', 'old']);
  });
});

describe('search', () => {
  it('returns the assembled search response', async () => {
    const store = new InMemoryRecordStore();
    await store.insert({ title: 'Rusty Parser', content: 'parses', tags: ['rust', 'cli'] });
    const handler = handleSearch(new LocalSearchStrategy(store));

    const data = parseResult(await handler({ query: 'parser', tags: ['cli', 'web'] }));
    expect(data.total).toBe(1);
    expect(data.query).toBe('parser');
    expect(data.results[0].name).toBe('Rusty Parser');
  });

  it('returns no results when the tags do not overlap', async () => {
    const store = new InMemoryRecordStore();
    await store.insert({ title: 'Rusty Parser', content: 'parses', tags: ['rust', 'cli'] });
    const handler = handleSearch(new LocalSearchStrategy(store));

    const data = parseResult(await handler({ query: 'parser', tags: ['web', 'db'] }));
    expect(data).toEqual({ results: [], total: 0, query: 'parser' });
  });
});
