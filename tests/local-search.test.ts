import { describe, it, expect, beforeEach } from 'vitest';
import {
  LocalSearchStrategy,
  clampLimit,
  matchesQuery,
  matchesTags,
  searchRecords,
} from '../src/local-search.js';
import { InMemoryRecordStore } from '../src/record-store.js';
import type { PackageRecord } from '../src/types.js';
import { ManualClock } from './mocks.js';

function record(overrides: Partial<PackageRecord>): PackageRecord {
  return {
    id: 'id',
    title: '',
    content: '',
    tags: [],
    metadata: {},
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

// ── Predicates ─────────────────────────────────────────────────────

describe('matchesQuery', () => {
  const parser = record({ title: 'Rusty Parser', content: 'Parses things', tags: ['Syntax'] });

  it('matches the title case-insensitively', () => {
    expect(matchesQuery(parser, 'parser')).toBe(true);
    expect(matchesQuery(parser, 'RUSTY')).toBe(true);
  });

  it('does not match unrelated text', () => {
    expect(matchesQuery(parser, 'database')).toBe(false);
  });

  it('matches content and tags', () => {
    expect(matchesQuery(parser, 'things')).toBe(true);
    expect(matchesQuery(parser, 'synt')).toBe(true);
  });
});

describe('matchesTags', () => {
  const cli = record({ tags: ['rust', 'cli'] });

  it('passes when any requested tag overlaps', () => {
    expect(matchesTags(cli, ['cli', 'web'])).toBe(true);
  });

  it('fails when no requested tag overlaps', () => {
    expect(matchesTags(cli, ['web', 'db'])).toBe(false);
  });

  it('passes everything without a filter', () => {
    expect(matchesTags(cli, [])).toBe(true);
    expect(matchesTags(cli, undefined)).toBe(true);
  });

  it('compares tags exactly', () => {
    expect(matchesTags(cli, ['CLI'])).toBe(false);
  });
});

describe('clampLimit', () => {
  it('caps the limit at 100', () => {
    expect(clampLimit(500)).toBe(100);
    expect(clampLimit(7)).toBe(7);
  });
});

// ── searchRecords ──────────────────────────────────────────────────

describe('searchRecords', () => {
  it('requires both the text and the tag predicate', () => {
    const records = [
      record({ id: 'a', title: 'tokio-rt', tags: ['async'] }),
      record({ id: 'b', title: 'tokio-cli', tags: ['cli'] }),
      record({ id: 'c', title: 'clap', tags: ['cli'] }),
    ];

    const results = searchRecords(records, 'tokio', 10, ['cli']);
    expect(results.map(r => r.id)).toEqual(['b']);
  });

  it('returns at most 100 results when asked for 500', () => {
    const records = Array.from({ length: 150 }, (_, i) => record({ id: `r${i}`, title: 'match' }));
    expect(searchRecords(records, 'match', 500)).toHaveLength(100);
  });

  it('returns an empty array when nothing matches', () => {
    expect(searchRecords([record({ title: 'serde' })], 'tokio', 10)).toEqual([]);
  });
});

// ── LocalSearchStrategy ────────────────────────────────────────────

describe('LocalSearchStrategy', () => {
  let store: InMemoryRecordStore;
  let strategy: LocalSearchStrategy;

  beforeEach(() => {
    store = new InMemoryRecordStore({ now: new ManualClock().now });
    strategy = new LocalSearchStrategy(store);
  });

  it('returns the newest match first', async () => {
    await store.insert({ title: 'tokio-rt', content: 'runtime' });
    await store.insert({ title: 'tokio-cli', content: 'command line' });

    const results = await strategy.search({ query: 'tokio', limit: 10, tags: [] });
    expect(results.map(r => r.name)).toEqual(['tokio-cli', 'tokio-rt']);
  });

  it('projects records into search results', async () => {
    await store.insert({
      title: 'serde',
      content: 'Serialization framework',
      description: 'A serializer',
      repoUrl: 'https://example.com/serde',
    });
    await store.insert({
      title: 'own-listing',
      content: 'Has its own listing',
      packageUrl: 'https://example.com/own-listing',
    });

    const [withListing, serde] = await strategy.search({ query: 's' });
    expect(serde).toEqual({
      name: 'serde',
      description: 'A serializer',
      readme: 'Serialization framework',
      packageUrl: 'https://crates.io/crates/serde',
      repository: 'https://example.com/serde',
    });
    expect(withListing).toEqual({
      name: 'own-listing',
      description: '',
      readme: 'Has its own listing',
      packageUrl: 'https://example.com/own-listing',
      repository: '',
    });
  });

  it('defaults the limit to 10', async () => {
    await store.insertBatch(Array.from({ length: 12 }, (_, i) => ({ title: `pkg-${i}`, content: '' })));

    expect(await strategy.search({ query: 'pkg' })).toHaveLength(10);
  });
});
