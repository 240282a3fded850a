import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { assemble, toRecordResponse } from './response.js';
import {
  draftSchema,
  draftShape,
  searchShape,
  toDraft,
  toSearchRequest,
  type DraftInput,
  type SearchInput,
} from './schemas.js';
import type { RecordStore, SearchStrategy } from './types.js';

// ── Tool result helpers ────────────────────────────────────────────
// Returns plain objects compatible with the MCP SDK's CallToolResult
// (which requires an index signature [key: string]: unknown).

type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function success(data: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

function error(message: string): ToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Handler factories ──────────────────────────────────────────────
// Each factory closes over its dependencies, returning a handler the
// MCP server can invoke. This keeps tools testable without an MCP
// server instance.

export function handleCreateRecord(store: RecordStore) {
  return async (args: DraftInput): Promise<ToolResult> => {
    try {
      const record = await store.insert(toDraft(args));
      return success(toRecordResponse(record));
    } catch (err) {
      return error(`Failed to create record: ${describe(err)}`);
    }
  };
}

export function handleCreateRecordsBatch(store: RecordStore) {
  return async (args: { records: DraftInput[] }): Promise<ToolResult> => {
    try {
      const records = await store.insertBatch(args.records.map(toDraft));
      return success({ created: records.length, records: records.map(toRecordResponse) });
    } catch (err) {
      return error(`Failed to create records: ${describe(err)}`);
    }
  };
}

export function handleGetRecord(store: RecordStore) {
  return async (args: { id: string }): Promise<ToolResult> => {
    try {
      const record = await store.get(args.id);
      return success(toRecordResponse(record));
    } catch (err) {
      return error(`Get record failed: ${describe(err)}`);
    }
  };
}

export function handleListRecords(store: RecordStore) {
  return async (args: { limit?: number; offset?: number }): Promise<ToolResult> => {
    try {
      const records = await store.list(args.limit ?? 50, args.offset ?? 0);
      return success({ count: records.length, records: records.map(toRecordResponse) });
    } catch (err) {
      return error(`List records failed: ${describe(err)}`);
    }
  };
}

export function handleSearch(search: SearchStrategy) {
  return async (args: SearchInput): Promise<ToolResult> => {
    try {
      const request = toSearchRequest(args);
      const results = await search.search(request);
      return success(assemble(results, request.query));
    } catch (err) {
      return error(`Search failed: ${describe(err)}`);
    }
  };
}

// ── Registration ───────────────────────────────────────────────────

export function registerTools(server: McpServer, store: RecordStore, search: SearchStrategy): void {
  // ── Record tools ──

  server.tool(
    'create_record',
    'Create a package record from a title, content and optional URLs, tags and metadata. Returns the record with its generated ID and timestamps.',
    draftShape,
    handleCreateRecord(store),
  );

  server.tool(
    'create_records_batch',
    'Create up to 100 package records in one call. All records share one creation timestamp. Larger batches are rejected whole.',
    {
      records: z.array(draftSchema).describe('Records to create'),
    },
    handleCreateRecordsBatch(store),
  );

  server.tool(
    'get_record',
    'Fetch one package record by ID.',
    {
      id: z.string().describe('ID of the record'),
    },
    handleGetRecord(store),
  );

  server.tool(
    'list_records',
    'List package records, newest first, with offset pagination.',
    {
      limit: z.number().int().min(0).optional().describe('Max records to return (default 50)'),
      offset: z.number().int().min(0).optional().describe('Records to skip (default 0)'),
    },
    handleListRecords(store),
  );

  // ── Search tools ──

  server.tool(
    'search',
    `Search package records (${search.mode} mode). Returns name, description, readme, package URL and repository for each match.`,
    searchShape,
    handleSearch(search),
  );
}
