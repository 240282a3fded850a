import { z } from 'zod';
import type { MetadataValue, RecordDraft, SearchRequest } from './types.js';

// ── Zod schemas ────────────────────────────────────────────────────
// Shared by the HTTP routes and the MCP tools. Optional fields accept
// null as well as absence; both mean "not given".

export const metadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.record(z.string(), metadataValueSchema)]),
);

export const metadataSchema = z
  .record(z.string(), metadataValueSchema)
  .describe('Open key/value metadata; values are strings, numbers, booleans or nested maps');

const tagsSchema = z.array(z.string()).describe('Free-form tags');

export const draftShape = {
  title: z.string().describe('Package name or record title'),
  content: z.string().describe('README or other body text'),
  repo_url: z.string().nullish().describe('Source repository URL'),
  package_url: z.string().nullish().describe('Package listing URL'),
  description: z.string().nullish().describe('Short description'),
  tags: tagsSchema.nullish(),
  metadata: metadataSchema.nullish(),
};

export const draftSchema = z.object(draftShape);

export type DraftInput = z.infer<typeof draftSchema>;

export const batchSchema = z.array(draftSchema);

export const searchShape = {
  query: z.string().describe('Free-text query'),
  limit: z.number().int().min(0).nullish().describe('Maximum number of results'),
  tags: tagsSchema.nullish().describe('Local search only: record must have at least one of these tags'),
};

export const searchBodySchema = z.object(searchShape);

export type SearchInput = z.infer<typeof searchBodySchema>;

export const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(0).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export const searchQuerySchema = z.object({
  query: z.string(),
  limit: z.coerce.number().int().min(0).optional(),
});

// ── Conversions ────────────────────────────────────────────────────

export function toDraft(input: DraftInput): RecordDraft {
  return {
    title: input.title,
    content: input.content,
    repoUrl: input.repo_url ?? undefined,
    packageUrl: input.package_url ?? undefined,
    description: input.description ?? undefined,
    tags: input.tags ?? [],
    metadata: input.metadata ?? {},
  };
}

export function toSearchRequest(input: SearchInput): SearchRequest {
  return {
    query: input.query,
    limit: input.limit ?? undefined,
    tags: input.tags ?? undefined,
  };
}
