import { ConfigurationError } from './errors.js';
import { SEARCH_MODES, type SearchMode } from './types.js';

export const TRANSPORTS = ['http', 'stdio'] as const;

export type Transport = (typeof TRANSPORTS)[number];

export interface AppConfig {
  transport: Transport;
  port: number;
  host: string;
  searchMode: SearchMode;
  weaviate: {
    url?: string;
    apiKey?: string;
    collection: string;
  };
  semanticTimeoutMs: number;
}

const DEFAULT_PORT = 8080;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    transport: parseChoice('TRANSPORT', env.TRANSPORT, TRANSPORTS, 'http'),
    port: parsePort(env.PORT),
    host: nonEmpty(env.HOST) ?? '0.0.0.0',
    searchMode: parseChoice('SEARCH_MODE', env.SEARCH_MODE, SEARCH_MODES, 'semantic'),
    weaviate: {
      url: nonEmpty(env.WEAVIATE_URL),
      apiKey: nonEmpty(env.WEAVIATE_API_KEY),
      collection: nonEmpty(env.WEAVIATE_COLLECTION) ?? 'crates',
    },
    semanticTimeoutMs: parseTimeout(env.SEMANTIC_SEARCH_TIMEOUT_MS),
  };
}

// ── Parsers ────────────────────────────────────────────────────────

export function parsePort(value: string | undefined): number {
  if (value == null || value === '') return DEFAULT_PORT;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    throw new ConfigurationError(`PORT must be an integer between 0 and 65535, got "${value}"`);
  }
  return parsed;
}

/** Unset, non-numeric, zero or negative values all mean "no timeout". */
export function parseTimeout(value: string | undefined): number {
  if (value == null) return 0;
  const parsed = Number(value);
  if (isNaN(parsed) || parsed <= 0) return 0;
  return parsed;
}

export function parseChoice<T extends string>(
  name: string,
  value: string | undefined,
  choices: readonly T[],
  fallback: T,
): T {
  const normalised = nonEmpty(value)?.toLowerCase();
  if (normalised === undefined) return fallback;
  const match = choices.find(choice => choice === normalised);
  if (match === undefined) {
    throw new ConfigurationError(`${name} must be one of ${choices.join(', ')}, got "${value}"`);
  }
  return match;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
