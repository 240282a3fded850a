#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { runHttpServer } from './http-server.js';
import { InMemoryRecordStore } from './record-store.js';
import { createSearchStrategy } from './search.js';
import { createServer } from './server.js';
import type { RecordStore } from './types.js';

async function main(): Promise<void> {
  const config = loadConfig();

  // ── Compose dependencies ──
  const store: RecordStore = new InMemoryRecordStore();

  const search = createSearchStrategy(config, store);

  if (search.mode === 'semantic' && (!config.weaviate.url || !config.weaviate.apiKey)) {
    console.error('[startup] WEAVIATE_URL or WEAVIATE_API_KEY not set; search requests will fail');
  }

  await store.initialize();

  // ── Start transport ──
  if (config.transport === 'stdio') {
    const server = createServer(store, search);
    await server.connect(new StdioServerTransport());
    return;
  }

  await runHttpServer({ store, search, port: config.port, host: config.host });
}

main().catch((err) => {
  console.error('Fatal:', err);
  process.exit(1);
});
