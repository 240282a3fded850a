import weaviate, { type WeaviateClient } from 'weaviate-client';
import { ConfigurationError } from './errors.js';
import type { VectorIndex, VectorIndexSession } from './types.js';

export interface WeaviateIndexConfig {
  url?: string;
  apiKey?: string;
  collection: string;
}

type PackageProperties = {
  name: string;
  description: string;
  readme: string;
  repository: string;
};

const RETURN_PROPERTIES = ['name', 'description', 'readme', 'repository'] as const;

// ── WeaviateVectorIndex ────────────────────────────────────────────
// Connects to a Weaviate Cloud cluster per session. Credentials are
// checked on every connect, so a misconfigured deployment fails the
// request instead of the process.

export class WeaviateVectorIndex implements VectorIndex {
  constructor(private readonly config: WeaviateIndexConfig) {}

  async connect(): Promise<VectorIndexSession> {
    const { url, apiKey, collection } = this.config;
    if (!url || !apiKey) {
      throw new ConfigurationError(
        'Semantic search is not configured: WEAVIATE_URL and WEAVIATE_API_KEY are required',
      );
    }

    const client = await weaviate.connectToWeaviateCloud(url, {
      authCredentials: new weaviate.ApiKey(apiKey),
    });
    return new WeaviateSession(client, collection);
  }
}

class WeaviateSession implements VectorIndexSession {
  constructor(
    private readonly client: WeaviateClient,
    private readonly collection: string,
  ) {}

  async nearText(query: string, limit?: number): Promise<unknown[]> {
    const packages = this.client.collections.get<PackageProperties>(this.collection);
    const response = await packages.query.nearText(query, {
      limit,
      returnProperties: [...RETURN_PROPERTIES],
    });
    return response.objects.map(object => object.properties);
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
