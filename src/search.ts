import type { AppConfig } from './config.js';
import { LocalSearchStrategy } from './local-search.js';
import { SemanticSearchStrategy } from './semantic-search.js';
import type { RecordStore, SearchStrategy } from './types.js';
import { WeaviateVectorIndex } from './weaviate-index.js';

/** Picks the search strategy a deployment serves, per `SEARCH_MODE`. */
export function createSearchStrategy(config: AppConfig, store: RecordStore): SearchStrategy {
  switch (config.searchMode) {
    case 'local':
      return new LocalSearchStrategy(store);
    case 'semantic':
      return new SemanticSearchStrategy(new WeaviateVectorIndex(config.weaviate), {
        timeoutMs: config.semanticTimeoutMs,
      });
  }
}
