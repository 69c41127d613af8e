// Search index factory — selects the backend from MY_FINANCE_INDEX_BACKEND
// Supported values: 'local' (default), 'postgres'

import type { SearchIndex } from '../search/search-index.js';
import type { LedgerSettings } from './settings.js';

/**
 * Open the search index for the configured backend.
 * - `local`: LocalSearchIndex (JSON collection inside the index directory)
 * - `postgres`: PgSearchIndex (ruvector-postgres + agentic-flow embeddings)
 */
export async function createSearchIndex(settings: LedgerSettings): Promise<SearchIndex> {
  switch (settings.indexBackend) {
    case 'postgres': {
      const { PgSearchIndex } = await import('../search/pg-search-index.js');
      return new PgSearchIndex({ collection: settings.collection });
    }
    case 'local':
    default: {
      const { LocalSearchIndex } = await import('../search/local-search-index.js');
      return new LocalSearchIndex(settings.indexDir, settings.collection);
    }
  }
}
