import { RetrievalError } from '../errors';
import type { ContextSnippet, ContextStore } from '../rag/schema';

const bySnippetRank = (a: ContextSnippet, b: ContextSnippet): number =>
  b.relevanceScore - a.relevanceScore || a.sourceId.localeCompare(b.sourceId);

export class ContextRetriever {
  constructor(private readonly store: ContextStore) {}

  get storeKind(): ContextStore['kind'] {
    return this.store.kind;
  }

  async retrieve(query: string, topK = 3): Promise<ContextSnippet[]> {
    if (!query.trim() || topK < 1) {
      return [];
    }

    let snippets: ContextSnippet[];

    try {
      snippets = await this.store.search(query, topK);
    } catch (error) {
      if (error instanceof RetrievalError) {
        throw error;
      }
      throw new RetrievalError('Context store is unavailable.', { store: this.store.kind }, { cause: error });
    }

    return snippets
      .filter((snippet) => Number.isFinite(snippet.relevanceScore))
      .sort(bySnippetRank)
      .slice(0, Math.trunc(topK));
  }
}
