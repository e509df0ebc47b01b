import { ChromaClient, type Collection } from 'chromadb';
import { OllamaEmbeddingFunction } from '@chroma-core/ollama';

import { RetrievalError } from '../errors';
import { type ContextSnippet, type ContextStore, type DocChunk, isNamespace } from './schema';

export type ChromaStoreOptions = {
  url: string;
  collection: string;
  embedUrl: string;
  embedModel: string;
  /** Chunks sent per upsert request. */
  batchSize?: number;
};

const DEFAULT_BATCH_SIZE = 64;

export type ChromaQueryRows = {
  ids: string[];
  documents: Array<string | null | undefined>;
  metadatas: Array<Record<string, unknown> | null | undefined>;
  distances: Array<number | null | undefined>;
};

export const normalizeScore = (distance: number | null | undefined): number => {
  if (typeof distance !== 'number' || Number.isNaN(distance)) {
    return 0;
  }

  return 1 / (1 + Math.max(distance, 0));
};

export const toSnippets = ({ ids, documents, metadatas, distances }: ChromaQueryRows): ContextSnippet[] =>
  ids
    .map<ContextSnippet>((id, index) => {
      const namespace = metadatas[index]?.namespace;

      return {
        sourceId: id,
        text: documents[index] ?? '',
        relevanceScore: normalizeScore(distances[index]),
        ...(isNamespace(namespace) && { namespace }),
      };
    })
    .filter((snippet) => snippet.text.trim().length > 0);

const toClientArgs = (url: string): { host: string; port?: number; ssl: boolean } => {
  const parsed = new URL(url);

  return {
    host: parsed.hostname,
    ssl: parsed.protocol === 'https:',
    ...(parsed.port ? { port: Number.parseInt(parsed.port, 10) } : {}),
  };
};

const sanitizeMetadata = (chunk: DocChunk): Record<string, string | number | boolean> => ({
  ...chunk.metadata,
  namespace: chunk.namespace,
});

export class ChromaContextStore implements ContextStore {
  readonly kind = 'chroma' as const;

  private readonly client: ChromaClient;

  private collectionPromise: Promise<Collection> | null = null;

  constructor(private readonly options: ChromaStoreOptions) {
    this.client = new ChromaClient(toClientArgs(options.url));
  }

  private getCollection(): Promise<Collection> {
    if (!this.collectionPromise) {
      const embeddingFunction = new OllamaEmbeddingFunction({
        url: this.options.embedUrl,
        model: this.options.embedModel,
      });

      this.collectionPromise = this.client
        .getOrCreateCollection({ name: this.options.collection, embeddingFunction })
        .catch((error: unknown) => {
          this.collectionPromise = null;
          throw error;
        });
    }

    return this.collectionPromise;
  }

  async upsert(chunks: DocChunk[]): Promise<void> {
    if (!chunks.length) {
      return;
    }

    const batchSize = Math.max(1, this.options.batchSize ?? DEFAULT_BATCH_SIZE);

    try {
      const collection = await this.getCollection();

      for (let offset = 0; offset < chunks.length; offset += batchSize) {
        const batch = chunks.slice(offset, offset + batchSize);
        await collection.upsert({
          ids: batch.map((chunk) => chunk.id),
          documents: batch.map((chunk) => chunk.content),
          metadatas: batch.map(sanitizeMetadata),
        });
      }
    } catch (error) {
      throw new RetrievalError('Failed to upsert chunks into Chroma.', { collection: this.options.collection }, {
        cause: error,
      });
    }
  }

  async search(text: string, topK: number): Promise<ContextSnippet[]> {
    if (!text.trim() || topK < 1) {
      return [];
    }

    try {
      const collection = await this.getCollection();
      const result = await collection.query({
        queryTexts: [text],
        nResults: topK,
      });

      return toSnippets({
        ids: result.ids[0] ?? [],
        documents: result.documents[0] ?? [],
        metadatas: result.metadatas[0] ?? [],
        distances: result.distances[0] ?? [],
      });
    } catch (error) {
      throw new RetrievalError('Context store query failed.', { collection: this.options.collection }, {
        cause: error,
      });
    }
  }
}
