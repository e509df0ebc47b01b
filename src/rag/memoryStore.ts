import fs from 'node:fs/promises';
import { z } from 'zod';

import { RetrievalError } from '../errors';
import { type ContextSnippet, type ContextStore, type DocChunk, NAMESPACES } from './schema';

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'in', 'is', 'it', 'of', 'on', 'or',
  'the', 'to', 'with', 'we', 'you', 'our', 'will', 'this', 'that',
]);

export const tokenizeTerms = (text: string): string[] =>
  text
    .toLowerCase()
    .split(/[^a-z0-9+#]+/)
    .filter((term) => term.length > 1 && !STOP_WORDS.has(term));

type TermVector = Map<string, number>;

const toVector = (text: string): TermVector => {
  const vector: TermVector = new Map();

  for (const term of tokenizeTerms(text)) {
    vector.set(term, (vector.get(term) ?? 0) + 1);
  }

  return vector;
};

const magnitude = (vector: TermVector): number =>
  Math.sqrt(Array.from(vector.values()).reduce((sum, count) => sum + count * count, 0));

export const cosineSimilarity = (left: TermVector, right: TermVector): number => {
  const denominator = magnitude(left) * magnitude(right);

  if (denominator === 0) {
    return 0;
  }

  let dot = 0;
  for (const [term, count] of left) {
    dot += count * (right.get(term) ?? 0);
  }

  return dot / denominator;
};

type IndexedChunk = {
  chunk: DocChunk;
  vector: TermVector;
};

/**
 * Term-frequency cosine index kept in process memory. Used when no Chroma
 * server is configured and as the context store in tests.
 */
export class InMemoryContextStore implements ContextStore {
  readonly kind = 'memory' as const;

  private readonly chunksById = new Map<string, IndexedChunk>();

  constructor(chunks: DocChunk[] = []) {
    this.index(chunks);
  }

  private index(chunks: DocChunk[]): void {
    for (const chunk of chunks) {
      this.chunksById.set(chunk.id, { chunk, vector: toVector(chunk.content) });
    }
  }

  get size(): number {
    return this.chunksById.size;
  }

  async upsert(chunks: DocChunk[]): Promise<void> {
    this.index(chunks);
  }

  async search(text: string, topK: number): Promise<ContextSnippet[]> {
    if (!text.trim() || topK < 1) {
      return [];
    }

    const query = toVector(text);

    return Array.from(this.chunksById.values())
      .map<ContextSnippet>(({ chunk, vector }) => ({
        text: chunk.content,
        relevanceScore: cosineSimilarity(query, vector),
        sourceId: chunk.id,
        namespace: chunk.namespace,
      }))
      .filter((snippet) => snippet.relevanceScore > 0)
      .sort((a, b) => b.relevanceScore - a.relevanceScore || a.sourceId.localeCompare(b.sourceId))
      .slice(0, topK);
  }
}

const seedSchema = z.array(
  z.object({
    id: z.string().min(1),
    namespace: z.enum(NAMESPACES),
    content: z.string().min(1),
    metadata: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  }),
);

export const loadSeedChunks = async (filePath: string): Promise<DocChunk[]> => {
  let raw: unknown;

  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new RetrievalError(`Context seed file ${filePath} could not be read.`, { filePath }, { cause: error });
  }

  const parsed = seedSchema.safeParse(raw);

  if (!parsed.success) {
    throw new RetrievalError(`Context seed file ${filePath} is invalid.`, {
      filePath,
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }

  return parsed.data;
};
