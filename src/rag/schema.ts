export const NAMESPACES = ['job_description', 'case_study_brief', 'cv_rubric', 'project_rubric'] as const;

export type Namespace = (typeof NAMESPACES)[number];

export interface DocChunk {
  id: string;
  namespace: Namespace;
  content: string;
  metadata?: Record<string, string | number | boolean>;
}

export interface ContextSnippet {
  text: string;
  relevanceScore: number;
  sourceId: string;
  namespace?: Namespace;
}

export interface ContextStore {
  readonly kind: 'memory' | 'chroma';
  search(text: string, topK: number): Promise<ContextSnippet[]>;
  upsert(chunks: DocChunk[]): Promise<void>;
}

export const isNamespace = (value: unknown): value is Namespace =>
  NAMESPACES.some((namespace) => namespace === value);
