import path from 'node:path';

import type { DocChunk, Namespace } from './schema';

export type ChunkingOptions = {
  /** Words per chunk. */
  windowSize: number;
  /** Words shared by consecutive chunks. */
  overlap: number;
};

export const DEFAULT_CHUNKING: ChunkingOptions = {
  windowSize: 1000,
  overlap: 200,
};

export const splitWords = (text: string): string[] => text.match(/\S+/g) ?? [];

/** Yields `[start, end)` word offsets of overlapping windows covering `total` words. */
export function* windows(total: number, { windowSize, overlap }: ChunkingOptions): Generator<[number, number]> {
  const step = Math.max(1, windowSize - overlap);

  for (let start = 0; start < total; start += step) {
    const end = Math.min(total, start + windowSize);
    yield [start, end];

    if (end === total) {
      return;
    }
  }
}

const NAMESPACE_HINTS: ReadonlyArray<readonly [RegExp, Namespace]> = [
  [/job/, 'job_description'],
  [/brief/, 'case_study_brief'],
  [/project/, 'project_rubric'],
  [/cv/, 'cv_rubric'],
];

export const namespaceFor = (filePath: string): Namespace => {
  const stem = path.parse(filePath).name.toLowerCase();
  const hint = NAMESPACE_HINTS.find(([pattern]) => pattern.test(stem));

  if (!hint) {
    throw new Error(`No namespace matches ${path.basename(filePath)}; include job, brief, project or cv in the name.`);
  }

  return hint[1];
};

const slugify = (fileName: string): string => fileName.replace(/[^a-zA-Z0-9]+/g, '_').toLowerCase() || 'doc';

export const chunkDocument = (
  namespace: Namespace,
  fileName: string,
  text: string,
  options: ChunkingOptions = DEFAULT_CHUNKING,
): DocChunk[] => {
  const words = splitWords(text);
  const slug = slugify(fileName);

  return Array.from(windows(words.length, options), ([start, end], index): DocChunk => ({
    id: `${namespace}_${slug}_${index + 1}`,
    namespace,
    content: words.slice(start, end).join(' '),
    metadata: { sourceFile: fileName, wordStart: start, wordEnd: end },
  }));
};
