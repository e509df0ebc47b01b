import 'dotenv/config';

import fs from 'node:fs';
import path from 'node:path';

import { type AppConfig, loadConfig } from '../src/config';
import { createComponentLogger, serializeError } from '../src/logger';
import { extractFromBuffer } from '../src/pipeline/extract';
import { chunkDocument, namespaceFor } from '../src/rag/chunking';
import { ChromaContextStore } from '../src/rag/client';
import type { DocChunk } from '../src/rag/schema';
import { SUPPORTED_EXTENSIONS } from '../src/store/files';

const DOCS_DIR = path.resolve('docs');

const log = createComponentLogger('ingest');

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

const listReferenceFiles = async (): Promise<string[]> => {
  const entries = await fs.promises.readdir(DOCS_DIR, { withFileTypes: true });

  return entries
    .filter(
      (entry) =>
        entry.isFile() &&
        SUPPORTED_EXTENSIONS.some((extension) => entry.name.toLowerCase().endsWith(extension)),
    )
    .map((entry) => path.join(DOCS_DIR, entry.name))
    .sort();
};

const collectChunks = async (filePaths: string[]): Promise<DocChunk[]> => {
  const perFile = await Promise.all(
    filePaths.map(async (filePath) => {
      const fileName = path.basename(filePath);
      const text = await extractFromBuffer(await fs.promises.readFile(filePath), path.extname(filePath));
      const chunks = chunkDocument(namespaceFor(filePath), fileName, text);

      if (!chunks.length) {
        log.warn({ fileName }, 'No chunks generated.');
      }

      return chunks;
    }),
  );

  return perFile.flat();
};

const publishChunks = async (config: AppConfig, chunks: DocChunk[]): Promise<void> => {
  if (config.context.store === 'chroma') {
    await new ChromaContextStore(config.context.chroma).upsert(chunks);
    log.info({ chunks: chunks.length, collection: config.context.chroma.collection }, 'Upserted chunks to Chroma.');
    return;
  }

  const seedPath = path.resolve(config.context.seedPath);
  await fs.promises.mkdir(path.dirname(seedPath), { recursive: true });
  await fs.promises.writeFile(seedPath, `${JSON.stringify(chunks, null, 2)}\n`);
  log.info({ chunks: chunks.length, seedPath }, 'Wrote in-memory context seed.');
};

const main = async (): Promise<void> => {
  const config = loadConfig();

  let filePaths: string[];
  try {
    filePaths = await listReferenceFiles();
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new Error('docs directory not found. Add reference documents to ./docs before running ingest.');
    }
    throw error;
  }

  if (!filePaths.length) {
    log.warn('No reference documents found in ./docs. Nothing to ingest.');
    return;
  }

  log.info({ files: filePaths.length }, 'Extracting reference documents.');
  const chunks = await collectChunks(filePaths);

  if (!chunks.length) {
    log.warn('No chunks generated. Nothing to publish.');
    return;
  }

  await publishChunks(config, chunks);
};

main().catch((error: unknown) => {
  log.error({ err: serializeError(error) }, 'Ingest failed.');
  process.exitCode = 1;
});
