import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';

export const SUPPORTED_EXTENSIONS = ['.pdf', '.docx', '.txt', '.md'] as const;

const fileMetadataSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  path: z.string().min(1),
  mimeType: z.string(),
  size: z.number().int().min(0),
});

export type FileMetadata = z.infer<typeof fileMetadataSchema>;

/**
 * Metadata for uploaded files, mirrored to `<dataDir>/files.json` so ids
 * handed out by the upload endpoint stay resolvable across restarts.
 */
export class FileStore {
  private readonly filesById = new Map<string, FileMetadata>();

  private readonly storePath: string;

  readonly filesDir: string;

  constructor(
    private readonly dataDir: string,
    private readonly log: Logger,
  ) {
    this.storePath = path.join(dataDir, 'files.json');
    this.filesDir = path.join(dataDir, 'files');
    fs.mkdirSync(this.filesDir, { recursive: true });
    this.loadFromDisk();
  }

  private loadFromDisk(): void {
    if (!fs.existsSync(this.storePath)) {
      return;
    }

    try {
      const raw = fs.readFileSync(this.storePath, 'utf-8');
      if (!raw.trim()) {
        return;
      }

      const parsed: unknown = JSON.parse(raw);
      const entries: unknown[] = Array.isArray(parsed) ? parsed : [];

      entries.forEach((entry) => {
        const result = fileMetadataSchema.safeParse(entry);
        if (result.success) {
          this.filesById.set(result.data.id, result.data);
        }
      });
    } catch (error) {
      this.log.error({ err: error, storePath: this.storePath }, 'Failed to load file store from disk.');
    }
  }

  private persist(): void {
    fs.mkdirSync(this.dataDir, { recursive: true });
    const payload = JSON.stringify(Array.from(this.filesById.values()), null, 2);
    fs.writeFileSync(this.storePath, payload);
  }

  save(meta: FileMetadata): void {
    this.filesById.set(meta.id, meta);
    try {
      this.persist();
    } catch (error) {
      this.log.error({ err: error, fileId: meta.id }, 'Failed to persist file store.');
    }
  }

  get(id: string): FileMetadata | undefined {
    return this.filesById.get(id);
  }
}
