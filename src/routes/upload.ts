import path from 'node:path';
import { Router } from 'express';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';

import { ValidationError } from '../errors';
import { loggers } from '../logger';
import { type FileStore, SUPPORTED_EXTENSIONS } from '../store/files';
import type { UploadedFile, UploadResponse } from '../types';

export type UploadRouterOptions = {
  fileStore: FileStore;
  maxUploadBytes: number;
};

const UPLOAD_FIELDS = [
  { name: 'cv', prefix: 'cv' },
  { name: 'project_report', prefix: 'pr' },
] as const;

const isSupportedFile = (fileName: string): boolean => {
  const extension = path.extname(fileName).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
};

const safeFileName = (fileName: string): string => path.basename(fileName).replace(/[^a-zA-Z0-9._-]+/g, '_');

export const createUploadRouter = ({ fileStore, maxUploadBytes }: UploadRouterOptions): Router => {
  const router = Router();

  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      cb(null, fileStore.filesDir);
    },
    filename: (_req, file, cb) => {
      cb(null, `${Date.now()}-${safeFileName(file.originalname)}`);
    },
  });

  const upload = multer({
    storage,
    limits: { fileSize: maxUploadBytes, files: UPLOAD_FIELDS.length },
    fileFilter: (_req, file, cb) => {
      if (!isSupportedFile(file.originalname)) {
        cb(
          new ValidationError('Unsupported file type.', [
            {
              path: file.fieldname,
              message: `${file.originalname} must be one of ${SUPPORTED_EXTENSIONS.join(', ')}`,
            },
          ]),
        );
        return;
      }
      cb(null, true);
    },
  });

  router.post(
    '/',
    upload.fields(UPLOAD_FIELDS.map(({ name }) => ({ name, maxCount: 1 }))),
    (req, res, next) => {
      const files: Record<string, Express.Multer.File[]> = req.files && !Array.isArray(req.files) ? req.files : {};

      if (!files.cv?.[0]) {
        next(new ValidationError('A cv file is required.', [{ path: 'cv', message: 'cv file is required' }]));
        return;
      }

      const uploaded: UploadedFile[] = [];

      for (const { name, prefix } of UPLOAD_FIELDS) {
        const file = files[name]?.[0];

        if (!file) {
          continue;
        }

        const id = `${prefix}_${uuidv4()}`;

        fileStore.save({
          id,
          name: file.originalname,
          path: path.resolve(file.path),
          mimeType: file.mimetype,
          size: file.size,
        });
        uploaded.push({ id, name: file.originalname, kind: name });
      }

      loggers.files.info({ files: uploaded }, 'Files uploaded.');

      const body: UploadResponse = { files: uploaded };
      res.json(body);
    },
  );

  return router;
};
