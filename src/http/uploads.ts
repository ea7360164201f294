import multer from 'multer';

import { AppError } from '../errors/app-error.js';
import type { UploadedFile } from '../services/hr-portal-service.js';

export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

export const memoryUpload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 }
});

export function requireUploadedFile(file: Express.Multer.File | undefined, field: string): UploadedFile {
  if (file === undefined || file.originalname.length === 0) {
    throw new AppError(400, 'UPLOAD_MISSING', `Missing '${field}' file.`);
  }

  return {
    originalName: file.originalname,
    mimeType: file.mimetype.length > 0 ? file.mimetype : 'application/octet-stream',
    content: file.buffer
  };
}
