import { InvalidInputError } from './errors.js';

export const ALLOWED_CONTENT_TYPES: ReadonlySet<string> = new Set([
  'image/jpeg',
  'image/jpg',
  'image/png',
  'image/webp',
  'image/bmp',
  'image/tiff',
]);

export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

export interface Upload {
  filename?: string;
  contentType?: string;
  data: Uint8Array;
}

export function validateUpload(upload: Upload, maxFileSize: number = DEFAULT_MAX_FILE_SIZE): asserts upload is Upload & { filename: string } {
  if (!upload.contentType || !ALLOWED_CONTENT_TYPES.has(upload.contentType)) {
    throw new InvalidInputError(`Invalid file type. Allowed types: ${[...ALLOWED_CONTENT_TYPES].join(', ')}`);
  }
  if (!upload.filename) {
    throw new InvalidInputError('No filename provided');
  }
  if (upload.data.length > maxFileSize) {
    throw new InvalidInputError(`File too large. Maximum size: ${Math.floor(maxFileSize / (1024 * 1024))}MB`, {
      statusCode: 413,
    });
  }
  if (upload.data.length === 0) {
    throw new InvalidInputError('Empty file provided');
  }
}
