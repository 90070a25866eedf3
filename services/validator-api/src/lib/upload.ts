/**
 * Upload Handling
 *
 * Admission checks for uploaded files and scoped temporary files for the
 * validator, which reads documents from disk.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { isPdfDocument, logger } from '@vpncheck/shared';

export interface UploadedFile {
  originalname: string;
  mimetype: string;
  size: number;
  buffer: Buffer;
}

export type UploadCheck =
  | { ok: true }
  | { ok: false; status: 400 | 413; code: 'invalid_request' | 'payload_too_large'; message: string };

export function checkUpload(file: UploadedFile, maxFileSizeBytes: number): UploadCheck {
  if (!isPdfDocument(file.originalname, file.mimetype)) {
    return {
      ok: false,
      status: 400,
      code: 'invalid_request',
      message: `Only PDF files are supported: ${file.originalname}`,
    };
  }

  if (file.size > maxFileSizeBytes) {
    return {
      ok: false,
      status: 413,
      code: 'payload_too_large',
      message: `File ${file.originalname} exceeds the ${Math.round(maxFileSizeBytes / (1024 * 1024))} MB limit`,
    };
  }

  return { ok: true };
}

/**
 * Keep only characters that are safe in a file name. Uploads admitted on
 * their content type alone get a `.pdf` suffix, since the validator reads
 * files by extension.
 */
export function safeFileName(originalName: string): string {
  const base = path.basename(originalName).replace(/[^A-Za-z0-9._-]/g, '_');
  if (base.length === 0) return 'upload.pdf';
  return isPdfDocument(base) ? base : `${base}.pdf`;
}

/**
 * Write the upload to a private temp directory, run `fn` on the file path,
 * and remove the directory on every exit path.
 */
export async function withTempUpload<T>(
  file: Pick<UploadedFile, 'originalname' | 'buffer'>,
  tmpRoot: string,
  fn: (filePath: string) => Promise<T>
): Promise<T> {
  const dir = await fs.promises.mkdtemp(path.join(tmpRoot || os.tmpdir(), 'vpncheck-'));
  const filePath = path.join(dir, safeFileName(file.originalname));

  try {
    await fs.promises.writeFile(filePath, file.buffer);
    return await fn(filePath);
  } finally {
    await fs.promises.rm(dir, { recursive: true, force: true });
    logger.debug('Temporary upload removed', { path: filePath });
  }
}
