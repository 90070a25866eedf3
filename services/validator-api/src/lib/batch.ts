/**
 * Batch Enqueue
 *
 * Lists the PDFs of a folder and enqueues one validate_document job per file.
 */

import fs from 'fs';
import path from 'path';
import { logger, isPdfDocument, type ValidateDocumentJob } from '@vpncheck/shared';

export interface JobSink {
  add(name: string, data: ValidateDocumentJob, opts?: { jobId?: string }): Promise<unknown>;
}

export async function isDirectory(folderPath: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(folderPath)).isDirectory();
  } catch (error) {
    logger.debug('Batch folder not accessible', {
      folder_path: folderPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

/**
 * Absolute paths of the folder's PDF files, sorted by name
 */
export async function listPdfFiles(folderPath: string): Promise<string[]> {
  const entries = await fs.promises.readdir(folderPath, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isPdfDocument(entry.name))
    .map((entry) => path.resolve(folderPath, entry.name))
    .sort();
}

export async function enqueueFolder(folderPath: string, correlationId: string, queue: JobSink): Promise<number> {
  const files = await listPdfFiles(folderPath);

  logger.info('Found PDF files for batch validation', {
    folder_path: folderPath,
    count: files.length,
  });

  for (const [index, filePath] of files.entries()) {
    const job: ValidateDocumentJob = {
      correlation_id: correlationId,
      file_path: filePath,
      enqueued_at: new Date().toISOString(),
    };
    await queue.add('validate_document', job, { jobId: `validate_${correlationId}_${index}` });
  }

  return files.length;
}
