/**
 * Result Persistence
 *
 * Each run is checked against validation_run.schema.json and written as
 * `<resultsPath>/<runId>.json`.
 */

import fs from 'fs';
import path from 'path';
import { logger, validateValidationRun, type PipelineRun } from '@vpncheck/shared';

export function resultFilePath(resultsPath: string, runId: string): string {
  return path.join(resultsPath, `${runId}.json`);
}

export async function writeRunResult(run: PipelineRun, resultsPath: string): Promise<string> {
  const validation = validateValidationRun(run);
  if (!validation.valid) {
    throw new Error(`Validation run ${run.runId} does not match schema: ${(validation.errors ?? []).join('; ')}`);
  }

  await fs.promises.mkdir(resultsPath, { recursive: true });
  const filePath = resultFilePath(resultsPath, run.runId);
  await fs.promises.writeFile(filePath, JSON.stringify(run, null, 2) + '\n', 'utf-8');

  logger.info('Validation result written', { path: filePath, status: run.verdict.status });
  return filePath;
}
