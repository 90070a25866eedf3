/**
 * Validation Worker
 *
 * Consumes validate_document jobs, validates the PDF and writes the run to
 * the results directory. Failures are rethrown so BullMQ retries with backoff.
 */

import type { Job } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  createTelemetrySink,
  serveMetrics,
  QUEUE_NAMES,
  type ValidateDocumentJob,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@vpncheck/shared';
import { createDocumentValidator } from '@vpncheck/pdf';
import { writeRunResult } from './lib/results';

const telemetry = createTelemetrySink(config);
const validator = createDocumentValidator(config, { telemetry });

/**
 * Process validate_document job
 */
async function processValidateDocument(job: Job<ValidateDocumentJob, void>): Promise<void> {
  const { correlation_id, file_path, enqueued_at } = job.data;

  return runWithContextAsync({ correlationId: correlation_id }, async () => {
    const startTime = Date.now();

    logger.info('Processing validate_document', {
      jobId: job.id,
      file_path,
      enqueued_at,
      attempt: job.attemptsMade + 1,
    });

    try {
      const run = await validator.validateFile(file_path);
      const resultPath = await writeRunResult(run, config.resultsPath);

      logger.info('Document validated', {
        file_path,
        run_id: run.runId,
        status: run.verdict.status,
        result_path: resultPath,
      });

      // Record metrics
      const duration = (Date.now() - startTime) / 1000;
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.VALIDATE_DOCUMENT, status: 'success' });
      jobDurationHistogram.observe({ queue: QUEUE_NAMES.VALIDATE_DOCUMENT, status: 'success' }, duration);
    } catch (error) {
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.VALIDATE_DOCUMENT, status: 'failed' });
      jobDurationHistogram.observe(
        { queue: QUEUE_NAMES.VALIDATE_DOCUMENT, status: 'failed' },
        (Date.now() - startTime) / 1000
      );
      throw error;
    }
  });
}

// Create and start the worker
const worker = createWorker<ValidateDocumentJob, void>(QUEUE_NAMES.VALIDATE_DOCUMENT, processValidateDocument);
const metricsServer = serveMetrics(config.metricsPort);

logger.info('Validation worker started', { results_path: config.resultsPath });

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  metricsServer.close();
  await telemetry.flush();
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error: unknown) => logger.error('Shutdown failed', error));
});
process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error: unknown) => logger.error('Shutdown failed', error));
});
