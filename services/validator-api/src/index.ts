/**
 * Validator API
 *
 * GET  /health, /config, /metrics
 * POST /validate-pdf             - Validate one uploaded PDF
 * POST /validate-multiple-pdfs   - Validate several uploaded PDFs sequentially
 * POST /batch                    - Enqueue every PDF of a folder for the worker
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  runWithContextAsync,
  getValidationSettings,
  getMetrics,
  getMetricsContentType,
  reportQueueMetrics,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  createQueue,
  createTelemetrySink,
  checkBackpressure,
  formatValidationReport,
  summarizeBatch,
  QUEUE_NAMES,
  type ErrorEnvelope,
  type PipelineRun,
  type ValidateDocumentJob,
} from '@vpncheck/shared';
import { createDocumentValidator } from '@vpncheck/pdf';
import { enqueueFolder, isDirectory } from './lib/batch';
import { checkUpload, withTempUpload, type UploadedFile } from './lib/upload';

const SERVICE_NAME = 'validator-api';

// Uploads above this never reach the per-file size check
const UPLOAD_HARD_LIMIT_FACTOR = 4;

const app = express();
const settings = getValidationSettings(config);
const telemetry = createTelemetrySink(config);
const validator = createDocumentValidator(config, { telemetry });

const validateDocumentQueue = createQueue<ValidateDocumentJob, void>(QUEUE_NAMES.VALIDATE_DOCUMENT);

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: settings.maxFileSizeBytes * UPLOAD_HARD_LIMIT_FACTOR },
});

function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : ulid();
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const error: ErrorEnvelope = {
    error: { code, message, correlation_id: correlationIdOf(res) },
  };
  res.status(status).json(error);
}

// Middleware
app.use(express.json());

// Correlation ID middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' && header ? header : ulid();
  res.setHeader('X-Correlation-Id', correlationId);

  runWithContext({ correlationId }, () => {
    next();
  });
});

// Request timing middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = (Date.now() - start) / 1000;
    const path = req.route?.path || req.path;

    httpRequestDurationHistogram.observe({ method: req.method, path, status: res.statusCode.toString() }, duration);
    httpRequestsCounter.inc({ method: req.method, path, status: res.statusCode.toString() });

    logger.info('Request completed', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Math.round(duration * 1000),
    });
  });

  next();
});

app.get('/', (req: Request, res: Response) => {
  res.json({
    service: SERVICE_NAME,
    version: config.agentVersion,
    endpoints: ['/health', '/config', '/metrics', '/validate-pdf', '/validate-multiple-pdfs', '/batch'],
  });
});

// Health check
app.get('/health', (req: Request, res: Response) => {
  res.json({
    status: 'healthy',
    service: SERVICE_NAME,
    judge_provider: config.judgeProvider,
    timestamp: new Date().toISOString(),
  });
});

app.get('/config', (req: Request, res: Response) => {
  res.json({
    min_signatures: config.minSignatures,
    max_file_size_mb: config.maxFileSizeMb,
    required_email_domain: config.requiredEmailDomain,
    required_fields: config.requiredFields,
    judge_provider: config.judgeProvider,
  });
});

// Metrics endpoint
app.get('/metrics', async (req: Request, res: Response) => {
  try {
    await reportQueueMetrics([{ name: QUEUE_NAMES.VALIDATE_DOCUMENT, queue: validateDocumentQueue }]);
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  } catch (error) {
    logger.error('Metrics scrape failed', error);
    sendError(res, 500, 'internal_error', 'Metrics unavailable');
  }
});

async function validateUpload(file: UploadedFile, correlationId: string): Promise<PipelineRun> {
  return runWithContextAsync({ correlationId }, () =>
    withTempUpload(file, config.uploadTmpDir, (filePath) => validator.validateFile(filePath))
  );
}

/**
 * POST /validate-pdf
 * Multipart field `file`; `?format=text` returns the plain text report
 */
app.post('/validate-pdf', upload.single('file'), async (req: Request, res: Response) => {
  const correlationId = correlationIdOf(res);

  try {
    if (!req.file) {
      sendError(res, 400, 'invalid_request', 'A PDF file is required in the "file" field');
      return;
    }

    const check = checkUpload(req.file, settings.maxFileSizeBytes);
    if (!check.ok) {
      sendError(res, check.status, check.code, check.message);
      return;
    }

    const run = await validateUpload(req.file, correlationId);

    if (req.query.format === 'text') {
      res.type('text/plain').send(formatValidationReport(run, settings.minSignatures));
      return;
    }
    res.json(run);
  } catch (error) {
    logger.error('PDF validation request failed', error);
    sendError(res, 500, 'internal_error', error instanceof Error ? error.message : 'Unknown error');
  }
});

/**
 * POST /validate-multiple-pdfs
 * Multipart field `files`; each file is validated in turn
 */
app.post('/validate-multiple-pdfs', upload.array('files'), async (req: Request, res: Response) => {
  const correlationId = correlationIdOf(res);

  try {
    const files = Array.isArray(req.files) ? req.files : [];
    if (files.length === 0) {
      sendError(res, 400, 'invalid_request', 'At least one PDF file is required in the "files" field');
      return;
    }

    const runs: PipelineRun[] = [];
    const results: Array<PipelineRun | { file: string; error: { code: string; message: string } }> = [];

    for (const file of files) {
      const check = checkUpload(file, settings.maxFileSizeBytes);
      if (!check.ok) {
        results.push({ file: file.originalname, error: { code: check.code, message: check.message } });
        continue;
      }

      const run = await validateUpload(file, correlationId);
      runs.push(run);
      results.push(run);
    }

    res.json({ results, summary: summarizeBatch(runs) });
  } catch (error) {
    logger.error('Multiple PDF validation request failed', error);
    sendError(res, 500, 'internal_error', error instanceof Error ? error.message : 'Unknown error');
  }
});

/**
 * POST /batch
 * Enqueues a validate_document job for each PDF in folder_path
 */
app.post('/batch', async (req: Request, res: Response) => {
  const correlationId = correlationIdOf(res);

  try {
    const body: unknown = req.body;
    const folderPath =
      typeof body === 'object' && body !== null && 'folder_path' in body && typeof body.folder_path === 'string'
        ? body.folder_path
        : '';

    if (!folderPath) {
      sendError(res, 400, 'invalid_request', 'folder_path is required');
      return;
    }
    if (!(await isDirectory(folderPath))) {
      sendError(res, 400, 'invalid_request', `folder_path is not a directory: ${folderPath}`);
      return;
    }

    // Check backpressure
    const backpressure = await checkBackpressure(validateDocumentQueue);

    if (backpressure.shouldReject) {
      backpressureRejectionsCounter.inc();
      logger.warn('Request rejected due to backpressure', { queue_depth: backpressure.depth });
      sendError(res, 503, 'service_unavailable', 'System is under heavy load. Please retry later.');
      return;
    }

    if (backpressure.shouldWarn) {
      logger.warn('Queue depth approaching threshold', { queue_depth: backpressure.depth });
    }

    const enqueued = await enqueueFolder(folderPath, correlationId, validateDocumentQueue);
    logger.info('Batch enqueued', { folder_path: folderPath, enqueued });

    res.status(202).json({ correlation_id: correlationId, enqueued });
  } catch (error) {
    logger.error('Batch enqueue failed', error);
    sendError(res, 500, 'internal_error', error instanceof Error ? error.message : 'Unknown error');
  }
});

// Upload limit and other middleware errors
app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  if (error instanceof multer.MulterError) {
    const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    sendError(res, status, status === 413 ? 'payload_too_large' : 'invalid_request', error.message);
    return;
  }
  logger.error('Unhandled request error', error);
  sendError(res, 500, 'internal_error', error instanceof Error ? error.message : 'Unknown error');
});

// Start server
const server = app.listen(config.port, () => {
  logger.info('Validator API started', { port: config.port, judge_provider: config.judgeProvider });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await validateDocumentQueue.close();
  await telemetry.flush();
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error: unknown) => logger.error('Shutdown failed', error));
});
process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error: unknown) => logger.error('Shutdown failed', error));
});
