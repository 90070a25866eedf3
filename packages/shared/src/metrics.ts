/**
 * Prometheus Metrics
 *
 * Metrics for validation outcomes, pipeline steps, Judge calls, queue depth
 * and HTTP traffic.
 */

import http from 'node:http';
import type { Queue } from 'bullmq';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { getQueueMetrics } from './queues';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'vpncheck_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

export const queueMetricsGauge = new promClient.Gauge({
  name: 'vpncheck_queue_metrics',
  help: 'Queue metrics by state',
  labelNames: ['queue', 'state'],
  registers: [register],
});

// ============================================================================
// Job Processing Metrics
// ============================================================================

export const jobDurationHistogram = new promClient.Histogram({
  name: 'vpncheck_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'vpncheck_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

// ============================================================================
// Validation Pipeline Metrics
// ============================================================================

export const validationsCounter = new promClient.Counter({
  name: 'vpncheck_validations_total',
  help: 'Total number of documents validated, by verdict status',
  labelNames: ['status', 'document_type'],
  registers: [register],
});

export const pipelineStepDurationHistogram = new promClient.Histogram({
  name: 'vpncheck_pipeline_step_duration_seconds',
  help: 'Duration of each validation pipeline step',
  labelNames: ['step', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [register],
});

export const validationDurationHistogram = new promClient.Histogram({
  name: 'vpncheck_validation_duration_seconds',
  help: 'End-to-end duration of a document validation',
  labelNames: ['status'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

export const signaturesDetectedHistogram = new promClient.Histogram({
  name: 'vpncheck_signatures_detected',
  help: 'Signature-like marks detected per document',
  buckets: [0, 1, 2, 3, 4, 5, 8, 12],
  registers: [register],
});

export const signaturePageFailuresCounter = new promClient.Counter({
  name: 'vpncheck_signature_page_failures_total',
  help: 'Pages that could not be analysed for signatures',
  registers: [register],
});

export const extractionMethodCounter = new promClient.Counter({
  name: 'vpncheck_extraction_method_total',
  help: 'Text extraction backend that produced the document text',
  labelNames: ['method'],
  registers: [register],
});

// ============================================================================
// Judge Metrics
// ============================================================================

export const judgeRequestsCounter = new promClient.Counter({
  name: 'vpncheck_judge_requests_total',
  help: 'Total number of Judge attempts',
  labelNames: ['provider', 'status'],
  registers: [register],
});

export const judgeRequestDurationHistogram = new promClient.Histogram({
  name: 'vpncheck_judge_request_duration_seconds',
  help: 'Duration of Judge attempts',
  labelNames: ['provider'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

export const judgeFallbacksCounter = new promClient.Counter({
  name: 'vpncheck_judge_fallbacks_total',
  help: 'Fallback verdicts substituted for the configured Judge',
  labelNames: ['reason'],
  registers: [register],
});

// ============================================================================
// Backpressure Metrics
// ============================================================================

export const backpressureRejectionsCounter = new promClient.Counter({
  name: 'vpncheck_backpressure_rejections_total',
  help: 'Total number of requests rejected due to backpressure',
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'vpncheck_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'vpncheck_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Report queue depths and state metrics to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export async function reportQueueMetrics(
  queues: Array<{ name: string; queue: Queue }>
): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const m = await getQueueMetrics(queue);
      const depth = m.waiting + m.active;
      queueDepthGauge.set({ queue: name }, depth);
      queueMetricsGauge.set({ queue: name, state: 'waiting' }, m.waiting);
      queueMetricsGauge.set({ queue: name, state: 'active' }, m.active);
      queueMetricsGauge.set({ queue: name, state: 'completed' }, m.completed);
      queueMetricsGauge.set({ queue: name, state: 'failed' }, m.failed);
      queueMetricsGauge.set({ queue: name, state: 'delayed' }, m.delayed);
    } catch (err) {
      logger.warn('Queue metrics unavailable', {
        queue: name,
        error: err instanceof Error ? err.message : String(err),
      });
      queueDepthGauge.set({ queue: name }, -1);
    }
  }
}

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 * Uses Node built-in http - no express required.
 */
export function serveMetrics(port: number): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url !== '/metrics' || req.method !== 'GET') {
      res.statusCode = 404;
      res.end();
      return;
    }

    getMetrics()
      .then((body) => {
        res.setHeader('Content-Type', getMetricsContentType());
        res.end(body);
      })
      .catch((err: unknown) => {
        logger.error('Metrics scrape failed', err);
        res.statusCode = 500;
        res.end();
      });
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
