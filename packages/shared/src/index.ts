/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  withChildContext,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export {
  config,
  loadConfig,
  getValidationSettings,
  DEFAULT_VALIDATION_SETTINGS,
  type Config,
  type JudgeProvider,
  type ValidationSettings,
} from './config';

// Types & errors
export * from './types';
export * from './errors';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ValidateDocumentJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  validationsCounter,
  pipelineStepDurationHistogram,
  validationDurationHistogram,
  signaturesDetectedHistogram,
  signaturePageFailuresCounter,
  extractionMethodCounter,
  judgeRequestsCounter,
  judgeRequestDurationHistogram,
  judgeFallbacksCounter,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  SCHEMA_FILES,
  getValidator,
  formatSchemaErrors,
  validateValidationRun,
  type ValidationResult,
} from './schemas';

// Analysis
export {
  TextExtractor,
  joinPageText,
  type TextExtractionBackend,
} from './analysis/text-extractor';
export {
  DocumentTypeClassifier,
  NEW_REQUEST_KEYWORDS,
  EXTENSION_KEYWORDS,
  UNKNOWN_CONFIDENCE,
  countOccurrences,
} from './analysis/classifier';
export { FieldExtractor, extractField, fieldCompleteness, isFilled } from './analysis/field-extractor';
export { FIELD_PATTERNS } from './analysis/field-patterns';

// Rules
export { ValidationRuleEngine, RULE_MESSAGES } from './rules/rule-engine';
export {
  checkDateRange,
  isValidTimeRange,
  parseDayMonthYear,
  parseClockTime,
  type DateRangeCheck,
} from './rules/date-time';

// Signatures
export {
  toGrayscale,
  binarizeInverse,
  traceOuterBorder,
  polygonArea,
  findExternalContours,
  type RgbaImage,
  type BinaryImage,
  type Point,
  type Contour,
} from './signatures/contours';
export {
  SignatureDetector,
  SIGNATURE_HEURISTICS,
  isSignatureCandidate,
  signatureConfidence,
  detectInImage,
  type PageRasterizer,
  type RasterDocument,
} from './signatures/detector';

// Judge
export * from './judge';

// Telemetry
export {
  LogTelemetrySink,
  LangfuseTelemetrySink,
  createTelemetrySink,
  type TelemetrySink,
  type TelemetryTrace,
  type TraceName,
} from './telemetry';

// Pipeline
export {
  PipelineStateMachine,
  IllegalTransitionError,
  canTransition,
  isTerminalState,
} from './pipeline/state';
export {
  combine,
  mergeIssues,
  rejectionMessage,
  approvalMessage,
  errorVerdict,
  toStepFailure,
  NO_REASON_MESSAGE,
  type CombineInput,
} from './pipeline/combiner';
export {
  DocumentValidator,
  AGENT_VERSION,
  isPdfDocument,
  fileTooLargeMessage,
  type DocumentValidatorDeps,
} from './pipeline/validator';
export { formatValidationReport, summarizeBatch } from './pipeline/report';
