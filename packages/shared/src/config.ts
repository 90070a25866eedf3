/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * The resulting object is frozen; components receive the slices they need
 * at construction time.
 */

import { FIELD_NAMES, isFieldName, type FieldName } from './types';

export type JudgeProvider = 'openai' | 'rules';

export interface Config {
  appName: string;
  agentVersion: string;

  // Validation rules
  minSignatures: number;
  maxFileSizeMb: number;
  requiredEmailDomain: string;
  requiredFields: readonly FieldName[];

  // Judge
  judgeProvider: JudgeProvider;
  llmModelJudge: string;
  judgeTimeoutMs: number;
  judgeMaxRetries: number;
  openaiApiKey: string;

  // Telemetry (Langfuse)
  langfusePublicKey: string;
  langfuseSecretKey: string;
  langfuseHost: string;

  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;

  // Backpressure Controls
  maxQueueDepthWarning: number;
  maxQueueDepthReject: number;

  // HTTP & Filesystem
  port: number;
  metricsPort: number;
  resultsPath: string;
  uploadTmpDir: string;
}

/**
 * The immutable slice of configuration the validation core depends on.
 */
export interface ValidationSettings {
  readonly minSignatures: number;
  readonly maxFileSizeBytes: number;
  readonly requiredEmailDomain: string;
  readonly requiredFields: readonly FieldName[];
}

type Env = Record<string, string | undefined>;

function parseInteger(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < min) {
    throw new Error(`Invalid ${name}: expected an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function parseRequiredFields(raw: string | undefined): FieldName[] {
  if (!raw || raw.trim() === '') return [...FIELD_NAMES];

  const names = raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  const unknown = names.filter((n) => !isFieldName(n));
  if (unknown.length > 0) {
    throw new Error(`Unknown field(s) in REQUIRED_FIELDS: ${unknown.join(', ')}`);
  }

  return Array.from(new Set(names.filter(isFieldName)));
}

function parseJudgeProvider(env: Env): JudgeProvider {
  const raw = env.JUDGE_PROVIDER;
  if (!raw) return env.OPENAI_API_KEY ? 'openai' : 'rules';
  if (raw === 'openai' || raw === 'rules') return raw;
  throw new Error(`Invalid JUDGE_PROVIDER: "${raw}" (expected "openai" or "rules")`);
}

/**
 * Build configuration from an environment map
 */
export function loadConfig(env: Env = process.env): Readonly<Config> {
  const requiredFields = Object.freeze(parseRequiredFields(env.REQUIRED_FIELDS));

  return Object.freeze({
    appName: env.APP_NAME || 'vpn-request-validator',
    agentVersion: '1.0.0',

    // Validation rules
    minSignatures: parseInteger(env, 'MIN_SIGNATURES', 3),
    maxFileSizeMb: parseInteger(env, 'MAX_FILE_SIZE_MB', 10, 1),
    requiredEmailDomain: env.REQUIRED_EMAIL_DOMAIN || '@infomedia.co.id',
    requiredFields,

    // Judge
    judgeProvider: parseJudgeProvider(env),
    llmModelJudge: env.LLM_MODEL_JUDGE || 'gpt-4o-mini',
    judgeTimeoutMs: parseInteger(env, 'JUDGE_TIMEOUT_MS', 30000, 1),
    judgeMaxRetries: parseInteger(env, 'JUDGE_MAX_RETRIES', 1),
    openaiApiKey: env.OPENAI_API_KEY || '',

    // Telemetry (Langfuse)
    langfusePublicKey: env.LF_PUBLIC_KEY || '',
    langfuseSecretKey: env.LF_SECRET_KEY || '',
    langfuseHost: env.LF_HOST || 'https://cloud.langfuse.com',

    // Redis
    redisHost: env.REDIS_HOST || 'redis',
    redisPort: parseInteger(env, 'REDIS_PORT', 6379),
    redisUrl: env.REDIS_URL || 'redis://redis:6379',

    // Queue & Worker
    workerConcurrency: parseInteger(env, 'WORKER_CONCURRENCY', 2, 1),
    maxJobAttempts: parseInteger(env, 'BULLMQ_DEFAULT_ATTEMPTS', 3, 1),
    backoffBaseMs: parseInteger(env, 'BACKOFF_BASE_MS', 2000),

    // Backpressure Controls
    maxQueueDepthWarning: parseInteger(env, 'MAX_QUEUE_DEPTH_WARNING', 500),
    maxQueueDepthReject: parseInteger(env, 'MAX_QUEUE_DEPTH_REJECT', 1000),

    // HTTP & Filesystem
    port: parseInteger(env, 'PORT', 8080),
    metricsPort: parseInteger(env, 'METRICS_PORT', 9091),
    resultsPath: env.RESULTS_PATH || './results',
    uploadTmpDir: env.UPLOAD_TMP_DIR || '',
  });
}

export const config: Readonly<Config> = loadConfig();

/**
 * Derive the settings injected into the validation core
 */
export function getValidationSettings(cfg: Readonly<Config> = config): ValidationSettings {
  return Object.freeze({
    minSignatures: cfg.minSignatures,
    maxFileSizeBytes: cfg.maxFileSizeMb * 1024 * 1024,
    requiredEmailDomain: cfg.requiredEmailDomain,
    requiredFields: cfg.requiredFields,
  });
}

export const DEFAULT_VALIDATION_SETTINGS: ValidationSettings = Object.freeze({
  minSignatures: 3,
  maxFileSizeBytes: 10 * 1024 * 1024,
  requiredEmailDomain: '@infomedia.co.id',
  requiredFields: FIELD_NAMES,
});
