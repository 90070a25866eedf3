/**
 * Judge Response Parsing
 *
 * Turns the Judge's text answer into a JudgeVerdict: strip markdown fences,
 * locate the JSON object, back-fill missing keys, normalize confidence and
 * validate the result against judge_verdict.schema.json.
 */

import { JudgeMalformedResponse, errorMessage, ok, err, type Result } from '../errors';
import { logger } from '../logger';
import { SCHEMA_FILES, formatSchemaErrors, getValidator } from '../schemas';
import type { DecisionStatus, JudgeSource, JudgeVerdict } from '../types';

/**
 * Wire shape of a Judge verdict (docs/contracts/judge_verdict.schema.json)
 */
export interface JudgeVerdictPayload {
  is_valid: boolean;
  status: DecisionStatus;
  confidence: number;
  issues: string[];
  reasoning: string;
  missing_fields: string[];
  signature_analysis: {
    count: number;
    sufficient: boolean;
    description: string;
  };
  document_type_analysis: {
    detected_type: string;
    confidence: number;
    description: string;
  };
  recommendations: string[];
}

export const JUDGE_RESPONSE_DEFAULTS: Readonly<JudgeVerdictPayload> = Object.freeze({
  is_valid: false,
  status: 'rejected_with_reason',
  confidence: 0,
  issues: ['LLM evaluation failed'],
  reasoning: 'Unable to evaluate due to processing error',
  missing_fields: [],
  signature_analysis: { count: 0, sufficient: false, description: 'Unable to analyze' },
  document_type_analysis: { detected_type: 'unknown', confidence: 0, description: 'Unable to analyze' },
  recommendations: ['Please check document format and try again'],
});

const PREVIEW_LENGTH = 200;
const CODE_FENCE = /^```[A-Za-z]*\s*([\s\S]*?)\s*```$/;

export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = CODE_FENCE.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonObject(text: string): Result<Record<string, unknown>, JudgeMalformedResponse> {
  const body = stripCodeFences(text);
  const candidates = [body];

  // Prose around the object: fall back to the outermost braces
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const outer = body.slice(start, end + 1);
    if (outer !== body) candidates.push(outer);
  }

  let lastError = 'response is not a JSON object';
  for (const candidate of candidates) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (isPlainObject(parsed)) return ok(parsed);
      lastError = 'response is not a JSON object';
    } catch (error) {
      lastError = errorMessage(error);
    }
  }

  return err(new JudgeMalformedResponse(`Judge response is not valid JSON: ${lastError}`, text.slice(0, PREVIEW_LENGTH)));
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Percentages (1 < c <= 100) become fractions; the result is clamped to [0, 1].
 */
export function normalizeConfidence(value: number): number {
  const scaled = value > 1 && value <= 100 ? value / 100 : value;
  return Math.min(1, Math.max(0, scaled));
}

function toJudgeVerdict(payload: JudgeVerdictPayload, source: JudgeSource): JudgeVerdict {
  return {
    isValid: payload.is_valid,
    status: payload.status,
    confidence: payload.confidence,
    issues: [...payload.issues],
    reasoning: payload.reasoning,
    missingFields: [...payload.missing_fields],
    signatureAnalysis: { ...payload.signature_analysis },
    documentTypeAnalysis: {
      detectedType: payload.document_type_analysis.detected_type,
      confidence: payload.document_type_analysis.confidence,
      description: payload.document_type_analysis.description,
    },
    recommendations: [...payload.recommendations],
    source,
  };
}

/**
 * Parse a raw Judge answer. Unusable answers come back as JudgeMalformedResponse.
 */
export function parseJudgeResponse(
  text: string,
  source: JudgeSource = 'judge'
): Result<JudgeVerdict, JudgeMalformedResponse> {
  const parsed = parseJsonObject(text);
  if (!parsed.ok) return parsed;

  const candidate: Record<string, unknown> = { ...JUDGE_RESPONSE_DEFAULTS, ...parsed.value };
  const missingKeys = Object.keys(JUDGE_RESPONSE_DEFAULTS).filter((key) => !(key in parsed.value));
  if (missingKeys.length > 0) {
    logger.warn('Judge response missing keys, using defaults', { missing_keys: missingKeys });
  }

  const confidence = toNumber(candidate.confidence);
  if (confidence !== null) {
    candidate.confidence = normalizeConfidence(confidence);
  }

  const validate = getValidator<JudgeVerdictPayload>(SCHEMA_FILES.judgeVerdict);
  if (!validate(candidate)) {
    const errors = formatSchemaErrors(validate);
    return err(
      new JudgeMalformedResponse(`Judge response failed schema validation: ${errors.join('; ')}`, text.slice(0, PREVIEW_LENGTH))
    );
  }

  return ok(toJudgeVerdict(candidate, source));
}

/**
 * Back to wire shape, for telemetry payloads
 */
export function toJudgeVerdictPayload(verdict: JudgeVerdict): JudgeVerdictPayload {
  return {
    is_valid: verdict.isValid,
    status: verdict.status,
    confidence: verdict.confidence,
    issues: [...verdict.issues],
    reasoning: verdict.reasoning,
    missing_fields: [...verdict.missingFields],
    signature_analysis: { ...verdict.signatureAnalysis },
    document_type_analysis: {
      detected_type: verdict.documentTypeAnalysis.detectedType,
      confidence: verdict.documentTypeAnalysis.confidence,
      description: verdict.documentTypeAnalysis.description,
    },
    recommendations: [...verdict.recommendations],
  };
}
