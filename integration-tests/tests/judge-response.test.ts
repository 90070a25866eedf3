/**
 * Parsing and normalizing Judge answers
 */

import {
  JUDGE_RESPONSE_DEFAULTS,
  JudgeMalformedResponse,
  normalizeConfidence,
  parseJudgeResponse,
  stripCodeFences,
  toJudgeVerdictPayload,
} from '@vpncheck/shared';

const validAnswer = {
  is_valid: true,
  status: 'approved_for_processing',
  confidence: 0.92,
  issues: [],
  reasoning: 'Semua kriteria terpenuhi',
  missing_fields: [],
  signature_analysis: { count: 3, sufficient: true, description: 'Tiga tanda tangan' },
  document_type_analysis: { detected_type: 'new_request', confidence: 0.9, description: 'Permohonan baru' },
  recommendations: [],
};

describe('parseJudgeResponse', () => {
  it('maps a complete answer to a verdict', () => {
    const result = parseJudgeResponse(JSON.stringify(validAnswer));

    expect(result).toEqual({
      ok: true,
      value: {
        isValid: true,
        status: 'approved_for_processing',
        confidence: 0.92,
        issues: [],
        reasoning: 'Semua kriteria terpenuhi',
        missingFields: [],
        signatureAnalysis: { count: 3, sufficient: true, description: 'Tiga tanda tangan' },
        documentTypeAnalysis: { detectedType: 'new_request', confidence: 0.9, description: 'Permohonan baru' },
        recommendations: [],
        source: 'judge',
      },
    });
  });

  it('strips markdown code fences', () => {
    const result = parseJudgeResponse('```json\n' + JSON.stringify(validAnswer) + '\n```');
    expect(result.ok && result.value.confidence).toBe(0.92);
  });

  it('finds the object inside surrounding prose', () => {
    const result = parseJudgeResponse(`Berikut hasilnya: ${JSON.stringify(validAnswer)} Terima kasih.`);
    expect(result.ok && result.value.isValid).toBe(true);
  });

  it('back-fills missing keys with defaults', () => {
    const result = parseJudgeResponse('{"is_valid": true}');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.isValid).toBe(true);
    expect(result.value.status).toBe('rejected_with_reason');
    expect(result.value.confidence).toBe(0);
    expect(result.value.issues).toEqual(['LLM evaluation failed']);
    expect(result.value.recommendations).toEqual(['Please check document format and try again']);
    expect(result.value.signatureAnalysis).toEqual({ count: 0, sufficient: false, description: 'Unable to analyze' });
  });

  it('does not share default arrays between verdicts', () => {
    const first = parseJudgeResponse('{}');
    if (first.ok) first.value.issues.push('mutated');

    expect(JUDGE_RESPONSE_DEFAULTS.issues).toEqual(['LLM evaluation failed']);
  });

  it.each([
    [85, 0.85],
    ['0.7', 0.7],
    [150, 1],
    [-0.2, 0],
    [1, 1],
  ])('normalizes confidence %p to %p', (confidence, expected) => {
    const result = parseJudgeResponse(JSON.stringify({ ...validAnswer, confidence }));
    expect(result.ok && result.value.confidence).toBe(expected);
  });

  it('tags the verdict with the given source', () => {
    const result = parseJudgeResponse(JSON.stringify(validAnswer), 'rules');
    expect(result.ok && result.value.source).toBe('rules');
  });

  it('rejects text without JSON', () => {
    const result = parseJudgeResponse('I cannot evaluate this document.');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(JudgeMalformedResponse);
    expect(result.error.message.startsWith('Judge response is not valid JSON: ')).toBe(true);
    expect(result.error.preview).toBe('I cannot evaluate this document.');
  });

  it('rejects a JSON array', () => {
    const result = parseJudgeResponse('[1, 2]');
    expect(!result.ok && result.error.message).toBe('Judge response is not valid JSON: response is not a JSON object');
  });

  it('rejects values of the wrong type', () => {
    const result = parseJudgeResponse(JSON.stringify({ ...validAnswer, is_valid: 'yes' }));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message.startsWith('Judge response failed schema validation: ')).toBe(true);
    expect(result.error.message).toContain('/is_valid');
  });

  it('rejects an unknown status', () => {
    const result = parseJudgeResponse(JSON.stringify({ ...validAnswer, status: 'maybe' }));
    expect(!result.ok && result.error.kind).toBe('JudgeMalformedResponse');
  });

  it('rejects a non-numeric confidence', () => {
    const result = parseJudgeResponse(JSON.stringify({ ...validAnswer, confidence: 'high' }));
    expect(!result.ok && result.error.kind).toBe('JudgeMalformedResponse');
  });

  it('truncates the preview to 200 characters', () => {
    const result = parseJudgeResponse('x'.repeat(500));
    expect(!result.ok && result.error.preview.length).toBe(200);
  });
});

describe('stripCodeFences', () => {
  it('removes fences with or without a language tag', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(stripCodeFences('```\n{"a":1}\n```')).toBe('{"a":1}');
    expect(stripCodeFences('  {"a":1}  ')).toBe('{"a":1}');
  });
});

describe('normalizeConfidence', () => {
  it('treats values above 1 as percentages', () => {
    expect(normalizeConfidence(100)).toBe(1);
    expect(normalizeConfidence(42)).toBe(0.42);
    expect(normalizeConfidence(0.5)).toBe(0.5);
  });
});

describe('toJudgeVerdictPayload', () => {
  it('converts a parsed verdict back to the wire shape', () => {
    const result = parseJudgeResponse(JSON.stringify(validAnswer));
    expect(result.ok && toJudgeVerdictPayload(result.value)).toEqual(validAnswer);
  });
});
