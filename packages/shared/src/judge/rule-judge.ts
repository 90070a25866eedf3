/**
 * Rule-Based Judge
 *
 * Deterministic Judge built on the rule engine. Serves as the configured
 * Judge when no semantic provider is available, and produces the fallback
 * verdict when the configured Judge fails.
 */

import type { ValidationSettings } from '../config';
import { ValidationRuleEngine } from '../rules/rule-engine';
import type { JudgeSource, JudgeVerdict } from '../types';
import type { Judge, JudgeRequest } from './types';

export const FALLBACK_CONFIDENCE = 0.3;

export const FALLBACK_RECOMMENDATION =
  'Please ensure all required fields are filled and document has sufficient signatures';

export type RuleJudgeSettings = Pick<ValidationSettings, 'requiredFields' | 'requiredEmailDomain'>;

function ruleBasedVerdict(
  request: JudgeRequest,
  settings: RuleJudgeSettings,
  source: JudgeSource,
  reasoning: string
): JudgeVerdict {
  const engine = new ValidationRuleEngine(settings);
  const verdict = engine.evaluate(request.fields, request.signatures.valid);
  const isValid = verdict.preliminaryValid;
  const { count, valid } = request.signatures;

  return {
    isValid,
    status: isValid ? 'approved_for_processing' : 'rejected_with_reason',
    confidence: FALLBACK_CONFIDENCE,
    issues: verdict.issues.map((issue) => issue.message),
    reasoning,
    missingFields: [...verdict.missingFields],
    signatureAnalysis: {
      count,
      sufficient: valid,
      description: `Found ${count} signatures`,
    },
    documentTypeAnalysis: {
      detectedType: request.documentType,
      confidence: FALLBACK_CONFIDENCE,
      description: 'Basic detection only',
    },
    recommendations: isValid ? [] : [FALLBACK_RECOMMENDATION],
    source,
  };
}

/**
 * Substitute verdict used when the configured Judge is unavailable or
 * answered with something unusable.
 */
export function buildFallbackVerdict(request: JudgeRequest, cause: string, settings: RuleJudgeSettings): JudgeVerdict {
  return ruleBasedVerdict(request, settings, 'fallback', `Fallback evaluation due to: ${cause}`);
}

export class RuleBasedJudge implements Judge {
  readonly name = 'rules';

  constructor(private readonly settings: RuleJudgeSettings) {}

  async evaluate(request: JudgeRequest): Promise<JudgeVerdict> {
    return ruleBasedVerdict(request, this.settings, 'rules', 'Rule-based evaluation: no semantic judge configured');
  }
}
