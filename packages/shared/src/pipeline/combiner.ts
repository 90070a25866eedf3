/**
 * Decision Combiner
 *
 * Fuses rule findings, signature evidence and the Judge verdict into the
 * final verdict. The Judge's validity is trusted once it answers:
 * `isValid = judge.isValid && signatureValid`, and the rule engine's
 * preliminary validity is not re-applied.
 */

import { fieldCompleteness } from '../analysis/field-extractor';
import { PipelineStepFailure, ValidatorError, errorMessage } from '../errors';
import type {
  DocumentTypeLabel,
  FieldName,
  FieldSet,
  FinalVerdict,
  Issue,
  JudgeVerdict,
  RuleVerdict,
  SignatureEvidence,
  StepName,
  TypeVerdict,
} from '../types';

export const MAX_REASONS_IN_MESSAGE = 3;

export const NO_REASON_MESSAGE = 'Document does not meet validation criteria';

export interface CombineInput {
  typeVerdict: TypeVerdict;
  fields: FieldSet;
  schema: readonly FieldName[];
  signatures: SignatureEvidence;
  minSignatures: number;
  ruleVerdict: RuleVerdict;
  judgeVerdict: JudgeVerdict;
}

/**
 * Rule issues first, then Judge issues not already present (exact message match)
 */
export function mergeIssues(ruleIssues: readonly Issue[], judgeIssues: readonly string[]): Issue[] {
  const seen = new Set<string>();
  const merged: Issue[] = [];

  for (const issue of ruleIssues) {
    if (seen.has(issue.message)) continue;
    seen.add(issue.message);
    merged.push(issue);
  }
  for (const message of judgeIssues) {
    if (seen.has(message)) continue;
    seen.add(message);
    merged.push({ message });
  }

  return merged;
}

export function rejectionMessage(
  signatures: Pick<SignatureEvidence, 'count' | 'valid'>,
  minSignatures: number,
  issues: readonly Issue[]
): string {
  const reasons: string[] = [];
  if (!signatures.valid) {
    reasons.push(`Insufficient signatures: ${signatures.count}/${minSignatures} required`);
  }
  reasons.push(...issues.slice(0, MAX_REASONS_IN_MESSAGE).map((issue) => issue.message));

  if (reasons.length === 0) reasons.push(NO_REASON_MESSAGE);

  return `Document rejected. Reasons: ${reasons.join('; ')}`;
}

export function approvalMessage(documentType: DocumentTypeLabel, signatureCount: number, confidence: number): string {
  return `Document approved. Type: ${documentType}, Signatures: ${signatureCount}, Confidence: ${confidence.toFixed(2)}`;
}

export function combine(input: CombineInput): FinalVerdict {
  const { typeVerdict, signatures, judgeVerdict } = input;
  const isValid = judgeVerdict.isValid && signatures.valid;
  const issues = mergeIssues(input.ruleVerdict.issues, judgeVerdict.issues);

  return {
    isValid,
    status: isValid ? 'approved_for_processing' : 'rejected_with_reason',
    message: isValid
      ? approvalMessage(typeVerdict.label, signatures.count, judgeVerdict.confidence)
      : rejectionMessage(signatures, input.minSignatures, issues),
    confidence: judgeVerdict.confidence,
    documentType: typeVerdict.label,
    signatureCount: signatures.count,
    signatureValid: signatures.valid,
    issues,
    reasoning: judgeVerdict.reasoning,
    recommendations: [...judgeVerdict.recommendations],
    fieldCompletenessRatio: fieldCompleteness(input.fields, input.schema),
  };
}

export interface PartialResults {
  typeVerdict?: TypeVerdict;
  fields?: FieldSet;
  schema: readonly FieldName[];
  signatures?: SignatureEvidence;
}

/**
 * Domain errors pass through; anything else becomes a PipelineStepFailure
 */
export function toStepFailure(step: StepName, error: unknown): ValidatorError {
  if (error instanceof ValidatorError) return error;
  return new PipelineStepFailure(step, errorMessage(error), { cause: error });
}

/**
 * Verdict for a run aborted by a failing step
 */
export function errorVerdict(step: StepName, failure: ValidatorError, partial: PartialResults): FinalVerdict {
  const original = failure instanceof PipelineStepFailure ? failure.originalMessage : failure.message;
  const kind = failure.kind;

  return {
    isValid: false,
    status: 'error',
    message: `${step} failed: ${original}`,
    confidence: 0,
    documentType: partial.typeVerdict?.label ?? 'unknown',
    signatureCount: partial.signatures?.count ?? 0,
    signatureValid: partial.signatures?.valid ?? false,
    issues: [{ message: original }],
    reasoning: `Validation aborted during ${step}`,
    recommendations: [],
    fieldCompletenessRatio: partial.fields ? fieldCompleteness(partial.fields, partial.schema) : 0,
    error: { kind, step, message: original },
  };
}
