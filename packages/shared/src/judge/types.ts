/**
 * Judge Capability
 *
 * The semantic evaluator consulted after the deterministic rules. Several
 * implementations exist (OpenAI, rule-based, test doubles); the pipeline only
 * sees this interface.
 */

import { isFilled } from '../analysis/field-extractor';
import type {
  DocumentTypeLabel,
  FieldName,
  FieldSet,
  JudgeVerdict,
  RuleVerdict,
  SignatureEvidence,
} from '../types';

export interface JudgeRequest {
  fields: FieldSet;
  schema: readonly FieldName[];
  signatures: Pick<SignatureEvidence, 'count' | 'valid'>;
  documentType: DocumentTypeLabel;
  ruleVerdict: RuleVerdict;
}

export interface JudgeCallOptions {
  signal: AbortSignal;
}

export interface Judge {
  readonly name: string;
  evaluate(request: JudgeRequest, options: JudgeCallOptions): Promise<JudgeVerdict>;
}

/**
 * Wire shape of the data handed to the Judge: one flat mapping, every schema
 * field (empty string when missing) next to the signature and type evidence.
 */
export interface JudgeEvidence {
  signature_count: number;
  signature_valid: boolean;
  document_type: DocumentTypeLabel;
  rule_issues: string[];
  missing_fields: string[];
}

export type JudgeInput = Partial<Record<FieldName, string>> & JudgeEvidence;

export function buildJudgeInput(request: JudgeRequest): JudgeInput {
  const fields: Partial<Record<FieldName, string>> = {};
  for (const name of request.schema) {
    const value = request.fields[name];
    fields[name] = isFilled(value) ? value : '';
  }

  return {
    ...fields,
    signature_count: request.signatures.count,
    signature_valid: request.signatures.valid,
    document_type: request.documentType,
    rule_issues: request.ruleVerdict.issues.map((issue) => issue.message),
    missing_fields: [...request.ruleVerdict.missingFields],
  };
}
