/**
 * Verdict combination and the pipeline state machine
 */

import {
  ExtractionFailure,
  IllegalTransitionError,
  NO_REASON_MESSAGE,
  PipelineStateMachine,
  PipelineStepFailure,
  approvalMessage,
  canTransition,
  combine,
  errorVerdict,
  isTerminalState,
  mergeIssues,
  rejectionMessage,
  toStepFailure,
  type CombineInput,
  type SignatureEvidence,
} from '@vpncheck/shared';
import { judgeVerdict } from './helpers';

function evidence(count: number, valid: boolean): SignatureEvidence {
  return { count, instances: [], valid, pageFailures: [] };
}

function combineInput(overrides: Partial<CombineInput> = {}): CombineInput {
  return {
    typeVerdict: { label: 'new_request', confidence: 0.7, scores: { newRequest: 2, extension: 0 } },
    fields: { NIK: '12345', Email: 'a@infomedia.co.id' },
    schema: ['NIK', 'Email'],
    signatures: evidence(3, true),
    minSignatures: 3,
    ruleVerdict: { issues: [], preliminaryValid: true, missingFields: [] },
    judgeVerdict: judgeVerdict(),
    ...overrides,
  };
}

describe('mergeIssues', () => {
  it('keeps rule issues first and drops duplicate messages', () => {
    const merged = mergeIssues(
      [{ message: "Field 'Email' is missing", field: 'Email' }, { message: 'Signature requirement not met' }],
      ['Signature requirement not met', 'Manager signature looks copied']
    );

    expect(merged).toEqual([
      { message: "Field 'Email' is missing", field: 'Email' },
      { message: 'Signature requirement not met' },
      { message: 'Manager signature looks copied' },
    ]);
  });
});

describe('messages', () => {
  it('lists insufficient signatures before at most three issues', () => {
    const issues = ['a', 'b', 'c', 'd'].map((message) => ({ message }));

    expect(rejectionMessage({ count: 1, valid: false }, 3, issues)).toBe(
      'Document rejected. Reasons: Insufficient signatures: 1/3 required; a; b; c'
    );
  });

  it('falls back to a generic message without reasons', () => {
    expect(rejectionMessage({ count: 3, valid: true }, 3, [])).toBe(`Document rejected. Reasons: ${NO_REASON_MESSAGE}`);
    expect(NO_REASON_MESSAGE).toBe('Document does not meet validation criteria');
  });

  it('formats the approval message with two decimals', () => {
    expect(approvalMessage('extension', 4, 0.875)).toBe('Document approved. Type: extension, Signatures: 4, Confidence: 0.88');
  });
});

describe('combine', () => {
  it('approves when the Judge and signatures agree', () => {
    const verdict = combine(combineInput());

    expect(verdict).toEqual({
      isValid: true,
      status: 'approved_for_processing',
      message: 'Document approved. Type: new_request, Signatures: 3, Confidence: 0.90',
      confidence: 0.9,
      documentType: 'new_request',
      signatureCount: 3,
      signatureValid: true,
      issues: [],
      reasoning: 'All criteria met',
      recommendations: [],
      fieldCompletenessRatio: 1,
    });
  });

  it('rejects when signatures are insufficient even if the Judge approves', () => {
    const verdict = combine(
      combineInput({
        signatures: evidence(2, false),
        ruleVerdict: {
          issues: [{ message: 'Signature requirement not met' }],
          preliminaryValid: false,
          missingFields: [],
        },
      })
    );

    expect(verdict.isValid).toBe(false);
    expect(verdict.status).toBe('rejected_with_reason');
    expect(verdict.message).toBe(
      'Document rejected. Reasons: Insufficient signatures: 2/3 required; Signature requirement not met'
    );
  });

  it('rejects when the Judge rejects', () => {
    const verdict = combine(
      combineInput({ judgeVerdict: judgeVerdict({ isValid: false, status: 'rejected_with_reason', issues: ['Stamp missing'] }) })
    );

    expect(verdict.isValid).toBe(false);
    expect(verdict.message).toBe('Document rejected. Reasons: Stamp missing');
    expect(verdict.issues).toEqual([{ message: 'Stamp missing' }]);
  });

  it('trusts an approving Judge over rule findings', () => {
    const verdict = combine(
      combineInput({
        ruleVerdict: {
          issues: [{ message: 'NIK must be numeric with at least 5 digits', field: 'NIK' }],
          preliminaryValid: false,
          missingFields: [],
        },
      })
    );

    expect(verdict.isValid).toBe(true);
    expect(verdict.issues).toEqual([{ message: 'NIK must be numeric with at least 5 digits', field: 'NIK' }]);
  });

  it('reports field completeness over the schema', () => {
    const verdict = combine(combineInput({ fields: { NIK: '12345', Email: null } }));
    expect(verdict.fieldCompletenessRatio).toBe(0.5);
  });
});

describe('errorVerdict', () => {
  it('describes the failing step', () => {
    const failure = toStepFailure('classification', new Error('boom'));
    const verdict = errorVerdict('classification', failure, { schema: ['NIK'] });

    expect(failure).toBeInstanceOf(PipelineStepFailure);
    expect(verdict).toEqual({
      isValid: false,
      status: 'error',
      message: 'classification failed: boom',
      confidence: 0,
      documentType: 'unknown',
      signatureCount: 0,
      signatureValid: false,
      issues: [{ message: 'boom' }],
      reasoning: 'Validation aborted during classification',
      recommendations: [],
      fieldCompletenessRatio: 0,
      error: { kind: 'PipelineStepFailure', step: 'classification', message: 'boom' },
    });
  });

  it('keeps domain errors and partial results', () => {
    const failure = toStepFailure('extraction', new ExtractionFailure('bad xref', 'no trailer'));
    const verdict = errorVerdict('extraction', failure, {
      schema: ['NIK', 'Email'],
      fields: { NIK: '12345', Email: null },
      signatures: evidence(1, false),
    });

    expect(failure).toBeInstanceOf(ExtractionFailure);
    expect(verdict.message).toBe('extraction failed: PDF extraction failed: no trailer (primary: bad xref)');
    expect(verdict.error?.kind).toBe('ExtractionFailure');
    expect(verdict.fieldCompletenessRatio).toBe(0.5);
    expect(verdict.signatureCount).toBe(1);
  });
});

describe('PipelineStateMachine', () => {
  it('walks the happy path to DECIDED', () => {
    const machine = new PipelineStateMachine();
    for (const state of [
      'EXTRACTING',
      'CLASSIFYING_AND_SCRAPING',
      'DETECTING_SIGNATURES',
      'RULE_CHECKING',
      'JUDGING',
      'DECIDED',
    ] as const) {
      machine.transition(state);
    }

    expect(machine.state).toBe('DECIDED');
    expect(machine.isTerminal()).toBe(true);
  });

  it('rejects skipping a state', () => {
    const machine = new PipelineStateMachine();
    expect(() => machine.transition('JUDGING')).toThrow(IllegalTransitionError);
    expect(() => machine.transition('JUDGING')).toThrow('Illegal pipeline transition: PENDING -> JUDGING');
    expect(machine.state).toBe('PENDING');
  });

  it('allows FAILED from any non-terminal state only', () => {
    expect(canTransition('PENDING', 'FAILED')).toBe(true);
    expect(canTransition('JUDGING', 'FAILED')).toBe(true);
    expect(canTransition('DECIDED', 'FAILED')).toBe(false);
    expect(canTransition('FAILED', 'EXTRACTING')).toBe(false);
    expect(isTerminalState('FAILED')).toBe(true);
    expect(isTerminalState('RULE_CHECKING')).toBe(false);
  });
});
