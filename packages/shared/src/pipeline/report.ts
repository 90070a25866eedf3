/**
 * Validation Reports
 *
 * Plain text report for a single run and aggregate figures for a batch.
 */

import type { BatchSummary, PipelineRun } from '../types';

function yesNo(value: boolean): string {
  return value ? 'YES' : 'NO';
}

function numbered(items: readonly string[]): string[] {
  return items.map((item, index) => `${index + 1}. ${item}`);
}

export function formatValidationReport(run: PipelineRun, minSignatures: number): string {
  const { verdict } = run;
  const lines = [
    '=== PDF VALIDATION REPORT ===',
    `File: ${run.document.id}`,
    `Timestamp: ${run.startedAt}`,
    `Processing Time: ${run.elapsedSeconds.toFixed(2)} seconds`,
    '',
    'FINAL DECISION:',
    `Status: ${verdict.status.toUpperCase()}`,
    `Valid: ${yesNo(verdict.isValid)}`,
    `Confidence: ${verdict.confidence.toFixed(2)}`,
    `Message: ${verdict.message}`,
    '',
    'DOCUMENT ANALYSIS:',
    `Type: ${verdict.documentType}`,
    `Signatures: ${verdict.signatureCount}/${minSignatures} required`,
    `Signature Valid: ${yesNo(verdict.signatureValid)}`,
    `Field Completeness: ${Math.round(verdict.fieldCompletenessRatio * 100)}%`,
    '',
    'REASONING:',
    verdict.reasoning || 'No reasoning provided',
    '',
    'ISSUES FOUND:',
  ];

  if (verdict.issues.length > 0) {
    lines.push(...numbered(verdict.issues.map((issue) => issue.message)));
  } else {
    lines.push('No issues found.');
  }

  if (verdict.recommendations.length > 0) {
    lines.push('', 'RECOMMENDATIONS:', ...numbered(verdict.recommendations));
  }

  return lines.join('\n') + '\n';
}

export function summarizeBatch(runs: readonly PipelineRun[], now: Date = new Date()): BatchSummary {
  const total = runs.length;
  const approved = runs.filter((r) => r.verdict.isValid).length;
  const rejected = runs.filter((r) => r.verdict.status === 'rejected_with_reason').length;
  const errors = runs.filter((r) => r.verdict.status === 'error').length;
  const totalSeconds = runs.reduce((sum, r) => sum + r.elapsedSeconds, 0);

  return {
    totalProcessed: total,
    approvedCount: approved,
    rejectedCount: rejected,
    errorCount: errors,
    approvalRate: total > 0 ? approved / total : 0,
    avgProcessingTimeSeconds: total > 0 ? totalSeconds / total : 0,
    timestamp: now.toISOString(),
  };
}
