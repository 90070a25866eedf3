/**
 * Shared TypeScript Types
 *
 * Types for the VPN request validation pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Field Schema
// ============================================================================

/**
 * Every field the extractor knows how to scrape, in canonical form order.
 * The configured schema is an ordered subset of these.
 */
export const FIELD_NAMES = [
  'NIK',
  'Name',
  'Phone',
  'Email',
  'Department',
  'Manager',
  'DateRange',
  'TimeRange',
  'ApprovedBy',
  'VPNUser',
] as const;

export type FieldName = (typeof FIELD_NAMES)[number];

export function isFieldName(value: string): value is FieldName {
  return FIELD_NAMES.some((name) => name === value);
}

/**
 * Extracted form fields. Absence is `null`, never an empty string.
 */
export type FieldSet = Readonly<Partial<Record<FieldName, string | null>>>;

// ============================================================================
// Document
// ============================================================================

export type ExtractionMethod = 'pdfjs' | 'pdf-parse';

export interface PageText {
  /** 1-based page index */
  pageNumber: number;
  text: string;
  /** Detected tables: rows of cells */
  tables: string[][][];
}

export interface ExtractedDocument {
  readonly id: string;
  readonly byteLength: number;
  readonly pageCount: number;
  readonly rawText: string;
  readonly pages: readonly PageText[];
  readonly method: ExtractionMethod;
  readonly bytes: Uint8Array;
}

export interface DocumentReference {
  id: string;
  byteLength: number;
  pageCount: number;
}

// ============================================================================
// Classification
// ============================================================================

export type DocumentTypeLabel = 'new_request' | 'extension' | 'unknown';

export interface TypeVerdict {
  label: DocumentTypeLabel;
  confidence: number;
  scores: {
    newRequest: number;
    extension: number;
  };
}

// ============================================================================
// Signatures
// ============================================================================

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface SignatureInstance {
  page: number;
  boundingBox: BoundingBox;
  area: number;
  confidence: number;
}

export interface PageFailure {
  page: number;
  message: string;
}

export interface SignatureEvidence {
  count: number;
  instances: SignatureInstance[];
  valid: boolean;
  pageFailures: PageFailure[];
}

// ============================================================================
// Rules & Judge
// ============================================================================

export interface Issue {
  message: string;
  field?: FieldName;
}

export interface RuleVerdict {
  issues: Issue[];
  preliminaryValid: boolean;
  missingFields: FieldName[];
}

export type DecisionStatus = 'approved_for_processing' | 'rejected_with_reason';

export type VerdictStatus = DecisionStatus | 'error';

export type JudgeSource = 'judge' | 'rules' | 'fallback';

export interface SignatureAnalysis {
  count: number;
  sufficient: boolean;
  description: string;
}

export interface DocumentTypeAnalysis {
  detectedType: string;
  confidence: number;
  description: string;
}

export interface JudgeVerdict {
  isValid: boolean;
  status: DecisionStatus;
  confidence: number;
  issues: string[];
  reasoning: string;
  missingFields: string[];
  signatureAnalysis: SignatureAnalysis;
  documentTypeAnalysis: DocumentTypeAnalysis;
  recommendations: string[];
  source: JudgeSource;
}

// ============================================================================
// Final Verdict & Pipeline Run
// ============================================================================

export type ValidatorErrorKind =
  | 'ExtractionFailure'
  | 'PageSignatureFailure'
  | 'JudgeUnavailable'
  | 'JudgeMalformedResponse'
  | 'PipelineStepFailure';

export interface VerdictError {
  kind: ValidatorErrorKind;
  step: StepName;
  message: string;
}

export interface FinalVerdict {
  isValid: boolean;
  status: VerdictStatus;
  message: string;
  confidence: number;
  documentType: DocumentTypeLabel;
  signatureCount: number;
  signatureValid: boolean;
  issues: Issue[];
  reasoning: string;
  recommendations: string[];
  fieldCompletenessRatio: number;
  error?: VerdictError;
}

export const STEP_NAMES = [
  'extraction',
  'classification',
  'field_extraction',
  'signature_detection',
  'rule_evaluation',
  'judge_evaluation',
  'final_decision',
] as const;

export type StepName = (typeof STEP_NAMES)[number];

export type StepStatus = 'started' | 'completed' | 'failed';

export interface StepRecord {
  name: StepName;
  status: StepStatus;
  timestamp: string;
  durationMs?: number;
  error?: string;
}

export type PipelineState =
  | 'PENDING'
  | 'EXTRACTING'
  | 'CLASSIFYING_AND_SCRAPING'
  | 'DETECTING_SIGNATURES'
  | 'RULE_CHECKING'
  | 'JUDGING'
  | 'DECIDED'
  | 'FAILED';

export interface PipelineRun {
  runId: string;
  agentVersion: string;
  document: DocumentReference;
  state: PipelineState;
  steps: StepRecord[];
  startedAt: string;
  elapsedSeconds: number;
  verdict: FinalVerdict;
  extractionMethod?: ExtractionMethod;
  typeVerdict?: TypeVerdict;
  fields?: FieldSet;
  signatures?: SignatureEvidence;
  ruleVerdict?: RuleVerdict;
  judgeVerdict?: JudgeVerdict;
}

// ============================================================================
// Batch
// ============================================================================

export interface BatchSummary {
  totalProcessed: number;
  approvedCount: number;
  rejectedCount: number;
  errorCount: number;
  approvalRate: number;
  avgProcessingTimeSeconds: number;
  timestamp: string;
}

// ============================================================================
// API
// ============================================================================

export interface BatchRequest {
  folder_path: string;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
