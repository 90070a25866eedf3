/**
 * Document Validator
 *
 * Orchestrates one validation run: extraction, classification and field
 * scraping, signature detection, rule evaluation, the Judge, and the final
 * decision. Every step is recorded; a throwing step aborts the run with an
 * error verdict. Callers always get a well-formed PipelineRun back.
 */

import fs from 'fs';
import path from 'path';
import { ulid } from 'ulid';
import type { DocumentTypeClassifier } from '../analysis/classifier';
import type { FieldExtractor } from '../analysis/field-extractor';
import type { TextExtractor } from '../analysis/text-extractor';
import type { ValidationSettings } from '../config';
import { withChildContext } from '../context';
import { errorMessage, type ValidatorError } from '../errors';
import {
  buildFallbackVerdict,
  buildJudgeInput,
  invokeJudge,
  toJudgeVerdictPayload,
  type Judge,
  type JudgeInvocationPolicy,
  type JudgeRequest,
} from '../judge';
import { logger } from '../logger';
import {
  extractionMethodCounter,
  judgeFallbacksCounter,
  pipelineStepDurationHistogram,
  signaturePageFailuresCounter,
  signaturesDetectedHistogram,
  validationDurationHistogram,
  validationsCounter,
} from '../metrics';
import type { ValidationRuleEngine } from '../rules/rule-engine';
import type { SignatureDetector } from '../signatures/detector';
import type { TelemetrySink, TelemetryTrace } from '../telemetry';
import type {
  ExtractedDocument,
  FieldSet,
  JudgeVerdict,
  PipelineRun,
  PipelineState,
  RuleVerdict,
  SignatureEvidence,
  StepName,
  StepRecord,
  TypeVerdict,
} from '../types';
import { combine, errorVerdict, toStepFailure } from './combiner';
import { PipelineStateMachine } from './state';

export const AGENT_VERSION = '1.0.0';

export interface DocumentValidatorDeps {
  textExtractor: TextExtractor;
  classifier: DocumentTypeClassifier;
  fieldExtractor: FieldExtractor;
  signatureDetector: SignatureDetector;
  ruleEngine: ValidationRuleEngine;
  judge: Judge;
  telemetry: TelemetrySink;
  settings: ValidationSettings;
  judgePolicy: JudgeInvocationPolicy;
  appName?: string;
  agentVersion?: string;
}

const PDF_EXTENSION = '.pdf';
const PDF_CONTENT_TYPE = 'application/pdf';

export function isPdfDocument(fileName: string, contentType?: string): boolean {
  return path.extname(fileName).toLowerCase() === PDF_EXTENSION || contentType === PDF_CONTENT_TYPE;
}

export function fileTooLargeMessage(byteLength: number, maxFileSizeBytes: number): string {
  const mb = (bytes: number) => (bytes / (1024 * 1024)).toFixed(2);
  return `File size ${mb(byteLength)} MB exceeds the ${mb(maxFileSizeBytes)} MB limit`;
}

/**
 * Mutable bookkeeping for a single run
 */
class RunRecorder {
  readonly machine = new PipelineStateMachine();
  readonly steps: StepRecord[] = [];
  readonly startedAtMs = Date.now();
  currentStep: StepName = 'extraction';
  byteLength = 0;

  document?: ExtractedDocument;
  typeVerdict?: TypeVerdict;
  fields?: FieldSet;
  signatures?: SignatureEvidence;
  ruleVerdict?: RuleVerdict;
  judgeVerdict?: JudgeVerdict;

  enter(state: PipelineState): void {
    this.machine.transition(state);
    logger.debug('Pipeline state changed', { state });
  }

  async step<T>(name: StepName, fn: () => T | Promise<T>): Promise<T> {
    const startedMs = Date.now();
    const record: StepRecord = { name, status: 'started', timestamp: new Date(startedMs).toISOString() };
    this.steps.push(record);
    this.currentStep = name;

    try {
      const value = await fn();
      record.status = 'completed';
      record.durationMs = Date.now() - startedMs;
      pipelineStepDurationHistogram.observe({ step: name, status: 'completed' }, record.durationMs / 1000);
      return value;
    } catch (error) {
      record.status = 'failed';
      record.durationMs = Date.now() - startedMs;
      record.error = errorMessage(error);
      pipelineStepDurationHistogram.observe({ step: name, status: 'failed' }, record.durationMs / 1000);
      throw error;
    }
  }

  elapsedSeconds(): number {
    return (Date.now() - this.startedAtMs) / 1000;
  }
}

export class DocumentValidator {
  private readonly agentVersion: string;

  constructor(private readonly deps: DocumentValidatorDeps) {
    this.agentVersion = deps.agentVersion ?? AGENT_VERSION;
  }

  /**
   * Validate a PDF on disk. The file is read inside the extraction step.
   */
  async validateFile(filePath: string): Promise<PipelineRun> {
    const documentId = path.basename(filePath);
    return this.run(documentId, async () => {
      if (!isPdfDocument(filePath)) {
        throw new Error(`Unsupported file type: ${documentId} is not a PDF`);
      }
      return new Uint8Array(await fs.promises.readFile(filePath));
    });
  }

  async validateBytes(bytes: Uint8Array, documentId: string): Promise<PipelineRun> {
    return this.run(documentId, async () => bytes);
  }

  private async run(documentId: string, load: () => Promise<Uint8Array>): Promise<PipelineRun> {
    const runId = ulid();

    return withChildContext({ runId, documentId }, async () => {
      const recorder = new RunRecorder();
      logger.info('Validation started', { document_id: documentId });

      try {
        recorder.enter('EXTRACTING');
        const document = await recorder.step('extraction', async () => {
          const bytes = await load();
          recorder.byteLength = bytes.byteLength;
          if (bytes.byteLength > this.deps.settings.maxFileSizeBytes) {
            throw new Error(fileTooLargeMessage(bytes.byteLength, this.deps.settings.maxFileSizeBytes));
          }
          const extracted = await this.deps.textExtractor.extract(bytes, documentId);
          if (!extracted.ok) throw extracted.error;
          return extracted.value;
        });
        recorder.document = document;
        extractionMethodCounter.inc({ method: document.method });

        recorder.enter('CLASSIFYING_AND_SCRAPING');
        const typeVerdict = await recorder.step('classification', () =>
          this.deps.classifier.classify(document.rawText)
        );
        recorder.typeVerdict = typeVerdict;
        const fields = await recorder.step('field_extraction', () =>
          this.deps.fieldExtractor.extractFields(document.rawText)
        );
        recorder.fields = fields;

        recorder.enter('DETECTING_SIGNATURES');
        const signatures = await recorder.step('signature_detection', () =>
          this.deps.signatureDetector.detect(document)
        );
        recorder.signatures = signatures;
        signaturesDetectedHistogram.observe(signatures.count);
        if (signatures.pageFailures.length > 0) {
          signaturePageFailuresCounter.inc(signatures.pageFailures.length);
        }

        recorder.enter('RULE_CHECKING');
        const ruleVerdict = await recorder.step('rule_evaluation', () =>
          this.deps.ruleEngine.evaluate(fields, signatures.valid)
        );
        recorder.ruleVerdict = ruleVerdict;

        recorder.enter('JUDGING');
        const judgeVerdict = await recorder.step('judge_evaluation', () =>
          this.evaluateWithJudge({
            fields,
            schema: this.deps.settings.requiredFields,
            signatures,
            documentType: typeVerdict.label,
            ruleVerdict,
          })
        );
        recorder.judgeVerdict = judgeVerdict;

        const verdict = await recorder.step('final_decision', () =>
          combine({
            typeVerdict,
            fields,
            schema: this.deps.settings.requiredFields,
            signatures,
            minSignatures: this.deps.settings.minSignatures,
            ruleVerdict,
            judgeVerdict,
          })
        );
        recorder.enter('DECIDED');

        const run = this.buildRun(runId, documentId, recorder, verdict);
        logger.info('Validation decided', {
          status: verdict.status,
          is_valid: verdict.isValid,
          confidence: verdict.confidence,
          signature_count: verdict.signatureCount,
          elapsed_seconds: run.elapsedSeconds,
        });
        this.recordOutcome(run);
        return run;
      } catch (error) {
        return this.fail(runId, documentId, recorder, error);
      }
    });
  }

  private async evaluateWithJudge(request: JudgeRequest): Promise<JudgeVerdict> {
    const { judge, judgePolicy, settings } = this.deps;
    const result = await invokeJudge(judge, request, judgePolicy);

    let verdict: JudgeVerdict;
    if (result.ok) {
      verdict = result.value;
    } else {
      logger.warn('Judge failed, using fallback verdict', {
        judge: judge.name,
        kind: result.error.kind,
        error: result.error.message,
      });
      judgeFallbacksCounter.inc({ reason: result.error.kind });
      verdict = buildFallbackVerdict(request, result.error.message, settings);
    }

    this.emit({
      name: 'judge_evaluation',
      input: buildJudgeInput(request),
      output: toJudgeVerdictPayload(verdict),
      metadata: {
        judge: judge.name,
        source: verdict.source,
        status: result.ok ? 'success' : result.error.kind,
        is_valid: verdict.isValid,
        confidence: verdict.confidence,
      },
    });

    return verdict;
  }

  private fail(runId: string, documentId: string, recorder: RunRecorder, error: unknown): PipelineRun {
    const step = recorder.currentStep;
    const failure: ValidatorError = toStepFailure(step, error);

    if (!recorder.machine.isTerminal()) {
      recorder.enter('FAILED');
    }

    logger.error('Validation failed', failure, { step, kind: failure.kind });

    const verdict = errorVerdict(step, failure, {
      typeVerdict: recorder.typeVerdict,
      fields: recorder.fields,
      schema: this.deps.settings.requiredFields,
      signatures: recorder.signatures,
    });
    const run = this.buildRun(runId, documentId, recorder, verdict);
    this.recordOutcome(run);
    return run;
  }

  private buildRun(runId: string, documentId: string, recorder: RunRecorder, verdict: PipelineRun['verdict']): PipelineRun {
    const run: PipelineRun = {
      runId,
      agentVersion: this.agentVersion,
      document: {
        id: documentId,
        byteLength: recorder.document?.byteLength ?? recorder.byteLength,
        pageCount: recorder.document?.pageCount ?? 0,
      },
      state: recorder.machine.state,
      steps: recorder.steps.map((s) => ({ ...s })),
      startedAt: new Date(recorder.startedAtMs).toISOString(),
      elapsedSeconds: recorder.elapsedSeconds(),
      verdict,
    };

    if (recorder.document) run.extractionMethod = recorder.document.method;
    if (recorder.typeVerdict) run.typeVerdict = recorder.typeVerdict;
    if (recorder.fields) run.fields = recorder.fields;
    if (recorder.signatures) run.signatures = recorder.signatures;
    if (recorder.ruleVerdict) run.ruleVerdict = recorder.ruleVerdict;
    if (recorder.judgeVerdict) run.judgeVerdict = recorder.judgeVerdict;

    return run;
  }

  private recordOutcome(run: PipelineRun): void {
    const { verdict } = run;
    validationsCounter.inc({ status: verdict.status, document_type: verdict.documentType });
    validationDurationHistogram.observe({ status: verdict.status }, run.elapsedSeconds);

    const metadata = {
      agent_version: run.agentVersion,
      app_name: this.deps.appName,
      validation_timestamp: run.startedAt,
    };

    if (verdict.status === 'error') {
      this.emit({
        name: 'pdf_validation_error',
        input: { document_id: run.document.id, error_message: verdict.error?.message ?? verdict.message },
        output: { status: 'error', is_valid: false },
        metadata: { ...metadata, error_type: verdict.error?.kind ?? 'PipelineStepFailure', step: verdict.error?.step },
      });
      return;
    }

    this.emit({
      name: 'pdf_validation_complete',
      input: {
        document_id: run.document.id,
        processing_steps: run.steps.length,
        extraction_method: run.extractionMethod,
      },
      output: {
        final_status: verdict.status,
        is_valid: verdict.isValid,
        confidence: verdict.confidence,
        document_type: verdict.documentType,
        signature_count: verdict.signatureCount,
        processing_time: run.elapsedSeconds,
      },
      metadata,
    });
  }

  private emit(trace: TelemetryTrace): void {
    try {
      this.deps.telemetry.record(trace);
    } catch (error) {
      logger.warn('Telemetry sink failed', { trace_name: trace.name, error: errorMessage(error) });
    }
  }
}
