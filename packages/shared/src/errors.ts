/**
 * Validator Error Kinds
 *
 * Fallible operations return a Result carrying one of these errors so each
 * call site decides whether the failure is fatal or recoverable.
 */

import type { StepName, ValidatorErrorKind } from './types';

export type Result<T, E extends Error = ValidatorError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export abstract class ValidatorError extends Error {
  abstract readonly kind: ValidatorErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Both text extraction backends failed. Fatal for the run.
 */
export class ExtractionFailure extends ValidatorError {
  readonly kind = 'ExtractionFailure' as const;

  constructor(
    readonly primaryError: string,
    readonly fallbackError: string
  ) {
    super(`PDF extraction failed: ${fallbackError} (primary: ${primaryError})`);
  }
}

/**
 * A single page could not be rasterized or analysed. Recovered as zero
 * signature instances for that page.
 */
export class PageSignatureFailure extends ValidatorError {
  readonly kind = 'PageSignatureFailure' as const;

  constructor(
    readonly page: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The Judge threw, timed out or exhausted its retries.
 */
export class JudgeUnavailable extends ValidatorError {
  readonly kind = 'JudgeUnavailable' as const;
}

/**
 * The Judge answered, but not with a usable verdict.
 */
export class JudgeMalformedResponse extends ValidatorError {
  readonly kind = 'JudgeMalformedResponse' as const;

  constructor(
    message: string,
    readonly preview: string = ''
  ) {
    super(message);
  }
}

/**
 * Any other exception raised inside a pipeline step. Fatal for the run.
 */
export class PipelineStepFailure extends ValidatorError {
  readonly kind = 'PipelineStepFailure' as const;

  constructor(
    readonly step: StepName,
    readonly originalMessage: string,
    options?: { cause?: unknown }
  ) {
    super(`${step} failed: ${originalMessage}`, options);
  }
}
