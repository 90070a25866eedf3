/**
 * Text Extractor
 *
 * Runs the structured (table-aware) backend first and falls back to the plain
 * text backend on any failure. When both fail the document cannot be
 * validated.
 */

import { ExtractionFailure, errorMessage, ok, err, type Result } from '../errors';
import { logger } from '../logger';
import type { ExtractedDocument, ExtractionMethod, PageText } from '../types';

export interface TextExtractionBackend {
  readonly method: ExtractionMethod;
  extractPages(bytes: Uint8Array): Promise<PageText[]>;
}

/**
 * Concatenate page texts with page markers
 */
export function joinPageText(pages: readonly PageText[]): string {
  return pages.map((p) => `\n--- Page ${p.pageNumber} ---\n${p.text}`).join('');
}

/**
 * Ensure pages are ordered and carry 1-based indices
 */
function normalizePages(pages: PageText[]): PageText[] {
  return [...pages]
    .sort((a, b) => a.pageNumber - b.pageNumber)
    .map((page, index) => ({ ...page, pageNumber: index + 1 }));
}

export class TextExtractor {
  constructor(
    private readonly primary: TextExtractionBackend,
    private readonly fallback: TextExtractionBackend
  ) {}

  async extract(bytes: Uint8Array, id: string): Promise<Result<ExtractedDocument, ExtractionFailure>> {
    logger.info('Extracting text from PDF', { document_id: id, bytes: bytes.byteLength });

    let primaryError = '';
    try {
      return ok(this.buildDocument(id, bytes, this.primary.method, await this.primary.extractPages(bytes)));
    } catch (error) {
      primaryError = errorMessage(error);
      logger.warn('Primary text extraction failed, trying fallback', {
        document_id: id,
        backend: this.primary.method,
        error: primaryError,
      });
    }

    try {
      return ok(this.buildDocument(id, bytes, this.fallback.method, await this.fallback.extractPages(bytes)));
    } catch (error) {
      const fallbackError = errorMessage(error);
      logger.error('Fallback text extraction also failed', error, {
        document_id: id,
        backend: this.fallback.method,
      });
      return err(new ExtractionFailure(primaryError, fallbackError));
    }
  }

  private buildDocument(
    id: string,
    bytes: Uint8Array,
    method: ExtractionMethod,
    extracted: PageText[]
  ): ExtractedDocument {
    const pages = normalizePages(extracted);
    const rawText = joinPageText(pages);

    logger.info('PDF text extraction complete', {
      document_id: id,
      method,
      totalPages: pages.length,
      totalChars: rawText.length,
    });

    return Object.freeze({
      id,
      byteLength: bytes.byteLength,
      pageCount: pages.length,
      rawText,
      pages: Object.freeze(pages),
      method,
      bytes,
    });
  }
}
