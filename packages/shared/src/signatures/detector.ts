/**
 * Signature Detector
 *
 * Counts signature-like marks per page: rasterize, grayscale, threshold,
 * external contours, then keep contours whose size and aspect ratio look
 * like a handwritten signature. This is a coarse heuristic; no ink or
 * handwriting classification happens here.
 */

import type { ValidationSettings } from '../config';
import { PageSignatureFailure, errorMessage, ok, err, type Result } from '../errors';
import { logger } from '../logger';
import type { ExtractedDocument, PageFailure, SignatureEvidence, SignatureInstance } from '../types';
import {
  binarizeInverse,
  findExternalContours,
  toGrayscale,
  type Contour,
  type RgbaImage,
} from './contours';

export const SIGNATURE_HEURISTICS = {
  /** Rasterization resolution */
  dpi: 150,
  /** Gray levels at or below this are ink */
  darkThreshold: 100,
  minArea: 500,
  maxArea: 50000,
  minWidth: 50,
  minHeight: 20,
  minAspectRatio: 1.5,
  maxAspectRatio: 8,
  /** area / confidenceAreaScale, capped at maxConfidence */
  confidenceAreaScale: 10000,
  maxConfidence: 0.9,
} as const;

/**
 * A rasterized view of one PDF. Pages are rendered on demand.
 */
export interface RasterDocument {
  readonly pageCount: number;
  renderPage(pageNumber: number, dpi: number): Promise<RgbaImage>;
  close(): Promise<void>;
}

export interface PageRasterizer {
  open(bytes: Uint8Array): Promise<RasterDocument>;
}

export function isSignatureCandidate(contour: Contour): boolean {
  const h = SIGNATURE_HEURISTICS;
  const { width, height } = contour.boundingBox;
  const aspectRatio = width / height;

  return (
    contour.area > h.minArea &&
    contour.area < h.maxArea &&
    width > h.minWidth &&
    height > h.minHeight &&
    aspectRatio > h.minAspectRatio &&
    aspectRatio < h.maxAspectRatio
  );
}

export function signatureConfidence(area: number): number {
  return Math.min(SIGNATURE_HEURISTICS.maxConfidence, area / SIGNATURE_HEURISTICS.confidenceAreaScale);
}

/**
 * Find signature-like marks in one rendered page
 */
export function detectInImage(image: RgbaImage, page: number): SignatureInstance[] {
  const gray = toGrayscale(image);
  const binary = binarizeInverse(gray, image.width, image.height, SIGNATURE_HEURISTICS.darkThreshold);

  return findExternalContours(binary)
    .filter(isSignatureCandidate)
    .map((contour) => ({
      page,
      boundingBox: contour.boundingBox,
      area: contour.area,
      confidence: signatureConfidence(contour.area),
    }));
}

export class SignatureDetector {
  constructor(
    private readonly rasterizer: PageRasterizer,
    private readonly settings: Pick<ValidationSettings, 'minSignatures'>
  ) {}

  async detect(document: ExtractedDocument): Promise<SignatureEvidence> {
    const instances: SignatureInstance[] = [];
    const pageFailures: PageFailure[] = [];

    const opened = await this.openDocument(document);
    if (!opened.ok) {
      for (let page = 1; page <= document.pageCount; page++) {
        pageFailures.push({ page, message: opened.error.message });
      }
    } else {
      const raster = opened.value;
      try {
        for (let page = 1; page <= raster.pageCount; page++) {
          const result = await this.detectPage(raster, page);
          if (result.ok) {
            instances.push(...result.value);
          } else {
            logger.warn('Signature detection failed for page', {
              document_id: document.id,
              page,
              error: result.error.message,
            });
            pageFailures.push({ page, message: result.error.message });
          }
        }
      } finally {
        await raster.close();
      }
    }

    const count = instances.length;

    logger.info('Signature detection complete', {
      document_id: document.id,
      signature_count: count,
      min_signatures: this.settings.minSignatures,
      page_failures: pageFailures.length,
    });

    return {
      count,
      instances,
      valid: count >= this.settings.minSignatures,
      pageFailures,
    };
  }

  private async openDocument(document: ExtractedDocument): Promise<Result<RasterDocument, PageSignatureFailure>> {
    try {
      return ok(await this.rasterizer.open(document.bytes));
    } catch (error) {
      logger.error('Could not open document for rasterization', error, { document_id: document.id });
      return err(new PageSignatureFailure(0, `Rasterization failed: ${errorMessage(error)}`, { cause: error }));
    }
  }

  private async detectPage(
    raster: RasterDocument,
    page: number
  ): Promise<Result<SignatureInstance[], PageSignatureFailure>> {
    try {
      const image = await raster.renderPage(page, SIGNATURE_HEURISTICS.dpi);
      return ok(detectInImage(image, page));
    } catch (error) {
      return err(new PageSignatureFailure(page, errorMessage(error), { cause: error }));
    }
  }
}
