/**
 * pdfjs-dist loader
 *
 * pdfjs-dist ships as ES modules only, so it is loaded with a dynamic import
 * from this CommonJS package and cached for the life of the process.
 */

import path from 'path';

export type PdfjsModule = typeof import('pdfjs-dist/legacy/build/pdf.mjs');

/** pdfjs `VerbosityLevel.ERRORS`: no per-glyph warnings on stdout */
const PDFJS_VERBOSITY_ERRORS = 0;

let pdfjsPromise: Promise<PdfjsModule> | undefined;

function pdfjsRoot(): string {
  return path.dirname(require.resolve('pdfjs-dist/package.json'));
}

export function loadPdfjs(): Promise<PdfjsModule> {
  if (!pdfjsPromise) {
    pdfjsPromise = import('pdfjs-dist/legacy/build/pdf.mjs').then((pdfjs) => {
      // Configure worker for Node.js environment
      pdfjs.GlobalWorkerOptions.workerSrc = path.join(pdfjsRoot(), 'legacy/build/pdf.worker.mjs');
      return pdfjs;
    });
  }
  return pdfjsPromise;
}

export interface PdfDocumentParams {
  data: Uint8Array;
  isEvalSupported: boolean;
  useSystemFonts: boolean;
  standardFontDataUrl: string;
  verbosity: number;
}

/**
 * Options for `getDocument`. Non-embedded standard fonts (Helvetica, Times)
 * are drawn from the font files bundled with pdfjs-dist; without them the
 * Node build renders pages with no text.
 */
export function pdfDocumentParams(bytes: Uint8Array): PdfDocumentParams {
  return {
    // pdfjs transfers the buffer it is given, so hand it a copy
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    useSystemFonts: false,
    // The font loader appends file names to this prefix
    standardFontDataUrl: path.join(pdfjsRoot(), 'standard_fonts') + path.sep,
    verbosity: PDFJS_VERBOSITY_ERRORS,
  };
}

export async function openPdf(pdfjs: PdfjsModule, bytes: Uint8Array) {
  return pdfjs.getDocument(pdfDocumentParams(bytes)).promise;
}
