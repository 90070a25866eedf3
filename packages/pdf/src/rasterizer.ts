/**
 * Page Rasterizer (pdfjs-dist + @napi-rs/canvas)
 *
 * Renders pages onto a white canvas and hands back raw RGBA pixels for
 * signature detection.
 */

import { createCanvas } from '@napi-rs/canvas';
import type { PageRasterizer, RasterDocument, RgbaImage } from '@vpncheck/shared';
import { loadPdfjs, openPdf } from './pdfjs';

/** PDF user space is 72 units per inch */
const PDF_UNITS_PER_INCH = 72;

export class PdfjsRasterizer implements PageRasterizer {
  async open(bytes: Uint8Array): Promise<RasterDocument> {
    const pdfjs = await loadPdfjs();
    const pdf = await openPdf(pdfjs, bytes);

    return {
      pageCount: pdf.numPages,

      async renderPage(pageNumber: number, dpi: number): Promise<RgbaImage> {
        const page = await pdf.getPage(pageNumber);
        const viewport = page.getViewport({ scale: dpi / PDF_UNITS_PER_INCH });
        const width = Math.ceil(viewport.width);
        const height = Math.ceil(viewport.height);

        const canvas = createCanvas(width, height);
        const context = canvas.getContext('2d');
        context.fillStyle = '#ffffff';
        context.fillRect(0, 0, width, height);

        await page.render({ canvasContext: context, viewport }).promise;
        const image = context.getImageData(0, 0, width, height);
        page.cleanup();

        return { width: image.width, height: image.height, data: image.data };
      },

      close: () => pdf.destroy(),
    };
  }
}
