/**
 * Structured Text Backend (pdfjs-dist)
 *
 * Extracts text page by page, preserving line structure and detected tables.
 */

import type { PageText, TextExtractionBackend } from '@vpncheck/shared';
import { layoutPage, type PositionedText } from './layout';
import { loadPdfjs, openPdf } from './pdfjs';

export class PdfjsTextBackend implements TextExtractionBackend {
  readonly method = 'pdfjs' as const;

  async extractPages(bytes: Uint8Array): Promise<PageText[]> {
    const pdfjs = await loadPdfjs();
    const pdf = await openPdf(pdfjs, bytes);

    try {
      const pages: PageText[] = [];

      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        const textContent = await page.getTextContent();

        const items: PositionedText[] = [];
        for (const item of textContent.items) {
          // Marked-content entries carry no text
          if (!('str' in item)) continue;
          items.push({ str: item.str, x: item.transform[4], y: item.transform[5], width: item.width });
        }

        pages.push({ pageNumber, ...layoutPage(items) });
        page.cleanup();
      }

      return pages;
    } finally {
      await pdf.destroy();
    }
  }
}
