/**
 * Plain Text Backend (pdf-parse)
 *
 * Used when the structured backend fails. Produces per-page text without
 * table detection.
 */

import pdfParse from 'pdf-parse';
import type { PageText, TextExtractionBackend } from '@vpncheck/shared';

interface PlainTextItem {
  str: string;
  transform: number[];
}

interface PlainTextPage {
  pageIndex: number;
  getTextContent(options: {
    normalizeWhitespace: boolean;
    disableCombineTextItems: boolean;
  }): Promise<{ items: PlainTextItem[] }>;
}

/**
 * Same line breaking as pdf-parse's default page renderer
 */
export function renderPlainText(items: readonly PlainTextItem[]): string {
  let lastY: number | undefined;
  let text = '';

  for (const item of items) {
    const y = item.transform[5];
    if (lastY === undefined || lastY === y) {
      text += item.str;
    } else {
      text += '\n' + item.str;
    }
    lastY = y;
  }

  return text;
}

export class PdfParseTextBackend implements TextExtractionBackend {
  readonly method = 'pdf-parse' as const;

  async extractPages(bytes: Uint8Array): Promise<PageText[]> {
    const pending: Array<Promise<PageText>> = [];

    const result = await pdfParse(Buffer.from(bytes), {
      pagerender: (page: PlainTextPage) => {
        pending.push(
          page
            .getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false })
            .then((content) => ({
              pageNumber: page.pageIndex + 1,
              text: renderPlainText(content.items),
              tables: [],
            }))
        );
        return '';
      },
    });

    const pages = await Promise.all(pending);
    if (pages.length === 0 && result.numpages > 0) {
      throw new Error('pdf-parse produced no pages');
    }
    return pages;
  }
}
