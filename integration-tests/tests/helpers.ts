/**
 * Test helpers: form text, synthetic page images and in-process doubles
 * for the PDF backends, the rasterizer, the Judge and telemetry.
 */

import {
  DEFAULT_VALIDATION_SETTINGS,
  DocumentTypeClassifier,
  DocumentValidator,
  FieldExtractor,
  SignatureDetector,
  TextExtractor,
  ValidationRuleEngine,
  type DocumentValidatorDeps,
  type ExtractedDocument,
  type ExtractionMethod,
  type Judge,
  type JudgeVerdict,
  type PageRasterizer,
  type PageText,
  type RasterDocument,
  type RgbaImage,
  type TelemetrySink,
  type TelemetryTrace,
  type TextExtractionBackend,
} from '@vpncheck/shared';

export const COMPLETE_FORM_LINES = [
  'FORMULIR PERMOHONAN VPN BARU',
  'NIK : 12345678',
  'Nama : Budi Santoso',
  'No Tel : 0812-3456-7890',
  'Email : budi.santoso@infomedia.co.id',
  'Departemen : Network Operations',
  'Manager : Siti Rahma',
  'Range Tanggal : 01 Jan 2024 – 31 Mar 2024',
  'Range Waktu : 08:00:00 - 17:00:00',
  'Approved by : Andi Wijaya',
  'User VPN : Budi Santoso',
];

/**
 * Form text, optionally without the lines starting with the given labels
 */
export function vpnForm(options: { without?: string[] } = {}): string {
  const without = options.without ?? [];
  return COMPLETE_FORM_LINES.filter((line) => !without.some((label) => line.startsWith(label))).join('\n');
}

export function pageText(pageNumber: number, text: string): PageText {
  return { pageNumber, text, tables: [] };
}

export class StaticBackend implements TextExtractionBackend {
  calls = 0;

  constructor(
    readonly method: ExtractionMethod,
    private readonly pages: PageText[]
  ) {}

  async extractPages(): Promise<PageText[]> {
    this.calls++;
    return this.pages;
  }
}

export class FailingBackend implements TextExtractionBackend {
  calls = 0;

  constructor(
    readonly method: ExtractionMethod,
    private readonly message: string
  ) {}

  async extractPages(): Promise<PageText[]> {
    this.calls++;
    throw new Error(this.message);
  }
}

export interface Block {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * White RGBA image with solid black blocks
 */
export function imageWithBlocks(width: number, height: number, blocks: Block[] = []): RgbaImage {
  const data = new Uint8ClampedArray(width * height * 4).fill(255);
  for (const block of blocks) {
    for (let y = block.y; y < block.y + block.height; y++) {
      for (let x = block.x; x < block.x + block.width; x++) {
        const i = (y * width + x) * 4;
        data[i] = 0;
        data[i + 1] = 0;
        data[i + 2] = 0;
      }
    }
  }
  return { width, height, data };
}

/**
 * A page holding `count` signature-sized marks (120x40 each)
 */
export function signaturePage(count: number): RgbaImage {
  const blocks: Block[] = [];
  for (let i = 0; i < count; i++) {
    blocks.push({ x: 20 + i * 140, y: 20, width: 120, height: 40 });
  }
  return imageWithBlocks(Math.max(100, 20 + count * 140), 100, blocks);
}

type PageSource = RgbaImage | Error;

export class FakeRasterizer implements PageRasterizer {
  opened = 0;
  closed = 0;

  constructor(private readonly pages: PageSource[]) {}

  async open(): Promise<RasterDocument> {
    this.opened++;
    const pages = this.pages;
    return {
      pageCount: pages.length,
      renderPage: async (pageNumber: number) => {
        const page = pages[pageNumber - 1];
        if (page instanceof Error) throw page;
        return page;
      },
      close: async () => {
        this.closed++;
      },
    };
  }
}

export class BrokenRasterizer implements PageRasterizer {
  async open(): Promise<RasterDocument> {
    throw new Error('cannot open document');
  }
}

export function extractedDocument(pageCount: number, rawText = ''): ExtractedDocument {
  const pages: PageText[] = [];
  for (let i = 1; i <= pageCount; i++) pages.push(pageText(i, ''));
  return {
    id: 'form.pdf',
    byteLength: 4,
    pageCount,
    rawText,
    pages,
    method: 'pdfjs',
    bytes: new Uint8Array([37, 80, 68, 70]),
  };
}

export function judgeVerdict(overrides: Partial<JudgeVerdict> = {}): JudgeVerdict {
  return {
    isValid: true,
    status: 'approved_for_processing',
    confidence: 0.9,
    issues: [],
    reasoning: 'All criteria met',
    missingFields: [],
    signatureAnalysis: { count: 3, sufficient: true, description: 'Three signatures present' },
    documentTypeAnalysis: { detectedType: 'new_request', confidence: 0.9, description: 'New VPN request form' },
    recommendations: [],
    source: 'judge',
    ...overrides,
  };
}

export type MockJudge = Judge & { evaluate: jest.Mock<Promise<JudgeVerdict>, []> };

export function staticJudge(verdict: JudgeVerdict = judgeVerdict()): MockJudge {
  return {
    name: 'static',
    evaluate: jest.fn(async (): Promise<JudgeVerdict> => verdict),
  };
}

export function failingJudge(message: string): MockJudge {
  return {
    name: 'failing',
    evaluate: jest.fn(async (): Promise<JudgeVerdict> => {
      throw new Error(message);
    }),
  };
}

export class RecordingTelemetry implements TelemetrySink {
  readonly traces: TelemetryTrace[] = [];

  record(trace: TelemetryTrace): void {
    this.traces.push(trace);
  }

  flush(): Promise<void> {
    return Promise.resolve();
  }
}

export interface ValidatorFixture {
  text?: string;
  signatures?: number;
  judge?: Judge;
  telemetry?: TelemetrySink;
  primary?: TextExtractionBackend;
  fallback?: TextExtractionBackend;
  overrides?: Partial<DocumentValidatorDeps>;
}

export function buildValidator(fixture: ValidatorFixture = {}): DocumentValidator {
  const settings = DEFAULT_VALIDATION_SETTINGS;
  const text = fixture.text ?? vpnForm();

  return new DocumentValidator({
    textExtractor: new TextExtractor(
      fixture.primary ?? new StaticBackend('pdfjs', [pageText(1, text)]),
      fixture.fallback ?? new FailingBackend('pdf-parse', 'fallback not expected')
    ),
    classifier: new DocumentTypeClassifier(),
    fieldExtractor: new FieldExtractor(settings.requiredFields),
    signatureDetector: new SignatureDetector(new FakeRasterizer([signaturePage(fixture.signatures ?? 3)]), settings),
    ruleEngine: new ValidationRuleEngine(settings),
    judge: fixture.judge ?? staticJudge(),
    telemetry: fixture.telemetry ?? new RecordingTelemetry(),
    settings,
    judgePolicy: { timeoutMs: 1000, maxRetries: 1 },
    appName: 'vpn-request-validator-test',
    ...fixture.overrides,
  });
}

export const PDF_BYTES = new Uint8Array([37, 80, 68, 70, 45, 49, 46, 52]);
