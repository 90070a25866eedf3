/**
 * Service helpers: upload admission, batch enqueue and result persistence
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { PipelineRun, ValidateDocumentJob } from '@vpncheck/shared';
import { checkUpload, safeFileName, withTempUpload } from '../../services/validator-api/src/lib/upload';
import { enqueueFolder, isDirectory, listPdfFiles, type JobSink } from '../../services/validator-api/src/lib/batch';
import { resultFilePath, writeRunResult } from '../../services/worker-validator/src/lib/results';
import { buildValidator, PDF_BYTES } from './helpers';

const MB = 1024 * 1024;

function upload(originalname: string, mimetype: string, size: number) {
  return { originalname, mimetype, size, buffer: Buffer.alloc(0) };
}

class RecordingQueue implements JobSink {
  readonly jobs: Array<{ name: string; data: ValidateDocumentJob; opts?: { jobId?: string } }> = [];

  async add(name: string, data: ValidateDocumentJob, opts?: { jobId?: string }): Promise<unknown> {
    this.jobs.push({ name, data, opts });
    return { id: opts?.jobId };
  }
}

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vpncheck-svc-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('checkUpload', () => {
  it('accepts a PDF within the limit', () => {
    expect(checkUpload(upload('form.pdf', 'application/pdf', 2 * MB), 10 * MB)).toEqual({ ok: true });
  });

  it('refuses other file types', () => {
    expect(checkUpload(upload('form.docx', 'application/msword', 100), 10 * MB)).toEqual({
      ok: false,
      status: 400,
      code: 'invalid_request',
      message: 'Only PDF files are supported: form.docx',
    });
  });

  it('refuses oversized files', () => {
    expect(checkUpload(upload('form.pdf', 'application/pdf', 11 * MB), 10 * MB)).toEqual({
      ok: false,
      status: 413,
      code: 'payload_too_large',
      message: 'File form.pdf exceeds the 10 MB limit',
    });
  });
});

describe('safeFileName', () => {
  it('strips directories and unsafe characters', () => {
    expect(safeFileName('../../etc/pass wd.pdf')).toBe('pass_wd.pdf');
    expect(safeFileName('formulir (1).pdf')).toBe('formulir__1_.pdf');
  });

  it('adds a .pdf suffix to names without one', () => {
    expect(safeFileName('vpn-request')).toBe('vpn-request.pdf');
    expect(safeFileName('scan.PDF')).toBe('scan.PDF');
    expect(safeFileName('')).toBe('upload.pdf');
  });
});

describe('withTempUpload', () => {
  it('writes the upload and removes it afterwards', async () => {
    let seen = '';
    const size = await withTempUpload({ originalname: 'form.pdf', buffer: Buffer.from('%PDF') }, dir, async (filePath) => {
      seen = filePath;
      return fs.statSync(filePath).size;
    });

    expect(size).toBe(4);
    expect(path.basename(seen)).toBe('form.pdf');
    expect(fs.existsSync(seen)).toBe(false);
  });

  it('lets the validator read a PDF admitted by content type only', async () => {
    const file = { originalname: 'vpn-request', mimetype: 'application/pdf', size: PDF_BYTES.length, buffer: Buffer.from(PDF_BYTES) };
    expect(checkUpload(file, 10 * MB)).toEqual({ ok: true });

    const run = await withTempUpload(file, dir, (filePath) => buildValidator().validateFile(filePath));

    expect(run.document.id).toBe('vpn-request.pdf');
    expect(run.verdict.status).toBe('approved_for_processing');
  });

  it('removes the file when the callback throws', async () => {
    let seen = '';
    const attempt = withTempUpload({ originalname: 'form.pdf', buffer: Buffer.from('%PDF') }, dir, async (filePath) => {
      seen = filePath;
      throw new Error('validator crashed');
    });

    await expect(attempt).rejects.toThrow('validator crashed');
    expect(fs.existsSync(path.dirname(seen))).toBe(false);
  });
});

describe('batch enqueue', () => {
  beforeEach(() => {
    for (const name of ['b.pdf', 'a.PDF', 'notes.txt']) {
      fs.writeFileSync(path.join(dir, name), 'x');
    }
    fs.mkdirSync(path.join(dir, 'nested.pdf'));
  });

  it('detects directories', async () => {
    expect(await isDirectory(dir)).toBe(true);
    expect(await isDirectory(path.join(dir, 'b.pdf'))).toBe(false);
    expect(await isDirectory(path.join(dir, 'missing'))).toBe(false);
  });

  it('lists PDF files only, sorted', async () => {
    expect(await listPdfFiles(dir)).toEqual([path.resolve(dir, 'a.PDF'), path.resolve(dir, 'b.pdf')]);
  });

  it('enqueues one job per PDF', async () => {
    const queue = new RecordingQueue();

    const count = await enqueueFolder(dir, 'corr-1', queue);

    expect(count).toBe(2);
    expect(queue.jobs.map((job) => [job.name, job.data.file_path, job.opts?.jobId])).toEqual([
      ['validate_document', path.resolve(dir, 'a.PDF'), 'validate_corr-1_0'],
      ['validate_document', path.resolve(dir, 'b.pdf'), 'validate_corr-1_1'],
    ]);
    expect(queue.jobs.every((job) => job.data.correlation_id === 'corr-1')).toBe(true);
  });
});

describe('writeRunResult', () => {
  it('writes the run as JSON named by run id', async () => {
    const run = await buildValidator().validateBytes(PDF_BYTES, 'request.pdf');
    const resultsPath = path.join(dir, 'results');

    const filePath = await writeRunResult(run, resultsPath);

    expect(filePath).toBe(resultFilePath(resultsPath, run.runId));
    const stored: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    expect(stored).toEqual(JSON.parse(JSON.stringify(run)));
  });

  it('refuses a run that does not match the schema', async () => {
    const run = await buildValidator().validateBytes(PDF_BYTES, 'request.pdf');
    const broken: PipelineRun = { ...run, runId: '' };

    await expect(writeRunResult(broken, dir)).rejects.toThrow('does not match schema');
  });
});
