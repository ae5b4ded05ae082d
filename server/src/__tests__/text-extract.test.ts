import { describe, it, expect, vi } from 'vitest';

vi.mock('pdfjs-dist/legacy/build/pdf.mjs', () => ({
  getDocument: vi.fn(() => ({
    promise: Promise.resolve({
      numPages: 2,
      getPage: async (n: number) => ({
        getTextContent: async () => ({ items: [{ str: 'Page' }, { str: String(n) }] }),
      }),
      destroy: async () => undefined,
    }),
  })),
}));

vi.mock('mammoth', () => ({
  default: {
    extractRawText: vi.fn(async () => ({ value: 'Docx   \nbody\n\n\n\nend' })),
  },
}));

import { TextExtractionError } from '../lib/errors.js';
import { extractTextAuto, sniffKind } from '../lib/text-extract.js';

const encode = (text: string) => new TextEncoder().encode(text);

describe('sniffKind', () => {
  it('detects documents by their leading bytes', () => {
    expect(sniffKind(encode('%PDF-1.7'))).toBe('pdf');
    expect(sniffKind(new Uint8Array([0x50, 0x4b, 0x03, 0x04]))).toBe('docx');
    expect(sniffKind(encode('plain text'))).toBe('txt');
  });
});

describe('extractTextAuto', () => {
  it('decodes and normalizes plain text', async () => {
    expect(await extractTextAuto(encode('  Jane Doe \t\nSQL\n\n\n\nPython  '))).toEqual({
      text: 'Jane Doe\nSQL\n\nPython',
      kind: 'txt',
    });
  });

  it('joins pdf pages with newlines', async () => {
    expect(await extractTextAuto(encode('%PDF-1.4 fake'))).toEqual({ text: 'Page 1\nPage 2', kind: 'pdf' });
  });

  it('extracts raw text from docx', async () => {
    expect(await extractTextAuto(new Uint8Array([0x50, 0x4b, 0x03, 0x04]))).toEqual({
      text: 'Docx\nbody\n\nend',
      kind: 'docx',
    });
  });

  it('rejects empty input', async () => {
    await expect(extractTextAuto(new Uint8Array())).rejects.toThrow(TextExtractionError);
  });
});
