import { errorMessage, TextExtractionError } from './errors.js';

export type ExtractedKind = 'pdf' | 'docx' | 'txt';

export interface ExtractedText {
  text: string;
  kind: ExtractedKind;
}

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46]; // %PDF
const ZIP_MAGIC = [0x50, 0x4b]; // PK

function startsWith(bytes: Uint8Array, magic: number[]): boolean {
  return magic.every((byte, i) => bytes[i] === byte);
}

export function sniffKind(bytes: Uint8Array): ExtractedKind {
  if (startsWith(bytes, PDF_MAGIC)) return 'pdf';
  if (startsWith(bytes, ZIP_MAGIC)) return 'docx';
  return 'txt';
}

function normalizeText(text: string): string {
  return text.replace(/\u0000/g, '').replace(/[ \t]+\n/g, '\n').replace(/\n{3,}/g, '\n\n').trim();
}

async function extractFromPdf(bytes: Uint8Array): Promise<string> {
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
  // pdfjs takes ownership of the buffer it is given.
  const pdf = await pdfjs.getDocument({ data: new Uint8Array(bytes), isEvalSupported: false }).promise;
  const pages: string[] = [];

  try {
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const content = await page.getTextContent();
      const text = content.items
        .map((item) => ('str' in item ? item.str : ''))
        .join(' ');
      pages.push(text);
    }
  } finally {
    await pdf.destroy();
  }

  return pages.join('\n');
}

async function extractFromDocx(bytes: Uint8Array): Promise<string> {
  const { default: mammoth } = await import('mammoth');
  const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
  return result.value ?? '';
}

/**
 * Detects the document type from its leading bytes and extracts plain text.
 * Empty input, a parser failure or a document without text raises
 * `TextExtractionError`.
 */
export async function extractTextAuto(bytes: Uint8Array): Promise<ExtractedText> {
  if (bytes.length === 0) {
    throw new TextExtractionError('Object is empty', 'unknown');
  }

  const kind = sniffKind(bytes);
  let raw: string;
  try {
    if (kind === 'pdf') raw = await extractFromPdf(bytes);
    else if (kind === 'docx') raw = await extractFromDocx(bytes);
    else raw = new TextDecoder('utf-8').decode(bytes);
  } catch (err) {
    throw new TextExtractionError(
      `Failed to extract ${kind} text: ${errorMessage(err)}`,
      kind,
    );
  }

  const text = normalizeText(raw);
  if (!text && kind !== 'txt') {
    throw new TextExtractionError(`No extractable text in ${kind} document`, kind);
  }
  return { text, kind };
}
