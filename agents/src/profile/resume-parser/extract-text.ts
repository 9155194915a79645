/**
 * Resume text extraction: pdf-parse for PDF, mammoth for Word documents.
 * Code-only step - no LLM involvement.
 */

import * as fs from 'fs/promises';
import { createRequire } from 'module';
import * as path from 'path';

type PdfParseResult = {
  text: string;
  numpages: number;
};
type PdfParseFn = (buffer: Buffer) => Promise<PdfParseResult>;
type MammothModule = typeof import('mammoth');

// pdf-parse runs a debug self-test when its entry is imported without a parent
// module, so both CommonJS libraries are loaded through require.
const requireCjs = createRequire(import.meta.url);

let pdfParse: PdfParseFn | null = null;
let mammoth: MammothModule | null = null;

function getPdfParser(): PdfParseFn {
  if (pdfParse) return pdfParse;
  const parser: PdfParseFn = requireCjs('pdf-parse');
  pdfParse = parser;
  return parser;
}

function getMammoth(): MammothModule {
  if (mammoth) return mammoth;
  const loaded: MammothModule = requireCjs('mammoth');
  mammoth = loaded;
  return loaded;
}

export const SUPPORTED_RESUME_EXTENSIONS = ['.pdf', '.docx', '.doc'] as const;

export interface ExtractedText {
  text: string;
  numPages: number;
}

async function assertReadable(filePath: string): Promise<string> {
  const absolutePath = path.resolve(filePath);
  try {
    await fs.access(absolutePath);
  } catch {
    throw new Error(`Resume file not found: ${absolutePath}`);
  }
  return absolutePath;
}

/**
 * Extract text content from a PDF file, pages joined in document order.
 */
export async function extractTextFromPdf(filePath: string): Promise<ExtractedText> {
  const absolutePath = await assertReadable(filePath);
  const buffer = await fs.readFile(absolutePath);

  const parser = getPdfParser();
  const data = await parser(buffer);

  return {
    text: data.text,
    numPages: data.numpages,
  };
}

/**
 * Extract paragraph text from a Word document, one paragraph per line.
 */
export async function extractTextFromDocx(filePath: string): Promise<ExtractedText> {
  const absolutePath = await assertReadable(filePath);
  const result = await getMammoth().extractRawText({ path: absolutePath });

  // mammoth separates paragraphs with a blank line
  const text = result.value.replace(/\n\n/g, '\n');
  return { text, numPages: 1 };
}

/**
 * Extract text from a resume file based on extension.
 */
export async function extractText(filePath: string): Promise<ExtractedText> {
  const ext = path.extname(filePath).toLowerCase();

  switch (ext) {
    case '.pdf':
      return extractTextFromPdf(filePath);
    case '.docx':
    case '.doc':
      return extractTextFromDocx(filePath);
    case '.txt': {
      const absolutePath = await assertReadable(filePath);
      const text = await fs.readFile(absolutePath, 'utf-8');
      return { text, numPages: 1 };
    }
    default:
      throw new Error(`Unsupported file format: ${ext || '(none)'}`);
  }
}

function isSupportedResume(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return SUPPORTED_RESUME_EXTENSIONS.some((supported) => supported === ext);
}

/**
 * First PDF or Word file in a directory (by name), or null.
 */
export async function findResumeFile(resumeDir: string): Promise<string | null> {
  let names: string[];
  try {
    names = await fs.readdir(resumeDir);
  } catch {
    return null;
  }

  const match = names.sort().find(isSupportedResume);
  return match ? path.join(resumeDir, match) : null;
}
