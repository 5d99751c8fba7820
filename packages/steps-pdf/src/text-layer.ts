/**
 * PDF text layer extraction (pdfjs-dist)
 */

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { ExtractionError } from '@nfe-ledger/shared';
import { MIN_TEXT_LENGTH, type PageTextBlock, type PdfWord, type TextLayerResult } from './types.js';

interface PositionedRun {
  str: string;
  x: number;
  top: number;
  width: number;
  height: number;
  hasEOL: boolean;
}

/**
 * Split a text run into words, spreading the run width evenly over its characters.
 */
export function splitRunIntoWords(run: PositionedRun, page: number): PdfWord[] {
  const words: PdfWord[] = [];
  if (run.str.length === 0) return words;

  const charWidth = run.width / run.str.length;
  const pattern = /\S+/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(run.str)) !== null) {
    const x0 = run.x + match.index * charWidth;
    words.push({
      page,
      x0,
      y0: run.top,
      x1: x0 + match[0].length * charWidth,
      y1: run.top + run.height,
      text: match[0],
    });
  }
  return words;
}

/**
 * Read per-page text, positioned blocks and words from a PDF.
 *
 * @throws ExtractionError (stage 'text-layer') when the PDF cannot be opened
 */
export async function extractTextLayer(pdf: Uint8Array): Promise<TextLayerResult> {
  // pdf.js takes ownership of the buffer it is given
  const loadingTask = getDocument({
    data: new Uint8Array(pdf),
    disableFontFace: true,
    useSystemFonts: true,
    isEvalSupported: false,
    verbosity: 0,
  });

  const pdfDocument = await loadingTask.promise.catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    throw new ExtractionError(`Failed to open PDF: ${message}`, 'text-layer', { reason: 'open' });
  });
  const pageCount = pdfDocument.numPages;

  const pageTexts: string[] = [];
  const blocks: PageTextBlock[] = [];
  const words: PdfWord[] = [];

  try {
    for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
      const page = await pdfDocument.getPage(pageNumber);
      const viewport = page.getViewport({ scale: 1 });
      const content = await page.getTextContent();

      let pageText = '';
      for (const item of content.items) {
        if (!('str' in item)) continue;

        const height = Math.abs(Number(item.height) || Number(item.transform[3]) || 0);
        const run: PositionedRun = {
          str: item.str,
          x: Number(item.transform[4]),
          top: viewport.height - Number(item.transform[5]) - height,
          width: Number(item.width),
          height,
          hasEOL: item.hasEOL,
        };

        pageText += run.str + (run.hasEOL ? '\n' : ' ');
        if (run.str.trim().length > 0) {
          blocks.push({
            page: pageNumber,
            x0: run.x,
            y0: run.top,
            x1: run.x + run.width,
            y1: run.top + run.height,
            text: run.str,
          });
          words.push(...splitRunIntoWords(run, pageNumber));
        }
      }

      const trimmed = pageText.replace(/\u00a0/g, ' ').trim();
      if (trimmed.length > 0) pageTexts.push(trimmed);
      page.cleanup();
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ExtractionError(`Failed to read PDF text: ${message}`, 'text-layer', { reason: 'read' });
  } finally {
    await pdfDocument.destroy();
  }

  const plainText = pageTexts.join('\n').trim();
  return {
    plainText,
    blocks,
    words,
    pageCount,
    hasTextLayer: plainText.length >= MIN_TEXT_LENGTH,
  };
}
