/**
 * PDF Extraction Step
 *
 * Obtains DANFE text through an ordered chain of strategies (embedded text
 * layer, then OCR), extracts a document from that text with a language model
 * and cross-checks it against layout heuristics.
 *
 * Privacy:
 * - Neither the PDF text nor the model answer is logged
 * - Logs carry codes, counts and provider names only
 */

import { extname } from 'node:path';
import type { Diagnostic, DocumentSource, ExtractionResult, ExtractionStep, FiscalDocument } from '@nfe-ledger/contracts';
import {
  ConfigurationError,
  ExtractionError,
  TimeoutError,
  ValidationError,
  createSafeLogger,
  type Logger,
} from '@nfe-ledger/shared';
import { extractTextLayer } from './text-layer.js';
import { PopplerTesseractRunner } from './poppler-tesseract-runner.js';
import { createLlmClient } from './llm-client.js';
import { extractWithLlm } from './llm-extraction.js';
import { analyzeLayout, crossCheckLayout } from './layout-heuristics.js';
import { MAX_LLM_INPUT_CHARS, type OcrRunner, type PdfExtractionConfig, type PdfWord } from './types.js';

export const PDF_EXTRACTION_STEP_ID = 'nfe-ledger/pdf';

const DEFAULT_MAX_PDF_SIZE = 20 * 1024 * 1024; // 20MB

/**
 * Outcome of one text strategy: text to work with, or a reason to try the next one
 */
export type TextStrategyOutcome =
  | { kind: 'ok'; text: string; words: PdfWord[]; usedOcr: boolean }
  | { kind: 'next'; reason: string };

export interface TextStrategy {
  name: string;
  run(pdf: Uint8Array): Promise<TextStrategyOutcome>;
}

/**
 * Embedded text layer; yields to the next strategy below the minimum text length
 */
export function textLayerStrategy(): TextStrategy {
  return {
    name: 'text-layer',
    async run(pdf) {
      const layer = await extractTextLayer(pdf);
      if (!layer.hasTextLayer) {
        return { kind: 'next', reason: `text layer has ${String(layer.plainText.length)} characters` };
      }
      return { kind: 'ok', text: layer.plainText, words: layer.words, usedOcr: false };
    },
  };
}

/**
 * OCR over rasterized pages
 */
export function ocrStrategy(runner: OcrRunner, enabled: boolean, logger: Logger): TextStrategy {
  return {
    name: 'ocr',
    async run(pdf) {
      if (!enabled) {
        return { kind: 'next', reason: 'OCR is disabled' };
      }
      logger.info('No usable text layer; running OCR');
      const ocr = await runner.recognize(pdf);
      return { kind: 'ok', text: ocr.text, words: [], usedOcr: true };
    },
  };
}

/**
 * Run strategies in order until one yields text.
 */
export async function obtainText(
  pdf: Uint8Array,
  strategies: readonly TextStrategy[],
): Promise<TextStrategyOutcome & { reasons: string[] }> {
  const reasons: string[] = [];
  for (const strategy of strategies) {
    const outcome = await strategy.run(pdf);
    if (outcome.kind === 'ok') {
      return { ...outcome, reasons };
    }
    reasons.push(`${strategy.name}: ${outcome.reason}`);
  }
  return { kind: 'next', reason: reasons.join('; '), reasons };
}

function hasPdfHeader(bytes: Uint8Array): boolean {
  const head = Buffer.from(bytes.subarray(0, 1024)).toString('latin1');
  return head.includes('%PDF-');
}

interface ErrorMapping {
  code: string;
  status: 'failed' | 'error';
  category: Diagnostic['category'];
}

/**
 * Map an extraction error to a diagnostic code and step status.
 * Engine and provider problems are 'error'; document problems are 'failed'.
 */
function mapExtractionError(error: ExtractionError): ErrorMapping {
  const reason = error.context?.['reason'];
  switch (error.stage) {
    case 'text-layer':
      return { code: 'PDF-OPEN', status: 'failed', category: 'format' };
    case 'ocr':
      if (reason === 'unavailable') return { code: 'PDF-OCR-UNAVAILABLE', status: 'error', category: 'extraction' };
      if (reason === 'empty') return { code: 'PDF-OCR-EMPTY', status: 'failed', category: 'extraction' };
      return { code: 'PDF-OCR-FAILED', status: 'error', category: 'extraction' };
    case 'llm':
      if (reason === 'insufficient-text') return { code: 'PDF-TEXT-INSUFFICIENT', status: 'failed', category: 'extraction' };
      if (reason === 'malformed') return { code: 'PDF-LLM-MALFORMED', status: 'failed', category: 'extraction' };
      return { code: 'PDF-LLM-EMPTY', status: 'error', category: 'extraction' };
    default:
      return { code: 'PDF-INTERNAL', status: 'error', category: 'internal' };
  }
}

/**
 * PDF Extraction Step Factory
 *
 * @example
 * ```typescript
 * const step = createPdfExtractionStep({
 *   llm: { provider: 'openai', apiKey: process.env.OPENAI_API_KEY },
 * });
 * const result = await step.execute({ content: await readFile('danfe.pdf'), fileName: 'danfe.pdf' });
 * ```
 */
export function createPdfExtractionStep(config: PdfExtractionConfig = {}): ExtractionStep {
  const logger = config.logger ?? createSafeLogger({ prefix: 'nfe-ledger:pdf' });
  const maxPdfSize = config.maxPdfSize ?? DEFAULT_MAX_PDF_SIZE;
  const ocrRunner =
    config.ocrRunner ?? new PopplerTesseractRunner({ language: config.ocrLanguage ?? 'por', logger });
  const strategies = [textLayerStrategy(), ocrStrategy(ocrRunner, config.ocrEnabled ?? true, logger)];

  const step: ExtractionStep = {
    id: PDF_EXTRACTION_STEP_ID,
    name: 'NF-e PDF Extraction',
    version: '0.1.0',
    description: 'Extracts DANFE text (text layer or OCR) and reads it into a validated document with an LLM',

    async execute(source: DocumentSource): Promise<ExtractionResult> {
      const startTime = Date.now();
      const startedAt = new Date().toISOString();
      const diagnostics: Diagnostic[] = [];
      let phase: 'text' | 'llm' = 'text';

      const fail = (
        code: string,
        message: string,
        category: Diagnostic['category'],
        status: 'failed' | 'error' = 'failed',
        extra: Diagnostic[] = [],
      ): ExtractionResult => ({
        stepId: step.id,
        status,
        diagnostics: [{ code, message, severity: 'error', category, source: step.id }, ...extra, ...diagnostics],
        durationMs: Date.now() - startTime,
        startedAt,
        completedAt: new Date().toISOString(),
      });

      try {
        if (source.fileName !== undefined) {
          const extension = extname(source.fileName).toLowerCase();
          if (extension !== '.pdf') {
            return fail('PDF-EXTENSION', `Unsupported extension for PDF extraction: ${extension || '(none)'}`, 'format');
          }
        }

        const pdf = typeof source.content === 'string' ? new TextEncoder().encode(source.content) : source.content;
        if (pdf.byteLength > maxPdfSize) {
          return fail('PDF-SIZE', `PDF exceeds maximum size (${Math.round(maxPdfSize / 1024 / 1024)}MB)`, 'format');
        }
        if (!hasPdfHeader(pdf)) {
          return fail('PDF-NOT-PDF', 'Content does not appear to be a PDF', 'format');
        }

        // Step 1: Text
        const obtained = await obtainText(pdf, strategies);
        if (obtained.kind === 'next') {
          return fail('PDF-NO-TEXT', `No text could be obtained from the PDF (${obtained.reason})`, 'extraction');
        }
        logger.info('PDF text obtained', { usedOcr: obtained.usedOcr, characters: obtained.text.length });

        // Step 2: LLM
        if (config.llmEnabled === false) {
          return fail('PDF-LLM-DISABLED', 'LLM extraction is disabled; a PDF cannot be read without it', 'extraction');
        }
        phase = 'llm';
        const client = config.llmClient ?? createLlmClient(config.llm ?? { provider: 'openai' });
        const extracted = await extractWithLlm(obtained.text, {
          client,
          placeholderItem: config.placeholderItem ?? true,
          source: step.id,
          logger,
        });
        diagnostics.push(...extracted.diagnostics);

        // Step 3: Layout cross-check
        let document: FiscalDocument = extracted.document;
        const findings = analyzeLayout(obtained.words, obtained.text, config.layoutRadii);
        if (config.layoutCrossCheck ?? true) {
          const layoutDiagnostics = crossCheckLayout(document, findings);
          for (const diagnostic of layoutDiagnostics) {
            logger.warn(diagnostic.message, { code: diagnostic.code, location: diagnostic.location });
          }
          diagnostics.push(...layoutDiagnostics);
        }
        if (document.accessKey === null && findings.accessKey !== null) {
          document = Object.freeze({ ...document, accessKey: findings.accessKey });
        }

        logger.info('NF-e PDF extracted', {
          cfop: document.cfop,
          items: document.items.length,
          provider: client.provider,
          warnings: diagnostics.filter((d) => d.severity === 'warning').length,
        });

        return {
          stepId: step.id,
          status: 'passed',
          document,
          diagnostics,
          durationMs: Date.now() - startTime,
          startedAt,
          completedAt: new Date().toISOString(),
          metadata: {
            usedOcr: obtained.usedOcr,
            textLength: obtained.text.length,
            truncated: obtained.text.length > MAX_LLM_INPUT_CHARS,
            llmProvider: client.provider,
            llmModel: client.model,
            layout: findings,
          },
        };
      } catch (error) {
        if (error instanceof ValidationError) {
          logger.warn('LLM answer failed validation', { issues: error.diagnostics.length });
          return fail(
            'PDF-INVALID-DOCUMENT',
            `Invalid NF-e data: ${error.diagnostics.map((d) => d.message).join('; ')}`,
            'schema',
            'failed',
            error.diagnostics,
          );
        }

        if (error instanceof TimeoutError) {
          logger.error('OCR timed out', { timeoutMs: error.timeoutMs });
          return fail('PDF-OCR-TIMEOUT', error.message, 'extraction', 'error');
        }

        if (error instanceof ConfigurationError) {
          logger.error('LLM is not configured', { error: error.message });
          return fail('PDF-LLM-CONFIG', error.message, 'internal', 'error');
        }

        if (error instanceof ExtractionError) {
          const mapping = mapExtractionError(error);
          logger.warn('PDF extraction stopped', { code: mapping.code, stage: error.stage });
          return fail(mapping.code, error.message, mapping.category, mapping.status);
        }

        const message = error instanceof Error ? error.message : String(error);
        if (phase === 'llm') {
          logger.error('LLM request failed', { error: message });
          return fail('PDF-LLM-REQUEST', `LLM request failed: ${message}`, 'extraction', 'error');
        }
        logger.error('Internal PDF extraction error', { error: message });
        return fail('PDF-INTERNAL', `Internal PDF extraction error: ${message}`, 'internal', 'error');
      }
    },
  };

  return step;
}
