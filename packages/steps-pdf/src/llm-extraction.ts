/**
 * LLM-guided structured extraction
 *
 * The model's answer is never validated directly: it is parsed, sanitized into
 * a candidate and only then checked against the domain schema.
 */

import type { Diagnostic, FiscalDocument } from '@nfe-ledger/contracts';
import { sanitizeRawNfe, validateFiscalDocument } from '@nfe-ledger/domain';
import { ExtractionError, noopLogger, type Logger } from '@nfe-ledger/shared';
import { buildExtractionRequest } from './llm-prompt.js';
import { MAX_LLM_INPUT_CHARS, MIN_TEXT_LENGTH, type LlmClient } from './types.js';

export interface LlmExtractionOptions {
  client: LlmClient;
  /** @default true */
  placeholderItem?: boolean;
  /** @default 150000 */
  maxChars?: number;
  /** Component name recorded on diagnostics */
  source?: string;
  logger?: Logger;
}

export interface LlmExtractionResult {
  document: FiscalDocument;
  /** Sanitizer and advisory validation warnings */
  diagnostics: Diagnostic[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a model answer that must be a JSON object. A surrounding markdown
 * code fence is tolerated.
 *
 * @throws ExtractionError (stage 'llm', reason 'malformed')
 */
export function parseJsonObject(answer: string): Record<string, unknown> {
  const fenced = /^\s*```(?:json)?\s*([\s\S]*?)\s*```\s*$/i.exec(answer);
  const body = fenced?.[1] ?? answer;

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ExtractionError(`LLM answer is not valid JSON: ${message}`, 'llm', { reason: 'malformed' });
  }

  if (!isRecord(parsed)) {
    throw new ExtractionError('LLM did not return a JSON object', 'llm', { reason: 'malformed' });
  }
  return parsed;
}

/**
 * Extract a fiscal document from DANFE text with a language model.
 *
 * @throws ExtractionError when the text is too short or the answer is not a JSON object
 * @throws ValidationError when the sanitized answer fails the domain schema
 */
export async function extractWithLlm(text: string, options: LlmExtractionOptions): Promise<LlmExtractionResult> {
  const logger = options.logger ?? noopLogger;

  if (text.trim().length < MIN_TEXT_LENGTH) {
    throw new ExtractionError('Insufficient text for LLM extraction', 'llm', {
      reason: 'insufficient-text',
      length: text.trim().length,
    });
  }

  const request = buildExtractionRequest(text, options.maxChars ?? MAX_LLM_INPUT_CHARS);
  logger.debug('Requesting LLM extraction', {
    provider: options.client.provider,
    model: options.client.model,
    characters: Math.min(text.length, options.maxChars ?? MAX_LLM_INPUT_CHARS),
  });

  const answer = await options.client.completeJson(request);
  const raw = parseJsonObject(answer);

  const sanitized = sanitizeRawNfe(raw, { source: 'llm', placeholderItem: options.placeholderItem ?? true });
  for (const diagnostic of sanitized.diagnostics) {
    if (diagnostic.code === 'SANITIZE-PLACEHOLDER-ITEM') {
      logger.warn('LLM returned no items; placeholder item added', { code: diagnostic.code });
    }
  }

  const validated = validateFiscalDocument(sanitized.candidate, {
    source: options.source ?? 'nfe-ledger/pdf',
    logger,
  });

  return {
    document: validated.document,
    diagnostics: [...sanitized.diagnostics, ...validated.diagnostics],
  };
}
