/**
 * Types for the PDF extraction step
 */

import type { Logger } from '@nfe-ledger/shared';
import type { LayoutRadii } from './layout-heuristics.js';

/**
 * Minimum accumulated text length for a text layer to count as present
 */
export const MIN_TEXT_LENGTH = 20;

/**
 * Maximum number of characters handed to the language model
 */
export const MAX_LLM_INPUT_CHARS = 150_000;

/**
 * Positioned text fragment. Coordinates are in PDF points with the origin at
 * the top-left corner of the page (y grows downwards).
 */
export interface PageTextBlock {
  /** 1-based page number */
  page: number;
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  text: string;
}

/**
 * A single whitespace-free token with its bounding box
 */
export type PdfWord = PageTextBlock;

/**
 * Text layer read from the PDF
 */
export interface TextLayerResult {
  /** Page texts joined by newlines, trimmed */
  plainText: string;
  blocks: PageTextBlock[];
  words: PdfWord[];
  pageCount: number;
  /** Whether `plainText` reaches {@link MIN_TEXT_LENGTH} */
  hasTextLayer: boolean;
}

// =============================================================================
// OCR
// =============================================================================

export interface OcrPageResult {
  page: number;
  text: string;
}

/**
 * OCR result across all pages
 */
export interface OcrResult {
  /** Non-empty page texts joined by newlines, trimmed */
  text: string;
  pages: OcrPageResult[];
  durationMs: number;
}

export interface OcrRunnerConfig {
  /**
   * Tesseract language
   * @default 'por'
   */
  language?: string;

  /**
   * Rasterization resolution. 144 DPI is twice the PDF's 72 points per inch.
   * @default 144
   */
  dpi?: number;

  /**
   * Timeout per external command in milliseconds
   * @default 60000
   */
  timeoutMs?: number;

  logger?: Logger;
}

/**
 * OCR runner interface.
 *
 * Implementations:
 * - MockOcrRunner: Returns predefined page texts for testing
 * - PopplerTesseractRunner: Rasterizes with `pdftoppm` and reads with `tesseract`
 *
 * Runners throw `ExtractionError` with stage 'ocr' and a `reason` of
 * 'unavailable', 'empty', 'timeout' or 'failed'.
 */
export interface OcrRunner {
  /**
   * Recognize text on every page of a PDF.
   */
  recognize(pdf: Uint8Array): Promise<OcrResult>;

  /**
   * Check whether the OCR engine can run.
   */
  healthCheck(): Promise<boolean>;
}

// =============================================================================
// LLM
// =============================================================================

export type LlmProvider = 'openai' | 'groq' | 'gemini';

export const LLM_PROVIDERS: readonly LlmProvider[] = ['openai', 'groq', 'gemini'];

export const DEFAULT_LLM_MODELS: Readonly<Record<LlmProvider, string>> = {
  openai: 'gpt-4o-mini',
  groq: 'llama-3.1-70b-versatile',
  gemini: 'gemini-1.5-flash',
};

/**
 * Settings used to build a provider client
 */
export interface LlmSettings {
  provider: LlmProvider;
  /** Defaults to the provider's entry in {@link DEFAULT_LLM_MODELS} */
  model?: string;
  /** @default 0 */
  temperature?: number;
  apiKey?: string;
}

export interface LlmRequest {
  system: string;
  user: string;
}

/**
 * Chat model constrained to answer with a JSON document
 */
export interface LlmClient {
  readonly provider: LlmProvider | 'mock';
  readonly model: string;

  /**
   * Send the request and return the raw response text.
   */
  completeJson(request: LlmRequest): Promise<string>;
}

// =============================================================================
// Step configuration
// =============================================================================

export interface PdfExtractionConfig {
  /**
   * Maximum PDF size in bytes
   * @default 20971520 (20MB)
   */
  maxPdfSize?: number;

  /**
   * Fall back to OCR when the text layer is insufficient
   * @default true
   */
  ocrEnabled?: boolean;

  /** Defaults to a {@link PopplerTesseractRunner} */
  ocrRunner?: OcrRunner;

  /**
   * Language for the default OCR runner
   * @default 'por'
   */
  ocrLanguage?: string;

  /**
   * Run LLM extraction; without it no document can be produced from a PDF
   * @default true
   */
  llmEnabled?: boolean;

  /** Settings for the default client, built on first use */
  llm?: LlmSettings;

  /** Client used instead of one built from `llm` */
  llmClient?: LlmClient;

  /**
   * Add a zero-value item when the model returns none
   * @default true
   */
  placeholderItem?: boolean;

  /**
   * Compare layout heuristics with the extracted document
   * @default true
   */
  layoutCrossCheck?: boolean;

  /**
   * Search rectangles (in points) for the layout heuristics
   * @default DEFAULT_LAYOUT_RADII
   */
  layoutRadii?: Partial<LayoutRadii>;

  logger?: Logger;
}
