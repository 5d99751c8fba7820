/**
 * @nfe-ledger/steps-pdf
 *
 * NF-e extraction from DANFE PDFs.
 *
 * This package provides:
 * - Text layer extraction with positioned words (pdfjs-dist)
 * - OCR fallback through Poppler and Tesseract
 * - Layout heuristics used to cross-check extracted documents
 * - LLM-guided extraction (OpenAI, Groq, Gemini)
 * - An extraction step chaining all of the above
 *
 * @packageDocumentation
 */

// Main step
export {
  createPdfExtractionStep,
  obtainText,
  textLayerStrategy,
  ocrStrategy,
  PDF_EXTRACTION_STEP_ID,
  type TextStrategy,
  type TextStrategyOutcome,
} from './pdf-extraction-step.js';

// Text layer
export { extractTextLayer, splitRunIntoWords } from './text-layer.js';

// OCR runners
export { PopplerTesseractRunner, isCommandAvailable } from './poppler-tesseract-runner.js';
export { MockOcrRunner, type MockOcrRunnerConfig } from './mock-ocr-runner.js';

// Layout heuristics
export {
  analyzeLayout,
  crossCheckLayout,
  neighbors,
  findTotalValue,
  findUfs,
  findCfops,
  findAccessKey,
  normalizeDecimalText,
  DEFAULT_LAYOUT_RADII,
  type LayoutFindings,
  type LayoutRadii,
  type NeighborhoodRadius,
} from './layout-heuristics.js';

// LLM
export { createLlmClient, OpenAiCompatibleClient, GeminiClient, API_KEY_VARIABLES, GROQ_BASE_URL } from './llm-client.js';
export { MockLlmClient, type MockLlmClientConfig } from './mock-llm-client.js';
export { NFE_EXTRACTION_SCHEMA, buildSystemPrompt, buildExtractionRequest } from './llm-prompt.js';
export { extractWithLlm, parseJsonObject, type LlmExtractionOptions, type LlmExtractionResult } from './llm-extraction.js';

// Types
export type {
  PageTextBlock,
  PdfWord,
  TextLayerResult,
  OcrPageResult,
  OcrResult,
  OcrRunner,
  OcrRunnerConfig,
  LlmProvider,
  LlmSettings,
  LlmRequest,
  LlmClient,
  PdfExtractionConfig,
} from './types.js';

// Constants
export { MIN_TEXT_LENGTH, MAX_LLM_INPUT_CHARS, LLM_PROVIDERS, DEFAULT_LLM_MODELS } from './types.js';
