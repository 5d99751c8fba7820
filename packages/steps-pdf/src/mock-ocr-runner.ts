import { ExtractionError } from '@nfe-ledger/shared';
import type { OcrResult, OcrRunner } from './types.js';

export interface MockOcrRunnerConfig {
  /** Text returned for each page */
  pages?: string[];

  /** Error thrown by `recognize` instead of returning pages */
  error?: Error;

  /** Result of `healthCheck` @default true */
  available?: boolean;
}

/**
 * MockOcrRunner returns predefined page texts for tests and development.
 * It never spawns a process.
 */
export class MockOcrRunner implements OcrRunner {
  private readonly config: MockOcrRunnerConfig;

  /** Number of `recognize` calls so far */
  calls = 0;

  constructor(config: MockOcrRunnerConfig = {}) {
    this.config = config;
  }

  recognize(_pdf: Uint8Array): Promise<OcrResult> {
    this.calls++;

    if (this.config.error) {
      return Promise.reject(this.config.error);
    }

    const pages = (this.config.pages ?? []).map((text, index) => ({ page: index + 1, text: text.trim() }));
    const text = pages
      .map((page) => page.text)
      .filter((pageText) => pageText.length > 0)
      .join('\n');
    if (text.length === 0) {
      return Promise.reject(new ExtractionError('OCR returned no text', 'ocr', { reason: 'empty' }));
    }

    return Promise.resolve({ text, pages, durationMs: 0 });
  }

  healthCheck(): Promise<boolean> {
    return Promise.resolve(this.config.available ?? true);
  }
}
