import type { Diagnostic } from '../core/diagnostic.js';
import type { DocumentSourceKind, FiscalDocument } from '../core/fiscal-document.js';

/**
 * Bytes or text handed to an extraction step
 */
export interface DocumentSource {
  /** Raw file contents (XML text may also be passed as a string) */
  content: Uint8Array | string;

  /** Original file name, used for detection and diagnostics only */
  fileName?: string;

  /** Declared kind; detected from content when absent */
  kind?: DocumentSourceKind;
}

/**
 * Extraction step status
 */
export type ExtractionStatus = 'passed' | 'failed' | 'error';

/**
 * Result of running one extraction step
 */
export interface ExtractionResult {
  /** Step that produced this result */
  stepId: string;

  /**
   * - passed: a validated document was produced
   * - failed: input was read but does not yield a valid document
   * - error: the step itself could not run (engine unavailable, provider error)
   */
  status: ExtractionStatus;

  /** Present when status is 'passed' */
  document?: FiscalDocument;

  /** All diagnostics, warnings included */
  diagnostics: Diagnostic[];

  /** Wall-clock duration */
  durationMs: number;

  /** ISO 8601 */
  startedAt: string;

  /** ISO 8601 */
  completedAt: string;

  /** Step-specific facts (e.g. `usedOcr`, `llmProvider`) */
  metadata?: Record<string, unknown>;
}

/**
 * Descriptive fields shared by every step
 */
export interface ExtractionStepMetadata {
  /** Unique identifier, e.g. 'nfe-ledger/xml' */
  id: string;

  /** Human-readable name */
  name: string;

  /** Semantic version */
  version: string;

  /** Brief description */
  description?: string;
}

/**
 * An ExtractionStep turns one document source into a validated {@link FiscalDocument}.
 *
 * Steps hold configuration and collaborators only; nothing carries over between runs.
 *
 * @example
 * ```typescript
 * const result = await xmlStep.execute({ content: xmlText, fileName: 'nota.xml' });
 * if (result.status === 'passed' && result.document) {
 *   console.log(result.document.cfop);
 * }
 * ```
 */
export interface ExtractionStep extends ExtractionStepMetadata {
  /**
   * Run the extraction. Never rejects; failures are reported in the result.
   */
  execute(source: DocumentSource): Promise<ExtractionResult>;
}
