import type { Diagnostic } from '@nfe-ledger/contracts';

/**
 * Base error class for nfe-ledger
 */
export class NfeLedgerError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'NfeLedgerError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    // Maintains proper stack trace for where error was thrown

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error thrown when a candidate document fails the domain schema
 */
export class ValidationError extends NfeLedgerError {
  readonly diagnostics: Diagnostic[];

  constructor(message: string, diagnostics: Diagnostic[] = [], context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
    this.diagnostics = diagnostics;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), diagnostics: this.diagnostics };
  }
}

/**
 * Error thrown for configuration issues
 */
export class ConfigurationError extends NfeLedgerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Extraction stage that failed
 */
export type ExtractionStage = 'detection' | 'xml' | 'text-layer' | 'ocr' | 'layout' | 'llm';

/**
 * Error thrown when a document cannot be read or extracted
 */
export class ExtractionError extends NfeLedgerError {
  readonly stage: ExtractionStage;

  constructor(message: string, stage: ExtractionStage, context?: Record<string, unknown>) {
    super(message, 'EXTRACTION_ERROR', { ...context, stage });
    this.name = 'ExtractionError';
    this.stage = stage;
  }
}

/**
 * Error thrown by mapping stores (malformed input, failed writes)
 */
export class MappingStoreError extends NfeLedgerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MAPPING_STORE_ERROR', context);
    this.name = 'MappingStoreError';
  }
}

/**
 * Error thrown when an external engine exceeds its time budget
 */
export class TimeoutError extends NfeLedgerError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, context?: Record<string, unknown>) {
    super(message, 'TIMEOUT_ERROR', { ...context, timeoutMs });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}
