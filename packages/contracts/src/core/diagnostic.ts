/**
 * Severity levels for diagnostics
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info' | 'hint';

/**
 * Category of the diagnostic
 */
export type DiagnosticCategory =
  | 'schema' // Domain model validation
  | 'format' // XML/PDF structure and detection
  | 'extraction' // Text layer, OCR, LLM
  | 'layout' // Spatial heuristics over positioned words
  | 'classification' // CFOP accounting classification
  | 'review' // Human review resolution
  | 'internal'; // Internal errors

/**
 * A single diagnostic message produced while extracting, validating or classifying
 */
export interface Diagnostic {
  /**
   * Unique code for this diagnostic type
   * Format: {AREA}-{RULE}
   * Examples: 'XML-ROOT-NOT-FOUND', 'DOC-FIELD', 'PDF-LAYOUT-TOTAL'
   */
  code: string;

  /**
   * Human-readable message
   */
  message: string;

  /**
   * Severity level
   */
  severity: DiagnosticSeverity;

  /**
   * Category of the diagnostic
   */
  category: DiagnosticCategory;

  /**
   * Step or component that generated this diagnostic
   */
  source: string;

  /**
   * Location in the document model (dotted path, e.g. 'recipient.cpf', 'items.0.ncm')
   */
  location?: string;

  /**
   * Additional context (e.g., expected vs actual values)
   */
  context?: Record<string, unknown>;

  /**
   * Suggested fix (if applicable)
   */
  suggestion?: string;
}
