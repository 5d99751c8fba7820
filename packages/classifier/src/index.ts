/**
 * @nfe-ledger/classifier
 *
 * CFOP accounting classification with a confidence gate, and resolution of
 * human corrections into persisted mapping rows.
 *
 * @packageDocumentation
 */

export { classifyDocument, type ClassifyOptions } from './engine.js';
export {
  resolveReview,
  HUMAN_REVIEW_REASON,
  REQUIRED_CORRECTION_FIELDS,
  type CorrectionField,
  type PendingReview,
  type ResolveReviewInput,
  type ReviewResolution,
} from './review.js';
export { buildReviewSummary } from './summary.js';
export {
  MIN_CONFIDENCE_FOR_AUTO_APPROVE,
  RULE_VERSION,
  fallbackByPrefix,
  composeJustification,
  regimeLabel,
  type AccountSuggestion,
} from './rules.js';
