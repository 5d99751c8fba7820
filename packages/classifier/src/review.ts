/**
 * Review Resolution
 *
 * Validates a human correction, persists it as a mapping row and builds the
 * final classification from it. Human input is trusted once it passes
 * validation: the confidence threshold does not apply.
 */

import type {
  ClassificationResult,
  CorrectionRecord,
  FiscalDocument,
  MappingRow,
  MappingStore,
} from '@nfe-ledger/contracts';
import { operationNature } from '@nfe-ledger/domain';
import { createSafeLogger, type Logger } from '@nfe-ledger/shared';
import { RULE_VERSION, composeJustification } from './rules.js';

export const HUMAN_REVIEW_REASON = 'Mapeamento informado por revisão humana aplicado e persistido na tabela de mapeamentos.';

/**
 * Fields a correction must carry, in validation order
 */
export const REQUIRED_CORRECTION_FIELDS = [
  'cfop',
  'regime',
  'debitAccount',
  'creditAccount',
  'justificationBase',
  'confidence',
] as const satisfies readonly (keyof CorrectionRecord)[];

export type CorrectionField = (typeof REQUIRED_CORRECTION_FIELDS)[number];

/**
 * State kept while a document waits for a human decision
 */
export interface PendingReview {
  readonly cfop: string;
  readonly regime: string;
  readonly reason: string | null;
  readonly classification: ClassificationResult;
}

export interface ResolveReviewInput {
  document: FiscalDocument;
  pending: PendingReview;
  correction: CorrectionRecord;
  store: MappingStore;
  logger?: Logger;
}

export type ReviewResolution =
  | { ok: true; classification: ClassificationResult; mapping: MappingRow }
  | { ok: false; pending: PendingReview; error: string; field?: CorrectionField };

function isMissing(value: string | number | null | undefined): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function parseCorrectionConfidence(value: string | number): number {
  return typeof value === 'number' ? value : Number(value.trim().replace(',', '.'));
}

/**
 * Apply a human correction to a pending review.
 *
 * Never rejects: validation and persistence failures come back as
 * `{ ok: false }` with the pending state unchanged.
 */
export async function resolveReview(input: ResolveReviewInput): Promise<ReviewResolution> {
  const { document, pending, store } = input;
  const logger = input.logger ?? createSafeLogger({ prefix: 'nfe-ledger:review' });

  const reject = (error: string, field?: CorrectionField): ReviewResolution => {
    logger.warn('Correction rejected', field === undefined ? { error } : { error, field });
    return field === undefined ? { ok: false, pending, error } : { ok: false, pending, error, field };
  };

  const suppliedCfop = input.correction.cfop;
  const correction: CorrectionRecord = {
    ...input.correction,
    cfop: typeof suppliedCfop === 'string' && suppliedCfop.trim() !== '' ? suppliedCfop : document.cfop,
  };

  for (const field of REQUIRED_CORRECTION_FIELDS) {
    if (isMissing(correction[field])) {
      return reject(`Missing required correction field: ${field}`, field);
    }
  }

  const cfop = String(correction.cfop).trim();
  if (!/^\d{4}$/.test(cfop)) {
    return reject(`CFOP must have exactly 4 digits (got ${cfop})`, 'cfop');
  }

  const rawConfidence = correction.confidence ?? '';
  const confidence = parseCorrectionConfidence(rawConfidence);
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    return reject(`Confidence must be between 0.0 and 1.0 (got ${String(rawConfidence)})`, 'confidence');
  }

  let mapping: MappingRow;
  try {
    mapping = await store.upsert({
      cfop,
      regime: correction.regime ?? null,
      debitAccount: correction.debitAccount ?? '',
      creditAccount: correction.creditAccount ?? '',
      justificationBase: correction.justificationBase ?? '',
      confidence,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Failed to persist correction', { cfop, error: message });
    return { ok: false, pending, error: `Failed to persist mapping: ${message}` };
  }

  const nature = operationNature(document);
  const classification: ClassificationResult = {
    cfop: mapping.cfop,
    operationNature: nature,
    debitAccount: mapping.debitAccount,
    creditAccount: mapping.creditAccount,
    justification: composeJustification(mapping.justificationBase, nature, document.totalValue),
    ncmCodes: Object.freeze(document.items.map((item) => item.ncm)),
    confidence: mapping.confidence,
    needsHumanReview: false,
    reviewReason: HUMAN_REVIEW_REASON,
    ruleVersion: RULE_VERSION,
    source: 'human-review',
  };

  logger.info('Correction applied', { cfop: mapping.cfop, regime: mapping.regime, confidence: mapping.confidence });
  return { ok: true, classification: Object.freeze(classification), mapping };
}
