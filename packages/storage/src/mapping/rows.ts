/**
 * Row normalization and matching shared by every mapping store.
 */

import { WILDCARD_REGIME, type MappingRow, type MappingUpsertInput, type TaxRegime } from '@nfe-ledger/contracts';
import { MappingStoreError } from '@nfe-ledger/shared';

/**
 * Persisted column order
 */
export const MAPPING_COLUMNS = [
  'cfop',
  'regime',
  'conta_debito',
  'conta_credito',
  'justificativa_base',
  'confianca',
] as const;

export type MappingColumn = (typeof MAPPING_COLUMNS)[number];

/**
 * Confidence applied to a persisted row whose confidence cell is empty
 */
export const DEFAULT_ROW_CONFIDENCE = 0.7;

/**
 * Lowercase, trimmed regime; empty means the wildcard row.
 */
export function normalizeRegime(regime: TaxRegime | null | undefined): TaxRegime {
  const normalized = (regime ?? '').trim().toLowerCase();
  return normalized === '' ? WILDCARD_REGIME : normalized;
}

/**
 * Parse a confidence value written as a number or as text ("0.85", "0,85").
 *
 * @returns The value, or null when it is not a finite number
 */
export function parseConfidence(value: number | string): number | null {
  const parsed = typeof value === 'number' ? value : Number(value.trim().replace(',', '.'));
  return Number.isFinite(parsed) ? parsed : null;
}

function requireText(input: MappingUpsertInput, field: keyof MappingUpsertInput): string {
  const value = input[field];
  const text = value === null || value === undefined ? '' : String(value).trim();
  if (text === '') {
    throw new MappingStoreError(`Missing required field: ${field}`, { field });
  }
  return text;
}

/**
 * Validate and normalize upsert input into a row.
 *
 * @throws MappingStoreError naming the first missing or invalid field
 */
export function toMappingRow(input: MappingUpsertInput): MappingRow {
  const cfop = requireText(input, 'cfop');
  if (!/^\d{4}$/.test(cfop)) {
    throw new MappingStoreError(`CFOP must have exactly 4 digits (got ${cfop})`, { field: 'cfop' });
  }
  const debitAccount = requireText(input, 'debitAccount');
  const creditAccount = requireText(input, 'creditAccount');
  const justificationBase = requireText(input, 'justificationBase');
  const confidenceText = requireText(input, 'confidence');

  const confidence = parseConfidence(typeof input.confidence === 'number' ? input.confidence : confidenceText);
  if (confidence === null || confidence < 0 || confidence > 1) {
    throw new MappingStoreError(`Confidence must be a number between 0 and 1 (got ${confidenceText})`, {
      field: 'confidence',
    });
  }

  return Object.freeze({
    cfop,
    regime: normalizeRegime(input.regime),
    debitAccount,
    creditAccount,
    justificationBase,
    confidence,
  });
}

/**
 * Exact (cfop, regime) match first, then (cfop, '*').
 */
export function matchMapping(
  rows: readonly MappingRow[],
  cfop: string,
  regime?: TaxRegime | null,
): MappingRow | null {
  const key = cfop.trim();
  const regimeNorm = normalizeRegime(regime);
  return (
    rows.find((row) => row.cfop === key && row.regime === regimeNorm) ??
    rows.find((row) => row.cfop === key && row.regime === WILDCARD_REGIME) ??
    null
  );
}

/**
 * Replace the row with the same key in place, or append it.
 */
export function upsertRow(rows: readonly MappingRow[], row: MappingRow): MappingRow[] {
  const next = [...rows];
  const index = next.findIndex((r) => r.cfop === row.cfop && r.regime === row.regime);
  if (index === -1) {
    next.push(row);
  } else {
    next[index] = row;
  }
  return next;
}
