import type { OperationNature } from '../core/fiscal-document.js';

/**
 * Tax regime hint for mapping lookups.
 * Free text, normalized to lowercase; '*' is the wildcard row.
 */
export type TaxRegime = string;

export const WILDCARD_REGIME = '*';

/**
 * Where the accounts of a classification came from
 */
export type ClassificationSource = 'mapping' | 'fallback' | 'human-review';

export interface ClassificationResult {
  readonly cfop: string;
  readonly operationNature: OperationNature;
  readonly debitAccount: string;
  readonly creditAccount: string;
  readonly justification: string;
  /** NCM of each line item, in item order */
  readonly ncmCodes: readonly (string | null)[];
  /** 0.0 - 1.0 */
  readonly confidence: number;
  readonly needsHumanReview: boolean;
  readonly reviewReason: string | null;
  readonly ruleVersion: string;
  readonly source: ClassificationSource;
}

/**
 * A persisted (cfop, regime) -> accounts row
 */
export interface MappingRow {
  readonly cfop: string;
  readonly regime: TaxRegime;
  readonly debitAccount: string;
  readonly creditAccount: string;
  readonly justificationBase: string;
  readonly confidence: number;
}

/**
 * Human-supplied correction, as received from the caller.
 * Values are primitives; validation happens in review resolution.
 */
export interface CorrectionRecord {
  cfop?: string | null;
  regime?: string | null;
  debitAccount?: string | null;
  creditAccount?: string | null;
  justificationBase?: string | null;
  confidence?: number | string | null;
}
