/**
 * Brazilian fiscal identifier constants
 *
 * Lengths and check-digit weights for CNPJ, CPF and NF-e access keys, plus
 * the IBGE state codes that open every access key.
 *
 * @module @nfe-ledger/shared/tax-id
 */

import type { Uf } from '@nfe-ledger/contracts';

export const CNPJ_LENGTH = 14;
export const CPF_LENGTH = 11;
export const ACCESS_KEY_LENGTH = 44;

/**
 * Weights for the first CNPJ check digit; the second uses `[6, ...CNPJ_WEIGHTS]`.
 */
export const CNPJ_WEIGHTS = [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2] as const;

/**
 * Weights applied right-to-left, cycling, for the access key check digit (mod 11).
 */
export const ACCESS_KEY_WEIGHTS = [2, 3, 4, 5, 6, 7, 8, 9] as const;

/**
 * IBGE numeric code (cUF) per state, as found in positions 1-2 of the access key.
 */
export const UF_IBGE_CODES: Readonly<Record<Uf, string>> = {
  RO: '11',
  AC: '12',
  AM: '13',
  RR: '14',
  PA: '15',
  AP: '16',
  TO: '17',
  MA: '21',
  PI: '22',
  CE: '23',
  RN: '24',
  PB: '25',
  PE: '26',
  AL: '27',
  SE: '28',
  BA: '29',
  MG: '31',
  ES: '32',
  RJ: '33',
  SP: '35',
  PR: '41',
  SC: '42',
  RS: '43',
  MS: '50',
  MT: '51',
  GO: '52',
  DF: '53',
};
