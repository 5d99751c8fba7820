/**
 * Offline CNPJ / CPF / access-key checks
 *
 * Syntax and check-digit validation only. A valid check digit does not mean
 * the identifier is registered with the Receita Federal.
 *
 * @module @nfe-ledger/shared/tax-id
 */

import { UF_CODES, type Uf } from '@nfe-ledger/contracts';
import {
  ACCESS_KEY_LENGTH,
  ACCESS_KEY_WEIGHTS,
  CNPJ_LENGTH,
  CNPJ_WEIGHTS,
  CPF_LENGTH,
  UF_IBGE_CODES,
} from './constants.js';

const UF_CODE_SET: ReadonlySet<string> = new Set(UF_CODES);

/**
 * Kind of Brazilian taxpayer identifier
 */
export type TaxIdKind = 'cnpj' | 'cpf';

/**
 * Error codes for tax ID validation
 */
export type TaxIdErrorCode =
  | 'EMPTY'
  | 'INVALID_LENGTH'
  | 'REPEATED_DIGITS'
  | 'CHECK_DIGIT_MISMATCH';

/**
 * Result of tax ID validation
 */
export interface TaxIdValidationResult {
  /** Whether length and check digits are correct */
  valid: boolean;
  /** Digits only */
  normalized: string;
  /** Kind inferred from length (11 = CPF, 14 = CNPJ) */
  kind?: TaxIdKind;
  errorCode?: TaxIdErrorCode;
}

/**
 * Keep digits only.
 *
 * @example
 * ```typescript
 * normalizeTaxId('12.345.678/0001-95') // => '12345678000195'
 * normalizeTaxId(null)                 // => ''
 * ```
 */
export function normalizeTaxId(value: unknown): string {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(Math.trunc(Math.abs(value)));
  }
  if (typeof value !== 'string') {
    return '';
  }
  return value.replace(/\D/g, '');
}

/**
 * Kind by digit count, or undefined when neither 11 nor 14 digits.
 */
export function classifyTaxId(value: unknown): TaxIdKind | undefined {
  const digits = normalizeTaxId(value);
  if (digits.length === CNPJ_LENGTH) {
    return 'cnpj';
  }
  if (digits.length === CPF_LENGTH) {
    return 'cpf';
  }
  return undefined;
}

function toDigits(value: string): number[] {
  return Array.from(value, (ch) => Number(ch));
}

function isRepeated(value: string): boolean {
  return /^(\d)\1*$/.test(value);
}

function cnpjCheckDigit(digits: readonly number[], weights: readonly number[]): number {
  let sum = 0;
  weights.forEach((weight, i) => {
    sum += (digits[i] ?? 0) * weight;
  });
  const rest = sum % 11;
  return rest < 2 ? 0 : 11 - rest;
}

function cpfCheckDigit(digits: readonly number[], count: number): number {
  let sum = 0;
  for (let i = 0; i < count; i++) {
    sum += (digits[i] ?? 0) * (count + 1 - i);
  }
  const rest = (sum * 10) % 11;
  return rest === 10 ? 0 : rest;
}

/**
 * Validate a CNPJ or CPF (formatted or bare).
 *
 * @example
 * ```typescript
 * validateTaxId('11.222.333/0001-81')
 * // => { valid: true, normalized: '11222333000181', kind: 'cnpj' }
 *
 * validateTaxId('111.111.111-11')
 * // => { valid: false, normalized: '11111111111', kind: 'cpf', errorCode: 'REPEATED_DIGITS' }
 * ```
 */
export function validateTaxId(value: unknown): TaxIdValidationResult {
  const normalized = normalizeTaxId(value);
  if (normalized.length === 0) {
    return { valid: false, normalized, errorCode: 'EMPTY' };
  }

  const kind = classifyTaxId(normalized);
  if (!kind) {
    return { valid: false, normalized, errorCode: 'INVALID_LENGTH' };
  }

  if (isRepeated(normalized)) {
    return { valid: false, normalized, kind, errorCode: 'REPEATED_DIGITS' };
  }

  const digits = toDigits(normalized);
  const matches = kind === 'cnpj'
    ? digits[12] === cnpjCheckDigit(digits, CNPJ_WEIGHTS)
      && digits[13] === cnpjCheckDigit(digits, [6, ...CNPJ_WEIGHTS])
    : digits[9] === cpfCheckDigit(digits, 9) && digits[10] === cpfCheckDigit(digits, 10);

  if (!matches) {
    return { valid: false, normalized, kind, errorCode: 'CHECK_DIGIT_MISMATCH' };
  }
  return { valid: true, normalized, kind };
}

/**
 * True when the value is a 14-digit CNPJ with correct check digits.
 */
export function isValidCnpj(value: unknown): boolean {
  const result = validateTaxId(value);
  return result.valid && result.kind === 'cnpj';
}

/**
 * True when the value is an 11-digit CPF with correct check digits.
 */
export function isValidCpf(value: unknown): boolean {
  const result = validateTaxId(value);
  return result.valid && result.kind === 'cpf';
}

/**
 * Type guard for the 27 federative unit codes.
 */
export function isUf(value: unknown): value is Uf {
  return typeof value === 'string' && UF_CODE_SET.has(value);
}

/**
 * Check digit (position 44) for the first 43 digits of an access key.
 */
export function accessKeyCheckDigit(first43: string): number {
  let sum = 0;
  const digits = toDigits(first43).reverse();
  digits.forEach((digit, i) => {
    sum += digit * (ACCESS_KEY_WEIGHTS[i % ACCESS_KEY_WEIGHTS.length] ?? 0);
  });
  const rest = sum % 11;
  return rest === 0 || rest === 1 ? 0 : 11 - rest;
}

/**
 * Validate a 44-digit NF-e access key: length, issuing-state code and check digit.
 */
export function isValidAccessKey(value: unknown): boolean {
  const key = normalizeTaxId(value);
  if (key.length !== ACCESS_KEY_LENGTH) {
    return false;
  }
  if (ufFromAccessKey(key) === undefined) {
    return false;
  }
  return Number(key[43]) === accessKeyCheckDigit(key.slice(0, 43));
}

/**
 * Issuing state encoded in the first two digits of an access key.
 */
export function ufFromAccessKey(value: unknown): Uf | undefined {
  const code = normalizeTaxId(value).slice(0, 2);
  return UF_CODES.find((uf) => UF_IBGE_CODES[uf] === code);
}
