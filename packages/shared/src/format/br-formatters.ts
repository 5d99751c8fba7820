/**
 * Display formatters for Brazilian fiscal data (reports and review summaries).
 *
 * Formatters never throw: input that does not fit the expected shape is
 * returned as given, and absent values render as '-'.
 */

import type { FiscalParty, Recipient } from '@nfe-ledger/contracts';

const EMPTY = '-';

function digits(value: string): string {
  return value.replace(/\D/g, '');
}

/**
 * Fixed decimals with '.' thousands and ',' decimal separators.
 */
export function formatDecimal(value: number, places: number): string {
  const [integerPart = '0', fraction] = value.toFixed(places).split('.');
  const grouped = integerPart.replace(/\B(?=(\d{3})+(?!\d))/g, '.');
  return fraction === undefined ? grouped : `${grouped},${fraction}`;
}

/**
 * @example
 * ```typescript
 * formatMoney(1234.56) // => 'R$ 1.234,56'
 * ```
 */
export function formatMoney(value: number): string {
  return `R$ ${formatDecimal(value, 2)}`;
}

/**
 * Like {@link formatMoney}, but absent prices render as '-'.
 */
export function formatUnitPrice(value: number | null | undefined): string {
  return value === null || value === undefined ? EMPTY : formatMoney(value);
}

/**
 * Commercial quantity with four decimals.
 *
 * @example
 * ```typescript
 * formatQuantity(3)    // => '3,0000'
 * formatQuantity(null) // => '-'
 * ```
 */
export function formatQuantity(value: number | null | undefined): string {
  return value === null || value === undefined ? EMPTY : formatDecimal(value, 4);
}

/**
 * `XX.XXX.XXX/XXXX-XX`; anything that is not 14 digits is returned unchanged.
 */
export function formatCnpj(value: string | null | undefined): string {
  if (!value) {
    return '';
  }
  const d = digits(value);
  if (d.length !== 14) {
    return value;
  }
  return `${d.slice(0, 2)}.${d.slice(2, 5)}.${d.slice(5, 8)}/${d.slice(8, 12)}-${d.slice(12)}`;
}

/**
 * `XXX.XXX.XXX-XX`; anything that is not 11 digits is returned unchanged.
 */
export function formatCpf(value: string | null | undefined): string {
  if (!value) {
    return '';
  }
  const d = digits(value);
  if (d.length !== 11) {
    return value;
  }
  return `${d.slice(0, 3)}.${d.slice(3, 6)}.${d.slice(6, 9)}-${d.slice(9)}`;
}

/**
 * Recipient CNPJ or CPF, whichever is set.
 */
export function formatRecipientTaxId(recipient: Recipient): string {
  return recipient.cnpj !== null ? formatCnpj(recipient.cnpj) : formatCpf(recipient.cpf);
}

/**
 * `XXXXX-XXX`
 */
export function formatCep(value: string | null | undefined): string {
  if (!value) {
    return EMPTY;
  }
  const d = digits(value);
  if (d.length !== 8) {
    return value;
  }
  return `${d.slice(0, 5)}-${d.slice(5)}`;
}

/**
 * Landline `(XX) XXXX-XXXX` or mobile `(XX) XXXXX-XXXX`.
 */
export function formatPhone(value: string | null | undefined): string {
  if (!value) {
    return EMPTY;
  }
  const d = digits(value);
  if (d.length === 10) {
    return `(${d.slice(0, 2)}) ${d.slice(2, 6)}-${d.slice(6)}`;
  }
  if (d.length === 11) {
    return `(${d.slice(0, 2)}) ${d.slice(2, 7)}-${d.slice(7)}`;
  }
  return d.length >= 2 ? `(${d.slice(0, 2)}) ${d.slice(2)}` : d;
}

export function formatStateRegistration(value: string | null | undefined): string {
  return value ? value.toUpperCase() : EMPTY;
}

/**
 * One-line address: `Rua X, 123 - Bairro - Cidade/UF - CEP: 01310-100`
 */
export function formatAddress(party: FiscalParty): string {
  const { street, number, district, municipality, postalCode } = party.address;
  const parts: string[] = [];

  if (street) {
    parts.push(number ? `${street}, ${number}` : street);
  }
  if (district) {
    parts.push(district);
  }
  parts.push(municipality ? `${municipality}/${party.uf}` : party.uf);
  if (postalCode) {
    parts.push(`CEP: ${formatCep(postalCode)}`);
  }

  return parts.join(' - ');
}
