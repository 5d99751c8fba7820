import type { Diagnostic } from '@nfe-ledger/contracts';
import { cleanText, digitsOnly, parseBrazilianNumber } from '@nfe-ledger/shared';
import type {
  AddressCandidate,
  FiscalDocumentCandidate,
  IcmsCandidate,
  IssuerCandidate,
  ItemTaxesCandidate,
  LineItemCandidate,
  RecipientCandidate,
  TaxCandidate,
  TaxTotalsCandidate,
} from './candidate.js';

/**
 * Where the raw map came from.
 * - xml: tag values read from a well-formed document; no fallbacks are applied
 * - llm: model output; missing names, identifiers and items get placeholders
 */
export type RawNfeSource = 'xml' | 'llm';

export interface SanitizeOptions {
  source: RawNfeSource;
  /**
   * Synthesize a zero-value item when a model returns none (llm source only).
   * @default true
   */
  placeholderItem?: boolean;
}

export interface SanitizeResult {
  candidate: FiscalDocumentCandidate;
  diagnostics: Diagnostic[];
}

export const UNKNOWN_ISSUER_NAME = 'EMITENTE NAO IDENTIFICADO';
export const UNKNOWN_RECIPIENT_NAME = 'DESTINATARIO NAO IDENTIFICADO';
export const RECIPIENT_ID_SENTINEL = '00000000000000';
export const PLACEHOLDER_ITEM_DESCRIPTION = 'Item';

const SOURCE = 'sanitizer';

type TaxKind = 'icms' | 'ipi' | 'pis' | 'cofins';

const TAX_FIELDS: Record<TaxKind, { rate: string; amount: string }> = {
  icms: { rate: 'pICMS', amount: 'vICMS' },
  ipi: { rate: 'pIPI', amount: 'vIPI' },
  pis: { rate: 'pPIS', amount: 'vPIS' },
  cofins: { rate: 'pCOFINS', amount: 'vCOFINS' },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function record(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function upper(value: unknown): string | null {
  const text = cleanText(value);
  return text === null ? null : text.toUpperCase();
}

function requiredNumber(value: unknown): number {
  return parseBrazilianNumber(value) ?? Number.NaN;
}

function fixedDigits(value: unknown, length: number): string | null {
  const digits = digitsOnly(value);
  return digits.length === length ? digits : null;
}

function stateRegistration(value: unknown): string | null {
  const ie = upper(value);
  if (ie === null) {
    return null;
  }
  return ie.includes('ISENT') ? 'ISENTO' : ie;
}

function address(raw: Record<string, unknown>): AddressCandidate {
  return {
    street: cleanText(raw['xLgr']),
    number: cleanText(raw['nro']),
    district: cleanText(raw['xBairro']),
    municipality: cleanText(raw['xMun']),
    postalCode: fixedDigits(raw['CEP'], 8),
    phone: digitsOnly(raw['fone']) || null,
  };
}

function warning(code: string, message: string, location: string): Diagnostic {
  return { code, message, severity: 'warning', category: 'extraction', source: SOURCE, location };
}

/**
 * Derive which recipient identifier a value belongs to from its digit count.
 *
 * A 14-digit value is a CNPJ; an 11-digit value in the CNPJ slot with no CPF is a CPF;
 * 12-13 digits are kept as an incomplete CNPJ so validation reports them.
 */
export function deriveRecipientTaxId(
  rawCnpj: unknown,
  rawCpf: unknown,
): { cnpj: string | null; cpf: string | null } {
  let cnpj = digitsOnly(rawCnpj);
  let cpf = digitsOnly(rawCpf);
  if (cnpj.length > 14) {
    cnpj = cnpj.slice(-14);
  }
  if (cpf.length > 11) {
    cpf = cpf.slice(-11);
  }

  if (cnpj.length >= 11) {
    if (cnpj.length === 11 && cpf.length === 0) {
      return { cnpj: null, cpf: cnpj };
    }
    return { cnpj, cpf: null };
  }
  if (cpf.length === 11) {
    return { cnpj: null, cpf };
  }
  if (cnpj.length > 0) {
    return { cnpj, cpf: null };
  }
  if (cpf.length > 0) {
    return { cnpj: null, cpf };
  }
  return { cnpj: null, cpf: null };
}

function sanitizeIssuer(value: unknown, source: RawNfeSource, diagnostics: Diagnostic[]): IssuerCandidate {
  const raw = record(value);
  let legalName = cleanText(raw['xNome']) ?? '';
  if (legalName === '' && source === 'llm') {
    legalName = UNKNOWN_ISSUER_NAME;
    diagnostics.push(warning('SANITIZE-NAME-FALLBACK', 'Issuer name missing; placeholder applied', 'issuer.legalName'));
  }

  const cnpj = digitsOnly(raw['CNPJ']);
  return {
    legalName,
    cnpj: cnpj.length > 14 ? cnpj.slice(-14) : cnpj,
    stateRegistration: stateRegistration(raw['IE']),
    uf: upper(raw['uf']) ?? '',
    address: address(raw),
  };
}

function sanitizeRecipient(value: unknown, source: RawNfeSource, diagnostics: Diagnostic[]): RecipientCandidate {
  const raw = record(value);
  let legalName = cleanText(raw['xNome']) ?? '';
  if (legalName === '' && source === 'llm') {
    legalName = UNKNOWN_RECIPIENT_NAME;
    diagnostics.push(
      warning('SANITIZE-NAME-FALLBACK', 'Recipient name missing; placeholder applied', 'recipient.legalName'),
    );
  }

  const { cpf, ...derived } = deriveRecipientTaxId(raw['CNPJ'], raw['CPF']);
  let cnpj = derived.cnpj;
  if (cnpj === null && cpf === null && source === 'llm') {
    cnpj = RECIPIENT_ID_SENTINEL;
    diagnostics.push(
      warning(
        'SANITIZE-RECIPIENT-SENTINEL',
        'Recipient has neither CNPJ nor CPF; all-zero CNPJ applied',
        'recipient.cnpj',
      ),
    );
  }

  return {
    legalName,
    cnpj,
    cpf,
    stateRegistration: stateRegistration(raw['IE']),
    stateRegistrationIndicator: cleanText(raw['indIEDest']),
    uf: upper(raw['uf']) ?? '',
    address: address(raw),
  };
}

function sanitizeTax(raw: Record<string, unknown>, kind: TaxKind): TaxCandidate {
  const fields = TAX_FIELDS[kind];
  return {
    cst: cleanText(raw['CST']),
    base: parseBrazilianNumber(raw['vBC']),
    rate: parseBrazilianNumber(raw[fields.rate]),
    amount: parseBrazilianNumber(raw[fields.amount]),
  };
}

function sanitizeTaxes(
  value: unknown,
  location: string,
  diagnostics: Diagnostic[],
): ItemTaxesCandidate | null {
  if (!isRecord(value)) {
    return null;
  }

  const icmsRaw = value['icms'];
  if (!isRecord(icmsRaw)) {
    if (Object.keys(value).length > 0) {
      diagnostics.push(warning('SANITIZE-TAXES-OMITTED', 'Item taxes have no ICMS block; taxes omitted', location));
    }
    return null;
  }

  const icms: IcmsCandidate = {
    ...sanitizeTax(icmsRaw, 'icms'),
    csosn: cleanText(icmsRaw['CSOSN']),
    origin: cleanText(icmsRaw['orig']),
  };
  if (icms.cst === null && icms.csosn === null) {
    diagnostics.push(warning('SANITIZE-TAXES-OMITTED', 'ICMS has neither CST nor CSOSN; taxes omitted', location));
    return null;
  }

  const contribution = (kind: 'pis' | 'cofins'): TaxCandidate | null => {
    const raw = value[kind];
    if (!isRecord(raw)) {
      return null;
    }
    const tax = sanitizeTax(raw, kind);
    if (tax.cst === null) {
      diagnostics.push(
        warning('SANITIZE-TAX-DROPPED', `${kind.toUpperCase()} has no CST; dropped`, `${location}.${kind}`),
      );
      return null;
    }
    return tax;
  };

  const ipiRaw = value['ipi'];
  return {
    icms,
    ipi: isRecord(ipiRaw) ? sanitizeTax(ipiRaw, 'ipi') : null,
    pis: contribution('pis'),
    cofins: contribution('cofins'),
  };
}

function sanitizeItem(value: unknown, index: number, diagnostics: Diagnostic[]): LineItemCandidate {
  const raw = record(value);
  return {
    description: cleanText(raw['xProd']) ?? PLACEHOLDER_ITEM_DESCRIPTION,
    productCode: cleanText(raw['cProd']),
    ncm: fixedDigits(raw['NCM'], 8),
    cest: fixedDigits(raw['CEST'], 7),
    quantity: parseBrazilianNumber(raw['qCom']),
    unitPrice: parseBrazilianNumber(raw['vUnCom']),
    unit: upper(raw['uCom']),
    totalValue: requiredNumber(raw['vProd']),
    taxes: sanitizeTaxes(raw['impostos'], `items.${index}.taxes`, diagnostics),
  };
}

function sanitizeTaxTotals(value: unknown): TaxTotalsCandidate | null {
  if (!isRecord(value)) {
    return null;
  }
  const totals: TaxTotalsCandidate = {
    icmsBase: parseBrazilianNumber(value['vBC']),
    icms: parseBrazilianNumber(value['vICMS']),
    ipi: parseBrazilianNumber(value['vIPI']),
    pis: parseBrazilianNumber(value['vPIS']),
    cofins: parseBrazilianNumber(value['vCOFINS']),
  };
  return Object.values(totals).some((v) => v !== null) ? totals : null;
}

function placeholderItem(): LineItemCandidate {
  return {
    description: PLACEHOLDER_ITEM_DESCRIPTION,
    productCode: null,
    ncm: null,
    cest: null,
    quantity: null,
    unitPrice: null,
    unit: null,
    totalValue: 0,
    taxes: null,
  };
}

/**
 * Turn a raw NF-e field map into a candidate for schema validation.
 *
 * Total: never throws, whatever the input. Values that cannot be cleaned are
 * passed through in a form the schema rejects (empty strings, NaN), so that
 * validation stays the single place where a document is refused.
 *
 * @example
 * ```typescript
 * const { candidate } = sanitizeRawNfe(
 *   { cfop: '5.102', destinatario: { CPF: '123.456.789-01' } },
 *   { source: 'llm' },
 * );
 * candidate.cfop;           // '5102'
 * candidate.recipient.cpf;  // '12345678901'
 * candidate.recipient.cnpj; // null
 * ```
 */
export function sanitizeRawNfe(raw: unknown, options: SanitizeOptions): SanitizeResult {
  const input = record(raw);
  const diagnostics: Diagnostic[] = [];

  const cfopDigits = digitsOnly(input['cfop']);
  const cfop = cfopDigits.length >= 4 ? cfopDigits.slice(0, 4) : cleanText(input['cfop']) ?? '';

  const rawItems = input['itens'];
  const items = Array.isArray(rawItems)
    ? rawItems.map((item: unknown, index) => sanitizeItem(item, index, diagnostics))
    : [];

  if (items.length === 0 && options.source === 'llm' && (options.placeholderItem ?? true)) {
    items.push(placeholderItem());
    diagnostics.push(
      warning(
        'SANITIZE-PLACEHOLDER-ITEM',
        'No items were extracted; a zero-value placeholder item was added',
        'items',
      ),
    );
  }

  const candidate: FiscalDocumentCandidate = {
    cfop,
    accessKey: fixedDigits(input['chave'], 44),
    issuer: sanitizeIssuer(input['emitente'], options.source, diagnostics),
    recipient: sanitizeRecipient(input['destinatario'], options.source, diagnostics),
    totalValue: requiredNumber(input['valor_total']),
    items,
    taxTotals: sanitizeTaxTotals(input['totais_impostos']),
  };

  return { candidate, diagnostics };
}
