/**
 * Canonical model of an NF-e (Brazilian electronic invoice).
 *
 * Every instance is built once per extraction and never mutated afterwards.
 * Absent optional values are `null`, never `undefined`.
 */

/**
 * Brazilian state codes (UF)
 */
export const UF_CODES = [
  'AC', 'AL', 'AP', 'AM', 'BA', 'CE', 'DF', 'ES', 'GO',
  'MA', 'MT', 'MS', 'MG', 'PA', 'PB', 'PR', 'PE', 'PI',
  'RJ', 'RN', 'RS', 'RO', 'RR', 'SC', 'SP', 'SE', 'TO',
] as const;

export type Uf = (typeof UF_CODES)[number];

/**
 * Operation nature derived from issuer and recipient states
 */
export type OperationNature = 'interna' | 'interestadual';

/**
 * Recipient state-registration indicator (indIEDest)
 * 1 = ICMS taxpayer, 2 = exempt taxpayer, 9 = non-taxpayer
 */
export type StateRegistrationIndicator = string;

export interface Address {
  readonly street: string | null;
  readonly number: string | null;
  readonly district: string | null;
  readonly municipality: string | null;
  /** 8 digits */
  readonly postalCode: string | null;
  /** Digits only */
  readonly phone: string | null;
}

/**
 * Common party fields (emitente / destinatário)
 */
export interface FiscalParty {
  readonly legalName: string;
  /** Upper-cased; 'ISENTO' when exempt */
  readonly stateRegistration: string | null;
  readonly uf: Uf;
  readonly address: Address;
}

export interface Issuer extends FiscalParty {
  /** 14 digits */
  readonly cnpj: string;
}

/**
 * Recipient identified by a corporate ID (CNPJ, 14 digits)
 */
export interface CorporateRecipient extends FiscalParty {
  readonly cnpj: string;
  readonly cpf: null;
  readonly stateRegistrationIndicator: StateRegistrationIndicator | null;
}

/**
 * Recipient identified by a personal ID (CPF, 11 digits)
 */
export interface IndividualRecipient extends FiscalParty {
  readonly cnpj: null;
  readonly cpf: string;
  readonly stateRegistrationIndicator: StateRegistrationIndicator | null;
}

export type Recipient = CorporateRecipient | IndividualRecipient;

interface IcmsAmounts {
  /** Origin of goods, single digit 0-8 */
  readonly origin: string | null;
  readonly base: number | null;
  readonly rate: number | null;
  readonly amount: number | null;
}

/**
 * ICMS under the normal regime (CST, 2 digits)
 */
export interface NormalRegimeIcms extends IcmsAmounts {
  readonly cst: string;
  readonly csosn: null;
}

/**
 * ICMS under Simples Nacional (CSOSN, 3 digits)
 */
export interface SimplifiedRegimeIcms extends IcmsAmounts {
  readonly cst: null;
  readonly csosn: string;
}

export type IcmsTax = NormalRegimeIcms | SimplifiedRegimeIcms;

export interface IpiTax {
  readonly cst: string | null;
  readonly base: number | null;
  readonly rate: number | null;
  readonly amount: number | null;
}

/**
 * PIS or COFINS
 */
export interface ContributionTax {
  readonly cst: string;
  readonly base: number | null;
  readonly rate: number | null;
  readonly amount: number | null;
}

export interface ItemTaxes {
  readonly icms: IcmsTax;
  readonly ipi: IpiTax | null;
  readonly pis: ContributionTax | null;
  readonly cofins: ContributionTax | null;
}

export interface LineItem {
  readonly description: string;
  readonly productCode: string | null;
  /** NCM, 8 digits */
  readonly ncm: string | null;
  /** CEST, 7 digits */
  readonly cest: string | null;
  readonly quantity: number | null;
  readonly unitPrice: number | null;
  readonly unit: string | null;
  readonly totalValue: number;
  readonly taxes: ItemTaxes | null;
}

export interface TaxTotals {
  readonly icmsBase: number | null;
  readonly icms: number | null;
  readonly ipi: number | null;
  readonly pis: number | null;
  readonly cofins: number | null;
}

export interface FiscalDocument {
  /** CFOP of the first item, 4 digits */
  readonly cfop: string;
  /** 44-digit access key when known */
  readonly accessKey: string | null;
  readonly issuer: Issuer;
  readonly recipient: Recipient;
  readonly totalValue: number;
  readonly items: readonly LineItem[];
  readonly taxTotals: TaxTotals | null;
}

/**
 * Where a document was extracted from
 */
export type DocumentSourceKind = 'xml' | 'pdf';
