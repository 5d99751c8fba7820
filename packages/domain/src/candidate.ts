/**
 * Shapes handled before validation.
 *
 * `RawNfe` is the loosely typed field map produced by the XML reader or returned
 * by a language model (NF-e tag names as keys). `FiscalDocumentCandidate` is the
 * sanitized form handed to the schema: model field names, cleaned values, and
 * both sides of every mutually exclusive pair still present.
 */

export interface RawParty {
  xNome?: unknown;
  CNPJ?: unknown;
  CPF?: unknown;
  IE?: unknown;
  indIEDest?: unknown;
  uf?: unknown;
  xMun?: unknown;
  xBairro?: unknown;
  xLgr?: unknown;
  nro?: unknown;
  CEP?: unknown;
  fone?: unknown;
}

export interface RawTaxBlock {
  CST?: unknown;
  CSOSN?: unknown;
  orig?: unknown;
  vBC?: unknown;
  [rateOrAmount: string]: unknown;
}

export interface RawItem {
  xProd?: unknown;
  cProd?: unknown;
  NCM?: unknown;
  CEST?: unknown;
  qCom?: unknown;
  vUnCom?: unknown;
  uCom?: unknown;
  vProd?: unknown;
  impostos?: {
    icms?: RawTaxBlock;
    ipi?: RawTaxBlock;
    pis?: RawTaxBlock;
    cofins?: RawTaxBlock;
  };
}

export interface RawNfe {
  cfop?: unknown;
  chave?: unknown;
  emitente?: RawParty;
  destinatario?: RawParty;
  valor_total?: unknown;
  itens?: RawItem[];
  totais_impostos?: {
    vBC?: unknown;
    vICMS?: unknown;
    vIPI?: unknown;
    vPIS?: unknown;
    vCOFINS?: unknown;
  };
}

export interface AddressCandidate {
  street: string | null;
  number: string | null;
  district: string | null;
  municipality: string | null;
  postalCode: string | null;
  phone: string | null;
}

export interface IssuerCandidate {
  legalName: string;
  cnpj: string;
  stateRegistration: string | null;
  uf: string;
  address: AddressCandidate;
}

export interface RecipientCandidate {
  legalName: string;
  cnpj: string | null;
  cpf: string | null;
  stateRegistration: string | null;
  stateRegistrationIndicator: string | null;
  uf: string;
  address: AddressCandidate;
}

export interface TaxCandidate {
  cst: string | null;
  base: number | null;
  rate: number | null;
  amount: number | null;
}

export interface IcmsCandidate extends TaxCandidate {
  csosn: string | null;
  origin: string | null;
}

export interface ItemTaxesCandidate {
  icms: IcmsCandidate;
  ipi: TaxCandidate | null;
  pis: TaxCandidate | null;
  cofins: TaxCandidate | null;
}

export interface LineItemCandidate {
  description: string;
  productCode: string | null;
  ncm: string | null;
  cest: string | null;
  quantity: number | null;
  unitPrice: number | null;
  unit: string | null;
  /** NaN when the source value could not be read */
  totalValue: number;
  taxes: ItemTaxesCandidate | null;
}

export interface TaxTotalsCandidate {
  icmsBase: number | null;
  icms: number | null;
  ipi: number | null;
  pis: number | null;
  cofins: number | null;
}

export interface FiscalDocumentCandidate {
  cfop: string;
  accessKey: string | null;
  issuer: IssuerCandidate;
  recipient: RecipientCandidate;
  /** NaN when the source value could not be read */
  totalValue: number;
  items: LineItemCandidate[];
  taxTotals: TaxTotalsCandidate | null;
}
