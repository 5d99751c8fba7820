/**
 * NF-e XML reader
 *
 * Builds the raw NF-e field map (see `RawNfe`) from the XML tree. Lookups are
 * per-field and tolerant: a missing node yields null, never an exception. Only
 * a missing `infNFe` stops the read; everything else is left to validation.
 */

import { XMLParser } from 'fast-xml-parser';
import type { Diagnostic } from '@nfe-ledger/contracts';
import { ExtractionError } from '@nfe-ledger/shared';
import type { RawItem, RawNfe, RawParty, RawTaxBlock } from '@nfe-ledger/domain';
import {
  COFINS_VARIANTS,
  ICMS_VARIANTS,
  INF_NFE_PATHS,
  IPI_VARIANTS,
  PIS_VARIANTS,
} from './types.js';

type XmlNode = Record<string, unknown>;

const SOURCE = 'nfe-ledger/xml';

export interface NfeXmlReadResult {
  raw: RawNfe;
  /** Degraded-extraction warnings (e.g. item tax blocks omitted) */
  warnings: Diagnostic[];
  /** Whether namespace declarations had to be stripped to find `infNFe` */
  namespacesStripped: boolean;
}

function createParser(removeNSPrefix: boolean): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    removeNSPrefix,
    // Keep codes as text: leading zeros in CNPJ, NCM and CST matter
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
  });
}

function isNode(value: unknown): value is XmlNode {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Strip `xmlns` and `xmlns:prefix` declarations
 */
export function stripNamespaceDeclarations(xml: string): string {
  return xml.replace(/\s+xmlns(?::\w+)?="[^"]+"/g, '');
}

/**
 * Get nested object using dot notation path
 */
export function getNestedObject(obj: XmlNode | null | undefined, path: string): XmlNode | null {
  if (!obj) return null;

  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isNode(current)) {
      return null;
    }
    current = current[part];
  }

  return isNode(current) ? current : null;
}

/**
 * Extract text content from a value (plain text, or an element with attributes)
 */
function extractTextFromValue(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    const text = String(value);
    return text.length > 0 ? text : null;
  }
  if (isNode(value) && '#text' in value) {
    return extractTextFromValue(value['#text']);
  }
  return null;
}

/**
 * Get text value from object at a dot notation path
 */
export function getTextValue(obj: XmlNode | null | undefined, path: string): string | null {
  if (!obj) return null;

  const parts = path.split('.');
  const leaf = parts.pop();
  if (leaf === undefined) return null;

  const parent = parts.length > 0 ? getNestedObject(obj, parts.join('.')) : obj;
  return parent ? extractTextFromValue(parent[leaf]) : null;
}

/**
 * One node or many: always a list of element nodes
 */
export function asList(value: unknown): XmlNode[] {
  if (value === null || value === undefined) return [];
  const list: unknown[] = Array.isArray(value) ? value : [value];
  return list.filter(isNode);
}

function locateInfNfe(tree: XmlNode): XmlNode | null {
  for (const path of INF_NFE_PATHS) {
    const node = getNestedObject(tree, path);
    if (node) return node;
  }
  return null;
}

function firstVariant(group: XmlNode | null, variants: readonly string[]): XmlNode | null {
  if (!group) return null;
  for (const variant of variants) {
    const node = group[variant];
    if (isNode(node)) return node;
  }
  return null;
}

function readTaxBlock(node: XmlNode, fields: readonly string[]): RawTaxBlock {
  const block: RawTaxBlock = {};
  for (const field of fields) {
    block[field] = getTextValue(node, field);
  }
  return block;
}

function readParty(node: XmlNode | null, addressPath: 'enderEmit' | 'enderDest'): RawParty {
  const address = getNestedObject(node, addressPath);
  return {
    xNome: getTextValue(node, 'xNome'),
    CNPJ: getTextValue(node, 'CNPJ'),
    CPF: getTextValue(node, 'CPF'),
    IE: getTextValue(node, 'IE'),
    indIEDest: getTextValue(node, 'indIEDest'),
    uf: getTextValue(address, 'UF'),
    xMun: getTextValue(address, 'xMun'),
    xBairro: getTextValue(address, 'xBairro'),
    xLgr: getTextValue(address, 'xLgr'),
    nro: getTextValue(address, 'nro'),
    CEP: getTextValue(address, 'CEP'),
    fone: getTextValue(address, 'fone'),
  };
}

function readItem(det: XmlNode, index: number, warnings: Diagnostic[]): RawItem {
  const prod = getNestedObject(det, 'prod');
  const item: RawItem = {
    xProd: getTextValue(prod, 'xProd'),
    cProd: getTextValue(prod, 'cProd'),
    NCM: getTextValue(prod, 'NCM'),
    CEST: getTextValue(prod, 'CEST'),
    qCom: getTextValue(prod, 'qCom'),
    vUnCom: getTextValue(prod, 'vUnCom'),
    uCom: getTextValue(prod, 'uCom'),
    vProd: getTextValue(prod, 'vProd'),
  };

  const imposto = getNestedObject(det, 'imposto');
  const icms = firstVariant(getNestedObject(imposto, 'ICMS'), ICMS_VARIANTS);
  if (!icms || (getTextValue(icms, 'CST') === null && getTextValue(icms, 'CSOSN') === null)) {
    warnings.push({
      code: 'XML-ITEM-TAXES-OMITTED',
      message: `Item ${index + 1}: no ICMS group with CST or CSOSN; item taxes omitted`,
      severity: 'warning',
      category: 'extraction',
      source: SOURCE,
      location: `items.${index}.taxes`,
    });
    return item;
  }

  const taxes: NonNullable<RawItem['impostos']> = {
    icms: readTaxBlock(icms, ['orig', 'CST', 'CSOSN', 'vBC', 'pICMS', 'vICMS']),
  };
  const ipi = firstVariant(getNestedObject(imposto, 'IPI'), IPI_VARIANTS);
  if (ipi) taxes.ipi = readTaxBlock(ipi, ['CST', 'vBC', 'pIPI', 'vIPI']);
  const pis = firstVariant(getNestedObject(imposto, 'PIS'), PIS_VARIANTS);
  if (pis) taxes.pis = readTaxBlock(pis, ['CST', 'vBC', 'pPIS', 'vPIS']);
  const cofins = firstVariant(getNestedObject(imposto, 'COFINS'), COFINS_VARIANTS);
  if (cofins) taxes.cofins = readTaxBlock(cofins, ['CST', 'vBC', 'pCOFINS', 'vCOFINS']);

  item.impostos = taxes;
  return item;
}

/**
 * Read an NF-e XML into the raw field map.
 *
 * Two passes: first as written (prefixed tags keep their prefix); if `infNFe`
 * is not found under `nfeProc/NFe` or `NFe`, namespace declarations are
 * stripped and prefixes removed before a second attempt.
 *
 * @throws ExtractionError when the XML cannot be parsed or has no `infNFe`
 */
export function readNfeXml(xml: string): NfeXmlReadResult {
  let infNfe: XmlNode | null;
  let namespacesStripped = false;

  try {
    infNfe = locateInfNfe(parseTree(xml, false));
    if (!infNfe) {
      namespacesStripped = true;
      infNfe = locateInfNfe(parseTree(stripNamespaceDeclarations(xml), true));
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ExtractionError(`Unrecoverable error while parsing XML: ${message}`, 'xml', { reason: 'parse' });
  }

  if (!infNfe) {
    throw new ExtractionError("Invalid XML structure: could not find 'infNFe'", 'xml', {
      reason: 'root-not-found',
      searchedPaths: [...INF_NFE_PATHS],
    });
  }

  const warnings: Diagnostic[] = [];
  const det = asList(infNfe['det']);
  const items = det.map((node, index) => readItem(node, index, warnings));
  const firstProd = getNestedObject(det[0], 'prod');
  const icmsTotals = getNestedObject(infNfe, 'total.ICMSTot');

  const raw: RawNfe = {
    cfop: getTextValue(firstProd, 'CFOP'),
    chave: extractTextFromValue(infNfe['@_Id'])?.replace(/^NFe/, '') || null,
    emitente: readParty(getNestedObject(infNfe, 'emit'), 'enderEmit'),
    destinatario: readParty(getNestedObject(infNfe, 'dest'), 'enderDest'),
    valor_total: getTextValue(icmsTotals, 'vNF'),
    itens: items,
    totais_impostos: {
      vBC: getTextValue(icmsTotals, 'vBC'),
      vICMS: getTextValue(icmsTotals, 'vICMS'),
      vIPI: getTextValue(icmsTotals, 'vIPI'),
      vPIS: getTextValue(icmsTotals, 'vPIS'),
      vCOFINS: getTextValue(icmsTotals, 'vCOFINS'),
    },
  };

  return { raw, warnings, namespacesStripped };
}

function parseTree(xml: string, removeNSPrefix: boolean): XmlNode {
  const parsed: unknown = createParser(removeNSPrefix).parse(xml);
  return isNode(parsed) ? parsed : {};
}
