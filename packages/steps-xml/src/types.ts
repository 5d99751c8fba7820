/**
 * Types for the XML extraction step
 */

import type { Diagnostic } from '@nfe-ledger/contracts';
import type { Logger } from '@nfe-ledger/shared';

/**
 * Namespace of the NF-e layout published by the national tax portal
 */
export const NFE_NAMESPACE = 'http://www.portalfiscal.inf.br/nfe';

/**
 * Paths at which `infNFe` is looked up, in order
 */
export const INF_NFE_PATHS = ['nfeProc.NFe.infNFe', 'NFe.infNFe'] as const;

/**
 * ICMS groups scanned in order; the first one present is used.
 * `ICMSSN*` groups carry CSOSN (Simples Nacional), the others CST.
 */
export const ICMS_VARIANTS = [
  'ICMS00',
  'ICMS02',
  'ICMS10',
  'ICMS15',
  'ICMS20',
  'ICMS30',
  'ICMS40',
  'ICMS51',
  'ICMS53',
  'ICMS60',
  'ICMS61',
  'ICMS70',
  'ICMS90',
  'ICMSPart',
  'ICMSST',
  'ICMSSN101',
  'ICMSSN102',
  'ICMSSN201',
  'ICMSSN202',
  'ICMSSN500',
  'ICMSSN900',
] as const;

/** Taxed first, then not taxed */
export const IPI_VARIANTS = ['IPITrib', 'IPINT'] as const;

export const PIS_VARIANTS = ['PISAliq', 'PISQtde', 'PISOutr', 'PISNT'] as const;

export const COFINS_VARIANTS = ['COFINSAliq', 'COFINSQtde', 'COFINSOutr', 'COFINSNT'] as const;

/**
 * Root element of the document
 * - nfeProc: authorized NF-e with its protocol
 * - NFe: bare NF-e (not yet authorized, or stored without protocol)
 */
export type NfeRootKind = 'nfeProc' | 'NFe' | 'unknown';

/**
 * Fiscal model from `ide/mod`: 55 = NF-e, 65 = NFC-e
 */
export type NfeModel = '55' | '65' | 'unknown';

/**
 * Result of document detection
 */
export interface NfeDetectionResult {
  root: NfeRootKind;

  /** Root element name as written, including any prefix */
  rootElement?: string;

  /** Whether the portal namespace is declared anywhere in the document */
  hasPortalNamespace: boolean;

  /** Layout version (`infNFe/@versao`, e.g. "4.00") */
  layoutVersion?: string;

  model: NfeModel;

  /** Warnings and, for unreadable input, errors */
  warnings: Diagnostic[];
}

/**
 * Configuration for the XML extraction step
 */
export interface XmlExtractionConfig {
  /**
   * Maximum XML size in bytes
   * @default 10485760 (10MB)
   */
  maxXmlSize?: number;

  logger?: Logger;
}
