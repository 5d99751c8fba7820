/**
 * Layout heuristics over positioned words
 *
 * Best-effort detection of the total value, issuer and recipient states, the
 * CFOP column and the access key of a DANFE. Tokens are associated with an
 * anchor label ("TOTAL", "EMITENTE", "CFOP", ...) when their centre lies inside
 * a rectangle around the anchor's centre. Every finder returns null or an
 * empty list when its anchors are absent; none of them throws.
 */

import type { Diagnostic, FiscalDocument } from '@nfe-ledger/contracts';
import { digitsOnly, isUf, isValidAccessKey } from '@nfe-ledger/shared';
import type { PdfWord } from './types.js';

const SOURCE = 'nfe-ledger/pdf-layout';

const ISSUER_ANCHORS = new Set(['EMITENTE', 'REMETENTE']);
const RECIPIENT_ANCHORS = new Set(['DESTINATÁRIO', 'DESTINATARIO', 'CONSUMIDOR']);
const CFOP_PREFIXES = new Set(['1', '2', '5', '6']);

/** Total values closer than this are considered equal */
const TOTAL_TOLERANCE = 0.01;

export interface NeighborhoodRadius {
  x: number;
  y: number;
}

/** Search rectangles around the TOTAL label and around the party section labels */
export interface LayoutRadii {
  total: NeighborhoodRadius;
  party: NeighborhoodRadius;
}

export const DEFAULT_LAYOUT_RADII: Readonly<LayoutRadii> = Object.freeze({
  total: { x: 300, y: 15 },
  party: { x: 300, y: 40 },
});

export interface LayoutFindings {
  totalValue: number | null;
  issuerUf: string | null;
  recipientUf: string | null;
  /** Distinct CFOPs under the CFOP column header, in reading order */
  cfops: string[];
  /** Access key with valid check digit */
  accessKey: string | null;
}

function centre(word: PdfWord): { x: number; y: number } {
  return { x: (word.x0 + word.x1) / 2, y: (word.y0 + word.y1) / 2 };
}

/**
 * Words on the same page whose centre lies within `radius` of the anchor's centre.
 * The anchor itself is included.
 */
export function neighbors(words: readonly PdfWord[], anchor: PdfWord, radius: NeighborhoodRadius): PdfWord[] {
  const c = centre(anchor);
  return words.filter((word) => {
    const w = centre(word);
    return word.page === anchor.page && Math.abs(w.x - c.x) <= radius.x && Math.abs(w.y - c.y) <= radius.y;
  });
}

/**
 * Normalize PT-BR number text: strips NBSP, "R$" and spaces; with a comma
 * present, dots are thousands separators and the comma is the decimal point.
 */
export function normalizeDecimalText(text: string): string {
  const compact = text.trim().replace(/\u00a0/g, ' ').replace('R$', '').replace(/ /g, '');
  return compact.includes(',') ? compact.replace(/\./g, '').replace(',', '.') : compact;
}

function amountOf(token: string): number | null {
  const normalized = normalizeDecimalText(token);
  if (!/^\d{1,3}(\.\d{3})*(,\d{2})?$/.test(token) && !/^\d+(\.\d+)?$/.test(normalized)) {
    return null;
  }
  const value = Number(normalized);
  return Number.isFinite(value) ? value : null;
}

/**
 * Largest amount next to a "TOTAL" label; falls back to the text after
 * "VALOR TOTAL [DA NOTA]" or "TOTAL DA NFC-E".
 */
export function findTotalValue(
  words: readonly PdfWord[],
  fallbackText: string,
  radius: NeighborhoodRadius = DEFAULT_LAYOUT_RADII.total,
): number | null {
  const candidates: number[] = [];

  for (const word of words) {
    if (word.text.toUpperCase() !== 'TOTAL') continue;

    const amounts = neighbors(words, word, radius)
      .map((near) => amountOf(near.text))
      .filter((value): value is number => value !== null);
    if (amounts.length > 0) {
      candidates.push(Math.max(...amounts));
    }
  }

  if (candidates.length > 0) {
    return Math.max(...candidates);
  }

  const match = /(VALOR\s+TOTAL(?:\s+DA\s+NOTA)?|TOTAL\s+DA\s+NFC-?E)[^\d]{0,20}([\d.,]+)/i.exec(fallbackText);
  if (!match?.[2]) {
    return null;
  }
  const value = Number(normalizeDecimalText(match[2]));
  return Number.isFinite(value) ? value : null;
}

function ufNear(words: readonly PdfWord[], anchor: PdfWord, radius: NeighborhoodRadius): string | null {
  const found = neighbors(words, anchor, radius).find((near) => isUf(near.text.toUpperCase()));
  return found ? found.text.toUpperCase() : null;
}

/**
 * Issuer and recipient states from the words near the party section labels.
 * When either is missing, the first two-letter UF codes in the text are used.
 */
export function findUfs(
  words: readonly PdfWord[],
  fallbackText: string,
  radius: NeighborhoodRadius = DEFAULT_LAYOUT_RADII.party,
): { issuerUf: string | null; recipientUf: string | null } {
  let issuerUf: string | null = null;
  let recipientUf: string | null = null;

  for (const word of words) {
    const token = word.text.toUpperCase();
    if (issuerUf === null && ISSUER_ANCHORS.has(token)) {
      issuerUf = ufNear(words, word, radius);
    }
    if (recipientUf === null && RECIPIENT_ANCHORS.has(token)) {
      recipientUf = ufNear(words, word, radius);
    }
  }

  if (issuerUf === null || recipientUf === null) {
    const ufs = [...fallbackText.matchAll(/\b([A-Z]{2})\b/g)]
      .map((match) => match[1] ?? '')
      .filter((code) => isUf(code));
    const [first, second, third] = ufs;
    if (first !== undefined && second !== undefined) {
      issuerUf ??= first;
      recipientUf ??= second !== issuerUf ? second : (third ?? null);
    }
  }

  return { issuerUf, recipientUf };
}

/**
 * CFOPs in the column under the first "CFOP" header (by page, then top, then left).
 */
export function findCfops(words: readonly PdfWord[]): string[] {
  const header = words
    .filter((word) => word.text.toUpperCase() === 'CFOP')
    .sort((a, b) => a.page - b.page || a.y0 - b.y0 || a.x0 - b.x0)[0];
  if (!header) {
    return [];
  }

  const headerX = centre(header).x;
  const cfops: string[] = [];
  for (const word of words) {
    if (word.page !== header.page) continue;
    const c = centre(word);
    if (c.y <= header.y1 + 5 || Math.abs(c.x - headerX) > 25) continue;

    const digits = digitsOnly(word.text);
    if (digits.length === 4 && CFOP_PREFIXES.has(digits.charAt(0)) && !cfops.includes(digits)) {
      cfops.push(digits);
    }
  }
  return cfops;
}

/**
 * The 44-digit access key, printed contiguously or in groups of four.
 * Only keys whose check digit matches are returned.
 */
export function findAccessKey(text: string): string | null {
  for (const match of text.matchAll(/(?<!\d)(\d{44})(?!\d)/g)) {
    if (match[1] && isValidAccessKey(match[1])) return match[1];
  }
  for (const match of text.matchAll(/(?<!\d)(\d{4}(?:[\s.]+\d{4}){10})(?!\d)/g)) {
    const key = digitsOnly(match[1]);
    if (isValidAccessKey(key)) return key;
  }
  return null;
}

/**
 * Run every finder over the words and text of a document.
 * Radii not given keep their {@link DEFAULT_LAYOUT_RADII} value.
 */
export function analyzeLayout(
  words: readonly PdfWord[],
  text: string,
  radii: Partial<LayoutRadii> = {},
): LayoutFindings {
  return {
    totalValue: findTotalValue(words, text, radii.total ?? DEFAULT_LAYOUT_RADII.total),
    ...findUfs(words, text, radii.party ?? DEFAULT_LAYOUT_RADII.party),
    cfops: findCfops(words),
    accessKey: findAccessKey(text),
  };
}

function layoutWarning(code: string, message: string, location: string, context: Record<string, unknown>): Diagnostic {
  return { code, message, severity: 'warning', category: 'layout', source: SOURCE, location, context };
}

/**
 * Compare layout findings with an extracted document. Only findings that were
 * actually detected are compared.
 */
export function crossCheckLayout(document: FiscalDocument, findings: LayoutFindings): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  if (findings.totalValue !== null && Math.abs(findings.totalValue - document.totalValue) > TOTAL_TOLERANCE) {
    diagnostics.push(
      layoutWarning(
        'PDF-LAYOUT-TOTAL',
        `Total near the TOTAL label (${findings.totalValue.toFixed(2)}) differs from extracted total (${document.totalValue.toFixed(2)})`,
        'totalValue',
        { layout: findings.totalValue, extracted: document.totalValue },
      ),
    );
  }

  if (findings.issuerUf !== null && findings.issuerUf !== document.issuer.uf) {
    diagnostics.push(
      layoutWarning(
        'PDF-LAYOUT-UF',
        `Issuer state from layout (${findings.issuerUf}) differs from extracted state (${document.issuer.uf})`,
        'issuer.uf',
        { layout: findings.issuerUf, extracted: document.issuer.uf },
      ),
    );
  }

  if (findings.recipientUf !== null && findings.recipientUf !== document.recipient.uf) {
    diagnostics.push(
      layoutWarning(
        'PDF-LAYOUT-UF',
        `Recipient state from layout (${findings.recipientUf}) differs from extracted state (${document.recipient.uf})`,
        'recipient.uf',
        { layout: findings.recipientUf, extracted: document.recipient.uf },
      ),
    );
  }

  if (findings.cfops.length > 0 && !findings.cfops.includes(document.cfop)) {
    diagnostics.push(
      layoutWarning(
        'PDF-LAYOUT-CFOP',
        `Extracted CFOP ${document.cfop} is not among the CFOPs in the item table (${findings.cfops.join(', ')})`,
        'cfop',
        { layout: findings.cfops, extracted: document.cfop },
      ),
    );
  }

  return diagnostics;
}
