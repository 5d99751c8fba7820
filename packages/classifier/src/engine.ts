/**
 * Classification Engine
 *
 * CFOP -> debit/credit accounts. A mapping row wins; without one a prefix
 * fallback applies and the result always goes to human review. Rows under
 * the confidence threshold go to review as well.
 */

import type { ClassificationResult, FiscalDocument, MappingRow, MappingStore, TaxRegime } from '@nfe-ledger/contracts';
import { operationNature } from '@nfe-ledger/domain';
import { createSafeLogger, type Logger } from '@nfe-ledger/shared';
import {
  MIN_CONFIDENCE_FOR_AUTO_APPROVE,
  RULE_VERSION,
  composeJustification,
  fallbackByPrefix,
  regimeLabel,
} from './rules.js';

export interface ClassifyOptions {
  store: MappingStore;
  /** Tax regime hint; unset means the wildcard row */
  regime?: TaxRegime | null;
  logger?: Logger;
}

async function lookup(store: MappingStore, cfop: string, regime: string, logger: Logger): Promise<MappingRow | null> {
  try {
    return await store.findMapping(cfop, regime);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn('Mapping lookup failed; applying fallback', { cfop, error: message });
    return null;
  }
}

/**
 * Classify a validated document.
 *
 * Never rejects: lookup failures degrade to the prefix fallback.
 *
 * @example
 * ```typescript
 * const result = await classifyDocument(document, { store, regime: 'simples' });
 * if (result.needsHumanReview) {
 *   console.log(result.reviewReason);
 * }
 * ```
 */
export async function classifyDocument(
  document: FiscalDocument,
  options: ClassifyOptions,
): Promise<ClassificationResult> {
  const logger = options.logger ?? createSafeLogger({ prefix: 'nfe-ledger:classifier' });
  const { cfop } = document;
  const regime = regimeLabel(options.regime);
  const nature = operationNature(document);

  const row = await lookup(options.store, cfop, regime, logger);

  let debitAccount: string;
  let creditAccount: string;
  let justificationBase: string;
  let confidence: number;
  let reviewReason: string | null = null;

  if (row !== null) {
    ({ debitAccount, creditAccount, confidence } = row);
    justificationBase = row.justificationBase || `CFOP ${cfop} (regime=${row.regime})`;
    if (confidence < MIN_CONFIDENCE_FOR_AUTO_APPROVE) {
      reviewReason =
        `Confiança abaixo do mínimo (${confidence.toFixed(2)} < ${MIN_CONFIDENCE_FOR_AUTO_APPROVE.toFixed(2)}). ` +
        `Revisar CFOP ${cfop} (regime=${regime}).`;
    }
  } else {
    ({ debitAccount, creditAccount, justificationBase, confidence } = fallbackByPrefix(cfop));
    reviewReason =
      `Mapeamento não encontrado na tabela de mapeamentos para CFOP ${cfop} (regime=${regime}). ` +
      'Aplicado fallback por prefixo. Revisão humana obrigatória.';
  }

  const result: ClassificationResult = {
    cfop,
    operationNature: nature,
    debitAccount,
    creditAccount,
    justification: composeJustification(justificationBase, nature, document.totalValue),
    ncmCodes: Object.freeze(document.items.map((item) => item.ncm)),
    confidence,
    needsHumanReview: reviewReason !== null,
    reviewReason,
    ruleVersion: RULE_VERSION,
    source: row !== null ? 'mapping' : 'fallback',
  };

  logger.info('Classification complete', {
    cfop,
    operationNature: nature,
    regime,
    confidence,
    source: result.source,
    needsHumanReview: result.needsHumanReview,
  });

  return Object.freeze(result);
}
