import { WILDCARD_REGIME, type TaxRegime } from '@nfe-ledger/contracts';

/**
 * Minimum confidence for a classification to be accepted without review
 */
export const MIN_CONFIDENCE_FOR_AUTO_APPROVE = 0.75;

/**
 * Version stamped on every classification result
 */
export const RULE_VERSION = 'v0.4';

export interface AccountSuggestion {
  debitAccount: string;
  creditAccount: string;
  justificationBase: string;
  confidence: number;
}

/**
 * Generic accounts by the first CFOP digit, used when no mapping row exists.
 * 1/2: entries (purchases). 5/6: exits (sales).
 */
export function fallbackByPrefix(cfop: string): AccountSuggestion {
  if (cfop.startsWith('1') || cfop.startsWith('2')) {
    return {
      debitAccount: 'Estoques de Mercadorias',
      creditAccount: 'Fornecedores',
      justificationBase: 'Operação de ENTRADA (compra) identificada por CFOP iniciando em 1/2.',
      confidence: 0.65,
    };
  }
  if (cfop.startsWith('5') || cfop.startsWith('6')) {
    return {
      debitAccount: 'Clientes',
      creditAccount: 'Receita de Vendas',
      justificationBase: 'Operação de SAÍDA (venda) identificada por CFOP iniciando em 5/6.',
      confidence: 0.65,
    };
  }
  return {
    debitAccount: 'Conta a Classificar (Débito)',
    creditAccount: 'Conta a Classificar (Crédito)',
    justificationBase: 'CFOP fora dos intervalos mínimos do MVP; aplicar regras detalhadas.',
    confidence: 0.5,
  };
}

/**
 * Regime label used in lookups and review reasons: lowercase, '*' when unset.
 */
export function regimeLabel(regime: TaxRegime | null | undefined): string {
  const normalized = (regime ?? '').trim().toLowerCase();
  return normalized === '' ? WILDCARD_REGIME : normalized;
}

/**
 * Base justification followed by the operation nature and the document total.
 */
export function composeJustification(base: string, operationNature: string, totalValue: number): string {
  return `${base} Natureza: ${operationNature}. Valor total da NF-e considerado para contexto: ${totalValue.toFixed(2)}.`;
}
