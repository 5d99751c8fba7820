import type { ClassificationResult, FiscalDocument } from '@nfe-ledger/contracts';
import {
  formatAddress,
  formatCnpj,
  formatMoney,
  formatRecipientTaxId,
  formatStateRegistration,
} from '@nfe-ledger/shared';

/**
 * Plain-text summary shown to the reviewer of a pending classification.
 *
 * @example
 * ```
 * CFOP: 5102 (interna)
 * Emitente: Comercial Exemplo Ltda - CNPJ 11.222.333/0001-81 - IE 123456789110
 *   Av. Paulista, 1000 - Bela Vista - São Paulo/SP - CEP: 01310-100
 * ...
 * ```
 */
export function buildReviewSummary(document: FiscalDocument, classification: ClassificationResult): string {
  const { issuer, recipient } = document;
  const recipientIdLabel = recipient.cnpj !== null ? 'CNPJ' : 'CPF';

  const lines = [
    `CFOP: ${classification.cfop} (${classification.operationNature})`,
    `Emitente: ${issuer.legalName} - CNPJ ${formatCnpj(issuer.cnpj)} - IE ${formatStateRegistration(issuer.stateRegistration)}`,
    `  ${formatAddress(issuer)}`,
    `Destinatário: ${recipient.legalName} - ${recipientIdLabel} ${formatRecipientTaxId(recipient)} - IE ${formatStateRegistration(recipient.stateRegistration)}`,
    `  ${formatAddress(recipient)}`,
    `Valor total: ${formatMoney(document.totalValue)} (${document.items.length} item(ns))`,
    `Sugestão: D ${classification.debitAccount} / C ${classification.creditAccount} (confiança ${classification.confidence.toFixed(2)})`,
  ];
  if (classification.reviewReason !== null) {
    lines.push(`Motivo: ${classification.reviewReason}`);
  }
  return lines.join('\n');
}
