import type { FiscalDocument, OperationNature } from '@nfe-ledger/contracts';

/**
 * 'interna' when issuer and recipient are in the same state, 'interestadual' otherwise.
 */
export function operationNature(document: Pick<FiscalDocument, 'issuer' | 'recipient'>): OperationNature {
  return document.issuer.uf === document.recipient.uf ? 'interna' : 'interestadual';
}
