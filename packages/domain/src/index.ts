/**
 * @nfe-ledger/domain
 *
 * Fiscal document schemas, validation and raw payload sanitization.
 *
 * @packageDocumentation
 */

export {
  fiscalDocumentSchema,
  issuerSchema,
  recipientSchema,
  lineItemSchema,
  itemTaxesSchema,
  icmsSchema,
  ipiSchema,
  contributionTaxSchema,
  taxTotalsSchema,
  addressSchema,
  cfopSchema,
  cnpjSchema,
  cpfSchema,
  ufSchema,
} from './schema.js';
export { validateFiscalDocument, type ValidateOptions, type ValidatedDocument } from './validate.js';
export { operationNature } from './operation-nature.js';
export { findItemTotalMismatches, ITEM_TOTAL_TOLERANCE, type ItemTotalMismatch } from './item-totals.js';
export {
  sanitizeRawNfe,
  deriveRecipientTaxId,
  UNKNOWN_ISSUER_NAME,
  UNKNOWN_RECIPIENT_NAME,
  RECIPIENT_ID_SENTINEL,
  PLACEHOLDER_ITEM_DESCRIPTION,
  type RawNfeSource,
  type SanitizeOptions,
  type SanitizeResult,
} from './sanitize.js';
export type * from './candidate.js';
