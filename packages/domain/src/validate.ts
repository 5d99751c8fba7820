import type { ZodIssue } from 'zod';
import type { Diagnostic, FiscalDocument } from '@nfe-ledger/contracts';
import { ValidationError, isValidCnpj, isValidCpf, noopLogger, type Logger } from '@nfe-ledger/shared';
import { fiscalDocumentSchema } from './schema.js';
import { findItemTotalMismatches } from './item-totals.js';

export interface ValidateOptions {
  /** Component name recorded on diagnostics */
  source?: string;
  logger?: Logger;
}

export interface ValidatedDocument {
  /** Deep-frozen document */
  document: FiscalDocument;
  /** Advisory warnings; never blocking */
  diagnostics: Diagnostic[];
}

function issueLocation(issue: ZodIssue): string {
  return issue.path.length > 0 ? issue.path.join('.') : '(root)';
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function advisoryDiagnostics(document: FiscalDocument, source: string): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const mismatch of findItemTotalMismatches(document.items)) {
    diagnostics.push({
      code: 'DOC-ITEM-TOTAL',
      message:
        `Item ${mismatch.index}: quantity (${mismatch.quantity.toFixed(4)}) x unit price ` +
        `(${mismatch.unitPrice.toFixed(4)}) = ${mismatch.computed.toFixed(2)} differs from ` +
        `declared total ${mismatch.declared.toFixed(2)} by ${mismatch.difference.toFixed(2)}`,
      severity: 'warning',
      category: 'schema',
      source,
      location: `items.${mismatch.index}.totalValue`,
      context: { ...mismatch },
    });
  }

  if (!isValidCnpj(document.issuer.cnpj)) {
    diagnostics.push({
      code: 'DOC-CNPJ-CHECK',
      message: 'Issuer CNPJ check digits do not match',
      severity: 'warning',
      category: 'schema',
      source,
      location: 'issuer.cnpj',
    });
  }

  const { recipient } = document;
  if (recipient.cnpj !== null && !isValidCnpj(recipient.cnpj)) {
    diagnostics.push({
      code: 'DOC-CNPJ-CHECK',
      message: 'Recipient CNPJ check digits do not match',
      severity: 'warning',
      category: 'schema',
      source,
      location: 'recipient.cnpj',
    });
  }
  if (recipient.cpf !== null && !isValidCpf(recipient.cpf)) {
    diagnostics.push({
      code: 'DOC-CPF-CHECK',
      message: 'Recipient CPF check digits do not match',
      severity: 'warning',
      category: 'schema',
      source,
      location: 'recipient.cpf',
    });
  }

  return diagnostics;
}

/**
 * Validate a sanitized candidate against the fiscal document schema.
 *
 * @returns The frozen document plus advisory warnings (item totals, check digits)
 * @throws ValidationError listing one `DOC-FIELD` diagnostic per failing field
 */
export function validateFiscalDocument(candidate: unknown, options: ValidateOptions = {}): ValidatedDocument {
  const source = options.source ?? 'domain';
  const logger = options.logger ?? noopLogger;

  const parsed = fiscalDocumentSchema.safeParse(candidate);
  if (!parsed.success) {
    const diagnostics: Diagnostic[] = parsed.error.issues.map((issue) => ({
      code: 'DOC-FIELD',
      message: `${issueLocation(issue)}: ${issue.message}`,
      severity: 'error',
      category: 'schema',
      source,
      location: issueLocation(issue),
    }));
    const summary = diagnostics.map((d) => d.message).join('; ');
    throw new ValidationError(
      `Fiscal document failed validation (${diagnostics.length} issue(s)): ${summary}`,
      diagnostics,
    );
  }

  const document = deepFreeze(parsed.data);
  const diagnostics = advisoryDiagnostics(document, source);
  for (const diagnostic of diagnostics) {
    logger.warn(diagnostic.message, { code: diagnostic.code, location: diagnostic.location });
  }

  return { document, diagnostics };
}
