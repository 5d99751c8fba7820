/**
 * zod schemas for the fiscal document model.
 *
 * Schemas validate an already-sanitized candidate (see sanitize.ts); they do not
 * coerce or clean values. Mutually exclusive identifiers (CNPJ xor CPF, CST xor
 * CSOSN) are checked here and narrowed into the tagged unions of the model.
 */

import { z } from 'zod';
import {
  UF_CODES,
  type ContributionTax,
  type FiscalDocument,
  type IcmsTax,
  type IpiTax,
  type ItemTaxes,
  type LineItem,
  type Recipient,
  type TaxTotals,
} from '@nfe-ledger/contracts';

const amount = z.number().nonnegative();
const optionalAmount = amount.nullable();
const optionalText = z.string().min(1).nullable();

export const cfopSchema = z.string().regex(/^\d{4}$/, 'CFOP must have exactly 4 digits');
export const cnpjSchema = z.string().regex(/^\d{14}$/, 'CNPJ must have exactly 14 digits');
export const cpfSchema = z.string().regex(/^\d{11}$/, 'CPF must have exactly 11 digits');
export const ufSchema = z.enum(UF_CODES, {
  errorMap: () => ({ message: 'UF must be one of the 27 Brazilian state codes' }),
});

export const addressSchema = z.object({
  street: optionalText,
  number: optionalText,
  district: optionalText,
  municipality: optionalText,
  postalCode: z.string().regex(/^\d{8}$/, 'CEP must have exactly 8 digits').nullable(),
  phone: z.string().regex(/^\d+$/, 'Phone must contain digits only').nullable(),
});

const partyFields = {
  legalName: z.string().trim().min(1, 'Legal name is required'),
  stateRegistration: optionalText,
  uf: ufSchema,
  address: addressSchema,
};

export const issuerSchema = z.object({
  ...partyFields,
  cnpj: cnpjSchema,
});

export const recipientSchema: z.ZodType<Recipient, z.ZodTypeDef, unknown> = z
  .object({
    ...partyFields,
    cnpj: cnpjSchema.nullable(),
    cpf: cpfSchema.nullable(),
    stateRegistrationIndicator: optionalText,
  })
  .transform((r, ctx): Recipient => {
    if (r.cnpj !== null && r.cpf !== null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cpf'],
        message: 'Recipient must have either CNPJ or CPF, not both',
      });
      return z.NEVER;
    }
    if (r.cnpj !== null) {
      return { ...r, cnpj: r.cnpj, cpf: null };
    }
    if (r.cpf !== null) {
      return { ...r, cnpj: null, cpf: r.cpf };
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['cnpj'],
      message: 'Recipient must have either CNPJ or CPF',
    });
    return z.NEVER;
  });

export const icmsSchema: z.ZodType<IcmsTax, z.ZodTypeDef, unknown> = z
  .object({
    cst: z.string().regex(/^\d{2}$/, 'ICMS CST must have exactly 2 digits').nullable(),
    csosn: z.string().regex(/^\d{3}$/, 'ICMS CSOSN must have exactly 3 digits').nullable(),
    origin: z.string().regex(/^[0-8]$/, 'ICMS origin must be a single digit 0-8').nullable(),
    base: optionalAmount,
    rate: optionalAmount,
    amount: optionalAmount,
  })
  .transform((icms, ctx): IcmsTax => {
    if (icms.cst !== null && icms.csosn !== null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['csosn'],
        message: 'ICMS must have either CST or CSOSN, not both',
      });
      return z.NEVER;
    }
    if (icms.cst !== null) {
      return { ...icms, cst: icms.cst, csosn: null };
    }
    if (icms.csosn !== null) {
      return { ...icms, cst: null, csosn: icms.csosn };
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['cst'],
      message: 'ICMS must have either CST or CSOSN',
    });
    return z.NEVER;
  });

export const ipiSchema: z.ZodType<IpiTax, z.ZodTypeDef, unknown> = z.object({
  cst: z.string().regex(/^\d{2}$/, 'IPI CST must have exactly 2 digits').nullable(),
  base: optionalAmount,
  rate: optionalAmount,
  amount: optionalAmount,
});

export const contributionTaxSchema: z.ZodType<ContributionTax, z.ZodTypeDef, unknown> = z.object({
  cst: z.string().regex(/^\d{2}$/, 'CST must have exactly 2 digits'),
  base: optionalAmount,
  rate: optionalAmount,
  amount: optionalAmount,
});

export const itemTaxesSchema: z.ZodType<ItemTaxes, z.ZodTypeDef, unknown> = z.object({
  icms: icmsSchema,
  ipi: ipiSchema.nullable(),
  pis: contributionTaxSchema.nullable(),
  cofins: contributionTaxSchema.nullable(),
});

export const lineItemSchema: z.ZodType<LineItem, z.ZodTypeDef, unknown> = z.object({
  description: z.string().trim().min(1, 'Item description is required'),
  productCode: optionalText,
  ncm: z.string().regex(/^\d{8}$/, 'NCM must have exactly 8 digits').nullable(),
  cest: z.string().regex(/^\d{7}$/, 'CEST must have exactly 7 digits').nullable(),
  quantity: z.number().positive('Quantity must be positive').nullable(),
  unitPrice: z.number().positive('Unit price must be positive').nullable(),
  unit: optionalText,
  totalValue: amount,
  taxes: itemTaxesSchema.nullable(),
});

export const taxTotalsSchema: z.ZodType<TaxTotals, z.ZodTypeDef, unknown> = z.object({
  icmsBase: optionalAmount,
  icms: optionalAmount,
  ipi: optionalAmount,
  pis: optionalAmount,
  cofins: optionalAmount,
});

export const fiscalDocumentSchema: z.ZodType<FiscalDocument, z.ZodTypeDef, unknown> = z.object({
  cfop: cfopSchema,
  accessKey: z.string().regex(/^\d{44}$/, 'Access key must have exactly 44 digits').nullable(),
  issuer: issuerSchema,
  recipient: recipientSchema,
  totalValue: amount,
  items: z.array(lineItemSchema).min(1, 'At least one item is required'),
  taxTotals: taxTotalsSchema.nullable(),
});
