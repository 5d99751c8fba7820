import { describe, it, expect } from 'vitest';
import { ValidationError } from '@nfe-ledger/shared';
import { validateFiscalDocument } from './validate.js';
import { operationNature } from './operation-nature.js';
import type { FiscalDocumentCandidate, LineItemCandidate } from './candidate.js';

const emptyAddress = {
  street: null,
  number: null,
  district: null,
  municipality: null,
  postalCode: null,
  phone: null,
};

function item(overrides: Partial<LineItemCandidate> = {}): LineItemCandidate {
  return {
    description: 'Parafuso sextavado',
    productCode: 'P-001',
    ncm: '73181500',
    cest: null,
    quantity: 2,
    unitPrice: 50,
    unit: 'UN',
    totalValue: 100,
    taxes: {
      icms: { cst: '00', csosn: null, origin: '0', base: 100, rate: 18, amount: 18 },
      ipi: null,
      pis: { cst: '01', base: 100, rate: 1.65, amount: 1.65 },
      cofins: { cst: '01', base: 100, rate: 7.6, amount: 7.6 },
    },
    ...overrides,
  };
}

function candidate(overrides: Partial<FiscalDocumentCandidate> = {}): FiscalDocumentCandidate {
  return {
    cfop: '5102',
    accessKey: null,
    issuer: {
      legalName: 'Comercial Exemplo Ltda',
      cnpj: '11222333000181',
      stateRegistration: '123456789',
      uf: 'SP',
      address: { ...emptyAddress, municipality: 'São Paulo', postalCode: '01310100' },
    },
    recipient: {
      legalName: 'Cliente Exemplo SA',
      cnpj: '11444777000161',
      cpf: null,
      stateRegistration: null,
      stateRegistrationIndicator: '1',
      uf: 'SP',
      address: emptyAddress,
    },
    totalValue: 100,
    items: [item()],
    taxTotals: null,
    ...overrides,
  };
}

function locationsOf(fn: () => unknown): (string | undefined)[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.diagnostics.map((d) => d.location);
    }
    throw error;
  }
  return [];
}

describe('validateFiscalDocument', () => {
  it('should accept a well-formed candidate without warnings', () => {
    const { document, diagnostics } = validateFiscalDocument(candidate());
    expect(document.cfop).toBe('5102');
    expect(document.recipient.cnpj).toBe('11444777000161');
    expect(document.recipient.cpf).toBeNull();
    expect(document.items[0]?.taxes?.icms.cst).toBe('00');
    expect(diagnostics).toEqual([]);
  });

  it('should freeze the document deeply', () => {
    const { document } = validateFiscalDocument(candidate());
    expect(Object.isFrozen(document)).toBe(true);
    expect(Object.isFrozen(document.items)).toBe(true);
    expect(Object.isFrozen(document.items[0])).toBe(true);
    expect(Object.isFrozen(document.issuer.address)).toBe(true);
  });

  it('should reject a recipient with both CNPJ and CPF', () => {
    const base = candidate();
    const input = candidate({ recipient: { ...base.recipient, cpf: '52998224725' } });
    expect(locationsOf(() => validateFiscalDocument(input))).toEqual(['recipient.cpf']);
  });

  it('should reject a recipient with neither CNPJ nor CPF', () => {
    const base = candidate();
    const input = candidate({ recipient: { ...base.recipient, cnpj: null } });
    expect(locationsOf(() => validateFiscalDocument(input))).toEqual(['recipient.cnpj']);
  });

  it('should accept a recipient identified by CPF', () => {
    const base = candidate();
    const { document } = validateFiscalDocument(
      candidate({ recipient: { ...base.recipient, cnpj: null, cpf: '52998224725' } }),
    );
    expect(document.recipient.cpf).toBe('52998224725');
    expect(document.recipient.cnpj).toBeNull();
  });

  it('should reject ICMS with both CST and CSOSN', () => {
    const input = candidate({
      items: [
        item({
          taxes: {
            icms: { cst: '00', csosn: '102', origin: '0', base: null, rate: null, amount: null },
            ipi: null,
            pis: null,
            cofins: null,
          },
        }),
      ],
    });
    expect(locationsOf(() => validateFiscalDocument(input))).toEqual(['items.0.taxes.icms.csosn']);
  });

  it('should reject ICMS with neither CST nor CSOSN', () => {
    const input = candidate({
      items: [
        item({
          taxes: {
            icms: { cst: null, csosn: null, origin: null, base: null, rate: null, amount: null },
            ipi: null,
            pis: null,
            cofins: null,
          },
        }),
      ],
    });
    expect(locationsOf(() => validateFiscalDocument(input))).toEqual(['items.0.taxes.icms.cst']);
  });

  it('should accept simplified-regime ICMS', () => {
    const input = candidate({
      items: [
        item({
          taxes: {
            icms: { cst: null, csosn: '102', origin: '0', base: null, rate: null, amount: null },
            ipi: null,
            pis: null,
            cofins: null,
          },
        }),
      ],
    });
    const { document } = validateFiscalDocument(input);
    expect(document.items[0]?.taxes?.icms.csosn).toBe('102');
    expect(document.items[0]?.taxes?.icms.cst).toBeNull();
  });

  it('should enumerate every failing field', () => {
    const base = candidate();
    const input = candidate({
      cfop: '510',
      totalValue: Number.NaN,
      issuer: { ...base.issuer, uf: 'XX' },
      items: [],
    });
    expect(locationsOf(() => validateFiscalDocument(input))).toEqual([
      'cfop',
      'issuer.uf',
      'totalValue',
      'items',
    ]);
  });

  it('should carry field messages in the error', () => {
    expect(() => validateFiscalDocument(candidate({ cfop: '51' }))).toThrow(
      'Fiscal document failed validation (1 issue(s)): cfop: CFOP must have exactly 4 digits',
    );
  });

  it('should reject NCM and CEST of the wrong length', () => {
    const input = candidate({ items: [item({ ncm: '7318', cest: '12' })] });
    expect(locationsOf(() => validateFiscalDocument(input))).toEqual(['items.0.ncm', 'items.0.cest']);
  });

  it('should warn, not fail, when quantity x unit price differs from the item total', () => {
    const { diagnostics } = validateFiscalDocument(
      candidate({ items: [item({ quantity: 2, unitPrice: 10, totalValue: 25 })], totalValue: 25 }),
    );
    expect(diagnostics.map((d) => d.code)).toEqual(['DOC-ITEM-TOTAL']);
    expect(diagnostics[0]?.location).toBe('items.0.totalValue');
  });

  it('should tolerate rounding within two cents', () => {
    const { diagnostics } = validateFiscalDocument(
      candidate({ items: [item({ quantity: 3, unitPrice: 33.33, totalValue: 100 })] }),
    );
    expect(diagnostics).toEqual([]);
  });

  it('should warn on identifiers with bad check digits', () => {
    const base = candidate();
    const { diagnostics } = validateFiscalDocument(
      candidate({
        issuer: { ...base.issuer, cnpj: '11222333000182' },
        recipient: { ...base.recipient, cnpj: null, cpf: '12345678901' },
      }),
    );
    expect(diagnostics.map((d) => `${d.code}@${d.location}`)).toEqual([
      'DOC-CNPJ-CHECK@issuer.cnpj',
      'DOC-CPF-CHECK@recipient.cpf',
    ]);
  });
});

describe('operationNature', () => {
  it('should be interna within one state', () => {
    const { document } = validateFiscalDocument(candidate());
    expect(operationNature(document)).toBe('interna');
  });

  it('should be interestadual across states', () => {
    const base = candidate();
    const { document } = validateFiscalDocument(candidate({ recipient: { ...base.recipient, uf: 'RJ' } }));
    expect(operationNature(document)).toBe('interestadual');
  });
});
