import { describe, it, expect } from 'vitest';
import type { FiscalParty, Recipient } from '@nfe-ledger/contracts';
import {
  formatDecimal,
  formatMoney,
  formatUnitPrice,
  formatQuantity,
  formatCnpj,
  formatCpf,
  formatRecipientTaxId,
  formatCep,
  formatPhone,
  formatStateRegistration,
  formatAddress,
} from './br-formatters.js';

const party: FiscalParty = {
  legalName: 'Comercial Exemplo Ltda',
  stateRegistration: '123456789',
  uf: 'SP',
  address: {
    street: 'Rua das Flores',
    number: '123',
    district: 'Centro',
    municipality: 'São Paulo',
    postalCode: '01310100',
    phone: '1155551234',
  },
};

describe('money and quantities', () => {
  it('should format amounts with Brazilian separators', () => {
    expect(formatMoney(1234.56)).toBe('R$ 1.234,56');
    expect(formatMoney(2800)).toBe('R$ 2.800,00');
    expect(formatMoney(0.5)).toBe('R$ 0,50');
    expect(formatMoney(1234567.891)).toBe('R$ 1.234.567,89');
    expect(formatMoney(-1500)).toBe('R$ -1.500,00');
  });

  it('should format quantities with four decimals', () => {
    expect(formatQuantity(3)).toBe('3,0000');
    expect(formatQuantity(10.5)).toBe('10,5000');
    expect(formatQuantity(1234.5)).toBe('1.234,5000');
    expect(formatQuantity(null)).toBe('-');
  });

  it('should render absent unit prices as a dash', () => {
    expect(formatUnitPrice(null)).toBe('-');
    expect(formatUnitPrice(2800)).toBe('R$ 2.800,00');
  });

  it('should support zero decimals', () => {
    expect(formatDecimal(1000, 0)).toBe('1.000');
  });
});

describe('identifiers', () => {
  it('should format CNPJ and CPF', () => {
    expect(formatCnpj('12345678000195')).toBe('12.345.678/0001-95');
    expect(formatCpf('12345678901')).toBe('123.456.789-01');
  });

  it('should return input of the wrong length unchanged', () => {
    expect(formatCnpj('123')).toBe('123');
    expect(formatCpf('1234567890123')).toBe('1234567890123');
    expect(formatCnpj(null)).toBe('');
  });

  it('should pick the recipient identifier that is set', () => {
    const company: Recipient = { ...party, cnpj: '11222333000181', cpf: null, stateRegistrationIndicator: '1' };
    const person: Recipient = { ...party, cnpj: null, cpf: '52998224725', stateRegistrationIndicator: '9' };
    expect(formatRecipientTaxId(company)).toBe('11.222.333/0001-81');
    expect(formatRecipientTaxId(person)).toBe('529.982.247-25');
  });
});

describe('contact data', () => {
  it('should format CEP', () => {
    expect(formatCep('01310100')).toBe('01310-100');
    expect(formatCep(null)).toBe('-');
    expect(formatCep('0131')).toBe('0131');
  });

  it('should format landlines and mobiles', () => {
    expect(formatPhone('1155551234')).toBe('(11) 5555-1234');
    expect(formatPhone('11987654321')).toBe('(11) 98765-4321');
    expect(formatPhone('119876')).toBe('(11) 9876');
    expect(formatPhone(null)).toBe('-');
  });

  it('should upper-case state registrations', () => {
    expect(formatStateRegistration('isento')).toBe('ISENTO');
    expect(formatStateRegistration(null)).toBe('-');
  });
});

describe('formatAddress', () => {
  it('should join the available parts', () => {
    expect(formatAddress(party)).toBe('Rua das Flores, 123 - Centro - São Paulo/SP - CEP: 01310-100');
  });

  it('should fall back to the state alone', () => {
    const bare: FiscalParty = {
      ...party,
      uf: 'RJ',
      address: { street: null, number: null, district: null, municipality: null, postalCode: null, phone: null },
    };
    expect(formatAddress(bare)).toBe('RJ');
  });
});
