import { describe, it, expect } from 'vitest';
import { MappingStoreError } from '@nfe-ledger/shared';
import type { MappingUpsertInput } from '@nfe-ledger/contracts';
import { matchMapping, normalizeRegime, parseConfidence, toMappingRow, upsertRow } from './rows.js';

const input: MappingUpsertInput = {
  cfop: '5102',
  regime: ' Simples ',
  debitAccount: 'Clientes',
  creditAccount: 'Receita de Vendas',
  justificationBase: 'Venda de mercadoria adquirida de terceiros.',
  confidence: '0.85',
};

describe('normalizeRegime', () => {
  it('lowercases and defaults to the wildcard', () => {
    expect(normalizeRegime(' Lucro_Presumido ')).toBe('lucro_presumido');
    expect(normalizeRegime('')).toBe('*');
    expect(normalizeRegime(null)).toBe('*');
    expect(normalizeRegime(undefined)).toBe('*');
  });
});

describe('parseConfidence', () => {
  it('accepts numbers and decimal text', () => {
    expect(parseConfidence(0.9)).toBe(0.9);
    expect(parseConfidence(' 0.85 ')).toBe(0.85);
    expect(parseConfidence('0,6')).toBe(0.6);
  });

  it('returns null for non-numbers', () => {
    expect(parseConfidence('alta')).toBeNull();
    expect(parseConfidence(Number.NaN)).toBeNull();
  });
});

describe('toMappingRow', () => {
  it('normalizes input into a row', () => {
    expect(toMappingRow(input)).toEqual({
      cfop: '5102',
      regime: 'simples',
      debitAccount: 'Clientes',
      creditAccount: 'Receita de Vendas',
      justificationBase: 'Venda de mercadoria adquirida de terceiros.',
      confidence: 0.85,
    });
  });

  it('defaults a missing regime to the wildcard', () => {
    expect(toMappingRow({ ...input, regime: null }).regime).toBe('*');
  });

  it('names the missing field', () => {
    expect(() => toMappingRow({ ...input, debitAccount: '  ' })).toThrow('Missing required field: debitAccount');
    expect(() => toMappingRow({ ...input, confidence: '' })).toThrow('Missing required field: confidence');
  });

  it('rejects a CFOP that is not four digits', () => {
    expect(() => toMappingRow({ ...input, cfop: '510' })).toThrow('CFOP must have exactly 4 digits (got 510)');
    expect(() => toMappingRow({ ...input, cfop: '5.102' })).toThrow(MappingStoreError);
    expect(toMappingRow({ ...input, cfop: ' 5102 ' }).cfop).toBe('5102');
  });

  it('accepts zero confidence', () => {
    expect(toMappingRow({ ...input, confidence: 0 }).confidence).toBe(0);
  });

  it('rejects confidence outside [0, 1]', () => {
    expect(() => toMappingRow({ ...input, confidence: '1.5' })).toThrow(MappingStoreError);
    expect(() => toMappingRow({ ...input, confidence: 'alta' })).toThrow(
      'Confidence must be a number between 0 and 1 (got alta)',
    );
  });
});

describe('matchMapping', () => {
  const wildcard = toMappingRow({ ...input, regime: '*', debitAccount: 'Clientes (geral)' });
  const simples = toMappingRow(input);
  const rows = [wildcard, simples];

  it('prefers the exact regime', () => {
    expect(matchMapping(rows, '5102', 'SIMPLES')).toBe(simples);
  });

  it('falls back to the wildcard row', () => {
    expect(matchMapping(rows, '5102', 'lucro_real')).toBe(wildcard);
    expect(matchMapping(rows, '5102')).toBe(wildcard);
  });

  it('returns null for an unknown CFOP', () => {
    expect(matchMapping(rows, '1102', 'simples')).toBeNull();
  });
});

describe('upsertRow', () => {
  it('replaces a row in place and appends new keys', () => {
    const first = toMappingRow({ ...input, cfop: '1102' });
    const second = toMappingRow(input);
    const replaced = toMappingRow({ ...input, confidence: 0.95 });

    const rows = upsertRow(upsertRow([first, second], replaced), toMappingRow({ ...input, regime: 'normal' }));

    expect(rows.map((r) => [r.cfop, r.regime, r.confidence])).toEqual([
      ['1102', 'simples', 0.85],
      ['5102', 'simples', 0.95],
      ['5102', 'normal', 0.85],
    ]);
  });
});
