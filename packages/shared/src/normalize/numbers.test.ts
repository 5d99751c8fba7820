import { describe, it, expect } from 'vitest';
import { parseBrazilianNumber, digitsOnly, cleanText, toCents, roundTo } from './numbers.js';

describe('parseBrazilianNumber', () => {
  it('should parse Brazilian formatted amounts', () => {
    expect(parseBrazilianNumber('1.234,56')).toBe(1234.56);
    expect(parseBrazilianNumber('R$ 1.234,56')).toBe(1234.56);
    expect(parseBrazilianNumber('R$ 2.800,00')).toBe(2800);
    expect(parseBrazilianNumber('0,5')).toBe(0.5);
  });

  it('should parse dot-decimal amounts', () => {
    expect(parseBrazilianNumber('1234.56')).toBe(1234.56);
    expect(parseBrazilianNumber('3.0000')).toBe(3);
    expect(parseBrazilianNumber(' 10 ')).toBe(10);
  });

  it('should pass finite numbers through', () => {
    expect(parseBrazilianNumber(99.9)).toBe(99.9);
    expect(parseBrazilianNumber(Number.NaN)).toBeNull();
    expect(parseBrazilianNumber(Number.POSITIVE_INFINITY)).toBeNull();
  });

  it('should return null for absent or unparseable values', () => {
    expect(parseBrazilianNumber(null)).toBeNull();
    expect(parseBrazilianNumber(undefined)).toBeNull();
    expect(parseBrazilianNumber('')).toBeNull();
    expect(parseBrazilianNumber('R$')).toBeNull();
    expect(parseBrazilianNumber('abc')).toBeNull();
    expect(parseBrazilianNumber('12abc')).toBeNull();
    expect(parseBrazilianNumber({})).toBeNull();
  });

  it('should accept signed values', () => {
    expect(parseBrazilianNumber('-1.000,25')).toBe(-1000.25);
  });
});

describe('digitsOnly', () => {
  it('should strip formatting', () => {
    expect(digitsOnly('01310-100')).toBe('01310100');
    expect(digitsOnly('(11) 98765-4321')).toBe('11987654321');
    expect(digitsOnly(5102)).toBe('5102');
    expect(digitsOnly(null)).toBe('');
  });
});

describe('cleanText', () => {
  it('should trim and drop blanks', () => {
    expect(cleanText('  Centro ')).toBe('Centro');
    expect(cleanText('   ')).toBeNull();
    expect(cleanText(undefined)).toBeNull();
    expect(cleanText(123)).toBe('123');
  });
});

describe('toCents / roundTo', () => {
  it('should compare amounts in cents', () => {
    expect(toCents(0.1 + 0.2)).toBe(30);
    expect(toCents(1234.565)).toBe(123457);
  });

  it('should round half away from zero', () => {
    expect(roundTo(2.5, 0)).toBe(3);
    expect(roundTo(-2.5, 0)).toBe(-3);
    expect(roundTo(1.236, 2)).toBe(1.24);
  });
});
