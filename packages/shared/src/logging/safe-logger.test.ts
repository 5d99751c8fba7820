import { describe, it, expect } from 'vitest';
import { createSafeLogger } from './safe-logger.js';
import { createLogger, parseLogLevel, type LogEntry } from './logger.js';

function capture(): { entries: LogEntry[]; sink: (entry: LogEntry) => void } {
  const entries: LogEntry[] = [];
  return { entries, sink: (entry) => entries.push(entry) };
}

describe('createLogger', () => {
  it('should filter below the configured level', () => {
    const { entries, sink } = capture();
    const logger = createLogger({ level: 'warn', sink });
    logger.info('ignored');
    logger.warn('kept');
    expect(entries.map((e) => e.message)).toEqual(['kept']);
    expect(entries[0]?.prefix).toBe('nfe-ledger');
  });

  it('should merge child context', () => {
    const { entries, sink } = capture();
    const logger = createLogger({ sink, context: { runId: 'run-1' } }).child({ step: 'xml' });
    logger.info('done', { items: 2 });
    expect(entries[0]?.context).toEqual({ runId: 'run-1', step: 'xml', items: 2 });
  });

  it('should emit nothing when silent', () => {
    const { entries, sink } = capture();
    createLogger({ level: 'silent', sink }).error('nope');
    expect(entries).toHaveLength(0);
  });
});

describe('parseLogLevel', () => {
  it('should accept known levels case-insensitively', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(' warn ')).toBe('warn');
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});

describe('createSafeLogger', () => {
  it('should scrub CNPJ and CPF from messages', () => {
    const { entries, sink } = capture();
    const logger = createSafeLogger({ sink });
    logger.info('Issuer 12.345.678/0001-95 sold to 123.456.789-01');
    expect(entries[0]?.message).toBe('Issuer [CNPJ:REDACTED] sold to [CPF:REDACTED]');
  });

  it('should scrub access keys before shorter digit runs', () => {
    const { entries, sink } = capture();
    createSafeLogger({ sink }).info('key 35240111222333000181550010000012341000012349');
    expect(entries[0]?.message).toBe('key [CHAVE:REDACTED]');
  });

  it('should scrub contact data', () => {
    const { entries, sink } = capture();
    createSafeLogger({ sink }).warn('call (11) 98765-4321 or fiscal@example.com, CEP 01310-100');
    expect(entries[0]?.message).toBe('call [PHONE:REDACTED] or [EMAIL:REDACTED], CEP [CEP:REDACTED]');
  });

  it('should redact sensitive field names and keep the rest', () => {
    const { entries, sink } = capture();
    createSafeLogger({ sink, runId: 'run-9' }).info('parsed', {
      cfop: '5102',
      cnpj: '11222333000181',
      apiKey: 'test-secret',
      nested: { note: 'CPF 52998224725' },
    });
    expect(entries[0]?.context).toEqual({
      runId: 'run-9',
      cfop: '5102',
      cnpj: '[REDACTED]',
      apiKey: '[REDACTED]',
      nested: { note: 'CPF [CPF:REDACTED]' },
    });
  });

  it('should leave values alone when scrubbing is disabled', () => {
    const { entries, sink } = capture();
    createSafeLogger({ sink, scrubPii: false }).info('CNPJ 11222333000181');
    expect(entries[0]?.message).toBe('CNPJ 11222333000181');
  });
});
