import { describe, it, expect, vi } from 'vitest';
import type { Pool } from 'pg';
import { MappingStoreError, noopLogger } from '@nfe-ledger/shared';
import { PostgresMappingStore } from './postgres-mapping-store.js';

/**
 * Create a mock Pool that captures SQL queries.
 */
function createMockPool(rows: Record<string, unknown>[] = []) {
  const queries: { sql: string; values: unknown[] | undefined }[] = [];

  const mockQuery = vi.fn().mockImplementation((sql: string, values?: unknown[]) => {
    queries.push({ sql, values });
    return Promise.resolve({ rows: sql.trim().startsWith('SELECT') ? rows : [], rowCount: rows.length });
  });

  const mockPool = {
    query: mockQuery,
    end: vi.fn().mockResolvedValue(undefined),
  } as unknown as Pool;

  return { pool: mockPool, queries, mockQuery };
}

const dbRow = {
  cfop: '5102',
  regime: '*',
  debit_account: 'Clientes',
  credit_account: 'Receita de Vendas',
  justification_base: 'Venda de mercadoria',
  confidence: '0.9000',
};

describe('PostgresMappingStore', () => {
  it('loads rows and parses NUMERIC confidence', async () => {
    const { pool, queries } = createMockPool([dbRow]);
    const store = new PostgresMappingStore(pool, { logger: noopLogger });

    const found = await store.findMapping('5102', 'simples');

    expect(found).toEqual({
      cfop: '5102',
      regime: '*',
      debitAccount: 'Clientes',
      creditAccount: 'Receita de Vendas',
      justificationBase: 'Venda de mercadoria',
      confidence: 0.9,
    });
    expect(queries[0]?.sql).toContain('FROM cfop_mappings');
  });

  it('queries the table once until invalidated', async () => {
    const { pool, mockQuery } = createMockPool([dbRow]);
    const store = new PostgresMappingStore(pool, { logger: noopLogger });

    await store.load();
    await store.findMapping('5102');
    expect(mockQuery).toHaveBeenCalledTimes(1);

    store.invalidate();
    await store.load();
    expect(mockQuery).toHaveBeenCalledTimes(2);
  });

  it('upserts on the (cfop, regime) key and invalidates the cache', async () => {
    const { pool, queries } = createMockPool([dbRow]);
    const store = new PostgresMappingStore(pool, { logger: noopLogger });
    await store.load();

    const row = await store.upsert({
      cfop: '5102',
      regime: 'Simples',
      debitAccount: 'Clientes',
      creditAccount: 'Receita de Vendas',
      justificationBase: 'Venda',
      confidence: '0.85',
    });
    await store.load();

    expect(row.regime).toBe('simples');
    expect(queries[1]?.sql).toContain('ON CONFLICT (cfop, regime) DO UPDATE');
    expect(queries[1]?.values).toEqual(['5102', 'simples', 'Clientes', 'Receita de Vendas', 'Venda', 0.85]);
    expect(queries[2]?.sql).toContain('SELECT');
  });

  it('starts empty when the table cannot be read', async () => {
    const { pool, mockQuery } = createMockPool();
    mockQuery.mockRejectedValueOnce(new Error('connection refused'));
    const store = new PostgresMappingStore(pool, { logger: noopLogger });

    expect(await store.load()).toEqual([]);
  });

  it('raises MappingStoreError when the write fails', async () => {
    const { pool, mockQuery } = createMockPool([dbRow]);
    const store = new PostgresMappingStore(pool, { logger: noopLogger });
    const before = await store.load();
    mockQuery.mockRejectedValueOnce(new Error('connection reset'));

    await expect(
      store.upsert({
        cfop: '5102',
        regime: '*',
        debitAccount: 'Clientes',
        creditAccount: 'Receita',
        justificationBase: 'Venda',
        confidence: 0.8,
      }),
    ).rejects.toBeInstanceOf(MappingStoreError);
    expect(await store.load()).toBe(before);
  });

  it('validates input before touching the database', async () => {
    const { pool, mockQuery } = createMockPool();
    const store = new PostgresMappingStore(pool, { logger: noopLogger });

    await expect(
      store.upsert({
        cfop: '',
        debitAccount: 'Clientes',
        creditAccount: 'Receita',
        justificationBase: 'Venda',
        confidence: 0.8,
      }),
    ).rejects.toThrow('Missing required field: cfop');
    expect(mockQuery).not.toHaveBeenCalled();
  });
});
