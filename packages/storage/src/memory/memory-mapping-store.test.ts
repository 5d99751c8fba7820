import { describe, it, expect } from 'vitest';
import { MemoryMappingStore } from './memory-mapping-store.js';

describe('MemoryMappingStore', () => {
  it('holds its initial table and upserts by key', async () => {
    const store = new MemoryMappingStore([
      {
        cfop: '1102',
        debitAccount: 'Estoques',
        creditAccount: 'Fornecedores',
        justificationBase: 'Compra',
        confidence: 0.8,
      },
    ]);

    await store.upsert({
      cfop: '1102',
      regime: '*',
      debitAccount: 'Estoques de Mercadorias',
      creditAccount: 'Fornecedores',
      justificationBase: 'Compra para revenda',
      confidence: '0.9',
    });

    const rows = await store.load();
    expect(rows).toHaveLength(1);
    expect(rows[0]?.debitAccount).toBe('Estoques de Mercadorias');
    expect((await store.findMapping('1102', 'simples'))?.confidence).toBe(0.9);
  });

  it('rejects invalid input', async () => {
    const store = new MemoryMappingStore();

    await expect(
      store.upsert({ cfop: '5102', debitAccount: '', creditAccount: 'B', justificationBase: 'C', confidence: 1 }),
    ).rejects.toThrow('Missing required field: debitAccount');
  });

  it('rejects a CFOP that is not four digits', async () => {
    const store = new MemoryMappingStore();

    await expect(
      store.upsert({ cfop: '51O2', debitAccount: 'A', creditAccount: 'B', justificationBase: 'C', confidence: 1 }),
    ).rejects.toThrow('CFOP must have exactly 4 digits (got 51O2)');
    expect(await store.load()).toEqual([]);
  });
});
