import { mkdir, mkdtemp, readFile, rm, stat, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MappingStoreError, createLogger, type LogEntry, type Logger } from '@nfe-ledger/shared';
import type { MappingUpsertInput } from '@nfe-ledger/contracts';
import { CsvMappingStore, parseMappingCsv, serializeMappingCsv } from './csv-mapping-store.js';

const HEADER = 'cfop,regime,conta_debito,conta_credito,justificativa_base,confianca';

const sale: MappingUpsertInput = {
  cfop: '5102',
  regime: 'simples',
  debitAccount: 'Clientes',
  creditAccount: 'Receita de Vendas',
  justificationBase: 'Venda de mercadoria, revenda.',
  confidence: '0.85',
};

function capturingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger({ level: 'debug', sink: (entry) => entries.push(entry) });
  return { logger, entries };
}

describe('CsvMappingStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'nfe-ledger-mappings-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty and warns when the file is missing', async () => {
    const { logger, entries } = capturingLogger();
    const store = new CsvMappingStore({ path: join(dir, 'missing.csv'), logger });

    expect(await store.load()).toEqual([]);
    expect(entries.some((e) => e.level === 'warn' && e.message.startsWith('Mapping CSV not found'))).toBe(true);
  });

  it('returns the row just written with the same confidence', async () => {
    const path = join(dir, 'nested', 'cfop.csv');
    const store = new CsvMappingStore({ path, logger: capturingLogger().logger });

    await store.upsert(sale);
    const found = await new CsvMappingStore({ path, logger: capturingLogger().logger }).findMapping('5102', 'simples');

    expect(found).toEqual({
      cfop: '5102',
      regime: 'simples',
      debitAccount: 'Clientes',
      creditAccount: 'Receita de Vendas',
      justificationBase: 'Venda de mercadoria, revenda.',
      confidence: 0.85,
    });
  });

  it('writes the header and the columns in order', async () => {
    const path = join(dir, 'cfop.csv');
    const store = new CsvMappingStore({ path, logger: capturingLogger().logger });

    await store.upsert(sale);

    expect(await readFile(path, 'utf-8')).toBe(
      `${HEADER}\n5102,simples,Clientes,Receita de Vendas,"Venda de mercadoria, revenda.",0.85\n`,
    );
  });

  it('keeps one row per key with the latest values', async () => {
    const path = join(dir, 'cfop.csv');
    const store = new CsvMappingStore({ path, logger: capturingLogger().logger });

    await store.upsert(sale);
    await store.upsert({ ...sale, cfop: '1102', debitAccount: 'Estoques' });
    await store.upsert({ ...sale, regime: 'SIMPLES', creditAccount: 'Receita Bruta', confidence: 0.9 });

    const rows = await store.load();
    expect(rows.map((r) => [r.cfop, r.regime, r.creditAccount, r.confidence])).toEqual([
      ['5102', 'simples', 'Receita Bruta', 0.9],
      ['1102', 'simples', 'Receita de Vendas', 0.85],
    ]);
  });

  it('keeps unreadable rows when another row is written', async () => {
    const path = join(dir, 'cfop.csv');
    await writeFile(
      path,
      `${HEADER}\n1102,*,Estoques,Fornecedores,Compra,0.8\n6102,*,Clientes,Receita,Venda,alta\n,*,A,B,C,0.5\n`,
      'utf-8',
    );
    const store = new CsvMappingStore({ path, logger: capturingLogger().logger });

    await store.upsert(sale);

    expect(await readFile(path, 'utf-8')).toBe(
      `${HEADER}\n` +
        '1102,*,Estoques,Fornecedores,Compra,0.8\n' +
        '5102,simples,Clientes,Receita de Vendas,"Venda de mercadoria, revenda.",0.85\n' +
        '6102,*,Clientes,Receita,Venda,alta\n' +
        ',*,A,B,C,0.5\n',
    );
    expect((await store.load()).map((r) => r.cfop)).toEqual(['1102', '5102']);
  });

  it('refuses to write when the existing file cannot be read', async () => {
    const path = join(dir, 'cfop.csv');
    await mkdir(path);
    const { logger, entries } = capturingLogger();
    const store = new CsvMappingStore({ path, logger });

    expect(await store.load()).toEqual([]);
    expect(entries.some((e) => e.level === 'warn' && e.message.startsWith('Mapping CSV could not be read'))).toBe(
      true,
    );

    const upsert = store.upsert(sale);
    await expect(upsert).rejects.toBeInstanceOf(MappingStoreError);
    await expect(upsert).rejects.toThrow(/^Failed to read mapping table: /);
    expect((await stat(path)).isDirectory()).toBe(true);
  });

  it('reads the file again after a failed read', async () => {
    const path = join(dir, 'cfop.csv');
    await mkdir(path);
    const store = new CsvMappingStore({ path, logger: capturingLogger().logger });
    expect(await store.load()).toEqual([]);

    await rm(path, { recursive: true });
    await writeFile(path, `${HEADER}\n5102,*,Clientes,Receita de Vendas,Venda,0.9\n`, 'utf-8');

    expect((await store.findMapping('5102'))?.debitAccount).toBe('Clientes');
  });

  it('falls back to the wildcard row', async () => {
    const path = join(dir, 'cfop.csv');
    await writeFile(path, `${HEADER}\n5102,*,Clientes,Receita de Vendas,Venda,0.9\n`, 'utf-8');
    const store = new CsvMappingStore({ path, logger: capturingLogger().logger });

    const found = await store.findMapping('5102', 'lucro_real');

    expect(found?.regime).toBe('*');
    expect(found?.debitAccount).toBe('Clientes');
  });

  it('serves the cached table until a write invalidates it', async () => {
    const path = join(dir, 'cfop.csv');
    await writeFile(path, `${HEADER}\n5102,*,Clientes,Receita de Vendas,Venda,0.9\n`, 'utf-8');
    const store = new CsvMappingStore({ path, logger: capturingLogger().logger });
    await store.load();

    await writeFile(path, `${HEADER}\n`, 'utf-8');
    expect(await store.findMapping('5102')).not.toBeNull();

    store.invalidate();
    expect(await store.findMapping('5102')).toBeNull();
  });

  it('rejects input with a missing field', async () => {
    const store = new CsvMappingStore({ path: join(dir, 'cfop.csv'), logger: capturingLogger().logger });

    await expect(store.upsert({ ...sale, justificationBase: '' })).rejects.toThrow(
      'Missing required field: justificationBase',
    );
  });

  it('reports a failed write and keeps the cached table', async () => {
    // The link resolves into a directory that does not exist: reads see a
    // missing file, writes fail.
    const path = join(dir, 'cfop.csv');
    await symlink(join(dir, 'absent', 'cfop.csv'), path);
    const store = new CsvMappingStore({ path, logger: capturingLogger().logger });
    const before = await store.load();

    await expect(store.upsert(sale)).rejects.toThrow(/^Failed to write mapping table: /);
    expect(await store.load()).toBe(before);
  });

  it('reports a failed read during an upsert and keeps the cached table', async () => {
    const path = join(dir, 'cfop.csv');
    await writeFile(path, `${HEADER}\n1102,*,Estoques,Fornecedores,Compra,0.8\n`, 'utf-8');
    const store = new CsvMappingStore({ path, logger: capturingLogger().logger });
    const before = await store.load();

    await rm(path);
    await mkdir(path);

    await expect(store.upsert(sale)).rejects.toThrow(/^Failed to read mapping table: /);
    expect(await store.load()).toBe(before);
    expect(before.map((r) => r.cfop)).toEqual(['1102']);
  });
});

describe('parseMappingCsv', () => {
  it('normalizes cells and defaults an empty confidence', () => {
    const { rows, unparsed, skipped } = parseMappingCsv(
      `${HEADER}\n 5102 , SIMPLES ,Clientes,Receita,,\n,*,A,B,C,0.5\n6102,*,A,B,C,alta\n510,*,A,B,C,0.5\n`,
    );

    expect(rows).toEqual([
      {
        cfop: '5102',
        regime: 'simples',
        debitAccount: 'Clientes',
        creditAccount: 'Receita',
        justificationBase: '',
        confidence: 0.7,
      },
    ]);
    expect(unparsed.map((record) => record.cfop)).toEqual(['', '6102', '510']);
    expect(skipped).toBe(3);
  });

  it('reads what serializeMappingCsv writes', () => {
    const row = {
      cfop: '6108',
      regime: '*',
      debitAccount: 'Clientes',
      creditAccount: 'Receita "interestadual"',
      justificationBase: 'Venda a não contribuinte; outra UF',
      confidence: 0.75,
    };

    expect(parseMappingCsv(serializeMappingCsv([row])).rows).toEqual([row]);
  });

  it('writes unparsed records after the rows with their cells as read', () => {
    const { rows, unparsed } = parseMappingCsv(`${HEADER}\n6102,*,Clientes,Receita,Venda,alta\n1102,*,A,B,C,0.5\n`);

    expect(serializeMappingCsv(rows, unparsed)).toBe(`${HEADER}\n1102,*,A,B,C,0.5\n6102,*,Clientes,Receita,Venda,alta`);
    expect(serializeMappingCsv([], [{ cfop: '6102', confianca: 'alta' }])).toBe(`${HEADER}\n6102,,,,,alta`);
  });
});
