/**
 * CSV Mapping Store
 *
 * UTF-8 CSV with the header `cfop,regime,conta_debito,conta_credito,justificativa_base,confianca`.
 * Every upsert rewrites the whole file in that column order. Rows that cannot
 * be read are left out of the table but written back unchanged.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import Papa from 'papaparse';
import type { MappingRow, MappingStore, MappingUpsertInput, TaxRegime } from '@nfe-ledger/contracts';
import { MappingStoreError, createSafeLogger, type Logger } from '@nfe-ledger/shared';
import { MappingCache } from '../mapping/mapping-cache.js';
import {
  DEFAULT_ROW_CONFIDENCE,
  MAPPING_COLUMNS,
  matchMapping,
  normalizeRegime,
  parseConfidence,
  toMappingRow,
  upsertRow,
  type MappingColumn,
} from '../mapping/rows.js';

export interface CsvMappingStoreOptions {
  /** Path of the CSV file */
  path: string;
  logger?: Logger;
}

/** One CSV record as read, keyed by lowercase header */
export type MappingCsvRecord = Partial<Record<MappingColumn, string>>;

export interface ParsedMappingCsv {
  rows: MappingRow[];
  /** Records left out of `rows`, in file order */
  unparsed: MappingCsvRecord[];
  skipped: number;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Parse CSV text into rows. Records without a four-digit CFOP or with an
 * unreadable confidence are returned in `unparsed` instead.
 */
export function parseMappingCsv(text: string): ParsedMappingCsv {
  const parsed = Papa.parse<MappingCsvRecord>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim().toLowerCase(),
  });

  const rows: MappingRow[] = [];
  const unparsed: MappingCsvRecord[] = [];
  for (const record of parsed.data) {
    const cfop = (record.cfop ?? '').trim();
    const confidenceText = (record.confianca ?? '').trim();
    const confidence = confidenceText === '' ? DEFAULT_ROW_CONFIDENCE : parseConfidence(confidenceText);
    if (!/^\d{4}$/.test(cfop) || confidence === null) {
      unparsed.push(record);
      continue;
    }
    rows.push(
      Object.freeze({
        cfop,
        regime: normalizeRegime(record.regime),
        debitAccount: (record.conta_debito ?? '').trim(),
        creditAccount: (record.conta_credito ?? '').trim(),
        justificationBase: (record.justificativa_base ?? '').trim(),
        confidence,
      }),
    );
  }
  return { rows, unparsed, skipped: unparsed.length };
}

/**
 * Serialize rows with a header, in the persisted column order.
 * Unparsed records follow the rows with their cells as read.
 */
export function serializeMappingCsv(
  rows: readonly MappingRow[],
  unparsed: readonly MappingCsvRecord[] = [],
): string {
  return Papa.unparse(
    {
      fields: [...MAPPING_COLUMNS],
      data: [
        ...rows.map((row) => [
          row.cfop,
          row.regime,
          row.debitAccount,
          row.creditAccount,
          row.justificationBase,
          String(row.confidence),
        ]),
        ...unparsed.map((record) => MAPPING_COLUMNS.map((column) => record[column] ?? '')),
      ],
    },
    { newline: '\n' },
  );
}

/**
 * CsvMappingStore keeps the mapping table in a CSV file.
 *
 * @example
 * ```typescript
 * const store = new CsvMappingStore({ path: 'data/cfop-mappings.csv' });
 * const row = await store.findMapping('5102', 'simples');
 * ```
 */
export class CsvMappingStore implements MappingStore {
  readonly path: string;
  private readonly logger: Logger;
  private readonly cache: MappingCache;

  constructor(options: CsvMappingStoreOptions) {
    this.path = options.path;
    this.logger = options.logger ?? createSafeLogger({ prefix: 'nfe-ledger:mappings' });
    this.cache = new MappingCache(async () => (await this.readTable()).rows);
  }

  /**
   * The parsed table. A file that exists but cannot be read gives an empty
   * table that is not cached, so the next call reads again.
   */
  load(): Promise<readonly MappingRow[]> {
    return this.cache.load().catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn('Mapping CSV could not be read; starting with an empty table', { error: message });
      return [];
    });
  }

  async findMapping(cfop: string, regime?: TaxRegime | null): Promise<MappingRow | null> {
    return matchMapping(await this.load(), cfop, regime);
  }

  /**
   * Write one row and rewrite the file. Refuses to write when the existing
   * file cannot be read.
   *
   * @throws MappingStoreError on invalid input or a failed read or write
   */
  async upsert(input: MappingUpsertInput): Promise<MappingRow> {
    const row = toMappingRow(input);

    let table: ParsedMappingCsv;
    try {
      table = await this.readTable();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to read mapping CSV before writing', { error: message });
      throw new MappingStoreError(`Failed to read mapping table: ${message}`, { cfop: row.cfop, regime: row.regime });
    }
    const rows = upsertRow(table.rows, row);

    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, `${serializeMappingCsv(rows, table.unparsed)}\n`, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to write mapping CSV', { error: message });
      throw new MappingStoreError(`Failed to write mapping table: ${message}`, { cfop: row.cfop, regime: row.regime });
    }

    this.invalidate();
    this.logger.info('Mapping upserted', { cfop: row.cfop, regime: row.regime, rows: rows.length });
    return row;
  }

  invalidate(): void {
    this.cache.invalidate();
  }

  /** Only a missing file reads as an empty table; other read errors reject */
  private async readTable(): Promise<ParsedMappingCsv> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
      this.logger.warn('Mapping CSV not found; starting with an empty table', { path: this.path });
      return { rows: [], unparsed: [], skipped: 0 };
    }

    const table = parseMappingCsv(text.replace(/^\ufeff/, ''));
    if (table.skipped > 0) {
      this.logger.warn('Skipped unreadable mapping rows', { skipped: table.skipped });
    }
    this.logger.info('Mapping table loaded', { rows: table.rows.length });
    return table;
  }
}
