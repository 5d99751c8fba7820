/**
 * PostgreSQL Mapping Store
 *
 * Same contract as the CSV store over the `cfop_mappings` table
 * (see sql/001_cfop_mappings.sql). Uses the 'pg' driver directly.
 */

import type { Pool } from 'pg';
import type { MappingRow, MappingStore, MappingUpsertInput, TaxRegime } from '@nfe-ledger/contracts';
import { MappingStoreError, createSafeLogger, type Logger } from '@nfe-ledger/shared';
import { MappingCache } from '../mapping/mapping-cache.js';
import { matchMapping, parseConfidence, toMappingRow } from '../mapping/rows.js';

/**
 * Row returned from the cfop_mappings table.
 * NUMERIC columns arrive as strings.
 */
interface CfopMappingRow {
  cfop: string;
  regime: string;
  debit_account: string;
  credit_account: string;
  justification_base: string;
  confidence: string | number;
}

const SELECT_COLUMNS = 'cfop, regime, debit_account, credit_account, justification_base, confidence';

function toRow(row: CfopMappingRow): MappingRow | null {
  const confidence = parseConfidence(row.confidence);
  if (confidence === null) {
    return null;
  }
  return Object.freeze({
    cfop: row.cfop.trim(),
    regime: row.regime,
    debitAccount: row.debit_account,
    creditAccount: row.credit_account,
    justificationBase: row.justification_base,
    confidence,
  });
}

export interface PostgresMappingStoreOptions {
  logger?: Logger;
}

/**
 * PostgresMappingStore
 *
 * @example
 * ```typescript
 * import { Pool } from 'pg';
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const store = new PostgresMappingStore(pool);
 * await store.upsert({ cfop: '5102', regime: 'simples', ... });
 * ```
 */
export class PostgresMappingStore implements MappingStore {
  private readonly pool: Pool;
  private readonly logger: Logger;
  private readonly cache: MappingCache;

  constructor(pool: Pool, options: PostgresMappingStoreOptions = {}) {
    this.pool = pool;
    this.logger = options.logger ?? createSafeLogger({ prefix: 'nfe-ledger:mappings' });
    this.cache = new MappingCache(() => this.selectAll());
  }

  load(): Promise<readonly MappingRow[]> {
    return this.cache.load();
  }

  async findMapping(cfop: string, regime?: TaxRegime | null): Promise<MappingRow | null> {
    return matchMapping(await this.load(), cfop, regime);
  }

  async upsert(input: MappingUpsertInput): Promise<MappingRow> {
    const row = toMappingRow(input);

    const query = `
      INSERT INTO cfop_mappings (cfop, regime, debit_account, credit_account, justification_base, confidence)
      VALUES ($1, $2, $3, $4, $5, $6)
      ON CONFLICT (cfop, regime) DO UPDATE SET
        debit_account = EXCLUDED.debit_account,
        credit_account = EXCLUDED.credit_account,
        justification_base = EXCLUDED.justification_base,
        confidence = EXCLUDED.confidence,
        updated_at = NOW()
    `;

    try {
      await this.pool.query(query, [
        row.cfop,
        row.regime,
        row.debitAccount,
        row.creditAccount,
        row.justificationBase,
        row.confidence,
      ]);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to upsert mapping row', { error: message });
      throw new MappingStoreError(`Failed to write mapping table: ${message}`, { cfop: row.cfop, regime: row.regime });
    }

    this.invalidate();
    this.logger.info('Mapping upserted', { cfop: row.cfop, regime: row.regime });
    return row;
  }

  invalidate(): void {
    this.cache.invalidate();
  }

  private async selectAll(): Promise<MappingRow[]> {
    const result = await this.pool
      .query<CfopMappingRow>(`SELECT ${SELECT_COLUMNS} FROM cfop_mappings ORDER BY cfop, regime`)
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn('Mapping table could not be read; starting with an empty table', { error: message });
        return null;
      });
    if (result === null) {
      return [];
    }

    const rows: MappingRow[] = [];
    for (const record of result.rows) {
      const row = toRow(record);
      if (row === null) {
        this.logger.warn('Skipped mapping row with unreadable confidence', { cfop: record.cfop });
        continue;
      }
      rows.push(row);
    }
    this.logger.info('Mapping table loaded', { rows: rows.length });
    return rows;
  }
}
