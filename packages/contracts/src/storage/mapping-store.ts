import type { MappingRow, TaxRegime } from '../classification/classification.js';

/**
 * Input accepted by {@link MappingStore.upsert}.
 * Confidence may arrive as text; stores parse and validate it.
 */
export interface MappingUpsertInput {
  cfop: string;
  regime?: TaxRegime | null;
  debitAccount: string;
  creditAccount: string;
  justificationBase: string;
  confidence: number | string;
}

/**
 * Persisted, cached table of CFOP mappings keyed by (cfop, regime).
 *
 * Implementations:
 * - CsvMappingStore: UTF-8 CSV file, full rewrite on every upsert
 * - PostgresMappingStore: `cfop_mappings` table
 * - MemoryMappingStore: in-process, for tests and embedding
 */
export interface MappingStore {
  /**
   * Load the whole table, from cache when warm.
   * Unavailable storage yields an empty table.
   */
  load(): Promise<readonly MappingRow[]>;

  /**
   * Exact (cfop, regime) match first, then (cfop, '*').
   */
  findMapping(cfop: string, regime?: TaxRegime | null): Promise<MappingRow | null>;

  /**
   * Insert or replace the row with the same (cfop, regime) key and invalidate the cache.
   */
  upsert(input: MappingUpsertInput): Promise<MappingRow>;

  /**
   * Drop the cached table; the next read reloads it.
   */
  invalidate(): void;
}
