import type { MappingRow, MappingStore, MappingUpsertInput, TaxRegime } from '@nfe-ledger/contracts';
import { matchMapping, toMappingRow, upsertRow } from '../mapping/rows.js';

/**
 * MemoryMappingStore keeps the mapping table in process.
 *
 * Use for tests and for embedding with a table built in code. The table is
 * its own cache, so `invalidate()` has nothing to drop.
 */
export class MemoryMappingStore implements MappingStore {
  private rows: readonly MappingRow[];

  constructor(initial: readonly MappingUpsertInput[] = []) {
    this.rows = initial.reduce<MappingRow[]>((rows, input) => upsertRow(rows, toMappingRow(input)), []);
  }

  load(): Promise<readonly MappingRow[]> {
    return Promise.resolve(this.rows);
  }

  findMapping(cfop: string, regime?: TaxRegime | null): Promise<MappingRow | null> {
    return Promise.resolve(matchMapping(this.rows, cfop, regime));
  }

  upsert(input: MappingUpsertInput): Promise<MappingRow> {
    try {
      const row = toMappingRow(input);
      this.rows = Object.freeze(upsertRow(this.rows, row));
      return Promise.resolve(row);
    } catch (error) {
      return Promise.reject(error);
    }
  }

  invalidate(): void {
    // nothing cached
  }
}
