import type { MappingRow } from '@nfe-ledger/contracts';

/**
 * MappingCache holds the loaded mapping table for one store.
 *
 * - The first `load()` runs the loader; concurrent callers share that promise
 * - `invalidate()` drops the table; a load already in flight is not cached
 */
export class MappingCache {
  private rows: readonly MappingRow[] | null = null;
  private pending: Promise<readonly MappingRow[]> | null = null;
  private generation = 0;

  constructor(private readonly loader: () => Promise<readonly MappingRow[]>) {}

  load(): Promise<readonly MappingRow[]> {
    if (this.rows !== null) {
      return Promise.resolve(this.rows);
    }
    if (this.pending !== null) {
      return this.pending;
    }

    const generation = this.generation;
    const pending = this.loader().then(
      (rows) => {
        const frozen = Object.freeze([...rows]);
        if (generation === this.generation) {
          this.rows = frozen;
          this.pending = null;
        }
        return frozen;
      },
      (error: unknown) => {
        if (generation === this.generation) {
          this.pending = null;
        }
        throw error;
      },
    );
    this.pending = pending;
    return pending;
  }

  invalidate(): void {
    this.rows = null;
    this.pending = null;
    this.generation++;
  }

  get isWarm(): boolean {
    return this.rows !== null;
  }
}
