import pg from 'pg';
import type { MappingStore } from '@nfe-ledger/contracts';
import type { Logger } from '@nfe-ledger/shared';
import { CsvMappingStore, PostgresMappingStore } from '@nfe-ledger/storage';
import type { WorkflowConfig } from '../config/effective-config.js';

export interface MappingStoreHandle {
  kind: 'csv' | 'postgres';
  store: MappingStore;
  /** Release connections held by the store */
  close(): Promise<void>;
}

/**
 * PostgreSQL when `databaseUrl` is set, otherwise the CSV file at `mappingCsvPath`.
 * The pool connects lazily, on the first query.
 */
export function createMappingStore(config: WorkflowConfig, logger: Logger): MappingStoreHandle {
  if (config.databaseUrl !== null) {
    const pool = new pg.Pool({ connectionString: config.databaseUrl });
    logger.info('Using PostgreSQL mapping store');
    return {
      kind: 'postgres',
      store: new PostgresMappingStore(pool, { logger }),
      close: () => pool.end(),
    };
  }

  logger.info('Using CSV mapping store', { path: config.mappingCsvPath });
  return {
    kind: 'csv',
    store: new CsvMappingStore({ path: config.mappingCsvPath, logger }),
    close: () => Promise.resolve(),
  };
}
