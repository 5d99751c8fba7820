/**
 * @nfe-ledger/storage
 *
 * CFOP mapping stores. Each store owns a {@link MappingCache}; writes invalidate it.
 *
 * @packageDocumentation
 */

// Row handling and cache
export * from './mapping/index.js';

// CSV file
export * from './csv/index.js';

// In-process
export { MemoryMappingStore } from './memory/memory-mapping-store.js';

// PostgreSQL (pg)
export * from './postgres/index.js';

// Re-export types from contracts
export type { MappingRow, MappingStore, MappingUpsertInput } from '@nfe-ledger/contracts';
