export { PostgresMappingStore, type PostgresMappingStoreOptions } from './postgres-mapping-store.js';
