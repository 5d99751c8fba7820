export {
  CsvMappingStore,
  parseMappingCsv,
  serializeMappingCsv,
  type CsvMappingStoreOptions,
  type MappingCsvRecord,
  type ParsedMappingCsv,
} from './csv-mapping-store.js';
