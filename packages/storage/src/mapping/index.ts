export { MappingCache } from './mapping-cache.js';
export {
  MAPPING_COLUMNS,
  DEFAULT_ROW_CONFIDENCE,
  normalizeRegime,
  parseConfidence,
  toMappingRow,
  matchMapping,
  upsertRow,
  type MappingColumn,
} from './rows.js';
