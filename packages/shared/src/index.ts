/**
 * @nfe-ledger/shared
 *
 * Shared utilities for nfe-ledger.
 *
 * @packageDocumentation
 */

export {
  createLogger,
  parseLogLevel,
  noopLogger,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogSink,
  type LoggerOptions,
} from './logging/logger.js';
export { createSafeLogger, type SafeLoggerOptions } from './logging/safe-logger.js';
export {
  NfeLedgerError,
  ValidationError,
  ConfigurationError,
  ExtractionError,
  MappingStoreError,
  TimeoutError,
  type ExtractionStage,
} from './errors/errors.js';
export {
  generateId,
  generateRunId,
  defaultIdGenerator,
  type IdGenerator,
  type GenerateIdOptions,
} from './utils/ids.js';

// Value normalization
export { parseBrazilianNumber, digitsOnly, cleanText, toCents, roundTo } from './normalize/numbers.js';

// CNPJ / CPF / access key validation (offline check digits only)
export * from './tax-id/index.js';

// Display formatting
export {
  formatDecimal,
  formatMoney,
  formatUnitPrice,
  formatQuantity,
  formatCnpj,
  formatCpf,
  formatRecipientTaxId,
  formatCep,
  formatPhone,
  formatStateRegistration,
  formatAddress,
} from './format/br-formatters.js';
