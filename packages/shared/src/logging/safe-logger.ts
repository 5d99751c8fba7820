import { createLogger, type Logger, type LoggerOptions } from './logger.js';

/**
 * Personal and fiscal identifiers scrubbed from log output.
 * Order matters: longer digit runs are matched before their substrings.
 */
const PII_PATTERNS: { pattern: RegExp; replacement: string; name: string }[] = [
  // NF-e access key (44 digits)
  {
    pattern: /\b\d{44}\b/g,
    replacement: '[CHAVE:REDACTED]',
    name: 'access-key',
  },
  // CNPJ, formatted or bare
  {
    pattern: /\b\d{2}\.?\d{3}\.?\d{3}\/?\d{4}-?\d{2}\b/g,
    replacement: '[CNPJ:REDACTED]',
    name: 'cnpj',
  },
  // CPF, formatted or bare
  {
    pattern: /\b\d{3}\.?\d{3}\.?\d{3}-?\d{2}\b/g,
    replacement: '[CPF:REDACTED]',
    name: 'cpf',
  },
  // Email addresses
  {
    pattern: /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g,
    replacement: '[EMAIL:REDACTED]',
    name: 'email',
  },
  // Brazilian phone numbers: (11) 98765-4321, 11 5555-1234, +55 ...
  {
    pattern: /(\+55\s?)?\(?\b\d{2}\)?\s?9?\d{4}-\d{4}\b/g,
    replacement: '[PHONE:REDACTED]',
    name: 'phone-br',
  },
  // CEP (hyphenated only; bare 8-digit runs are too ambiguous)
  {
    pattern: /\b\d{5}-\d{3}\b/g,
    replacement: '[CEP:REDACTED]',
    name: 'cep',
  },
];

/**
 * Fields that should be completely redacted when found in context (compared lowercased)
 */
const SENSITIVE_FIELD_NAMES = new Set([
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'authorization',
  'credential',
  'credentials',
  'databaseurl',
  'database_url',
  'cnpj',
  'cpf',
  'email',
  'phone',
  'fone',
  'street',
  'postalcode',
  'cep',
]);

function scrubString(value: string, extra: { pattern: RegExp; replacement: string }[]): string {
  let result = value;
  for (const { pattern, replacement } of PII_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  for (const { pattern, replacement } of extra) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

function scrubValue(value: unknown, extra: { pattern: RegExp; replacement: string }[], depth: number): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH_REACHED]';
  }
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value === 'string') {
    return scrubString(value, extra);
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => scrubValue(item, extra, depth + 1));
  }
  if (value instanceof Error) {
    return { name: value.name, message: scrubString(value.message, extra) };
  }
  if (typeof value === 'object') {
    return scrubRecord(Object.entries(value), extra, depth + 1);
  }
  return '[UNSUPPORTED_TYPE]';
}

function scrubRecord(
  entries: [string, unknown][],
  extra: { pattern: RegExp; replacement: string }[],
  depth: number,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    result[key] = SENSITIVE_FIELD_NAMES.has(key.toLowerCase())
      ? '[REDACTED]'
      : scrubValue(value, extra, depth);
  }
  return result;
}

/**
 * Safe logger options
 */
export interface SafeLoggerOptions extends LoggerOptions {
  /**
   * Run ID to include in all log entries
   */
  runId?: string;

  /**
   * Whether to enable PII scrubbing
   * @default true
   */
  scrubPii?: boolean;

  /**
   * Additional patterns to scrub
   */
  additionalPatterns?: { pattern: RegExp; replacement: string }[];
}

/**
 * Create a logger that scrubs CNPJ, CPF, access keys, emails, phones and CEPs
 * from messages and context, and redacts known sensitive field names.
 *
 * @example
 * ```typescript
 * const logger = createSafeLogger({ runId: 'run-abc' });
 * logger.info('Issuer 12.345.678/0001-95 parsed', { cfop: '5102' });
 * // => ... Issuer [CNPJ:REDACTED] parsed {"runId":"run-abc","cfop":"5102"}
 * ```
 */
export function createSafeLogger(options: SafeLoggerOptions = {}): Logger {
  const scrubPii = options.scrubPii ?? true;
  const extra = options.additionalPatterns ?? [];

  const baseContext: Record<string, unknown> = { ...options.context };
  if (options.runId !== undefined) {
    baseContext['runId'] = options.runId;
  }
  const baseLogger = createLogger({ ...options, context: baseContext });

  const message = (value: string): string => (scrubPii ? scrubString(value, extra) : value);
  const context = (value?: Record<string, unknown>): Record<string, unknown> | undefined => {
    if (!scrubPii || value === undefined) {
      return value;
    }
    return scrubRecord(Object.entries(value), extra, 0);
  };

  return {
    debug: (msg, ctx) => baseLogger.debug(message(msg), context(ctx)),
    info: (msg, ctx) => baseLogger.info(message(msg), context(ctx)),
    warn: (msg, ctx) => baseLogger.warn(message(msg), context(ctx)),
    error: (msg, ctx) => baseLogger.error(message(msg), context(ctx)),

    child(childContext: Record<string, unknown>): Logger {
      return createSafeLogger({ ...options, context: { ...options.context, ...childContext } });
    },
  };
}
