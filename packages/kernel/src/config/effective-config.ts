import { config as loadDotenv } from 'dotenv';
import { ConfigurationError, parseLogLevel, type LogLevel } from '@nfe-ledger/shared';
import { LLM_PROVIDERS, type LlmProvider } from '@nfe-ledger/steps-pdf';

/**
 * Environment variables as read from `process.env` or a parsed `.env` file
 */
export type EnvironmentSource = Readonly<Record<string, string | undefined>>;

export interface PdfWorkflowConfig {
  llmEnabled: boolean;
  llmProvider: LlmProvider;
  /** Null means the provider's default model */
  llmModel: string | null;
  llmTemperature: number;
  ocrEnabled: boolean;
  ocrLanguage: string;
  placeholderItem: boolean;
}

export interface WorkflowConfig {
  mappingCsvPath: string;
  /** Selects the PostgreSQL mapping store when set */
  databaseUrl: string | null;
  logLevel: LogLevel;
  pdf: PdfWorkflowConfig;
  apiKeys: Readonly<Record<LlmProvider, string | null>>;
}

/**
 * Default system configuration for the workflow.
 */
export const DEFAULT_WORKFLOW_CONFIG: WorkflowConfig = Object.freeze({
  mappingCsvPath: 'data/cfop-mappings.csv',
  databaseUrl: null,
  logLevel: 'info',
  pdf: Object.freeze({
    llmEnabled: true,
    llmProvider: 'openai',
    llmModel: null,
    llmTemperature: 0,
    ocrEnabled: true,
    ocrLanguage: 'por',
    placeholderItem: true,
  }),
  apiKeys: Object.freeze({ openai: null, groq: null, gemini: null }),
});

/**
 * Explicit overrides (highest precedence).
 */
export interface WorkflowConfigOverrides {
  mappingCsvPath?: string;
  databaseUrl?: string | null;
  logLevel?: LogLevel;
  pdf?: Partial<PdfWorkflowConfig>;
  apiKeys?: Partial<Record<LlmProvider, string | null>>;
}

/**
 * Effective configuration result.
 */
export interface EffectiveConfig {
  /** Merged configuration */
  config: WorkflowConfig;
  /** Sources that contributed to this config */
  sources: ('default' | 'environment' | 'overrides')[];
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

function readVariable(env: EnvironmentSource, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new ConfigurationError(`${name} must be a boolean (got ${value})`, { variable: name });
}

function parseProvider(value: string): LlmProvider {
  const normalized = value.toLowerCase();
  const provider = LLM_PROVIDERS.find((candidate) => candidate === normalized);
  if (provider === undefined) {
    throw new ConfigurationError(
      `PDF_LLM_PROVIDER must be one of ${LLM_PROVIDERS.join(', ')} (got ${value})`,
      { variable: 'PDF_LLM_PROVIDER' },
    );
  }
  return provider;
}

function parseTemperature(value: string | number): number {
  const temperature = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(temperature) || temperature < 0 || temperature > 2) {
    throw new ConfigurationError(`PDF_LLM_TEMPERATURE must be a number between 0 and 2 (got ${String(value)})`, {
      variable: 'PDF_LLM_TEMPERATURE',
    });
  }
  return temperature;
}

function parseLevel(value: string): LogLevel {
  const level = parseLogLevel(value);
  if (level === undefined) {
    throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error, silent (got ${value})`, {
      variable: 'LOG_LEVEL',
    });
  }
  return level;
}

/**
 * Read the settings present in an environment. Absent variables are left out.
 */
function fromEnvironment(env: EnvironmentSource): WorkflowConfigOverrides {
  const overrides: WorkflowConfigOverrides = {};
  const pdf: Partial<PdfWorkflowConfig> = {};
  const apiKeys: Partial<Record<LlmProvider, string | null>> = {};

  const csv = readVariable(env, 'NFE_MAPPING_CSV');
  if (csv !== undefined) overrides.mappingCsvPath = csv;

  const databaseUrl = readVariable(env, 'DATABASE_URL');
  if (databaseUrl !== undefined) overrides.databaseUrl = databaseUrl;

  const logLevel = readVariable(env, 'LOG_LEVEL');
  if (logLevel !== undefined) overrides.logLevel = parseLevel(logLevel);

  const llmEnabled = readVariable(env, 'PDF_LLM_ENABLED');
  if (llmEnabled !== undefined) pdf.llmEnabled = parseBoolean('PDF_LLM_ENABLED', llmEnabled);

  const provider = readVariable(env, 'PDF_LLM_PROVIDER');
  if (provider !== undefined) pdf.llmProvider = parseProvider(provider);

  const model = readVariable(env, 'PDF_LLM_MODEL');
  if (model !== undefined) pdf.llmModel = model;

  const temperature = readVariable(env, 'PDF_LLM_TEMPERATURE');
  if (temperature !== undefined) pdf.llmTemperature = parseTemperature(temperature);

  const ocrEnabled = readVariable(env, 'PDF_OCR_ENABLED');
  if (ocrEnabled !== undefined) pdf.ocrEnabled = parseBoolean('PDF_OCR_ENABLED', ocrEnabled);

  const ocrLanguage = readVariable(env, 'PDF_OCR_LANGUAGE');
  if (ocrLanguage !== undefined) pdf.ocrLanguage = ocrLanguage;

  const placeholder = readVariable(env, 'PDF_PLACEHOLDER_ITEM');
  if (placeholder !== undefined) pdf.placeholderItem = parseBoolean('PDF_PLACEHOLDER_ITEM', placeholder);

  const openai = readVariable(env, 'OPENAI_API_KEY');
  if (openai !== undefined) apiKeys.openai = openai;
  const groq = readVariable(env, 'GROQ_API_KEY');
  if (groq !== undefined) apiKeys.groq = groq;
  const gemini = readVariable(env, 'GOOGLE_API_KEY');
  if (gemini !== undefined) apiKeys.gemini = gemini;

  if (Object.keys(pdf).length > 0) overrides.pdf = pdf;
  if (Object.keys(apiKeys).length > 0) overrides.apiKeys = apiKeys;
  return overrides;
}

function merge(base: WorkflowConfig, overrides: WorkflowConfigOverrides): WorkflowConfig {
  return {
    mappingCsvPath: overrides.mappingCsvPath ?? base.mappingCsvPath,
    databaseUrl: overrides.databaseUrl !== undefined ? overrides.databaseUrl : base.databaseUrl,
    logLevel: overrides.logLevel ?? base.logLevel,
    pdf: { ...base.pdf, ...overrides.pdf },
    apiKeys: { ...base.apiKeys, ...overrides.apiKeys },
  };
}

/**
 * Build effective configuration by merging:
 * 1. System defaults
 * 2. Environment variables (if any are set)
 * 3. Explicit overrides (if provided)
 *
 * The merge follows precedence: overrides > environment > system defaults.
 *
 * @throws ConfigurationError on an unknown provider, a non-numeric temperature,
 *   an unknown log level or a malformed boolean
 */
export function buildEffectiveConfig(
  env: EnvironmentSource = process.env,
  overrides?: WorkflowConfigOverrides,
): EffectiveConfig {
  const sources: EffectiveConfig['sources'] = ['default'];
  let config = merge(DEFAULT_WORKFLOW_CONFIG, {});

  const environment = fromEnvironment(env);
  if (Object.keys(environment).length > 0) {
    config = merge(config, environment);
    sources.push('environment');
  }

  if (overrides !== undefined && Object.keys(overrides).length > 0) {
    if (overrides.pdf?.llmTemperature !== undefined) {
      parseTemperature(overrides.pdf.llmTemperature);
    }
    config = merge(config, overrides);
    sources.push('overrides');
  }

  return { config, sources };
}

export interface LoadEnvironmentOptions {
  /** Path of the `.env` file; defaults to `.env` in the working directory */
  path?: string;
}

function isMissingFile(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

/**
 * Load a `.env` file into `process.env` (existing variables win) and return it.
 * A missing file is not an error.
 *
 * @throws ConfigurationError when the file exists but cannot be read
 */
export function loadEnvironment(options: LoadEnvironmentOptions = {}): EnvironmentSource {
  const result = loadDotenv(options.path !== undefined ? { path: options.path } : {});
  if (result.error !== undefined && !isMissingFile(result.error)) {
    throw new ConfigurationError(`Failed to load environment file: ${result.error.message}`, {
      path: options.path ?? '.env',
    });
  }
  return process.env;
}
