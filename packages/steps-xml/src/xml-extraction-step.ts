/**
 * XML Extraction Step
 *
 * Detects an NF-e, reads it into the raw field map, sanitizes and validates it.
 *
 * Privacy:
 * - No raw XML is logged or returned in results
 * - Logs carry codes and counts only
 */

import type { Diagnostic, DocumentSource, ExtractionResult, ExtractionStep } from '@nfe-ledger/contracts';
import { sanitizeRawNfe, validateFiscalDocument } from '@nfe-ledger/domain';
import { ExtractionError, ValidationError, createSafeLogger } from '@nfe-ledger/shared';
import { detectNfeDocument } from './detect-nfe.js';
import { readNfeXml } from './parse-nfe-xml.js';
import type { XmlExtractionConfig } from './types.js';

export const XML_EXTRACTION_STEP_ID = 'nfe-ledger/xml';

/**
 * Default configuration for the XML extraction step
 */
const DEFAULT_CONFIG: Required<Omit<XmlExtractionConfig, 'logger'>> = {
  maxXmlSize: 10 * 1024 * 1024, // 10MB
};

/**
 * Decode source content as UTF-8 text
 */
export function decodeSourceText(content: Uint8Array | string): string {
  return typeof content === 'string' ? content : new TextDecoder('utf-8').decode(content);
}

/**
 * XML Extraction Step Factory
 *
 * @example
 * ```typescript
 * const step = createXmlExtractionStep({ maxXmlSize: 2 * 1024 * 1024 });
 * const result = await step.execute({ content: await readFile('nota.xml'), fileName: 'nota.xml' });
 * ```
 */
export function createXmlExtractionStep(userConfig: XmlExtractionConfig = {}): ExtractionStep {
  const config = { ...DEFAULT_CONFIG, ...userConfig };
  const logger = userConfig.logger ?? createSafeLogger({ prefix: 'nfe-ledger:xml' });

  const step: ExtractionStep = {
    id: XML_EXTRACTION_STEP_ID,
    name: 'NF-e XML Extraction',
    version: '0.1.0',
    description: 'Detects NF-e XML, reads fields and validates them against the domain model',

    async execute(source: DocumentSource): Promise<ExtractionResult> {
      const startTime = Date.now();
      const startedAt = new Date().toISOString();
      const diagnostics: Diagnostic[] = [];

      try {
        const size = typeof source.content === 'string'
          ? Buffer.byteLength(source.content, 'utf8')
          : source.content.byteLength;
        if (size > config.maxXmlSize) {
          return createFailedResult(step.id, startTime, startedAt, [{
            code: 'XML-SIZE',
            message: `XML exceeds maximum size (${Math.round(config.maxXmlSize / 1024 / 1024)}MB)`,
            severity: 'error',
            category: 'format',
            source: step.id,
          }]);
        }

        const xml = decodeSourceText(source.content);

        // Step 1: Detect
        const detection = detectNfeDocument(xml);
        diagnostics.push(...detection.warnings);
        if (detection.warnings.some((d) => d.severity === 'error')) {
          return createFailedResult(step.id, startTime, startedAt, diagnostics);
        }

        // Step 2: Read fields
        const read = readNfeXml(xml);
        diagnostics.push(...read.warnings);
        if (read.namespacesStripped) {
          logger.debug('infNFe found after stripping namespace declarations');
        }

        // Step 3: Sanitize and validate
        const sanitized = sanitizeRawNfe(read.raw, { source: 'xml' });
        diagnostics.push(...sanitized.diagnostics);
        const validated = validateFiscalDocument(sanitized.candidate, { source: step.id, logger });
        diagnostics.push(...validated.diagnostics);

        const { document } = validated;
        logger.info('NF-e XML extracted', {
          cfop: document.cfop,
          items: document.items.length,
          warnings: diagnostics.filter((d) => d.severity === 'warning').length,
        });

        return {
          stepId: step.id,
          status: 'passed',
          document,
          diagnostics,
          durationMs: Date.now() - startTime,
          startedAt,
          completedAt: new Date().toISOString(),
          metadata: {
            root: detection.root,
            model: detection.model,
            layoutVersion: detection.layoutVersion ?? null,
            namespacesStripped: read.namespacesStripped,
          },
        };
      } catch (error) {
        if (error instanceof ValidationError) {
          logger.warn('NF-e XML failed validation', { issues: error.diagnostics.length });
          return createFailedResult(step.id, startTime, startedAt, [
            {
              code: 'XML-INVALID-DOCUMENT',
              message: `Invalid NF-e data: ${error.diagnostics.map((d) => d.message).join('; ')}`,
              severity: 'error',
              category: 'schema',
              source: step.id,
            },
            ...error.diagnostics,
            ...diagnostics,
          ]);
        }

        if (error instanceof ExtractionError) {
          logger.warn('NF-e XML could not be read', { code: error.code });
          return createFailedResult(step.id, startTime, startedAt, [
            {
              code: error.context?.['reason'] === 'root-not-found' ? 'XML-ROOT-NOT-FOUND' : 'XML-PARSE',
              message: sanitizeErrorMessage(error.message),
              severity: 'error',
              category: 'format',
              source: step.id,
            },
            ...diagnostics,
          ]);
        }

        const message = error instanceof Error ? error.message : String(error);
        logger.error('Internal XML extraction error', { error: sanitizeErrorMessage(message) });
        return {
          ...createFailedResult(step.id, startTime, startedAt, [{
            code: 'XML-INTERNAL',
            message: `Internal XML extraction error: ${sanitizeErrorMessage(message)}`,
            severity: 'error',
            category: 'internal',
            source: step.id,
          }]),
          status: 'error',
        };
      }
    },
  };

  return step;
}

/**
 * Pre-configured XML extraction step with default settings
 */
export const xmlExtractionStep = createXmlExtractionStep();

/**
 * Create a failed step result
 */
export function createFailedResult(
  stepId: string,
  startTime: number,
  startedAt: string,
  diagnostics: Diagnostic[],
): ExtractionResult {
  return {
    stepId,
    status: 'failed',
    diagnostics,
    durationMs: Date.now() - startTime,
    startedAt,
    completedAt: new Date().toISOString(),
  };
}

/**
 * Sanitize error message to remove paths and XML snippets
 */
export function sanitizeErrorMessage(message: string): string {
  let sanitized = message.replace(/\/[^\s']+/g, '[path]');
  sanitized = sanitized.replace(/<[^>]+>/g, '[xml]');

  if (sanitized.length > 200) {
    sanitized = sanitized.slice(0, 200) + '...';
  }

  return sanitized;
}
