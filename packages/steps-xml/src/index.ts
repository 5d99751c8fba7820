/**
 * @nfe-ledger/steps-xml
 *
 * NF-e XML extraction.
 *
 * This package provides:
 * - NF-e detection (nfeProc or bare NFe, model, layout version)
 * - Tolerant field reading with a namespace-stripping second pass
 * - An extraction step that sanitizes and validates into a FiscalDocument
 *
 * No network access; safe for offline environments.
 *
 * @packageDocumentation
 */

// Main step
export {
  xmlExtractionStep,
  createXmlExtractionStep,
  decodeSourceText,
  sanitizeErrorMessage,
  XML_EXTRACTION_STEP_ID,
} from './xml-extraction-step.js';

// Detection function (for direct use)
export { detectNfeDocument } from './detect-nfe.js';

// Reading functions (for direct use)
export { readNfeXml, stripNamespaceDeclarations, getNestedObject, getTextValue, asList } from './parse-nfe-xml.js';
export type { NfeXmlReadResult } from './parse-nfe-xml.js';

// Types
export type { NfeRootKind, NfeModel, NfeDetectionResult, XmlExtractionConfig } from './types.js';

// Constants (for testing and extension)
export {
  NFE_NAMESPACE,
  INF_NFE_PATHS,
  ICMS_VARIANTS,
  IPI_VARIANTS,
  PIS_VARIANTS,
  COFINS_VARIANTS,
} from './types.js';
