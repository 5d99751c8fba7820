/**
 * NF-e document detection
 *
 * Reads root element, namespace declarations, layout version and model without
 * building the full tree. No document content is logged or returned.
 */

import { XMLValidator } from 'fast-xml-parser';
import type { Diagnostic } from '@nfe-ledger/contracts';
import { NFE_NAMESPACE, type NfeDetectionResult, type NfeModel, type NfeRootKind } from './types.js';

const SOURCE = 'nfe-ledger/xml';

interface RootInfo {
  rootElement: string;
  localName: string;
}

function error(code: string, message: string, context?: Record<string, unknown>): Diagnostic {
  const diagnostic: Diagnostic = { code, message, severity: 'error', category: 'format', source: SOURCE };
  if (context) diagnostic.context = context;
  return diagnostic;
}

/**
 * Detect whether the content is an NF-e and which flavour.
 *
 * Malformed XML yields `root: 'unknown'` and an `XML-MALFORMED` error carrying
 * the line and column reported by the validator.
 *
 * @example
 * ```typescript
 * const detected = detectNfeDocument(xml);
 * if (detected.root === 'unknown') {
 *   // not an NF-e
 * }
 * ```
 */
export function detectNfeDocument(xml: string): NfeDetectionResult {
  const unknown = (warnings: Diagnostic[]): NfeDetectionResult => ({
    root: 'unknown',
    hasPortalNamespace: false,
    model: 'unknown',
    warnings,
  });

  if (!xml || xml.trim().length === 0) {
    return unknown([error('XML-EMPTY', 'Empty XML content')]);
  }

  const trimmed = xml.trim();
  if (!trimmed.startsWith('<')) {
    return unknown([error('XML-NOT-XML', 'Content does not appear to be XML')]);
  }

  const validation = XMLValidator.validate(trimmed);
  if (validation !== true) {
    return unknown([
      error('XML-MALFORMED', `Malformed XML: ${validation.err.msg}`, {
        line: validation.err.line,
        col: validation.err.col,
        validatorCode: validation.err.code,
      }),
    ]);
  }

  const rootInfo = extractRootInfo(trimmed);
  if (!rootInfo) {
    return unknown([error('XML-ROOT-NOT-FOUND', 'No root element found')]);
  }

  const warnings: Diagnostic[] = [];
  const root = toRootKind(rootInfo.localName);
  if (root === 'unknown') {
    warnings.push({
      code: 'XML-ROOT-UNKNOWN',
      message: `Root element '${rootInfo.localName}' is neither nfeProc nor NFe`,
      severity: 'warning',
      category: 'format',
      source: SOURCE,
    });
  }

  const namespaces = extractNamespaces(trimmed);
  const hasPortalNamespace = [...namespaces.values()].includes(NFE_NAMESPACE);
  if (root !== 'unknown' && !hasPortalNamespace) {
    warnings.push({
      code: 'XML-NAMESPACE-MISSING',
      message: 'NF-e portal namespace is not declared',
      severity: 'info',
      category: 'format',
      source: SOURCE,
    });
  }

  const model = detectModel(trimmed);
  if (root !== 'unknown' && model === 'unknown') {
    warnings.push({
      code: 'XML-MODEL-UNKNOWN',
      message: 'Document model (ide/mod) is neither 55 nor 65',
      severity: 'warning',
      category: 'format',
      source: SOURCE,
    });
  }

  const result: NfeDetectionResult = {
    root,
    rootElement: rootInfo.rootElement,
    hasPortalNamespace,
    model,
    warnings,
  };
  const layoutVersion = extractLayoutVersion(trimmed);
  if (layoutVersion) result.layoutVersion = layoutVersion;
  return result;
}

/**
 * Extract root element info, skipping the declaration, comments and DOCTYPE
 */
function extractRootInfo(xml: string): RootInfo | null {
  const body = xml
    .replace(/^<\?xml[^?]*\?>\s*/, '')
    .replace(/^(<!--[\s\S]*?-->\s*)+/, '')
    .replace(/^<!DOCTYPE[^>]*>\s*/, '');

  const elementMatch = /^<([a-zA-Z_][\w.-]*(?::[a-zA-Z_][\w.-]*)?)/.exec(body);
  if (!elementMatch?.[1]) {
    return null;
  }

  const rootElement = elementMatch[1];
  const localName = rootElement.includes(':') ? (rootElement.split(':')[1] ?? rootElement) : rootElement;
  return { rootElement, localName };
}

/**
 * Extract namespace declarations (prefix -> URI; '' for the default namespace)
 */
function extractNamespaces(xml: string): Map<string, string> {
  const namespaces = new Map<string, string>();
  const nsRegex = /xmlns(?::([a-zA-Z_][\w.-]*))?="([^"]*)"/g;
  let match: RegExpExecArray | null;

  while ((match = nsRegex.exec(xml)) !== null) {
    namespaces.set(match[1] ?? '', match[2] ?? '');
  }

  return namespaces;
}

function toRootKind(localName: string): NfeRootKind {
  if (localName === 'nfeProc') return 'nfeProc';
  if (localName === 'NFe') return 'NFe';
  return 'unknown';
}

function detectModel(xml: string): NfeModel {
  const match = /<(?:\w+:)?mod>\s*(\d+)\s*<\/(?:\w+:)?mod>/.exec(xml);
  const value = match?.[1];
  return value === '55' || value === '65' ? value : 'unknown';
}

function extractLayoutVersion(xml: string): string | undefined {
  const match = /<(?:\w+:)?infNFe\b[^>]*\bversao="([^"]+)"/.exec(xml);
  return match?.[1];
}
