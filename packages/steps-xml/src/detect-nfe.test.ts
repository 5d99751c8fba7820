import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { detectNfeDocument } from './detect-nfe.js';

const fixturesDir = join(dirname(fileURLToPath(import.meta.url)), '..', 'fixtures');
const fixture = (name: string): string => readFileSync(join(fixturesDir, name), 'utf8');

describe('detectNfeDocument', () => {
  it('detects an authorized nfeProc with the portal namespace', () => {
    const result = detectNfeDocument(fixture('nfe-proc-sp.xml'));

    expect(result.root).toBe('nfeProc');
    expect(result.rootElement).toBe('nfeProc');
    expect(result.hasPortalNamespace).toBe(true);
    expect(result.layoutVersion).toBe('4.00');
    expect(result.model).toBe('55');
    expect(result.warnings).toEqual([]);
  });

  it('detects a bare NFe written with a namespace prefix', () => {
    const result = detectNfeDocument(fixture('nfe-prefixed-interstate.xml'));

    expect(result.root).toBe('NFe');
    expect(result.rootElement).toBe('nfe:NFe');
    expect(result.hasPortalNamespace).toBe(true);
    expect(result.model).toBe('55');
  });

  it('reports NFC-e model and a missing namespace', () => {
    const xml = '<NFe><infNFe versao="4.00"><ide><mod>65</mod></ide></infNFe></NFe>';
    const result = detectNfeDocument(xml);

    expect(result.root).toBe('NFe');
    expect(result.model).toBe('65');
    expect(result.hasPortalNamespace).toBe(false);
    expect(result.warnings.map((w) => w.code)).toEqual(['XML-NAMESPACE-MISSING']);
    expect(result.warnings[0]?.severity).toBe('info');
  });

  it('warns when the model is not 55 or 65', () => {
    const xml = '<NFe xmlns="http://www.portalfiscal.inf.br/nfe"><infNFe><ide><mod>57</mod></ide></infNFe></NFe>';
    const result = detectNfeDocument(xml);

    expect(result.model).toBe('unknown');
    expect(result.warnings.map((w) => w.code)).toEqual(['XML-MODEL-UNKNOWN']);
  });

  it('warns on a root that is not an NF-e', () => {
    const result = detectNfeDocument(fixture('not-nfe.xml'));

    expect(result.root).toBe('unknown');
    expect(result.rootElement).toBe('Invoice');
    expect(result.warnings.map((w) => w.code)).toEqual(['XML-ROOT-UNKNOWN']);
    expect(result.warnings[0]?.severity).toBe('warning');
  });

  it('rejects empty content', () => {
    const result = detectNfeDocument('   ');

    expect(result.root).toBe('unknown');
    expect(result.warnings[0]?.code).toBe('XML-EMPTY');
    expect(result.warnings[0]?.severity).toBe('error');
  });

  it('rejects content that is not XML', () => {
    const result = detectNfeDocument('%PDF-1.7');

    expect(result.warnings[0]?.code).toBe('XML-NOT-XML');
  });

  it('reports malformed XML with its position', () => {
    const result = detectNfeDocument('<NFe>\n  <infNFe>\n</NFe>');

    expect(result.root).toBe('unknown');
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]?.code).toBe('XML-MALFORMED');
    expect(result.warnings[0]?.context?.['line']).toEqual(expect.any(Number));
  });
});
