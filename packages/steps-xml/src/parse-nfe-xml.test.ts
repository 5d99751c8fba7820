import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { ExtractionError } from '@nfe-ledger/shared';
import { asList, getTextValue, readNfeXml, stripNamespaceDeclarations } from './parse-nfe-xml.js';

const fixturesDir = join(dirname(fileURLToPath(import.meta.url)), '..', 'fixtures');
const fixture = (name: string): string => readFileSync(join(fixturesDir, name), 'utf8');

describe('readNfeXml', () => {
  it('reads header, parties and totals from an nfeProc', () => {
    const { raw, warnings, namespacesStripped } = readNfeXml(fixture('nfe-proc-sp.xml'));

    expect(namespacesStripped).toBe(false);
    expect(warnings).toEqual([]);
    expect(raw.cfop).toBe('5102');
    expect(raw.chave).toBe('35240111222333000181550010000012341000012349');
    expect(raw.valor_total).toBe('100.00');
    expect(raw.emitente?.CNPJ).toBe('11222333000181');
    expect(raw.emitente?.uf).toBe('SP');
    expect(raw.emitente?.CEP).toBe('01310100');
    expect(raw.destinatario?.CNPJ).toBe('11444777000161');
    expect(raw.destinatario?.CPF).toBeNull();
    expect(raw.destinatario?.indIEDest).toBe('1');
    expect(raw.totais_impostos?.vICMS).toBe('18.00');
  });

  it('keeps leading zeros in codes', () => {
    const { raw } = readNfeXml(fixture('nfe-proc-sp.xml'));
    const item = raw.itens?.[0];

    expect(item?.cProd).toBe('0001');
    expect(item?.impostos?.icms?.['CST']).toBe('00');
    expect(item?.impostos?.icms?.['orig']).toBe('0');
  });

  it('reads the first ICMS, IPI, PIS and COFINS variant present', () => {
    const { raw } = readNfeXml(fixture('nfe-proc-sp.xml'));
    const taxes = raw.itens?.[0]?.impostos;

    expect(taxes?.icms?.['vICMS']).toBe('18.00');
    expect(taxes?.ipi?.['CST']).toBe('53');
    expect(taxes?.pis?.['pPIS']).toBe('1.65');
    expect(taxes?.cofins?.['vCOFINS']).toBe('7.60');
  });

  it('falls back to stripping prefixes when infNFe is namespaced', () => {
    const { raw, warnings, namespacesStripped } = readNfeXml(fixture('nfe-prefixed-interstate.xml'));

    expect(namespacesStripped).toBe(true);
    expect(raw.cfop).toBe('6108');
    expect(raw.itens).toHaveLength(2);
    expect(raw.itens?.[0]?.impostos?.icms?.['CSOSN']).toBe('102');
    expect(raw.itens?.[0]?.impostos?.icms?.['CST']).toBeNull();
    expect(raw.destinatario?.CPF).toBe('52998224725');
    expect(raw.destinatario?.uf).toBe('RJ');
    expect(warnings.map((w) => w.code)).toEqual(['XML-ITEM-TAXES-OMITTED']);
    expect(warnings[0]?.location).toBe('items.1.taxes');
  });

  it('omits item taxes when the ICMS group has no CST or CSOSN', () => {
    const xml =
      '<NFe><infNFe Id="NFe1"><det nItem="1"><prod><CFOP>5102</CFOP><vProd>1.00</vProd></prod>' +
      '<imposto><ICMS><ICMS00><orig>0</orig></ICMS00></ICMS></imposto></det></infNFe></NFe>';
    const { raw, warnings } = readNfeXml(xml);

    expect(raw.itens?.[0]?.impostos).toBeUndefined();
    expect(warnings[0]?.code).toBe('XML-ITEM-TAXES-OMITTED');
  });

  it('yields nulls for missing nodes', () => {
    const { raw } = readNfeXml('<NFe><infNFe versao="4.00"></infNFe></NFe>');

    expect(raw.cfop).toBeNull();
    expect(raw.chave).toBeNull();
    expect(raw.valor_total).toBeNull();
    expect(raw.itens).toEqual([]);
    expect(raw.emitente?.xNome).toBeNull();
  });

  it('throws when infNFe cannot be found', () => {
    let caught: unknown;
    try {
      readNfeXml(fixture('not-nfe.xml'));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ExtractionError);
    if (caught instanceof ExtractionError) {
      expect(caught.stage).toBe('xml');
      expect(caught.context?.['reason']).toBe('root-not-found');
    }
  });
});

describe('xml helpers', () => {
  it('strips default and prefixed namespace declarations', () => {
    const xml = '<a:NFe xmlns:a="urn:x" xmlns="urn:y"><b/></a:NFe>';

    expect(stripNamespaceDeclarations(xml)).toBe('<a:NFe><b/></a:NFe>');
  });

  it('reads text through a dotted path and from elements with attributes', () => {
    const node = { emit: { enderEmit: { UF: 'SP' } }, det: { '#text': 'x', '@_nItem': '1' } };

    expect(getTextValue(node, 'emit.enderEmit.UF')).toBe('SP');
    expect(getTextValue(node, 'det')).toBe('x');
    expect(getTextValue(node, 'emit.missing.UF')).toBeNull();
  });

  it('normalizes one node or many to a list', () => {
    expect(asList(undefined)).toEqual([]);
    expect(asList({ a: '1' })).toEqual([{ a: '1' }]);
    expect(asList([{ a: '1' }, 'text', { b: '2' }])).toEqual([{ a: '1' }, { b: '2' }]);
  });
});
