/**
 * Instructions and JSON-schema hint for DANFE extraction by a language model.
 * Field names follow the NF-e layout tags so the answer feeds `sanitizeRawNfe`.
 */

import { UF_CODES, type JSONSchema } from '@nfe-ledger/contracts';
import { MAX_LLM_INPUT_CHARS, type LlmRequest } from './types.js';

const SORTED_UFS = [...UF_CODES].sort();

const nullableText = (description: string): JSONSchema => ({ type: ['string', 'null'], description });
const amount = (description: string): JSONSchema => ({ type: ['number', 'string', 'null'], description });

function partySchema(role: 'emitente' | 'destinatário'): Record<string, JSONSchema> {
  return {
    uf: { type: 'string', enum: SORTED_UFS, description: `UF do ${role}` },
    xMun: nullableText('Município'),
    xBairro: nullableText('Bairro'),
    xLgr: nullableText('Logradouro (rua/avenida)'),
    nro: nullableText('Número'),
    CEP: { type: ['string', 'null'], pattern: '^\\d{8}$', description: 'CEP (8 dígitos)' },
    fone: nullableText('Telefone'),
  };
}

/**
 * Shape of the answer expected from the model
 */
export const NFE_EXTRACTION_SCHEMA: JSONSchema = {
  type: 'object',
  properties: {
    cfop: { type: 'string', pattern: '^\\d{4}$' },
    emitente: {
      type: 'object',
      properties: {
        xNome: { type: 'string', description: 'Razão social do emitente' },
        CNPJ: { type: 'string', pattern: '^\\d{14}$', description: 'CNPJ (14 dígitos)' },
        IE: nullableText('Inscrição Estadual'),
        ...partySchema('emitente'),
      },
      required: ['xNome', 'CNPJ', 'uf'],
      additionalProperties: false,
    },
    destinatario: {
      type: 'object',
      properties: {
        xNome: { type: 'string', description: 'Razão social/nome do destinatário' },
        CNPJ: { type: ['string', 'null'], pattern: '^\\d{14}$', description: 'CNPJ (14 dígitos) - pessoa jurídica' },
        CPF: { type: ['string', 'null'], pattern: '^\\d{11}$', description: 'CPF (11 dígitos) - pessoa física' },
        IE: nullableText(
          'Inscrição Estadual do DESTINATÁRIO (localizada na seção DESTINATÁRIO/REMETENTE, geralmente ao lado do campo UF)',
        ),
        indIEDest: nullableText('Indicador IE (1=Contribuinte, 2=Isento, 9=Não Contribuinte)'),
        ...partySchema('destinatário'),
      },
      required: ['xNome', 'uf'],
      additionalProperties: false,
    },
    valor_total: { type: 'number' },
    itens: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          xProd: { type: 'string', description: 'Descrição do produto' },
          NCM: { type: ['string', 'null'], pattern: '^\\d{8}$', description: 'Código NCM (8 dígitos)' },
          CEST: {
            type: ['string', 'null'],
            pattern: '^\\d{7}$',
            description: 'Código CEST de Substituição Tributária (7 dígitos, se presente)',
          },
          vProd: { type: ['number', 'string'], description: 'Valor total do produto' },
          qCom: amount('Quantidade comercial'),
          vUnCom: amount('Valor unitário comercial'),
          uCom: nullableText('Unidade comercial (ex: UN, KG, MT)'),
          cProd: nullableText('Código do produto'),
          impostos: {
            type: ['object', 'null'],
            description: 'Impostos do item (ICMS, IPI, PIS, COFINS) - extrair se disponível no PDF',
            properties: {
              icms: {
                type: 'object',
                properties: {
                  CST: nullableText('CST ICMS (2 dígitos) - para Regime Normal'),
                  CSOSN: nullableText('CSOSN (3 dígitos) - para Simples Nacional. Usar CST OU CSOSN, não ambos'),
                  orig: nullableText('Origem (0-8)'),
                  vBC: amount('Base de Cálculo ICMS'),
                  pICMS: amount('Alíquota ICMS (%)'),
                  vICMS: amount('Valor ICMS'),
                },
              },
              ipi: {
                type: ['object', 'null'],
                properties: {
                  CST: nullableText('CST IPI (2 dígitos)'),
                  vBC: amount('Base de Cálculo IPI'),
                  pIPI: amount('Alíquota IPI (%)'),
                  vIPI: amount('Valor IPI'),
                },
              },
              pis: {
                type: ['object', 'null'],
                properties: {
                  CST: nullableText('CST PIS (2 dígitos)'),
                  vBC: amount('Base de Cálculo PIS'),
                  pPIS: amount('Alíquota PIS (%)'),
                  vPIS: amount('Valor PIS'),
                },
              },
              cofins: {
                type: ['object', 'null'],
                properties: {
                  CST: nullableText('CST COFINS (2 dígitos)'),
                  vBC: amount('Base de Cálculo COFINS'),
                  pCOFINS: amount('Alíquota COFINS (%)'),
                  vCOFINS: amount('Valor COFINS'),
                },
              },
            },
          },
        },
        required: ['xProd', 'vProd'],
        additionalProperties: false,
      },
    },
    totais_impostos: {
      type: ['object', 'null'],
      description: 'Totais consolidados de impostos (geralmente no rodapé da nota)',
      properties: {
        vBC: amount('Total Base de Cálculo ICMS'),
        vICMS: amount('Total ICMS'),
        vIPI: amount('Total IPI'),
        vPIS: amount('Total PIS'),
        vCOFINS: amount('Total COFINS'),
      },
    },
  },
  required: ['cfop', 'emitente', 'destinatario', 'valor_total', 'itens'],
  additionalProperties: false,
};

function partyLines(ufs: string): string[] {
  return [
    `  - 'uf': estado - uma destas UFs: ${ufs} (obrigatório)`,
    "  - 'xMun': município (opcional)",
    "  - 'xBairro': bairro (opcional)",
    "  - 'xLgr': logradouro/rua (opcional)",
    "  - 'nro': número do endereço (opcional)",
    "  - 'CEP': 8 dígitos (opcional)",
    "  - 'fone': telefone (opcional)",
  ];
}

/**
 * System instruction: field-by-field extraction rules, including the
 * CPF xor CNPJ and CST xor CSOSN constraints.
 */
export function buildSystemPrompt(): string {
  const ufs = SORTED_UFS.join(', ');
  return [
    'Você é um extrator de dados de DANFE (NF-e PDF) extremamente rigoroso. ' +
      'Extraia APENAS os campos solicitados e retorne um JSON VÁLIDO, sem comentários, sem markdown. ' +
      'ATENÇÃO: A seção DESTINATÁRIO/REMETENTE contém campos específicos do destinatário. ' +
      'NÃO confunda a Inscrição Estadual (IE) do EMITENTE com a IE do DESTINATÁRIO. São campos separados!',
    'Regras:',
    "- 'cfop' deve ser string com 4 dígitos.",
    "- 'emitente' é um objeto com dados do emissor:",
    "  - 'xNome': razão social (obrigatório)",
    "  - 'CNPJ': 14 dígitos (obrigatório)",
    "  - 'IE': inscrição estadual (opcional, use null se não encontrar)",
    ...partyLines(ufs),
    "- 'destinatario' é um objeto com dados do receptor:",
    "  - 'xNome': razão social ou nome (obrigatório)",
    "  - 'CNPJ': 14 dígitos OU null (pessoa jurídica)",
    "  - 'CPF': 11 dígitos OU null (pessoa física)",
    '  - IMPORTANTE: Deve ter CPF OU CNPJ, nunca ambos! Se for pessoa física, CNPJ=null e CPF com 11 dígitos. ' +
      'Se jurídica, CPF=null e CNPJ com 14 dígitos.',
    "  - 'IE': inscrição estadual do DESTINATÁRIO (opcional, geralmente na seção 'DESTINATÁRIO/REMETENTE' próxima do campo UF)",
    "  - 'indIEDest': indicador IE 1, 2 ou 9 (opcional)",
    ...partyLines(ufs),
    "- 'valor_total' número com ponto decimal.",
    "- 'itens' é uma lista com ao menos 1 item. Cada item deve conter:",
    "  - 'xProd': descrição do produto (obrigatório)",
    "  - 'NCM': código NCM com 8 dígitos (opcional, use null se não encontrar)",
    "  - 'CEST': código CEST com 7 dígitos (opcional)",
    "  - 'vProd': valor total do produto (obrigatório)",
    "  - 'qCom': quantidade comercial (opcional, coluna 'Qtde' ou 'Quantidade')",
    "  - 'vUnCom': valor unitário comercial (opcional, coluna 'Valor Unit.' ou 'Vlr. Unit.')",
    "  - 'uCom': unidade comercial (opcional, ex: UN, KG, MT, PC)",
    "  - 'cProd': código do produto (opcional, coluna 'Código')",
    "  - 'impostos': objeto com impostos do item (opcional, extrair se disponível no PDF):",
    "    - 'icms': CST OU CSOSN (nunca ambos), orig, vBC, pICMS, vICMS",
    "    - 'ipi': CST, vBC, pIPI, vIPI (opcional)",
    "    - 'pis': CST, vBC, pPIS, vPIS (opcional)",
    "    - 'cofins': CST, vBC, pCOFINS, vCOFINS (opcional)",
    "    ATENÇÃO: Se o PDF não mostrar impostos por item, use 'impostos': null.",
    "- 'totais_impostos': objeto com vBC, vICMS, vIPI, vPIS, vCOFINS (opcional, rodapé da nota); null se não visível.",
    '- Se um valor opcional não existir no documento, use null.',
    '- NUNCA inclua campos extras.',
    '- Saída: APENAS o JSON no formato solicitado.',
  ].join('\n');
}

/**
 * Build the full request for a document text, capped at {@link MAX_LLM_INPUT_CHARS}.
 */
export function buildExtractionRequest(text: string, maxChars: number = MAX_LLM_INPUT_CHARS): LlmRequest {
  return {
    system: buildSystemPrompt(),
    user: [
      'Documento DANFE (texto extraído a seguir).',
      'Por favor, gere o JSON final no formato especificado:',
      '',
      `Esquema (apenas referência de formato): ${JSON.stringify(NFE_EXTRACTION_SCHEMA)}`,
      '',
      'Texto:',
      text.slice(0, maxChars),
      '',
      'Responda somente com o JSON.',
    ].join('\n'),
  };
}
