export {
  CNPJ_LENGTH,
  CPF_LENGTH,
  ACCESS_KEY_LENGTH,
  UF_IBGE_CODES,
} from './constants.js';

export {
  normalizeTaxId,
  classifyTaxId,
  validateTaxId,
  isValidCnpj,
  isValidCpf,
  isUf,
  accessKeyCheckDigit,
  isValidAccessKey,
  ufFromAccessKey,
  type TaxIdKind,
  type TaxIdErrorCode,
  type TaxIdValidationResult,
} from './validate.js';
