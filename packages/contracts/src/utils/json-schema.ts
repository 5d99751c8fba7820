/**
 * Subset of JSON Schema Draft 2020-12 used to describe the raw extraction
 * shape handed to language models.
 */
export interface JSONSchema {
  type?: JSONSchemaType | JSONSchemaType[];
  enum?: unknown[];

  // String
  pattern?: string;
  minLength?: number;
  maxLength?: number;

  // Number
  minimum?: number;
  exclusiveMinimum?: number;

  // Array
  items?: JSONSchema;
  minItems?: number;

  // Object
  properties?: Record<string, JSONSchema>;
  required?: string[];
  additionalProperties?: boolean | JSONSchema;

  // Metadata
  title?: string;
  description?: string;
  examples?: unknown[];
}

export type JSONSchemaType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'array'
  | 'object'
  | 'null';
