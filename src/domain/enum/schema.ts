import { DocumentFormatError } from '../../infra/errors.js';
import { isRecord, validate, type Schema } from '../../infra/validator.js';
import type { EnumDefinition, EnumVariant } from './types.js';

export const variantSchema: Schema = {
  name: { type: 'string', min: 1 },
  value: { type: 'number', required: false, integer: true },
  description: { type: 'string', required: false },
};

export const enumDefinitionSchema: Schema = {
  name: { type: 'string', min: 1 },
  description: { type: 'string', required: false },
  variants: { type: 'array', item: { type: 'object', fields: variantSchema } },
};

function toVariant(raw: unknown): EnumVariant {
  const variant: EnumVariant = { name: '' };
  if (!isRecord(raw)) return variant;
  if (typeof raw.name === 'string') variant.name = raw.name;
  if (typeof raw.value === 'number') variant.value = raw.value;
  if (typeof raw.description === 'string') variant.description = raw.description;
  return variant;
}

/**
 * Checks the structure of a parsed enum document and copies out the known
 * fields. Unknown fields are dropped.
 */
export function parseEnumDefinition(raw: unknown, filePath: string): EnumDefinition {
  const errors = validate(raw, enumDefinitionSchema);
  if (errors.length > 0 || !isRecord(raw)) {
    throw new DocumentFormatError(filePath, errors);
  }
  const definition: EnumDefinition = {
    name: typeof raw.name === 'string' ? raw.name : '',
    variants: Array.isArray(raw.variants) ? raw.variants.map(toVariant) : [],
  };
  if (typeof raw.description === 'string') definition.description = raw.description;
  return definition;
}
