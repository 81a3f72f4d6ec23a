export type FieldRule =
  | { type: 'string'; required?: boolean; min?: number }
  | { type: 'number'; required?: boolean; integer?: boolean; min?: number; max?: number }
  | { type: 'array'; required?: boolean; item?: FieldRule }
  | { type: 'object'; required?: boolean; fields: Schema }
  | { type: 'custom'; check: (v: unknown) => string | null; required?: boolean };

export type Schema = Record<string, FieldRule>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkField(path: string, value: unknown, rule: FieldRule, errors: string[]): void {
  const isPresent = value !== undefined && value !== null;

  if (!isPresent) {
    if (rule.required !== false) errors.push(`${path} is required`);
    return;
  }

  switch (rule.type) {
    case 'string':
      if (typeof value !== 'string') {
        errors.push(`${path} must be a string`);
        break;
      }
      if (rule.min !== undefined && value.length < rule.min)
        errors.push(`${path} must be at least ${rule.min} characters`);
      break;

    case 'number':
      if (typeof value !== 'number' || Number.isNaN(value)) {
        errors.push(`${path} must be a number`);
        break;
      }
      if (rule.integer && !Number.isInteger(value))
        errors.push(`${path} must be an integer`);
      if (rule.min !== undefined && value < rule.min)
        errors.push(`${path} must be >= ${rule.min}`);
      if (rule.max !== undefined && value > rule.max)
        errors.push(`${path} must be <= ${rule.max}`);
      break;

    case 'array':
      if (!Array.isArray(value)) {
        errors.push(`${path} must be an array`);
        break;
      }
      if (rule.item) {
        for (let i = 0; i < value.length; i++) {
          checkField(`${path}[${i}]`, value[i], rule.item, errors);
        }
      }
      break;

    case 'object':
      if (!isRecord(value)) {
        errors.push(`${path} must be an object`);
        break;
      }
      for (const [field, fieldRule] of Object.entries(rule.fields)) {
        checkField(`${path}.${field}`, value[field], fieldRule, errors);
      }
      break;

    case 'custom': {
      const message = rule.check(value);
      if (message) errors.push(`${path}: ${message}`);
      break;
    }
  }
}

/** Returns one message per violated rule; empty when the data conforms. */
export function validate(data: unknown, schema: Schema): string[] {
  if (!isRecord(data)) return ['document must be a JSON object'];
  const errors: string[] = [];
  for (const [field, rule] of Object.entries(schema)) {
    checkField(field, data[field], rule, errors);
  }
  return errors;
}
