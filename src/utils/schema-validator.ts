import Ajv, { type AnySchema, type ErrorObject, type ValidateFunction } from 'ajv';

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  allowUnionTypes: true,
});

export type SchemaCheck = { valid: true } | { valid: false; errors: string[] };

const objectCache = new WeakMap<object, ValidateFunction>();
const booleanCache = new Map<boolean, ValidateFunction>();

function isSchema(value: unknown): value is AnySchema {
  if (typeof value === 'boolean') return true;
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getValidator(schema: unknown): ValidateFunction {
  if (!isSchema(schema)) {
    throw new Error(`JSON schema must be an object or boolean, got ${typeof schema}`);
  }
  if (typeof schema === 'boolean') {
    const cached = booleanCache.get(schema);
    if (cached) return cached;
    const validate = ajv.compile(schema);
    booleanCache.set(schema, validate);
    return validate;
  }

  const cached = objectCache.get(schema);
  if (cached) return cached;
  const validate = ajv.compile(schema);
  objectCache.set(schema, validate);
  return validate;
}

function formatInstancePath(path: string): string {
  if (!path) return '(root)';
  return path
    .replace(/\//g, '.')
    .replace(/\.(\d+)/g, '[$1]')
    .replace(/^\./, '');
}

function formatSchemaErrors(errors?: ErrorObject[] | null): string[] {
  if (!errors || errors.length === 0) return ['(root): failed schema validation'];
  return errors.map((error) => {
    const location = formatInstancePath(error.instancePath);
    return `${location}: ${error.message || 'failed schema validation'}`;
  });
}

/**
 * Validate `data` against a JSON schema. Compiled validators are cached per
 * schema object, so the same workflow step never recompiles.
 */
export function validateJsonSchema(schema: unknown, data: unknown): SchemaCheck {
  const validate = getValidator(schema);
  if (validate(data)) return { valid: true };
  return { valid: false, errors: formatSchemaErrors(validate.errors) };
}

/** Load-time check that a schema compiles at all. */
export function validateJsonSchemaDefinition(
  schema: unknown
): { valid: true } | { valid: false; error: string } {
  try {
    getValidator(schema);
    return { valid: true };
  } catch (error) {
    return { valid: false, error: error instanceof Error ? error.message : String(error) };
  }
}
