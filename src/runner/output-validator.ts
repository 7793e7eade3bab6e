import { z } from 'zod';
import type { ValidationConfig } from '../parser/schema.ts';
import { parseJsonStrict } from '../utils/json-parser.ts';
import { validateJsonSchema } from '../utils/schema-validator.ts';

export type ValidationOutcome = { valid: true; value: unknown } | { valid: false; errors: string[] };

/**
 * Checks provider text and explains failures back to the provider on retry.
 */
export interface OutputValidator {
  validate(text: string): ValidationOutcome;
  /** Appended to the retry prompt after a failed attempt */
  retrySuffix(errors: string[]): string;
}

function parseOrFail(text: string): ValidationOutcome {
  const parsed = parseJsonStrict(text);
  if (!parsed.ok) return { valid: false, errors: [`Invalid JSON: ${parsed.error}`] };
  return { valid: true, value: parsed.value };
}

/** Strict JSON parse, then ajv against `schema` when one is given. */
export class JsonSchemaValidator implements OutputValidator {
  constructor(private readonly schema?: unknown) {}

  validate(text: string): ValidationOutcome {
    const parsed = parseOrFail(text);
    if (!parsed.valid || this.schema === undefined) return parsed;

    const check = validateJsonSchema(this.schema, parsed.value);
    return check.valid ? parsed : { valid: false, errors: check.errors };
  }

  retrySuffix(errors: string[]): string {
    const failure = `Previous response failed validation: ${errors.join('; ')}`;
    if (this.schema === undefined) {
      return `${failure}\n\nEnsure your response is valid JSON.`;
    }
    return `${failure}\n\nPlease respond with valid JSON that matches this schema:\n${JSON.stringify(this.schema, null, 2)}\n\nEnsure your response is valid JSON and includes all required fields.`;
  }
}

export class ZodOutputValidator implements OutputValidator {
  constructor(private readonly schema: z.ZodTypeAny) {}

  validate(text: string): ValidationOutcome {
    const parsed = parseOrFail(text);
    if (!parsed.valid) return parsed;

    const result = this.schema.safeParse(parsed.value);
    if (result.success) return { valid: true, value: result.data };
    return {
      valid: false,
      errors: result.error.issues.map(
        (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
      ),
    };
  }

  retrySuffix(errors: string[]): string {
    return `Previous response failed validation: ${errors.join('; ')}\n\nEnsure your response is valid JSON and includes all required fields.`;
  }
}

/**
 * Named validators a step can refer to with `validation.validator`.
 */
export class ValidatorRegistry {
  private readonly validators = new Map<string, OutputValidator>();

  static withDefaults(): ValidatorRegistry {
    return new ValidatorRegistry()
      .register('json', new JsonSchemaValidator())
      .register('json_object', new JsonSchemaValidator({ type: 'object' }))
      .register('json_array', new JsonSchemaValidator({ type: 'array' }));
  }

  /** Zod schemas are wrapped in a ZodOutputValidator */
  register(name: string, validator: OutputValidator | z.ZodTypeAny): this {
    this.validators.set(
      name,
      validator instanceof z.ZodType ? new ZodOutputValidator(validator) : validator
    );
    return this;
  }

  has(name: string): boolean {
    return this.validators.has(name);
  }

  names(): string[] {
    return [...this.validators.keys()];
  }

  /**
   * The validator a step's validation config asks for. Without `schema` or
   * `validator` the output only has to be JSON.
   */
  forConfig(config: ValidationConfig): OutputValidator {
    if (config.validator !== undefined) {
      const validator = this.validators.get(config.validator);
      if (!validator) {
        throw new Error(
          `Unknown validator "${config.validator}". Registered: ${this.names().join(', ')}`
        );
      }
      return validator;
    }
    return new JsonSchemaValidator(config.schema);
  }
}
