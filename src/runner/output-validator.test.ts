import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ValidationConfigSchema } from '../parser/schema.ts';
import { JsonSchemaValidator, ValidatorRegistry, ZodOutputValidator } from './output-validator.ts';

const personSchema = {
  type: 'object',
  properties: { name: { type: 'string' }, age: { type: 'number' } },
  required: ['name'],
};

describe('JsonSchemaValidator', () => {
  it('should accept JSON matching the schema', () => {
    const outcome = new JsonSchemaValidator(personSchema).validate('  {"name": "Ada"}  ');
    expect(outcome).toEqual({ valid: true, value: { name: 'Ada' } });
  });

  it('should report schema errors with their location', () => {
    const outcome = new JsonSchemaValidator(personSchema).validate('{"age": "old"}');
    expect(outcome.valid).toBe(false);
    if (outcome.valid) return;
    expect(outcome.errors).toContain("(root): must have required property 'name'");
    expect(outcome.errors).toContain('age: must be number');
  });

  it('should reject text that is not JSON', () => {
    const outcome = new JsonSchemaValidator().validate('Sure! Here it is: {"a": 1}');
    expect(outcome.valid).toBe(false);
    if (outcome.valid) return;
    expect(outcome.errors[0]).toMatch(/^Invalid JSON: /);
  });

  it('should include the schema in the retry suffix', () => {
    const suffix = new JsonSchemaValidator({ type: 'array' }).retrySuffix(['(root): must be array']);
    expect(suffix).toBe(
      'Previous response failed validation: (root): must be array\n\n' +
        'Please respond with valid JSON that matches this schema:\n{\n  "type": "array"\n}\n\n' +
        'Ensure your response is valid JSON and includes all required fields.'
    );
  });
});

describe('ZodOutputValidator', () => {
  const validator = new ZodOutputValidator(z.object({ score: z.number().min(0).max(10) }));

  it('should return the parsed value', () => {
    expect(validator.validate('{"score": 7, "extra": true}')).toEqual({
      valid: true,
      value: { score: 7 },
    });
  });

  it('should report zod issues by path', () => {
    const outcome = validator.validate('{"score": 11}');
    expect(outcome).toEqual({
      valid: false,
      errors: ['score: Number must be less than or equal to 10'],
    });
  });
});

describe('ValidatorRegistry', () => {
  it('should register the built-in validators', () => {
    const registry = ValidatorRegistry.withDefaults();
    expect(registry.names()).toEqual(['json', 'json_object', 'json_array']);

    const arrayValidator = registry.forConfig(
      ValidationConfigSchema.parse({ validator: 'json_array' })
    );
    expect(arrayValidator.validate('[1, 2]').valid).toBe(true);
    expect(arrayValidator.validate('{"a": 1}').valid).toBe(false);
  });

  it('should wrap zod schemas', () => {
    const registry = new ValidatorRegistry().register('tags', z.array(z.string()));
    const validator = registry.forConfig(ValidationConfigSchema.parse({ validator: 'tags' }));
    expect(validator.validate('["a", "b"]')).toEqual({ valid: true, value: ['a', 'b'] });
  });

  it('should build a schema validator from an inline schema', () => {
    const validator = ValidatorRegistry.withDefaults().forConfig(
      ValidationConfigSchema.parse({ schema: personSchema })
    );
    expect(validator.validate('{"name": "Grace"}').valid).toBe(true);
    expect(validator.validate('{}').valid).toBe(false);
  });

  it('should only require JSON when neither schema nor validator is set', () => {
    const validator = ValidatorRegistry.withDefaults().forConfig(ValidationConfigSchema.parse({}));
    expect(validator.validate('42')).toEqual({ valid: true, value: 42 });
  });

  it('should reject unknown validator names', () => {
    expect(() =>
      ValidatorRegistry.withDefaults().forConfig(ValidationConfigSchema.parse({ validator: 'nope' }))
    ).toThrow('Unknown validator "nope". Registered: json, json_object, json_array');
  });
});
