import { z } from 'zod';
import { DEFAULTS, LIMITS } from '../utils/constants.ts';
import { validateJsonSchemaDefinition } from '../utils/schema-validator.ts';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const STEP_ID = /^[A-Za-z_][A-Za-z0-9_-]*$/;
const WORKFLOW_NAME = /^[A-Za-z][A-Za-z0-9 _-]*$/;

function isValidRegex(pattern: string, flags = ''): boolean {
  try {
    new RegExp(pattern, flags);
    return true;
  } catch {
    return false;
  }
}

// ===== Input/Output Schema =====

const InputTypeSchema = z.enum(['string', 'integer', 'float', 'boolean', 'array', 'object']);

const InputParameterSchema = z
  .object({
    name: z.string().regex(IDENTIFIER, 'Input parameter names must be identifiers'),
    type: InputTypeSchema.default('string'),
    required: z.boolean().default(true),
    default: z.unknown().optional(),
    description: z.string().optional(),
  })
  .superRefine((value, ctx) => {
    const { type, default: defaultValue } = value;
    if (defaultValue === undefined || defaultValue === null) return;

    const matches =
      (type === 'string' && typeof defaultValue === 'string') ||
      (type === 'integer' && Number.isInteger(defaultValue)) ||
      (type === 'float' && typeof defaultValue === 'number') ||
      (type === 'boolean' && typeof defaultValue === 'boolean') ||
      (type === 'array' && Array.isArray(defaultValue)) ||
      (type === 'object' && typeof defaultValue === 'object' && !Array.isArray(defaultValue));

    if (!matches) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `default must be of type "${type}"`,
        path: ['default'],
      });
    }
  });

const WorkflowOutputSchema = z.object({
  format: z.enum(['text', 'json', 'yaml']).default('text'),
  template: z.string().optional(),
});

// ===== Validation Schema =====

export const ValidationConfigSchema = z
  .object({
    schema: z.union([z.record(z.unknown()), z.boolean()]).optional(),
    validator: z.string().optional(),
    max_retries: z
      .number()
      .int()
      .min(0)
      .max(LIMITS.MAX_VALIDATION_RETRIES)
      .default(DEFAULTS.VALIDATION_MAX_RETRIES),
    retry_prompt: z.string().optional(),
    allow_partial_success: z.boolean().default(false),
    extract_json_pattern: z.string().optional(),
    force_json_output: z.boolean().default(false),
    json_wrapper_instruction: z.string().default(DEFAULTS.JSON_WRAPPER_INSTRUCTION),
  })
  .superRefine((value, ctx) => {
    if (value.schema !== undefined && value.validator !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Use either "schema" or "validator", not both',
      });
    }
    if (value.schema !== undefined) {
      const check = validateJsonSchemaDefinition(value.schema);
      if (!check.valid) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Invalid JSON schema: ${check.error}`,
          path: ['schema'],
        });
      }
    }
    if (value.extract_json_pattern !== undefined && !isValidRegex(value.extract_json_pattern, 's')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid extract_json_pattern: ${value.extract_json_pattern}`,
        path: ['extract_json_pattern'],
      });
    }
  });

// ===== Base Step Schema =====

const OnErrorSchema = z.enum(['stop', 'continue', 'skip_remaining']);

const BaseStepSchema = z.object({
  id: z
    .string()
    .regex(STEP_ID, 'Step ids must start with a letter or "_" and contain only letters, digits, "_" or "-"'),
  description: z.string().optional(),
  on_error: OnErrorSchema.default('stop'),
});

// ===== ai_call =====

const AiCallStepSchema = BaseStepSchema.extend({
  type: z.literal('ai_call'),
  prompt: z.string(),
  provider: z.string().optional(),
  model: z.string().optional(),
  temperature: z.number().min(0).max(2).default(DEFAULTS.TEMPERATURE),
  max_tokens: z.number().int().positive().optional(),
  max_auto_retry_attempts: z.number().int().min(0).optional(),
  /** Per-call timeout in milliseconds */
  timeout: z.number().int().positive().optional(),
  ai_params: z.record(z.unknown()).default({}),
  validation: ValidationConfigSchema.optional(),
});

// ===== text_process =====

const TextProcessBase = BaseStepSchema.extend({
  type: z.literal('text_process'),
  input: z.string(),
});

const RegexFlagSchema = z.enum(['IGNORECASE', 'MULTILINE', 'DOTALL', 'UNICODE']);

const ReplacementSchema = z.union([
  z.object({ from: z.string(), to: z.string().default('') }),
  z.object({
    pattern: z.string(),
    to: z.string().default(''),
    flags: z.array(RegexFlagSchema).default([]),
  }),
]);

const SplitStepSchema = TextProcessBase.extend({
  method: z.literal('split'),
  separator: z.string().min(1).default('\n'),
  max_splits: z.number().int().min(0).optional(),
});

const ExtractBetweenMarkerStepSchema = TextProcessBase.extend({
  method: z.literal('extract_between_marker'),
  begin: z.string().min(1),
  end: z.string().min(1),
  extract_all: z.boolean().default(false),
});

const RegexExtractStepSchema = TextProcessBase.extend({
  method: z.literal('regex_extract'),
  pattern: z.string(),
  flags: z.array(RegexFlagSchema).default([]),
  group: z.union([z.string(), z.number().int().min(0)]).optional(),
  output_format: z.enum(['string', 'array']).default('string'),
});

const SelectItemStepSchema = TextProcessBase.extend({
  method: z.literal('select_item'),
  index: z.number().int().optional(),
  slice: z.string().optional(),
  condition: z.string().optional(),
});

const ParseAsJsonStepSchema = TextProcessBase.extend({
  method: z.literal('parse_as_json'),
  schema: z.union([z.record(z.unknown()), z.boolean()]).optional(),
  schema_file: z.string().optional(),
  strict_validation: z.boolean().default(false),
  format_output: z.boolean().default(false),
});

const ReplaceStepSchema = TextProcessBase.extend({
  method: z.literal('replace'),
  replacements: z.array(ReplacementSchema),
});

const JsonParseStepSchema = TextProcessBase.extend({ method: z.literal('json_parse') });

const YamlParseStepSchema = TextProcessBase.extend({ method: z.literal('yaml_parse') });

const FormatStepSchema = TextProcessBase.extend({
  method: z.literal('format'),
  template: z.string(),
});

const FixedSplitStepSchema = TextProcessBase.extend({
  method: z.literal('fixed_split'),
  split_by: z.enum(['characters', 'tokens']).default('characters'),
  size: z.number().int().positive(),
  overlap: z.number().int().min(0).default(0),
  preserve_boundaries: z.boolean().default(true),
});

const ArrayFilterStepSchema = TextProcessBase.extend({
  method: z.literal('array_filter'),
  condition: z.string(),
});

const ArrayTransformStepSchema = TextProcessBase.extend({
  method: z.literal('array_transform'),
  transform: z.string(),
});

const ArrayAggregateStepSchema = TextProcessBase.extend({
  method: z.literal('array_aggregate'),
  operation: z.enum(['sum', 'avg', 'min', 'max', 'count', 'join']),
  separator: z.string().default(DEFAULTS.AGGREGATE_SEPARATOR),
});

const ArraySortStepSchema = TextProcessBase.extend({
  method: z.literal('array_sort'),
  sort_key: z.string().optional(),
  sort_reverse: z.boolean().default(false),
});

const TextProcessStepSchema = z
  .discriminatedUnion('method', [
    SplitStepSchema,
    ExtractBetweenMarkerStepSchema,
    RegexExtractStepSchema,
    SelectItemStepSchema,
    ParseAsJsonStepSchema,
    ReplaceStepSchema,
    JsonParseStepSchema,
    YamlParseStepSchema,
    FormatStepSchema,
    FixedSplitStepSchema,
    ArrayFilterStepSchema,
    ArrayTransformStepSchema,
    ArrayAggregateStepSchema,
    ArraySortStepSchema,
  ])
  .superRefine((step, ctx) => {
    switch (step.method) {
      case 'select_item': {
        const given = [step.index, step.slice, step.condition].filter((v) => v !== undefined);
        if (given.length !== 1) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'select_item requires exactly one of "index", "slice" or "condition"',
          });
        }
        if (step.slice !== undefined && !/^-?\d*:-?\d*(:-?\d*)?$/.test(step.slice.trim())) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Invalid slice "${step.slice}", expected start:end[:step]`,
            path: ['slice'],
          });
        }
        break;
      }
      case 'regex_extract':
        if (!isValidRegex(step.pattern)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Invalid regex pattern: ${step.pattern}`,
            path: ['pattern'],
          });
        }
        break;
      case 'replace':
        step.replacements.forEach((rule, index) => {
          if ('pattern' in rule && !isValidRegex(rule.pattern)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `Invalid regex pattern: ${rule.pattern}`,
              path: ['replacements', index, 'pattern'],
            });
          }
        });
        break;
      case 'parse_as_json':
        if (step.schema !== undefined && step.schema_file !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'Use either "schema" or "schema_file", not both',
          });
        }
        break;
      case 'fixed_split':
        if (step.overlap >= step.size) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'overlap must be smaller than size',
            path: ['overlap'],
          });
        }
        break;
      default:
        break;
    }
  });

// ===== collection =====

const ConcurrencySchema = z.object({
  max_parallel: z.number().int().positive().optional(),
  batch_size: z.number().int().positive().optional(),
  /** Milliseconds to wait before starting each batch after the first */
  delay_between_batches: z.number().int().min(0).default(0),
});

const CollectionErrorHandlingSchema = z
  .object({
    on_item_failure: z.enum(['skip', 'stop', 'retry']).default('skip'),
    on_condition_error: z.enum(['skip_item', 'stop', 'default_false']).default('skip_item'),
    max_retries_per_item: z.number().int().min(0).default(DEFAULTS.MAX_RETRIES_PER_ITEM),
    preserve_errors: z.boolean().default(true),
  })
  .default({});

const collectionOptions = {
  concurrency: ConcurrencySchema.optional(),
  error_handling: CollectionErrorHandlingSchema,
};

const mapFields = { operation: z.literal('map') };

const filterFields = {
  operation: z.literal('filter'),
  condition: z.string().optional(),
};

const reduceFields = {
  operation: z.literal('reduce'),
  initial_value: z.unknown().default(null),
  accumulator_var: z.string().regex(IDENTIFIER).default('acc'),
  item_var: z.string().regex(IDENTIFIER).default('item'),
};

const CollectionBase = BaseStepSchema.extend({
  type: z.literal('collection'),
  input: z.string(),
});

const MapCollectionBase = CollectionBase.extend({ ...collectionOptions, ...mapFields });
const FilterCollectionBase = CollectionBase.extend({ ...collectionOptions, ...filterFields });
const ReduceCollectionBase = CollectionBase.extend({ ...collectionOptions, ...reduceFields });
// Concurrency and error handling are set per stage
const PipelineCollectionBase = CollectionBase.extend({ operation: z.literal('pipeline') });

/** One link of a `pipeline`: an operation over the previous link's output */
const StageBase = z.object({
  id: z.string().regex(STEP_ID).optional(),
  ...collectionOptions,
});

const MapStageBase = StageBase.extend(mapFields);
const FilterStageBase = StageBase.extend(filterFields);
const ReduceStageBase = StageBase.extend(reduceFields);

// ===== conditional =====

const ConditionalBranchBase = z.object({
  name: z.string().optional(),
  condition: z.string().optional(),
  default: z.boolean().default(false),
});

const ConditionalBase = BaseStepSchema.extend({
  type: z.literal('conditional'),
  condition: z.string().optional(),
  on_condition_error: OnErrorSchema.default('stop'),
});

// ===== Types =====

export type WorkflowInputParameter = z.infer<typeof InputParameterSchema>;
export type ValidationConfig = z.infer<typeof ValidationConfigSchema>;

export type AiCallStep = z.infer<typeof AiCallStepSchema>;
export type TextProcessStep = z.infer<typeof TextProcessStepSchema>;
export type RegexFlag = z.infer<typeof RegexFlagSchema>;

export type MapStage = z.infer<typeof MapStageBase> & { steps: Step[] };
export type FilterStage = z.infer<typeof FilterStageBase> & { steps?: Step[] };
export type ReduceStage = z.infer<typeof ReduceStageBase> & { steps: Step[] };
export type CollectionStage = MapStage | FilterStage | ReduceStage;

export type MapCollectionStep = z.infer<typeof MapCollectionBase> & { steps: Step[] };
export type FilterCollectionStep = z.infer<typeof FilterCollectionBase> & { steps?: Step[] };
export type ReduceCollectionStep = z.infer<typeof ReduceCollectionBase> & { steps: Step[] };
export type PipelineCollectionStep = z.infer<typeof PipelineCollectionBase> & {
  pipeline: CollectionStage[];
};
export type CollectionStep =
  | MapCollectionStep
  | FilterCollectionStep
  | ReduceCollectionStep
  | PipelineCollectionStep;

export type ConditionalBranch = z.infer<typeof ConditionalBranchBase> & { steps: Step[] };
export type ConditionalStep = z.infer<typeof ConditionalBase> & {
  if_true?: Step[];
  if_false?: Step[];
  conditions?: ConditionalBranch[];
};

export type Step = AiCallStep | TextProcessStep | CollectionStep | ConditionalStep;
export type StepType = Step['type'];

// ===== Recursive schemas =====

const nestedSteps = () => z.lazy(() => StepListSchema);

function checkOperation(step: CollectionStage, ctx: z.RefinementCtx, path: (string | number)[] = []) {
  if (step.operation === 'filter' && step.condition === undefined && step.steps === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'filter requires "condition" and/or "steps"',
      path,
    });
  }
  if (step.operation === 'reduce' && step.accumulator_var === step.item_var) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'accumulator_var and item_var must differ',
      path: [...path, 'item_var'],
    });
  }
}

const StageSchema = z.discriminatedUnion('operation', [
  MapStageBase.extend({ steps: nestedSteps() }),
  FilterStageBase.extend({ steps: nestedSteps().optional() }),
  ReduceStageBase.extend({ steps: nestedSteps() }),
]);

const CollectionStepSchema = z
  .discriminatedUnion('operation', [
    MapCollectionBase.extend({ steps: nestedSteps() }),
    FilterCollectionBase.extend({ steps: nestedSteps().optional() }),
    ReduceCollectionBase.extend({ steps: nestedSteps() }),
    PipelineCollectionBase.extend({ pipeline: z.array(StageSchema).min(1) }),
  ])
  .superRefine((step, ctx) => {
    if (step.operation !== 'pipeline') {
      checkOperation(step, ctx);
      return;
    }
    step.pipeline.forEach((stage, index) => checkOperation(stage, ctx, ['pipeline', index]));
  });

/** Display id of a pipeline stage: its `id`, else `stage_<n>` (1-based). */
export function stageName(stage: CollectionStage, index: number): string {
  return stage.id ?? `stage_${index + 1}`;
}

/** The element pipelines of a collection step, one per stage for `pipeline` */
function collectionStages(step: CollectionStep): CollectionStage[] {
  return step.operation === 'pipeline' ? step.pipeline : [step];
}

const ConditionalBranchSchema = ConditionalBranchBase.extend({ steps: nestedSteps() });

/** Display name of a list-form branch: its `name`, else `branch_<n>` (1-based). */
export function branchName(branch: { name?: string }, index: number): string {
  return branch.name ?? `branch_${index + 1}`;
}

const ConditionalStepSchema = ConditionalBase.extend({
  if_true: nestedSteps().optional(),
  if_false: nestedSteps().optional(),
  conditions: z.array(ConditionalBranchSchema).optional(),
}).superRefine((step, ctx) => {
  const singleForm =
    step.condition !== undefined || step.if_true !== undefined || step.if_false !== undefined;

  if (step.conditions !== undefined) {
    if (singleForm) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Use either "condition"/"if_true"/"if_false" or "conditions", not both',
      });
      return;
    }
    if (step.conditions.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: '"conditions" must contain at least one branch',
        path: ['conditions'],
      });
      return;
    }

    const names = new Set<string>();
    let defaults = 0;
    step.conditions.forEach((branch, index) => {
      const name = branchName(branch, index);
      if (names.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate branch name "${name}"`,
          path: ['conditions', index, 'name'],
        });
      }
      names.add(name);

      if (branch.default) {
        defaults++;
      } else if (!branch.condition?.trim()) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'Non-default branches require a condition',
          path: ['conditions', index, 'condition'],
        });
      }
    });
    if (defaults > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'At most one branch may be marked default',
        path: ['conditions'],
      });
    }
    return;
  }

  if (step.condition === undefined || !step.condition.trim()) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Conditional step requires either "condition" or "conditions"',
    });
  }
  if (step.if_true === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: '"if_true" is required with "condition"',
      path: ['if_true'],
    });
  }
});

const STEP_TYPES = ['ai_call', 'text_process', 'collection', 'conditional'] as const;

const StepTypeSchema = z.object({ type: z.enum(STEP_TYPES) }).passthrough();

function variantSchema(type: StepType): z.ZodType<Step, z.ZodTypeDef, unknown> {
  switch (type) {
    case 'ai_call':
      return AiCallStepSchema;
    case 'text_process':
      return TextProcessStepSchema;
    case 'collection':
      return CollectionStepSchema;
    case 'conditional':
      return ConditionalStepSchema;
  }
}

/**
 * Steps are dispatched on `type` first so that errors point at the fields of
 * the matching variant instead of a generic union failure.
 */
export const StepSchema: z.ZodType<Step, z.ZodTypeDef, unknown> = z.lazy(() =>
  StepTypeSchema.transform((raw, ctx) => {
    const result = variantSchema(raw.type).safeParse(raw);
    if (result.success) return result.data;
    for (const issue of result.error.issues) {
      ctx.addIssue(issue);
    }
    return z.NEVER;
  })
);

const StepListSchema: z.ZodType<Step[], z.ZodTypeDef, unknown> = z
  .array(StepSchema)
  .min(1, 'A step list must contain at least one step');

// ===== Traversal =====

/** The nested sequences a step owns, in declaration order. */
export function nestedSequences(step: Step): Step[][] {
  if (step.type === 'collection') {
    return collectionStages(step).flatMap((stage) => (stage.steps ? [stage.steps] : []));
  }
  if (step.type === 'conditional') {
    if (step.conditions) return step.conditions.map((branch) => branch.steps);
    return [step.if_true, step.if_false].filter((seq): seq is Step[] => seq !== undefined);
  }
  return [];
}

/** Depth-first walk over every step, nested ones included. */
export function walkSteps(
  steps: Step[],
  visit: (step: Step, path: (string | number)[], depth: number) => void,
  path: (string | number)[] = ['steps'],
  depth = 0
): void {
  steps.forEach((step, index) => {
    const stepPath = [...path, index];
    visit(step, stepPath, depth);
    if (step.type === 'collection') {
      if (step.operation === 'pipeline') {
        step.pipeline.forEach((stage, stageIndex) => {
          if (stage.steps) {
            walkSteps(stage.steps, visit, [...stepPath, 'pipeline', stageIndex, 'steps'], depth + 1);
          }
        });
      } else if (step.steps) {
        walkSteps(step.steps, visit, [...stepPath, 'steps'], depth + 1);
      }
    } else if (step.type === 'conditional') {
      if (step.conditions) {
        step.conditions.forEach((branch, branchIndex) => {
          walkSteps(branch.steps, visit, [...stepPath, 'conditions', branchIndex, 'steps'], depth + 1);
        });
      }
      if (step.if_true) walkSteps(step.if_true, visit, [...stepPath, 'if_true'], depth + 1);
      if (step.if_false) walkSteps(step.if_false, visit, [...stepPath, 'if_false'], depth + 1);
    }
  });
}

// ===== Workflow Schema =====

export const WorkflowSchema = z
  .object({
    name: z
      .string()
      .regex(
        WORKFLOW_NAME,
        'Workflow name must start with a letter and contain only letters, digits, spaces, "-" or "_"'
      ),
    description: z.string().optional(),
    version: z
      .union([z.string(), z.number()])
      .transform((value) => String(value))
      .default('1.0'),
    input_parameters: z.array(InputParameterSchema).default([]),
    steps: StepListSchema,
    output: WorkflowOutputSchema.optional(),
  })
  .superRefine((data, ctx) => {
    const paramNames = new Set<string>();
    data.input_parameters.forEach((param, index) => {
      if (paramNames.has(param.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate input parameter "${param.name}"`,
          path: ['input_parameters', index, 'name'],
        });
      }
      paramNames.add(param.name);
    });

    // steps.* is one namespace, so ids must be unique across nested sequences too
    const seen = new Set<string>();
    walkSteps(data.steps, (step, path, depth) => {
      if (seen.has(step.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate step id "${step.id}"`,
          path: [...path, 'id'],
        });
      }
      seen.add(step.id);
      if (depth > LIMITS.MAX_NESTING_DEPTH) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Steps may nest at most ${LIMITS.MAX_NESTING_DEPTH} levels deep`,
          path,
        });
      }
    });
  });

export type Workflow = z.infer<typeof WorkflowSchema>;

export { InputParameterSchema, WorkflowOutputSchema, TextProcessStepSchema };
