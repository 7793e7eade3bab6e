import type { Usage } from './executors/types.ts';
import type { StepContext } from './workflow-state.ts';

/**
 * Error taxonomy for the engine. Each class carries a `kind` so failures can
 * be reported (and matched in tests) without instanceof chains.
 */

export type ErrorKind =
  | 'template_resolution'
  | 'expression'
  | 'provider'
  | 'validation'
  | 'transform'
  | 'condition_evaluation'
  | 'item_processing'
  | 'input'
  | 'cancelled'
  | 'unknown';

export interface ItemError {
  index: number;
  message: string;
  /** Pipeline stage the element belonged to */
  stage?: string;
}

/** Provider usage consumed by work that then failed */
export interface Spend {
  usage: Usage;
  provider_calls: number;
}

export abstract class EngineError extends Error {
  abstract readonly kind: ErrorKind;
  spent?: Spend;
}

/** A template or expression referenced a name that is not in the context. */
export class TemplateResolutionError extends EngineError {
  readonly kind = 'template_resolution' as const;

  constructor(
    message: string,
    public readonly reference?: string
  ) {
    super(message);
    this.name = 'TemplateResolutionError';
  }
}

/** An expression parsed but failed to evaluate (bad syntax, forbidden access). */
export class ExpressionError extends EngineError {
  readonly kind = 'expression' as const;

  constructor(
    message: string,
    public readonly expression?: string
  ) {
    super(message);
    this.name = 'ExpressionError';
  }
}

/** Provider output still failed validation after every retry. */
export class ValidationError extends EngineError {
  readonly kind = 'validation' as const;

  constructor(
    message: string,
    public readonly output: string,
    public readonly errors: string[]
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class TransformError extends EngineError {
  readonly kind = 'transform' as const;

  constructor(
    message: string,
    public readonly method?: string
  ) {
    super(message);
    this.name = 'TransformError';
  }
}

export class ConditionEvaluationError extends EngineError {
  readonly kind = 'condition_evaluation' as const;

  constructor(
    message: string,
    public readonly condition?: string
  ) {
    super(message);
    this.name = 'ConditionEvaluationError';
  }
}

/** A collection element failed under `on_item_failure: stop`. */
export class ItemProcessingError extends EngineError {
  readonly kind = 'item_processing' as const;

  constructor(
    message: string,
    public readonly itemErrors: ItemError[]
  ) {
    super(message);
    this.name = 'ItemProcessingError';
  }
}

export class InputValidationError extends EngineError {
  readonly kind = 'input' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InputValidationError';
  }
}

export class CancelledError extends EngineError {
  readonly kind = 'cancelled' as const;

  constructor(message = 'Step canceled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/**
 * A step failed and its `on_error` policy did not absorb it.
 * Wraps the original error with the step id and its kind.
 */
export class StepExecutionError extends Error {
  spent?: Spend;

  constructor(
    public readonly stepId: string,
    public readonly kind: ErrorKind,
    message: string,
    public readonly itemErrors: ItemError[] = [],
    options?: { cause?: unknown }
  ) {
    super(`Step "${stepId}" failed (${kind}): ${message}`, options);
    this.name = 'StepExecutionError';
  }

  static wrap(stepId: string, error: unknown): StepExecutionError {
    if (error instanceof StepExecutionError) return error;
    const itemErrors = error instanceof ItemProcessingError ? error.itemErrors : [];
    return new StepExecutionError(stepId, errorKind(error), errorMessage(error), itemErrors, {
      cause: error,
    });
  }
}

/**
 * What `WorkflowRunner.run()` rejects with. `steps` holds every result
 * committed before the failure.
 */
export class WorkflowFailedError extends Error {
  readonly kind: ErrorKind;
  readonly stepId?: string;
  readonly itemErrors: ItemError[];

  constructor(
    error: unknown,
    public readonly steps: Record<string, StepContext>,
    public readonly canceled = false
  ) {
    super(errorMessage(error), { cause: error });
    this.name = 'WorkflowFailedError';
    this.kind = errorKind(error);
    if (error instanceof StepExecutionError) {
      this.stepId = error.stepId;
      this.itemErrors = error.itemErrors;
    } else {
      this.itemErrors = [];
    }
  }
}

export function spentBy(error: unknown): Spend | undefined {
  return error instanceof EngineError || error instanceof StepExecutionError ? error.spent : undefined;
}

/** Attach `spend` to an engine error so enclosing sequences can account for it */
export function recordSpend(error: unknown, spend: Spend): void {
  if (error instanceof EngineError || error instanceof StepExecutionError) {
    error.spent = spend;
  }
}

export function errorKind(error: unknown): ErrorKind {
  if (error instanceof EngineError) return error.kind;
  if (error instanceof StepExecutionError) return error.kind;
  if (error instanceof Error && error.name === 'TimeoutError') return 'provider';
  return 'unknown';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
