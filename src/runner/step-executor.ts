import type { Step } from '../parser/schema.ts';
import { CancelledError } from './errors.ts';
import { executeCollectionStep } from './executors/collection-executor.ts';
import { executeConditionalStep } from './executors/conditional-executor.ts';
import { executeLlmStep } from './executors/llm-executor.ts';
import { executeTransformStep } from './executors/transform-executor.ts';
import type { ExecutionEnv, StepResult } from './executors/types.ts';
import type { ExecutionContext } from './workflow-state.ts';

export type { ExecutionEnv, StepResult };

/**
 * Main dispatcher for workflow steps. Failures propagate; the enclosing
 * sequence applies the step's `on_error` policy.
 */
export async function executeStep(
  step: Step,
  context: ExecutionContext,
  env: ExecutionEnv
): Promise<StepResult> {
  if (env.signal.aborted) {
    throw new CancelledError();
  }

  switch (step.type) {
    case 'ai_call':
      return executeLlmStep(step, context, env);
    case 'text_process':
      return executeTransformStep(step, context, env);
    case 'collection':
      return executeCollectionStep(step, context, env);
    case 'conditional':
      return executeConditionalStep(step, context, env);
  }
}
