import type { Step } from '../parser/schema.ts';
import { StepStatus } from '../types/status.ts';
import { truncate } from '../utils/constants.ts';
import {
  CancelledError,
  StepExecutionError,
  errorKind,
  errorMessage,
  recordSpend,
  spentBy,
} from './errors.ts';
import {
  type ExecutionEnv,
  type SequenceOutcome,
  type StepResult,
  addUsage,
  emptyUsage,
  indent,
} from './executors/types.ts';
import { executeStep } from './step-executor.ts';
import { type ExecutionContext, toStepContext } from './workflow-state.ts';

/**
 * Run steps in list order against `context`, committing each result to
 * `context.steps` before the next step starts.
 *
 * Used for the top level and, through `env.executeSequence`, for collection
 * elements and conditional branches.
 *
 * @throws StepExecutionError when a step with `on_error: stop` fails, or a
 *   predicate fails under `on_condition_error: stop` whatever the step's `on_error`
 * @throws CancelledError when the run's signal fires
 */
export async function executeSequence(
  steps: Step[],
  context: ExecutionContext,
  env: ExecutionEnv
): Promise<SequenceOutcome> {
  const pad = indent(env);
  const totalSteps = steps.length;
  let usage = emptyUsage();
  let providerCalls = 0;
  let lastOutput: unknown = null;
  let lastStepId: string | undefined;

  for (const [i, step] of steps.entries()) {
    if (env.signal.aborted) throw new CancelledError();

    const stepIndex = i + 1;
    const event = { stepId: step.id, stepType: step.type, depth: env.depth, stepIndex, totalSteps };
    env.logger.log(`${pad}[${stepIndex}/${totalSteps}] ▶ Executing step: ${step.id} (${step.type})`);
    env.emit({ type: 'step.start', ...event });
    const startedAt = Date.now();

    let result: StepResult;
    try {
      result = await executeStep(step, context, env);
    } catch (error) {
      const message = errorMessage(error);
      const spent = spentBy(error);
      if (spent) {
        usage = addUsage(usage, spent.usage);
        providerCalls += spent.provider_calls;
        if (step.type === 'ai_call') {
          env.usage.record(step.id, spent.usage, spent.provider_calls);
        }
      }
      env.emit({
        type: 'step.end',
        ...event,
        status: StepStatus.FAILED,
        durationMs: Date.now() - startedAt,
        error: message,
      });

      if (error instanceof CancelledError || env.signal.aborted) {
        throw error instanceof CancelledError ? error : new CancelledError();
      }
      if (step.on_error === 'stop' || errorKind(error) === 'condition_evaluation') {
        env.logger.error(`${pad}  ✗ Step ${step.id} failed: ${truncate(message)}`);
        const failure = StepExecutionError.wrap(step.id, error);
        recordSpend(failure, { usage, provider_calls: providerCalls });
        throw failure;
      }

      env.logger.warn(
        `${pad}  ⚠️  Step ${step.id} failed (on_error: ${step.on_error}): ${truncate(message)}`
      );
      context.steps[step.id] = toStepContext({
        kind: 'error',
        output: null,
        error: message,
        usage: spent?.usage,
        provider_calls: spent?.provider_calls,
      });
      lastOutput = null;
      lastStepId = step.id;

      if (step.on_error === 'skip_remaining') {
        const skipped = totalSteps - stepIndex;
        if (skipped > 0) {
          env.logger.log(`${pad}  ⊘ Skipping ${skipped} remaining step(s)`);
        }
        return {
          status: 'skipped_remaining',
          lastOutput,
          lastStepId,
          usage,
          provider_calls: providerCalls,
        };
      }
      continue;
    }

    const stepContext = toStepContext(result);
    context.steps[step.id] = stepContext;
    usage = addUsage(usage, result.usage);
    providerCalls += result.provider_calls ?? 0;
    lastOutput = result.output;
    lastStepId = step.id;

    if (step.type === 'ai_call') {
      env.usage.record(step.id, result.usage, result.provider_calls);
    }

    env.emit({
      type: 'step.end',
      ...event,
      status: stepContext.status,
      durationMs: Date.now() - startedAt,
    });
    env.logger.log(`${pad}[${stepIndex}/${totalSteps}] ✓ Step ${step.id} completed`);
  }

  return { status: 'completed', lastOutput, lastStepId, usage, provider_calls: providerCalls };
}
