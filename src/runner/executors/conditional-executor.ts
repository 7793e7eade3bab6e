import { toConditionBoolean } from '../../expression/template-evaluator.ts';
import { type ConditionalStep, type Step, branchName } from '../../parser/schema.ts';
import { truncate } from '../../utils/constants.ts';
import { ConditionEvaluationError, errorMessage } from '../errors.ts';
import type { ExecutionContext } from '../workflow-state.ts';
import { type ConditionalResult, type ExecutionEnv, indent } from './types.ts';

interface Candidate {
  name: string;
  condition?: string;
  steps: Step[];
}

type Verdict = { ok: true; value: boolean } | { ok: false; error: string };

/** Result for a conditional that ran nothing */
function noBranch(conditionResult: boolean | null, evaluationError: string | null): ConditionalResult {
  return {
    kind: 'conditional',
    output: null,
    condition_result: conditionResult,
    executed_branch: null,
    evaluation_error: evaluationError,
  };
}

function evaluateCondition(
  condition: string,
  context: ExecutionContext,
  env: ExecutionEnv
): Verdict {
  try {
    return { ok: true, value: toConditionBoolean(env.evaluator.evaluate(condition, context)) };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

async function runBranch(
  branch: Candidate,
  conditionResult: boolean,
  evaluationError: string | null,
  context: ExecutionContext,
  env: ExecutionEnv
): Promise<ConditionalResult> {
  env.logger.log(`${indent(env)}  ↳ Taking branch: ${branch.name}`);
  const outcome = await env.executeSequence(branch.steps, context, {
    ...env,
    depth: env.depth + 1,
  });
  return {
    kind: 'conditional',
    output: outcome.lastOutput,
    condition_result: conditionResult,
    executed_branch: branch.name,
    evaluation_error: evaluationError,
    usage: outcome.usage,
    provider_calls: outcome.provider_calls,
  };
}

/**
 * Execute a `conditional` step. Predicate failures follow
 * `on_condition_error`; failures inside a branch propagate.
 */
export async function executeConditionalStep(
  step: ConditionalStep,
  context: ExecutionContext,
  env: ExecutionEnv
): Promise<ConditionalResult> {
  const candidates: Candidate[] = [];
  let fallback: Candidate | undefined;

  if (step.conditions) {
    for (const [index, branch] of step.conditions.entries()) {
      const candidate = { name: branchName(branch, index), condition: branch.condition, steps: branch.steps };
      if (branch.default) fallback = candidate;
      else candidates.push(candidate);
    }
  } else {
    candidates.push({ name: 'if_true', condition: step.condition, steps: step.if_true ?? [] });
    if (step.if_false) fallback = { name: 'if_false', steps: step.if_false };
  }

  let evaluationError: string | null = null;

  for (const candidate of candidates) {
    if (candidate.condition === undefined) continue;
    const verdict = evaluateCondition(candidate.condition, context, env);

    if (!verdict.ok) {
      const message = `Failed to evaluate condition for ${candidate.name}: ${verdict.error}`;
      switch (step.on_condition_error) {
        case 'stop':
          throw new ConditionEvaluationError(message, candidate.condition);
        case 'skip_remaining':
          env.logger.warn(`${indent(env)}  ⚠️  ${truncate(message)}; skipping conditional`);
          return noBranch(null, message);
        case 'continue':
          env.logger.warn(`${indent(env)}  ⚠️  ${truncate(message)}; treating as false`);
          evaluationError = message;
          continue;
      }
    }

    if (verdict.ok && verdict.value) {
      return runBranch(candidate, true, evaluationError, context, env);
    }
  }

  if (fallback) {
    // The list form reports a default branch as a match
    return runBranch(fallback, step.conditions !== undefined, evaluationError, context, env);
  }

  env.logger.log(`${indent(env)}  ⊘ No branch taken for step ${step.id}`);
  return noBranch(step.conditions ? null : false, evaluationError);
}
