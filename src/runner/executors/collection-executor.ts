import { toBoolean } from '../../expression/template-evaluator.ts';
import {
  type CollectionStage,
  type CollectionStep,
  type FilterStage,
  type MapStage,
  type PipelineCollectionStep,
  type ReduceStage,
  type Step,
  stageName,
} from '../../parser/schema.ts';
import { StepStatus } from '../../types/status.ts';
import { LIMITS, truncate } from '../../utils/constants.ts';
import {
  CancelledError,
  ConditionEvaluationError,
  type ItemError,
  ItemProcessingError,
  StepExecutionError,
  TransformError,
  errorKind,
  errorMessage,
  recordSpend,
  spentBy,
} from '../errors.ts';
import { sleep } from '../retry.ts';
import { type ExecutionContext, extendContext } from '../workflow-state.ts';
import {
  type CollectionResult,
  type ExecutionEnv,
  type ProcessingStats,
  type Usage,
  addUsage,
  emptyUsage,
  indent,
} from './types.ts';

type ElementOutcome =
  | { ok: true; value: unknown; context: ExecutionContext; attempts: number }
  | { ok: false; message: string; attempts: number };

/** Why a pool stopped before every element ran */
type StopReason = { error: ItemProcessingError | ConditionEvaluationError | StepExecutionError };

const MEMORY_WARNING_THRESHOLD = 1000;

function describeValue(value: unknown): string {
  return value === null ? 'null' : typeof value;
}

/**
 * Runs one map, filter or reduce over a list of elements. Holds the
 * per-operation counters, so a fresh instance is created per execution.
 * `label` names the operation in events: the step id, or `<step>.<stage>`
 * inside a pipeline.
 */
class CollectionExecutor {
  private readonly controller = new AbortController();
  private readonly childEnv: ExecutionEnv;
  private readonly errors: ItemError[] = [];
  private usage: Usage = emptyUsage();
  private providerCalls = 0;
  private retried = 0;
  private stopReason: StopReason | undefined;

  constructor(
    private readonly step: CollectionStage,
    private readonly label: string,
    private readonly context: ExecutionContext,
    private readonly env: ExecutionEnv
  ) {
    this.childEnv = { ...env, depth: env.depth + 1, signal: this.controller.signal };
  }

  async execute(items: unknown[]): Promise<CollectionResult> {
    const { step, env } = this;
    const onAbort = () => this.controller.abort();
    env.signal.addEventListener('abort', onAbort, { once: true });
    const startedAt = Date.now();
    try {
      switch (step.operation) {
        case 'map':
          return await this.map(step, items, startedAt);
        case 'filter':
          return await this.filter(step, items, startedAt);
        case 'reduce':
          return await this.reduce(step, items, startedAt);
      }
    } catch (error) {
      recordSpend(error, { usage: this.usage, provider_calls: this.providerCalls });
      throw error;
    } finally {
      env.signal.removeEventListener('abort', onAbort);
    }
  }

  // ===== Operations =====

  private async map(
    step: MapStage,
    items: unknown[],
    startedAt: number
  ): Promise<CollectionResult> {
    const slots: ElementOutcome[] = [];

    await this.runPool(items.length, async (index) => {
      const outcome = await this.runElement(step.steps, index, items.length, {
        item: items[index],
        index,
      });
      slots[index] = outcome;
      if (!outcome.ok) this.itemFailed(index, outcome.message);
    });

    const output: unknown[] = [];
    let succeeded = 0;
    for (const slot of slots) {
      if (slot.ok) {
        output.push(slot.value);
        succeeded++;
      } else if (step.error_handling.preserve_errors) {
        output.push(null);
      }
    }

    return this.result(items.length, output, succeeded, succeeded, startedAt);
  }

  private async filter(
    step: FilterStage,
    items: unknown[],
    startedAt: number
  ): Promise<CollectionResult> {
    const keep = Array.from({ length: items.length }, () => false);
    let succeeded = 0;

    await this.runPool(items.length, async (index) => {
      const scope = { item: items[index], index };
      let predicateContext = extendContext(this.context, scope);
      let predicate: unknown;

      if (step.steps) {
        const outcome = await this.runElement(step.steps, index, items.length, scope);
        if (!outcome.ok) {
          this.itemFailed(index, outcome.message);
          return;
        }
        predicate = outcome.value;
        predicateContext = outcome.context;
      } else {
        this.logProgress(index, items.length);
      }

      if (step.condition !== undefined) {
        try {
          predicate = this.env.evaluator.evaluate(step.condition, predicateContext);
        } catch (error) {
          this.conditionFailed(step, index, errorMessage(error));
          return;
        }
      }

      keep[index] = toBoolean(predicate);
      succeeded++;
    });

    const output = items.filter((_, index) => keep[index]);
    return this.result(items.length, output, output.length, succeeded, startedAt);
  }

  /** Strictly sequential; a skipped element leaves the accumulator unchanged. */
  private async reduce(
    step: ReduceStage,
    items: unknown[],
    startedAt: number
  ): Promise<CollectionResult> {
    let accumulator = step.initial_value;
    let succeeded = 0;

    for (const [index, item] of items.entries()) {
      this.checkAborted();
      const outcome = await this.runElement(step.steps, index, items.length, {
        [step.accumulator_var]: accumulator,
        [step.item_var]: item,
        index,
      });
      if (outcome.ok) {
        accumulator = outcome.value;
        succeeded++;
        continue;
      }
      this.itemFailed(index, outcome.message);
      if (this.stopReason) throw this.stopReason.error;
    }

    return this.result(items.length, accumulator, 1, succeeded, startedAt);
  }

  // ===== Element execution =====

  /**
   * Run the nested steps for one element. Under `on_item_failure: retry` a
   * failed element is re-run up to `max_retries_per_item` more times.
   */
  private async runElement(
    steps: Step[],
    index: number,
    total: number,
    scope: Record<string, unknown>
  ): Promise<ElementOutcome> {
    const { step, env, childEnv } = this;
    const { on_item_failure, max_retries_per_item } = step.error_handling;
    const maxAttempts = on_item_failure === 'retry' ? max_retries_per_item + 1 : 1;
    const startedAt = Date.now();

    this.logProgress(index, total);
    env.emit({ type: 'item.start', stepId: this.label, index, total });

    let message = '';
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const elementContext = extendContext(this.context, scope);
      try {
        const outcome = await env.executeSequence(steps, elementContext, childEnv);
        this.usage = addUsage(this.usage, outcome.usage);
        this.providerCalls += outcome.provider_calls;
        env.emit({
          type: 'item.end',
          stepId: this.label,
          index,
          total,
          status: StepStatus.SUCCESS,
          attempts: attempt,
          durationMs: Date.now() - startedAt,
        });
        return { ok: true, value: outcome.lastOutput, context: elementContext, attempts: attempt };
      } catch (error) {
        const spent = spentBy(error);
        if (spent) {
          this.usage = addUsage(this.usage, spent.usage);
          this.providerCalls += spent.provider_calls;
        }
        if (error instanceof CancelledError || this.controller.signal.aborted) {
          throw error instanceof CancelledError ? error : new CancelledError();
        }
        // A nested predicate under on_condition_error: stop ends the whole run
        if (
          (error instanceof StepExecutionError || error instanceof ConditionEvaluationError) &&
          errorKind(error) === 'condition_evaluation'
        ) {
          this.halt(error);
          throw error;
        }
        message = errorMessage(error);
        if (attempt < maxAttempts) {
          this.retried++;
          env.logger.log(
            `${indent(env)}  ↻ Retrying item ${index + 1} (attempt ${attempt + 1}/${maxAttempts}): ${truncate(message)}`
          );
        }
      }
    }

    env.emit({
      type: 'item.end',
      stepId: this.label,
      index,
      total,
      status: StepStatus.FAILED,
      attempts: maxAttempts,
      durationMs: Date.now() - startedAt,
      error: message,
    });
    return { ok: false, message, attempts: maxAttempts };
  }

  /**
   * Worker pool over element indices. Elements start in index order, at most
   * `max_parallel` at a time, batch by batch with `delay_between_batches`
   * between batches.
   */
  private async runPool(count: number, work: (index: number) => Promise<void>): Promise<void> {
    const { concurrency } = this.step;
    const maxParallel = concurrency?.max_parallel ?? this.env.config.max_parallel_ai_calls;
    const batchSize = concurrency?.batch_size ?? count;
    const delay = concurrency?.delay_between_batches ?? 0;

    for (let batchStart = 0; batchStart < count; batchStart += batchSize) {
      const batchEnd = Math.min(batchStart + batchSize, count);
      if (batchStart > 0 && delay > 0) {
        await this.pause(delay);
      }

      let next = batchStart;
      const nextIndex = (): number | null => {
        if (this.stopReason || this.controller.signal.aborted) return null;
        if (next >= batchEnd) return null;
        return next++;
      };

      const workers = Array.from({ length: Math.min(maxParallel, batchEnd - batchStart) }, async () => {
        while (true) {
          const index = nextIndex();
          if (index === null) break;
          await work(index);
        }
      });

      const settled = await Promise.allSettled(workers);
      if (this.stopReason) throw this.stopReason.error;
      this.checkAborted();

      const rejected = settled.find(
        (result): result is PromiseRejectedResult => result.status === 'rejected'
      );
      if (rejected) throw rejected.reason;
    }
  }

  private async pause(ms: number): Promise<void> {
    try {
      await sleep(ms, this.controller.signal);
    } catch (error) {
      if (this.stopReason) throw this.stopReason.error;
      throw error;
    }
  }

  // ===== Failure handling =====

  private itemFailed(index: number, message: string): void {
    const { env, step } = this;
    const itemError = { index, message: truncate(message, LIMITS.ERROR_MESSAGE_TRUNCATE_LENGTH) };
    this.errors.push(itemError);

    if (step.error_handling.on_item_failure === 'stop') {
      env.logger.error(`${indent(env)}  ✗ Item ${index + 1} failed: ${truncate(message)}`);
      this.halt(
        new ItemProcessingError(`Item ${index} of step "${this.label}" failed: ${message}`, [itemError])
      );
      return;
    }
    env.logger.warn(`${indent(env)}  ⚠️  Item ${index + 1} failed, skipping: ${truncate(message)}`);
  }

  private conditionFailed(step: FilterStage, index: number, message: string): void {
    const { env } = this;
    switch (step.error_handling.on_condition_error) {
      case 'skip_item':
        env.logger.warn(
          `${indent(env)}  ⚠️  Condition failed for item ${index + 1}, skipping: ${truncate(message)}`
        );
        this.errors.push({ index, message: `Condition evaluation failed: ${message}` });
        return;
      case 'stop':
        this.halt(
          new ConditionEvaluationError(
            `Condition evaluation failed for item ${index} of step "${this.label}": ${message}`,
            step.condition
          )
        );
        return;
      case 'default_false':
        return;
    }
  }

  /** No new element starts; in-flight element pipelines are cancelled */
  private halt(error: StopReason['error']): void {
    if (this.stopReason) return;
    this.stopReason = { error };
    this.controller.abort();
  }

  private checkAborted(): void {
    if (this.env.signal.aborted) throw new CancelledError();
  }

  private logProgress(index: number, total: number): void {
    this.env.logger.log(`${indent(this.env)}  ⤷ [${index + 1}/${total}] Processing item...`);
  }

  private result(
    inputCount: number,
    output: unknown,
    outputCount: number,
    succeeded: number,
    startedAt: number
  ): CollectionResult {
    const failed = this.errors.length;
    const stats: ProcessingStats = {
      processing_time_ms: Date.now() - startedAt,
      succeeded,
      failed,
      retried: this.retried,
      error_rate: inputCount === 0 ? 0 : failed / inputCount,
    };
    return {
      kind: 'collection',
      output,
      operation: this.step.operation,
      input_count: inputCount,
      output_count: outputCount,
      errors: [...this.errors].sort((a, b) => a.index - b.index),
      processing_stats: stats,
      usage: this.usage,
      provider_calls: this.providerCalls,
    };
  }
}

/**
 * Feed each stage's output to the next. Item errors keep the index within
 * their stage's input and carry the stage name.
 */
async function runPipeline(
  step: PipelineCollectionStep,
  items: unknown[],
  context: ExecutionContext,
  env: ExecutionEnv
): Promise<CollectionResult> {
  const startedAt = Date.now();
  const errors: ItemError[] = [];
  let usage = emptyUsage();
  let providerCalls = 0;
  let processed = 0;
  let succeeded = 0;
  let retried = 0;
  let current: unknown = items;

  try {
    for (const [index, stage] of step.pipeline.entries()) {
      const name = stageName(stage, index);
      if (!Array.isArray(current)) {
        throw new TransformError(
          `Stage "${name}" of step "${step.id}" needs an array, got ${describeValue(current)}`
        );
      }
      env.logger.log(
        `${indent(env)}  ⛓ Stage ${index + 1}/${step.pipeline.length}: ${name} (${stage.operation})`
      );

      const result = await new CollectionExecutor(stage, `${step.id}.${name}`, context, env).execute(
        current
      );
      usage = addUsage(usage, result.usage);
      providerCalls += result.provider_calls ?? 0;
      processed += result.input_count;
      succeeded = result.processing_stats.succeeded;
      retried += result.processing_stats.retried;
      errors.push(...result.errors.map((error) => ({ ...error, stage: name })));
      current = result.output;
    }
  } catch (error) {
    const spent = spentBy(error);
    recordSpend(error, {
      usage: addUsage(usage, spent?.usage),
      provider_calls: providerCalls + (spent?.provider_calls ?? 0),
    });
    throw error;
  }

  return {
    kind: 'collection',
    output: current,
    operation: 'pipeline',
    input_count: items.length,
    output_count: Array.isArray(current) ? current.length : 1,
    errors,
    processing_stats: {
      processing_time_ms: Date.now() - startedAt,
      succeeded,
      failed: errors.length,
      retried,
      error_rate: processed === 0 ? 0 : errors.length / processed,
    },
    usage,
    provider_calls: providerCalls,
  };
}

/**
 * Execute a `collection` step
 */
export async function executeCollectionStep(
  step: CollectionStep,
  context: ExecutionContext,
  env: ExecutionEnv
): Promise<CollectionResult> {
  const items = env.evaluator.resolve(step.input, context);
  if (!Array.isArray(items)) {
    throw new TransformError(
      `Collection input for step "${step.id}" must be an array, got ${describeValue(items)}`
    );
  }
  if (items.length > MEMORY_WARNING_THRESHOLD) {
    env.logger.warn(
      `${indent(env)}  ⚠️  Warning: Large collection detected (${items.length} items). This may consume significant memory.`
    );
  }

  if (step.operation === 'pipeline') {
    return runPipeline(step, items, context, env);
  }
  return new CollectionExecutor(step, step.id, context, env).execute(items);
}
