import { randomUUID } from 'node:crypto';
import * as yaml from 'js-yaml';
import { DefaultTemplateEvaluator, type TemplateEvaluator } from '../expression/template-evaluator.ts';
import type { Config } from '../parser/config-schema.ts';
import { type Workflow, type WorkflowInputParameter, walkSteps } from '../parser/schema.ts';
import { WorkflowStatus } from '../types/status.ts';
import { ConfigLoader } from '../utils/config-loader.ts';
import { parseJsonStrict } from '../utils/json-parser.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import {
  CancelledError,
  InputValidationError,
  WorkflowFailedError,
  errorMessage,
} from './errors.ts';
import type { EventHandler, WorkflowEvent, WorkflowEventPayload } from './events.ts';
import type { ExecutionEnv } from './executors/types.ts';
import { AiSdkProvider, type Provider } from './llm-adapter.ts';
import { ValidatorRegistry } from './output-validator.ts';
import { executeSequence } from './sequence-executor.ts';
import {
  type ExecutionContext,
  type StepContext,
  createContext,
} from './workflow-state.ts';
import {
  type UsageSummary,
  UsageTracker,
  formatTimingSummary,
  formatUsageSummary,
} from './workflow-summary.ts';

export interface RunnerOptions {
  /** Defaults to `ConfigLoader.load()` */
  config?: Config;
  /** Defaults to an `AiSdkProvider` over `config` */
  provider?: Provider;
  logger?: Logger;
  validators?: ValidatorRegistry;
  evaluator?: TemplateEvaluator;
  onEvent?: EventHandler;
}

export interface RunOptions {
  inputs?: Record<string, unknown>;
  /** External cancellation; linked to the run's own controller */
  signal?: AbortSignal;
}

export interface WorkflowOutcome {
  status: typeof WorkflowStatus.COMPLETED;
  runId: string;
  output: unknown;
  steps: Record<string, StepContext>;
  usage: UsageSummary;
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function matchesType(type: WorkflowInputParameter['type'], value: unknown): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return Number.isInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}

/**
 * Main workflow execution engine. A runner can be reused; every `run()`
 * gets its own context, usage tracker and abort controller.
 */
export class WorkflowRunner {
  private readonly config: Config;
  private readonly provider: Provider;
  private readonly logger: Logger;
  private readonly validators: ValidatorRegistry;
  private readonly evaluator: TemplateEvaluator;
  private readonly onEvent?: EventHandler;

  constructor(
    private readonly workflow: Workflow,
    options: RunnerOptions = {}
  ) {
    this.config = Object.freeze(options.config ?? ConfigLoader.load());
    this.provider = options.provider ?? new AiSdkProvider(this.config);
    this.logger = options.logger ?? new ConsoleLogger();
    this.validators = options.validators ?? ValidatorRegistry.withDefaults();
    this.evaluator = options.evaluator ?? new DefaultTemplateEvaluator();
    this.onEvent = options.onEvent;
  }

  /**
   * Apply defaults, enforce `required` and type-check each declared input.
   * Every declared input ends up in the result; an optional one without a
   * value is null.
   */
  resolveInputs(given: Record<string, unknown> = {}): Record<string, unknown> {
    const inputs: Record<string, unknown> = { ...given };

    for (const param of this.workflow.input_parameters) {
      const value = given[param.name] ?? param.default;
      if (value === undefined || value === null) {
        if (param.required) {
          throw new InputValidationError(`Missing required input: ${param.name}`);
        }
        inputs[param.name] = null;
        continue;
      }
      if (!matchesType(param.type, value)) {
        throw new InputValidationError(
          `Input "${param.name}" must be of type ${param.type}, got ${describeType(value)}`
        );
      }
      inputs[param.name] = value;
    }
    return inputs;
  }

  /** Fail before any provider call when a step names an unregistered validator */
  private preflight(): void {
    walkSteps(this.workflow.steps, (step) => {
      if (step.type === 'ai_call' && step.validation) {
        this.validators.forConfig(step.validation);
      }
    });
  }

  async run(options: RunOptions = {}): Promise<WorkflowOutcome> {
    const runId = randomUUID();
    const events: WorkflowEvent[] = [];
    const emit = (payload: WorkflowEventPayload) => {
      const event: WorkflowEvent = {
        ...payload,
        timestamp: new Date().toISOString(),
        runId,
        workflow: this.workflow.name,
      };
      events.push(event);
      if (!this.onEvent) return;
      try {
        this.onEvent(event);
      } catch (error) {
        this.logger.warn(`Event handler failed for ${event.type}: ${errorMessage(error)}`);
      }
    };

    this.logger.log(`\n🏛️  Running workflow: ${this.workflow.name}`);
    this.logger.log(`Run ID: ${runId}\n`);

    const inputs = this.resolveInputs(options.inputs);
    this.preflight();

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (options.signal?.aborted) controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const usage = new UsageTracker();
    const context = createContext(inputs);
    const env: ExecutionEnv = {
      config: this.config,
      provider: this.provider,
      evaluator: this.evaluator,
      validators: this.validators,
      logger: this.logger,
      signal: controller.signal,
      depth: 0,
      usage,
      emit,
      executeSequence,
    };

    emit({ type: 'workflow.start', inputs });

    try {
      const outcome = await executeSequence(this.workflow.steps, context, env);
      if (outcome.status === 'skipped_remaining') {
        this.logger.log('⊘ Remaining steps skipped; completing run');
      }

      const output = this.formatOutput(context, outcome.lastOutput);
      this.logger.log('✨ Workflow completed successfully!\n');
      this.logSummaries(events, usage.summary());
      emit({ type: 'workflow.complete', status: WorkflowStatus.COMPLETED, output });

      return {
        status: WorkflowStatus.COMPLETED,
        runId,
        output,
        steps: { ...context.steps },
        usage: usage.summary(),
      };
    } catch (error) {
      const canceled = error instanceof CancelledError;
      const message = errorMessage(error);
      if (canceled) {
        this.logger.log(`\n🛑 Workflow canceled: ${message}`);
      } else {
        this.logger.error(`\n✗ Workflow failed: ${message}\n`);
      }
      emit({
        type: 'workflow.complete',
        status: canceled ? WorkflowStatus.CANCELED : WorkflowStatus.FAILED,
        error: message,
      });
      throw new WorkflowFailedError(error, { ...context.steps }, canceled);
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Render `output.template` (else take the last step's output). For json and
   * yaml a string is parsed as JSON first; text that is not JSON is
   * serialised as a string.
   */
  private formatOutput(context: ExecutionContext, lastOutput: unknown): unknown {
    const declared = this.workflow.output;
    const value =
      declared?.template !== undefined ? this.evaluator.render(declared.template, context) : lastOutput;

    const format = declared?.format ?? 'text';
    if (format === 'text') return value;

    let data = value;
    if (typeof value === 'string') {
      const parsed = parseJsonStrict(value);
      if (parsed.ok) data = parsed.value;
    }
    return format === 'json' ? JSON.stringify(data, null, 2) : yaml.dump(data);
  }

  private logSummaries(events: WorkflowEvent[], usage: UsageSummary): void {
    const timing = formatTimingSummary(events);
    if (timing) this.logger.log(timing);
    const tokens = formatUsageSummary(usage);
    if (tokens) this.logger.log(tokens);
  }
}
