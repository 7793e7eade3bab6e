/**
 * stepline run command
 * Execute a workflow
 */

import { readFileSync, writeFileSync } from 'node:fs';
import type { Command } from 'commander';
import type { Workflow } from '../parser/schema.ts';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import { WorkflowFailedError, errorMessage } from '../runner/errors.ts';
import { WorkflowRunner } from '../runner/workflow-runner.ts';
import { ConfigLoader } from '../utils/config-loader.ts';
import { ConsoleLogger, type Logger, SilentLogger } from '../utils/logger.ts';
import { loadFileInputs } from './file-inputs.ts';
import { formatForDisplay, parseInputJson, parseInputs } from './utils.ts';

const OUTPUT_FORMATS = ['text', 'json', 'yaml'] as const;
type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface RunCommandOptions {
  input?: string;
  inputFile?: string;
  inputFileFor?: string[];
  set?: string[];
  events?: boolean;
  output?: string;
  outputFormat?: string;
  dryRun?: boolean;
  provider?: string;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Merge inputs from every source. Later sources win: `--input-file`,
 * `--input`, `--input-file-for`, then `-i` pairs.
 */
export function collectInputs(options: RunCommandOptions, logger: Logger): Record<string, unknown> {
  const fromFile = options.inputFile
    ? parseInputJson(readFileSync(options.inputFile, 'utf8'), '--input-file')
    : {};
  const base = { ...fromFile, ...parseInputJson(options.input) };

  const files = loadFileInputs(options.inputFileFor);
  const conflicts = Object.keys(files).filter((key) => key in base);
  if (conflicts.length > 0) {
    logger.warn(
      `⚠️  Key conflicts between --input and --input-file-for: ${conflicts.join(', ')}. --input-file-for values take priority.`
    );
  }

  return { ...base, ...files, ...parseInputs(options.set, logger) };
}

/** `--output-format` replaces the workflow's own `output.format` */
function withOutputFormat(workflow: Workflow, format: string | undefined): Workflow {
  if (format === undefined) return workflow;
  if (!isOutputFormat(format)) {
    throw new Error(`--output-format must be one of ${OUTPUT_FORMATS.join(', ')}, got "${format}"`);
  }
  return { ...workflow, output: { ...workflow.output, format } };
}

export async function runWorkflowCommand(workflowPath: string, options: RunCommandOptions): Promise<number> {
  const logger = options.events ? new SilentLogger() : new ConsoleLogger();
  const controller = new AbortController();
  const onSigint = () => {
    console.error('\n🛑 Interrupted, canceling run...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const inputs = collectInputs(options, logger);
    const workflow = withOutputFormat(WorkflowParser.loadWorkflow(workflowPath), options.outputFormat);

    const config = ConfigLoader.load(logger);
    if (options.provider && !(options.provider in config.providers)) {
      throw new Error(
        `Unknown provider "${options.provider}". Configured: ${Object.keys(config.providers).join(', ')}`
      );
    }

    const runner = new WorkflowRunner(workflow, {
      config: options.provider ? { ...config, default_provider: options.provider } : config,
      logger,
      onEvent: options.events
        ? (event) => {
            process.stdout.write(`${JSON.stringify(event)}\n`);
          }
        : undefined,
    });

    if (options.dryRun) {
      runner.resolveInputs(inputs);
      logger.log('✅ Workflow validation successful');
      logger.log('🏃 Dry run mode - execution skipped');
      return 0;
    }

    const outcome = await runner.run({ inputs, signal: controller.signal });
    const text = formatForDisplay(outcome.output);
    if (options.output) {
      writeFileSync(options.output, text, 'utf8');
      logger.log(`💾 Output written to: ${options.output}`);
    } else if (!options.events) {
      console.log(text);
    }
    return 0;
  } catch (error) {
    console.error('✗ Failed to execute workflow:', errorMessage(error));
    if (error instanceof WorkflowFailedError) {
      if (error.stepId) console.error(`  step: ${error.stepId}`);
      console.error(`  kind: ${error.kind}`);
      for (const item of error.itemErrors) {
        const stage = item.stage ? ` (${item.stage})` : '';
        console.error(`  item ${item.index}${stage}: ${item.message}`);
      }
    }
    return 1;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Execute a workflow')
    .argument('<workflow>', 'Path to the workflow file')
    .option('--input <json>', 'Inputs as a JSON object')
    .option('--input-file <path>', 'Inputs from a JSON file')
    .option('--input-file-for <key=path...>', 'File input as key=path[:format[:encoding]]')
    .option('-i, --set <key=value...>', 'Input values')
    .option('--output <path>', 'Write the output to a file')
    .option('--output-format <format>', 'Output format: text, json or yaml')
    .option('--provider <name>', 'Override the default provider')
    .option('--dry-run', 'Validate the workflow and inputs without executing')
    .option('--events', 'Emit structured JSON events (NDJSON) to stdout')
    .action(async (workflowPath: string, options: RunCommandOptions) => {
      process.exitCode = await runWorkflowCommand(workflowPath, options);
    });
}
