/**
 * stepline validate command
 * Validate workflow files without calling a provider
 */

import { existsSync, statSync } from 'node:fs';
import type { Command } from 'commander';
import { glob } from 'glob';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import { errorMessage } from '../runner/errors.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';

export interface ValidationSummary {
  passed: number;
  failed: number;
}

const DEFAULT_PATH = 'workflows/';

async function collectFiles(path: string): Promise<string[]> {
  if (!existsSync(path)) {
    throw new Error(`Path not found: ${path}`);
  }
  if (statSync(path).isFile()) return [path];
  const files = await glob('**/*.{yaml,yml}', { cwd: path, absolute: true, nodir: true });
  return files.sort();
}

/**
 * Structural and template check of every workflow under `path` (a file or a
 * directory).
 */
export async function validateWorkflows(
  path: string = DEFAULT_PATH,
  logger: Logger = new ConsoleLogger()
): Promise<ValidationSummary> {
  const files = await collectFiles(path);
  if (files.length === 0) {
    logger.log('⊘ No workflow files found to validate.');
    return { passed: 0, failed: 0 };
  }

  logger.log(`🔍 Validating ${files.length} workflow(s)...\n`);

  const summary: ValidationSummary = { passed: 0, failed: 0 };
  for (const file of files) {
    try {
      const workflow = WorkflowParser.loadWorkflow(file);
      const count = WorkflowParser.stepIds(workflow).length;
      logger.log(`  ✓ ${file} ${workflow.name} (${count} steps)`);
      summary.passed++;
    } catch (error) {
      logger.error(`  ✗ ${file} ${errorMessage(error)}`);
      summary.failed++;
    }
  }

  logger.log(`\nSummary: ${summary.passed} passed, ${summary.failed} failed.`);
  return summary;
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate workflow files')
    .argument('[path]', `Workflow file or directory to validate (default: ${DEFAULT_PATH})`)
    .action(async (pathArg: string | undefined) => {
      try {
        const summary = await validateWorkflows(pathArg);
        process.exitCode = summary.failed > 0 ? 1 : 0;
      } catch (error) {
        console.error('✗ Validation failed:', errorMessage(error));
        process.exitCode = 1;
      }
    });
}
