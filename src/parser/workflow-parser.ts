import { existsSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ExpressionEvaluator } from '../expression/evaluator.ts';
import { PathResolver } from '../utils/paths.ts';
import {
  type CollectionStage,
  type Step,
  type Workflow,
  WorkflowSchema,
  nestedSequences,
  walkSteps,
} from './schema.ts';

type Path = (string | number)[];

interface TemplateField {
  path: Path;
  source: string;
  /** Predicates may be written without the ${{ }} wrapper */
  bare: boolean;
}

function formatPath(path: Path): string {
  return path.length > 0 ? path.join('.') : '(root)';
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `  - ${formatPath(issue.path)}: ${issue.message}`).join('\n');
}

export class WorkflowParser {
  /**
   * Load and validate a workflow from a YAML file
   */
  static loadWorkflow(path: string): Workflow {
    if (!existsSync(path)) {
      throw new Error(`Workflow file not found at ${path}`);
    }
    return WorkflowParser.parseWorkflow(readFileSync(path, 'utf8'), path, dirname(path));
  }

  /**
   * Parse workflow YAML. `source` only labels error messages; `baseDir`
   * anchors relative file references such as `schema_file`.
   */
  static parseWorkflow(content: string, source = '<inline>', baseDir?: string): Workflow {
    try {
      const raw = yaml.load(content);
      const workflow = WorkflowSchema.parse(raw);

      const templateErrors = WorkflowParser.templateErrors(workflow);
      if (templateErrors.length > 0) {
        throw new Error(`Invalid templates:\n${templateErrors.map((e) => `  - ${e}`).join('\n')}`);
      }

      WorkflowParser.resolveFileReferences(workflow, baseDir);
      return workflow;
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new Error(`Invalid workflow schema at ${source}:\n${formatZodIssues(error)}`);
      }
      if (error instanceof Error) {
        throw new Error(`Failed to parse workflow at ${source}: ${error.message}`);
      }
      throw error;
    }
  }

  /**
   * Check every template without evaluating it: each `${{ }}` must parse and
   * every `steps.<id>` must name a step that is committed earlier in scope.
   */
  static templateErrors(workflow: Workflow): string[] {
    const errors: string[] = [];
    const visible = new Set<string>();
    WorkflowParser.checkSequence(workflow.steps, ['steps'], visible, errors);

    if (workflow.output?.template !== undefined) {
      WorkflowParser.checkField(
        { path: ['output', 'template'], source: workflow.output.template, bare: false },
        visible,
        errors
      );
    }
    return errors;
  }

  private static checkSequence(
    steps: Step[],
    path: Path,
    visible: Set<string>,
    errors: string[]
  ): void {
    steps.forEach((step, index) => {
      const stepPath = [...path, index];

      for (const field of WorkflowParser.templateFields(step, stepPath)) {
        WorkflowParser.checkField(field, visible, errors);
      }

      if (step.type === 'collection') {
        if (step.operation === 'pipeline') {
          step.pipeline.forEach((stage, stageIndex) => {
            WorkflowParser.checkStage(stage, [...stepPath, 'pipeline', stageIndex], visible, errors);
          });
        } else {
          WorkflowParser.checkStage(step, stepPath, visible, errors);
        }
      }

      if (step.type === 'conditional') {
        const branches = step.conditions
          ? step.conditions.map((branch, i) => ({
              steps: branch.steps,
              path: [...stepPath, 'conditions', i, 'steps'],
            }))
          : [
              { steps: step.if_true, path: [...stepPath, 'if_true'] },
              { steps: step.if_false, path: [...stepPath, 'if_false'] },
            ];
        for (const branch of branches) {
          if (branch.steps) {
            WorkflowParser.checkSequence(branch.steps, branch.path, new Set(visible), errors);
          }
        }
        // Branches share the enclosing context, so their results stay visible
        for (const branch of branches) {
          if (branch.steps) WorkflowParser.addCommittedIds(branch.steps, visible);
        }
      }

      visible.add(step.id);
    });
  }

  /** Element pipelines get their own copy of `visible`; their ids never leak out */
  private static checkStage(
    stage: CollectionStage,
    path: Path,
    visible: Set<string>,
    errors: string[]
  ): void {
    const inner = new Set(visible);
    if (stage.steps) {
      WorkflowParser.checkSequence(stage.steps, [...path, 'steps'], inner, errors);
    }
    if (stage.operation === 'filter' && stage.condition !== undefined) {
      WorkflowParser.checkField(
        { path: [...path, 'condition'], source: stage.condition, bare: true },
        inner,
        errors
      );
    }
  }

  private static addCommittedIds(steps: Step[], visible: Set<string>): void {
    for (const step of steps) {
      visible.add(step.id);
      if (step.type !== 'conditional') continue;
      for (const branch of nestedSequences(step)) {
        WorkflowParser.addCommittedIds(branch, visible);
      }
    }
  }

  private static templateFields(step: Step, path: Path): TemplateField[] {
    switch (step.type) {
      case 'ai_call':
        return [{ path: [...path, 'prompt'], source: step.prompt, bare: false }];

      case 'text_process': {
        const fields: TemplateField[] = [{ path: [...path, 'input'], source: step.input, bare: false }];
        if (step.method === 'format') {
          fields.push({ path: [...path, 'template'], source: step.template, bare: false });
        } else if (step.method === 'array_filter') {
          fields.push({ path: [...path, 'condition'], source: step.condition, bare: true });
        } else if (step.method === 'select_item' && step.condition !== undefined) {
          fields.push({ path: [...path, 'condition'], source: step.condition, bare: true });
        } else if (step.method === 'array_transform') {
          fields.push({ path: [...path, 'transform'], source: step.transform, bare: true });
        }
        return fields;
      }

      case 'collection':
        return [{ path: [...path, 'input'], source: step.input, bare: false }];

      case 'conditional':
        if (step.conditions) {
          return step.conditions.flatMap((branch, i) =>
            branch.condition !== undefined && !branch.default
              ? [
                  {
                    path: [...path, 'conditions', i, 'condition'],
                    source: branch.condition,
                    bare: true,
                  },
                ]
              : []
          );
        }
        return step.condition !== undefined
          ? [{ path: [...path, 'condition'], source: step.condition, bare: true }]
          : [];
    }
  }

  private static checkField(field: TemplateField, visible: Set<string>, errors: string[]): void {
    const bare = field.bare && !ExpressionEvaluator.hasExpression(field.source);
    const where = formatPath(field.path);

    const syntax = bare
      ? ExpressionEvaluator.syntaxErrors(`\${{ ${field.source} }}`)
      : ExpressionEvaluator.syntaxErrors(field.source);
    for (const message of syntax) {
      errors.push(`${where}: ${message}`);
    }
    if (syntax.length > 0) return;

    for (const reference of ExpressionEvaluator.findStepReferences(field.source, bare)) {
      if (!visible.has(reference)) {
        errors.push(
          `${where}: references step "${reference}", which is not defined earlier in scope`
        );
      }
    }
  }

  /** Rewrite relative `schema_file` paths against the workflow's directory. */
  private static resolveFileReferences(workflow: Workflow, baseDir?: string): void {
    walkSteps(workflow.steps, (step) => {
      if (step.type === 'text_process' && step.method === 'parse_as_json' && step.schema_file) {
        step.schema_file = PathResolver.resolveFromWorkflow(step.schema_file, baseDir);
      }
    });
  }

  /** Every step id in declaration order, nested ones included. */
  static stepIds(workflow: Workflow): string[] {
    const ids: string[] = [];
    walkSteps(workflow.steps, (step) => ids.push(step.id));
    return ids;
  }
}
