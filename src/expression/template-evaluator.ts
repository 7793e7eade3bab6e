import { type ExpressionContext, ExpressionEvaluator } from './evaluator.ts';

/**
 * The narrow interface the runner uses for all dynamic text.
 *
 * Implementations must throw TemplateResolutionError when a referenced name
 * is missing instead of producing an empty string.
 */
export interface TemplateEvaluator {
  /** Render to text. Non-string results are serialised as JSON. */
  render(template: string, context: ExpressionContext): string;
  /**
   * Evaluate a predicate or value. Accepts either a `${{ }}` template or a
   * bare expression such as `item.score > 3`.
   */
  evaluate(expression: string, context: ExpressionContext): unknown;
  /** Type-preserving template evaluation; text without expressions is returned as-is. */
  resolve(template: string, context: ExpressionContext): unknown;
}

export class DefaultTemplateEvaluator implements TemplateEvaluator {
  render(template: string, context: ExpressionContext): string {
    return ExpressionEvaluator.evaluateString(template, context);
  }

  evaluate(expression: string, context: ExpressionContext): unknown {
    if (ExpressionEvaluator.hasExpression(expression)) {
      return ExpressionEvaluator.evaluate(expression, context);
    }
    return ExpressionEvaluator.evaluateExpression(expression, context);
  }

  resolve(template: string, context: ExpressionContext): unknown {
    return ExpressionEvaluator.evaluate(template, context);
  }
}

const FILTER_YES: ReadonlySet<string> = new Set(['true', '1', 'yes', 'on']);
const CONDITION_YES: ReadonlySet<string> = new Set(['true', '1', 'yes']);

/**
 * Coerce a predicate result to a boolean. Strings count as true only when
 * they spell a yes (`true`, `1`, `yes`, `on`), so a rendered "false" is false.
 */
export function toBoolean(value: unknown, yes: ReadonlySet<string> = FILTER_YES): boolean {
  if (typeof value === 'string') {
    return yes.has(value.trim().toLowerCase());
  }
  return Boolean(value);
}

/** Branch predicates take `true`, `1` and `yes` only */
export function toConditionBoolean(value: unknown): boolean {
  return toBoolean(value, CONDITION_YES);
}
