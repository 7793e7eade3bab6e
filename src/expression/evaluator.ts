import jsepArrow from '@jsep-plugin/arrow';
import jsepObject from '@jsep-plugin/object';
import jsep from 'jsep';
import { ExpressionError, TemplateResolutionError } from '../runner/errors.ts';

jsep.plugins.register(jsepArrow);
jsep.plugins.register(jsepObject);

/**
 * Expression evaluator for ${{ }} syntax
 * Supports:
 * - input.field
 * - steps.step_id.output (and the other StepContext fields)
 * - loop variables bound in `scope` (item, index, accumulators)
 * - Basic JS expressions (arithmetic, comparisons, logical operators)
 * - Array access, whitelisted method calls (map, filter, every, etc.)
 * - Ternary operator, array and object literals, arrow functions
 *
 * Expressions are parsed with jsep and walked here; nothing is handed to
 * the JS runtime for evaluation.
 */

export interface StepContextView {
  output?: unknown;
  status?: string;
  error?: string;
  [field: string]: unknown;
}

export interface ExpressionContext {
  input?: Record<string, unknown>;
  steps?: Record<string, StepContextView>;
  /** Loop variables. Checked before the root names. */
  scope?: Record<string, unknown>;
}

type ASTNode = jsep.Expression;

interface ArrowFunctionExpression extends jsep.Expression {
  type: 'ArrowFunctionExpression';
  params: jsep.Identifier[] | null;
  body: jsep.Expression;
}

interface ObjectProperty extends jsep.Expression {
  type: 'Property';
  key: jsep.Expression;
  value?: jsep.Expression;
  computed: boolean;
  shorthand: boolean;
}

interface ObjectExpression extends jsep.Expression {
  type: 'ObjectExpression';
  properties: ObjectProperty[];
}

/** Arrow-function parameters live here, separate from the workflow context */
type Locals = Record<string, unknown>;

interface EvalState {
  context: ExpressionContext;
  locals: Locals;
  nodes: { count: number };
}

export interface ExpressionMatch {
  start: number;
  end: number;
  expr: string;
}

const FORBIDDEN_IDENTIFIERS = new Set([
  'eval',
  'Function',
  'AsyncFunction',
  'GeneratorFunction',
  'globalThis',
  'global',
  'self',
  'window',
  'process',
  'Reflect',
  'Proxy',
  'require',
  'import',
  'module',
  'exports',
]);

const SAFE_METHODS = new Set([
  // Array
  'map',
  'filter',
  'reduce',
  'every',
  'some',
  'find',
  'findIndex',
  'includes',
  'indexOf',
  'slice',
  'concat',
  'join',
  'flat',
  'flatMap',
  'reverse',
  'sort',
  'at',
  // String
  'split',
  'toLowerCase',
  'toUpperCase',
  'trim',
  'trimStart',
  'trimEnd',
  'startsWith',
  'endsWith',
  'replace',
  'replaceAll',
  'match',
  'toString',
  'charAt',
  'substring',
  'padStart',
  'padEnd',
  'normalize',
  'localeCompare',
  // Number
  'toFixed',
  'toPrecision',
  // Math
  'max',
  'min',
  'abs',
  'round',
  'floor',
  'ceil',
  'pow',
  'sqrt',
  // Object / JSON
  'stringify',
  'parse',
  'keys',
  'values',
  'entries',
  'hasOwnProperty',
]);

function lengthOf(value: unknown): number {
  if (typeof value === 'string' || Array.isArray(value)) return value.length;
  if (value !== null && typeof value === 'object') return Object.keys(value).length;
  return 0;
}

const SAFE_GLOBALS: Record<string, unknown> = {
  Boolean,
  Number,
  String,
  Object,
  Math,
  JSON,
  parseInt: Number.parseInt,
  parseFloat: Number.parseFloat,
  isNaN: Number.isNaN,
  isFinite: Number.isFinite,
  length: lengthOf,
  undefined: undefined,
  null: null,
  NaN: Number.NaN,
  Infinity: Number.POSITIVE_INFINITY,
  true: true,
  false: false,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}

function isCallable(value: unknown): value is (...args: unknown[]) => unknown {
  return typeof value === 'function';
}

function isAstNode(value: unknown): value is jsep.Expression {
  return isRecord(value) && typeof value.type === 'string';
}

function lookupMethod(target: unknown, name: string): unknown {
  if (typeof target === 'string') return Reflect.get(String.prototype, name);
  if (typeof target === 'number') return Reflect.get(Number.prototype, name);
  if (isRecord(target) || typeof target === 'function') return Reflect.get(target, name);
  return undefined;
}

function toNumber(value: unknown): number {
  return typeof value === 'number' ? value : Number(value);
}

function compare(left: unknown, right: unknown): number {
  if (typeof left === 'string' && typeof right === 'string') {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  const a = toNumber(left);
  const b = toNumber(right);
  if (Number.isNaN(a) || Number.isNaN(b)) return Number.NaN;
  return a - b;
}

function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value, null, 2);
  return String(value);
}

export class ExpressionEvaluator {
  // Forbidden properties - prevents prototype pollution
  private static readonly FORBIDDEN_PROPERTIES = new Set([
    'constructor',
    '__proto__',
    'prototype',
    '__defineGetter__',
    '__defineSetter__',
    '__lookupGetter__',
    '__lookupSetter__',
  ]);

  private static readonly MAX_TEMPLATE_LENGTH = 100_000;
  private static readonly MAX_PLAIN_STRING_LENGTH = 1_000_000;
  private static readonly MAX_NESTING_DEPTH = 50;
  private static readonly MAX_ARRAY_SIZE = 1000;
  private static readonly MAX_TOTAL_NODES = 10_000;

  /**
   * Structural check of a template: every `${{` closes and no stray `}}`.
   * @throws ExpressionError describing the first problem
   */
  static checkTemplate(template: string): void {
    let i = 0;
    while (i < template.length) {
      if (template.startsWith('${{', i)) {
        const end = ExpressionEvaluator.findClose(template, i + 3);
        if (end === -1) {
          throw new ExpressionError(`Unclosed expression starting at index ${i}`, template);
        }
        i = end + 2;
        continue;
      }
      if (template.startsWith('}}', i)) {
        throw new ExpressionError(`Unexpected "}}" at index ${i}`, template);
      }
      i++;
    }
  }

  /** Index of the `}}` that closes an expression body starting at `from`, or -1 */
  private static findClose(template: string, from: number): number {
    let depth = 0;
    for (let j = from; j < template.length; j++) {
      if (depth === 0 && template.startsWith('}}', j)) return j;
      if (template[j] === '{') depth++;
      else if (template[j] === '}' && depth > 0) depth--;
    }
    return -1;
  }

  /**
   * Scan for ${{ ... }} matches, handling nested braces in object literals
   */
  static *scanExpressions(template: string): Generator<ExpressionMatch> {
    let i = 0;
    while (i < template.length) {
      if (template.startsWith('${{', i)) {
        const end = ExpressionEvaluator.findClose(template, i + 3);
        if (end !== -1) {
          yield { start: i, end: end + 2, expr: template.substring(i + 3, end).trim() };
          i = end + 2;
          continue;
        }
      }
      i++;
    }
  }

  /**
   * Evaluate a string that may contain ${{ }} expressions.
   *
   * A template that is exactly one expression returns the raw value, so
   * `${{ input.items }}` stays an array. Anything else interpolates.
   *
   * `==` is loose on purpose ("5" == 5); `===` stays strict.
   */
  static evaluate(template: string, context: ExpressionContext): unknown {
    if (!ExpressionEvaluator.hasExpression(template)) {
      if (template.length > ExpressionEvaluator.MAX_PLAIN_STRING_LENGTH) {
        throw new ExpressionError(
          `Plain string exceeds maximum length of ${ExpressionEvaluator.MAX_PLAIN_STRING_LENGTH} characters`
        );
      }
      return template;
    }
    if (template.length > ExpressionEvaluator.MAX_TEMPLATE_LENGTH) {
      throw new ExpressionError(
        `Template with expressions exceeds maximum length of ${ExpressionEvaluator.MAX_TEMPLATE_LENGTH} characters`
      );
    }

    const trimmed = template.trim();
    const matches = [...ExpressionEvaluator.scanExpressions(trimmed)];
    if (matches.length === 1 && matches[0].start === 0 && matches[0].end === trimmed.length) {
      return ExpressionEvaluator.evaluateExpression(matches[0].expr, context);
    }

    let result = '';
    let lastIndex = 0;
    for (const match of ExpressionEvaluator.scanExpressions(template)) {
      result += template.substring(lastIndex, match.start);
      result += stringifyValue(ExpressionEvaluator.evaluateExpression(match.expr, context));
      lastIndex = match.end;
    }
    result += template.substring(lastIndex);
    return result;
  }

  /**
   * Evaluate a template and always return a string.
   * Objects and arrays become JSON; null and undefined become ''.
   */
  static evaluateString(template: string, context: ExpressionContext): string {
    return stringifyValue(ExpressionEvaluator.evaluate(template, context));
  }

  /**
   * Evaluate a single expression (without the ${{ }} wrapper)
   */
  static evaluateExpression(expr: string, context: ExpressionContext): unknown {
    try {
      const ast = jsep(expr);
      return ExpressionEvaluator.evaluateNode(ast, { context, locals: {}, nodes: { count: 0 } }, 0);
    } catch (error) {
      if (error instanceof TemplateResolutionError) throw error;
      throw new ExpressionError(
        `Failed to evaluate expression "${expr}": ${error instanceof Error ? error.message : String(error)}`,
        expr
      );
    }
  }

  private static resolveIdentifier(name: string, state: EvalState): unknown {
    if (FORBIDDEN_IDENTIFIERS.has(name)) {
      throw new ExpressionError(`Access to "${name}" is forbidden for security reasons`);
    }
    if (Object.hasOwn(state.locals, name)) {
      return state.locals[name];
    }
    const scope = state.context.scope;
    if (scope && Object.hasOwn(scope, name)) {
      return scope[name];
    }
    if (Object.hasOwn(SAFE_GLOBALS, name)) {
      return SAFE_GLOBALS[name];
    }
    if (name === 'input') return state.context.input ?? {};
    if (name === 'steps') return state.context.steps ?? {};

    throw new TemplateResolutionError(`Undefined variable: ${name}`, name);
  }

  private static checkProperty(property: unknown): void {
    if (typeof property !== 'string') return;
    const normalized = property.normalize('NFKC').toLowerCase();
    if (
      ExpressionEvaluator.FORBIDDEN_PROPERTIES.has(property) ||
      normalized.includes('proto') ||
      normalized.includes('constructor')
    ) {
      throw new ExpressionError(`Access to property "${property}" is forbidden for security reasons`);
    }
  }

  private static propertyKey(
    memberNode: jsep.MemberExpression,
    state: EvalState,
    depth: number
  ): string | number {
    if (!memberNode.computed) {
      return (memberNode.property as jsep.Identifier).name;
    }
    const key = ExpressionEvaluator.evaluateNode(memberNode.property, state, depth + 1);
    return typeof key === 'number' ? key : String(key);
  }

  /**
   * `input` and `steps` are closed records: a missing key there is a
   * resolution error, not `undefined`.
   */
  private static isClosedRoot(node: ASTNode, state: EvalState): 'input' | 'steps' | undefined {
    if (node.type !== 'Identifier') return undefined;
    const name = (node as jsep.Identifier).name;
    if (name !== 'input' && name !== 'steps') return undefined;
    if (Object.hasOwn(state.locals, name)) return undefined;
    if (state.context.scope && Object.hasOwn(state.context.scope, name)) return undefined;
    return name;
  }

  private static evaluateArgs(
    args: jsep.Expression[],
    state: EvalState,
    depth: number
  ): unknown[] {
    return args.map((arg) =>
      arg.type === 'ArrowFunctionExpression'
        ? ExpressionEvaluator.createArrowFunction(arg as ArrowFunctionExpression, state, depth)
        : ExpressionEvaluator.evaluateNode(arg, state, depth + 1)
    );
  }

  /**
   * Evaluate an AST node recursively
   */
  private static evaluateNode(node: ASTNode, state: EvalState, depth: number): unknown {
    state.nodes.count++;
    if (state.nodes.count > ExpressionEvaluator.MAX_TOTAL_NODES) {
      throw new ExpressionError(
        `Expression exceeds maximum complexity of ${ExpressionEvaluator.MAX_TOTAL_NODES} nodes`
      );
    }
    if (depth > ExpressionEvaluator.MAX_NESTING_DEPTH) {
      throw new ExpressionError(
        `Expression nesting exceeds maximum depth of ${ExpressionEvaluator.MAX_NESTING_DEPTH}`
      );
    }

    switch (node.type) {
      case 'Literal':
        return (node as jsep.Literal).value;

      case 'Identifier':
        return ExpressionEvaluator.resolveIdentifier((node as jsep.Identifier).name, state);

      case 'MemberExpression': {
        const memberNode = node as jsep.MemberExpression;
        const object = ExpressionEvaluator.evaluateNode(memberNode.object, state, depth + 1);
        const property = ExpressionEvaluator.propertyKey(memberNode, state, depth);
        ExpressionEvaluator.checkProperty(property);

        const root = ExpressionEvaluator.isClosedRoot(memberNode.object, state);
        if (root && isRecord(object) && !Object.hasOwn(object, property)) {
          throw new TemplateResolutionError(
            root === 'steps'
              ? `Unknown step reference: steps.${property}`
              : `Unknown input: input.${property}`,
            `${root}.${property}`
          );
        }

        if (typeof object === 'string') {
          if (property === 'length') return object.length;
          return typeof property === 'number' ? object[property] : undefined;
        }
        return isRecord(object) ? object[property] : undefined;
      }

      case 'BinaryExpression': {
        const binaryNode = node as jsep.BinaryExpression;
        const left = ExpressionEvaluator.evaluateNode(binaryNode.left, state, depth + 1);

        // jsep reports && and || as binary expressions; keep them short-circuiting
        if (binaryNode.operator === '&&') {
          return left && ExpressionEvaluator.evaluateNode(binaryNode.right, state, depth + 1);
        }
        if (binaryNode.operator === '||') {
          return left || ExpressionEvaluator.evaluateNode(binaryNode.right, state, depth + 1);
        }
        if (binaryNode.operator === '??') {
          return left ?? ExpressionEvaluator.evaluateNode(binaryNode.right, state, depth + 1);
        }

        const right = ExpressionEvaluator.evaluateNode(binaryNode.right, state, depth + 1);

        switch (binaryNode.operator) {
          case '+':
            if (typeof left === 'string' || typeof right === 'string') {
              return stringifyValue(left) + stringifyValue(right);
            }
            return toNumber(left) + toNumber(right);
          case '-':
            return toNumber(left) - toNumber(right);
          case '*':
            return toNumber(left) * toNumber(right);
          case '/':
            return toNumber(left) / toNumber(right);
          case '%':
            return toNumber(left) % toNumber(right);
          case '==':
            // biome-ignore lint/suspicious/noDoubleEquals: loose equality for the expression language
            return left == right;
          case '===':
            return left === right;
          case '!=':
            // biome-ignore lint/suspicious/noDoubleEquals: loose inequality for the expression language
            return left != right;
          case '!==':
            return left !== right;
          case '<':
            return compare(left, right) < 0;
          case '<=':
            return compare(left, right) <= 0;
          case '>':
            return compare(left, right) > 0;
          case '>=':
            return compare(left, right) >= 0;
          default:
            throw new ExpressionError(`Unsupported binary operator: ${binaryNode.operator}`);
        }
      }

      case 'UnaryExpression': {
        const unaryNode = node as jsep.UnaryExpression;
        const argument = ExpressionEvaluator.evaluateNode(unaryNode.argument, state, depth + 1);

        switch (unaryNode.operator) {
          case '-':
            return -toNumber(argument);
          case '+':
            return toNumber(argument);
          case '!':
            return !argument;
          default:
            throw new ExpressionError(`Unsupported unary operator: ${unaryNode.operator}`);
        }
      }

      case 'ConditionalExpression': {
        const conditionalNode = node as jsep.ConditionalExpression;
        const test = ExpressionEvaluator.evaluateNode(conditionalNode.test, state, depth + 1);
        return test
          ? ExpressionEvaluator.evaluateNode(conditionalNode.consequent, state, depth + 1)
          : ExpressionEvaluator.evaluateNode(conditionalNode.alternate, state, depth + 1);
      }

      case 'ArrayExpression': {
        const arrayNode = node as jsep.ArrayExpression;
        if (arrayNode.elements.length > ExpressionEvaluator.MAX_ARRAY_SIZE) {
          throw new ExpressionError(
            `Array literal exceeds maximum size of ${ExpressionEvaluator.MAX_ARRAY_SIZE} elements`
          );
        }
        return arrayNode.elements.map((elem) =>
          elem ? ExpressionEvaluator.evaluateNode(elem, state, depth + 1) : null
        );
      }

      case 'ObjectExpression': {
        const objectNode = node as ObjectExpression;
        const result: Record<string, unknown> = {};
        for (const prop of objectNode.properties) {
          const key =
            prop.key.type === 'Identifier' && !prop.computed
              ? (prop.key as jsep.Identifier).name
              : String(ExpressionEvaluator.evaluateNode(prop.key, state, depth + 1));
          ExpressionEvaluator.checkProperty(key);
          result[key] = ExpressionEvaluator.evaluateNode(prop.value ?? prop.key, state, depth + 1);
        }
        return result;
      }

      case 'CallExpression': {
        const callNode = node as jsep.CallExpression;

        if (callNode.callee.type === 'MemberExpression') {
          const memberNode = callNode.callee as jsep.MemberExpression;
          const object = ExpressionEvaluator.evaluateNode(memberNode.object, state, depth + 1);
          const methodName = String(ExpressionEvaluator.propertyKey(memberNode, state, depth));

          if (!SAFE_METHODS.has(methodName)) {
            throw new ExpressionError(`Method ${methodName} is not allowed`);
          }

          const args = ExpressionEvaluator.evaluateArgs(callNode.arguments, state, depth);
          const method = lookupMethod(object, methodName);

          if (!isCallable(method)) {
            throw new ExpressionError(`Cannot call method ${methodName} on ${typeof object}`);
          }
          // sort/reverse must not mutate values held in the context
          if (Array.isArray(object) && (methodName === 'sort' || methodName === 'reverse')) {
            return method.call([...object], ...args);
          }
          return method.call(object, ...args);
        }

        if (callNode.callee.type === 'Identifier') {
          const functionName = (callNode.callee as jsep.Identifier).name;
          const func = ExpressionEvaluator.evaluateNode(callNode.callee, state, depth + 1);
          if (!isCallable(func)) {
            throw new ExpressionError(`${functionName} is not a function`);
          }
          return func(...ExpressionEvaluator.evaluateArgs(callNode.arguments, state, depth));
        }

        throw new ExpressionError('Only method calls and safe function calls are supported');
      }

      case 'ArrowFunctionExpression':
        return ExpressionEvaluator.createArrowFunction(node as ArrowFunctionExpression, state, depth);

      default:
        throw new ExpressionError(`Unsupported expression type: ${node.type}`);
    }
  }

  /**
   * Turn an arrow function node into a callable. Parameters shadow
   * everything else while the body runs.
   */
  private static createArrowFunction(
    arrowNode: ArrowFunctionExpression,
    state: EvalState,
    depth: number
  ): (...args: unknown[]) => unknown {
    return (...args: unknown[]) => {
      const locals: Locals = { ...state.locals };
      (arrowNode.params ?? []).forEach((param, index) => {
        locals[param.name] = args[index];
      });
      return ExpressionEvaluator.evaluateNode(
        arrowNode.body,
        { context: state.context, locals, nodes: state.nodes },
        depth + 1
      );
    };
  }

  /**
   * Check if a string contains any expressions
   */
  static hasExpression(str: string): boolean {
    return !ExpressionEvaluator.scanExpressions(str).next().done;
  }

  /**
   * Parse every expression in a template without evaluating it.
   * Returns one message per expression that does not parse.
   */
  static syntaxErrors(template: string): string[] {
    const errors: string[] = [];
    try {
      ExpressionEvaluator.checkTemplate(template);
    } catch (error) {
      errors.push(error instanceof Error ? error.message : String(error));
    }
    for (const match of ExpressionEvaluator.scanExpressions(template)) {
      try {
        jsep(match.expr);
      } catch (error) {
        errors.push(
          `Invalid expression "${match.expr}": ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
    return errors;
  }

  /**
   * Extract step IDs that a template refers to via `steps.<id>`
   */
  static findStepReferences(template: string, bare = false): string[] {
    const references = new Set<string>();
    const expressions = bare
      ? [template]
      : [...ExpressionEvaluator.scanExpressions(template)].map((match) => match.expr);

    for (const expr of expressions) {
      try {
        ExpressionEvaluator.collectStepIds(jsep(expr), references);
      } catch {
        // syntaxErrors reports unparsable expressions
      }
    }
    return Array.from(references);
  }

  private static collectStepIds(node: jsep.Expression, references: Set<string>): void {
    if (node.type === 'MemberExpression') {
      const memberNode = node as jsep.MemberExpression;
      if (
        memberNode.object.type === 'Identifier' &&
        (memberNode.object as jsep.Identifier).name === 'steps'
      ) {
        if (memberNode.property.type === 'Identifier' && !memberNode.computed) {
          references.add((memberNode.property as jsep.Identifier).name);
        } else if (memberNode.property.type === 'Literal' && memberNode.computed) {
          references.add(String((memberNode.property as jsep.Literal).value));
        }
        return;
      }
    }

    for (const child of Object.values(node)) {
      const children = Array.isArray(child) ? child : [child];
      for (const item of children) {
        if (isAstNode(item)) {
          ExpressionEvaluator.collectStepIds(item, references);
        }
      }
    }
  }
}
