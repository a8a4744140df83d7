import { isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';
import type { Scope } from '../runtime/Scope.js';
import { getBuiltin } from './builtins.js';
import { ConfigurationError, EvaluationError } from './errors.js';
import {
  addValues,
  compareValues,
  getOwn,
  setOwn,
  isTruthy,
  looseEquals,
  strictEquals,
  toNumber,
  toText,
} from './ExpressionValue.js';

type TokenType =
  | 'number'
  | 'string'
  | 'identifier'
  | 'operator'
  | 'punctuation'
  | 'boolean'
  | 'null'
  | 'eof';

interface Token {
  type: TokenType;
  value: string;
  position: number;
}

interface LiteralNode {
  type: 'Literal';
  value: JsonValue;
}

interface IdentifierNode {
  type: 'Identifier';
  name: string;
}

interface UnaryNode {
  type: 'UnaryExpression';
  operator: string;
  argument: ASTNode;
}

interface BinaryNode {
  type: 'BinaryExpression';
  operator: string;
  left: ASTNode;
  right: ASTNode;
}

interface LogicalNode {
  type: 'LogicalExpression';
  operator: '&&' | '||';
  left: ASTNode;
  right: ASTNode;
}

interface ConditionalNode {
  type: 'ConditionalExpression';
  test: ASTNode;
  consequent: ASTNode;
  alternate: ASTNode;
}

interface MemberNode {
  type: 'MemberExpression';
  object: ASTNode;
  property: ASTNode;
  computed: boolean;
}

interface CallNode {
  type: 'CallExpression';
  callee: ASTNode;
  arguments: ASTNode[];
}

type ASTNode =
  | LiteralNode
  | IdentifierNode
  | UnaryNode
  | BinaryNode
  | LogicalNode
  | ConditionalNode
  | MemberNode
  | CallNode;

const THREE_CHAR_OPERATORS = new Set(['===', '!==']);
const TWO_CHAR_OPERATORS = new Set(['==', '!=', '>=', '<=', '&&', '||']);
const SINGLE_CHAR_OPERATORS = new Set(['+', '-', '*', '/', '%', '>', '<', '!', '=', '?', ':']);
const PUNCTUATION = new Set(['(', ')', '.', ',', ';', '[', ']']);

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  const length = input.length;
  let position = 0;

  const isWhitespace = (char: string) => /\s/.test(char);
  const isDigit = (char: string) => /[0-9]/.test(char);
  const isIdentifierStart = (char: string) => /[A-Za-z_$]/.test(char);
  const isIdentifierPart = (char: string) => /[A-Za-z0-9_$]/.test(char);

  while (position < length) {
    const char = input[position];

    if (isWhitespace(char)) {
      position += 1;
      continue;
    }

    if (char === '"' || char === '\'') {
      const start = position;
      let value = '';
      let closed = false;
      position += 1;
      while (position < length) {
        const current = input[position];
        if (current === char) {
          position += 1;
          closed = true;
          break;
        }
        if (current === '\\' && position + 1 < length) {
          const next = input[position + 1];
          value += next === 'n' ? '\n' : next === 't' ? '\t' : next;
          position += 2;
          continue;
        }
        value += current;
        position += 1;
      }
      if (!closed) {
        throw new Error(`Unterminated string starting at position ${start}`);
      }
      tokens.push({ type: 'string', value, position: start });
      continue;
    }

    if (isDigit(char) || (char === '.' && isDigit(input[position + 1] ?? ''))) {
      const start = position;
      let value = char;
      position += 1;
      while (position < length && /[0-9.]/.test(input[position])) {
        value += input[position];
        position += 1;
      }
      if (Number.isNaN(Number(value))) {
        throw new Error(`Invalid number '${value}' at position ${start}`);
      }
      tokens.push({ type: 'number', value, position: start });
      continue;
    }

    if (THREE_CHAR_OPERATORS.has(input.slice(position, position + 3))) {
      tokens.push({ type: 'operator', value: input.slice(position, position + 3), position });
      position += 3;
      continue;
    }

    if (TWO_CHAR_OPERATORS.has(input.slice(position, position + 2))) {
      tokens.push({ type: 'operator', value: input.slice(position, position + 2), position });
      position += 2;
      continue;
    }

    if (SINGLE_CHAR_OPERATORS.has(char)) {
      tokens.push({ type: 'operator', value: char, position });
      position += 1;
      continue;
    }

    if (PUNCTUATION.has(char)) {
      tokens.push({ type: 'punctuation', value: char, position });
      position += 1;
      continue;
    }

    if (isIdentifierStart(char)) {
      const start = position;
      let identifier = char;
      position += 1;
      while (position < length && isIdentifierPart(input[position])) {
        identifier += input[position];
        position += 1;
      }

      if (identifier === 'true' || identifier === 'false') {
        tokens.push({ type: 'boolean', value: identifier, position: start });
        continue;
      }

      if (identifier === 'null') {
        tokens.push({ type: 'null', value: identifier, position: start });
        continue;
      }

      tokens.push({ type: 'identifier', value: identifier, position: start });
      continue;
    }

    throw new Error(`Unexpected character '${char}' at position ${position}`);
  }

  tokens.push({ type: 'eof', value: '', position });
  return tokens;
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parseProgram(): ASTNode {
    const expression = this.parseExpression();
    const trailing = this.peek();
    if (trailing.type !== 'eof') {
      throw new Error(`Unexpected token '${trailing.value}' at position ${trailing.position}`);
    }
    return expression;
  }

  private parseExpression(): ASTNode {
    return this.parseConditional();
  }

  private parseConditional(): ASTNode {
    const test = this.parseLogicalOr();
    if (!this.matchOperator('?')) {
      return test;
    }
    const consequent = this.parseConditional();
    if (!this.matchOperator(':')) {
      throw new Error(`Expected ':' at position ${this.peek().position}`);
    }
    const alternate = this.parseConditional();
    return { type: 'ConditionalExpression', test, consequent, alternate };
  }

  private parseLogicalOr(): ASTNode {
    let left = this.parseLogicalAnd();
    while (this.matchOperator('||')) {
      const right = this.parseLogicalAnd();
      left = { type: 'LogicalExpression', operator: '||', left, right };
    }
    return left;
  }

  private parseLogicalAnd(): ASTNode {
    let left = this.parseEquality();
    while (this.matchOperator('&&')) {
      const right = this.parseEquality();
      left = { type: 'LogicalExpression', operator: '&&', left, right };
    }
    return left;
  }

  private parseEquality(): ASTNode {
    let left = this.parseRelational();
    while (true) {
      const operator = this.matchAnyOperator(['===', '!==', '==', '!=', '=']);
      if (!operator) {
        break;
      }
      const right = this.parseRelational();
      left = { type: 'BinaryExpression', operator: operator === '=' ? '==' : operator, left, right };
    }
    return left;
  }

  private parseRelational(): ASTNode {
    let left = this.parseAdditive();
    while (true) {
      const operator = this.matchAnyOperator(['>=', '<=', '>', '<']);
      if (!operator) {
        break;
      }
      const right = this.parseAdditive();
      left = { type: 'BinaryExpression', operator, left, right };
    }
    return left;
  }

  private parseAdditive(): ASTNode {
    let left = this.parseMultiplicative();
    while (true) {
      const operator = this.matchAnyOperator(['+', '-']);
      if (!operator) {
        break;
      }
      const right = this.parseMultiplicative();
      left = { type: 'BinaryExpression', operator, left, right };
    }
    return left;
  }

  private parseMultiplicative(): ASTNode {
    let left = this.parseUnary();
    while (true) {
      const operator = this.matchAnyOperator(['*', '/', '%']);
      if (!operator) {
        break;
      }
      const right = this.parseUnary();
      left = { type: 'BinaryExpression', operator, left, right };
    }
    return left;
  }

  private parseUnary(): ASTNode {
    const operator = this.matchAnyOperator(['!', '-']);
    if (operator) {
      const argument = this.parseUnary();
      return { type: 'UnaryExpression', operator, argument };
    }
    return this.parseMember();
  }

  private parseMember(): ASTNode {
    let object = this.parsePrimary();

    while (true) {
      if (this.matchPunctuation('.')) {
        const propertyToken = this.consume();
        // Keywords are valid property names (`body.null`, `item.true`).
        if (propertyToken.type !== 'identifier' && propertyToken.type !== 'boolean' && propertyToken.type !== 'null') {
          throw new Error(`Expected identifier after '.' at position ${propertyToken.position}`);
        }
        object = {
          type: 'MemberExpression',
          object,
          property: { type: 'Literal', value: propertyToken.value },
          computed: false,
        };
        continue;
      }

      if (this.matchPunctuation('[')) {
        const property = this.parseExpression();
        this.expectPunctuation(']');
        object = { type: 'MemberExpression', object, property, computed: true };
        continue;
      }

      if (this.matchPunctuation('(')) {
        const args: ASTNode[] = [];
        if (!this.checkPunctuation(')')) {
          do {
            args.push(this.parseExpression());
          } while (this.matchPunctuation(',') || this.matchPunctuation(';'));
        }
        this.expectPunctuation(')');
        object = { type: 'CallExpression', callee: object, arguments: args };
        continue;
      }

      break;
    }

    return object;
  }

  private parsePrimary(): ASTNode {
    const token = this.consume();
    switch (token.type) {
      case 'number':
        return { type: 'Literal', value: Number(token.value) };
      case 'string':
        return { type: 'Literal', value: token.value };
      case 'boolean':
        return { type: 'Literal', value: token.value === 'true' };
      case 'null':
        return { type: 'Literal', value: null };
      case 'identifier':
        return { type: 'Identifier', name: token.value };
      case 'punctuation':
        if (token.value === '(') {
          const expression = this.parseExpression();
          this.expectPunctuation(')');
          return expression;
        }
        throw new Error(`Unexpected token '${token.value}' at position ${token.position}`);
      case 'eof':
        throw new Error('Unexpected end of expression');
      default:
        throw new Error(`Unexpected token '${token.value}' at position ${token.position}`);
    }
  }

  private peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private consume(): Token {
    const token = this.peek();
    this.index += 1;
    return token;
  }

  private matchOperator(operator: string): boolean {
    const token = this.peek();
    if (token.type === 'operator' && token.value === operator) {
      this.index += 1;
      return true;
    }
    return false;
  }

  private matchAnyOperator(operators: readonly string[]): string | null {
    const token = this.peek();
    if (token.type === 'operator' && operators.includes(token.value)) {
      this.index += 1;
      return token.value;
    }
    return null;
  }

  private matchPunctuation(punctuation: string): boolean {
    const token = this.peek();
    if (token.type === 'punctuation' && token.value === punctuation) {
      this.index += 1;
      return true;
    }
    return false;
  }

  private expectPunctuation(punctuation: string): void {
    const token = this.peek();
    if (token.type !== 'punctuation' || token.value !== punctuation) {
      throw new Error(`Expected '${punctuation}' at position ${token.position}`);
    }
    this.index += 1;
  }

  private checkPunctuation(punctuation: string): boolean {
    const token = this.peek();
    return token.type === 'punctuation' && token.value === punctuation;
  }
}

type TemplateSegment =
  | { kind: 'text'; text: string }
  | { kind: 'expression'; source: string; ast: ASTNode };

export interface ParsedTemplate {
  source: string;
  segments: TemplateSegment[];
}

export const SPLICE_KEY = '{{...}}';
const TEMPLATE_CACHE_LIMIT = 5000;
const templateCache = new Map<string, ParsedTemplate>();

export function hasTemplate(value: string): boolean {
  return value.includes('{{');
}

function findExpressionEnd(source: string, from: number): number {
  let quote: string | null = null;
  for (let index = from; index < source.length; index += 1) {
    const char = source[index];
    if (quote) {
      if (char === '\\') {
        index += 1;
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }
    if (char === '"' || char === '\'') {
      quote = char;
      continue;
    }
    if (char === '}' && source[index + 1] === '}') {
      return index;
    }
  }
  return -1;
}

function compileExpression(source: string): ASTNode {
  if (source.trim() === '') {
    return { type: 'Literal', value: null };
  }
  return new Parser(tokenize(source)).parseProgram();
}

/**
 * Splits a string into literal text and `{{ }}` expressions. Results are cached
 * per source string; a syntax error is raised as an `EvaluationError`.
 */
export function parseTemplate(source: string, expressionPath = '$'): ParsedTemplate {
  const cached = templateCache.get(source);
  if (cached) {
    return cached;
  }

  const segments: TemplateSegment[] = [];
  let cursor = 0;
  while (cursor < source.length) {
    const start = source.indexOf('{{', cursor);
    if (start === -1) {
      segments.push({ kind: 'text', text: source.slice(cursor) });
      break;
    }
    if (start > cursor) {
      segments.push({ kind: 'text', text: source.slice(cursor, start) });
    }
    const end = findExpressionEnd(source, start + 2);
    if (end === -1) {
      throw new EvaluationError(`Unterminated expression in "${source}"`, { expressionPath, expression: source });
    }
    const expression = source.slice(start + 2, end);
    try {
      segments.push({ kind: 'expression', source: expression.trim(), ast: compileExpression(expression) });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new EvaluationError(`Invalid expression "{{${expression}}}": ${reason}`, {
        expressionPath,
        expression,
        cause: error,
      });
    }
    cursor = end + 2;
  }

  const parsed: ParsedTemplate = { source, segments };
  if (templateCache.size >= TEMPLATE_CACHE_LIMIT) {
    templateCache.clear();
  }
  templateCache.set(source, parsed);
  return parsed;
}

export interface EvaluateOptions {
  /** Location of the template inside the definition, used in error messages. */
  path?: string;
  /** Unresolved references raise `ConfigurationError` instead of yielding null. */
  strict?: boolean;
}

interface EvaluationFrame {
  scope: Scope;
  path: string;
  expression: string;
}

function evaluateNode(node: ASTNode, frame: EvaluationFrame): JsonValue | undefined {
  switch (node.type) {
    case 'Literal':
      return node.value;
    case 'Identifier':
      return resolveIdentifier(node.name, frame.scope);
    case 'UnaryExpression': {
      const argument = evaluateNode(node.argument, frame) ?? null;
      return node.operator === '!' ? !isTruthy(argument) : -toNumber(argument);
    }
    case 'BinaryExpression':
      return evaluateBinary(node, frame);
    case 'LogicalExpression': {
      const left = evaluateNode(node.left, frame) ?? null;
      if (node.operator === '&&') {
        return isTruthy(left) ? evaluateNode(node.right, frame) : left;
      }
      return isTruthy(left) ? left : evaluateNode(node.right, frame);
    }
    case 'ConditionalExpression':
      return isTruthy(evaluateNode(node.test, frame) ?? null)
        ? evaluateNode(node.consequent, frame)
        : evaluateNode(node.alternate, frame);
    case 'MemberExpression':
      return evaluateMember(node, frame);
    case 'CallExpression':
      return evaluateCall(node, frame);
  }
}

function resolveIdentifier(name: string, scope: Scope): JsonValue | undefined {
  const value = scope.lookup(name);
  if (value !== undefined) {
    return value;
  }
  if (name === 'now') {
    return scope.now().toISOString();
  }
  if (name === 'timestamp') {
    return Math.floor(scope.now().getTime() / 1000);
  }
  return undefined;
}

function evaluateBinary(node: BinaryNode, frame: EvaluationFrame): JsonValue {
  const left = evaluateNode(node.left, frame) ?? null;
  const right = evaluateNode(node.right, frame) ?? null;

  switch (node.operator) {
    case '+':
      return addValues(left, right);
    case '-':
      return toNumber(left) - toNumber(right);
    case '*':
      return toNumber(left) * toNumber(right);
    case '/':
      return toNumber(left) / toNumber(right);
    case '%':
      return toNumber(left) % toNumber(right);
    case '<':
      return compareValues(left, right) < 0;
    case '>':
      return compareValues(left, right) > 0;
    case '<=':
      return compareValues(left, right) <= 0;
    case '>=':
      return compareValues(left, right) >= 0;
    case '==':
      return looseEquals(left, right);
    case '!=':
      return !looseEquals(left, right);
    case '===':
      return strictEquals(left, right);
    case '!==':
      return !strictEquals(left, right);
    default:
      throw new EvaluationError(`Unsupported operator ${node.operator}`, {
        expressionPath: frame.path,
        expression: frame.expression,
      });
  }
}

function evaluateMember(node: MemberNode, frame: EvaluationFrame): JsonValue | undefined {
  const object = evaluateNode(node.object, frame);
  if (object === undefined || object === null) {
    return undefined;
  }

  const property = evaluateNode(node.property, frame) ?? null;

  if (Array.isArray(object)) {
    if (typeof property === 'number') {
      return Number.isInteger(property) ? object[property] : undefined;
    }
    const key = toText(property);
    if (key === 'length') {
      return object.length;
    }
    if (/^\d+$/.test(key)) {
      return object[Number(key)];
    }
    // Property access on a list projects the property over its items.
    return object.map(item => (isJsonObject(item) ? getOwn(item, key) ?? null : null));
  }

  if (isJsonObject(object)) {
    return getOwn(object, toText(property));
  }

  if (typeof object === 'string') {
    if (property === 'length') {
      return object.length;
    }
    if (typeof property === 'number' && Number.isInteger(property)) {
      return object.charAt(property) || undefined;
    }
  }

  return undefined;
}

function evaluateCall(node: CallNode, frame: EvaluationFrame): JsonValue {
  if (node.callee.type !== 'Identifier') {
    throw new EvaluationError(`Only named functions can be called in "${frame.expression}"`, {
      expressionPath: frame.path,
      expression: frame.expression,
    });
  }
  const name = node.callee.name;
  const args = node.arguments.map(argument => evaluateNode(argument, frame) ?? null);

  const builtin = getBuiltin(name);
  if (builtin) {
    try {
      return builtin(args, { now: () => frame.scope.now() });
    } catch (error) {
      if (error instanceof EvaluationError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new EvaluationError(`Function ${name}() failed: ${reason}`, {
        expressionPath: frame.path,
        expression: frame.expression,
        functionName: name,
        cause: error,
      });
    }
  }

  const functions = frame.scope.app.functions;
  if (functions.has(name)) {
    return functions.call(name, args, frame.path);
  }

  throw new EvaluationError(`Unknown function "${name}"`, {
    expressionPath: frame.path,
    expression: frame.expression,
    functionName: name,
  });
}

function evaluateString(source: string, scope: Scope, path: string, strict: boolean): JsonValue {
  if (!hasTemplate(source)) {
    return source;
  }
  const template = parseTemplate(source, path);

  const evaluateSegment = (segment: Extract<TemplateSegment, { kind: 'expression' }>): JsonValue => {
    const value = evaluateNode(segment.ast, { scope, path, expression: segment.source });
    if (value === undefined) {
      if (strict) {
        throw new ConfigurationError(`Unresolved reference "{{${segment.source}}}" in ${path}`);
      }
      return null;
    }
    return value;
  };

  const [only] = template.segments;
  if (template.segments.length === 1 && only.kind === 'expression') {
    return evaluateSegment(only);
  }

  return template.segments
    .map(segment => (segment.kind === 'text' ? segment.text : toText(evaluateSegment(segment))))
    .join('');
}

function evaluateObject(template: JsonObject, scope: Scope, path: string): JsonObject {
  const result: JsonObject = {};

  const splice = getOwn(template, SPLICE_KEY);
  if (splice !== undefined) {
    const spliced = evaluateValue(splice, scope, `${path}.${SPLICE_KEY}`, false);
    if (isJsonObject(spliced)) {
      for (const [key, value] of Object.entries(spliced)) {
        setOwn(result, key, value);
      }
    } else if (spliced !== null) {
      throw new EvaluationError(`Splice directive at ${path} must evaluate to a collection`, {
        expressionPath: path,
        expression: typeof splice === 'string' ? splice : undefined,
      });
    }
  }

  for (const [rawKey, value] of Object.entries(template)) {
    if (rawKey === SPLICE_KEY) {
      continue;
    }
    const key = hasTemplate(rawKey) ? toText(evaluateString(rawKey, scope, `${path}.${rawKey}`, false)) : rawKey;
    setOwn(result, key, evaluateValue(value, scope, `${path}.${rawKey}`, false));
  }

  return result;
}

function evaluateValue(template: JsonValue, scope: Scope, path: string, strict: boolean): JsonValue {
  if (typeof template === 'string') {
    return evaluateString(template, scope, path, strict);
  }
  if (Array.isArray(template)) {
    return template.map((entry, index) => evaluateValue(entry, scope, `${path}[${index}]`, strict));
  }
  if (isJsonObject(template)) {
    return evaluateObject(template, scope, path);
  }
  return template;
}

/**
 * Evaluates a JSON template against a scope. Values without `{{` come back
 * unchanged; a string holding exactly one expression yields that expression's raw
 * value, while mixed strings are concatenated as text.
 */
export function evaluate(template: JsonValue | undefined, scope: Scope, options: EvaluateOptions = {}): JsonValue {
  if (template === undefined) {
    return null;
  }
  return evaluateValue(template, scope, options.path ?? '$', options.strict ?? false);
}

export function evaluateCondition(
  template: JsonValue | undefined,
  scope: Scope,
  fallback: boolean,
  options: EvaluateOptions = {},
): boolean {
  if (template === undefined) {
    return fallback;
  }
  return isTruthy(evaluate(template, scope, options));
}

export function evaluateText(template: JsonValue | undefined, scope: Scope, options: EvaluateOptions = {}): string {
  return toText(evaluate(template, scope, options));
}
