/**
 * Math tool — safe arithmetic expression evaluation (no eval).
 *
 * Precedence-climbing parser over a regex tokenizer. Supports + - * / %,
 * exponentiation (`**` or `^`, right-associative), unary signs, parentheses,
 * the constants PI and E, and the functions listed in FUNCTIONS.
 */
import { z } from 'zod';

import { ToolExecutionError } from '@/core/errors.js';
import { err, ok } from '@/core/result.js';
import type { ExecutableTool } from '@/tools/types.js';

const MAX_EXPRESSION_LENGTH = 1000;

export const mathInputSchema = z.object({
  expression: z.string().min(1).max(MAX_EXPRESSION_LENGTH),
});

export const mathOutputSchema = z.object({
  expression: z.string(),
  result: z.number(),
});

export type MathOutput = z.infer<typeof mathOutputSchema>;

const CONSTANTS: Record<string, number> = {
  PI: Math.PI,
  E: Math.E,
};

const FUNCTIONS: Record<string, (...args: number[]) => number> = {
  sqrt: Math.sqrt,
  abs: Math.abs,
  ceil: Math.ceil,
  floor: Math.floor,
  round: Math.round,
  min: Math.min,
  max: Math.max,
  sin: Math.sin,
  cos: Math.cos,
  tan: Math.tan,
  log: Math.log,
  log2: Math.log2,
  log10: Math.log10,
};

// ─── Tokens ─────────────────────────────────────────────────────

const TOKEN_PATTERN = /\s*(\d+(?:\.\d*)?|\.\d+|[A-Za-z_]\w*|\*\*|[-+*/%^(),])/y;

function tokenize(expression: string): string[] {
  const tokens: string[] = [];
  TOKEN_PATTERN.lastIndex = 0;

  while (TOKEN_PATTERN.lastIndex < expression.length) {
    const start = TOKEN_PATTERN.lastIndex;
    const match = TOKEN_PATTERN.exec(expression);
    const token = match?.[1];
    if (token === undefined) {
      if (expression.slice(start).trim() === '') break;
      const offset = start + (expression.slice(start).length - expression.slice(start).trimStart().length);
      throw new Error(`Unexpected character '${expression.charAt(offset)}' at position ${String(offset)}`);
    }
    tokens.push(token);
  }

  return tokens;
}

// ─── Parser ─────────────────────────────────────────────────────

interface BinaryOperator {
  precedence: number;
  rightAssociative: boolean;
  apply: (left: number, right: number) => number;
}

function divide(left: number, right: number): number {
  if (right === 0) throw new Error('Division by zero');
  return left / right;
}

function remainder(left: number, right: number): number {
  if (right === 0) throw new Error('Division by zero');
  return left % right;
}

const BINARY_OPERATORS: Record<string, BinaryOperator> = {
  '+': { precedence: 1, rightAssociative: false, apply: (a, b) => a + b },
  '-': { precedence: 1, rightAssociative: false, apply: (a, b) => a - b },
  '*': { precedence: 2, rightAssociative: false, apply: (a, b) => a * b },
  '/': { precedence: 2, rightAssociative: false, apply: divide },
  '%': { precedence: 2, rightAssociative: false, apply: remainder },
  '**': { precedence: 4, rightAssociative: true, apply: Math.pow },
  '^': { precedence: 4, rightAssociative: true, apply: Math.pow },
};

/** Unary signs bind looser than exponentiation: -2 ** 2 is -(2 ** 2). */
const UNARY_PRECEDENCE = 3;

function evaluateTokens(tokens: string[]): number {
  let pos = 0;

  const peek = (): string | undefined => tokens[pos];
  const next = (): string | undefined => tokens[pos++];

  function expect(token: string, context: string): void {
    if (next() !== token) throw new Error(`Expected '${token}' ${context}`);
  }

  function parseOperand(): number {
    const token = next();
    if (token === undefined) throw new Error('Unexpected end of expression');

    if (token === '+' || token === '-') {
      const operand = parseExpression(UNARY_PRECEDENCE);
      return token === '-' ? -operand : operand;
    }

    if (token === '(') {
      const value = parseExpression(0);
      expect(')', 'to close parenthesis');
      return value;
    }

    if (/^[\d.]/.test(token)) {
      const value = Number(token);
      if (!Number.isFinite(value)) throw new Error(`Invalid number: ${token}`);
      return value;
    }

    const constant = Object.hasOwn(CONSTANTS, token) ? CONSTANTS[token] : undefined;
    if (constant !== undefined) return constant;

    const fn = Object.hasOwn(FUNCTIONS, token) ? FUNCTIONS[token] : undefined;
    if (fn) {
      expect('(', `after function '${token}'`);
      const args: number[] = [];
      if (peek() !== ')') {
        args.push(parseExpression(0));
        while (peek() === ',') {
          pos++;
          args.push(parseExpression(0));
        }
      }
      expect(')', `after arguments of '${token}'`);
      return fn(...args);
    }

    if (/^[A-Za-z_]/.test(token)) throw new Error(`Unknown identifier '${token}'`);
    throw new Error(`Unexpected token '${token}'`);
  }

  function parseExpression(minPrecedence: number): number {
    let left = parseOperand();

    for (;;) {
      const token = peek();
      const operator =
        token !== undefined && Object.hasOwn(BINARY_OPERATORS, token) ? BINARY_OPERATORS[token] : undefined;
      if (!operator || operator.precedence < minPrecedence) break;

      pos++;
      const nextMin = operator.rightAssociative ? operator.precedence : operator.precedence + 1;
      left = operator.apply(left, parseExpression(nextMin));
    }

    return left;
  }

  const result = parseExpression(0);
  const leftover = peek();
  if (leftover !== undefined) {
    throw new Error(`Unexpected token '${leftover}' at position ${String(pos)}`);
  }
  return result;
}

/** Evaluate an arithmetic expression. Throws on syntax errors and non-finite results. */
export function evaluateExpression(expression: string): number {
  const tokens = tokenize(expression);
  if (tokens.length === 0) throw new Error('Empty expression');
  const result = evaluateTokens(tokens);
  if (!Number.isFinite(result)) throw new Error('Result is not finite');
  return result;
}

// ─── Tool Factory ───────────────────────────────────────────────

/** Create the `math` tool. */
export function createMathTool(): ExecutableTool {
  return {
    name: 'math',
    description:
      'Evaluates arithmetic expressions. Supports +, -, *, /, %, ** (or ^), parentheses, ' +
      'functions (sqrt, abs, ceil, floor, round, min, max, sin, cos, tan, log, log2, log10) ' +
      'and constants PI, E.',
    category: 'math',
    inputSchema: mathInputSchema,
    outputSchema: mathOutputSchema,

    execute(input, context) {
      if (context.signal.aborted) {
        return Promise.resolve(err(new ToolExecutionError('math', 'Execution aborted')));
      }

      const parsed = mathInputSchema.safeParse(input);
      if (!parsed.success) {
        return Promise.resolve(err(new ToolExecutionError('math', 'Input must include a non-empty expression')));
      }

      try {
        const output: MathOutput = {
          expression: parsed.data.expression,
          result: evaluateExpression(parsed.data.expression),
        };
        return Promise.resolve(ok(output));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return Promise.resolve(err(new ToolExecutionError('math', message)));
      }
    },
  };
}
