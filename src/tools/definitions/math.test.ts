import { describe, it, expect } from 'vitest';
import { createMathTool, evaluateExpression } from './math.js';

const tool = createMathTool();
const context = { signal: new AbortController().signal };

describe('math', () => {
  describe('schema validation', () => {
    it('accepts a valid expression', () => {
      expect(tool.inputSchema.safeParse({ expression: '2 + 2' }).success).toBe(true);
    });

    it('rejects missing or empty expressions', () => {
      expect(tool.inputSchema.safeParse({}).success).toBe(false);
      expect(tool.inputSchema.safeParse({ expression: '' }).success).toBe(false);
    });

    it('rejects expressions over the length limit', () => {
      expect(tool.inputSchema.safeParse({ expression: '1+'.repeat(501) }).success).toBe(false);
    });
  });

  describe('evaluateExpression', () => {
    it('respects operator precedence', () => {
      expect(evaluateExpression('15 * 23')).toBe(345);
      expect(evaluateExpression('2 + 3 * 4')).toBe(14);
      expect(evaluateExpression('(1 + 2) * 3')).toBe(9);
      expect(evaluateExpression('10 % 4')).toBe(2);
    });

    it('treats exponentiation as right-associative and tighter than unary minus', () => {
      expect(evaluateExpression('2 ** 3 ** 2')).toBe(512);
      expect(evaluateExpression('2 ^ 3')).toBe(8);
      expect(evaluateExpression('-2 ** 2')).toBe(-4);
    });

    it('supports functions and constants', () => {
      expect(evaluateExpression('sqrt(16) + max(1, 5)')).toBe(9);
      expect(evaluateExpression('round(PI * 100)')).toBe(314);
    });

    it('rejects division by zero', () => {
      expect(() => evaluateExpression('1 / 0')).toThrow('Division by zero');
      expect(() => evaluateExpression('5 % 0')).toThrow('Division by zero');
    });

    it('reports syntax errors', () => {
      expect(() => evaluateExpression('2 +')).toThrow('Unexpected end of expression');
      expect(() => evaluateExpression('2 $ 3')).toThrow("Unexpected character '$' at position 2");
      expect(() => evaluateExpression('1 2')).toThrow("Unexpected token '2' at position 1");
      expect(() => evaluateExpression('foo(1)')).toThrow("Unknown identifier 'foo'");
      expect(() => evaluateExpression('   ')).toThrow('Empty expression');
    });

    it('rejects non-finite results', () => {
      expect(() => evaluateExpression('log(0)')).toThrow('Result is not finite');
    });
  });

  describe('execution', () => {
    it('returns the expression with its result', async () => {
      const result = await tool.execute({ expression: '15 * 23' }, context);

      expect(result).toEqual({ ok: true, value: { expression: '15 * 23', result: 345 } });
    });

    it('fails on evaluation errors', async () => {
      const result = await tool.execute({ expression: '1 / 0' }, context);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Tool "math" execution failed: Division by zero');
    });

    it('fails once aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await tool.execute({ expression: '1 + 1' }, { signal: controller.signal });

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Tool "math" execution failed: Execution aborted');
    });
  });
});
