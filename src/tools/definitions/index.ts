// Individual tool implementations
export { createMathTool, evaluateExpression, mathInputSchema, mathOutputSchema } from './math.js';
export type { MathOutput } from './math.js';
