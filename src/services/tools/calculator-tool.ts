// Calculator Tool
// Performs mathematical calculations safely using mathjs

import { evaluate, format } from 'mathjs';
import { errorMessage } from '../../utils/errors.js';
import { errorResult, okResult, type ToolDefinition } from './types.js';

export const calculatorTool: ToolDefinition = {
  name: 'calculator',
  description:
    'Perform mathematical calculations. Supports arithmetic, algebra, trigonometry, statistics and unit conversion.',
  parameters: [
    {
      name: 'expression',
      type: 'string',
      description: 'Mathematical expression to evaluate (e.g., "2 + 2", "sin(pi/2)", "mean([3, 5, 7])")',
      required: true,
    },
  ],
  execute: async args => {
    const expression = typeof args.expression === 'string' ? args.expression.trim() : '';
    if (!expression) {
      return errorResult('ValidationError', 'Expression is required');
    }

    try {
      // format() keeps 0.1 + 0.2 readable and handles matrices, units and big numbers
      const result: unknown = evaluate(expression);
      return okResult(format(result, { precision: 14 }));
    } catch (error) {
      return errorResult('ApplicationError', `Failed to evaluate expression: ${errorMessage(error)}`);
    }
  },
};
