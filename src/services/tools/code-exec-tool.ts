// Code Execution Tool
// Exposes the sandbox executor to agents as `execute_code`

import type { SandboxExecutor } from '../sandbox/sandbox-executor.js';
import { errorResult, type ToolDefinition } from './types.js';

export function createCodeExecTool(executor: SandboxExecutor, allowedModules: string[]): ToolDefinition {
  const modules = allowedModules.length > 0 ? allowedModules.join(', ') : 'none';
  return {
    name: 'execute_code',
    description:
      'Execute JavaScript in an isolated sandbox. Assign the final value to a variable named `result`; ' +
      'lines printed with console.log are returned before it. ' +
      `Only these modules can be imported: ${modules}. No file system or network access.`,
    parameters: [
      {
        name: 'code',
        type: 'string',
        description: 'JavaScript source to execute',
        required: true,
      },
    ],
    execute: async args => {
      if (typeof args.code !== 'string') {
        return errorResult('ValidationError', 'Code is required');
      }
      return executor.run(args.code);
    },
  };
}
