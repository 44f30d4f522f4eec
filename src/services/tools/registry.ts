// Tool Registry - explicit registry handed to the gateway and the agent factory
// One registry per runtime; nothing registers itself globally

import type { ToolDefinition, ToolParameter } from './types.js';
import { ToolRegistrationError } from '../../utils/errors.js';

export interface ParameterSchema {
  type: ToolParameter['type'];
  description: string;
  enum?: string[];
  default?: ToolParameter['default'];
}

export interface OpenAIFunctionDef {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, ParameterSchema>;
    required: string[];
  };
}

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new ToolRegistrationError(tool.name, 'a tool with this name is already registered');
    }
    if (!tool.execute && !tool.endpoint) {
      throw new ToolRegistrationError(tool.name, 'tool needs a local handler or a remote endpoint');
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Function definitions for the named tools, in the order given.
   * Unknown names are skipped.
   */
  toOpenAIFunctions(names: string[] = this.names()): OpenAIFunctionDef[] {
    return names
      .map(name => this.tools.get(name))
      .filter((tool): tool is ToolDefinition => tool !== undefined)
      .map(tool => ({
        name: tool.name,
        description: tool.description,
        parameters: {
          type: 'object',
          properties: this.parametersToOpenAISchema(tool.parameters),
          required: tool.parameters.filter(p => p.required).map(p => p.name),
        },
      }));
  }

  private parametersToOpenAISchema(params: ToolParameter[]): Record<string, ParameterSchema> {
    const schema: Record<string, ParameterSchema> = {};

    for (const param of params) {
      const paramSchema: ParameterSchema = {
        type: param.type,
        description: param.description,
      };

      if (param.enum) {
        paramSchema.enum = param.enum;
      }

      if (param.default !== undefined) {
        paramSchema.default = param.default;
      }

      schema[param.name] = paramSchema;
    }

    return schema;
  }
}
