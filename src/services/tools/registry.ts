// Tool Registry - Central registry for all available tools
// Tools are registered on startup; the registry is read-only while serving requests

import type { Logger } from 'pino';
import type { ParameterSchema, ProviderFunctionDef } from '../../providers/types.js';
import type { ToolDefinition, ToolParameter } from './types.js';

export type { ParameterSchema, ProviderFunctionDef };

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  constructor(private readonly log?: Logger) {}

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      this.log?.warn(`Tool "${tool.name}" already registered, overwriting`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  toProviderFunctions(): ProviderFunctionDef[] {
    return Array.from(this.tools.values()).map(tool => ({
      name: tool.name,
      description: tool.description,
      parameters: {
        type: 'object',
        properties: this.parametersToSchema(tool.parameters),
        required: tool.parameters.filter(p => p.required).map(p => p.name),
      },
    }));
  }

  private parametersToSchema(params: ToolParameter[]): Record<string, ParameterSchema> {
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
