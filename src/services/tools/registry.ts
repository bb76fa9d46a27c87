// Tool Registry - Central registry for the tools the model may call
// Tools are registered on startup; the registry is read-only once frozen

import type { ProviderTool } from '../../providers/types.js';
import { isToolName, type ToolName, type ToolParameter, type ToolSpec } from './types.js';

export class ToolRegistry {
  private tools: Map<ToolName, ToolSpec> = new Map();
  private frozen = false;

  register(spec: ToolSpec): void {
    if (this.frozen) {
      throw new Error(`Tool registry is frozen; cannot register "${spec.name}"`);
    }
    if (this.tools.has(spec.name)) {
      throw new Error(`Tool "${spec.name}" is already registered`);
    }
    this.tools.set(spec.name, spec);
  }

  /** Model-supplied names are narrowed here; anything outside the closed set is unknown. */
  lookup(name: string): ToolSpec | undefined {
    return isToolName(name) ? this.tools.get(name) : undefined;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  list(): ToolSpec[] {
    return Array.from(this.tools.values());
  }

  get size(): number {
    return this.tools.size;
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  toFunctionDefinitions(): ProviderTool[] {
    return this.list().map(spec => ({
      type: 'function',
      function: {
        name: spec.name,
        description: spec.description,
        parameters: {
          type: 'object',
          properties: parametersToSchema(spec.parameters),
          required: spec.parameters.filter(p => p.required).map(p => p.name),
        },
      },
    }));
  }
}

function parametersToSchema(params: readonly ToolParameter[]): Record<string, unknown> {
  const schema: Record<string, unknown> = {};

  for (const param of params) {
    const paramSchema: Record<string, unknown> = {
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
