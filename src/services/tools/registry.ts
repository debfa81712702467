// Tool Registry - Central registry for all available tools
// Read-mostly; shared by every session once tools are registered at startup

import { z } from 'zod';
import type { JsonSchemaProperty, ToolSchema } from '../../providers/types.js';
import { createLogger } from '../../utils/logger.js';
import type { ToolDefinition, ToolParameter } from './types.js';

const log = createLogger('tools');

type ArgumentSchema = z.ZodType<Record<string, unknown>>;

interface RegisteredTool {
  definition: ToolDefinition;
  argumentSchema: ArgumentSchema;
}

function baseSchema(param: ToolParameter): z.ZodTypeAny {
  switch (param.type) {
    case 'string': {
      const allowed = param.enum;
      if (!allowed || allowed.length === 0) return z.string();
      return z.string().refine(value => allowed.includes(value), {
        message: `Expected one of: ${allowed.join(', ')}`,
      });
    }
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(z.unknown());
    case 'object':
      return z.record(z.unknown());
  }
}

function parameterSchema(param: ToolParameter): z.ZodTypeAny {
  const schema = baseSchema(param);
  if (param.required) {
    return schema;
  }
  return param.default !== undefined ? schema.default(param.default) : schema.optional();
}

export function buildArgumentSchema(params: ToolParameter[]): ArgumentSchema {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const param of params) {
    shape[param.name] = parameterSchema(param);
  }
  return z.object(shape).passthrough();
}

export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      log.warn({ tool: tool.name }, 'Tool already registered, overwriting');
    }
    this.tools.set(tool.name, {
      definition: tool,
      argumentSchema: buildArgumentSchema(tool.parameters),
    });
  }

  /** Looks a tool up by name; `undefined` means the engine asked for an unknown tool. */
  resolve(name: string): ToolDefinition | undefined {
    return this.tools.get(name)?.definition;
  }

  argumentSchema(name: string): ArgumentSchema | undefined {
    return this.tools.get(name)?.argumentSchema;
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values(), entry => entry.definition);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  toToolSchema(): ToolSchema[] {
    return this.getAll().map(tool => ({
      name: tool.name,
      description: tool.description,
      parameters: {
        type: 'object',
        properties: this.parametersToJsonSchema(tool.parameters),
        required: tool.parameters.filter(p => p.required).map(p => p.name),
      },
    }));
  }

  private parametersToJsonSchema(params: ToolParameter[]): Record<string, JsonSchemaProperty> {
    const schema: Record<string, JsonSchemaProperty> = {};

    for (const param of params) {
      const paramSchema: JsonSchemaProperty = {
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
