// src/agent/tools/types.ts
import type { z } from 'zod';
import type { ToolData, ToolName } from '@/types/core';
import { ToolExecutionError } from '@/utils/errors';

export interface ToolContext {
  signal?: AbortSignal;
}

/** Typed definition: parameters are validated by `schema` before `execute` sees them. */
export interface ToolDefinition<P> {
  name: ToolName;
  description: string;
  schema: z.ZodType<P, z.ZodTypeDef, unknown>;
  execute(params: P, ctx: ToolContext): Promise<ToolData>;
}

/** Type-erased tool as stored in the registry. */
export interface AgentTool {
  name: ToolName;
  description: string;
  run(params: unknown, ctx: ToolContext): Promise<ToolData>;
}

export function defineTool<P>(definition: ToolDefinition<P>): AgentTool {
  return {
    name: definition.name,
    description: definition.description,
    async run(params, ctx) {
      const parsed = definition.schema.safeParse(params);
      if (!parsed.success) {
        const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'params'}: ${i.message}`).join('; ');
        throw new ToolExecutionError(definition.name, `Invalid parameters for ${definition.name}: ${detail}`);
      }
      return definition.execute(parsed.data, ctx);
    },
  };
}
