import { z } from 'zod';

export interface JsonSchemaProperty {
  type: 'string' | 'number' | 'integer' | 'boolean';
  description: string;
  minimum?: number;
}

export interface ToolParameters {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

export interface ToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: ToolParameters;
  };
}

/** What the registry needs from a tool, independent of its argument type. */
export interface AgentTool {
  readonly name: string;
  toSchema(): ToolDefinition;
  run(params: Record<string, unknown>): Promise<string>;
}

export type ParamsCheck<P> = { ok: true; value: P } | { ok: false; errors: string[] };

export abstract class Tool<P> implements AgentTool {
  abstract get name(): string;
  abstract get description(): string;
  /** JSON schema advertised to the agent service. */
  abstract get parameters(): ToolParameters;
  /** Runtime validation of the arguments the agent sends. */
  protected abstract get argsSchema(): z.ZodType<P, z.ZodTypeDef, unknown>;

  abstract execute(params: P): Promise<string>;

  validateParams(params: Record<string, unknown>): ParamsCheck<P> {
    const result = this.argsSchema.safeParse(params);
    if (result.success) {
      return { ok: true, value: result.data };
    }
    return {
      ok: false,
      errors: result.error.issues.map(issue => `${issue.path.join('.') || 'params'}: ${issue.message}`),
    };
  }

  async run(params: Record<string, unknown>): Promise<string> {
    const check = this.validateParams(params);
    if (!check.ok) {
      return `Error: Invalid parameters for tool '${this.name}': ${check.errors.join('; ')}`;
    }
    return this.execute(check.value);
  }

  toSchema(): ToolDefinition {
    return {
      type: 'function',
      function: {
        name: this.name,
        description: this.description,
        parameters: this.parameters,
      },
    };
  }
}
