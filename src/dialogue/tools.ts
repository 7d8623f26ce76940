import { z } from 'zod';
import { log } from '../log';
import type { ToolCall, ToolSpec } from '../speech/types';

type ToolOutput = string | void;

export interface ToolDefinition<Name extends string, Shape extends z.ZodRawShape> {
  name: Name;
  description: string;
  args: Shape;
  handler: (args: z.infer<z.ZodObject<Shape>>) => ToolOutput | Promise<ToolOutput>;
}

export type InvokeResult =
  | { ok: true; output: string | undefined }
  | { ok: false; issues: string };

export interface ToolBinding<Name extends string = string> {
  readonly name: Name;
  readonly spec: ToolSpec;
  invoke(rawArgs: Record<string, unknown>): Promise<InvokeResult>;
}

export function defineTool<Name extends string, Shape extends z.ZodRawShape>(
  definition: ToolDefinition<Name, Shape>,
): ToolBinding<Name> {
  const schema = z.object(definition.args);
  return {
    name: definition.name,
    spec: {
      name: definition.name,
      description: definition.description,
      parameters: Object.keys(definition.args),
    },
    async invoke(rawArgs) {
      const parsed = schema.safeParse(rawArgs);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join(', ');
        return { ok: false, issues };
      }
      const output = await definition.handler(parsed.data);
      return { ok: true, output: typeof output === 'string' ? output : undefined };
    },
  };
}

/** Closed table of tools for one stage or task, keyed by tool name. */
export class Toolbox<Name extends string = string> {
  private readonly table = new Map<string, ToolBinding<Name>>();

  constructor(bindings: Array<ToolBinding<Name>>) {
    for (const binding of bindings) {
      this.table.set(binding.name, binding);
    }
  }

  public specs(): ToolSpec[] {
    return Array.from(this.table.values(), (binding) => binding.spec);
  }

  public names(): string[] {
    return Array.from(this.table.keys());
  }

  /** Unknown tools and invalid arguments are dropped with a warning. */
  public async dispatch(
    call: ToolCall,
    logContext: Record<string, unknown>,
  ): Promise<string | undefined> {
    const binding = this.table.get(call.name);
    if (!binding) {
      log.warn(
        { event: 'tool_call_unknown', tool: call.name, tool_call_id: call.id, ...logContext },
        'unknown tool call ignored',
      );
      return undefined;
    }

    const result = await binding.invoke(call.arguments);
    if (!result.ok) {
      log.warn(
        {
          event: 'tool_call_invalid_arguments',
          tool: call.name,
          tool_call_id: call.id,
          issues: result.issues,
          ...logContext,
        },
        'tool call arguments rejected',
      );
      return undefined;
    }

    return result.output;
  }
}
