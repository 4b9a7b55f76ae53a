/**
 * Tool Registry
 *
 * Closed, statically declared set of analysis tools. Dispatch is a lookup by
 * name; arguments are validated against the tool's schema before anything
 * runs, and every outcome (success or failure) comes back as a ToolResult.
 */

import { z } from 'zod';
import { InvalidInputError, NotFoundError, wrapError } from '../core/errors.js';
import type {
  JSONSchema,
  Logger,
  TablePayload,
  ToolDeclaration,
  ToolInvocationRequest,
  ToolPayload,
  ToolResult,
} from '../core/types.js';
import { getLogger } from '../logging/logger.js';

export interface ToolContext {
  sessionId: string;
  callId: string;
  signal?: AbortSignal;
  /** Resolve a table produced by an earlier tool call in this conversation */
  lookupTable(resultId: string): TablePayload | undefined;
}

export type ArgumentValidation =
  | { ok: true; arguments: Record<string, unknown> }
  | { ok: false; issues: string[] };

export interface AnalysisTool {
  readonly declaration: ToolDeclaration;
  validate(args: unknown): ArgumentValidation;
  run(args: unknown, context: ToolContext): Promise<ToolPayload>;
}

/**
 * What the reasoning engine needs to know about the toolset.
 */
export interface ToolCatalog {
  declarations(): ToolDeclaration[];
  validate(toolName: string, args: unknown): ArgumentValidation;
}

export interface ToolSpec<TArgs extends Record<string, unknown>> {
  name: string;
  description: string;
  inputSchema: JSONSchema;
  args: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  execute(args: TArgs, context: ToolContext): Promise<ToolPayload>;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

export function defineTool<TArgs extends Record<string, unknown>>(spec: ToolSpec<TArgs>): AnalysisTool {
  const validate = (args: unknown): { ok: true; arguments: TArgs } | { ok: false; issues: string[] } => {
    const parsed = spec.args.safeParse(args ?? {});
    return parsed.success ? { ok: true, arguments: parsed.data } : { ok: false, issues: formatIssues(parsed.error) };
  };

  return {
    declaration: Object.freeze({ name: spec.name, description: spec.description, inputSchema: spec.inputSchema }),
    validate,
    async run(args, context) {
      const result = validate(args);
      if (!result.ok) {
        throw new InvalidInputError(`Invalid arguments for ${spec.name}`, result.issues);
      }
      return spec.execute(result.arguments, context);
    },
  };
}

export class ToolRegistry implements ToolCatalog {
  private tools: Map<string, AnalysisTool> = new Map();
  private logger: Logger;

  constructor(tools: AnalysisTool[] = [], logger?: Logger) {
    this.logger = logger ?? getLogger();
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /**
   * Register a tool. Names are unique.
   */
  register(tool: AnalysisTool): void {
    const name = tool.declaration.name;
    if (this.tools.has(name)) {
      throw new InvalidInputError(`Tool already registered: ${name}`);
    }
    this.tools.set(name, tool);
    this.logger.debug('tool_registered', { tool: name });
  }

  get(name: string): AnalysisTool | null {
    return this.tools.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  declarations(): ToolDeclaration[] {
    return [...this.tools.values()].map(tool => tool.declaration);
  }

  validate(toolName: string, args: unknown): ArgumentValidation {
    const tool = this.tools.get(toolName);
    if (!tool) {
      return { ok: false, issues: [`Unknown tool '${toolName}'`] };
    }
    return tool.validate(args);
  }

  /**
   * Execute one request. Never throws: failures are returned as failure results.
   */
  async execute(request: ToolInvocationRequest, context: Omit<ToolContext, 'callId'>): Promise<ToolResult> {
    try {
      const tool = this.tools.get(request.toolName);
      if (!tool) {
        throw new NotFoundError('tool', request.toolName);
      }
      const validation = tool.validate(request.arguments);
      if (!validation.ok) {
        throw new InvalidInputError(`Invalid arguments for ${request.toolName}`, validation.issues);
      }

      const payload = await tool.run(validation.arguments, { ...context, callId: request.id });
      return { callId: request.id, toolName: request.toolName, status: 'success', payload };
    } catch (error) {
      return {
        callId: request.id,
        toolName: request.toolName,
        status: 'failure',
        error: wrapError(error, request.toolName).toJSON(),
      };
    }
  }
}
