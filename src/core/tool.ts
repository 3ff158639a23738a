/**
 * Tool definition and creation.
 *
 * Provides the defineTool function for creating typed tools that can be
 * exposed to LLMs: a zod input schema, a description, and a handler.
 */

import { type ZodType, toJSONSchema } from 'zod';
import type { Logger } from '../utils/logger.js';

// ── LLM tool definition ──────────────────────────────────────────────

/**
 * LLM tool definition format (OpenAI compatible).
 */
export interface LlmToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

// ── Execution context ────────────────────────────────────────────────

/**
 * Context handed to a tool handler for one invocation.
 */
export interface ToolContext {
  /** Aborted when the query is cancelled or times out */
  signal?: AbortSignal | undefined;
  /** Tool call id assigned by the model */
  toolCallId: string;
  logger: Logger;
}

// ── DefineToolConfig ─────────────────────────────────────────────────

export interface DefineToolConfig<TInput = unknown> {
  /** Unique tool identifier, exposed to the LLM as the function name */
  id: string;
  /** Tool description shown to LLMs */
  description: string;
  /** Zod schema for input validation */
  inputSchema: ZodType<TInput>;
}

// ── AgentTool ────────────────────────────────────────────────────────

/**
 * A tool the orchestrator can offer to the model.
 */
export interface AgentTool<TInput = unknown, TOutput = unknown> {
  readonly id: string;
  /** Tool description shown to LLMs */
  readonly toolDescription: string;
  /** JSON schema for tool parameters */
  readonly toolParameters: Record<string, unknown>;
  /** Generate an LLM-compatible tool definition */
  toLlmToolDefinition(): LlmToolDefinition;
  /** Validate raw arguments and run the handler */
  execute(args: unknown, ctx: ToolContext): Promise<TOutput>;
  /** Parse raw arguments against the input schema */
  parseInput(args: unknown): TInput;
}

// ── defineTool ───────────────────────────────────────────────────────

/**
 * Define a tool.
 *
 * @example
 * ```typescript
 * const lookupPeril = defineTool({
 *   id: 'lookup_peril',
 *   description: 'Look up loss statistics for a peril',
 *   inputSchema: z.object({
 *     peril: z.string().describe('Peril name, e.g. "flood"'),
 *   }),
 * }, async (ctx, input) => {
 *   return await catalog.find(input.peril);
 * });
 *
 * const toolDef = lookupPeril.toLlmToolDefinition();
 * ```
 */
export function defineTool<TInput = unknown, TOutput = unknown>(
  config: DefineToolConfig<TInput>,
  handler: (ctx: ToolContext, input: TInput) => Promise<TOutput>
): AgentTool<TInput, TOutput> {
  // Derive JSON schema parameters from inputSchema
  const { $schema: _, ...toolParameters } = toJSONSchema(config.inputSchema) as Record<
    string,
    unknown
  >;

  function parseInput(args: unknown): TInput {
    return config.inputSchema.parse(args);
  }

  return {
    id: config.id,
    toolDescription: config.description,
    toolParameters,
    toLlmToolDefinition(): LlmToolDefinition {
      return {
        type: 'function' as const,
        function: {
          name: config.id,
          description: config.description,
          parameters: toolParameters,
        },
      };
    },
    parseInput,
    async execute(args: unknown, ctx: ToolContext): Promise<TOutput> {
      return handler(ctx, parseInput(args));
    },
  };
}
