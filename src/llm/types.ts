/**
 * LLM types and conversion utilities.
 *
 * Wire-format types use snake_case so recorded runs read the same as the
 * provider payloads they came from.
 */

import type { LanguageModel, ModelMessage, ToolModelMessage } from 'ai';
import type { LlmToolDefinition } from '../core/tool.js';

/**
 * Extract modelId from a LanguageModel (which may be a string or model object).
 */
export function getModelId(model: LanguageModel): string {
  return typeof model === 'string' ? model : model.modelId;
}

// ── Wire-format types ────────────────────────

/**
 * Token usage statistics
 */
export interface LLMUsage {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
}

/**
 * A tool call made by the LLM
 */
export interface LLMToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

/**
 * Result from a tool execution, fed back to the LLM
 */
export interface LLMToolResult {
  call_id: string;
  name: string;
  /** Serialized tool output */
  output: string;
}

/**
 * Response from a non-streaming LLM generation
 */
export interface LLMResponse {
  content: string | null;
  usage: LLMUsage | null;
  tool_calls: LLMToolCall[] | null;
  /** Messages the model produced this turn, ready to append to the conversation */
  raw_output: ModelMessage[] | null;
  model: string | null;
  stop_reason: string | null;
}

/**
 * Options for LLM.generate().
 */
export interface LLMGenerateOptions {
  /** Conversation messages */
  messages: ModelMessage[];
  /** System prompt */
  system?: string | undefined;
  /** Tools available to the LLM */
  tools?: LlmToolDefinition[] | undefined;
  /** 'none' keeps the tools visible but forbids calling them */
  toolChoice?: 'auto' | 'none' | undefined;
  /** Temperature for randomness */
  temperature?: number | undefined;
  /** Maximum tokens to generate */
  maxTokens?: number | undefined;
  abortSignal?: AbortSignal | undefined;
}

/**
 * Anything that can answer one planning turn. LLM implements it; tests
 * script it.
 */
export interface TextGenerator {
  generate(options: LLMGenerateOptions): Promise<LLMResponse>;
}

// ── Conversion functions ───────────────────────────────────────────────

/**
 * Convert tool results to a single role:'tool' message.
 */
export function convertToolResultsToMessage(toolResults: LLMToolResult[]): ToolModelMessage {
  return {
    role: 'tool',
    content: toolResults.map((tr) => ({
      type: 'tool-result' as const,
      toolCallId: tr.call_id,
      toolName: tr.name,
      output: { type: 'text' as const, value: tr.output },
    })),
  };
}

/**
 * Convert a Vercel AI SDK tool call to the wire format.
 */
export function convertVercelToolCall(tc: {
  toolCallId: string;
  toolName: string;
  input: unknown;
}): LLMToolCall {
  return {
    id: tc.toolCallId,
    type: 'function',
    function: {
      name: tc.toolName,
      arguments: typeof tc.input === 'string' ? tc.input : JSON.stringify(tc.input),
    },
  };
}

/**
 * Convert Vercel AI SDK usage to the wire format.
 */
export function convertVercelUsage(usage: {
  inputTokens: number | undefined;
  outputTokens: number | undefined;
  totalTokens?: number | undefined;
}): LLMUsage {
  const input = usage.inputTokens ?? 0;
  const output = usage.outputTokens ?? 0;
  return {
    input_tokens: input,
    output_tokens: output,
    total_tokens: usage.totalTokens ?? input + output,
  };
}

/**
 * Convert Vercel finish reason (kebab-case) to snake_case.
 */
export function convertFinishReason(reason: string | undefined): string | null {
  if (!reason) return null;
  switch (reason) {
    case 'tool-calls':
      return 'tool_calls';
    case 'content-filter':
      return 'content_filter';
    default:
      return reason;
  }
}
