/**
 * LLM class wrapping a Vercel AI SDK LanguageModel.
 *
 * One generate() call is one planning turn: tools are declared to the
 * model but never executed by the SDK, so tool calls come back to the
 * orchestrator.
 */

import { generateText, jsonSchema, tool } from 'ai';
import type { LanguageModel, ToolSet } from 'ai';
import type { LlmToolDefinition } from '../core/tool.js';
import type { LLMGenerateOptions, LLMResponse, LLMToolCall, TextGenerator } from './types.js';
import {
  convertFinishReason,
  convertVercelToolCall,
  convertVercelUsage,
  getModelId,
} from './types.js';

/**
 * Convert LlmToolDefinition[] (OpenAI format) to a Vercel AI SDK tool set
 * without execute functions.
 */
export function convertToolsToVercel(tools: LlmToolDefinition[] | undefined): ToolSet | undefined {
  if (!tools || tools.length === 0) return undefined;

  const result: ToolSet = {};
  for (const definition of tools) {
    result[definition.function.name] = tool({
      description: definition.function.description,
      inputSchema: jsonSchema(definition.function.parameters),
    });
  }
  return result;
}

/**
 * LLM wraps a Vercel AI SDK LanguageModel.
 *
 * @example
 * ```typescript
 * import { createOpenAI } from '@ai-sdk/openai';
 *
 * const llm = new LLM({ model: createOpenAI({ apiKey }).chat('gpt-4o') });
 * const response = await llm.generate({
 *   messages: [{ role: 'user', content: 'Summarize TNFD adoption.' }],
 * });
 * console.log(response.content);
 * ```
 */
export class LLM implements TextGenerator {
  readonly model: LanguageModel;

  constructor(options: { model: LanguageModel }) {
    this.model = options.model;
  }

  async generate(options: LLMGenerateOptions): Promise<LLMResponse> {
    const tools = convertToolsToVercel(options.tools);

    const result = await generateText({
      model: this.model,
      system: options.system,
      messages: options.messages,
      tools,
      toolChoice: tools ? (options.toolChoice ?? 'auto') : undefined,
      temperature: options.temperature,
      maxOutputTokens: options.maxTokens,
      abortSignal: options.abortSignal,
    });

    const toolCalls: LLMToolCall[] | null =
      result.toolCalls.length > 0 ? result.toolCalls.map((tc) => convertVercelToolCall(tc)) : null;

    return {
      content: result.text || null,
      usage: convertVercelUsage(result.totalUsage),
      tool_calls: toolCalls,
      raw_output: [...result.response.messages],
      model: getModelId(this.model),
      stop_reason: convertFinishReason(result.finishReason),
    };
  }
}
