/**
 * Stop conditions for the research orchestrator.
 *
 * A stop condition inspects the steps taken so far and returns true when
 * the tool loop should end. When one fires, the orchestrator asks the
 * model for a final answer from the context gathered so far.
 */

import type { LLMToolCall, LLMUsage } from '../llm/types.js';

// ── Types ────────────────────────────────────────────────────────────

/**
 * One tool execution recorded by the orchestrator.
 */
export interface ToolInvocation {
  tool_name: string;
  tool_call_id: string;
  /** Arguments as parsed from the model's tool call */
  arguments: unknown;
  /** Search query sent, when the tool takes one */
  query: string | null;
  result: unknown;
}

/**
 * A single planning step of the tool loop.
 */
export interface StepInfo {
  step: number;
  content: string | null;
  tool_calls: LLMToolCall[];
  tool_results: ToolInvocation[];
  usage: LLMUsage | null;
}

/**
 * Context available to stop conditions.
 */
export interface StopConditionContext {
  steps: StepInfo[];
  agent_id?: string | undefined;
}

/**
 * A stop condition function that receives context and returns whether to stop.
 */
export interface StopCondition {
  (ctx: StopConditionContext): boolean | Promise<boolean>;
  __stop_condition_name__?: string | undefined;
}

/**
 * A stop condition factory that produces StopCondition callables when given config.
 */
export interface StopConditionFactory<TConfig> {
  (config: TConfig): StopCondition;
  __stop_condition_name__: string;
}

// ── stopCondition ────────────────────────────────────────────────────

/**
 * Wrap a stop condition function, recording its name for logs.
 *
 * When the function takes a config object as its second parameter,
 * the result is a factory that captures the config.
 *
 * @example
 * ```typescript
 * const searchedTwice = stopCondition(
 *   (ctx: StopConditionContext) =>
 *     ctx.steps.flatMap((s) => s.tool_results).length >= 2
 * );
 * ```
 */
export function stopCondition<TConfig>(
  fn: (ctx: StopConditionContext, config: TConfig) => boolean | Promise<boolean>
): StopConditionFactory<TConfig>;
export function stopCondition(
  fn: (ctx: StopConditionContext) => boolean | Promise<boolean>
): StopCondition;
export function stopCondition<TConfig = void>(
  fn: (ctx: StopConditionContext, config?: TConfig) => boolean | Promise<boolean>
): StopCondition | StopConditionFactory<TConfig> {
  const name = fn.name || 'anonymous';

  if (fn.length >= 2) {
    return Object.assign(
      (config: TConfig): StopCondition =>
        Object.assign((ctx: StopConditionContext) => fn(ctx, config), {
          __stop_condition_name__: name,
        }),
      { __stop_condition_name__: name }
    );
  }

  return Object.assign((ctx: StopConditionContext) => fn(ctx), {
    __stop_condition_name__: name,
  });
}

// ── Built-in stop conditions ─────────────────────────────────────────

/**
 * Stop when the number of tool steps reaches count.
 */
export const maxSteps = stopCondition(function maxSteps(
  ctx: StopConditionContext,
  config: { count: number }
): boolean {
  return ctx.steps.length >= config.count;
});

/**
 * Stop when total tokens reach the limit.
 */
export const maxTokens = stopCondition(function maxTokens(
  ctx: StopConditionContext,
  config: { limit: number }
): boolean {
  let total = 0;
  for (const step of ctx.steps) {
    if (step.usage) {
      total += step.usage.total_tokens;
    }
  }
  return total >= config.limit;
});
