/**
 * Research orchestrator: a bounded tool-use loop.
 *
 * Orchestrates: LLM call → tool execution → stop condition evaluation → repeat.
 * The loop moves through explicit states:
 *
 *   idle → planning → tool_call → observing → planning … → finalizing → done
 *
 * and lands in `failed` on any error. When `maxSteps` tool round-trips have
 * run (or another stop condition fires) the model gets one more planning
 * turn with tool use disabled, so every run ends with an answer built from
 * the context gathered so far.
 *
 * A new orchestrator is built per query; it keeps no state between runs.
 */

import type { ModelMessage } from 'ai';
import type { AgentTool, LlmToolDefinition } from '../core/tool.js';
import {
  ModelServiceError,
  ToolExecutionError,
  errorMessage,
  toResearchAgentError,
} from '../errors.js';
import type { ResearchAgentError } from '../errors.js';
import type { LLMResponse, LLMToolCall, LLMToolResult, LLMUsage, TextGenerator } from '../llm/types.js';
import { convertToolResultsToMessage } from '../llm/types.js';
import { cancellationReason, throwIfCancelled } from '../utils/abort.js';
import { logger as rootLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { maxSteps as maxStepsCondition } from './stop-conditions.js';
import type {
  StepInfo,
  StopCondition,
  StopConditionContext,
  ToolInvocation,
} from './stop-conditions.js';

// ── Types ────────────────────────────────────────────────────────────

export type OrchestratorState =
  | 'idle'
  | 'planning'
  | 'tool_call'
  | 'observing'
  | 'finalizing'
  | 'done'
  | 'failed';

export interface OrchestratorTransition {
  from: OrchestratorState;
  to: OrchestratorState;
  /** 1-based planning step the transition belongs to */
  step: number;
  /** Tool name for tool_call/observing transitions */
  toolName?: string | undefined;
  /** Search query for tool_call transitions */
  query?: string | undefined;
  error?: ResearchAgentError | undefined;
}

/** Why the tool loop ended. */
export type StopReason = 'final_answer' | 'max_steps' | 'stop_condition';

export interface ResearchOrchestratorConfig {
  /** Identifier used in logs and stop condition context */
  id?: string | undefined;
  llm: TextGenerator;
  systemPrompt: string;
  tools: AgentTool[];
  /** Maximum planning → tool round-trips. @default 8 */
  maxSteps?: number | undefined;
  /** Additional conditions that end the tool loop early */
  stopConditions?: StopCondition[] | undefined;
  temperature?: number | undefined;
  maxOutputTokens?: number | undefined;
  /** Called on every state change */
  onTransition?: ((transition: OrchestratorTransition) => void) | undefined;
  logger?: Logger | undefined;
}

export interface OrchestratorRunOptions {
  signal?: AbortSignal | undefined;
}

/**
 * Result of one orchestrator run.
 */
export interface OrchestratorResult {
  /** Final answer text */
  output: string;
  /** Every tool execution, in chronological order */
  tool_invocations: ToolInvocation[];
  steps: StepInfo[];
  total_steps: number;
  usage: LLMUsage;
  stopped_by: StopReason;
}

// ── Helpers ──────────────────────────────────────────────────────────

function serializeToolOutput(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value);
  } catch {
    return 'null';
  }
}

function parseToolArguments(raw: string): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return {};
  }
}

function queryOf(args: unknown): string | null {
  if (typeof args === 'object' && args !== null && 'query' in args) {
    const { query } = args;
    return typeof query === 'string' ? query : null;
  }
  return null;
}

// ── Orchestrator ─────────────────────────────────────────────────────

/**
 * Drives a bounded tool-use loop against a language model.
 *
 * @example
 * ```typescript
 * const orchestrator = new ResearchOrchestrator({
 *   llm: new LLM({ model: createOpenAI({ apiKey }).chat('gpt-4o') }),
 *   systemPrompt: buildSystemPrompt(),
 *   tools: [createWebSearchTool({ apiKey: tavilyKey, includeDomains: ['reuters.com'] })],
 *   maxSteps: 5,
 * });
 * const result = await orchestrator.run(buildResearchPrompt(query, 'Market Trends'));
 * ```
 */
export class ResearchOrchestrator {
  readonly id: string;
  private readonly config: ResearchOrchestratorConfig;
  private readonly toolDefs: LlmToolDefinition[];
  private readonly toolsById: Map<string, AgentTool>;
  private readonly stopConditions: StopCondition[];
  private readonly logger: Logger;
  private currentState: OrchestratorState = 'idle';
  private started = false;
  private stepCount = 0;

  constructor(config: ResearchOrchestratorConfig) {
    this.id = config.id ?? 'research_agent';
    this.config = config;
    this.toolDefs = config.tools.map((t) => t.toLlmToolDefinition());
    this.toolsById = new Map(config.tools.map((t) => [t.id, t]));
    this.stopConditions = [
      maxStepsCondition({ count: config.maxSteps ?? 8 }),
      ...(config.stopConditions ?? []),
    ];
    this.logger = (config.logger ?? rootLogger).child({
      name: 'orchestrator',
      bindings: { agent: this.id },
    });
  }

  get state(): OrchestratorState {
    return this.currentState;
  }

  /**
   * Run the loop for one composed query (or a prepared message list).
   *
   * @throws ToolExecutionError when a tool fails
   * @throws ModelServiceError when the model call fails
   * @throws ResearchCancelledError when the signal aborts
   */
  async run(
    input: string | ModelMessage[],
    options: OrchestratorRunOptions = {}
  ): Promise<OrchestratorResult> {
    if (this.started) {
      throw new Error(`Orchestrator '${this.id}' has already run; build a new one per query`);
    }
    this.started = true;

    try {
      return await this.loop(input, options.signal);
    } catch (err) {
      const error = toResearchAgentError(err);
      this.logger.error('Research run failed', { code: error.code, error: error.message });
      this.transition('failed', this.stepCount, { error });
      throw error;
    }
  }

  private async loop(
    input: string | ModelMessage[],
    signal: AbortSignal | undefined
  ): Promise<OrchestratorResult> {
    const messages: ModelMessage[] =
      typeof input === 'string' ? [{ role: 'user', content: input }] : [...input];

    const usage: LLMUsage = { input_tokens: 0, output_tokens: 0, total_tokens: 0 };
    const steps: StepInfo[] = [];
    const invocations: ToolInvocation[] = [];
    let stoppedBy: StopReason = 'final_answer';
    let forceAnswer = false;
    let output: string | null = null;

    this.stepCount = 1;
    this.transition('planning', this.stepCount);

    for (;;) {
      const step = this.stepCount;
      throwIfCancelled(signal);

      const llmResult = await this.plan(messages, forceAnswer, signal);
      if (llmResult.usage) {
        usage.input_tokens += llmResult.usage.input_tokens;
        usage.output_tokens += llmResult.usage.output_tokens;
        usage.total_tokens += llmResult.usage.total_tokens;
      }

      output = llmResult.content;
      messages.push(...(llmResult.raw_output ?? []));

      const toolCalls: LLMToolCall[] = forceAnswer ? [] : (llmResult.tool_calls ?? []);

      if (toolCalls.length === 0) {
        steps.push({
          step,
          content: output,
          tool_calls: [],
          tool_results: [],
          usage: llmResult.usage,
        });
        break;
      }

      const stepInvocations = await this.executeTools(step, toolCalls, signal);
      invocations.push(...stepInvocations);

      const toolResults: LLMToolResult[] = stepInvocations.map((inv) => ({
        call_id: inv.tool_call_id,
        name: inv.tool_name,
        output: serializeToolOutput(inv.result),
      }));
      messages.push(convertToolResultsToMessage(toolResults));

      steps.push({
        step,
        content: output,
        tool_calls: toolCalls,
        tool_results: stepInvocations,
        usage: llmResult.usage,
      });

      this.stepCount++;
      this.transition('planning', this.stepCount);

      const stopper = await this.firstStopCondition(steps);
      if (stopper !== null) {
        stoppedBy = stopper === 'maxSteps' ? 'max_steps' : 'stop_condition';
        forceAnswer = true;
        this.logger.info('Tool loop bound reached, requesting final answer', {
          condition: stopper,
          steps: steps.length,
        });
      }
    }

    this.transition('finalizing', this.stepCount);
    const result: OrchestratorResult = {
      output: output ?? '',
      tool_invocations: invocations,
      steps,
      total_steps: this.stepCount,
      usage,
      stopped_by: stoppedBy,
    };
    this.transition('done', this.stepCount);

    this.logger.debug('Research run completed', {
      steps: result.total_steps,
      toolCalls: invocations.length,
      stoppedBy,
      totalTokens: usage.total_tokens,
    });
    return result;
  }

  /** One planning turn. Tool use is disabled once the loop is bounded. */
  private async plan(
    messages: ModelMessage[],
    forceAnswer: boolean,
    signal: AbortSignal | undefined
  ): Promise<LLMResponse> {
    const hasTools = this.toolDefs.length > 0;
    let llmResult: LLMResponse;
    try {
      llmResult = await this.config.llm.generate({
        messages,
        system: this.config.systemPrompt,
        tools: hasTools ? this.toolDefs : undefined,
        toolChoice: hasTools && forceAnswer ? 'none' : undefined,
        temperature: this.config.temperature,
        maxTokens: this.config.maxOutputTokens,
        abortSignal: signal,
      });
    } catch (err) {
      if (signal?.aborted) throw cancellationReason(signal);
      throw new ModelServiceError(errorMessage(err), { cause: err });
    }

    if (!llmResult.raw_output) {
      throw new ModelServiceError(
        `model returned no output: agent_id=${this.id}, agent_step=${String(this.stepCount)}`
      );
    }
    return llmResult;
  }

  /** Execute the requested tools in order, stopping at the first failure. */
  private async executeTools(
    step: number,
    toolCalls: LLMToolCall[],
    signal: AbortSignal | undefined
  ): Promise<ToolInvocation[]> {
    const invocations: ToolInvocation[] = [];

    for (const toolCall of toolCalls) {
      const toolName = toolCall.function.name;
      const args = parseToolArguments(toolCall.function.arguments);
      const query = queryOf(args);

      this.transition('tool_call', step, { toolName, query: query ?? undefined });

      const agentTool = this.toolsById.get(toolName);
      let result: unknown;

      if (!agentTool) {
        // The model named a tool it was never offered; tell it so.
        this.logger.warn(`Tool '${toolName}' is not available`);
        result = `Error: tool '${toolName}' is not available`;
      } else {
        throwIfCancelled(signal);
        try {
          result = await agentTool.execute(args, {
            signal,
            toolCallId: toolCall.id,
            logger: this.logger.child({ name: toolName, bindings: { toolCallId: toolCall.id } }),
          });
        } catch (err) {
          if (signal?.aborted) throw cancellationReason(signal);
          throw new ToolExecutionError(toolName, errorMessage(err), { cause: err });
        }
      }

      invocations.push({
        tool_name: toolName,
        tool_call_id: toolCall.id,
        arguments: args,
        query,
        result,
      });
      this.transition('observing', step, { toolName });
    }

    return invocations;
  }

  /** Name of the first stop condition that fires, or null. */
  private async firstStopCondition(steps: StepInfo[]): Promise<string | null> {
    const ctx: StopConditionContext = { steps: [...steps], agent_id: this.id };
    for (const condition of this.stopConditions) {
      if (await condition(ctx)) {
        return condition.__stop_condition_name__ ?? 'anonymous';
      }
    }
    return null;
  }

  private transition(
    to: OrchestratorState,
    step: number,
    extra: Pick<OrchestratorTransition, 'toolName' | 'query' | 'error'> = {}
  ): void {
    const from = this.currentState;
    this.currentState = to;
    this.config.onTransition?.({ from, to, step, ...extra });
  }
}
