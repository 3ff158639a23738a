/**
 * One interactive research session: settings, transcript, and query handling.
 *
 * Each `ask` builds a fresh orchestrator from a settings snapshot, runs it,
 * and folds the report summary back into the transcript. Failures never
 * escape `ask`; they come back as a failed outcome and the transcript keeps
 * the user message without an assistant reply.
 */

import { createOpenAI } from '@ai-sdk/openai';
import { ResearchOrchestrator, type OrchestratorTransition } from '../agents/orchestrator.js';
import { maxTokens } from '../agents/stop-conditions.js';
import { buildPromptMessages, buildResearchPrompt, buildSystemPrompt } from '../agents/prompt.js';
import { SettingsStore, assertCredentials, loadSettings } from '../config/settings.js';
import type { ResearchSettings, ResearchSettingsInput } from '../config/settings.js';
import { SessionBusyError, toResearchAgentError } from '../errors.js';
import type { ResearchAgentError } from '../errors.js';
import { LLM } from '../llm/llm.js';
import type { TextGenerator } from '../llm/types.js';
import { formatReport, type ResearchReport } from '../report/formatter.js';
import { createWebSearchTool, type WebSearchFunction } from '../tools/web-search.js';
import { createQuerySignal } from '../utils/abort.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { ConversationSession, type ChatMessage } from './conversation.js';

export type QueryOutcome =
  | { status: 'completed'; report: ResearchReport }
  | { status: 'failed'; error: ResearchAgentError };

export interface AskOptions {
  /** Aborting cancels the running query */
  signal?: AbortSignal | undefined;
}

export interface ResearchSessionOptions {
  /** Initial settings. @default loadSettings() */
  settings?: ResearchSettings | undefined;
  /** Build the model for one query. @default OpenAI chat model from the settings */
  createModel?: ((settings: Readonly<ResearchSettings>) => TextGenerator) | undefined;
  /** Build the search backend for one query. @default Tavily */
  createSearch?: ((settings: Readonly<ResearchSettings>) => WebSearchFunction) | undefined;
  /** Clock for the system prompt date */
  now?: (() => Date) | undefined;
  onTransition?: ((transition: OrchestratorTransition) => void) | undefined;
  logger?: Logger | undefined;
}

function openAIModel(settings: Readonly<ResearchSettings>): TextGenerator {
  const provider = createOpenAI({ apiKey: settings.openaiApiKey });
  return new LLM({ model: provider.chat(settings.model) });
}

export class ResearchSession {
  readonly settings: SettingsStore;
  private readonly conversation = new ConversationSession();
  private readonly options: ResearchSessionOptions;
  private readonly logger: Logger;
  private running = false;

  constructor(options: ResearchSessionOptions = {}) {
    this.options = options;
    this.settings = new SettingsStore(options.settings ?? loadSettings());
    this.logger = (options.logger ?? rootLogger).child({ name: 'session' });
  }

  /** True while a query is in flight. */
  get busy(): boolean {
    return this.running;
  }

  history(): readonly ChatMessage[] {
    return this.conversation.messages();
  }

  /** Validate and apply new settings for subsequent queries. */
  configure(patch: ResearchSettingsInput): Readonly<ResearchSettings> {
    return this.settings.update(patch);
  }

  /** Clear the transcript. Settings are kept. */
  reset(): void {
    this.conversation.clear();
    this.logger.debug('Conversation cleared');
  }

  async ask(query: string, options: AskOptions = {}): Promise<QueryOutcome> {
    if (this.running) {
      this.logger.warn('Rejected query while another is running');
      return { status: 'failed', error: new SessionBusyError() };
    }

    this.running = true;
    const history = this.conversation.messages();
    this.conversation.append('user', query);

    try {
      const settings = this.settings.get();
      assertCredentials(settings);

      const querySignal = createQuerySignal(options.signal, settings.timeoutSeconds);
      try {
        const orchestrator = this.buildOrchestrator(settings);
        const messages = buildPromptMessages(
          history,
          buildResearchPrompt(query, settings.reportFocus),
          settings.historyLimit
        );

        this.logger.info('Research query started', {
          focus: settings.reportFocus,
          domains: settings.selectedDomains,
          maxResults: settings.maxResults,
        });
        const result = await orchestrator.run(messages, { signal: querySignal.signal });
        const report = formatReport(result, { maxSources: settings.maxResults });

        this.conversation.append('assistant', report.summary);
        this.logger.info('Research query completed', {
          sources: report.sources.length,
          stoppedBy: result.stopped_by,
        });
        return { status: 'completed', report };
      } finally {
        querySignal.dispose();
      }
    } catch (err) {
      const error = toResearchAgentError(err);
      this.logger.error('Research query failed', { code: error.code, error: error.message });
      return { status: 'failed', error };
    } finally {
      this.running = false;
    }
  }

  private buildOrchestrator(settings: Readonly<ResearchSettings>): ResearchOrchestrator {
    const createModel = this.options.createModel ?? openAIModel;
    const search = createWebSearchTool({
      apiKey: settings.tavilyApiKey,
      search: this.options.createSearch?.(settings),
      maxResults: settings.maxResults,
      searchDepth: settings.searchDepth,
      includeDomains: settings.selectedDomains,
    });

    return new ResearchOrchestrator({
      llm: createModel(settings),
      systemPrompt: buildSystemPrompt(this.options.now?.() ?? new Date()),
      tools: [search],
      maxSteps: settings.maxSteps,
      stopConditions:
        settings.tokenBudget !== undefined ? [maxTokens({ limit: settings.tokenBudget })] : [],
      temperature: settings.temperature,
      onTransition: this.options.onTransition,
      logger: this.logger,
    });
  }
}
