/**
 * Climate risk and InsurTech research agent.
 *
 * @packageDocumentation
 */

// Session
export {
  ResearchSession,
  type QueryOutcome,
  type AskOptions,
  type ResearchSessionOptions,
} from './session/research-session.js';
export { ConversationSession, type ChatMessage, type ChatRole } from './session/conversation.js';

// Configuration
export {
  TRUSTED_SOURCES,
  REPORT_FOCUS_AREAS,
  SEARCH_DEPTHS,
  MAX_RESULTS_LIMIT,
  MAX_TIMEOUT_SECONDS,
  researchSettingsSchema,
  settingsFromEnv,
  loadSettings,
  assertCredentials,
  SettingsStore,
  type ReportFocus,
  type SearchDepth,
  type ResearchSettings,
  type ResearchSettingsInput,
} from './config/settings.js';

// Orchestration
export {
  ResearchOrchestrator,
  type ResearchOrchestratorConfig,
  type OrchestratorRunOptions,
  type OrchestratorResult,
  type OrchestratorState,
  type OrchestratorTransition,
  type StopReason,
} from './agents/orchestrator.js';
export {
  stopCondition,
  maxSteps,
  maxTokens,
  type StopCondition,
  type StopConditionContext,
  type StopConditionFactory,
  type StepInfo,
  type ToolInvocation,
} from './agents/stop-conditions.js';
export {
  buildSystemPrompt,
  buildResearchPrompt,
  buildPromptMessages,
  formatDate,
} from './agents/prompt.js';

// Tools
export {
  defineTool,
  type AgentTool,
  type DefineToolConfig,
  type LlmToolDefinition,
  type ToolContext,
} from './core/tool.js';
export {
  WEB_SEARCH_TOOL_ID,
  createWebSearchTool,
  createTavilySearch,
  isAllowedUrl,
  restrictResults,
  type WebSearchFunction,
  type WebSearchOptions,
  type WebSearchResult,
  type WebSearchResultItem,
  type WebSearchToolConfig,
  type TavilySearchConfig,
} from './tools/web-search.js';

// LLM
export { LLM, convertToolsToVercel } from './llm/llm.js';
export type {
  LLMGenerateOptions,
  LLMResponse,
  LLMToolCall,
  LLMToolResult,
  LLMUsage,
  TextGenerator,
} from './llm/types.js';

// Report
export {
  formatReport,
  toSearchResult,
  truncateContent,
  type ResearchReport,
  type SearchResult,
  type FormatReportOptions,
} from './report/formatter.js';

// Errors
export {
  ResearchAgentError,
  MissingCredentialError,
  InvalidSettingsError,
  ToolExecutionError,
  ModelServiceError,
  ResearchCancelledError,
  SessionBusyError,
  toResearchAgentError,
  type ResearchErrorCode,
} from './errors.js';

// Logging
export {
  createLogger,
  configureLogging,
  resetLogging,
  logger,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
  type LogContext,
  type LogSink,
} from './utils/logger.js';
