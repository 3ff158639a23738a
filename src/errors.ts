/**
 * Error taxonomy for research queries.
 *
 * Every failure that reaches the session boundary is a ResearchAgentError
 * with a stable `code`, so the presentation layer can pick one message per
 * failure without inspecting provider-specific errors.
 */

export type ResearchErrorCode =
  | 'MISSING_CREDENTIAL'
  | 'INVALID_SETTINGS'
  | 'TOOL_EXECUTION_FAILED'
  | 'MODEL_SERVICE_FAILED'
  | 'RESEARCH_CANCELLED'
  | 'SESSION_BUSY'
  | 'UNEXPECTED_ERROR';

export class ResearchAgentError extends Error {
  constructor(
    message: string,
    public readonly code: ResearchErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ResearchAgentError';
  }
}

/** One or both API keys were empty when a query was submitted. */
export class MissingCredentialError extends ResearchAgentError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing API key(s): ${missing.join(', ')}`, 'MISSING_CREDENTIAL');
    this.name = 'MissingCredentialError';
    this.missing = missing;
  }
}

export class InvalidSettingsError extends ResearchAgentError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid settings: ${issues.join('; ')}`, 'INVALID_SETTINGS');
    this.name = 'InvalidSettingsError';
    this.issues = issues;
  }
}

export class ToolExecutionError extends ResearchAgentError {
  constructor(
    public readonly toolName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Tool "${toolName}" failed: ${message}`, 'TOOL_EXECUTION_FAILED', options);
    this.name = 'ToolExecutionError';
  }
}

export class ModelServiceError extends ResearchAgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Language model request failed: ${message}`, 'MODEL_SERVICE_FAILED', options);
    this.name = 'ModelServiceError';
  }
}

export class ResearchCancelledError extends ResearchAgentError {
  constructor(message = 'Research was cancelled') {
    super(message, 'RESEARCH_CANCELLED');
    this.name = 'ResearchCancelledError';
  }
}

export class SessionBusyError extends ResearchAgentError {
  constructor() {
    super('A research query is already running in this session', 'SESSION_BUSY');
    this.name = 'SessionBusyError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Normalize anything thrown during a query into a ResearchAgentError.
 */
export function toResearchAgentError(err: unknown): ResearchAgentError {
  if (err instanceof ResearchAgentError) {
    return err;
  }
  return new ResearchAgentError(errorMessage(err), 'UNEXPECTED_ERROR', { cause: err });
}
