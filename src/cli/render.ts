/**
 * Plain-text rendering for the terminal chat.
 */

import type { ResearchAgentError } from '../errors.js';
import type { ResearchReport } from '../report/formatter.js';
import type { ChatMessage } from '../session/conversation.js';
import type { QueryOutcome } from '../session/research-session.js';

const RULE = '='.repeat(60);

function section(title: string, body: string[]): string[] {
  return [title, '-'.repeat(title.length), ...body, ''];
}

export function renderReport(report: ResearchReport): string {
  const findings =
    report.key_findings.length > 0
      ? report.key_findings.map((finding) => `- ${finding}`)
      : ['No specific findings extracted'];

  const sources =
    report.sources.length > 0
      ? report.sources.flatMap((source, i) => [
          `${String(i + 1)}. ${source.title}`,
          `   ${source.url}`,
          ...(source.content ? [`   ${source.content}`] : []),
        ])
      : ['No sources retrieved'];

  return [
    RULE,
    'Research Report',
    RULE,
    '',
    ...section('Executive Summary', [report.summary]),
    ...section('Key Findings', findings),
    ...section('Insurance Implications', [
      report.insurance_implications || 'No implications extracted',
    ]),
    ...section('Research Sources', sources),
  ].join('\n');
}

export function renderError(error: ResearchAgentError): string {
  if (error.code === 'MISSING_CREDENTIAL') {
    return 'Please provide both API keys in the settings';
  }
  return `Research failed: ${error.message}`;
}

export function renderHistory(messages: readonly ChatMessage[]): string {
  if (messages.length === 0) return 'No messages yet';
  return messages
    .map((m) => `${m.role === 'user' ? 'You' : 'Assistant'}: ${m.content}`)
    .join('\n\n');
}

export interface SpinnerStatus {
  message: string;
  code: number;
}

/**
 * Closing line for the query spinner, or null when Ctrl+C has already
 * closed it.
 */
export function spinnerStatus(outcome: QueryOutcome, interrupted: boolean): SpinnerStatus | null {
  if (outcome.status === 'completed') return { message: 'Research complete', code: 0 };
  return interrupted ? null : { message: 'Research stopped', code: 1 };
}
