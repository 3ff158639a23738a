/**
 * Prompt construction for research queries.
 *
 * The system instruction is fixed apart from the date. Report focus is
 * framed in the per-query user text, never in the system instruction.
 */

import type { ModelMessage } from 'ai';
import type { ReportFocus } from '../config/settings.js';
import type { ChatMessage } from '../session/conversation.js';

/** Local calendar date as YYYY-MM-DD. */
export function formatDate(date: Date): string {
  const year = String(date.getFullYear());
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function buildSystemPrompt(now: Date = new Date()): string {
  return [
    'You are an expert AI research assistant specializing in climate risk and insurance technology.',
    `Today's date is ${formatDate(now)}.`,
    '',
    'Your task is to analyze and report on:',
    '- Physical climate risks affecting insurance portfolios',
    '- Transition risks and regulatory changes',
    '- Innovative InsurTech solutions',
    '- Market trends in climate risk transfer',
    '',
    'Follow these guidelines:',
    '1. Provide concise, structured reports with clear insights',
    '2. Always cite sources with direct links',
    '3. Highlight insurance-specific implications',
    '4. Use professional tone suitable for industry executives',
    '5. Include risk assessment when possible',
  ].join('\n');
}

/**
 * The user text sent for one query: focus framing, the four-part report
 * request, then the question itself.
 */
export function buildResearchPrompt(query: string, focus: ReportFocus): string {
  return [
    `Analyze recent developments in ${focus} with focus on insurance implications.`,
    'Provide a structured report with:',
    '1. Key findings',
    '2. Source verification',
    '3. Risk assessment',
    '4. Industry impact',
    '',
    `Query: ${query}`,
  ].join('\n');
}

/**
 * Message list for one orchestrator run: the most recent `historyLimit`
 * transcript messages followed by the composed research prompt.
 */
export function buildPromptMessages(
  history: readonly ChatMessage[],
  researchPrompt: string,
  historyLimit = 10
): ModelMessage[] {
  const recent = historyLimit > 0 ? history.slice(-historyLimit) : [];
  return [
    ...recent.map((m): ModelMessage => ({ role: m.role, content: m.content })),
    { role: 'user', content: researchPrompt },
  ];
}
