/**
 * Shapes an orchestrator run into the fixed four-part research report.
 *
 * The input is treated as untrusted: anything that does not have the
 * expected shape contributes empty defaults instead of an error.
 */

import { WEB_SEARCH_TOOL_ID } from '../tools/web-search.js';

export const MAX_SNIPPET_LENGTH = 500;
export const ELLIPSIS = '...';

export interface SearchResult {
  title: string;
  url: string;
  content: string;
}

export interface ResearchReport {
  summary: string;
  key_findings: string[];
  sources: SearchResult[];
  insurance_implications: string;
}

export interface FormatReportOptions {
  /** Keep at most this many sources across all searches */
  maxSources?: number | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

/** Content longer than 500 characters keeps its first 500 plus `...`. */
export function truncateContent(text: string): string {
  return text.length > MAX_SNIPPET_LENGTH ? text.slice(0, MAX_SNIPPET_LENGTH) + ELLIPSIS : text;
}

/** Map one raw search hit to a SearchResult, substituting defaults. */
export function toSearchResult(raw: unknown): SearchResult {
  const item = isRecord(raw) ? raw : {};
  return {
    title: stringOr(item['title'], 'Untitled'),
    url: stringOr(item['url'], '#'),
    content: truncateContent(stringOr(item['content'], '')),
  };
}

function sourcesFrom(invocations: unknown): SearchResult[] {
  if (!Array.isArray(invocations)) return [];

  const sources: SearchResult[] = [];
  for (const invocation of invocations) {
    if (!isRecord(invocation) || invocation['tool_name'] !== WEB_SEARCH_TOOL_ID) continue;
    const result = invocation['result'];
    if (!isRecord(result) || !Array.isArray(result['results'])) continue;
    for (const raw of result['results']) {
      sources.push(toSearchResult(raw));
    }
  }
  return sources;
}

/**
 * Build a ResearchReport from an orchestrator result.
 *
 * Key findings and insurance implications are not extracted from the
 * answer; they are always empty.
 */
export function formatReport(result: unknown, options: FormatReportOptions = {}): ResearchReport {
  const run = isRecord(result) ? result : {};
  let sources = sourcesFrom(run['tool_invocations']);
  if (options.maxSources !== undefined) {
    sources = sources.slice(0, Math.max(0, options.maxSources));
  }

  return {
    summary: stringOr(run['output'], ''),
    key_findings: [],
    sources,
    insurance_implications: '',
  };
}
