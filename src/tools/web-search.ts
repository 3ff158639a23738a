/**
 * Web search tool for searching trusted sources.
 *
 * Uses the Tavily Search API via fetch(). Results are restricted to the
 * configured allow-list of domains and capped at the configured maximum.
 * A custom search function can replace Tavily (tests, other providers).
 *
 * @example
 * ```typescript
 * const webSearch = createWebSearchTool({
 *   apiKey: settings.tavilyApiKey,
 *   maxResults: 5,
 *   searchDepth: 'advanced',
 *   includeDomains: ['reuters.com', 'lloyds.com'],
 * });
 * ```
 */

import { z } from 'zod';
import { defineTool } from '../core/tool.js';
import type { AgentTool } from '../core/tool.js';

export const WEB_SEARCH_TOOL_ID = 'web_search';

// ── Result types (provider-agnostic) ─────────────────────────────────

/** A single search result item, as returned by the provider. */
export interface WebSearchResultItem {
  title?: string | undefined;
  url?: string | undefined;
  /** Snippet or summary of the page content. */
  content?: string | undefined;
  /** Relevance score, 0–1. */
  score?: number | undefined;
  /** Full page text when raw content was requested. */
  rawContent?: string | undefined;
  /** Publication date in ISO 8601 format. */
  publishedDate?: string | undefined;
}

/** Full search result returned by the tool. */
export interface WebSearchResult {
  query: string;
  results: WebSearchResultItem[];
  /** AI-generated summary (Tavily feature). */
  answer?: string | undefined;
}

// ── Options passed to the search function ────────────────────────────

export interface WebSearchOptions {
  maxResults: number;
  searchDepth: 'basic' | 'advanced';
  includeDomains: string[];
  signal?: AbortSignal | undefined;
}

/** Signature for a search provider function. */
export type WebSearchFunction = (
  query: string,
  options: WebSearchOptions
) => Promise<WebSearchResult>;

// ── Configuration ────────────────────────────────────────────────────

/** Tavily-specific configuration knobs. */
export interface TavilySearchConfig {
  /** Tavily API key. Falls back to the TAVILY_API_KEY environment variable. */
  apiKey?: string | undefined;
  /** Include an AI-generated answer in the response. @default true */
  includeAnswer?: boolean | undefined;
  /** Include raw page content in results. @default false */
  includeRawContent?: boolean | undefined;
  /** Tavily API base URL. @default 'https://api.tavily.com' */
  baseUrl?: string | undefined;
  /** fetch implementation. @default globalThis.fetch */
  fetch?: typeof fetch | undefined;
}

export interface WebSearchToolConfig extends TavilySearchConfig {
  /** Custom search provider. When set, overrides the built-in Tavily implementation. */
  search?: WebSearchFunction | undefined;
  /** Maximum results per query (1–20). @default 5 */
  maxResults?: number | undefined;
  /** @default 'basic' */
  searchDepth?: 'basic' | 'advanced' | undefined;
  /** Allow-listed domains. Empty means unrestricted. */
  includeDomains?: string[] | undefined;
}

// ── LLM-facing input schema ──────────────────────────────────────────

const webSearchInputSchema = z.object({
  query: z.string().min(1).describe('The search query'),
});

type WebSearchInput = z.infer<typeof webSearchInputSchema>;

// ── Domain allow-list ────────────────────────────────────────────────

/**
 * True when the URL's host is one of the domains or a subdomain of one.
 * An empty allow-list accepts every URL.
 */
export function isAllowedUrl(url: string | undefined, domains: readonly string[]): boolean {
  if (domains.length === 0) return true;
  if (!url) return false;

  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }

  return domains.some((domain) => {
    const d = domain.toLowerCase();
    return host === d || host.endsWith(`.${d}`);
  });
}

/** Apply the allow-list and the result cap to a provider response. */
export function restrictResults(
  result: WebSearchResult,
  options: Pick<WebSearchOptions, 'maxResults' | 'includeDomains'>
): WebSearchResult {
  return {
    ...result,
    results: result.results
      .filter((item) => isAllowedUrl(item.url, options.includeDomains))
      .slice(0, options.maxResults),
  };
}

// ── Tavily implementation ────────────────────────────────────────────

const tavilyResponseSchema = z.object({
  query: z.string().optional(),
  answer: z.string().nullish(),
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        content: z.string().nullish(),
        score: z.number().nullish(),
        raw_content: z.string().nullish(),
        published_date: z.string().nullish(),
      })
    )
    .default([]),
});

const tavilyErrorSchema = z.object({ detail: z.unknown() });

/** Prefer the `detail` field of a JSON error body, else the raw text. */
function tavilyErrorMessage(text: string): string {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return text;
  }
  const parsed = tavilyErrorSchema.safeParse(body);
  if (!parsed.success) return text;
  const { detail } = parsed.data;
  if (detail === undefined) return text;
  return typeof detail === 'string' ? detail : JSON.stringify(detail);
}

export function createTavilySearch(config: TavilySearchConfig = {}): WebSearchFunction {
  return async (query: string, options: WebSearchOptions): Promise<WebSearchResult> => {
    const apiKey = config.apiKey || process.env['TAVILY_API_KEY'];
    if (!apiKey) {
      throw new Error(
        'Tavily API key is required. Provide it in the settings or set the TAVILY_API_KEY environment variable.'
      );
    }

    const baseUrl = (config.baseUrl ?? 'https://api.tavily.com').replace(/\/+$/, '');
    const fetchFn = config.fetch ?? fetch;

    const body = {
      query,
      max_results: options.maxResults,
      search_depth: options.searchDepth,
      include_domains: options.includeDomains,
      include_answer: config.includeAnswer ?? true,
      include_raw_content: config.includeRawContent ?? false,
    };

    const response = await fetchFn(`${baseUrl}/search`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify(body),
      signal: options.signal,
    });

    if (!response.ok) {
      const errorMessage = tavilyErrorMessage(await response.text());
      throw new Error(`Tavily API error (${String(response.status)}): ${errorMessage}`);
    }

    const data = tavilyResponseSchema.parse(await response.json());

    return {
      query: data.query ?? query,
      answer: data.answer ?? undefined,
      results: data.results.map((r) => ({
        title: r.title ?? undefined,
        url: r.url ?? undefined,
        content: r.content ?? undefined,
        score: r.score ?? undefined,
        rawContent: r.raw_content ?? undefined,
        publishedDate: r.published_date ?? undefined,
      })),
    };
  };
}

// ── Factory ──────────────────────────────────────────────────────────

/**
 * Create the web search tool offered to the research agent.
 */
export function createWebSearchTool(
  config: WebSearchToolConfig = {}
): AgentTool<WebSearchInput, WebSearchResult> {
  const maxResults = config.maxResults ?? 5;
  const searchDepth = config.searchDepth ?? 'basic';
  const includeDomains = [...(config.includeDomains ?? [])];

  const searchFn: WebSearchFunction = config.search ?? createTavilySearch(config);

  return defineTool(
    {
      id: WEB_SEARCH_TOOL_ID,
      description:
        'Search trusted climate risk and insurance sources for current information. ' +
        'Returns a list of relevant results with titles, URLs, and content snippets.',
      inputSchema: webSearchInputSchema,
    },
    async (ctx, input: WebSearchInput) => {
      const options: WebSearchOptions = {
        maxResults,
        searchDepth,
        includeDomains,
        signal: ctx.signal,
      };

      ctx.logger.debug('Running web search', { query: input.query, maxResults, searchDepth });
      const result = await searchFn(input.query, options);
      return restrictResults(result, options);
    }
  );
}
