/**
 * Research settings: credentials, search parameters, report focus.
 *
 * Settings are validated with zod and read as an immutable snapshot each
 * time a query builds its orchestrator.
 */

import { z } from 'zod';
import { InvalidSettingsError, MissingCredentialError } from '../errors.js';

/** Trusted sources for climate risk and insurtech news. */
export const TRUSTED_SOURCES = [
  'insurancejournal.com',
  'artemis.bm',
  'reuters.com',
  'tnfd.global',
  'swissre.com',
  'munichre.com',
  'lloyds.com',
  'genevaassociation.org',
  'naic.gov',
  'abi.org.uk',
] as const;

export const REPORT_FOCUS_AREAS = [
  'Climate Physical Risks',
  'Transition Risks',
  'InsurTech Solutions',
  'Regulatory Policies',
  'Market Trends',
] as const;

export type ReportFocus = (typeof REPORT_FOCUS_AREAS)[number];

export const SEARCH_DEPTHS = ['basic', 'advanced'] as const;

export type SearchDepth = (typeof SEARCH_DEPTHS)[number];

export const MAX_RESULTS_LIMIT = 20;

/** Longest delay a Node.js timer accepts, in whole seconds. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export const researchSettingsSchema = z.object({
  openaiApiKey: z.string().default(''),
  tavilyApiKey: z.string().default(''),
  searchDepth: z.enum(SEARCH_DEPTHS).default('advanced'),
  maxResults: z.number().int().min(1).max(MAX_RESULTS_LIMIT).default(5),
  selectedDomains: z
    .array(z.string().trim().toLowerCase().min(1))
    .default(() => TRUSTED_SOURCES.slice(0, 3)),
  reportFocus: z.enum(REPORT_FOCUS_AREAS).default('Climate Physical Risks'),
  /** OpenAI chat model id */
  model: z.string().min(1).default('gpt-4-1106-preview'),
  temperature: z.number().min(0).max(2).default(0),
  /** Maximum planning → tool round-trips before the answer is forced */
  maxSteps: z.number().int().min(1).max(50).default(8),
  /** Number of prior conversation messages sent with each query */
  historyLimit: z.number().int().min(0).default(10),
  timeoutSeconds: z.number().positive().max(MAX_TIMEOUT_SECONDS).optional(),
  /** Total model tokens after which the answer is forced */
  tokenBudget: z.number().int().positive().optional(),
});

export type ResearchSettings = z.infer<typeof researchSettingsSchema>;
export type ResearchSettingsInput = z.input<typeof researchSettingsSchema>;

function parseSettings(input: ResearchSettingsInput): ResearchSettings {
  const parsed = researchSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidSettingsError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

function numberFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

/**
 * Read the environment-sourced defaults. Keys left unset here fall back to
 * the schema defaults.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): ResearchSettingsInput {
  const input: ResearchSettingsInput = {};

  const openaiApiKey = env['OPENAI_API_KEY'];
  if (openaiApiKey !== undefined) input.openaiApiKey = openaiApiKey;
  const tavilyApiKey = env['TAVILY_API_KEY'];
  if (tavilyApiKey !== undefined) input.tavilyApiKey = tavilyApiKey;
  const model = env['RESEARCH_AGENT_MODEL'];
  if (model) input.model = model;

  const maxSteps = numberFromEnv(env['RESEARCH_AGENT_MAX_STEPS']);
  if (maxSteps !== undefined) input.maxSteps = maxSteps;
  const timeoutSeconds = numberFromEnv(env['RESEARCH_AGENT_TIMEOUT_SECONDS']);
  if (timeoutSeconds !== undefined) input.timeoutSeconds = timeoutSeconds;

  const tokenBudget = numberFromEnv(env['RESEARCH_AGENT_TOKEN_BUDGET']);
  if (tokenBudget !== undefined) input.tokenBudget = tokenBudget;

  return input;
}

/**
 * Build validated settings from the environment plus per-session overrides.
 *
 * @throws InvalidSettingsError when a value is out of range
 */
export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ResearchSettingsInput = {}
): ResearchSettings {
  return parseSettings({ ...settingsFromEnv(env), ...overrides });
}

/**
 * Reject a query before any external call when a key is empty.
 */
export function assertCredentials(settings: Pick<ResearchSettings, 'openaiApiKey' | 'tavilyApiKey'>): void {
  const missing: string[] = [];
  if (!settings.openaiApiKey.trim()) missing.push('OpenAI API key');
  if (!settings.tavilyApiKey.trim()) missing.push('Tavily API key');
  if (missing.length > 0) {
    throw new MissingCredentialError(missing);
  }
}

/**
 * Holds the settings for one interactive session.
 */
export class SettingsStore {
  private current: ResearchSettings;

  constructor(initial: ResearchSettings = loadSettings()) {
    this.current = parseSettings(initial);
  }

  /** Frozen snapshot of the current settings. */
  get(): Readonly<ResearchSettings> {
    return Object.freeze({
      ...this.current,
      selectedDomains: [...this.current.selectedDomains],
    });
  }

  /**
   * Validate and apply a partial update. The previous settings stay in
   * place when validation fails.
   */
  update(patch: ResearchSettingsInput): Readonly<ResearchSettings> {
    this.current = parseSettings({ ...this.current, ...patch });
    return this.get();
  }
}
