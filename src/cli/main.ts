#!/usr/bin/env node
/**
 * Interactive climate risk research chat.
 *
 * Run with:
 *   npx tsx src/cli/main.ts
 *
 * Environment variables:
 *   OPENAI_API_KEY - OpenAI API key
 *   TAVILY_API_KEY - Tavily API key
 *   RESEARCH_AGENT_MODEL - OpenAI chat model (default: gpt-4-1106-preview)
 *   RESEARCH_AGENT_LOG_FILE - Log file (default: research-agent.log)
 */

import 'dotenv/config';
import * as p from '@clack/prompts';
import {
  MAX_RESULTS_LIMIT,
  REPORT_FOCUS_AREAS,
  SEARCH_DEPTHS,
  TRUSTED_SOURCES,
  type ResearchSettings,
  type ResearchSettingsInput,
} from '../config/settings.js';
import { toResearchAgentError } from '../errors.js';
import { ResearchSession } from '../session/research-session.js';
import type { OrchestratorTransition } from '../agents/orchestrator.js';
import { configureLogging } from '../utils/logger.js';
import { renderError, renderHistory, renderReport, spinnerStatus } from './render.js';

type Spinner = ReturnType<typeof p.spinner>;

const COMMANDS = '/settings, /clear, /history, /exit';

let activeSpinner: Spinner | undefined;

function showProgress(transition: OrchestratorTransition): void {
  if (!activeSpinner) return;
  if (transition.to === 'tool_call' && transition.query) {
    activeSpinner.message(`Searching: ${transition.query}`);
  } else if (transition.to === 'planning' && transition.step > 1) {
    activeSpinner.message('Reviewing sources...');
  } else if (transition.to === 'finalizing') {
    activeSpinner.message('Writing report...');
  }
}

function exitOnCancel<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel('Operation cancelled.');
    process.exit(0);
  }
  return value;
}

async function promptKey(label: string, current: string): Promise<string> {
  const value = exitOnCancel(
    await p.password({
      message: current ? `${label} (leave blank to keep the current key)` : label,
      mask: '*',
    })
  );
  return value ? value.trim() : current;
}

/** Ask for every setting, starting from the current values. */
async function promptSettings(current: Readonly<ResearchSettings>): Promise<ResearchSettingsInput> {
  const openaiApiKey = await promptKey('OpenAI API key', current.openaiApiKey);
  const tavilyApiKey = await promptKey('Tavily API key', current.tavilyApiKey);

  const searchDepth = exitOnCancel(
    await p.select({
      message: 'Search depth',
      options: SEARCH_DEPTHS.map((depth) => ({ value: depth, label: depth })),
      initialValue: current.searchDepth,
    })
  );

  const maxResults = exitOnCancel(
    await p.text({
      message: 'Number of sources to retrieve',
      initialValue: String(current.maxResults),
      validate(value) {
        const n = Number(value);
        if (!Number.isInteger(n) || n < 1 || n > MAX_RESULTS_LIMIT) {
          return `Enter a whole number from 1 to ${String(MAX_RESULTS_LIMIT)}`;
        }
      },
    })
  );

  const selectedDomains = exitOnCancel(
    await p.multiselect({
      message: 'Trusted sources for research',
      options: TRUSTED_SOURCES.map((domain) => ({ value: domain, label: domain })),
      initialValues: current.selectedDomains.filter((d): d is (typeof TRUSTED_SOURCES)[number] =>
        TRUSTED_SOURCES.some((s) => s === d)
      ),
      required: false,
    })
  );

  const reportFocus = exitOnCancel(
    await p.select({
      message: 'Report focus',
      options: REPORT_FOCUS_AREAS.map((focus) => ({ value: focus, label: focus })),
      initialValue: current.reportFocus,
    })
  );

  return {
    openaiApiKey,
    tavilyApiKey,
    searchDepth,
    maxResults: Number(maxResults),
    selectedDomains,
    reportFocus,
  };
}

async function configure(session: ResearchSession): Promise<void> {
  const patch = await promptSettings(session.settings.get());
  try {
    const settings = session.configure(patch);
    p.log.success(
      `Focus: ${settings.reportFocus} · ${String(settings.maxResults)} sources · ` +
        `${settings.selectedDomains.length > 0 ? settings.selectedDomains.join(', ') : 'any domain'}`
    );
  } catch (err) {
    p.log.error(toResearchAgentError(err).message);
  }
}

async function research(session: ResearchSession, query: string): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = () => {
    controller.abort();
  };
  process.on('SIGINT', onInterrupt);

  const spinner = p.spinner();
  activeSpinner = spinner;
  spinner.start('Researching...');

  try {
    const outcome = await session.ask(query, { signal: controller.signal });
    const status = spinnerStatus(outcome, controller.signal.aborted);
    if (status) spinner.stop(status.message, status.code);

    if (outcome.status === 'completed') {
      p.log.message(renderReport(outcome.report));
    } else {
      p.log.error(renderError(outcome.error));
    }
  } finally {
    activeSpinner = undefined;
    process.off('SIGINT', onInterrupt);
  }
}

/** Handle a slash command. Returns false when the chat should end. */
async function runCommand(session: ResearchSession, command: string): Promise<boolean> {
  switch (command.toLowerCase()) {
    case '/settings':
      await configure(session);
      return true;
    case '/clear':
      session.reset();
      p.log.success('Conversation cleared');
      return true;
    case '/history':
      p.note(renderHistory(session.history()), 'Conversation');
      return true;
    case '/exit':
    case '/quit':
      return false;
    default:
      p.log.warn(`Unknown command ${command}. Available: ${COMMANDS}`);
      return true;
  }
}

async function main(): Promise<void> {
  configureLogging({ file: process.env['RESEARCH_AGENT_LOG_FILE'] ?? 'research-agent.log' });

  p.intro('Climate Risk & InsurTech Research Agent');

  let session: ResearchSession;
  try {
    session = new ResearchSession({ onTransition: showProgress });
  } catch (err) {
    p.cancel(toResearchAgentError(err).message);
    process.exit(1);
  }

  await configure(session);
  p.log.info(`Ask a question, or use ${COMMANDS}`);

  for (;;) {
    const input = await p.text({
      message: 'Research question',
      placeholder: 'What are flood risk trends in the UK?',
    });
    if (p.isCancel(input)) break;

    const query = typeof input === 'string' ? input.trim() : '';
    if (!query) continue;

    if (query.startsWith('/')) {
      if (!(await runCommand(session, query))) break;
      continue;
    }

    await research(session, query);
  }

  p.outro('Goodbye!');
}

main().catch(console.error);
