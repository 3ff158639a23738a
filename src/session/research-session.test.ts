import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ResearchSession } from './research-session.js';
import { loadSettings, type ResearchSettingsInput } from '../config/settings.js';
import { InvalidSettingsError, MissingCredentialError, ToolExecutionError } from '../errors.js';
import type { LLMGenerateOptions, LLMResponse, TextGenerator } from '../llm/types.js';
import { createTavilySearch } from '../tools/web-search.js';
import { createLogger } from '../utils/logger.js';

const silent = createLogger({ handler: () => undefined });

class ScriptedGenerator implements TextGenerator {
  readonly calls: LLMGenerateOptions[] = [];
  private readonly script: LLMResponse[];
  private readonly gate: Promise<void> | undefined;

  constructor(script: LLMResponse[], gate?: Promise<void>) {
    this.script = [...script];
    this.gate = gate;
  }

  async generate(options: LLMGenerateOptions): Promise<LLMResponse> {
    this.calls.push({ ...options, messages: [...options.messages] });
    if (this.gate) await this.gate;
    const next = this.script.shift();
    if (next === undefined) throw new Error('script exhausted');
    return next;
  }
}

function searchTurn(query: string): LLMResponse {
  return {
    content: null,
    usage: null,
    tool_calls: [
      { id: 'call-1', type: 'function', function: { name: 'web_search', arguments: JSON.stringify({ query }) } },
    ],
    raw_output: [
      {
        role: 'assistant',
        content: [{ type: 'tool-call', toolCallId: 'call-1', toolName: 'web_search', input: { query } }],
      },
    ],
    model: 'test-model',
    stop_reason: 'tool_calls',
  };
}

function answerTurn(text: string): LLMResponse {
  return {
    content: text,
    usage: null,
    tool_calls: null,
    raw_output: [{ role: 'assistant', content: text }],
    model: 'test-model',
    stop_reason: 'stop',
  };
}

function settings(overrides: ResearchSettingsInput = {}) {
  return loadSettings({}, { openaiApiKey: 'test-secret', tavilyApiKey: 'test-secret', ...overrides });
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('ResearchSession', () => {
  it('answers the UK flood query from allow-listed sources only', async () => {
    const requestBodies: unknown[] = [];
    const fetchStub: typeof fetch = async (_input, init) => {
      requestBodies.push(JSON.parse(String(init?.body)));
      return jsonResponse({
        query: 'UK flood risk trends',
        answer: 'Flood risk is rising.',
        results: [
          { title: 'R1', url: 'https://www.reuters.com/1', content: 'a' },
          { title: 'Other', url: 'https://example.com/x', content: 'b' },
          { title: 'L1', url: 'https://www.lloyds.com/1', content: 'c' },
          { title: 'R2', url: 'https://www.reuters.com/2', content: 'd' },
          { title: 'R3', url: 'https://reuters.com/3', content: 'e' },
          { title: 'L2', url: 'https://lloyds.com/2', content: 'f' },
          { title: 'R4', url: 'https://www.reuters.com/4', content: 'g' },
        ],
      });
    };
    const llm = new ScriptedGenerator([
      searchTurn('UK flood risk trends'),
      answerTurn('UK flood losses are trending upward.'),
    ]);
    const session = new ResearchSession({
      settings: settings({ selectedDomains: ['reuters.com', 'lloyds.com'], maxResults: 5 }),
      createModel: () => llm,
      createSearch: (s) => createTavilySearch({ apiKey: s.tavilyApiKey, fetch: fetchStub }),
      logger: silent,
    });

    const outcome = await session.ask('What are flood risk trends in the UK?');

    assert.strictEqual(outcome.status, 'completed');
    if (outcome.status !== 'completed') return;
    assert.strictEqual(outcome.report.summary, 'UK flood losses are trending upward.');
    assert.strictEqual(outcome.report.sources.length, 5);
    for (const source of outcome.report.sources) {
      assert.ok(
        source.url.includes('reuters.com') || source.url.includes('lloyds.com'),
        `unexpected source ${source.url}`
      );
    }
    assert.deepStrictEqual(requestBodies, [
      {
        query: 'UK flood risk trends',
        max_results: 5,
        search_depth: 'advanced',
        include_domains: ['reuters.com', 'lloyds.com'],
        include_answer: true,
        include_raw_content: false,
      },
    ]);
    assert.deepStrictEqual(session.history(), [
      { role: 'user', content: 'What are flood risk trends in the UK?' },
      { role: 'assistant', content: 'UK flood losses are trending upward.' },
    ]);
  });

  it('rejects the query before any external call when the OpenAI key is empty', async () => {
    let modelsBuilt = 0;
    let searchesBuilt = 0;
    const session = new ResearchSession({
      settings: settings({ openaiApiKey: '' }),
      createModel: () => {
        modelsBuilt++;
        return new ScriptedGenerator([answerTurn('unused')]);
      },
      createSearch: () => {
        searchesBuilt++;
        return async () => ({ query: 'q', results: [] });
      },
      logger: silent,
    });

    const outcome = await session.ask('What is TNFD?');

    assert.strictEqual(outcome.status, 'failed');
    if (outcome.status !== 'failed') return;
    assert.ok(outcome.error instanceof MissingCredentialError);
    assert.deepStrictEqual(outcome.error.missing, ['OpenAI API key']);
    assert.strictEqual(modelsBuilt, 0);
    assert.strictEqual(searchesBuilt, 0);
    assert.deepStrictEqual(session.history(), [{ role: 'user', content: 'What is TNFD?' }]);
  });

  it('surfaces a single tool error on a network fault and adds no reply', async () => {
    const failingFetch: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };
    const session = new ResearchSession({
      settings: settings(),
      createModel: () => new ScriptedGenerator([searchTurn('cat bonds'), answerTurn('unused')]),
      createSearch: (s) => createTavilySearch({ apiKey: s.tavilyApiKey, fetch: failingFetch }),
      logger: silent,
    });

    const outcome = await session.ask('Latest cat bond issuance?');

    assert.strictEqual(outcome.status, 'failed');
    if (outcome.status !== 'failed') return;
    assert.ok(outcome.error instanceof ToolExecutionError);
    assert.strictEqual(outcome.error.message, 'Tool "web_search" failed: fetch failed');
    assert.deepStrictEqual(session.history(), [{ role: 'user', content: 'Latest cat bond issuance?' }]);
  });

  it('keeps 2N messages in strict alternation after N answered queries', async () => {
    const generators: ScriptedGenerator[] = [];
    const session = new ResearchSession({
      settings: settings(),
      createModel: () => {
        const generator = new ScriptedGenerator([answerTurn(`answer ${String(generators.length)}`)]);
        generators.push(generator);
        return generator;
      },
      logger: silent,
    });

    for (const query of ['q0', 'q1', 'q2']) {
      const outcome = await session.ask(query);
      assert.strictEqual(outcome.status, 'completed');
    }

    const history = session.history();
    assert.strictEqual(history.length, 6);
    history.forEach((message, i) => {
      assert.strictEqual(message.role, i % 2 === 0 ? 'user' : 'assistant');
    });
    assert.deepStrictEqual(history[4], { role: 'user', content: 'q2' });
    assert.deepStrictEqual(history[5], { role: 'assistant', content: 'answer 2' });

    // Earlier turns travel with the next query.
    const secondRequest = generators[1]?.calls[0]?.messages ?? [];
    assert.strictEqual(secondRequest.length, 3);
    assert.deepStrictEqual(secondRequest[0], { role: 'user', content: 'q0' });
    assert.deepStrictEqual(secondRequest[1], { role: 'assistant', content: 'answer 0' });
  });

  it('clears the transcript on reset and keeps the settings', async () => {
    const session = new ResearchSession({
      settings: settings({ reportFocus: 'Market Trends' }),
      createModel: () => new ScriptedGenerator([answerTurn('ok')]),
      logger: silent,
    });
    await session.ask('one');
    await session.ask('two');

    session.reset();

    assert.deepStrictEqual(session.history(), []);
    assert.strictEqual(session.settings.get().reportFocus, 'Market Trends');
  });

  it('rejects a second query while one is running', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const session = new ResearchSession({
      settings: settings(),
      createModel: () => new ScriptedGenerator([answerTurn('first answer')], gate),
      logger: silent,
    });

    const first = session.ask('first');
    assert.strictEqual(session.busy, true);
    const second = await session.ask('second');
    release();
    const firstOutcome = await first;

    assert.strictEqual(second.status, 'failed');
    if (second.status === 'failed') {
      assert.strictEqual(second.error.code, 'SESSION_BUSY');
    }
    assert.strictEqual(firstOutcome.status, 'completed');
    assert.strictEqual(session.busy, false);
    assert.deepStrictEqual(session.history(), [
      { role: 'user', content: 'first' },
      { role: 'assistant', content: 'first answer' },
    ]);
  });

  it('reports cancellation when the caller aborts', async () => {
    const controller = new AbortController();
    controller.abort();
    const session = new ResearchSession({
      settings: settings(),
      createModel: () => new ScriptedGenerator([answerTurn('unused')]),
      logger: silent,
    });

    const outcome = await session.ask('anything', { signal: controller.signal });

    assert.strictEqual(outcome.status, 'failed');
    if (outcome.status !== 'failed') return;
    assert.strictEqual(outcome.error.code, 'RESEARCH_CANCELLED');
    assert.strictEqual(outcome.error.message, 'Research was cancelled');
  });

  it('uses the focus framing and the injected clock', async () => {
    const llm = new ScriptedGenerator([answerTurn('ok')]);
    const session = new ResearchSession({
      settings: settings({ reportFocus: 'Regulatory Policies' }),
      createModel: () => llm,
      now: () => new Date(2024, 2, 5),
      logger: silent,
    });

    await session.ask('NAIC climate disclosure');

    const request = llm.calls[0];
    assert.ok(request?.system?.includes('2024-03-05'));
    const last = request?.messages[request.messages.length - 1];
    assert.deepStrictEqual(last, {
      role: 'user',
      content: [
        'Analyze recent developments in Regulatory Policies with focus on insurance implications.',
        'Provide a structured report with:',
        '1. Key findings',
        '2. Source verification',
        '3. Risk assessment',
        '4. Industry impact',
        '',
        'Query: NAIC climate disclosure',
      ].join('\n'),
    });
    assert.strictEqual(request?.temperature, 0);
  });

  it('forces the answer once the token budget is spent', async () => {
    const llm = new ScriptedGenerator([
      { ...searchTurn('wildfire losses'), usage: { input_tokens: 600, output_tokens: 0, total_tokens: 600 } },
      answerTurn('Wildfire losses are concentrated in the western US.'),
    ]);
    const session = new ResearchSession({
      settings: settings({ tokenBudget: 500 }),
      createModel: () => llm,
      createSearch: () => async (query) => ({ query, results: [] }),
      logger: silent,
    });

    const outcome = await session.ask('Wildfire loss trends?');

    assert.strictEqual(outcome.status, 'completed');
    assert.strictEqual(llm.calls.length, 2);
    assert.strictEqual(llm.calls[0]?.toolChoice, undefined);
    assert.strictEqual(llm.calls[1]?.toolChoice, 'none');
  });

  it('keeps the previous settings when an update is invalid', () => {
    const session = new ResearchSession({ settings: settings(), logger: silent });

    assert.throws(() => session.configure({ maxResults: 21 }), InvalidSettingsError);
    assert.strictEqual(session.settings.get().maxResults, 5);
    assert.strictEqual(session.configure({ maxResults: 3 }).maxResults, 3);
  });
});
