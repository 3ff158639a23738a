import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { InvalidSettingsError, MissingCredentialError } from '../errors.js';
import {
  SettingsStore,
  TRUSTED_SOURCES,
  assertCredentials,
  loadSettings,
  settingsFromEnv,
} from './settings.js';

describe('loadSettings', () => {
  it('applies defaults when the environment is empty', () => {
    const settings = loadSettings({});

    assert.strictEqual(settings.openaiApiKey, '');
    assert.strictEqual(settings.tavilyApiKey, '');
    assert.strictEqual(settings.searchDepth, 'advanced');
    assert.strictEqual(settings.maxResults, 5);
    assert.deepStrictEqual(settings.selectedDomains, [
      'insurancejournal.com',
      'artemis.bm',
      'reuters.com',
    ]);
    assert.strictEqual(settings.reportFocus, 'Climate Physical Risks');
    assert.strictEqual(settings.model, 'gpt-4-1106-preview');
    assert.strictEqual(settings.temperature, 0);
    assert.strictEqual(settings.maxSteps, 8);
    assert.strictEqual(settings.historyLimit, 10);
    assert.strictEqual(settings.timeoutSeconds, undefined);
    assert.strictEqual(settings.tokenBudget, undefined);
  });

  it('pre-populates keys from the environment', () => {
    const settings = loadSettings({
      OPENAI_API_KEY: 'test-openai-key',
      TAVILY_API_KEY: 'test-tavily-key',
    });
    assert.strictEqual(settings.openaiApiKey, 'test-openai-key');
    assert.strictEqual(settings.tavilyApiKey, 'test-tavily-key');
  });

  it('lets overrides win over the environment', () => {
    const settings = loadSettings(
      { OPENAI_API_KEY: 'from-env' },
      { openaiApiKey: 'from-input', maxResults: 12, reportFocus: 'Market Trends' }
    );
    assert.strictEqual(settings.openaiApiKey, 'from-input');
    assert.strictEqual(settings.maxResults, 12);
    assert.strictEqual(settings.reportFocus, 'Market Trends');
  });

  it('reads numeric tunables from the environment', () => {
    const settings = loadSettings({
      RESEARCH_AGENT_MAX_STEPS: '3',
      RESEARCH_AGENT_TIMEOUT_SECONDS: '90',
      RESEARCH_AGENT_MODEL: 'gpt-4o-mini',
      RESEARCH_AGENT_TOKEN_BUDGET: '20000',
    });
    assert.strictEqual(settings.maxSteps, 3);
    assert.strictEqual(settings.timeoutSeconds, 90);
    assert.strictEqual(settings.tokenBudget, 20000);
    assert.strictEqual(settings.model, 'gpt-4o-mini');
  });

  it('normalizes domain casing and whitespace', () => {
    const settings = loadSettings({}, { selectedDomains: ['  Reuters.com ', 'LLOYDS.COM'] });
    assert.deepStrictEqual(settings.selectedDomains, ['reuters.com', 'lloyds.com']);
  });

  it('rejects max results outside 1..20', () => {
    assert.throws(() => loadSettings({}, { maxResults: 0 }), InvalidSettingsError);
    assert.throws(() => loadSettings({}, { maxResults: 21 }), InvalidSettingsError);
    assert.strictEqual(loadSettings({}, { maxResults: 20 }).maxResults, 20);
    assert.strictEqual(loadSettings({}, { maxResults: 1 }).maxResults, 1);
  });

  it('rejects a timeout longer than a timer can wait', () => {
    assert.throws(
      () => loadSettings({ RESEARCH_AGENT_TIMEOUT_SECONDS: '2592000' }),
      (err: unknown) =>
        err instanceof InvalidSettingsError && err.issues[0]?.startsWith('timeoutSeconds') === true
    );
    assert.strictEqual(
      loadSettings({ RESEARCH_AGENT_TIMEOUT_SECONDS: '2147483' }).timeoutSeconds,
      2147483
    );
  });

  it('rejects a non-numeric max steps value', () => {
    assert.throws(
      () => loadSettings({ RESEARCH_AGENT_MAX_STEPS: 'lots' }),
      (err: unknown) => err instanceof InvalidSettingsError && err.issues[0]?.startsWith('maxSteps') === true
    );
  });
});

describe('settingsFromEnv', () => {
  it('ignores blank numeric variables', () => {
    assert.deepStrictEqual(settingsFromEnv({ RESEARCH_AGENT_TIMEOUT_SECONDS: ' ' }), {});
  });
});

describe('assertCredentials', () => {
  it('passes when both keys are present', () => {
    assertCredentials({ openaiApiKey: 'test-openai-key', tavilyApiKey: 'test-tavily-key' });
  });

  it('names the missing OpenAI key', () => {
    assert.throws(
      () => assertCredentials({ openaiApiKey: '', tavilyApiKey: 'test-tavily-key' }),
      (err: unknown) =>
        err instanceof MissingCredentialError &&
        err.missing.length === 1 &&
        err.missing[0] === 'OpenAI API key'
    );
  });

  it('treats whitespace-only keys as missing', () => {
    assert.throws(
      () => assertCredentials({ openaiApiKey: '  ', tavilyApiKey: '' }),
      (err: unknown) => err instanceof MissingCredentialError && err.missing.length === 2
    );
  });
});

describe('SettingsStore', () => {
  it('returns frozen snapshots', () => {
    const store = new SettingsStore(loadSettings({}));
    const snapshot = store.get();
    assert.ok(Object.isFrozen(snapshot));
  });

  it('snapshots are not affected by later updates', () => {
    const store = new SettingsStore(loadSettings({}));
    const before = store.get();

    store.update({ searchDepth: 'basic', selectedDomains: [...TRUSTED_SOURCES] });

    assert.strictEqual(before.searchDepth, 'advanced');
    assert.strictEqual(before.selectedDomains.length, 3);
    assert.strictEqual(store.get().searchDepth, 'basic');
    assert.strictEqual(store.get().selectedDomains.length, 10);
  });

  it('keeps the previous settings when an update is invalid', () => {
    const store = new SettingsStore(loadSettings({}));

    assert.throws(() => store.update({ maxResults: 50 }), InvalidSettingsError);

    assert.strictEqual(store.get().maxResults, 5);
  });
});
