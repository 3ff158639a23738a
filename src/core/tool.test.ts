import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';

import { defineTool } from './tool.js';
import { createLogger } from '../utils/logger.js';

const silent = createLogger({ handler: () => undefined });

function makePerilTool() {
  return defineTool(
    {
      id: 'lookup_peril',
      description: 'Look up a peril',
      inputSchema: z.object({
        peril: z.string().describe('Peril name'),
        region: z.string().optional(),
      }),
    },
    async (_ctx, input) => ({ peril: input.peril, region: input.region ?? 'global' })
  );
}

describe('defineTool', () => {
  it('exposes an OpenAI-style function definition', () => {
    const def = makePerilTool().toLlmToolDefinition();

    assert.strictEqual(def.type, 'function');
    assert.strictEqual(def.function.name, 'lookup_peril');
    assert.strictEqual(def.function.description, 'Look up a peril');
    assert.strictEqual(def.function.parameters['type'], 'object');
    assert.deepStrictEqual(def.function.parameters['required'], ['peril']);
  });

  it('strips the $schema key from parameters', () => {
    const tool = makePerilTool();
    assert.ok(!('$schema' in tool.toolParameters));
  });

  it('validates input before running the handler', async () => {
    const tool = makePerilTool();

    const result = await tool.execute({ peril: 'flood' }, { toolCallId: 'call-1', logger: silent });
    assert.deepStrictEqual(result, { peril: 'flood', region: 'global' });

    await assert.rejects(
      tool.execute({ region: 'UK' }, { toolCallId: 'call-2', logger: silent }),
      z.ZodError
    );
  });
});
