import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryLogger } from '@leansmith/shared';
import { FakeAdapter } from './adapter';
import type { AdapterContext } from '../types';

describe('FakeAdapter', () => {
  let ctx: AdapterContext;

  beforeEach(() => {
    ctx = { runId: 'test-run', logger: new MemoryLogger() };
  });

  it('replays scripted responses in order', async () => {
    const adapter = new FakeAdapter({
      type: 'fake',
      model: 'scripted',
      responses: ['first', 'second'],
    });

    const one = await adapter.generate({ messages: [{ role: 'user', content: 'a' }] }, ctx);
    const two = await adapter.generate({ messages: [{ role: 'user', content: 'b' }] }, ctx);

    expect(one.text).toBe('first');
    expect(two.text).toBe('second');
    expect(adapter.requests.map((r) => r.messages[0]?.content)).toEqual(['a', 'b']);
  });

  it('falls back to canned answers chosen by the system prompt', async () => {
    const adapter = new FakeAdapter({ type: 'fake', model: 'offline' });

    const plan = await adapter.generate(
      { messages: [{ role: 'system', content: 'You are a planning agent.' }] },
      ctx,
    );
    const review = await adapter.generate(
      { messages: [{ role: 'system', content: 'You are a Lean 4 debugging expert.' }] },
      ctx,
    );
    const solution = await adapter.generate(
      { messages: [{ role: 'system', content: 'You are an expert Lean 4 programmer.' }] },
      ctx,
    );

    expect(JSON.parse(plan.text ?? '')).toHaveProperty('strategy');
    expect(JSON.parse(review.text ?? '')).toMatchObject({ confidence: 0, suggested_fixes: [] });
    expect(JSON.parse(solution.text ?? '')).toMatchObject({ code: 'a + b', proof: 'rfl' });
  });

  it('reports its identity and goes through the transport', async () => {
    const logger = new MemoryLogger();
    const adapter = new FakeAdapter({ type: 'fake', model: 'offline' });

    await adapter.generate({ messages: [] }, { runId: 'r', logger });

    expect(adapter.id()).toBe('fake:offline');
    expect(adapter.capabilities().supportsJsonMode).toBe(true);
    expect(logger.eventsOfType('ProviderRequestFinished')).toHaveLength(1);
  });
});
