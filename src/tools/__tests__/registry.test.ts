/**
 * Tool registry tests
 */

import { describe, expect, it } from 'vitest';
import { ToolRegistry } from '../registry.js';

const now = () => new Date('2026-04-01T08:00:00.000Z');

describe('ToolRegistry', () => {
  it('runs a registered tool and logs the call', async () => {
    const registry = new ToolRegistry(now).register('summarize', (text) => text.toUpperCase(), {
      description: 'Shout',
    });

    expect(await registry.execute('summarize', 'hello')).toBe('HELLO');
    expect(registry.executionLog()).toEqual([
      { tool: 'summarize', timestamp: '2026-04-01T08:00:00.000Z', input: 'hello', success: true },
    ]);
    expect(registry.list()[0].executions).toBe(1);
  });

  it('logs and rethrows tool failures', async () => {
    const registry = new ToolRegistry(now).register(
      'search',
      async () => {
        throw new Error('rate limited');
      },
      { description: 'Always fails', requiredForResearch: true },
    );

    await expect(registry.execute('search', 'query')).rejects.toThrow('rate limited');
    expect(registry.executionLog()[0]).toMatchObject({ success: false, error: 'rate limited' });
    expect(registry.list()[0].executions).toBe(0);
  });

  it('refuses tools that were never registered', async () => {
    const registry = new ToolRegistry().register('search', () => [], { description: 'Empty search' });

    await expect(registry.execute('summarize', 'text')).rejects.toThrow(
      "Tool 'summarize' not registered. Available: search",
    );
  });

  it('reports which tools research needs', () => {
    const registry = new ToolRegistry()
      .register('search', () => [], { description: 'Search', requiredForResearch: true })
      .register('summarize', (text) => text, { description: 'Summarize' });

    expect(registry.requiredTools()).toEqual(['search']);
    expect(registry.has('summarize')).toBe(true);
  });

  it('clears the execution log', async () => {
    const registry = new ToolRegistry().register('summarize', (text) => text, { description: 'Echo' });
    await registry.execute('summarize', 'a');
    registry.resetLog();
    expect(registry.executionLog()).toEqual([]);
  });
});
