import { describe, expect, it } from 'vitest';
import { pino } from 'pino';
import { createSources } from './registry.js';
import { SOURCE_NAME } from './passageiro-de-primeira.js';
import type { DocumentFetcher } from './types.js';

const deps = {
  fetcher: { fetchDocument: async () => null } satisfies DocumentFetcher,
  logger: pino({ level: 'silent' }),
};

describe('createSources', () => {
  it('builds the configured adapters', () => {
    const sources = createSources(['passageiro-de-primeira'], deps);
    expect(sources.map((s) => s.name)).toEqual([SOURCE_NAME]);
  });

  it('rejects unknown keys', () => {
    expect(() => createSources(['unknown-blog'], deps)).toThrow(
      "Unknown source 'unknown-blog'. Available sources: passageiro-de-primeira"
    );
  });

  it('accepts a custom registry', () => {
    const sources = createSources(['fake'], deps, {
      fake: () => ({
        name: 'Fake',
        listPosts: async () => [],
        extractContent: async () => '',
      }),
    });
    expect(sources[0]?.name).toBe('Fake');
  });
});
