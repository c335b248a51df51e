/**
 * Source registry
 *
 * Maps the keys listed in SOURCES to adapter factories
 */

import type { Logger } from '../utils/logger.js';
import { PassageiroDePrimeiraSource } from './passageiro-de-primeira.js';
import type { DocumentFetcher, SourceAdapter } from './types.js';

export interface SourceDeps {
  fetcher: DocumentFetcher;
  logger: Logger;
}

export type SourceFactory = (deps: SourceDeps) => SourceAdapter;

export const SOURCE_REGISTRY: Readonly<Record<string, SourceFactory>> = {
  'passageiro-de-primeira': ({ fetcher, logger }) => new PassageiroDePrimeiraSource(fetcher, logger),
};

/**
 * Build the adapters for the configured keys, in order.
 * Throws on an unknown key so a typo fails at startup.
 */
export function createSources(
  keys: readonly string[],
  deps: SourceDeps,
  registry: Readonly<Record<string, SourceFactory>> = SOURCE_REGISTRY
): SourceAdapter[] {
  return keys.map((key) => {
    const factory = registry[key];
    if (!factory) {
      throw new Error(
        `Unknown source '${key}'. Available sources: ${Object.keys(registry).join(', ')}`
      );
    }
    return factory(deps);
  });
}
