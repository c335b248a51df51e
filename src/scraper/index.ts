/**
 * Scraper Module
 */

export { HtmlFetcher, type FetcherOptions } from './fetcher.js';

export {
  PassageiroDePrimeiraSource,
  listPosts,
  getContent,
  SITE_ORIGIN,
  LISTING_URL,
  SOURCE_NAME,
} from './passageiro-de-primeira.js';

export {
  createSources,
  SOURCE_REGISTRY,
  type SourceDeps,
  type SourceFactory,
} from './registry.js';

export type { DocumentFetcher, PostLister, ContentExtractor, SourceAdapter } from './types.js';
