/**
 * Scraper Types
 */

import type { CheerioAPI } from 'cheerio';
import type { PostListing } from '../types/index.js';

/**
 * Fetches a page and parses it; null means the page could not be retrieved
 */
export interface DocumentFetcher {
  fetchDocument(url: string): Promise<CheerioAPI | null>;
}

/**
 * Discovers posts on a source's listing page
 */
export interface PostLister {
  listPosts(): Promise<PostListing[]>;
}

/**
 * Extracts the article text of a single post.
 * Resolves to null when the page could not be fetched and to '' when it
 * was fetched but holds no article content.
 */
export interface ContentExtractor {
  extractContent(url: string): Promise<string | null>;
}

/**
 * A monitored site, identified in the store by its name
 */
export interface SourceAdapter extends PostLister, ContentExtractor {
  readonly name: string;
}
