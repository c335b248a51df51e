/**
 * Passageiro de Primeira Scraper
 *
 * Lists posts from the promotions category and extracts article text
 */

import type { CheerioAPI } from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';
import type { Logger } from '../utils/logger.js';
import type { PostListing } from '../types/index.js';
import type { DocumentFetcher, SourceAdapter } from './types.js';

export const SITE_ORIGIN = 'https://passageirodeprimeira.com';
export const LISTING_URL = `${SITE_ORIGIN}/categorias/promocoes/`;
export const SOURCE_NAME = 'Passageiro de Primeira';

const LISTING_CONTAINER = 'div[data-term="promocoes"]';
const POST_HEADING = 'h1.article--title';
const CONTENT_CONTAINER = 'article.single-content';

/**
 * Extract (title, link) pairs from the promotions listing page
 */
export function listPosts($: CheerioAPI, logger: Logger, origin: string = SITE_ORIGIN): PostListing[] {
  const container = $(LISTING_CONTAINER).first();

  if (container.length === 0) {
    logger.error({ selector: LISTING_CONTAINER }, 'Listing container not found, page structure changed?');
    return [];
  }

  const posts: PostListing[] = [];

  container.find(POST_HEADING).each((_, heading) => {
    const anchor = $(heading).find('a[href]').first();
    const href = anchor.attr('href');
    const title = anchor.text().replace(/\s+/g, ' ').trim();

    if (!href || !title) {
      return;
    }

    const link = resolveLink(href, origin);
    if (link === null) {
      logger.warn({ href, title }, 'Skipping post with unresolvable link');
      return;
    }

    posts.push({ title, link });
  });

  if (posts.length === 0) {
    logger.warn({ selector: POST_HEADING }, 'No post headings found in listing container');
  }

  return posts;
}

function resolveLink(href: string, origin: string): string | null {
  if (/^https?:\/\//i.test(href)) {
    return href;
  }
  try {
    return new URL(href, origin).href;
  } catch {
    return null;
  }
}

/**
 * Article text with one line per text block; '' when the article container is missing
 */
export function getContent($: CheerioAPI, logger: Logger): string {
  const container = $(CONTENT_CONTAINER).first();
  const root = container.get(0);

  if (!root) {
    logger.warn({ selector: CONTENT_CONTAINER }, 'Article container not found');
    return '';
  }

  container.find('script, style, noscript').remove();

  const lines: string[] = [];
  collectText(root, lines);
  return lines.join('\n');
}

function collectText(node: AnyNode, lines: string[]): void {
  if (isText(node)) {
    const text = node.data.trim();
    if (text) {
      lines.push(text);
    }
    return;
  }

  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, lines);
    }
  }
}

export class PassageiroDePrimeiraSource implements SourceAdapter {
  readonly name = SOURCE_NAME;
  private readonly logger: Logger;

  constructor(
    private readonly fetcher: DocumentFetcher,
    logger: Logger
  ) {
    this.logger = logger.child({ source: SOURCE_NAME });
  }

  async listPosts(): Promise<PostListing[]> {
    this.logger.info({ url: LISTING_URL }, 'Fetching listing page');

    const $ = await this.fetcher.fetchDocument(LISTING_URL);
    if (!$) {
      this.logger.error('Failed to fetch listing page, cannot extract posts');
      return [];
    }

    const posts = listPosts($, this.logger);
    this.logger.info({ count: posts.length }, 'Posts found on listing page');
    return posts;
  }

  async extractContent(url: string): Promise<string | null> {
    const $ = await this.fetcher.fetchDocument(url);
    if (!$) {
      return null;
    }
    return getContent($, this.logger);
  }
}
