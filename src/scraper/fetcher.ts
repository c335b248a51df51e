/**
 * HTML Fetcher
 *
 * Bounded-timeout GET with a browser User-Agent, parsed with cheerio
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { RateLimiter } from '../utils/rate-limiter.js';
import type { Logger } from '../utils/logger.js';
import type { DocumentFetcher } from './types.js';

export interface FetcherOptions {
  userAgent: string;
  timeout: number;
  /** Minimum delay between two requests */
  rateLimitMs: number;
}

export class HtmlFetcher implements DocumentFetcher {
  private readonly logger: Logger;
  private readonly rateLimiter: RateLimiter;

  constructor(
    private readonly options: FetcherOptions,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'fetcher' });
    this.rateLimiter = new RateLimiter(options.rateLimitMs);
  }

  async fetchDocument(url: string): Promise<CheerioAPI | null> {
    try {
      await this.rateLimiter.waitForSlot();
      this.logger.debug({ url }, 'Fetching page');

      const response = await fetch(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'pt-BR,pt;q=0.9,en;q=0.8',
        },
        signal: AbortSignal.timeout(this.options.timeout),
      });

      if (!response.ok) {
        this.logger.error({ url, status: response.status }, 'HTTP request failed');
        return null;
      }

      const html = await response.text();
      return cheerio.load(html);
    } catch (error) {
      this.logger.error({ error, url }, 'Failed to fetch page');
      return null;
    }
  }
}
