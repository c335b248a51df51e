/**
 * Main Pipeline
 *
 * For every configured source:
 * 1. Extraction: list posts on the listing page and store the new ones
 * 2. Analysis: fetch each unprocessed post, classify it, record its state
 */

import type { PostStore } from './db/queries.js';
import type { RelevanceClassifier } from './filter/index.js';
import type { SourceAdapter } from './scraper/types.js';
import type { Logger } from './utils/logger.js';
import type { PendingPost, PipelineResult, PostState } from './types/index.js';

export interface PipelineDeps {
  store: PostStore;
  sources: readonly SourceAdapter[];
  classifier: RelevanceClassifier;
  logger: Logger;
}

/**
 * Pipeline options
 */
export interface PipelineOptions {
  promoDescription: string;
  /** Cap on posts analyzed per source and run; 0 means no cap */
  maxPostsPerSource?: number;
  skipExtraction?: boolean;
  skipAnalysis?: boolean;
}

/**
 * Run both phases for all sources. Failures are logged and counted, never thrown.
 */
export async function runPipeline(
  deps: PipelineDeps,
  options: PipelineOptions
): Promise<PipelineResult> {
  const { skipExtraction = false, skipAnalysis = false } = options;
  const logger = deps.logger.child({ component: 'pipeline' });

  const startTime = Date.now();
  const result: PipelineResult = {
    sources: deps.sources.length,
    discovered: 0,
    inserted: 0,
    analyzed: 0,
    relevant: 0,
    notRelevant: 0,
    errors: 0,
    durationMs: 0,
  };

  logger.info({ sources: deps.sources.map((s) => s.name), options }, 'Starting pipeline');

  if (!skipExtraction) {
    logger.info('Phase 1: Extracting posts...');
    for (const source of deps.sources) {
      await runExtraction(deps, source, result, logger);
    }
    logger.info({ discovered: result.discovered, inserted: result.inserted }, 'Extraction phase complete');
  }

  if (!skipAnalysis) {
    logger.info('Phase 2: Analyzing post content...');
    for (const source of deps.sources) {
      await runAnalysis(deps, source, options, result, logger);
    }
    logger.info(
      {
        analyzed: result.analyzed,
        relevant: result.relevant,
        notRelevant: result.notRelevant,
        errors: result.errors,
      },
      'Analysis phase complete'
    );
  }

  result.durationMs = Date.now() - startTime;
  logger.info({ result }, 'Pipeline complete');
  return result;
}

async function runExtraction(
  deps: PipelineDeps,
  source: SourceAdapter,
  result: PipelineResult,
  logger: Logger
): Promise<void> {
  const log = logger.child({ source: source.name });

  const sourceId = deps.store.getOrCreateSource(source.name);
  if (sourceId === null) {
    log.fatal('Failed to get or create source, skipping extraction');
    result.errors++;
    return;
  }

  try {
    const posts = await source.listPosts();
    result.discovered += posts.length;

    if (posts.length === 0) {
      log.warn('No posts found');
      return;
    }

    const inserted = deps.store.insertPosts(sourceId, posts);
    result.inserted += inserted;
    log.info({ found: posts.length, inserted }, 'New posts saved to the database');
  } catch (error) {
    log.error({ error }, 'Error during post extraction');
    result.errors++;
  }
}

async function runAnalysis(
  deps: PipelineDeps,
  source: SourceAdapter,
  options: PipelineOptions,
  result: PipelineResult,
  logger: Logger
): Promise<void> {
  const log = logger.child({ source: source.name });

  const sourceId = deps.store.getOrCreateSource(source.name);
  if (sourceId === null) {
    log.fatal('Failed to get or create source, skipping analysis');
    result.errors++;
    return;
  }

  const pending = deps.store.postsPendingAnalysis({
    sourceId,
    limit: options.maxPostsPerSource,
  });

  if (pending.length === 0) {
    log.info('No posts require content analysis');
    return;
  }

  log.info({ count: pending.length }, 'Posts requiring content analysis');

  for (const post of pending) {
    const state = await analyzePost(deps, source, post, options.promoDescription, log);

    if (state === null) {
      result.errors++;
      continue;
    }

    result.analyzed++;
    if (state === 'RELEVANT') {
      result.relevant++;
    } else if (state === 'NOT_RELEVANT') {
      result.notRelevant++;
    } else {
      result.errors++;
    }
  }
}

/**
 * Fetch, classify and record one post. Any failure ends in the ERROR state;
 * null when the state could not be written.
 */
async function analyzePost(
  deps: PipelineDeps,
  source: SourceAdapter,
  post: PendingPost,
  promoDescription: string,
  logger: Logger
): Promise<PostState | null> {
  const log = logger.child({ postId: post.id, url: post.link });

  let state: PostState;
  let summary: string | undefined;

  try {
    const content = await source.extractContent(post.link);

    if (content === null) {
      log.error('Could not fetch post content');
      state = 'ERROR';
      summary = 'Content fetch failed';
    } else {
      const classification = await deps.classifier.classify(content, promoDescription);

      if (classification.error !== undefined) {
        state = 'ERROR';
        summary = classification.summary;
      } else if (classification.isRelevant) {
        state = 'RELEVANT';
        summary = classification.summary;
        log.info({ summary }, 'Relevant promotion found');
      } else {
        state = 'NOT_RELEVANT';
      }
    }
  } catch (error) {
    log.error({ error }, 'Error during content extraction or relevance analysis');
    state = 'ERROR';
    summary = error instanceof Error ? error.message : String(error);
  }

  if (!deps.store.setPostState(post.id, state, summary)) {
    log.error({ state }, 'Failed to record post state, post stays pending');
    return null;
  }

  log.debug({ state }, 'Post state recorded');
  return state;
}
