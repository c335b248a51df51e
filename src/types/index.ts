/**
 * Core types for MileWatcher
 */

export const POST_STATES = ['UNPROCESSED', 'RELEVANT', 'NOT_RELEVANT', 'ERROR'] as const;

export type PostState = (typeof POST_STATES)[number];

export function isPostState(value: string): value is PostState {
  return POST_STATES.some((state) => state === value);
}

export interface Post {
  id: number;
  sourceId: number;
  title: string;
  link: string;
  extractedAt: Date;
  processedAt: Date | null;
  state: PostState;
  summary: string | null;
}

/**
 * A (title, link) pair discovered on a listing page
 */
export interface PostListing {
  title: string;
  link: string;
}

export interface PendingPost {
  id: number;
  link: string;
}

export interface ClassificationResult {
  isRelevant: boolean;
  summary: string;
  /** Set when the remote call failed; the result is then not a confirmed negative */
  error?: string;
}

export interface PipelineResult {
  sources: number;
  discovered: number;
  inserted: number;
  analyzed: number;
  relevant: number;
  notRelevant: number;
  errors: number;
  durationMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
