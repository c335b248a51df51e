/**
 * Promotion Classifier
 *
 * Asks a language model whether an article describes a given promotion
 */

import OpenAI from 'openai';
import { withRetry } from '../utils/retry.js';
import type { Logger } from '../utils/logger.js';
import type { ClassificationResult, RetryConfig } from '../types/index.js';
import { NOT_APPLICABLE, buildPromotionPrompt, parseClassifierResponse } from './prompt.js';

/**
 * Sends a prompt to a text-generation service and resolves to its raw answer
 */
export type TextGenerator = (prompt: string) => Promise<string>;

export interface RelevanceClassifier {
  classify(text: string, promoDescription: string): Promise<ClassificationResult>;
}

export interface OpenAiOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

/**
 * TextGenerator backed by the OpenAI chat completions API
 */
export function createOpenAiGenerator(options: OpenAiOptions): TextGenerator {
  const client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });

  return async (prompt) => {
    const response = await client.chat.completions.create({
      model: options.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: 0.2,
      max_tokens: 300,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Empty response from OpenAI');
    }
    return content;
  };
}

export class PromotionClassifier implements RelevanceClassifier {
  private readonly logger: Logger;

  constructor(
    private readonly generate: TextGenerator,
    logger: Logger,
    private readonly retry: Partial<RetryConfig> = {}
  ) {
    this.logger = logger.child({ component: 'classifier' });
  }

  async classify(text: string, promoDescription: string): Promise<ClassificationResult> {
    if (!text.trim()) {
      this.logger.debug('Empty content, nothing to classify');
      return { isRelevant: false, summary: NOT_APPLICABLE };
    }

    try {
      const prompt = buildPromotionPrompt(text, promoDescription);
      this.logger.debug({ promptLength: prompt.length }, 'Calling language model');

      const raw = await withRetry(() => this.generate(prompt), this.retry, this.logger);
      this.logger.debug({ response: raw.trim().slice(0, 200) }, 'Raw model response received');

      const result = parseClassifierResponse(raw);
      this.logger.info(
        { isRelevant: result.isRelevant, summary: result.summary },
        'Promotion check completed'
      );
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ error }, 'Promotion check failed');
      return { isRelevant: false, summary: `An error occurred: ${message}`, error: message };
    }
  }
}
