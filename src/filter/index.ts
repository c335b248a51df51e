/**
 * Filter Module
 */

export {
  PromotionClassifier,
  createOpenAiGenerator,
  type RelevanceClassifier,
  type TextGenerator,
  type OpenAiOptions,
} from './ai-validator.js';

export {
  buildPromotionPrompt,
  parseClassifierResponse,
  BOOLEAN_PREFIX,
  SUMMARY_PREFIX,
  NOT_APPLICABLE,
} from './prompt.js';
