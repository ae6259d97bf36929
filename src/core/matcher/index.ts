export { Matcher, compareMatches, DEPENDENCY_CONFIDENCE, DEFAULT_MIN_SIMILARITY } from './matcher.js';
export type { MatcherOptions } from './matcher.js';
export { EmbeddingScorer, cosineSimilarity, descriptorText } from './semantic.js';
export { scoreKeywords, tokenize, TAG_WEIGHT, PURPOSE_WEIGHT } from './keyword.js';
export type { KeywordScore } from './keyword.js';
export type { MatchResult, MatchSource, MatchOptions, SemanticScorer } from './types.js';
