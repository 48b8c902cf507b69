export {
  CannedFallbackGenerator,
  DEFAULT_FALLBACK_CONFIDENCE,
  FALLBACK_SOURCE,
  MAX_FALLBACK_CONFIDENCE,
  detectTopic,
  fallbackId,
  type CannedFallbackOptions,
  type FallbackResponseGenerator,
  type FallbackTopic,
} from './canned_fallback.js';
export {
  REFERENCE_TOKENS,
  findReferenceToken,
  normalizeSymbol,
  type ReferenceToken,
  type TokenRuling,
} from './reference_tokens.js';
