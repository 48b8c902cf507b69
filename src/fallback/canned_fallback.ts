/**
 * @fileoverview Offline answers for when the native subsystem is absent
 *
 * Answers are deterministic for a given request: same text, same id. Only
 * `createdAt` depends on the clock. Confidence never exceeds
 * {@link MAX_FALLBACK_CONFIDENCE} and the only source is `fallback`.
 */

import { createHash } from 'node:crypto';
import { freezeResponse } from '../native/records.js';
import type { QueryRequest, QueryResponse } from '../types.js';
import { findReferenceToken, normalizeSymbol, type ReferenceToken } from './reference_tokens.js';

export const FALLBACK_SOURCE = 'fallback';
export const DEFAULT_FALLBACK_CONFIDENCE = 0.6;
export const MAX_FALLBACK_CONFIDENCE = 0.7;

export interface FallbackResponseGenerator {
  generate(request: QueryRequest): QueryResponse;
}

export interface CannedFallbackOptions {
  now?: () => number;
  confidence?: number;
}

export type FallbackTopic = 'riba' | 'crypto' | 'halal' | 'general';

interface CannedAnswer {
  text: string;
  confidence: number;
  followUps: readonly string[];
}

// ============================================================================
// TEXTS
// ============================================================================

const TOPIC_ANSWERS: Record<FallbackTopic, { text: string; followUps: readonly string[] }> = {
  halal: {
    text:
      'An investment is generally considered halal when it meets these criteria:\n\n' +
      '1. No riba: returns must not come from interest.\n' +
      '2. No excessive gharar: the terms and the asset must be clear.\n' +
      '3. No prohibited business: alcohol, gambling, conventional lending and similar activities are excluded.\n' +
      '4. Asset backing: the investment should represent real economic value.\n\n' +
      'The online assistant is unavailable, so this is general guidance rather than a specific ruling.',
    followUps: ['Can you screen a specific token?', 'What counts as excessive gharar?'],
  },
  crypto: {
    text:
      'Scholars differ on cryptocurrencies. Common positions:\n\n' +
      '- Tokens with real utility and no interest mechanism are often considered permissible.\n' +
      '- Interest-bearing lending tokens are impermissible because they involve riba.\n' +
      '- Gambling tokens and highly speculative meme coins are impermissible because of maysir and gharar.\n\n' +
      'Ask about a specific token for a reference assessment.',
    followUps: ['Is SOL halal?', 'Is BTC halal?', 'Are stablecoins permissible?'],
  },
  riba: {
    text:
      'Riba is any predetermined increase charged on a loan or on an exchange of like currencies. ' +
      'It is prohibited in Islamic finance. Interest-bearing deposits, bonds and crypto lending yields ' +
      'fall under riba. Permissible alternatives share profit and loss (mudarabah, musharakah) or ' +
      'sell an asset at a disclosed markup (murabahah).',
    followUps: ['Is staking the same as interest?', 'How does murabahah work?'],
  },
  general: {
    text:
      'I can help with Islamic finance questions according to Sharia principles, including:\n\n' +
      '- Investment screening\n' +
      '- Cryptocurrency evaluation\n' +
      '- Islamic banking concepts\n' +
      '- Contract compliance\n\n' +
      'The online assistant is unavailable right now, so answers are limited to general guidance.',
    followUps: ['What makes an investment halal?', 'Is cryptocurrency permissible?'],
  },
};

const CONTRACT_ANSWER =
  'Offline contract checklist. Review the contract for:\n\n' +
  '1. Riba: any fixed return on lent funds or interest-bearing calls.\n' +
  '2. Gharar: hidden admin keys, upgradeable logic or undefined terms.\n' +
  '3. Maysir: lotteries, randomized payouts or wagering mechanics.\n' +
  '4. Asset backing: whether tokens represent real assets or services.\n\n' +
  'A full analysis needs the online assistant.';

const AUDIO_ANSWER =
  'Voice questions need the online assistant for transcription. ' +
  'Please type your question instead, or try again once the assistant is available.';

// ============================================================================
// GENERATOR
// ============================================================================

export function detectTopic(text: string): FallbackTopic {
  const lower = text.toLowerCase();
  if (/\b(riba|interest|usury)\b/.test(lower)) return 'riba';
  if (/\b(crypto\w*|bitcoin|btc|ethereum|token|coin)\b/.test(lower)) return 'crypto';
  if (/\b(halal|haram|sharia|shariah|permissible)\b/.test(lower)) return 'halal';
  return 'general';
}

function describeReferenceToken(token: ReferenceToken, confidence: number): string {
  const heading =
    token.ruling === 'halal' ? 'HALAL' : token.ruling === 'haram' ? 'HARAM' : 'PERMISSIBLE WITH CONDITIONS';
  return [
    `# Token Analysis: ${token.symbol} (${token.name})`,
    '',
    `**Ruling:** ${heading}`,
    `**Compliance score:** ${Math.round(token.complianceScore * 100)}%`,
    `**Confidence:** ${Math.round(confidence * 100)}%`,
    '',
    '## Reasoning',
    ...token.reasoning.map((line) => `- ${line}`),
    '',
    '## References',
    ...token.references.map((line) => `- ${line}`),
    '',
    'Offline reference assessment. Consult a qualified scholar for a definitive ruling.',
  ].join('\n');
}

function describeUnknownToken(symbol: string, confidence: number): string {
  return [
    `# Token Analysis: ${symbol}`,
    '',
    '**Status:** Under Review',
    `**Confidence:** ${Math.round(confidence * 100)}%`,
    '',
    `No offline reference exists for ${symbol}. Check it against these criteria:`,
    '- Real utility and a legitimate use case',
    '- No interest-based mechanisms',
    '- Transparent governance',
    '- Volatility and speculation risk',
    '',
    'Further research is recommended once the online assistant is available.',
  ].join('\n');
}

/**
 * Default fallback strategy: fixed texts selected by query kind and by topic
 * keywords.
 */
export class CannedFallbackGenerator implements FallbackResponseGenerator {
  private readonly now: () => number;
  private readonly confidence: number;

  constructor(options: CannedFallbackOptions = {}) {
    this.now = options.now ?? Date.now;
    this.confidence = Math.min(options.confidence ?? DEFAULT_FALLBACK_CONFIDENCE, MAX_FALLBACK_CONFIDENCE);
  }

  generate(request: QueryRequest): QueryResponse {
    const answer = this.answer(request);
    return freezeResponse({
      id: fallbackId(request),
      text: answer.text,
      confidence: answer.confidence,
      sources: [FALLBACK_SOURCE],
      followUps: answer.followUps,
      createdAt: this.now(),
    });
  }

  private answer(request: QueryRequest): CannedAnswer {
    const { kind, payload } = request;
    if (kind === 'audio' || typeof payload !== 'string') {
      return { text: AUDIO_ANSWER, confidence: this.confidence, followUps: ['What makes an investment halal?'] };
    }
    switch (kind) {
      case 'token': {
        const token = findReferenceToken(payload);
        if (token) {
          const confidence = Math.min(token.confidence, MAX_FALLBACK_CONFIDENCE);
          return {
            text: describeReferenceToken(token, confidence),
            confidence,
            followUps: [`What are the risks of holding ${token.symbol}?`, 'Which tokens are considered halal?'],
          };
        }
        const symbol = normalizeSymbol(payload);
        return {
          text: describeUnknownToken(symbol, this.confidence),
          confidence: this.confidence,
          followUps: [`Who governs ${symbol}?`, 'What makes a token halal?'],
        };
      }
      case 'contract':
        return {
          text: CONTRACT_ANSWER,
          confidence: this.confidence,
          followUps: ['What is gharar in smart contracts?'],
        };
      case 'text':
      case 'chat_message': {
        const topic = TOPIC_ANSWERS[detectTopic(payload)];
        return { text: topic.text, confidence: this.confidence, followUps: topic.followUps };
      }
    }
  }
}

/** `fallback_<kind>_<first 16 hex chars of sha256(kind, language, payload)>` */
export function fallbackId(request: QueryRequest): string {
  const digest = createHash('sha256')
    .update(request.kind)
    .update('\0')
    .update(request.language)
    .update('\0')
    .update(request.payload)
    .digest('hex')
    .slice(0, 16);
  return `fallback_${request.kind}_${digest}`;
}
