/**
 * Offline reference rulings for well-known tokens.
 */

export type TokenRuling = 'halal' | 'haram' | 'stablecoin';

export interface ReferenceToken {
  symbol: string;
  name: string;
  ruling: TokenRuling;
  /** Share of screening criteria met, in [0, 1]. */
  complianceScore: number;
  confidence: number;
  riskScore: number;
  reasoning: readonly string[];
  references: readonly string[];
}

export const REFERENCE_TOKENS: Readonly<Record<string, ReferenceToken>> = {
  SOL: {
    symbol: 'SOL',
    name: 'Solana',
    ruling: 'halal',
    complianceScore: 0.85,
    confidence: 0.8,
    riskScore: 0.2,
    reasoning: [
      'Utility token used to pay for blockchain infrastructure',
      'No direct involvement in interest-bearing (riba) activity',
      'Supports applications that can be Sharia compliant',
    ],
    references: [
      'AAOIFI Sharia Standard No. 17 (Investment Sukuk)',
      'Scholarly guidance on utility tokens',
    ],
  },
  BTC: {
    symbol: 'BTC',
    name: 'Bitcoin',
    ruling: 'haram',
    complianceScore: 0.3,
    confidence: 0.7,
    riskScore: 0.8,
    reasoning: [
      'Highly speculative price behaviour (gharar)',
      'Frequently traded for speculation and gambling (maysir)',
      'No underlying asset or issuer backing',
    ],
    references: [
      'Fatwa of the Egyptian Dar al-Ifta on cryptocurrency trading',
      'Scholarly concerns on speculative instruments',
    ],
  },
  USDC: {
    symbol: 'USDC',
    name: 'USD Coin',
    ruling: 'stablecoin',
    complianceScore: 0.6,
    confidence: 0.6,
    riskScore: 0.1,
    reasoning: [
      'Fully collateralized by US dollar reserves',
      'Reserve income may include interest, which holders do not receive',
      'Permissible as a medium of exchange; avoid yield products built on it',
    ],
    references: ['AAOIFI Sharia Standard No. 1 (Trading in Currencies)'],
  },
};

/** `"$sol "` → `"SOL"`. */
export function normalizeSymbol(input: string): string {
  return input.trim().replace(/^\$/, '').toUpperCase();
}

export function findReferenceToken(input: string): ReferenceToken | undefined {
  const symbol = normalizeSymbol(input);
  return Object.hasOwn(REFERENCE_TOKENS, symbol) ? REFERENCE_TOKENS[symbol] : undefined;
}
