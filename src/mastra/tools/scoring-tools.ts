// ============================================================================
// SCORING TOOLS
// ============================================================================
// Composite quality score per symbol from momentum, yield and valuation.
// Advisory only: it travels with each recommendation but never drives sizing.
// ============================================================================

import { createTool } from '@mastra/core/tools';
import { z } from 'zod';

import { quoteSchema, type Quote } from '../lib/types';

export const MIN_SCORE = 20;
export const MAX_SCORE = 95;
export const DEFAULT_SCORE = 50;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Score a symbol in [20, 95]. A symbol without a quote scores 50.
 */
export function scoreSymbol(quote: Quote | undefined): number {
  if (!quote) return DEFAULT_SCORE;

  let score = DEFAULT_SCORE;
  score += clamp(quote.changePct * 2, -15, 15);

  if (quote.dividendYieldPct > 2) {
    score += 10;
  }

  if (quote.peRatio !== null && quote.peRatio >= 10 && quote.peRatio <= 25) {
    score += 10;
  }

  return Math.round(clamp(score, MIN_SCORE, MAX_SCORE));
}

export const scoreSymbolTool = createTool({
  id: 'score-symbol',
  description: 'Score an ETF from 20 to 95 using price momentum, dividend yield and P/E ratio',
  inputSchema: z.object({
    symbol: z.string(),
    quote: quoteSchema.optional(),
  }),
  outputSchema: z.object({
    symbol: z.string(),
    score: z.number(),
  }),
  execute: async ({ context }) => {
    return {
      symbol: context.symbol.toUpperCase(),
      score: scoreSymbol(context.quote),
    };
  },
});
