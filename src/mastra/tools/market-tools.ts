// ============================================================================
// MARKET ANALYSIS TOOLS
// ============================================================================
// Turns a basket of quotes into a market-condition summary:
// - Sentiment from the share of advancing symbols
// - Per-sector average performance, yield and sentiment
// - Risk from mean absolute daily move
// - An overall positioning label (aggressive / balanced / defensive)
// ============================================================================

import { createTool } from '@mastra/core/tools';
import { z } from 'zod';

import { SECTORS } from '../config';
import {
  marketSummarySchema,
  quoteMapSchema,
  type MarketSummary,
  type QuoteMap,
  type SectorPerformance,
} from '../lib/types';

export const INSIGHTS = {
  bullish: 'Strong positive momentum across major indices',
  bearish: 'Widespread selling pressure in markets',
  neutral: 'Mixed signals with sector rotation',
  highRisk: 'High volatility detected - markets are unstable',
  lowRisk: 'Low volatility - stable market conditions',
  aggressiveBuy: 'Favorable conditions for aggressive investment',
  defensive: 'Consider defensive positioning with bonds',
  balanced: 'Balanced approach recommended',
} as const;

function average(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function analyzeSectors(quotes: QuoteMap, sectorMap: Record<string, string[]>): Record<string, SectorPerformance> {
  const sectors: Record<string, SectorPerformance> = {};

  for (const [sectorName, symbols] of Object.entries(sectorMap)) {
    const members = symbols.flatMap((symbol) => {
      const quote = quotes[symbol];
      return quote ? [quote] : [];
    });
    if (members.length === 0) continue;

    const performance = average(members.map((q) => q.changePct));
    const dividendYield = average(members.map((q) => q.dividendYieldPct));

    sectors[sectorName] = {
      performance,
      dividendYield,
      sentiment: performance > 1 ? 'strong' : performance < -1 ? 'weak' : 'neutral',
    };
  }

  return sectors;
}

export function analyzeMarket(quotes: QuoteMap, sectorMap: Record<string, string[]> = SECTORS): MarketSummary {
  const all = Object.values(quotes);

  if (all.length === 0) {
    return {
      sentiment: 'neutral',
      risk: 'medium',
      recommendation: 'proceed_with_caution',
      sectorAnalysis: {},
      insights: [],
    };
  }

  const insights: string[] = [];

  const advancing = all.filter((q) => q.changePct > 0).length / all.length;
  let sentiment: MarketSummary['sentiment'];
  if (advancing > 0.7) {
    sentiment = 'bullish';
    insights.push(INSIGHTS.bullish);
  } else if (advancing < 0.3) {
    sentiment = 'bearish';
    insights.push(INSIGHTS.bearish);
  } else {
    sentiment = 'neutral';
    insights.push(INSIGHTS.neutral);
  }

  const sectorAnalysis = analyzeSectors(quotes, sectorMap);

  const volatility = average(all.map((q) => Math.abs(q.changePct)));
  let risk: MarketSummary['risk'] = 'medium';
  if (volatility > 2) {
    risk = 'high';
    insights.push(INSIGHTS.highRisk);
  } else if (volatility < 0.5) {
    risk = 'low';
    insights.push(INSIGHTS.lowRisk);
  }

  let recommendation: MarketSummary['recommendation'];
  if (sentiment === 'bullish' && risk === 'low') {
    recommendation = 'aggressive_buy';
    insights.push(INSIGHTS.aggressiveBuy);
  } else if (sentiment === 'bearish' || risk === 'high') {
    recommendation = 'defensive';
    insights.push(INSIGHTS.defensive);
  } else {
    recommendation = 'balanced';
    insights.push(INSIGHTS.balanced);
  }

  return { sentiment, risk, recommendation, sectorAnalysis, insights };
}

export const analyzeMarketTool = createTool({
  id: 'analyze-market',
  description: 'Summarize market sentiment, risk level and sector performance from a set of quotes',
  inputSchema: z.object({
    quotes: quoteMapSchema,
  }),
  outputSchema: marketSummarySchema,
  execute: async ({ context }) => {
    return analyzeMarket(context.quotes);
  },
});
